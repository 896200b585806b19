import { useState } from 'react';
import { formatTimeOfDay, parseTimeOfDay } from '../lib/time';
import type { TimeOfDay } from '../lib/types';

export const DEFAULT_START: TimeOfDay = { hour: 12, minute: 0 };
export const DEFAULT_END: TimeOfDay = { hour: 13, minute: 0 };
export const TIME_STEP_SECONDS = 60;

type EntryFormProps = {
  error?: string;
  notice?: string;
  onSubmit: (payload: { name: string; start: TimeOfDay; end: TimeOfDay }) => boolean;
  onInvalidTime: () => void;
};

export function EntryForm({ error, notice, onSubmit, onInvalidTime }: EntryFormProps): JSX.Element {
  const [name, setName] = useState('');
  const [startTime, setStartTime] = useState(formatTimeOfDay(DEFAULT_START));
  const [endTime, setEndTime] = useState(formatTimeOfDay(DEFAULT_END));

  return (
    <form
      className="entry-form"
      aria-label="Record activity"
      onSubmit={(event) => {
        event.preventDefault();
        const start = parseTimeOfDay(startTime);
        const end = parseTimeOfDay(endTime);
        if (!start || !end) {
          onInvalidTime();
          return;
        }
        if (onSubmit({ name, start, end })) setName('');
      }}
    >
      <h2>Record an activity by time range</h2>
      {!!error && <p className="form-error">{error}</p>}
      {!!notice && <p className="form-notice">{notice}</p>}
      <label>
        Activity
        <input
          autoFocus
          type="text"
          maxLength={120}
          value={name}
          onChange={(event) => setName(event.target.value)}
          placeholder="e.g. lunch, work, sleep"
        />
      </label>
      <div className="time-row">
        <label>
          Start
          <input type="time" step={TIME_STEP_SECONDS} value={startTime} onChange={(event) => setStartTime(event.target.value)} />
        </label>
        <label>
          End
          <input type="time" step={TIME_STEP_SECONDS} value={endTime} onChange={(event) => setEndTime(event.target.value)} />
        </label>
      </div>
      <button type="submit" className="primary">
        Add activity
      </button>
    </form>
  );
}
