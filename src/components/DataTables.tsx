import { formatShare } from '../lib/chart';
import { summaryTotal } from '../lib/summary';
import { formatMinutes, formatTimeOfDay } from '../lib/time';
import type { DaySummary, Entry } from '../lib/types';

export function EntryTable({ entries }: { entries: readonly Entry[] }): JSX.Element {
  return (
    <table className="data-table entry-table">
      <caption>Recorded activities</caption>
      <thead>
        <tr>
          <th>Activity</th>
          <th>Start</th>
          <th>End</th>
          <th>Duration (min)</th>
        </tr>
      </thead>
      <tbody>
        {entries.map((entry) => (
          <tr key={entry.id}>
            <td>{entry.name}</td>
            <td>{formatTimeOfDay(entry.start)}</td>
            <td>{formatTimeOfDay(entry.end)}</td>
            <td>{entry.durationMinutes}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export function SummaryTable({ summary }: { summary: DaySummary }): JSX.Element {
  const total = summaryTotal(summary);
  return (
    <table className="data-table summary-table">
      <caption>{summary.overflow ? 'Recorded totals' : '24-hour totals'}</caption>
      <thead>
        <tr>
          <th>Activity</th>
          <th>Duration (min)</th>
          <th>Time</th>
          <th>Share</th>
        </tr>
      </thead>
      <tbody>
        {summary.buckets.map((bucket, index) => (
          <tr key={`${index}-${bucket.label}`}>
            <td>{bucket.label}</td>
            <td>{bucket.minutes}</td>
            <td>{formatMinutes(bucket.minutes)}</td>
            <td>{formatShare(bucket.minutes / total)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
