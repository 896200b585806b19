import { useMemo, useState } from 'react';
import { EntryTable, SummaryTable } from './components/DataTables';
import { EntryForm } from './components/EntryForm';
import { SummaryChart } from './components/SummaryChart';
import { overflowWarning } from './lib/chart';
import { ScheduleLedger, isLedgerError, ledgerErrorMessage } from './lib/ledger';
import type { TimeOfDay } from './lib/types';

type FormStatus = { error: string; notice: string };

export default function App(): JSX.Element {
  const [ledger] = useState(() => new ScheduleLedger());

  // The ledger mutates in place; bump a revision so derived views recompute.
  const [revision, setRevision] = useState(0);
  const [status, setStatus] = useState<FormStatus>({ error: '', notice: '' });

  const entries = useMemo(() => ledger.entries(), [ledger, revision]);
  const summary = useMemo(() => ledger.summarize(), [ledger, revision]);
  const warning = overflowWarning(summary);

  function addEntry(payload: { name: string; start: TimeOfDay; end: TimeOfDay }): boolean {
    try {
      const entry = ledger.addEntry(payload.name, payload.start, payload.end);
      setRevision((value) => value + 1);
      setStatus({ error: '', notice: `Added "${entry.name}" (${entry.durationMinutes} min).` });
      return true;
    } catch (error) {
      if (!isLedgerError(error)) throw error;
      setStatus({ error: error.message, notice: '' });
      return false;
    }
  }

  function clearAll(): void {
    ledger.clearAll();
    setRevision((value) => value + 1);
    setStatus({ error: '', notice: '' });
  }

  return (
    <main className="app">
      <aside className="sidebar">
        <EntryForm
          error={status.error}
          notice={status.notice}
          onSubmit={addEntry}
          onInvalidTime={() => setStatus({ error: ledgerErrorMessage('InvalidTime'), notice: '' })}
        />
        <hr />
        <button type="button" className="danger" title="Remove every recorded activity." onClick={clearAll}>
          Clear all data
        </button>
      </aside>
      <section className="content">
        <h1>24-hour day ledger</h1>
        <h2>Current breakdown (24 hours)</h2>
        {entries.length === 0 ? (
          <p className="info">Record an activity in the sidebar to build the 24-hour chart.</p>
        ) : (
          <>
            {warning && <p className="error">{warning}</p>}
            <SummaryChart summary={summary} />
            <h2>Details</h2>
            <EntryTable entries={entries} />
            <SummaryTable summary={summary} />
          </>
        )}
      </section>
    </main>
  );
}
