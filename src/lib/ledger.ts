import { summarizeEntries } from './summary';
import { MINUTES_PER_DAY, formatTimeOfDay, intervalDuration, isValidTimeOfDay, toMinuteOfDay } from './time';
import type { DaySummary, Entry, LedgerErrorKind, LedgerLogger, TimeOfDay } from './types';

const ERROR_MESSAGES: Record<LedgerErrorKind, string> = {
  EmptyName: 'Please enter an activity name.',
  InvalidTime: 'Start and end must be valid times between 00:00 and 23:59.',
  InvalidInterval: 'Start and end time are identical or otherwise invalid. Set an end time after the start time.',
  DurationExceeded: `The activity lasts longer than 24 hours (${MINUTES_PER_DAY} minutes).`
};

export function ledgerErrorMessage(kind: LedgerErrorKind): string {
  return ERROR_MESSAGES[kind];
}

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind) {
    super(ledgerErrorMessage(kind));
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

type LedgerOptions = {
  logger?: LedgerLogger;
};

/** Session-scoped list of recorded activities. Append and full clear only. */
export class ScheduleLedger {
  private items: Entry[] = [];
  // Not reset by clearAll, so ids stay unique for the whole session.
  private sequence = 0;
  private readonly logger: LedgerLogger;

  constructor(options: LedgerOptions = {}) {
    this.logger = options.logger ?? console;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  entries(): readonly Entry[] {
    return [...this.items];
  }

  addEntry(name: string, start: TimeOfDay, end: TimeOfDay): Entry {
    const label = name.trim();
    if (!label) this.reject('EmptyName', { name, start, end });
    if (!isValidTimeOfDay(start) || !isValidTimeOfDay(end)) this.reject('InvalidTime', { name, start, end });
    if (toMinuteOfDay(start) === toMinuteOfDay(end)) this.reject('InvalidInterval', { name, start, end });

    const durationMinutes = intervalDuration(start, end);
    // Unreachable through the wrap formula (max 1439); kept as an upper bound.
    if (durationMinutes > MINUTES_PER_DAY) this.reject('DurationExceeded', { name, start, end });

    const entry: Entry = Object.freeze({
      id: `entry-${++this.sequence}`,
      name: label,
      start: Object.freeze({ hour: start.hour, minute: start.minute }),
      end: Object.freeze({ hour: end.hour, minute: end.minute }),
      durationMinutes
    });
    this.items.push(entry);
    this.logger.info('[ledger] entry added', {
      name: entry.name,
      start: formatTimeOfDay(entry.start),
      end: formatTimeOfDay(entry.end),
      durationMinutes
    });
    return entry;
  }

  clearAll(): void {
    if (this.items.length > 0) this.logger.info('[ledger] cleared', { removed: this.items.length });
    this.items = [];
  }

  summarize(): DaySummary {
    return summarizeEntries(this.items);
  }

  private reject(kind: LedgerErrorKind, input: { name: string; start: TimeOfDay; end: TimeOfDay }): never {
    this.logger.warn('[ledger] entry rejected', { kind, ...input });
    throw new LedgerError(kind);
  }
}
