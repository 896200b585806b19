export type TimeOfDay = {
  hour: number;
  minute: number;
};

export type Entry = {
  readonly id: string;
  readonly name: string;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
  readonly durationMinutes: number;
};

export type SummaryBucket = {
  label: string;
  minutes: number;
};

export type DaySummary = {
  buckets: SummaryBucket[];
  recordedMinutes: number;
  /** Recorded time passed a full day; `buckets` then carry no unplanned remainder. */
  overflow: boolean;
};

export type LedgerErrorKind = 'EmptyName' | 'InvalidTime' | 'InvalidInterval' | 'DurationExceeded';

export type LedgerLogger = Pick<Console, 'info' | 'warn'>;
