import { MINUTES_PER_DAY } from './time';
import type { DaySummary, Entry, SummaryBucket } from './types';

export const UNPLANNED_LABEL = 'unplanned';

/**
 * Per-name totals reconciled against a 1440-minute day. Remaining minutes go to
 * an `unplanned` bucket; once the recorded total passes a full day no bucket is
 * added and the summary reports overflow instead.
 */
export function summarizeEntries(entries: readonly Entry[]): DaySummary {
  if (entries.length === 0) {
    return {
      overflow: false,
      buckets: [{ label: UNPLANNED_LABEL, minutes: MINUTES_PER_DAY }],
      recordedMinutes: 0
    };
  }

  const totals = new Map<string, number>();
  let recordedMinutes = 0;
  for (const entry of entries) {
    totals.set(entry.name, (totals.get(entry.name) ?? 0) + entry.durationMinutes);
    recordedMinutes += entry.durationMinutes;
  }
  const buckets: SummaryBucket[] = [...totals].map(([label, minutes]) => ({ label, minutes }));

  const overflow = recordedMinutes > MINUTES_PER_DAY;
  if (recordedMinutes < MINUTES_PER_DAY) {
    buckets.push({ label: UNPLANNED_LABEL, minutes: MINUTES_PER_DAY - recordedMinutes });
  }
  return { overflow, buckets, recordedMinutes };
}

export function summaryTotal(summary: DaySummary): number {
  return summary.buckets.reduce((sum, bucket) => sum + bucket.minutes, 0);
}
