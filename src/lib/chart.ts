import { UNPLANNED_LABEL, summaryTotal } from './summary';
import { MINUTES_PER_DAY } from './time';
import type { DaySummary } from './types';

export type ChartSlice = {
  label: string;
  minutes: number;
  share: number;
  startFraction: number;
  endFraction: number;
  unplanned: boolean;
};

/** Slices run clockwise from 12 o'clock, as fractions of the whole ring. */
export function buildChartSlices(summary: DaySummary): ChartSlice[] {
  const total = summaryTotal(summary);
  if (total <= 0) return [];
  const reconciled = !summary.overflow && summary.recordedMinutes < MINUTES_PER_DAY;
  const lastIndex = summary.buckets.length - 1;
  let cursor = 0;
  return summary.buckets.map((bucket, index) => {
    const share = bucket.minutes / total;
    const slice: ChartSlice = {
      label: bucket.label,
      minutes: bucket.minutes,
      share,
      startFraction: cursor,
      endFraction: cursor + share,
      unplanned: reconciled && index === lastIndex && bucket.label === UNPLANNED_LABEL
    };
    cursor += share;
    return slice;
  });
}

export function chartTitle(summary: DaySummary): string {
  if (summary.overflow) {
    return `Recorded activity time allocation (over 24 hours: ${summary.recordedMinutes} min)`;
  }
  return '24-hour time allocation';
}

export function overflowWarning(summary: DaySummary): string | null {
  if (!summary.overflow) return null;
  return `Total recorded time exceeds 24 hours (${MINUTES_PER_DAY.toLocaleString('en-US')} min)! Currently ${summary.recordedMinutes.toLocaleString('en-US')} min.`;
}

export function formatShare(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}
