import type { TimeOfDay } from './types';

export const MINUTES_PER_DAY = 24 * 60;
export const MINUTES_PER_HOUR = 60;

export function isValidTimeOfDay(time: TimeOfDay): boolean {
  return (
    Number.isInteger(time.hour) &&
    Number.isInteger(time.minute) &&
    time.hour >= 0 &&
    time.hour < 24 &&
    time.minute >= 0 &&
    time.minute < MINUTES_PER_HOUR
  );
}

export function toMinuteOfDay(time: TimeOfDay): number {
  return time.hour * MINUTES_PER_HOUR + time.minute;
}

export function fromMinuteOfDay(minute: number): TimeOfDay {
  const safe = ((minute % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return { hour: Math.floor(safe / MINUTES_PER_HOUR), minute: safe % MINUTES_PER_HOUR };
}

export function parseTimeOfDay(text: string): TimeOfDay | undefined {
  const match = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return undefined;
  const [, h, m] = match;
  const time = { hour: Number(h), minute: Number(m) };
  return isValidTimeOfDay(time) ? time : undefined;
}

/**
 * Minutes between two times of day. An end earlier than the start is read as
 * crossing midnight; equal times give 0.
 */
export function intervalDuration(start: TimeOfDay, end: TimeOfDay): number {
  const startMinute = toMinuteOfDay(start);
  const endMinute = toMinuteOfDay(end);
  if (startMinute === endMinute) return 0;
  if (startMinute > endMinute) return MINUTES_PER_DAY - startMinute + endMinute;
  return endMinute - startMinute;
}

export function minuteToTimeLabel(minute: number): string {
  const { hour, minute: rest } = fromMinuteOfDay(minute);
  return `${String(hour).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return minuteToTimeLabel(toMinuteOfDay(time));
}

export function formatRange(start: TimeOfDay, end: TimeOfDay): string {
  return `${formatTimeOfDay(start)} - ${formatTimeOfDay(end)}`;
}

export function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / MINUTES_PER_HOUR);
  const rest = minutes % MINUTES_PER_HOUR;
  if (hours === 0) return `${rest}m`;
  if (rest === 0) return `${hours}h`;
  return `${hours}h ${rest}m`;
}
