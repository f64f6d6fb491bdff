import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import tz from 'dayjs/plugin/timezone';

dayjs.extend(utc);
dayjs.extend(tz);

export const DEFAULT_TIMEZONE = 'Africa/Nairobi';

/** Calendar date (YYYY-MM-DD) of `at` in the given IANA zone. */
export function localDate(timezone: string, at: Date = new Date()): string {
  return dayjs(at).tz(timezone).format('YYYY-MM-DD');
}

/** Formats `at` in the given zone with a dayjs pattern (e.g. YYYYMM). */
export function formatInZone(at: Date, timezone: string, pattern: string): string {
  return dayjs(at).tz(timezone).format(pattern);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function isDateOnly(value: string): boolean {
  return DATE_ONLY.test(value) && dayjs(value).format('YYYY-MM-DD') === value;
}

/**
 * Quiet hours window check. `start`/`end` are HH:mm in the recipient's zone;
 * a window whose end precedes its start runs across midnight.
 * @returns the instant the window ends when `at` falls inside it, otherwise null.
 */
export function quietHoursEnd(at: Date, timezone: string, start: string, end: string): Date | null {
  const local = dayjs(at).tz(timezone);
  const startMinutes = toMinutes(start);
  const endMinutes = toMinutes(end);
  if (startMinutes === endMinutes) return null;

  const nowMinutes = local.hour() * 60 + local.minute();
  const crossesMidnight = endMinutes < startMinutes;
  const inside = crossesMidnight
    ? nowMinutes >= startMinutes || nowMinutes < endMinutes
    : nowMinutes >= startMinutes && nowMinutes < endMinutes;
  if (!inside) return null;

  const [endHour, endMinute] = [Math.floor(endMinutes / 60), endMinutes % 60];
  let windowEnd = local.hour(endHour).minute(endMinute).second(0).millisecond(0);
  // Past midnight-crossing start: the window closes tomorrow
  if (crossesMidnight && nowMinutes >= startMinutes) {
    windowEnd = windowEnd.add(1, 'day');
  }
  return windowEnd.toDate();
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY.test(value);
}

function toMinutes(value: string): number {
  const match = TIME_OF_DAY.exec(value);
  if (!match) {
    throw new Error(`InvalidTimeOfDay: ${value}`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}
