import { DEFAULT_TIME_ZONE } from '../config/constants';
import { InvalidTimeZoneError } from '../lib/errors';

/**
 * Formats an instant in the given IANA time zone
 *
 * Output shape: `Weekday, Month DD, YYYY, at hh:mm AM|PM TZ`, where `TZ` is
 * the runtime's short `en-US` zone name: an abbreviation for US zones and UTC
 * (`CST`, `UTC`), an offset elsewhere (`GMT+2` for Europe/Berlin in summer).
 *
 * @throws {InvalidTimeZoneError} If the time zone is not known to the runtime
 * @example
 * ```typescript
 * formatCurrentTime('UTC', new Date('2026-01-05T15:04:00Z'));
 * // 'Monday, January 05, 2026, at 03:04 PM UTC'
 * ```
 */
export function formatCurrentTime(timeZone: string = DEFAULT_TIME_ZONE, now: Date = new Date()): string {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'long',
      month: 'long',
      day: '2-digit',
      year: 'numeric',
      hour: '2-digit',
      minute: '2-digit',
      hour12: true,
      timeZoneName: 'short'
    });
  } catch (error) {
    if (error instanceof RangeError) throw new InvalidTimeZoneError(timeZone);
    throw error;
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(now)) {
    parts[part.type] = part.value;
  }

  return `${parts.weekday}, ${parts.month} ${parts.day}, ${parts.year}, at ${parts.hour}:${parts.minute} ${parts.dayPeriod} ${parts.timeZoneName}`;
}
