import { describe, it, expect } from 'vitest';
import { formatCurrentTime } from '../time';
import { InvalidTimeZoneError } from '../../lib/errors';

describe('formatCurrentTime', () => {
  const instant = new Date('2026-01-05T15:04:00Z');

  it('should format the time in UTC', () => {
    expect(formatCurrentTime('UTC', instant)).toBe('Monday, January 05, 2026, at 03:04 PM UTC');
  });

  it('should convert to the requested time zone', () => {
    expect(formatCurrentTime('America/Chicago', instant)).toBe('Monday, January 05, 2026, at 09:04 AM CST');
  });

  it('should use daylight saving abbreviations in summer', () => {
    const summer = new Date('2026-07-01T17:30:00Z');
    expect(formatCurrentTime('America/Chicago', summer)).toBe('Wednesday, July 01, 2026, at 12:30 PM CDT');
  });

  it('should show an offset for zones without a US abbreviation', () => {
    const summer = new Date('2026-07-06T10:30:00Z');
    expect(formatCurrentTime('Europe/Berlin', summer)).toBe('Monday, July 06, 2026, at 12:30 PM GMT+2');
  });

  it('should default to America/Chicago', () => {
    expect(formatCurrentTime(undefined, instant)).toBe('Monday, January 05, 2026, at 09:04 AM CST');
  });

  it('should reject unknown time zones', () => {
    expect(() => formatCurrentTime('Mars/Olympus_Mons', instant)).toThrow(InvalidTimeZoneError);
    expect(() => formatCurrentTime('Mars/Olympus_Mons', instant)).toThrow('Unknown time zone "Mars/Olympus_Mons"');
  });
});
