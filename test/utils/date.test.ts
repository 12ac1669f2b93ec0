import { describe, it, expect } from 'vitest';
import { formatKickoff, parseKickoff, zonedTimeToUtc } from '../../src/utils/date.js';

describe('parseKickoff', () => {
  it('should read summer kickoffs as UTC+2', () => {
    expect(parseKickoff('18.10.26 15:30')).toEqual(new Date('2026-10-18T13:30:00Z'));
  });

  it('should read winter kickoffs as UTC+1', () => {
    expect(parseKickoff('01.02.27 09:05')).toEqual(new Date('2027-02-01T08:05:00Z'));
  });

  it('should accept single-digit parts, four-digit years and surrounding whitespace', () => {
    expect(parseKickoff('  1.2.2027 9:05 ')).toEqual(new Date('2027-02-01T08:05:00Z'));
  });

  it('should return null for anything else', () => {
    expect(parseKickoff('')).toBeNull();
    expect(parseKickoff(null)).toBeNull();
    expect(parseKickoff('Sa. 18.10.')).toBeNull();
    expect(parseKickoff('32.10.26 15:30')).toBeNull();
    expect(parseKickoff('18.13.26 15:30')).toBeNull();
    expect(parseKickoff('18.10.26 24:00')).toBeNull();
  });
});

describe('zonedTimeToUtc', () => {
  it('should handle the day clocks go back', () => {
    // 25 Oct 2026, 12:00 is already winter time
    expect(zonedTimeToUtc({ year: 2026, month: 10, day: 25, hour: 12, minute: 0 })).toEqual(
      new Date('2026-10-25T11:00:00Z'),
    );
  });

  it('should honour another timezone', () => {
    expect(zonedTimeToUtc({ year: 2026, month: 7, day: 1, hour: 12, minute: 0 }, 'UTC')).toEqual(
      new Date('2026-07-01T12:00:00Z'),
    );
  });
});

describe('formatKickoff', () => {
  it('should render site local time', () => {
    expect(formatKickoff(new Date('2026-10-18T13:30:00Z'))).toBe('18.10.26 15:30');
    expect(formatKickoff(new Date('2027-01-15T17:00:00Z'))).toBe('15.01.27 18:00');
  });

  it('should round-trip with parseKickoff', () => {
    const kickoff = parseKickoff('03.04.27 20:45');
    expect(kickoff).not.toBeNull();
    if (kickoff) expect(formatKickoff(kickoff)).toBe('03.04.27 20:45');
  });
});
