import { describe, it, expect } from 'vitest';
import { CronSyntaxError, cronMatches, isValidTimezone, parseCron } from '../../src/domain/index.js';

const at = (iso: string): number => Date.parse(iso) / 1000;

describe('parseCron', () => {
  it('expands steps, ranges and lists', () => {
    expect([...parseCron('*/15 * * * *').minutes]).toEqual([0, 15, 30, 45]);
    expect([...parseCron('5/20 * * * *').minutes]).toEqual([5, 25, 45]);
    expect([...parseCron('0 9-17/4 * * *').hours]).toEqual([9, 13, 17]);
    expect([...parseCron('0 0 1,15 * *').daysOfMonth]).toEqual([1, 15]);
  });

  it('treats 7 as Sunday', () => {
    expect([...parseCron('0 0 * * 7').daysOfWeek]).toEqual([0]);
  });

  it('rejects malformed expressions', () => {
    expect(() => parseCron('* * * *')).toThrow('expected 5 fields, got 4');
    expect(() => parseCron('60 * * * *')).toThrow('minute 60 outside 0-59');
    expect(() => parseCron('0 5-1 * * *')).toThrow('hour range 5-1 is reversed');
    expect(() => parseCron('*/0 * * * *')).toThrow(CronSyntaxError);
    expect(() => parseCron('0 0 * JAN *')).toThrow('month "JAN" is not a number');
  });
});

describe('cronMatches', () => {
  // 2026-01-05 is a Monday
  const mondayMorning = parseCron('30 9 * * 1');

  it('matches the selected minute only', () => {
    expect(cronMatches(mondayMorning, at('2026-01-05T09:30:00Z'))).toBe(true);
    expect(cronMatches(mondayMorning, at('2026-01-05T09:30:59Z'))).toBe(true);
    expect(cronMatches(mondayMorning, at('2026-01-05T09:31:00Z'))).toBe(false);
    expect(cronMatches(mondayMorning, at('2026-01-06T09:30:00Z'))).toBe(false);
  });

  it('matches either day field when both are restricted', () => {
    const schedule = parseCron('0 0 1 * 1');
    expect(cronMatches(schedule, at('2026-01-05T00:00:00Z'))).toBe(true);
    expect(cronMatches(schedule, at('2026-01-01T00:00:00Z'))).toBe(true);
    expect(cronMatches(schedule, at('2026-01-02T00:00:00Z'))).toBe(false);
  });

  it('evaluates in the given timezone', () => {
    const nineAm = parseCron('0 9 * * *');
    expect(cronMatches(nineAm, at('2026-01-05T14:00:00Z'), 'America/New_York')).toBe(true);
    expect(cronMatches(nineAm, at('2026-01-05T14:00:00Z'))).toBe(false);
  });
});

describe('isValidTimezone', () => {
  it('accepts IANA names only', () => {
    expect(isValidTimezone('Europe/Berlin')).toBe(true);
    expect(isValidTimezone('Not/A_Zone')).toBe(false);
  });
});
