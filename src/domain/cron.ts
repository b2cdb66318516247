/**
 * Five-field cron schedules: `minute hour day-of-month month day-of-week`.
 *
 * Each field accepts `*`, numbers, ranges `a-b`, steps `*\/n` / `a-b/n` /
 * `a/n`, and comma lists. Day of week runs 0-6 with 7 as an alias for
 * Sunday. When both day fields are restricted a time matches if either
 * one does.
 */

export interface CronSchedule {
  readonly expression: string;
  readonly minutes: ReadonlySet<number>;
  readonly hours: ReadonlySet<number>;
  readonly daysOfMonth: ReadonlySet<number>;
  readonly months: ReadonlySet<number>;
  readonly daysOfWeek: ReadonlySet<number>;
  readonly domRestricted: boolean;
  readonly dowRestricted: boolean;
}

export class CronSyntaxError extends Error {
  constructor(expression: string, reason: string) {
    super(`Invalid cron expression "${expression}": ${reason}`);
    this.name = 'CronSyntaxError';
  }
}

interface FieldBounds {
  readonly name: string;
  readonly min: number;
  readonly max: number;
}

const FIELDS: readonly FieldBounds[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day of month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12 },
  { name: 'day of week', min: 0, max: 7 },
];

function parseNumber(text: string, bounds: FieldBounds, expression: string): number {
  if (!/^\d+$/.test(text)) throw new CronSyntaxError(expression, `${bounds.name} "${text}" is not a number`);
  const n = Number(text);
  if (n < bounds.min || n > bounds.max) {
    throw new CronSyntaxError(expression, `${bounds.name} ${n} outside ${bounds.min}-${bounds.max}`);
  }
  return n;
}

function parseField(text: string, bounds: FieldBounds, expression: string): Set<number> {
  const values = new Set<number>();

  for (const item of text.split(',')) {
    const [rangePart = '', stepPart] = item.split('/');
    let step = 1;
    if (stepPart !== undefined) {
      if (!/^\d+$/.test(stepPart) || Number(stepPart) === 0) {
        throw new CronSyntaxError(expression, `invalid step "${stepPart}" in ${bounds.name}`);
      }
      step = Number(stepPart);
    }

    let start: number;
    let end: number;
    if (rangePart === '*') {
      start = bounds.min;
      end = bounds.max;
    } else if (rangePart.includes('-')) {
      const [from = '', to = ''] = rangePart.split('-');
      start = parseNumber(from, bounds, expression);
      end = parseNumber(to, bounds, expression);
      if (start > end) throw new CronSyntaxError(expression, `${bounds.name} range ${start}-${end} is reversed`);
    } else {
      start = parseNumber(rangePart, bounds, expression);
      end = stepPart === undefined ? start : bounds.max;
    }

    for (let n = start; n <= end; n += step) values.add(n);
  }

  return values;
}

export function parseCron(expression: string): CronSchedule {
  const parts = expression.trim().split(/\s+/);
  if (parts.length !== 5) {
    throw new CronSyntaxError(expression, `expected 5 fields, got ${parts.length}`);
  }

  const [minute, hour, dom, month, dow] = parts.map((part, i) => {
    const bounds = FIELDS[i];
    if (bounds === undefined) throw new CronSyntaxError(expression, 'too many fields');
    return parseField(part, bounds, expression);
  });
  if (minute === undefined || hour === undefined || dom === undefined || month === undefined || dow === undefined) {
    throw new CronSyntaxError(expression, 'missing field');
  }

  if (dow.delete(7)) dow.add(0);

  return {
    expression,
    minutes: minute,
    hours: hour,
    daysOfMonth: dom,
    months: month,
    daysOfWeek: dow,
    domRestricted: parts[2] !== '*',
    dowRestricted: parts[4] !== '*',
  };
}

const WEEKDAYS: Readonly<Record<string, number>> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      minute: 'numeric',
      hour: 'numeric',
      day: 'numeric',
      month: 'numeric',
      weekday: 'short',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

interface WallClock {
  minute: number;
  hour: number;
  day: number;
  month: number;
  weekday: number;
}

function wallClock(unixSeconds: number, timezone: string): WallClock {
  const clock: WallClock = { minute: 0, hour: 0, day: 1, month: 1, weekday: 0 };
  for (const part of formatterFor(timezone).formatToParts(new Date(unixSeconds * 1000))) {
    switch (part.type) {
      case 'minute': clock.minute = Number(part.value); break;
      case 'hour': clock.hour = Number(part.value) % 24; break;
      case 'day': clock.day = Number(part.value); break;
      case 'month': clock.month = Number(part.value); break;
      case 'weekday': clock.weekday = WEEKDAYS[part.value] ?? 0; break;
      default: break;
    }
  }
  return clock;
}

/** True when the minute containing `unixSeconds` is selected by the schedule in `timezone`. */
export function cronMatches(schedule: CronSchedule, unixSeconds: number, timezone = 'UTC'): boolean {
  const t = wallClock(unixSeconds, timezone);
  if (!schedule.minutes.has(t.minute) || !schedule.hours.has(t.hour) || !schedule.months.has(t.month)) {
    return false;
  }

  const domMatch = schedule.daysOfMonth.has(t.day);
  const dowMatch = schedule.daysOfWeek.has(t.weekday);
  if (schedule.domRestricted && schedule.dowRestricted) return domMatch || dowMatch;
  return domMatch && dowMatch;
}
