import { DateTime } from 'luxon';
import cron from 'node-cron';
import { ValidationError } from '../errors';

/**
 * Five-field cron evaluator: minute hour day-of-month month day-of-week.
 *
 * Supports `*`, lists, ranges, steps and three-letter month/day names.
 * When both day fields are restricted a time matches if either does.
 * All evaluation happens in UTC.
 */

interface FieldSpec {
  name: string;
  min: number;
  max: number;
  names?: Record<string, number>;
}

const MONTH_NAMES: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const DAY_NAMES: Record<string, number> = {
  sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6,
};

const FIELDS: readonly FieldSpec[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day-of-month', min: 1, max: 31 },
  { name: 'month', min: 1, max: 12, names: MONTH_NAMES },
  // 7 is accepted as Sunday and folded onto 0
  { name: 'day-of-week', min: 0, max: 7, names: DAY_NAMES },
];

// Five years covers every leap-day schedule
const SEARCH_LIMIT_YEARS = 5;

export interface CronSchedule {
  expression: string;
  minutes: ReadonlySet<number>;
  hours: ReadonlySet<number>;
  daysOfMonth: ReadonlySet<number>;
  months: ReadonlySet<number>;
  daysOfWeek: ReadonlySet<number>;
  dayOfMonthRestricted: boolean;
  dayOfWeekRestricted: boolean;
}

function invalid(expression: string, reason: string): ValidationError {
  return new ValidationError(`Invalid cron expression "${expression}": ${reason}`, {
    cronExpression: expression,
  });
}

function parseValue(raw: string, def: FieldSpec, expression: string): number {
  const lowered = raw.toLowerCase();
  if (def.names && lowered in def.names) {
    return def.names[lowered];
  }
  if (!/^\d+$/.test(raw)) {
    throw invalid(expression, `bad ${def.name} value "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < def.min || value > def.max) {
    throw invalid(expression, `${def.name} value ${value} outside ${def.min}-${def.max}`);
  }
  return value;
}

function parseField(field: string, def: FieldSpec, expression: string): Set<number> {
  const values = new Set<number>();

  for (const part of field.split(',')) {
    const [rangePart, stepPart, ...rest] = part.split('/');
    if (rest.length > 0 || rangePart === '') {
      throw invalid(expression, `bad ${def.name} field "${field}"`);
    }

    let step = 1;
    if (stepPart !== undefined) {
      if (!/^\d+$/.test(stepPart) || parseInt(stepPart, 10) === 0) {
        throw invalid(expression, `bad ${def.name} step "${stepPart}"`);
      }
      step = parseInt(stepPart, 10);
    }

    let start: number;
    let end: number;
    if (rangePart === '*') {
      start = def.min;
      end = def.max;
    } else if (rangePart.includes('-')) {
      const bounds = rangePart.split('-');
      if (bounds.length !== 2) {
        throw invalid(expression, `bad ${def.name} range "${rangePart}"`);
      }
      start = parseValue(bounds[0], def, expression);
      end = parseValue(bounds[1], def, expression);
      if (start > end) {
        throw invalid(expression, `reversed ${def.name} range "${rangePart}"`);
      }
    } else {
      start = parseValue(rangePart, def, expression);
      // "5/15" means every 15 starting at 5
      end = stepPart !== undefined ? def.max : start;
    }

    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }

  return values;
}

export function parseCronExpression(expression: string): CronSchedule {
  const trimmed = expression.trim();
  const fields = trimmed.split(/\s+/);
  if (fields.length !== 5) {
    throw invalid(expression, `expected 5 fields, got ${fields.length}`);
  }
  if (!cron.validate(trimmed)) {
    throw invalid(expression, 'rejected by cron syntax check');
  }

  const [minutes, hours, daysOfMonth, months, rawDaysOfWeek] = fields.map((field, i) =>
    parseField(field, FIELDS[i], expression)
  );

  const daysOfWeek = new Set<number>();
  for (const day of rawDaysOfWeek) {
    daysOfWeek.add(day % 7);
  }

  return {
    expression: trimmed,
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek,
    dayOfMonthRestricted: !fields[2].startsWith('*'),
    dayOfWeekRestricted: !fields[4].startsWith('*'),
  };
}

export function isValidCronExpression(expression: string): boolean {
  try {
    parseCronExpression(expression);
    return true;
  } catch {
    return false;
  }
}

function dayMatches(schedule: CronSchedule, time: DateTime): boolean {
  const domMatch = schedule.daysOfMonth.has(time.day);
  // luxon weekdays run 1 (Monday) to 7 (Sunday)
  const dowMatch = schedule.daysOfWeek.has(time.weekday % 7);

  // Both fields written without a leading "*": either day may match
  if (schedule.dayOfMonthRestricted && schedule.dayOfWeekRestricted) {
    return domMatch || dowMatch;
  }
  return domMatch && dowMatch;
}

/**
 * First matching minute strictly after `after`.
 */
export function nextCronOccurrence(schedule: CronSchedule | string, after: Date): Date {
  const parsed = typeof schedule === 'string' ? parseCronExpression(schedule) : schedule;

  let time = DateTime.fromJSDate(after, { zone: 'utc' }).startOf('minute').plus({ minutes: 1 });
  const limit = time.plus({ years: SEARCH_LIMIT_YEARS });

  while (time <= limit) {
    if (!parsed.months.has(time.month)) {
      time = time.startOf('month').plus({ months: 1 });
      continue;
    }
    if (!dayMatches(parsed, time)) {
      time = time.startOf('day').plus({ days: 1 });
      continue;
    }
    if (!parsed.hours.has(time.hour)) {
      time = time.startOf('hour').plus({ hours: 1 });
      continue;
    }
    if (!parsed.minutes.has(time.minute)) {
      time = time.plus({ minutes: 1 });
      continue;
    }
    return time.toJSDate();
  }

  throw invalid(parsed.expression, `no occurrence within ${SEARCH_LIMIT_YEARS} years`);
}
