import cron from "node-cron";
import type { Schedule } from "@cadence/types";
import { ValidationError } from "../errors.js";

const MONTH_NAMES = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const DAY_NAMES = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];
// Consecutive leap days can be eight years apart (2096 to 2104).
const SEARCH_HORIZON_YEARS = 8;

interface CronFields {
  seconds: Set<number>;
  minutes: Set<number>;
  hours: Set<number>;
  days: Set<number>;
  months: Set<number>;
  weekdays: Set<number>;
}

function resolveToken(token: string, names: readonly string[], offset: number): number {
  const index = names.indexOf(token.toLowerCase().slice(0, 3));
  if (index >= 0) return index + offset;
  const value = Number(token);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`Invalid cron token "${token}"`);
  }
  return value;
}

function expandField(field: string, min: number, max: number, names: readonly string[] = [], offset = 0): Set<number> {
  const values = new Set<number>();
  for (const part of field.split(",")) {
    const [range = "*", stepText] = part.split("/");
    const step = stepText === undefined ? 1 : Number(stepText);
    if (!Number.isInteger(step) || step < 1) {
      throw new ValidationError(`Invalid cron step in "${part}"`);
    }

    let start = min;
    let end = max;
    if (range !== "*") {
      const [low, high] = range.split("-");
      start = resolveToken(low ?? "", names, offset);
      end = high === undefined ? (stepText === undefined ? start : max) : resolveToken(high, names, offset);
    }
    if (start < min || end > max || start > end) {
      throw new ValidationError(`Cron field "${part}" is out of range ${min}-${max}`);
    }
    for (let value = start; value <= end; value += step) {
      values.add(value);
    }
  }
  return values;
}

function compileCron(expression: string): CronFields {
  if (!cron.validate(expression)) {
    throw new ValidationError(`Invalid cron expression: ${expression}`, { expression });
  }
  const parts = expression.trim().split(/\s+/);
  const [second, minute, hour, day, month, weekday] = parts.length === 6 ? parts : ["0", ...parts];

  const weekdays = expandField(weekday ?? "*", 0, 7, DAY_NAMES);
  if (weekdays.has(7)) weekdays.add(0);

  return {
    seconds: expandField(second ?? "0", 0, 59),
    minutes: expandField(minute ?? "*", 0, 59),
    hours: expandField(hour ?? "*", 0, 23),
    days: expandField(day ?? "*", 1, 31),
    months: expandField(month ?? "*", 1, 12, MONTH_NAMES, 1),
    weekdays
  };
}

/**
 * First instant strictly after `from` (epoch ms, local time) that matches the
 * expression. Day-of-month and day-of-week must both match, as node-cron does.
 */
export function nextCronOccurrence(expression: string, from: number): number {
  const fields = compileCron(expression);
  const candidate = new Date(from);
  candidate.setMilliseconds(0);
  candidate.setSeconds(candidate.getSeconds() + 1);
  const horizon = new Date(from);
  horizon.setFullYear(horizon.getFullYear() + SEARCH_HORIZON_YEARS);
  const limit = horizon.getTime();

  while (candidate.getTime() <= limit) {
    if (!fields.months.has(candidate.getMonth() + 1)) {
      candidate.setMonth(candidate.getMonth() + 1, 1);
      candidate.setHours(0, 0, 0);
      continue;
    }
    if (!fields.days.has(candidate.getDate()) || !fields.weekdays.has(candidate.getDay())) {
      candidate.setDate(candidate.getDate() + 1);
      candidate.setHours(0, 0, 0);
      continue;
    }
    if (!fields.hours.has(candidate.getHours())) {
      candidate.setHours(candidate.getHours() + 1, 0, 0);
      continue;
    }
    if (!fields.minutes.has(candidate.getMinutes())) {
      candidate.setMinutes(candidate.getMinutes() + 1, 0);
      continue;
    }
    if (!fields.seconds.has(candidate.getSeconds())) {
      candidate.setSeconds(candidate.getSeconds() + 1);
      continue;
    }
    return candidate.getTime();
  }

  throw new ValidationError(`Cron expression never fires within ${SEARCH_HORIZON_YEARS} years: ${expression}`, {
    expression
  });
}

export function validateSchedule(schedule: Schedule, now: number): void {
  if (schedule.kind === "interval") {
    if (!Number.isFinite(schedule.intervalSeconds) || schedule.intervalSeconds <= 0) {
      throw new ValidationError("Interval schedules need intervalSeconds > 0", {
        intervalSeconds: schedule.intervalSeconds
      });
    }
    return;
  }
  nextCronOccurrence(schedule.expression, now);
}

/** Inactive cron schedules are kept on the agent but never fire. */
export function isSchedulable(schedule: Schedule | undefined): schedule is Schedule {
  if (!schedule) return false;
  return schedule.kind === "interval" || schedule.active;
}

export function nextDueAt(schedule: Schedule, from: number): number {
  if (schedule.kind === "interval") {
    return from + schedule.intervalSeconds * 1000;
  }
  return nextCronOccurrence(schedule.expression, from);
}

export function describeSchedule(schedule: Schedule): string {
  return schedule.kind === "interval" ? `every ${schedule.intervalSeconds}s` : `cron "${schedule.expression}"`;
}
