/**
 * Recurrence Expander
 *
 * Turns a recurring template into dated task instances. Works purely on
 * calendar dates; the only state is the template's lastGeneratedDate
 * high-water mark, which makes repeated generation idempotent.
 */

import type { RecurringTaskTemplate, Task } from "../models/index.js";
import {
  addDays,
  addMonthsClamped,
  dayOfWeek,
  minDate,
  startOfWeek,
  toEpochDay,
  fromEpochDay,
  WEEKDAYS,
  type IsoDate,
} from "../utils/dates.js";

// ============================================
// MAIN ENTRY
// ============================================

/**
 * Every due date after the template's high-water mark (or from its start
 * date when never generated) up to and including min(asOf, endDate).
 * Does not modify the template.
 */
export function dueDates(template: RecurringTaskTemplate, asOf: IsoDate): IsoDate[] {
  const after = template.lastGeneratedDate ?? addDays(template.startDate, -1);
  const until = template.endDate ? minDate(asOf, template.endDate) : asOf;
  if (until <= after) return [];

  const rule = template.recurrenceRule;
  const interval = Math.max(1, Math.floor(rule.interval));
  switch (rule.frequency) {
    case "daily":
      return dailyDates(template.startDate, interval, after, until);
    case "weekly":
      return weeklyDates(template.startDate, interval, rule.weekdays.map(d => WEEKDAYS.indexOf(d)), after, until);
    case "monthly":
      return monthlyDates(template.startDate, interval, after, until);
  }
}

/**
 * Materialize the tasks due up to `asOf` and advance the template's
 * lastGeneratedDate to the latest one. Leaves the template unchanged when
 * nothing is due.
 */
export function generate(template: RecurringTaskTemplate, asOf: IsoDate): Task[] {
  const dates = dueDates(template, asOf);
  const last = dates.at(-1);
  if (last !== undefined) template.lastGeneratedDate = last;
  return dates.map(date => instanceFor(template, date));
}

/** Instance ids are stable: `<templateId>_<YYYYMMDD>`. */
export function instanceId(templateId: string, date: IsoDate): string {
  return `${templateId}_${date.replaceAll("-", "")}`;
}

export function instanceFor(template: RecurringTaskTemplate, date: IsoDate): Task {
  const task: Task = {
    id: instanceId(template.id, date),
    name: template.name,
    status: "pending",
    dueDate: date,
    goals: [...template.goals],
    dependencies: [],
    sourceTemplateId: template.id,
    instanceDate: date,
    canCompleteLate: template.canCompleteLate,
  };
  if (template.estimatedCompletionTime !== undefined) task.estimatedCompletionTime = template.estimatedCompletionTime;
  if (template.logInstructions !== undefined) task.logInstructions = template.logInstructions;
  return task;
}

// ============================================
// FREQUENCY CALCULATORS
// ============================================

function dailyDates(start: IsoDate, interval: number, after: IsoDate, until: IsoDate): IsoDate[] {
  const first = toEpochDay(start);
  const last = toEpochDay(until);
  // Smallest k >= 0 with start + k*interval > after
  const k = Math.max(0, Math.floor((toEpochDay(after) - first) / interval) + 1);

  const out: IsoDate[] = [];
  for (let day = first + k * interval; day <= last; day += interval) {
    out.push(fromEpochDay(day));
  }
  return out;
}

function weeklyDates(
  start: IsoDate,
  interval: number,
  weekdays: number[],
  after: IsoDate,
  until: IsoDate,
): IsoDate[] {
  const days = new Set(weekdays.length > 0 ? weekdays : [dayOfWeek(start)]);
  const anchorWeek = toEpochDay(startOfWeek(start));
  const from = Math.max(toEpochDay(start), toEpochDay(after) + 1);
  const last = toEpochDay(until);

  const out: IsoDate[] = [];
  for (let day = from; day <= last; day++) {
    const date = fromEpochDay(day);
    const week = (toEpochDay(startOfWeek(date)) - anchorWeek) / 7;
    if (week % interval === 0 && days.has(dayOfWeek(date))) out.push(date);
  }
  return out;
}

function monthlyDates(start: IsoDate, interval: number, after: IsoDate, until: IsoDate): IsoDate[] {
  const out: IsoDate[] = [];
  for (let k = 0; ; k++) {
    const date = addMonthsClamped(start, k * interval);
    if (date > until) break;
    if (date > after) out.push(date);
  }
  return out;
}
