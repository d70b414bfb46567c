/**
 * Recurring Task Template
 *
 * Describes a task that repeats on a calendar rule. The expander in
 * recurrence/ turns templates into dated Task instances.
 */

import { defineSchema } from "../schema/index.js";
import { WEEKDAYS, type IsoDate, type Weekday } from "../utils/dates.js";

export const FREQUENCIES = ["daily", "weekly", "monthly"] as const;
export type Frequency = typeof FREQUENCIES[number];

export interface RecurrenceRule {
  frequency: Frequency;
  /** Every N days / weeks / months */
  interval: number;
  /** Weekly only; empty means the weekday of the start date */
  weekdays: Weekday[];
}

export interface RecurringTaskTemplate {
  id: string;
  name: string;
  goals: string[];
  estimatedCompletionTime?: number;
  recurrenceRule: RecurrenceRule;
  startDate: IsoDate;
  /** Inclusive */
  endDate?: IsoDate;
  /** Latest date instances have been generated for */
  lastGeneratedDate?: IsoDate;
  canCompleteLate: boolean;
  logInstructions?: string;
}

export const TEMPLATE_SCHEMA = defineSchema("RecurringTaskTemplate", {
  id: { type: "string", description: "Template id", min: 1 },
  name: { type: "string", description: "Name given to every generated task", min: 1 },
  goals: {
    type: "array",
    description: "Ids of the goals generated tasks advance",
    items: { type: "string", description: "Goal id" },
    default: [],
  },
  estimatedCompletionTime: { type: "integer", description: "Expected effort per occurrence in minutes", min: 0, optional: true },
  recurrenceRule: {
    type: "object",
    description: "When the task repeats",
    fields: {
      frequency: { type: "enum", description: "Repeat unit", values: FREQUENCIES },
      interval: { type: "integer", description: "Repeat every N units", min: 1, default: 1 },
      weekdays: {
        type: "array",
        description: "Weekly only: days of the week (mon..sun). Empty means the start date's weekday",
        items: { type: "enum", description: "Day of week", values: WEEKDAYS },
        default: [],
      },
    },
  },
  startDate: { type: "date", description: "First possible occurrence (YYYY-MM-DD)" },
  endDate: { type: "date", description: "Last possible occurrence, inclusive (YYYY-MM-DD)", optional: true },
  lastGeneratedDate: { type: "date", description: "Latest date tasks were generated for", optional: true },
  canCompleteLate: { type: "boolean", description: "Whether generated tasks may be completed late", default: true },
  logInstructions: { type: "string", description: "What generated tasks should record when completed", optional: true },
});

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some(f => f === value);
}

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some(d => d === value);
}
