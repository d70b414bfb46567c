/**
 * Task
 *
 * A unit of work. Tasks advance goals, may wait on other tasks, and are
 * either created directly or materialized from a recurring template.
 * Tasks are never deleted; cancellation is a status.
 */

import { defineSchema, type JsonRecord } from "../schema/index.js";
import type { IsoDate } from "../utils/dates.js";

export const TASK_STATUSES = ["pending", "in_progress", "completed", "cancelled"] as const;
export type TaskStatus = typeof TASK_STATUSES[number];

export interface Task {
  id: string;
  name: string;
  status: TaskStatus;
  scheduledDate?: IsoDate;
  dueDate?: IsoDate;
  /** Minutes */
  estimatedCompletionTime?: number;
  /** Minutes, recorded on completion */
  actualCompletionTime?: number;
  goals: string[];
  dependencies: string[];
  sourceTemplateId?: string;
  instanceDate?: IsoDate;
  canCompleteLate: boolean;
  log?: JsonRecord;
  logInstructions?: string;
}

const GOAL_LIST = { type: "string", description: "Goal id" } as const;
const TASK_REF = { type: "string", description: "Task id" } as const;

export const TASK_SCHEMA = defineSchema("Task", {
  id: { type: "string", description: "Task id", min: 1 },
  name: { type: "string", description: "What needs doing", min: 1 },
  status: { type: "enum", description: "Task state", values: TASK_STATUSES, default: "pending" },
  scheduledDate: { type: "date", description: "Day the task is planned for (YYYY-MM-DD)", optional: true },
  dueDate: { type: "date", description: "Day the task must be done by (YYYY-MM-DD)", optional: true },
  estimatedCompletionTime: { type: "integer", description: "Expected effort in minutes", min: 0, optional: true },
  actualCompletionTime: { type: "integer", description: "Minutes actually spent", min: 0, optional: true },
  goals: { type: "array", description: "Ids of the goals this task advances", items: GOAL_LIST, default: [] },
  dependencies: {
    type: "array",
    description: "Ids of tasks that must be completed before this one",
    items: TASK_REF,
    default: [],
  },
  sourceTemplateId: { type: "string", description: "Template this task was generated from", optional: true },
  instanceDate: { type: "date", description: "Occurrence date within the template's schedule", optional: true },
  canCompleteLate: { type: "boolean", description: "Whether the task may be completed after its due date", default: true },
  log: { type: "object", description: "Free-form record of progress, e.g. {\"distance_km\": 5}", optional: true },
  logInstructions: { type: "string", description: "What should be recorded in the log when completing", optional: true },
});

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(s => s === value);
}

/** True when the task's due date has passed relative to `today`. */
export function isOverdue(task: Task, today: IsoDate): boolean {
  return task.dueDate !== undefined && task.dueDate < today;
}

/** Non-fatal scheduling problems worth telling the user about. */
export function scheduleWarnings(task: Task): string[] {
  if (task.scheduledDate && task.dueDate && task.scheduledDate > task.dueDate) {
    return [`Task "${task.id}" is scheduled for ${task.scheduledDate}, after its due date ${task.dueDate}`];
  }
  return [];
}
