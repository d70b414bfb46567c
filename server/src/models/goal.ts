/**
 * Goal
 *
 * Goals form a hierarchy through their ids alone: "health.run_5k" sits under
 * "health" whether or not a "health" goal has been registered.
 */

import { defineSchema } from "../schema/index.js";

export const GOAL_STATUSES = ["active", "completed", "abandoned", "paused"] as const;
export type GoalStatus = typeof GOAL_STATUSES[number];

export interface Goal {
  id: string;
  name: string;
  description?: string;
  status: GoalStatus;
}

export const GOAL_ID_PATTERN = /^[^.\s]+(\.[^.\s]+)*$/;

export const GOAL_SCHEMA = defineSchema("Goal", {
  id: {
    type: "string",
    description: "Dot-delimited goal path, e.g. health.run_5k. Each segment nests under the previous one.",
    pattern: GOAL_ID_PATTERN,
    patternHint: "dot-separated segments without spaces",
  },
  name: { type: "string", description: "Short human-readable goal name", min: 1 },
  description: { type: "string", description: "What achieving this goal means", optional: true },
  status: { type: "enum", description: "Goal state", values: GOAL_STATUSES, default: "active" },
});

export function isGoalStatus(value: string): value is GoalStatus {
  return GOAL_STATUSES.some(s => s === value);
}
