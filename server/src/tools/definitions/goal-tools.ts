/**
 * Goal Tools
 *
 * Create, inspect and organize goals. The hierarchy comes from the ids
 * (see goals/hierarchy.ts); nothing here stores parent links.
 */

import { ConflictError } from "../../errors.js";
import { buildGoalTree, childrenOf, parentOf, rollup, type GoalTreeNode } from "../../goals/hierarchy.js";
import { GOAL_SCHEMA, GOAL_STATUSES, type Goal, type GoalStatus, type TaskStatus } from "../../models/index.js";
import { defineSchema, deriveSchema, extendSchema, partial } from "../../schema/index.js";
import { createComponentLogger } from "../../logging.js";
import { Tool } from "../tool.js";
import { requireEntity, type ToolContext } from "./context.js";

const log = createComponentLogger("tools.goals");

// ============================================
// PARAMETER SCHEMAS
// ============================================

const CREATE_GOAL = deriveSchema(GOAL_SCHEMA, ["id", "name", "description", "status"], { name: "create_goal" });

const UPDATE_GOAL = deriveSchema(GOAL_SCHEMA, ["id", "name", "description", "status"], {
  name: "update_goal",
  overrides: {
    id: { description: "Id of the goal to update" },
    ...partial(["name", "description", "status"]),
  },
});

const LIST_GOALS = extendSchema(
  deriveSchema(GOAL_SCHEMA, ["status"], {
    overrides: { status: { description: "Only goals in this state", optional: true, default: null } },
  }),
  {
    under: { type: "string", description: "Only this goal and the goals nested under it", optional: true },
    directOnly: { type: "boolean", description: "With `under`: only its immediate children", default: false },
  },
  "list_goals",
);

const NO_PARAMS = defineSchema("no_params", {});

// ============================================
// RESULT SHAPES
// ============================================

export interface GoalDetail extends Goal {
  parentId?: string;
  children: string[];
}

export interface GoalTreeView {
  id: string;
  name?: string;
  status?: GoalStatus;
  children: GoalTreeView[];
}

export interface GoalProgress {
  goal: string;
  /** The goal and every registered goal nested under it */
  goals: string[];
  total: number;
  byStatus: Record<TaskStatus, number>;
  estimatedMinutes: number;
  actualMinutes: number;
}

// ============================================
// TOOLS
// ============================================

export function goalTools({ store }: ToolContext): Tool[] {
  const knownIds = (): string[] => store.list("goal").map(g => g.id);

  return [
    new Tool("create_goal", (args): Goal => {
      const id = args.string("id");
      if (store.load("goal", id)) throw new ConflictError("Goal", id);
      const goal: Goal = {
        id,
        name: args.string("name"),
        description: args.optionalString("description"),
        status: args.oneOf("status", GOAL_STATUSES),
      };
      store.save("goal", goal);
      log.info("Goal created", { id });
      return goal;
    }, CREATE_GOAL,
      "Create a goal. Nest goals with dotted ids: 'health.run_5k' sits under 'health'.",
      { category: "goals" }),

    new Tool("update_goal", (args): Goal => {
      const goal = requireEntity(store, "goal", args.string("id"));
      const name = args.optionalString("name");
      if (name !== undefined) goal.name = name;
      if (args.isCleared("description")) delete goal.description;
      const description = args.optionalString("description");
      if (description !== undefined) goal.description = description;
      const status = args.optionalOneOf("status", GOAL_STATUSES);
      if (status !== undefined) goal.status = status;
      store.save("goal", goal);
      return goal;
    }, UPDATE_GOAL,
      "Change a goal's name, description or status. Omitted fields are left as they are; pass null to clear the description.",
      { category: "goals" }),

    new Tool("get_goal", (args): GoalDetail => {
      const goal = requireEntity(store, "goal", args.string("id"));
      return {
        ...goal,
        parentId: parentOf(goal.id),
        children: childrenOf(goal.id, knownIds()),
      };
    }, deriveSchema(GOAL_SCHEMA, ["id"], { name: "get_goal" }),
      "Get one goal with its parent id and its direct sub-goals.",
      { category: "goals", readOnly: true }),

    new Tool("list_goals", (args): Goal[] => {
      const goals = store.list("goal");
      const under = args.optionalString("under");
      let ids: Set<string> | undefined;
      if (under !== undefined) {
        const known = goals.map(g => g.id);
        ids = new Set(args.boolean("directOnly") ? childrenOf(under, known) : rollup(under, known));
      }
      const status = args.optionalOneOf("status", GOAL_STATUSES);
      return goals.filter(g => (!ids || ids.has(g.id)) && (!status || g.status === status));
    }, LIST_GOALS,
      "List goals, optionally by status or within one part of the hierarchy.",
      { category: "goals", readOnly: true }),

    new Tool("goal_tree", (): GoalTreeView[] => {
      const goals = new Map(store.list("goal").map(g => [g.id, g]));
      const view = (node: GoalTreeNode): GoalTreeView => {
        const goal = goals.get(node.id);
        return { id: node.id, name: goal?.name, status: goal?.status, children: node.children.map(view) };
      };
      return buildGoalTree([...goals.keys()]).map(view);
    }, NO_PARAMS,
      "Show all goals as a nested tree.",
      { category: "goals", readOnly: true }),

    new Tool("delete_goal", (args): { deleted: string } => {
      const goal = requireEntity(store, "goal", args.string("id"));
      store.delete("goal", goal.id);
      log.info("Goal deleted", { id: goal.id });
      return { deleted: goal.id };
    }, deriveSchema(GOAL_SCHEMA, ["id"], { name: "delete_goal" }),
      "Delete a goal. Tasks that reference it keep the reference; sub-goals are not deleted.",
      { category: "goals" }),

    new Tool("goal_progress", (args): GoalProgress => {
      const goal = requireEntity(store, "goal", args.string("id"));
      const goals = rollup(goal.id, knownIds());
      const tasks = store.list("task", { goals });

      const counts: Record<TaskStatus, number> = { pending: 0, in_progress: 0, completed: 0, cancelled: 0 };
      let estimatedMinutes = 0;
      let actualMinutes = 0;
      for (const task of tasks) {
        counts[task.status] += 1;
        if (task.status !== "cancelled") estimatedMinutes += task.estimatedCompletionTime ?? 0;
        actualMinutes += task.actualCompletionTime ?? 0;
      }

      return { goal: goal.id, goals, total: tasks.length, byStatus: counts, estimatedMinutes, actualMinutes };
    }, deriveSchema(GOAL_SCHEMA, ["id"], { name: "goal_progress" }),
      "Summarize the tasks for a goal and everything nested under it: counts by status and minutes estimated vs spent.",
      { category: "goals", readOnly: true }),
  ];
}
