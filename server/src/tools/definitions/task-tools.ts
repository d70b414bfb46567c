/**
 * Task Tools
 *
 * Tasks are created directly or generated from templates, move through
 * pending → in_progress → completed (or cancelled), and are never deleted.
 *
 * Completion is the only point where dependencies and due dates are
 * enforced. Scheduling after the due date is allowed but reported back
 * as a warning.
 */

import { nanoid } from "nanoid";
import { ConflictError, DependencyError, DomainError } from "../../errors.js";
import { rollup } from "../../goals/hierarchy.js";
import { TASK_SCHEMA, TASK_STATUSES, isOverdue, scheduleWarnings, type Task } from "../../models/index.js";
import { deriveSchema, extendSchema, partial } from "../../schema/index.js";
import type { Store, TaskFilter } from "../../storage/interface.js";
import type { IsoDate } from "../../utils/dates.js";
import { createComponentLogger } from "../../logging.js";
import { Tool } from "../tool.js";
import { requireEntity, type ToolContext } from "./context.js";

const log = createComponentLogger("tools.tasks");

// ============================================
// PARAMETER SCHEMAS
// ============================================

const CREATE_TASK = deriveSchema(
  TASK_SCHEMA,
  [
    "id",
    "name",
    "status",
    "scheduledDate",
    "dueDate",
    "estimatedCompletionTime",
    "goals",
    "dependencies",
    "canCompleteLate",
    "logInstructions",
  ],
  {
    name: "create_task",
    overrides: { id: { optional: true, description: "Task id; one is generated when omitted" } },
  },
);

const UPDATABLE = ["name", "estimatedCompletionTime", "goals", "dependencies", "logInstructions", "log"];

const UPDATE_TASK = deriveSchema(TASK_SCHEMA, ["id", ...UPDATABLE], {
  name: "update_task",
  overrides: {
    id: { description: "Id of the task to update" },
    ...partial(UPDATABLE),
    log: { description: "Replaces the whole progress log; use complete_task to add to it", optional: true },
  },
});

const LIST_TASKS = extendSchema(
  deriveSchema(TASK_SCHEMA, ["status", "sourceTemplateId"], {
    overrides: {
      status: { description: "Only tasks in this state", optional: true, default: null },
      sourceTemplateId: { description: "Only tasks generated from this template" },
    },
  }),
  {
    goal: { type: "string", description: "Only tasks advancing this goal", optional: true },
    includeSubgoals: {
      type: "boolean",
      description: "With `goal`: also match tasks on goals nested under it",
      default: false,
    },
    dueBefore: { type: "date", description: "Due strictly before this date; tasks with no due date are kept", optional: true },
    dueAfter: { type: "date", description: "Due strictly after this date; tasks with no due date are kept", optional: true },
    scheduledOn: { type: "date", description: "Scheduled for exactly this date", optional: true },
  },
  "list_tasks",
);

const SET_TASK_STATUS = deriveSchema(TASK_SCHEMA, ["id", "status"], {
  name: "set_task_status",
  overrides: { status: { description: "New state", default: null } },
});

const COMPLETE_TASK = deriveSchema(TASK_SCHEMA, ["id", "actualCompletionTime", "log"], {
  name: "complete_task",
  overrides: { log: { description: "Progress details to add to the task's log (merged key by key)" } },
});

const RESCHEDULE_TASK = deriveSchema(TASK_SCHEMA, ["id", "scheduledDate", "dueDate"], {
  name: "reschedule_task",
  overrides: {
    scheduledDate: { description: "New planned date (YYYY-MM-DD); null clears it" },
    dueDate: { description: "New due date (YYYY-MM-DD); null clears it" },
  },
});

// ============================================
// RULES
// ============================================

/** Unfinished dependencies of `task`. Unknown ids count as unfinished. */
export function blockingDependencies(store: Store, task: Task): string[] {
  return task.dependencies.filter(dep => store.load("task", dep)?.status !== "completed");
}

/** Throws unless `task` may be marked completed on `today`. */
export function assertCanComplete(store: Store, task: Task, today: IsoDate): void {
  const blocking = blockingDependencies(store, task);
  if (blocking.length > 0) {
    throw new DependencyError(
      task.id,
      blocking,
      `Task "${task.id}" is blocked by unfinished dependencies: ${blocking.join(", ")}`,
    );
  }
  if (!task.canCompleteLate && isOverdue(task, today)) {
    throw new DomainError(`Task "${task.id}" was due ${task.dueDate} and cannot be completed late`);
  }
}

function assertDependencies(store: Store, task: Task): void {
  if (task.dependencies.length === 0) return;
  if (task.sourceTemplateId) {
    throw new DomainError(
      `Task "${task.id}" was generated from template "${task.sourceTemplateId}"; generated tasks cannot have dependencies`,
    );
  }
  if (task.dependencies.includes(task.id)) {
    throw new DependencyError(task.id, [task.id], `Task "${task.id}" cannot depend on itself`);
  }
  const unknown = task.dependencies.filter(dep => !store.load("task", dep));
  if (unknown.length > 0) {
    throw new DependencyError(task.id, unknown, `Unknown dependency task(s): ${unknown.join(", ")}`);
  }
}

function goalWarnings(store: Store, goals: string[]): string[] {
  return goals
    .filter(id => !store.load("goal", id))
    .map(id => `Goal "${id}" is not registered; create it with create_goal to track progress`);
}

function reportWarnings(task: Task, warnings: string[]): void {
  if (warnings.length > 0) log.warn("Task saved with warnings", { id: task.id, warnings });
}

// ============================================
// RESULT SHAPES
// ============================================

export interface TaskWithWarnings {
  task: Task;
  warnings: string[];
}

export interface TaskDetail extends Task {
  /** Dependencies that are not completed yet */
  blockedBy: string[];
  overdue: boolean;
}

// ============================================
// TOOLS
// ============================================

export function taskTools({ store, clock }: ToolContext): Tool[] {
  return [
    new Tool("create_task", (args): TaskWithWarnings => {
      const id = args.optionalString("id") ?? `task_${nanoid(10)}`;
      if (store.load("task", id)) throw new ConflictError("Task", id);

      const task: Task = {
        id,
        name: args.string("name"),
        status: args.oneOf("status", TASK_STATUSES),
        scheduledDate: args.optionalString("scheduledDate"),
        dueDate: args.optionalString("dueDate"),
        estimatedCompletionTime: args.optionalInteger("estimatedCompletionTime"),
        goals: args.stringList("goals") ?? [],
        dependencies: args.stringList("dependencies") ?? [],
        canCompleteLate: args.boolean("canCompleteLate"),
        logInstructions: args.optionalString("logInstructions"),
      };
      assertDependencies(store, task);
      if (task.status === "completed") assertCanComplete(store, task, clock.today());

      store.save("task", task);
      const warnings = [...scheduleWarnings(task), ...goalWarnings(store, task.goals)];
      reportWarnings(task, warnings);
      log.info("Task created", { id });
      return { task, warnings };
    }, CREATE_TASK,
      "Create a task. Link it to goals by id and list tasks that must be completed first in `dependencies`.",
      { category: "tasks" }),

    new Tool("update_task", (args): Task => {
      const task = requireEntity(store, "task", args.string("id"));

      const name = args.optionalString("name");
      if (name !== undefined) task.name = name;

      if (args.isCleared("estimatedCompletionTime")) delete task.estimatedCompletionTime;
      const estimate = args.optionalInteger("estimatedCompletionTime");
      if (estimate !== undefined) task.estimatedCompletionTime = estimate;

      if (args.isCleared("goals")) task.goals = [];
      const goals = args.stringList("goals");
      if (goals) task.goals = goals;

      if (args.isCleared("dependencies")) task.dependencies = [];
      const dependencies = args.stringList("dependencies");
      if (dependencies) {
        task.dependencies = dependencies;
        assertDependencies(store, task);
      }

      if (args.isCleared("logInstructions")) delete task.logInstructions;
      const logInstructions = args.optionalString("logInstructions");
      if (logInstructions !== undefined) task.logInstructions = logInstructions;

      if (args.isCleared("log")) delete task.log;
      const progress = args.optionalRecord("log");
      if (progress) task.log = progress;

      store.save("task", task);
      return task;
    }, UPDATE_TASK,
      "Change a task's details. Omitted fields are left as they are; pass null to clear one. " +
        "Use set_task_status, complete_task and reschedule_task for state and dates.",
      { category: "tasks" }),

    new Tool("get_task", (args): TaskDetail => {
      const task = requireEntity(store, "task", args.string("id"));
      const open = task.status !== "completed" && task.status !== "cancelled";
      return {
        ...task,
        blockedBy: blockingDependencies(store, task),
        overdue: open && isOverdue(task, clock.today()),
      };
    }, deriveSchema(TASK_SCHEMA, ["id"], { name: "get_task" }),
      "Get one task, including which dependencies still block it and whether it is overdue.",
      { category: "tasks", readOnly: true }),

    new Tool("list_tasks", (args): Task[] => {
      const filter: TaskFilter = {
        status: args.optionalOneOf("status", TASK_STATUSES),
        dueBefore: args.optionalString("dueBefore"),
        dueAfter: args.optionalString("dueAfter"),
        scheduledOn: args.optionalString("scheduledOn"),
        sourceTemplateId: args.optionalString("sourceTemplateId"),
      };
      const tasks = store.list("task", filter);

      const goal = args.optionalString("goal");
      if (goal === undefined) return tasks;
      if (!args.boolean("includeSubgoals")) return tasks.filter(t => t.goals.includes(goal));

      const known = [...store.list("goal").map(g => g.id), ...tasks.flatMap(t => t.goals)];
      const goals = new Set(rollup(goal, known));
      return tasks.filter(t => t.goals.some(g => goals.has(g)));
    }, LIST_TASKS,
      "List tasks, filtered by status, goal, dates or source template. All filters combine.",
      { category: "tasks", readOnly: true }),

    new Tool("set_task_status", (args): Task => {
      const task = requireEntity(store, "task", args.string("id"));
      const status = args.oneOf("status", TASK_STATUSES);
      if (status === "completed" && task.status !== "completed") {
        assertCanComplete(store, task, clock.today());
      }
      task.status = status;
      store.save("task", task);
      log.info("Task status changed", { id: task.id, status });
      return task;
    }, SET_TASK_STATUS,
      "Move a task to another state. Completed tasks may be reopened.",
      { category: "tasks" }),

    new Tool("complete_task", (args): Task => {
      const task = requireEntity(store, "task", args.string("id"));
      assertCanComplete(store, task, clock.today());

      task.status = "completed";
      const actual = args.optionalInteger("actualCompletionTime");
      if (actual !== undefined) task.actualCompletionTime = actual;
      const progress = args.optionalRecord("log");
      if (progress) task.log = { ...task.log, ...progress };

      store.save("task", task);
      log.info("Task completed", { id: task.id });
      return task;
    }, COMPLETE_TASK,
      "Mark a task completed, optionally recording the minutes spent and progress details for its log. " +
        "Fails while dependencies are unfinished, or after the due date for tasks that cannot be completed late.",
      { category: "tasks" }),

    new Tool("reschedule_task", (args): TaskWithWarnings => {
      const task = requireEntity(store, "task", args.string("id"));

      if (args.isCleared("scheduledDate")) delete task.scheduledDate;
      const scheduled = args.optionalString("scheduledDate");
      if (scheduled !== undefined) task.scheduledDate = scheduled;

      if (args.isCleared("dueDate")) delete task.dueDate;
      const due = args.optionalString("dueDate");
      if (due !== undefined) task.dueDate = due;

      store.save("task", task);
      const warnings = scheduleWarnings(task);
      reportWarnings(task, warnings);
      return { task, warnings };
    }, RESCHEDULE_TASK,
      "Change when a task is planned for and/or due.",
      { category: "tasks" }),
  ];
}
