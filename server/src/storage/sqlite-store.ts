/**
 * SQLite Store
 *
 * One table per entity kind, snake_case columns, lists and free-form
 * objects as JSON text. Rows are checked on the way out so a hand-edited
 * database fails loudly instead of leaking bad values into tools.
 */

import type Database from "better-sqlite3";
import {
  isFrequency,
  isGoalStatus,
  isTaskStatus,
  isWeekday,
  type Goal,
  type RecurrenceRule,
  type RecurringTaskTemplate,
  type Task,
} from "../models/index.js";
import { isJsonRecord, isRecord, toJsonValue, type JsonRecord } from "../schema/index.js";
import type {
  EntityKind,
  EntityMap,
  FilterMap,
  GoalFilter,
  Repositories,
  Repository,
  Store,
  TaskFilter,
  TemplateFilter,
} from "./interface.js";

type Param = string | number | null;

export class SqliteStore implements Store {
  private readonly repos: Repositories;

  constructor(private readonly db: Database.Database) {
    this.repos = {
      goal: new GoalRepository(db),
      task: new TaskRepository(db),
      template: new TemplateRepository(db),
    };
  }

  load<K extends EntityKind>(kind: K, id: string): EntityMap[K] | undefined {
    return this.repos[kind].load(id);
  }

  save<K extends EntityKind>(kind: K, entity: EntityMap[K]): void {
    this.repos[kind].save(entity);
  }

  list<K extends EntityKind>(kind: K, filter?: FilterMap[K]): EntityMap[K][] {
    return this.repos[kind].list(filter);
  }

  delete(kind: EntityKind, id: string): boolean {
    return this.repos[kind].delete(id);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

// ============================================
// GOALS
// ============================================

interface GoalRow {
  id: string;
  name: string;
  description: string | null;
  status: string;
}

class GoalRepository implements Repository<Goal, GoalFilter> {
  constructor(private readonly db: Database.Database) {}

  load(id: string): Goal | undefined {
    const row = this.db.prepare<[string], GoalRow>("SELECT * FROM goals WHERE id = ?").get(id);
    return row ? rowToGoal(row) : undefined;
  }

  save(goal: Goal): void {
    this.db.prepare<Param[]>(`
      INSERT INTO goals (id, name, description, status, created_at) VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET name = excluded.name, description = excluded.description, status = excluded.status
    `).run(goal.id, goal.name, goal.description ?? null, goal.status, new Date().toISOString());
  }

  list(filter: GoalFilter = {}): Goal[] {
    const where = new Where();
    if (filter.status) where.add("status = ?", filter.status);
    return this.db
      .prepare<Param[], GoalRow>(`SELECT * FROM goals${where.sql()} ORDER BY created_at, rowid`)
      .all(...where.params)
      .map(rowToGoal);
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM goals WHERE id = ?").run(id).changes > 0;
  }
}

function rowToGoal(row: GoalRow): Goal {
  if (!isGoalStatus(row.status)) throw corrupt("goal", row.id, "status");
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    status: row.status,
  };
}

// ============================================
// TASKS
// ============================================

interface TaskRow {
  id: string;
  name: string;
  status: string;
  scheduled_date: string | null;
  due_date: string | null;
  estimated_completion_time: number | null;
  actual_completion_time: number | null;
  goals: string;
  dependencies: string;
  source_template_id: string | null;
  instance_date: string | null;
  can_complete_late: number;
  log: string | null;
  log_instructions: string | null;
}

class TaskRepository implements Repository<Task, TaskFilter> {
  constructor(private readonly db: Database.Database) {}

  load(id: string): Task | undefined {
    const row = this.db.prepare<[string], TaskRow>("SELECT * FROM tasks WHERE id = ?").get(id);
    return row ? rowToTask(row) : undefined;
  }

  save(task: Task): void {
    this.db.prepare<Param[]>(`
      INSERT INTO tasks (
        id, name, status, scheduled_date, due_date, estimated_completion_time, actual_completion_time,
        goals, dependencies, source_template_id, instance_date, can_complete_late, log, log_instructions, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        status = excluded.status,
        scheduled_date = excluded.scheduled_date,
        due_date = excluded.due_date,
        estimated_completion_time = excluded.estimated_completion_time,
        actual_completion_time = excluded.actual_completion_time,
        goals = excluded.goals,
        dependencies = excluded.dependencies,
        source_template_id = excluded.source_template_id,
        instance_date = excluded.instance_date,
        can_complete_late = excluded.can_complete_late,
        log = excluded.log,
        log_instructions = excluded.log_instructions
    `).run(
      task.id,
      task.name,
      task.status,
      task.scheduledDate ?? null,
      task.dueDate ?? null,
      task.estimatedCompletionTime ?? null,
      task.actualCompletionTime ?? null,
      JSON.stringify(task.goals),
      JSON.stringify(task.dependencies),
      task.sourceTemplateId ?? null,
      task.instanceDate ?? null,
      task.canCompleteLate ? 1 : 0,
      task.log ? JSON.stringify(task.log) : null,
      task.logInstructions ?? null,
      new Date().toISOString(),
    );
  }

  list(filter: TaskFilter = {}): Task[] {
    const where = new Where();
    if (filter.status) where.add("status = ?", filter.status);
    if (filter.goals) where.anyJsonMember("goals", filter.goals);
    if (filter.dueBefore) where.add("(due_date IS NULL OR due_date < ?)", filter.dueBefore);
    if (filter.dueAfter) where.add("(due_date IS NULL OR due_date > ?)", filter.dueAfter);
    if (filter.scheduledOn) where.add("scheduled_date = ?", filter.scheduledOn);
    if (filter.sourceTemplateId) where.add("source_template_id = ?", filter.sourceTemplateId);
    return this.db
      .prepare<Param[], TaskRow>(`SELECT * FROM tasks${where.sql()} ORDER BY created_at, rowid`)
      .all(...where.params)
      .map(rowToTask);
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM tasks WHERE id = ?").run(id).changes > 0;
  }
}

function rowToTask(row: TaskRow): Task {
  if (!isTaskStatus(row.status)) throw corrupt("task", row.id, "status");
  return {
    id: row.id,
    name: row.name,
    status: row.status,
    scheduledDate: row.scheduled_date ?? undefined,
    dueDate: row.due_date ?? undefined,
    estimatedCompletionTime: row.estimated_completion_time ?? undefined,
    actualCompletionTime: row.actual_completion_time ?? undefined,
    goals: parseStringList(row.goals, "task", row.id),
    dependencies: parseStringList(row.dependencies, "task", row.id),
    sourceTemplateId: row.source_template_id ?? undefined,
    instanceDate: row.instance_date ?? undefined,
    canCompleteLate: row.can_complete_late !== 0,
    log: row.log === null ? undefined : parseRecord(row.log, "task", row.id),
    logInstructions: row.log_instructions ?? undefined,
  };
}

// ============================================
// TEMPLATES
// ============================================

interface TemplateRow {
  id: string;
  name: string;
  goals: string;
  estimated_completion_time: number | null;
  recurrence_rule: string;
  start_date: string;
  end_date: string | null;
  last_generated_date: string | null;
  can_complete_late: number;
  log_instructions: string | null;
}

class TemplateRepository implements Repository<RecurringTaskTemplate, TemplateFilter> {
  constructor(private readonly db: Database.Database) {}

  load(id: string): RecurringTaskTemplate | undefined {
    const row = this.db.prepare<[string], TemplateRow>("SELECT * FROM templates WHERE id = ?").get(id);
    return row ? rowToTemplate(row) : undefined;
  }

  save(template: RecurringTaskTemplate): void {
    this.db.prepare<Param[]>(`
      INSERT INTO templates (
        id, name, goals, estimated_completion_time, recurrence_rule, start_date, end_date,
        last_generated_date, can_complete_late, log_instructions, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        goals = excluded.goals,
        estimated_completion_time = excluded.estimated_completion_time,
        recurrence_rule = excluded.recurrence_rule,
        start_date = excluded.start_date,
        end_date = excluded.end_date,
        last_generated_date = excluded.last_generated_date,
        can_complete_late = excluded.can_complete_late,
        log_instructions = excluded.log_instructions
    `).run(
      template.id,
      template.name,
      JSON.stringify(template.goals),
      template.estimatedCompletionTime ?? null,
      JSON.stringify(template.recurrenceRule),
      template.startDate,
      template.endDate ?? null,
      template.lastGeneratedDate ?? null,
      template.canCompleteLate ? 1 : 0,
      template.logInstructions ?? null,
      new Date().toISOString(),
    );
  }

  list(filter: TemplateFilter = {}): RecurringTaskTemplate[] {
    const where = new Where();
    if (filter.goals) where.anyJsonMember("goals", filter.goals);
    return this.db
      .prepare<Param[], TemplateRow>(`SELECT * FROM templates${where.sql()} ORDER BY created_at, rowid`)
      .all(...where.params)
      .map(rowToTemplate);
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM templates WHERE id = ?").run(id).changes > 0;
  }
}

function rowToTemplate(row: TemplateRow): RecurringTaskTemplate {
  return {
    id: row.id,
    name: row.name,
    goals: parseStringList(row.goals, "template", row.id),
    estimatedCompletionTime: row.estimated_completion_time ?? undefined,
    recurrenceRule: parseRule(row.recurrence_rule, row.id),
    startDate: row.start_date,
    endDate: row.end_date ?? undefined,
    lastGeneratedDate: row.last_generated_date ?? undefined,
    canCompleteLate: row.can_complete_late !== 0,
    logInstructions: row.log_instructions ?? undefined,
  };
}

function parseRule(text: string, id: string): RecurrenceRule {
  const value: unknown = JSON.parse(text);
  if (!isRecord(value)) throw corrupt("template", id, "recurrence_rule");
  const { frequency, interval, weekdays } = value;
  if (typeof frequency !== "string" || !isFrequency(frequency)) throw corrupt("template", id, "recurrence_rule");
  if (typeof interval !== "number") throw corrupt("template", id, "recurrence_rule");
  const days = Array.isArray(weekdays) ? weekdays : [];
  return {
    frequency,
    interval,
    weekdays: days.filter((d): d is string => typeof d === "string").filter(isWeekday),
  };
}

// ============================================
// HELPERS
// ============================================

/** Accumulates AND-ed conditions with their positional parameters. */
class Where {
  private readonly clauses: string[] = [];
  readonly params: Param[] = [];

  add(clause: string, ...params: Param[]): void {
    this.clauses.push(clause);
    this.params.push(...params);
  }

  /** Row's JSON array column shares at least one value with `values`. */
  anyJsonMember(column: string, values: string[]): void {
    if (values.length === 0) {
      this.clauses.push("0");
      return;
    }
    const marks = values.map(() => "?").join(", ");
    this.add(`EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value IN (${marks}))`, ...values);
  }

  sql(): string {
    return this.clauses.length > 0 ? ` WHERE ${this.clauses.join(" AND ")}` : "";
  }
}

function parseStringList(text: string, kind: string, id: string): string[] {
  const value: unknown = JSON.parse(text);
  if (!Array.isArray(value)) throw corrupt(kind, id, "list column");
  return value.filter((item): item is string => typeof item === "string");
}

function parseRecord(text: string, kind: string, id: string): JsonRecord {
  const value = toJsonValue(JSON.parse(text));
  if (value === undefined || !isJsonRecord(value)) throw corrupt(kind, id, "log");
  return value;
}

function corrupt(kind: string, id: string, column: string): Error {
  return new Error(`Stored ${kind} "${id}" has an invalid ${column}`);
}
