/**
 * Store Interface
 *
 * The only way tool operations reach persistence. Calls are synchronous;
 * better-sqlite3 is, and the assistant serves one user at a time.
 */

import type { Goal, GoalStatus, RecurringTaskTemplate, Task, TaskStatus } from "../models/index.js";
import type { IsoDate } from "../utils/dates.js";

export interface EntityMap {
  goal: Goal;
  task: Task;
  template: RecurringTaskTemplate;
}

export type EntityKind = keyof EntityMap;

export interface GoalFilter {
  status?: GoalStatus;
}

export interface TaskFilter {
  status?: TaskStatus;
  /** Tasks advancing any of these goals */
  goals?: string[];
  /** Due strictly before; tasks without a due date always pass */
  dueBefore?: IsoDate;
  /** Due strictly after; tasks without a due date always pass */
  dueAfter?: IsoDate;
  scheduledOn?: IsoDate;
  sourceTemplateId?: string;
}

export interface TemplateFilter {
  /** Templates advancing any of these goals */
  goals?: string[];
}

export interface FilterMap {
  goal: GoalFilter;
  task: TaskFilter;
  template: TemplateFilter;
}

export interface Store {
  load<K extends EntityKind>(kind: K, id: string): EntityMap[K] | undefined;
  /** Insert or replace by id */
  save<K extends EntityKind>(kind: K, entity: EntityMap[K]): void;
  /** Matching entities in creation order */
  list<K extends EntityKind>(kind: K, filter?: FilterMap[K]): EntityMap[K][];
  /** Returns false when nothing had that id */
  delete(kind: EntityKind, id: string): boolean;
  /** Run `fn` atomically; a throw rolls back every write it made */
  transaction<T>(fn: () => T): T;
  close(): void;
}

/** Per-kind persistence used by store implementations. */
export interface Repository<T, F> {
  load(id: string): T | undefined;
  save(entity: T): void;
  list(filter?: F): T[];
  delete(id: string): boolean;
}

export type Repositories = { [K in EntityKind]: Repository<EntityMap[K], FilterMap[K]> };
