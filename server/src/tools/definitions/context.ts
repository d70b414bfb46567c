/**
 * What every tool operation is handed: persistence and today's date.
 */

import { NotFoundError } from "../../errors.js";
import type { EntityKind, EntityMap, Store } from "../../storage/interface.js";
import type { Clock } from "../../utils/dates.js";

export interface ToolContext {
  store: Store;
  clock: Clock;
}

const LABELS: Record<EntityKind, string> = {
  goal: "Goal",
  task: "Task",
  template: "Template",
};

/** Load an entity or throw NotFoundError. */
export function requireEntity<K extends EntityKind>(store: Store, kind: K, id: string): EntityMap[K] {
  const entity = store.load(kind, id);
  if (!entity) throw new NotFoundError(LABELS[kind], id);
  return entity;
}
