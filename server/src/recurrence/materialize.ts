/**
 * Recurring Task Materialization
 *
 * Runs the expander against stored templates and saves the resulting
 * instances, all inside one store transaction.
 */

import { nanoid } from "nanoid";
import { NotFoundError } from "../errors.js";
import type { RecurringTaskTemplate, Task } from "../models/index.js";
import type { Store } from "../storage/interface.js";
import type { IsoDate } from "../utils/dates.js";
import { createComponentLogger } from "../logging.js";
import { generate } from "./expander.js";

const log = createComponentLogger("recurrence");

export interface MaterializeResult {
  generated: Task[];
  templates: Array<{ id: string; lastGeneratedDate?: IsoDate }>;
}

/**
 * Generate every instance due up to `asOf`, for one template or all of
 * them. An instance already stored for the same template and date is
 * skipped; the high-water mark still advances past it. When an unrelated
 * task holds the instance id, the instance gets a suffixed id instead.
 */
export function materializeRecurringTasks(store: Store, asOf: IsoDate, templateId?: string): MaterializeResult {
  return store.transaction(() => {
    const templates = templateId ? [loadTemplate(store, templateId)] : store.list("template");
    const result: MaterializeResult = { generated: [], templates: [] };

    for (const template of templates) {
      const before = template.lastGeneratedDate;
      const instances = generate(template, asOf);

      if (instances.length > 0) {
        const existing = new Set(
          store.list("task", { sourceTemplateId: template.id }).map(t => t.instanceDate),
        );
        for (const task of instances) {
          if (existing.has(task.instanceDate)) {
            log.debug("Instance already present, skipping", { id: task.id });
            continue;
          }
          if (store.load("task", task.id)) {
            const taken = task.id;
            task.id = `${taken}_${nanoid(6)}`;
            log.warn("Instance id taken by another task, using a suffixed id", { taken, id: task.id });
          }
          store.save("task", task);
          result.generated.push(task);
        }
      }

      if (template.lastGeneratedDate !== before) store.save("template", template);
      result.templates.push({ id: template.id, lastGeneratedDate: template.lastGeneratedDate });
    }

    if (result.generated.length > 0) {
      log.info("Generated recurring tasks", { count: result.generated.length, asOf });
    }
    return result;
  });
}

function loadTemplate(store: Store, id: string): RecurringTaskTemplate {
  const template = store.load("template", id);
  if (!template) throw new NotFoundError("Template", id);
  return template;
}
