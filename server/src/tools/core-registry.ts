/**
 * Core Tool Registry
 *
 * The one place the tool catalog is assembled. Everything the assistant
 * can do is listed here, in the order the model sees it.
 */

import type { Store } from "../storage/interface.js";
import { systemClock, type Clock } from "../utils/dates.js";
import { goalTools } from "./definitions/goal-tools.js";
import { taskTools } from "./definitions/task-tools.js";
import { templateTools } from "./definitions/template-tools.js";
import { ToolSet } from "./tool-set.js";

export function createToolSet(store: Store, clock: Clock = systemClock): ToolSet {
  const context = { store, clock };
  return new ToolSet([
    ...goalTools(context),
    ...taskTools(context),
    ...templateTools(context),
  ]);
}
