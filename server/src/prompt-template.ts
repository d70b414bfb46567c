/**
 * Prompt Template Helper
 *
 * Injects values into |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = renderPrompt(SYSTEM_PROMPT, {
 *     "Today": "2024-01-10",
 *     "Tool Catalog": catalog,
 *   });
 */

import { createComponentLogger } from "./logging.js";

const log = createComponentLogger("prompt-template");

/**
 * Fields are matched case-insensitively. An unknown placeholder is
 * rendered as `[MISSING: Name]` and logged.
 */
export function renderPrompt(template: string, fields: Record<string, string>): string {
  return template.replace(
    /\|\*\s*([^*]+?)\s*\*\|/g,
    (_match, fieldName: string) => {
      const key = fieldName.trim();
      const entry = Object.entries(fields).find(
        ([k]) => k.toLowerCase() === key.toLowerCase()
      );
      if (entry) {
        return entry[1];
      }
      log.warn("Unresolved prompt placeholder", { field: key });
      return `[MISSING: ${key}]`;
    }
  );
}
