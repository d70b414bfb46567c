/**
 * Compact Tool Catalog
 *
 * A short, human-readable listing of the tools for the system prompt:
 * name, first sentence of the description, and whether the tool changes
 * anything. The full schemas travel separately as native tool definitions.
 */

import type { ToolManifestEntry } from "./types.js";

/**
 * Render the manifest grouped by category, marking tools that modify
 * data so the model knows which ones need the user's confirmation.
 */
export function generateCompactCatalog(manifest: ToolManifestEntry[]): string {
  if (manifest.length === 0) return "No tools available.";

  const grouped = new Map<string, ToolManifestEntry[]>();
  for (const t of manifest) {
    const list = grouped.get(t.category) ?? [];
    list.push(t);
    grouped.set(t.category, list);
  }

  const lines: string[] = [];
  for (const [category, tools] of grouped) {
    lines.push(`### ${category}`);
    for (const t of tools) {
      const marker = t.annotations.readOnlyHint ? "" : " [modifies]";
      lines.push(`- \`${t.name}\`${marker}: ${truncateDescription(t.description)}`);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

/** Names of tools that change stored data. */
export function mutatingTools(manifest: ToolManifestEntry[]): string[] {
  return manifest.filter(t => !t.annotations.readOnlyHint).map(t => t.name);
}

/**
 * Truncate a tool description to its first sentence.
 */
export function truncateDescription(description: string): string {
  const match = description.match(/^[^.]+\./);
  if (match && match[0].length < 120) return match[0];
  if (description.length > 120) return description.slice(0, 117) + "...";
  return description;
}
