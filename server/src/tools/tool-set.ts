/**
 * Tool Set
 *
 * The fixed registry the chat loop dispatches through. Built once at
 * startup from an ordered list; never changes afterwards.
 */

import { DuplicateToolError, UnknownToolError } from "../errors.js";
import type { ToolDefinition } from "../llm/types.js";
import { manifestToNativeTools } from "./manifest.js";
import type { Tool } from "./tool.js";
import type { ToolManifestEntry } from "./types.js";

export class ToolSet {
  private readonly tools: ReadonlyMap<string, Tool>;

  constructor(tools: readonly Tool[]) {
    const byName = new Map<string, Tool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) throw new DuplicateToolError(tool.name);
      byName.set(tool.name, tool);
    }
    this.tools = byName;
  }

  /** Tool names in registration order. */
  get names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Manifest fragments in registration order. Nothing is invoked. */
  describeAll(): ToolManifestEntry[] {
    return [...this.tools.values()].map(t => t.describe());
  }

  /** Look up `name` and invoke it with `args`. */
  async dispatch(name: string, args: unknown): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name, this.names);
    return tool.invoke(args);
  }

  toNativeTools(): ToolDefinition[] {
    return manifestToNativeTools(this.describeAll());
  }
}
