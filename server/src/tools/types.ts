/**
 * Tool Types
 *
 * Core types for the tool manifest: what a tool looks like to the LLM
 * before it is converted to a provider's native format.
 */

import type { FieldType, JsonValue } from "../schema/index.js";
import type { ToolArgs } from "../schema/index.js";

export type ToolCategory = "goals" | "tasks" | "templates";

/** One parameter (or nested property / list item) as described to the model. */
export interface ParameterShape {
  type: FieldType;
  description: string;
  default?: JsonValue;
  enum?: string[];
  /** Minimum value (numbers) or length (strings) */
  min?: number;
  pattern?: string;
  items?: ParameterShape;
  properties?: ParameterDescription[];
}

export interface ParameterDescription extends ParameterShape {
  name: string;
  required: boolean;
}

export interface ToolManifestEntry {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: ParameterDescription[];
  annotations: {
    /** Only reads state; safe to call without asking the user */
    readOnlyHint: boolean;
  };
}

/** The work behind a tool. Receives arguments that already passed validation. */
export type ToolOperation<R> = (args: ToolArgs) => R | Promise<R>;

export interface ToolOptions {
  category: ToolCategory;
  readOnly?: boolean;
}
