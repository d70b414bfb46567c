/**
 * Tool
 *
 * A named operation plus the schema its arguments must satisfy. Invoking
 * a tool validates first; the operation never sees bad input.
 */

import { isRequired, validateArgs, ToolArgs, type FieldDef, type Schema } from "../schema/index.js";
import type { ParameterDescription, ParameterShape, ToolManifestEntry, ToolOperation, ToolOptions } from "./types.js";

export class Tool<R = unknown> {
  readonly name: string;
  readonly parameters: Schema;
  readonly description: string;
  readonly options: ToolOptions;
  private readonly operation: ToolOperation<R>;

  constructor(name: string, operation: ToolOperation<R>, parameters: Schema, description: string, options: ToolOptions) {
    this.name = name;
    this.operation = operation;
    this.parameters = parameters;
    this.description = description;
    this.options = options;
  }

  /**
   * Validate `args` and run the operation. A ValidationError means the
   * operation was not called; anything else comes from the operation itself.
   */
  async invoke(args: unknown): Promise<R> {
    const values = validateArgs(this.parameters, args ?? {}, this.name);
    return this.operation(new ToolArgs(values));
  }

  describe(): ToolManifestEntry {
    return {
      name: this.name,
      description: this.description,
      category: this.options.category,
      parameters: describeFields(this.parameters.fields),
      annotations: { readOnlyHint: this.options.readOnly ?? false },
    };
  }
}

function describeFields(fields: Readonly<Record<string, FieldDef>>): ParameterDescription[] {
  return Object.entries(fields).map(([name, def]) => ({
    name,
    required: isRequired(def),
    ...describeShape(def),
  }));
}

function describeShape(def: FieldDef): ParameterShape {
  const shape: ParameterShape = { type: def.type, description: def.description };
  if (def.default !== undefined) shape.default = structuredClone(def.default);
  if (def.values) shape.enum = [...def.values];
  if (def.min !== undefined) shape.min = def.min;
  if (def.pattern) shape.pattern = def.pattern.source;
  if (def.items) shape.items = describeShape(def.items);
  if (def.fields) shape.properties = describeFields(def.fields);
  return shape;
}
