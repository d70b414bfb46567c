/**
 * Tool Manifest Utilities
 *
 * Converts manifest entries into native ToolDefinition[] (JSON Schema
 * function declarations) for LLM function calling.
 */

import type { JsonSchemaObject, JsonSchemaProperty, ToolDefinition } from "../llm/types.js";
import type { ParameterDescription, ParameterShape, ToolManifestEntry } from "./types.js";

/**
 * Convert a tool manifest into native ToolDefinition[] for the LLM's tools parameter.
 */
export function manifestToNativeTools(manifest: ToolManifestEntry[]): ToolDefinition[] {
  return manifest.map(t => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: toObjectSchema(t.parameters),
    },
  }));
}

function toObjectSchema(params: ParameterDescription[]): JsonSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const p of params) {
    properties[p.name] = toPropertySchema(p);
  }
  return {
    type: "object",
    properties,
    required: params.filter(p => p.required).map(p => p.name),
    additionalProperties: false,
  };
}

function toPropertySchema(p: ParameterShape): JsonSchemaProperty {
  const schema: JsonSchemaProperty = { type: jsonType(p), description: p.description };

  if (p.type === "date") schema.format = "date";
  if (p.enum) schema.enum = p.enum;
  if (p.default !== undefined) schema.default = p.default;
  if (p.min !== undefined) {
    if (p.type === "string") schema.minLength = p.min;
    else schema.minimum = p.min;
  }
  if (p.pattern) schema.pattern = p.pattern;
  if (p.items) schema.items = toPropertySchema(p.items);
  if (p.properties) {
    const nested = toObjectSchema(p.properties);
    schema.properties = nested.properties;
    schema.required = nested.required;
  }
  return schema;
}

function jsonType(p: ParameterShape): JsonSchemaProperty["type"] {
  switch (p.type) {
    case "date":
    case "enum":
      return "string";
    default:
      return p.type;
  }
}
