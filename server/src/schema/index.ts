export {
  isRequired,
  isRecord,
  isJsonRecord,
  type JsonValue,
  type JsonRecord,
  type FieldType,
  type FieldDef,
  type FieldOverride,
  type Schema,
  type ValidatedArgs,
} from "./types.js";
export { validateArgs, toJsonValue } from "./validate.js";
export { defineSchema, deriveSchema, extendSchema, partial, type DeriveOptions } from "./derive.js";
export { ToolArgs } from "./args.js";
