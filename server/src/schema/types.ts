/**
 * Field Schema Types
 *
 * A schema is an ordered, tagged map of field name → definition. Entities,
 * derived tool parameter schemas and the manifest all read from it, and a
 * single routine (validate.ts) evaluates it.
 */

export type JsonValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue };
export type JsonRecord = { [key: string]: JsonValue };

export type FieldType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "date"
  | "enum"
  | "array"
  | "object";

export interface FieldDef {
  type: FieldType;
  description: string;
  /** Absent values are allowed (and skipped) */
  optional?: boolean;
  /** Used when the value is absent; a field with a default is never required */
  default?: JsonValue;
  /** enum: allowed values, matched case-insensitively */
  values?: readonly string[];
  /** array: item definition; omitted means any JSON value */
  items?: FieldDef;
  /** object: nested fields; omitted means a free-form JSON record */
  fields?: Readonly<Record<string, FieldDef>>;
  /** integer/number: minimum value; string: minimum length */
  min?: number;
  /** string: value must match */
  pattern?: RegExp;
  /** Human wording for `pattern` in validation errors */
  patternHint?: string;
}

export interface Schema {
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldDef>>;
}

/** What a derived schema may change about a retained field. The type never changes. */
export interface FieldOverride {
  description?: string;
  /** Replaces the source default; null removes it */
  default?: JsonValue | null;
  optional?: boolean;
}

/**
 * Output of validation. `null` only appears for an optional field the caller
 * explicitly set to null, which operations read as "clear this value".
 */
export type ValidatedArgs = Record<string, JsonValue | null>;

export function isRequired(def: FieldDef): boolean {
  return !def.optional && def.default === undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonRecord(value: JsonValue): value is JsonRecord {
  return isRecord(value);
}
