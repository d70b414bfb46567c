/**
 * Schema Validation
 *
 * The one routine that checks and coerces input against a field schema.
 * Entity construction and tool invocation both go through validateArgs,
 * so a value accepted in one place is accepted everywhere.
 */

import { ValidationError, type ValidationIssue } from "../errors.js";
import { parseIsoDate } from "../utils/dates.js";
import { isRecord, type FieldDef, type JsonValue, type JsonRecord, type Schema, type ValidatedArgs } from "./types.js";

const ROOT = "(arguments)";
const INTEGER_TEXT = /^-?\d+$/;

/**
 * Validate `input` against `schema`, returning coerced values with defaults
 * applied. Throws a ValidationError listing every problem found.
 *
 * @param target - name reported in the error message (defaults to the schema name)
 */
export function validateArgs(schema: Schema, input: unknown, target: string = schema.name): ValidatedArgs {
  const issues: ValidationIssue[] = [];
  const values = validateFields(schema.fields, input, "", issues);
  if (!values || issues.length > 0) {
    throw new ValidationError(target, issues);
  }
  return values;
}

function validateFields(
  fields: Readonly<Record<string, FieldDef>>,
  input: unknown,
  path: string,
  issues: ValidationIssue[],
): ValidatedArgs | undefined {
  if (!isRecord(input)) {
    issues.push({ field: path || ROOT, reason: "expected an object" });
    return undefined;
  }

  for (const key of Object.keys(input)) {
    if (!Object.hasOwn(fields, key)) {
      issues.push({ field: joinPath(path, key), reason: "unknown parameter" });
    }
  }

  const out: ValidatedArgs = {};
  for (const [name, def] of Object.entries(fields)) {
    const fieldPath = joinPath(path, name);
    const raw = input[name];

    if (raw === undefined || raw === null) {
      if (def.default !== undefined) {
        out[name] = structuredClone(def.default);
      } else if (def.optional) {
        if (raw === null) out[name] = null;
      } else {
        issues.push({ field: fieldPath, reason: "is required" });
      }
      continue;
    }

    const value = validateValue(def, raw, fieldPath, issues);
    if (value !== undefined) out[name] = value;
  }
  return out;
}

function validateValue(def: FieldDef, raw: unknown, path: string, issues: ValidationIssue[]): JsonValue | undefined {
  const fail = (reason: string): undefined => {
    issues.push({ field: path, reason });
    return undefined;
  };

  switch (def.type) {
    case "string": {
      if (typeof raw !== "string") return fail("expected a string");
      if (def.min !== undefined && raw.trim().length < def.min) {
        return fail(def.min === 1 ? "must not be empty" : `must be at least ${def.min} characters`);
      }
      if (def.pattern && !def.pattern.test(raw)) {
        return fail(`must match ${def.patternHint ?? def.pattern.source}`);
      }
      return raw;
    }

    case "integer": {
      const n = typeof raw === "string" && INTEGER_TEXT.test(raw.trim()) ? Number(raw) : raw;
      if (typeof n !== "number" || !Number.isInteger(n)) return fail("expected an integer");
      if (def.min !== undefined && n < def.min) return fail(`must be >= ${def.min}`);
      return n;
    }

    case "number": {
      const n = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
      if (typeof n !== "number" || !Number.isFinite(n)) return fail("expected a number");
      if (def.min !== undefined && n < def.min) return fail(`must be >= ${def.min}`);
      return n;
    }

    case "boolean": {
      if (typeof raw === "boolean") return raw;
      if (raw === "true") return true;
      if (raw === "false") return false;
      return fail("expected a boolean");
    }

    case "date": {
      const date = typeof raw === "string" ? parseIsoDate(raw) : undefined;
      if (!date) return fail("expected a date (YYYY-MM-DD)");
      return date;
    }

    case "enum": {
      const values = def.values ?? [];
      const match = typeof raw === "string"
        ? values.find(v => v.toLowerCase() === raw.trim().toLowerCase())
        : undefined;
      if (match === undefined) return fail(`must be one of: ${values.join(", ")}`);
      return match;
    }

    case "array": {
      // A lone value where a list is expected is read as a one-item list
      const list = Array.isArray(raw) ? raw : [raw];
      const out: JsonValue[] = [];
      let ok = true;
      list.forEach((item, i) => {
        const itemPath = `${path}[${i}]`;
        const value = def.items
          ? validateValue(def.items, item, itemPath, issues)
          : toJsonValue(item);
        if (value === undefined) {
          if (!def.items) issues.push({ field: itemPath, reason: "expected a JSON value" });
          ok = false;
        } else {
          out.push(value);
        }
      });
      return ok ? out : undefined;
    }

    case "object": {
      if (def.fields) {
        const nested = validateFields(def.fields, raw, path, issues);
        return nested ? dropNulls(nested) : undefined;
      }
      const record = isRecord(raw) ? toJsonValue(raw) : undefined;
      if (record === undefined) return fail("expected an object");
      return record;
    }
  }
}

/** Convert arbitrary parsed input into a JSON value, dropping nulls. */
export function toJsonValue(raw: unknown): JsonValue | undefined {
  if (typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (Array.isArray(raw)) {
    const out: JsonValue[] = [];
    for (const item of raw) {
      const value = toJsonValue(item);
      if (value === undefined) return undefined;
      out.push(value);
    }
    return out;
  }
  if (isRecord(raw)) {
    const out: JsonRecord = {};
    for (const [key, item] of Object.entries(raw)) {
      if (item === null || item === undefined) continue;
      const value = toJsonValue(item);
      if (value === undefined) return undefined;
      out[key] = value;
    }
    return out;
  }
  return undefined;
}

function dropNulls(values: ValidatedArgs): JsonRecord {
  const out: JsonRecord = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null) out[key] = value;
  }
  return out;
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}
