/**
 * Schema Derivation
 *
 * Tool parameter schemas are cut out of entity schemas rather than written
 * by hand, so a field's type, constraints and wording live in one place.
 */

import { DuplicateFieldError, UnknownFieldError } from "../errors.js";
import type { FieldDef, FieldOverride, Schema } from "./types.js";

/** Build a frozen schema from a field map. */
export function defineSchema(name: string, fields: Record<string, FieldDef>): Schema {
  const copy: Record<string, FieldDef> = {};
  for (const [key, def] of Object.entries(fields)) {
    copy[key] = freezeField(def);
  }
  return Object.freeze({ name, fields: Object.freeze(copy) });
}

export interface DeriveOptions {
  /** Name of the derived schema; defaults to `<source>Subset` */
  name?: string;
  overrides?: Record<string, FieldOverride>;
}

/**
 * Keep the listed fields of `source`, in source order, applying overrides.
 * Unknown field names (listed or overridden) throw UnknownFieldError.
 * The result shares nothing mutable with the source.
 */
export function deriveSchema(source: Schema, fieldNames: readonly string[], options: DeriveOptions = {}): Schema {
  const wanted = new Set(fieldNames);
  for (const name of wanted) {
    if (!Object.hasOwn(source.fields, name)) throw new UnknownFieldError(source.name, name);
  }

  const overrides = options.overrides ?? {};
  for (const name of Object.keys(overrides)) {
    if (!wanted.has(name)) throw new UnknownFieldError(source.name, name);
  }

  const fields: Record<string, FieldDef> = {};
  for (const [name, def] of Object.entries(source.fields)) {
    if (!wanted.has(name)) continue;
    fields[name] = applyOverride(def, overrides[name]);
  }
  return defineSchema(options.name ?? `${source.name}Subset`, fields);
}

/** Add fields to a schema. A name already on `base` throws DuplicateFieldError. */
export function extendSchema(base: Schema, extra: Record<string, FieldDef>, name: string = base.name): Schema {
  for (const key of Object.keys(extra)) {
    if (Object.hasOwn(base.fields, key)) throw new DuplicateFieldError(base.name, key);
  }
  return defineSchema(name, { ...base.fields, ...extra });
}

/**
 * Overrides that make every listed field optional with no default.
 * Update tools use this so an omitted field leaves the stored value alone.
 */
export function partial(fieldNames: readonly string[]): Record<string, FieldOverride> {
  const out: Record<string, FieldOverride> = {};
  for (const name of fieldNames) {
    out[name] = { optional: true, default: null };
  }
  return out;
}

function applyOverride(def: FieldDef, override: FieldOverride | undefined): FieldDef {
  if (!override) return def;
  const next: FieldDef = { ...def };
  if (override.description !== undefined) next.description = override.description;
  if (override.optional !== undefined) next.optional = override.optional;
  if (override.default === null) {
    delete next.default;
  } else if (override.default !== undefined) {
    next.default = override.default;
  }
  return next;
}

function freezeField(def: FieldDef): FieldDef {
  const copy: FieldDef = { ...def };
  if (def.default !== undefined) copy.default = structuredClone(def.default);
  if (def.values) copy.values = Object.freeze([...def.values]);
  if (def.items) copy.items = freezeField(def.items);
  if (def.fields) {
    const nested: Record<string, FieldDef> = {};
    for (const [key, child] of Object.entries(def.fields)) nested[key] = freezeField(child);
    copy.fields = Object.freeze(nested);
  }
  return Object.freeze(copy);
}
