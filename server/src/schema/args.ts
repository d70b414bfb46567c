/**
 * Typed access to validated tool arguments.
 *
 * Validation has already coerced every value, so a type mismatch here is a
 * bug in the operation (it asked for the wrong type), not bad input.
 */

import { isJsonRecord, type JsonRecord, type JsonValue, type ValidatedArgs } from "./types.js";

export class ToolArgs {
  constructor(private readonly values: ValidatedArgs) {}

  /** True when the caller supplied a value (or a default filled it in). */
  has(name: string): boolean {
    const value = this.values[name];
    return value !== undefined && value !== null;
  }

  /** True when the caller explicitly passed null to clear an optional field. */
  isCleared(name: string): boolean {
    return this.values[name] === null;
  }

  string(name: string): string {
    const value = this.optionalString(name);
    if (value === undefined) throw missing(name);
    return value;
  }

  optionalString(name: string): string | undefined {
    const value = this.values[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string") throw wrongType(name, "string", value);
    return value;
  }

  integer(name: string): number {
    const value = this.optionalInteger(name);
    if (value === undefined) throw missing(name);
    return value;
  }

  optionalInteger(name: string): number | undefined {
    const value = this.values[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number") throw wrongType(name, "number", value);
    return value;
  }

  boolean(name: string): boolean {
    const value = this.optionalBoolean(name);
    if (value === undefined) throw missing(name);
    return value;
  }

  optionalBoolean(name: string): boolean | undefined {
    const value = this.values[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "boolean") throw wrongType(name, "boolean", value);
    return value;
  }

  /** An enum value, narrowed to the allowed literals. */
  oneOf<T extends string>(name: string, values: readonly T[]): T {
    const value = this.optionalOneOf(name, values);
    if (value === undefined) throw missing(name);
    return value;
  }

  optionalOneOf<T extends string>(name: string, values: readonly T[]): T | undefined {
    const value = this.optionalString(name);
    if (value === undefined) return undefined;
    const match = values.find(v => v === value);
    if (match === undefined) {
      throw new Error(`Argument "${name}" is "${value}", expected one of: ${values.join(", ")}`);
    }
    return match;
  }

  /** A list of strings, or undefined when absent. */
  stringList(name: string): string[] | undefined {
    const value = this.values[name];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value)) throw wrongType(name, "array", value);
    return value.map((item, i) => {
      if (typeof item !== "string") throw wrongType(`${name}[${i}]`, "string", item);
      return item;
    });
  }

  optionalRecord(name: string): JsonRecord | undefined {
    const value = this.values[name];
    if (value === undefined || value === null) return undefined;
    if (!isJsonRecord(value)) throw wrongType(name, "object", value);
    return value;
  }

  /** Accessor over a nested object parameter, or undefined when absent. */
  nested(name: string): ToolArgs | undefined {
    const record = this.optionalRecord(name);
    return record ? new ToolArgs(record) : undefined;
  }
}

function missing(name: string): Error {
  return new Error(`Argument "${name}" was not provided`);
}

function wrongType(name: string, expected: string, value: JsonValue): Error {
  const actual = Array.isArray(value) ? "array" : typeof value;
  return new Error(`Argument "${name}" is ${actual}, expected ${expected}`);
}
