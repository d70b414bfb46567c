import { describe, it, expect } from "vitest";
import { defineSchema } from "./derive.js";
import { validateArgs } from "./validate.js";
import { ValidationError } from "../errors.js";

const SAMPLE = defineSchema("Sample", {
  name: { type: "string", description: "Name", min: 1 },
  count: { type: "integer", description: "Count", min: 1, default: 1 },
  done: { type: "boolean", description: "Done", optional: true },
  due: { type: "date", description: "Due date", optional: true },
  status: { type: "enum", description: "Status", values: ["pending", "in_progress"], default: "pending" },
  tags: { type: "array", description: "Tags", items: { type: "string", description: "Tag" }, default: [] },
  meta: { type: "object", description: "Free-form", optional: true },
  rule: {
    type: "object",
    description: "Rule",
    optional: true,
    fields: {
      frequency: { type: "enum", description: "Frequency", values: ["daily", "weekly"] },
      interval: { type: "integer", description: "Interval", min: 1, default: 1 },
    },
  },
  code: { type: "string", description: "Code", optional: true, pattern: /^[a-z]+$/, patternHint: "lowercase letters" },
});

function issuesOf(input: unknown): string[] {
  try {
    validateArgs(SAMPLE, input);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues.map(i => `${i.field}: ${i.reason}`);
    throw err;
  }
  return [];
}

describe("validateArgs", () => {
  it("applies defaults and leaves absent optional fields out", () => {
    expect(validateArgs(SAMPLE, { name: "Read" })).toEqual({
      name: "Read",
      count: 1,
      status: "pending",
      tags: [],
    });
  });

  it("does not share default values between calls", () => {
    const first = validateArgs(SAMPLE, { name: "a" });
    const tags = first.tags;
    if (Array.isArray(tags)) tags.push("mutated");
    expect(validateArgs(SAMPLE, { name: "b" }).tags).toEqual([]);
  });

  it("coerces numeric strings, boolean strings and enum case", () => {
    const out = validateArgs(SAMPLE, { name: "x", count: "3", done: "true", status: "IN_PROGRESS" });
    expect(out.count).toBe(3);
    expect(out.done).toBe(true);
    expect(out.status).toBe("in_progress");
  });

  it("wraps a single value into a list", () => {
    expect(validateArgs(SAMPLE, { name: "x", tags: "solo" }).tags).toEqual(["solo"]);
  });

  it("reduces an ISO datetime to its date", () => {
    expect(validateArgs(SAMPLE, { name: "x", due: "2024-03-05T09:30:00Z" }).due).toBe("2024-03-05");
  });

  it("keeps explicit null on an optional field as a clear marker", () => {
    const out = validateArgs(SAMPLE, { name: "x", due: null });
    expect(out.due).toBeNull();
    expect("done" in out).toBe(false);
  });

  it("uses the default when a defaulted field is null", () => {
    expect(validateArgs(SAMPLE, { name: "x", count: null }).count).toBe(1);
  });

  it("validates nested objects and fills their defaults", () => {
    expect(validateArgs(SAMPLE, { name: "x", rule: { frequency: "Daily" } }).rule).toEqual({
      frequency: "daily",
      interval: 1,
    });
  });

  it("drops nulls from free-form records", () => {
    expect(validateArgs(SAMPLE, { name: "x", meta: { a: 1, b: null } }).meta).toEqual({ a: 1 });
  });

  it("reports every problem at once with dotted paths", () => {
    expect(issuesOf({ count: 0, status: "later", due: "2024-02-30", rule: { interval: 2 }, extra: 1 })).toEqual([
      "extra: unknown parameter",
      "name: is required",
      "count: must be >= 1",
      "due: expected a date (YYYY-MM-DD)",
      "status: must be one of: pending, in_progress",
      "rule.frequency: is required",
    ]);
  });

  it("reports list item positions", () => {
    expect(issuesOf({ name: "x", tags: ["ok", 5] })).toEqual(["tags[1]: expected a string"]);
  });

  it("rejects empty strings under a minimum length", () => {
    expect(issuesOf({ name: "  " })).toEqual(["name: must not be empty"]);
  });

  it("uses the pattern hint in the message", () => {
    expect(issuesOf({ name: "x", code: "ABC" })).toEqual(["code: must match lowercase letters"]);
  });

  it("rejects input that is not an object", () => {
    expect(issuesOf([1, 2])).toEqual(["(arguments): expected an object"]);
  });

  it("names the target in the error message", () => {
    expect(() => validateArgs(SAMPLE, {}, "create_sample")).toThrow(
      "Invalid arguments for create_sample: name: is required",
    );
  });
});
