import { describe, it, expect } from "vitest";
import { defineSchema, deriveSchema, extendSchema, partial } from "./derive.js";
import { isRequired } from "./types.js";
import { ToolArgs } from "./args.js";
import { DuplicateFieldError, UnknownFieldError } from "../errors.js";
import { TASK_SCHEMA } from "../models/task.js";

const ENTITY = defineSchema("Entity", {
  id: { type: "string", description: "Identifier" },
  name: { type: "string", description: "Name" },
  goals: { type: "array", description: "Goals", items: { type: "string", description: "Goal id" }, default: [] },
  notes: { type: "string", description: "Notes", optional: true },
});

describe("deriveSchema", () => {
  it("keeps listed fields in source order", () => {
    const derived = deriveSchema(ENTITY, ["notes", "id"]);
    expect(Object.keys(derived.fields)).toEqual(["id", "notes"]);
    expect(derived.name).toBe("EntitySubset");
  });

  it("exposes nothing beyond the listed fields of a real model", () => {
    const derived = deriveSchema(TASK_SCHEMA, ["name", "id"], { name: "pick" });
    expect(Object.keys(derived.fields)).toEqual(["id", "name"]);
    expect(derived.fields.status).toBeUndefined();
    expect(TASK_SCHEMA.fields.status.default).toBe("pending");
  });

  it("applies description, default and optional overrides", () => {
    const derived = deriveSchema(ENTITY, ["id", "goals"], {
      name: "update_entity",
      overrides: {
        id: { description: "Entity to update" },
        goals: { optional: true, default: null },
      },
    });
    expect(derived.name).toBe("update_entity");
    expect(derived.fields.id.description).toBe("Entity to update");
    expect(derived.fields.id.type).toBe("string");
    expect(derived.fields.goals.default).toBeUndefined();
    expect(isRequired(derived.fields.goals)).toBe(false);
  });

  it("leaves the source untouched", () => {
    deriveSchema(ENTITY, ["goals"], { overrides: partial(["goals"]) });
    expect(ENTITY.fields.goals.default).toEqual([]);
  });

  it("returns a frozen copy", () => {
    const derived = deriveSchema(ENTITY, ["name"]);
    expect(Object.isFrozen(derived.fields)).toBe(true);
    expect(Object.isFrozen(derived.fields.name)).toBe(true);
  });

  it("rejects unknown listed fields", () => {
    expect(() => deriveSchema(ENTITY, ["id", "colour"])).toThrow(UnknownFieldError);
  });

  it("rejects overrides for fields that are not kept", () => {
    expect(() => deriveSchema(ENTITY, ["id"], { overrides: { name: { optional: true } } })).toThrow(
      'Field "name" does not exist on Entity',
    );
  });
});

describe("extendSchema", () => {
  it("appends new fields", () => {
    const extended = extendSchema(ENTITY, { extra: { type: "boolean", description: "Extra" } }, "Extended");
    expect(Object.keys(extended.fields)).toEqual(["id", "name", "goals", "notes", "extra"]);
  });

  it("rejects a name clash", () => {
    expect(() => extendSchema(ENTITY, { name: { type: "string", description: "Again" } })).toThrow(DuplicateFieldError);
  });
});

describe("ToolArgs", () => {
  const args = new ToolArgs({ id: "t1", count: 2, flag: false, tags: ["a"], cleared: null, rule: { every: 3 } });

  it("reads typed values", () => {
    expect(args.string("id")).toBe("t1");
    expect(args.integer("count")).toBe(2);
    expect(args.boolean("flag")).toBe(false);
    expect(args.stringList("tags")).toEqual(["a"]);
    expect(args.nested("rule")?.integer("every")).toBe(3);
  });

  it("distinguishes absent from cleared", () => {
    expect(args.has("missing")).toBe(false);
    expect(args.isCleared("missing")).toBe(false);
    expect(args.has("cleared")).toBe(false);
    expect(args.isCleared("cleared")).toBe(true);
    expect(args.optionalString("cleared")).toBeUndefined();
  });

  it("throws when an operation asks for the wrong type", () => {
    expect(() => args.string("count")).toThrow('Argument "count" is number, expected string');
    expect(() => args.string("missing")).toThrow('Argument "missing" was not provided');
  });
});
