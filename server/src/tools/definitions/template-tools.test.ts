import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase } from "../../db/index.js";
import { SqliteStore } from "../../storage/sqlite-store.js";
import { fixedClock } from "../../utils/dates.js";
import { DomainError, NotFoundError } from "../../errors.js";
import { isRecord } from "../../schema/index.js";
import { createToolSet } from "../core-registry.js";
import type { ToolSet } from "../tool-set.js";

function generatedIds(result: unknown): string[] {
  if (!isRecord(result) || !Array.isArray(result.generated)) return [];
  return result.generated.map((item: unknown) => (isRecord(item) && typeof item.id === "string" ? item.id : "?"));
}

describe("template tools", () => {
  let store: SqliteStore;
  let tools: ToolSet;

  beforeEach(async () => {
    store = new SqliteStore(openDatabase(":memory:"));
    tools = createToolSet(store, fixedClock("2024-01-10"));
    await tools.dispatch("create_template", {
      id: "run",
      name: "Morning run",
      goals: ["health.run_5k"],
      estimatedCompletionTime: 30,
      recurrenceRule: { frequency: "Weekly", weekdays: ["MON", "wed", "mon"] },
      startDate: "2024-01-01",
      logInstructions: "distance_km",
    });
  });

  it("normalizes the rule and fills defaults", () => {
    expect(store.load("template", "run")).toEqual({
      id: "run",
      name: "Morning run",
      goals: ["health.run_5k"],
      estimatedCompletionTime: 30,
      recurrenceRule: { frequency: "weekly", interval: 1, weekdays: ["mon", "wed"] },
      startDate: "2024-01-01",
      canCompleteLate: true,
      logInstructions: "distance_km",
    });
  });

  it("validates nested rule fields by path", async () => {
    await expect(
      tools.dispatch("create_template", {
        name: "Yearly review",
        recurrenceRule: { frequency: "yearly", interval: 0 },
        startDate: "2024-01-01",
      }),
    ).rejects.toThrow(
      "Invalid arguments for create_template: recurrenceRule.frequency: must be one of: daily, weekly, monthly; " +
        "recurrenceRule.interval: must be >= 1",
    );
  });

  it("rejects an end date before the start date", async () => {
    await expect(tools.dispatch("update_template", { id: "run", endDate: "2023-12-31" })).rejects.toThrow(
      'Template "run" ends (2023-12-31) before it starts (2024-01-01)',
    );
    await expect(tools.dispatch("update_template", { id: "run", recurrenceRule: null })).rejects.toBeInstanceOf(
      DomainError,
    );
  });

  it("generates instances up to today and is idempotent", async () => {
    const first = await tools.dispatch("generate_recurring_tasks", {});
    expect(generatedIds(first)).toEqual(["run_20240101", "run_20240103", "run_20240108", "run_20240110"]);
    expect(first).toMatchObject({ templates: [{ id: "run", lastGeneratedDate: "2024-01-10" }] });

    expect(store.load("task", "run_20240103")).toEqual({
      id: "run_20240103",
      name: "Morning run",
      status: "pending",
      dueDate: "2024-01-03",
      estimatedCompletionTime: 30,
      goals: ["health.run_5k"],
      dependencies: [],
      sourceTemplateId: "run",
      instanceDate: "2024-01-03",
      canCompleteLate: true,
      logInstructions: "distance_km",
    });

    const again = await tools.dispatch("generate_recurring_tasks", {});
    expect(generatedIds(again)).toEqual([]);
    expect(store.list("task", { sourceTemplateId: "run" })).toHaveLength(4);

    const later = await tools.dispatch("generate_recurring_tasks", { templateId: "run", asOf: "2024-01-17" });
    expect(generatedIds(later)).toEqual(["run_20240115", "run_20240117"]);
  });

  it("skips occurrences that already exist", async () => {
    store.save("task", {
      id: "manual",
      name: "Morning run",
      status: "completed",
      goals: [],
      dependencies: [],
      sourceTemplateId: "run",
      instanceDate: "2024-01-03",
      canCompleteLate: true,
    });
    const result = await tools.dispatch("generate_recurring_tasks", { templateId: "run" });
    expect(generatedIds(result)).toEqual(["run_20240101", "run_20240108", "run_20240110"]);
    expect(store.load("template", "run")?.lastGeneratedDate).toBe("2024-01-10");
  });

  it("still generates an occurrence whose id an unrelated task holds", async () => {
    await tools.dispatch("create_task", { id: "run_20240103", name: "Buy running shoes" });

    const result = await tools.dispatch("generate_recurring_tasks", { templateId: "run" });
    const ids = generatedIds(result);
    expect(ids).toHaveLength(4);
    expect(ids[1]).toMatch(/^run_20240103_[A-Za-z0-9_-]{6}$/);

    expect(store.list("task", { sourceTemplateId: "run" }).map(t => t.instanceDate).sort()).toEqual([
      "2024-01-01",
      "2024-01-03",
      "2024-01-08",
      "2024-01-10",
    ]);
    expect(store.load("task", "run_20240103")?.name).toBe("Buy running shoes");
    expect(store.load("task", "run_20240103")?.sourceTemplateId).toBeUndefined();
  });

  it("applies a rule change to future occurrences only", async () => {
    await tools.dispatch("generate_recurring_tasks", {});
    const before = store.list("task", { sourceTemplateId: "run" });
    expect(before).toHaveLength(4);

    const updated = await tools.dispatch("update_template", {
      id: "run",
      recurrenceRule: { frequency: "daily", interval: 2 },
    });
    expect(updated).toMatchObject({
      recurrenceRule: { frequency: "daily", interval: 2, weekdays: [] },
      lastGeneratedDate: "2024-01-10",
    });
    expect(store.load("template", "run")?.lastGeneratedDate).toBe("2024-01-10");
    expect(store.list("task", { sourceTemplateId: "run" })).toEqual(before);

    const later = await tools.dispatch("generate_recurring_tasks", { templateId: "run", asOf: "2024-01-16" });
    expect(generatedIds(later)).toEqual(["run_20240111", "run_20240113", "run_20240115"]);
  });

  it("stops at the end date and leaves other templates alone", async () => {
    await tools.dispatch("create_template", {
      id: "stretch",
      name: "Stretch",
      recurrenceRule: { frequency: "daily" },
      startDate: "2024-01-08",
      endDate: "2024-01-09",
    });
    const result = await tools.dispatch("generate_recurring_tasks", { templateId: "stretch" });
    expect(generatedIds(result)).toEqual(["stretch_20240108", "stretch_20240109"]);
    expect(store.load("template", "run")?.lastGeneratedDate).toBeUndefined();
  });

  it("reports an unknown template without generating anything", async () => {
    await expect(tools.dispatch("generate_recurring_tasks", { templateId: "nope" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(store.list("task")).toEqual([]);
  });

  it("lists by goal and deletes without touching generated tasks", async () => {
    await tools.dispatch("generate_recurring_tasks", { asOf: "2024-01-01" });
    await expect(tools.dispatch("list_templates", { goal: "health.run_5k" })).resolves.toHaveLength(1);
    await expect(tools.dispatch("list_templates", { goal: "career" })).resolves.toEqual([]);

    await expect(tools.dispatch("delete_template", { id: "run" })).resolves.toEqual({ deleted: "run" });
    await expect(tools.dispatch("get_template", { id: "run" })).rejects.toThrow('Template "run" not found');
    expect(store.load("task", "run_20240101")?.sourceTemplateId).toBe("run");
  });
});
