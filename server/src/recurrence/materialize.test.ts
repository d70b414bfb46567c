import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase } from "../db/index.js";
import { SqliteStore } from "../storage/sqlite-store.js";
import type { RecurringTaskTemplate } from "../models/index.js";
import { materializeRecurringTasks } from "./materialize.js";

function template(id: string, extra: Partial<RecurringTaskTemplate> = {}): RecurringTaskTemplate {
  return {
    id,
    name: id,
    goals: ["health"],
    recurrenceRule: { frequency: "daily", interval: 1, weekdays: [] },
    startDate: "2024-01-01",
    canCompleteLate: true,
    ...extra,
  };
}

describe("materializeRecurringTasks", () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(openDatabase(":memory:"));
  });

  it("covers every template and reports each mark", () => {
    store.save("template", template("stretch"));
    store.save("template", template("review", {
      recurrenceRule: { frequency: "monthly", interval: 1, weekdays: [] },
      startDate: "2024-01-31",
    }));
    store.save("template", template("later", { startDate: "2024-02-01" }));

    const result = materializeRecurringTasks(store, "2024-01-02");

    expect(result.generated.map(t => t.id)).toEqual(["stretch_20240101", "stretch_20240102"]);
    expect(result.templates).toEqual([
      { id: "stretch", lastGeneratedDate: "2024-01-02" },
      { id: "review", lastGeneratedDate: undefined },
      { id: "later", lastGeneratedDate: undefined },
    ]);
    expect(store.load("template", "stretch")?.lastGeneratedDate).toBe("2024-01-02");
  });

  it("resumes after the stored mark", () => {
    store.save("template", template("stretch", { lastGeneratedDate: "2024-01-05" }));
    const result = materializeRecurringTasks(store, "2024-01-07");
    expect(result.generated.map(t => t.instanceDate)).toEqual(["2024-01-06", "2024-01-07"]);
  });

  it("leaves the store untouched when a template is unknown", () => {
    expect(() => materializeRecurringTasks(store, "2024-01-02", "nope")).toThrow('Template "nope" not found');
    expect(store.list("task")).toEqual([]);
  });
});
