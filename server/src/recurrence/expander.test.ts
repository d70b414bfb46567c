import { describe, it, expect } from "vitest";
import { dueDates, generate, instanceId } from "./expander.js";
import type { RecurringTaskTemplate, RecurrenceRule } from "../models/index.js";

function template(rule: Partial<RecurrenceRule>, extra: Partial<RecurringTaskTemplate> = {}): RecurringTaskTemplate {
  return {
    id: "tmpl_run",
    name: "Run",
    goals: ["health.run_5k"],
    recurrenceRule: { frequency: "daily", interval: 1, weekdays: [], ...rule },
    startDate: "2024-01-01",
    canCompleteLate: true,
    ...extra,
  };
}

describe("generate — weekly", () => {
  it("produces Monday and Wednesday occurrences and advances the mark", () => {
    const t = template({ frequency: "weekly", weekdays: ["mon", "wed"] });
    const tasks = generate(t, "2024-01-10");
    expect(tasks.map(task => task.instanceDate)).toEqual(["2024-01-01", "2024-01-03", "2024-01-08", "2024-01-10"]);
    expect(t.lastGeneratedDate).toBe("2024-01-10");
  });

  it("is idempotent for the same or an earlier asOf", () => {
    const t = template({ frequency: "weekly", weekdays: ["mon", "wed"] });
    generate(t, "2024-01-10");
    expect(generate(t, "2024-01-10")).toEqual([]);
    expect(generate(t, "2024-01-05")).toEqual([]);
    expect(t.lastGeneratedDate).toBe("2024-01-10");
  });

  it("uses the start date's weekday when none are given and skips off weeks", () => {
    const t = template({ frequency: "weekly", interval: 2 }, { startDate: "2024-01-03" });
    expect(dueDates(t, "2024-01-31")).toEqual(["2024-01-03", "2024-01-17", "2024-01-31"]);
  });

  it("never produces dates before the start date within the first week", () => {
    const t = template({ frequency: "weekly", weekdays: ["mon", "fri"] }, { startDate: "2024-01-03" });
    expect(dueDates(t, "2024-01-09")).toEqual(["2024-01-05", "2024-01-08"]);
  });
});

describe("generate — daily", () => {
  it("steps by the interval from the start date", () => {
    const t = template({ interval: 2 });
    expect(generate(t, "2024-01-07").map(task => task.dueDate)).toEqual([
      "2024-01-01",
      "2024-01-03",
      "2024-01-05",
      "2024-01-07",
    ]);
    expect(generate(t, "2024-01-10").map(task => task.dueDate)).toEqual(["2024-01-09"]);
    expect(t.lastGeneratedDate).toBe("2024-01-09");
  });

  it("handles years below 100", () => {
    const t = template({}, { startDate: "0050-01-01" });
    expect(dueDates(t, "0050-01-03")).toEqual(["0050-01-01", "0050-01-02", "0050-01-03"]);
  });

  it("stops at the end date", () => {
    const t = template({}, { endDate: "2024-01-03" });
    expect(dueDates(t, "2024-01-10")).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
  });

  it("yields nothing before the start date and leaves the mark alone", () => {
    const t = template({}, { startDate: "2024-02-01" });
    expect(generate(t, "2024-01-15")).toEqual([]);
    expect(t.lastGeneratedDate).toBeUndefined();
  });
});

describe("generate — monthly", () => {
  it("clamps to the last day of shorter months", () => {
    const t = template({ frequency: "monthly" }, { startDate: "2024-01-31" });
    expect(dueDates(t, "2024-05-01")).toEqual(["2024-01-31", "2024-02-29", "2024-03-31", "2024-04-30"]);
  });

  it("honours the interval", () => {
    const t = template({ frequency: "monthly", interval: 3 }, { startDate: "2024-01-15" });
    expect(dueDates(t, "2024-12-31")).toEqual(["2024-01-15", "2024-04-15", "2024-07-15", "2024-10-15"]);
  });
});

describe("instances", () => {
  it("copy the template's fields", () => {
    const t = template({}, { estimatedCompletionTime: 30, canCompleteLate: false, logInstructions: "distance in km" });
    const [task] = generate(t, "2024-01-01");
    expect(task).toEqual({
      id: "tmpl_run_20240101",
      name: "Run",
      status: "pending",
      dueDate: "2024-01-01",
      goals: ["health.run_5k"],
      dependencies: [],
      sourceTemplateId: "tmpl_run",
      instanceDate: "2024-01-01",
      canCompleteLate: false,
      estimatedCompletionTime: 30,
      logInstructions: "distance in km",
    });
  });

  it("do not share the goals list with the template", () => {
    const t = template({});
    const [task] = generate(t, "2024-01-01");
    task.goals.push("other");
    expect(t.goals).toEqual(["health.run_5k"]);
  });

  it("have stable ids", () => {
    expect(instanceId("t1", "2024-12-05")).toBe("t1_20241205");
  });
});
