import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase } from "./db/index.js";
import { SqliteStore } from "./storage/sqlite-store.js";
import { fixedClock } from "./utils/dates.js";
import { createToolSet } from "./tools/core-registry.js";
import { ChatSession } from "./chat/session.js";
import { createComponentLogger } from "./logging.js";
import type { ILLMClient, LLMResponse } from "./llm/types.js";
import { formatLogEntry, formatToolCall, formatToolResult, handleLine } from "./cli.js";

function sessionWith(responses: LLMResponse[]): ChatSession {
  const client: ILLMClient = {
    name: "scripted",
    chat: () => {
      const next = responses.shift();
      return next ? Promise.resolve(next) : Promise.reject(new Error("model unavailable"));
    },
  };
  const store = new SqliteStore(openDatabase(":memory:"));
  const clock = fixedClock("2024-01-10");
  return new ChatSession({ client, store, tools: createToolSet(store, clock), clock });
}

describe("handleLine", () => {
  let printed: string[];
  const print = (line: string) => {
    printed.push(line);
  };

  beforeEach(() => {
    printed = [];
  });

  it("quits on quit and exit, in any case", async () => {
    const session = sessionWith([]);
    await expect(handleLine("quit", session, print)).resolves.toBe("quit");
    await expect(handleLine("  EXIT ", session, print)).resolves.toBe("quit");
    expect(printed).toEqual(["Goodbye!", "Goodbye!"]);
  });

  it("ignores blank lines", async () => {
    await expect(handleLine("   ", sessionWith([]), print)).resolves.toBe("continue");
    expect(printed).toEqual([]);
  });

  it("prints the assistant's answer", async () => {
    const session = sessionWith([{ content: "You have no goals yet.", model: "test-model" }]);
    await expect(handleLine("what are my goals?", session, print)).resolves.toBe("continue");
    expect(printed).toEqual(["You have no goals yet."]);
    expect(session.transcript).toHaveLength(2);
  });

  it("prints model failures and keeps going", async () => {
    await expect(handleLine("hello", sessionWith([]), print)).resolves.toBe("continue");
    expect(printed).toEqual(["Error: model unavailable"]);
  });

  it("shows recent log entries", async () => {
    const session = sessionWith([]);
    createComponentLogger("cli-test").info("marker entry", { n: 1 });
    await handleLine("logs 1", session, print);
    expect(printed).toHaveLength(1);
    expect(printed[0]).toMatch(/^\d{2}:\d{2}:\d{2} INFO  \[server\.cli-test\] marker entry \{"n":1\}$/);
  });

  it("clears the conversation on reset", async () => {
    const session = sessionWith([{ content: "Hi!", model: "test-model" }]);
    await handleLine("hello", session, print);
    await handleLine("reset", session, print);
    expect(session.transcript).toEqual([]);
    expect(printed.at(-1)).toBe("Started a new conversation.");
  });
});

describe("formatting", () => {
  it("prints tool calls and results on one line each", () => {
    expect(formatToolCall("get_task", { id: "t1" })).toBe('  → get_task {"id":"t1"}');
    expect(formatToolResult("get_task", { ok: true, data: { id: "t1" } })).toBe('  ✓ get_task {"id":"t1"}');
    expect(formatToolResult("get_task", { ok: false, error: { kind: "NotFoundError", message: 'Task "t1" not found' } }))
      .toBe('  ✗ get_task: NotFoundError: Task "t1" not found');
  });

  it("truncates long results", () => {
    const line = formatToolResult("list_tasks", { ok: true, data: "x".repeat(500) });
    expect(line).toHaveLength("  ✓ list_tasks ".length + 240);
    expect(line.endsWith("...")).toBe(true);
  });

  it("formats log entries with time, level and component", () => {
    expect(formatLogEntry({
      timestamp: "2024-01-10T08:30:05.000Z",
      level: "warn",
      component: "server.tools.tasks",
      message: "Task saved with warnings",
      data: { id: "t1" },
    })).toBe('08:30:05 WARN  [server.tools.tasks] Task saved with warnings {"id":"t1"}');
  });
});
