import { describe, it, expect, beforeEach } from "vitest";
import { openDatabase } from "../db/index.js";
import { SqliteStore } from "../storage/sqlite-store.js";
import { fixedClock } from "../utils/dates.js";
import { defineSchema } from "../schema/index.js";
import { getLogBuffer } from "../logging.js";
import { createToolSet } from "../tools/core-registry.js";
import { Tool } from "../tools/tool.js";
import { ToolSet } from "../tools/tool-set.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse, ToolCall } from "../llm/types.js";
import { runToolLoop } from "./loop.js";
import { sanitizeMessages } from "./sanitize.js";
import type { ToolEnvelope } from "./respond.js";

/** Replays canned responses and records what it was sent. */
class ScriptedClient implements ILLMClient {
  readonly name = "scripted";
  readonly requests: Array<{ messages: LLMMessage[]; options?: LLMRequestOptions }> = [];

  constructor(private readonly script: LLMResponse[]) {}

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    this.requests.push({ messages: [...messages], options });
    const next = this.script.shift();
    if (!next) return Promise.reject(new Error("script exhausted"));
    return Promise.resolve(next);
  }
}

function call(id: string, name: string, args: string): ToolCall {
  return { id, type: "function", function: { name, arguments: args } };
}

function text(content: string): LLMResponse {
  return { content, model: "test-model" };
}

function calls(...toolCalls: ToolCall[]): LLMResponse {
  return { content: "", model: "test-model", toolCalls };
}

describe("runToolLoop", () => {
  let store: SqliteStore;
  let tools: ToolSet;
  let messages: LLMMessage[];

  beforeEach(() => {
    store = new SqliteStore(openDatabase(":memory:"));
    tools = createToolSet(store, fixedClock("2024-01-10"));
    messages = [
      { role: "system", content: "You are a planner." },
      { role: "user", content: "Track my health goal" },
    ];
  });

  it("returns a text-only answer after one call", async () => {
    const client = new ScriptedClient([text("What would you like to track?")]);
    const result = await runToolLoop({ client, messages, tools, maxIterations: 4 });

    expect(result).toEqual({
      iterations: 1,
      finalContent: "What would you like to track?",
      completed: true,
      toolCallsMade: [],
    });
    expect(messages.at(-1)).toEqual({ role: "assistant", content: "What would you like to track?" });
    expect(client.requests[0].options?.tools).toHaveLength(20);
  });

  it("dispatches tool calls and sends envelopes back", async () => {
    const client = new ScriptedClient([
      calls(call("c1", "create_goal", '{"id":"health","name":"Health"}')),
      text("Created your health goal."),
    ]);
    const seen: string[] = [];
    const result = await runToolLoop({
      client,
      messages,
      tools,
      maxIterations: 4,
      onToolCall: tool => seen.push(`call:${tool}`),
      onToolResult: (tool, envelope) => seen.push(`result:${tool}:${envelope.ok}`),
    });

    expect(result.iterations).toBe(2);
    expect(result.finalContent).toBe("Created your health goal.");
    expect(seen).toEqual(["call:create_goal", "result:create_goal:true"]);
    expect(store.load("goal", "health")).toEqual({ id: "health", name: "Health", status: "active" });

    const toolMessage = client.requests[1].messages.at(-1);
    expect(toolMessage).toEqual({
      role: "tool",
      tool_call_id: "c1",
      content: '{"ok":true,"data":{"id":"health","name":"Health","status":"active"}}',
    });
  });

  it("reports failures as error envelopes and keeps going", async () => {
    const client = new ScriptedClient([
      calls(
        call("c1", "create_goal", "{not json"),
        call("c2", "make_coffee", "{}"),
        call("c3", "get_goal", '{"id":"nope"}'),
      ),
      text("Sorry about that."),
    ]);
    const result = await runToolLoop({ client, messages, tools, maxIterations: 4 });
    const envelopes: ToolEnvelope[] = result.toolCallsMade.map(r => r.envelope);

    expect(envelopes).toEqual([
      {
        ok: false,
        error: {
          kind: "ValidationError",
          message: "Invalid arguments for create_goal: (arguments): not valid JSON",
          issues: [{ field: "(arguments)", reason: "not valid JSON" }],
        },
      },
      {
        ok: false,
        error: { kind: "UnknownToolError", message: expect.stringContaining('Unknown tool "make_coffee"') },
      },
      { ok: false, error: { kind: "NotFoundError", message: 'Goal "nope" not found' } },
    ]);
    expect(result.completed).toBe(true);
    expect(client.requests[1].messages.filter(m => m.role === "tool")).toHaveLength(3);
  });

  it("hides unexpected errors behind InternalError and logs them", async () => {
    const broken = new ToolSet([
      new Tool("explode", () => {
        throw new Error("disk full");
      }, defineSchema("explode", {}), "Fails.", { category: "tasks" }),
    ]);
    const client = new ScriptedClient([calls(call("c1", "explode", "")), text("Something went wrong.")]);
    const result = await runToolLoop({ client, messages, tools: broken, maxIterations: 2 });

    expect(result.toolCallsMade[0].envelope).toEqual({
      ok: false,
      error: { kind: "InternalError", message: "disk full" },
    });
    const entry = getLogBuffer().getEntries().filter(e => e.level === "error").at(-1);
    expect(entry?.message).toBe("Tool failed unexpectedly");
    expect(entry?.error?.message).toBe("disk full");
  });

  it("runs a text-only synthesis pass when iterations run out", async () => {
    const client = new ScriptedClient([
      calls(call("c1", "list_goals", "{}")),
      calls(call("c2", "list_goals", "{}")),
      text("Here is where things stand."),
    ]);
    const result = await runToolLoop({ client, messages, tools, maxIterations: 2 });

    expect(result).toMatchObject({ iterations: 2, completed: false, finalContent: "Here is where things stand." });
    expect(result.toolCallsMade).toHaveLength(2);
    expect(client.requests).toHaveLength(3);
    expect(client.requests[2].options?.tools).toBeUndefined();
    expect(client.requests[2].messages.at(-1)?.role).toBe("user");
  });
});

describe("sanitizeMessages", () => {
  it("inserts placeholders for tool calls without results", () => {
    const messages: LLMMessage[] = [
      { role: "assistant", content: "", tool_calls: [call("a", "list_goals", "{}"), call("b", "goal_tree", "{}")] },
      { role: "tool", content: "{}", tool_call_id: "a" },
      { role: "user", content: "never mind" },
    ];
    sanitizeMessages(messages);

    expect(messages.map(m => `${m.role}:${m.tool_call_id ?? ""}`)).toEqual(["assistant:", "tool:a", "tool:b", "user:"]);
  });
});
