import { describe, it, expect } from "vitest";
import { OpenAICompatibleClient } from "./client.js";
import { formatMessagesForAPI, parseCompletion } from "./format.js";

interface Captured {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function stubFetch(status: number, payload: unknown, captured: Captured[]): typeof fetch {
  return (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    captured.push({
      url: String(input),
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    return Promise.resolve(new Response(text, { status }));
  };
}

describe("OpenAICompatibleClient", () => {
  it("posts to chat/completions and maps the reply", async () => {
    const captured: Captured[] = [];
    const client = new OpenAICompatibleClient({
      apiKey: "test-secret",
      baseUrl: "http://llm.test/v1/",
      defaultModel: "test-model",
      fetch: stubFetch(200, {
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: "c1", type: "function", function: { name: "goal_tree", arguments: "{}" } }],
            },
          },
        ],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      }, captured),
    });

    const response = await client.chat([{ role: "user", content: "show my goals" }], { temperature: 0 });

    expect(response).toEqual({
      content: "",
      model: "test-model",
      usage: { inputTokens: 12, outputTokens: 3 },
      toolCalls: [{ id: "c1", type: "function", function: { name: "goal_tree", arguments: "{}" } }],
    });
    expect(captured[0].url).toBe("http://llm.test/v1/chat/completions");
    expect(captured[0].headers.authorization).toBe("Bearer test-secret");
    expect(captured[0].body).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "show my goals" }],
      temperature: 0,
      max_tokens: 4096,
      stream: false,
    });
  });

  it("throws with the status and body on HTTP errors", async () => {
    const client = new OpenAICompatibleClient({
      apiKey: "test-secret",
      baseUrl: "http://llm.test/v1",
      defaultModel: "test-model",
      fetch: stubFetch(429, "slow down", []),
    });
    await expect(client.chat([{ role: "user", content: "hi" }])).rejects.toThrow("LLM API error: 429 slow down");
  });
});

describe("formatMessagesForAPI", () => {
  it("sends null content for tool-only assistant turns and keeps call ids", () => {
    const toolCalls = [{ id: "c1", type: "function" as const, function: { name: "list_tasks", arguments: "{}" } }];
    expect(formatMessagesForAPI([
      { role: "assistant", content: "", tool_calls: toolCalls },
      { role: "tool", content: "[]", tool_call_id: "c1" },
    ])).toEqual([
      { role: "assistant", content: null, tool_calls: toolCalls },
      { role: "tool", content: "[]", tool_call_id: "c1" },
    ]);
  });
});

describe("parseCompletion", () => {
  it("skips malformed tool calls and defaults missing usage", () => {
    expect(parseCompletion({
      choices: [{ message: { content: "ok", tool_calls: [{ id: "x" }, { function: { name: "get_task" } }] } }],
    })).toEqual({
      content: "ok",
      toolCalls: [{ id: "call_0", type: "function", function: { name: "get_task", arguments: "{}" } }],
      inputTokens: 0,
      outputTokens: 0,
    });
  });

  it("rejects bodies without a message", () => {
    expect(() => parseCompletion({ error: "nope" })).toThrow("Malformed completion response");
  });
});
