/**
 * OpenAI-Compatible Format Helpers
 *
 * Converting between our LLM message format and the chat completions
 * wire format, in both directions.
 */

import type { LLMMessage, ToolCall } from "../../types.js";

export interface ApiMessage {
  role: LLMMessage["role"];
  content: string | null;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

/**
 * Format LLMMessages into OpenAI-compatible API format.
 * An assistant turn that only calls tools is sent with null content.
 */
export function formatMessagesForAPI(messages: LLMMessage[]): ApiMessage[] {
  return messages.map(m => {
    const msg: ApiMessage = { role: m.role, content: m.content };
    if (m.role === "assistant" && m.tool_calls?.length) {
      msg.tool_calls = m.tool_calls;
      if (!m.content) msg.content = null;
    }
    if (m.role === "tool" && m.tool_call_id) {
      msg.tool_call_id = m.tool_call_id;
    }
    return msg;
  });
}

export interface ParsedCompletion {
  content: string;
  toolCalls: ToolCall[];
  inputTokens: number;
  outputTokens: number;
}

/**
 * Pull the first choice out of a chat completions response body.
 * Throws when the body does not look like one.
 */
export function parseCompletion(body: unknown): ParsedCompletion {
  const choices = isObject(body) ? body.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isObject(first) ? first.message : undefined;
  if (!isObject(message)) {
    throw new Error("Malformed completion response: no message in first choice");
  }

  const rawCalls = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  const toolCalls: ToolCall[] = [];
  for (const call of rawCalls) {
    const fn = isObject(call) ? call.function : undefined;
    if (!isObject(call) || !isObject(fn) || typeof fn.name !== "string") continue;
    toolCalls.push({
      id: typeof call.id === "string" ? call.id : `call_${toolCalls.length}`,
      type: "function",
      function: {
        name: fn.name,
        arguments: typeof fn.arguments === "string" ? fn.arguments : "{}",
      },
    });
  }

  const usage = isObject(body) && isObject(body.usage) ? body.usage : {};
  return {
    content: typeof message.content === "string" ? message.content : "",
    toolCalls,
    inputTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
    outputTokens: typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
