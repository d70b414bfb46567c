/**
 * Tool Loop — Execution Engine
 *
 * 1. Sanitize messages
 * 2. Send messages + native tools to the LLM
 * 3. Tool calls → dispatch through the ToolSet
 * 4. Push envelopes back as role:"tool" messages
 * 5. Repeat until a text-only answer or maxIterations
 * 6. On max iterations: one text-only synthesis pass
 */

import { createComponentLogger } from "../logging.js";
import { ValidationError } from "../errors.js";
import type { ILogger } from "@waypoint/shared/logging";
import type { LLMRequestOptions, ToolCall } from "../llm/types.js";
import { fail, isExpectedFailure, ok, serialize, type ToolEnvelope } from "./respond.js";
import { sanitizeMessages } from "./sanitize.js";
import type { ToolCallRecord, ToolLoopOptions, ToolLoopResult } from "./types.js";

const baseLog = createComponentLogger("tool-loop");

const SYNTHESIS_PROMPT =
  "Summarize what you have done so far for the user: what changed and what is still open. " +
  "Do not mention internal limits or iteration counts.";

type ParsedArgs = { ok: true; args: unknown } | { ok: false; envelope: ToolEnvelope };

function parseArguments(tool: string, raw: string, log: ILogger): ParsedArgs {
  if (raw.trim() === "") return { ok: true, args: {} };
  try {
    const args: unknown = JSON.parse(raw);
    return { ok: true, args };
  } catch (err) {
    log.warn("Failed to parse tool arguments", { tool, error: err instanceof Error ? err.message : String(err) });
    const error = new ValidationError(tool, [{ field: "(arguments)", reason: "not valid JSON" }]);
    return { ok: false, envelope: fail(error) };
  }
}

async function executeCall(call: ToolCall, options: ToolLoopOptions, log: ILogger): Promise<ToolCallRecord> {
  const tool = call.function.name;
  const parsed = parseArguments(tool, call.function.arguments, log);
  if (!parsed.ok) return { tool, args: call.function.arguments, envelope: parsed.envelope };

  options.onToolCall?.(tool, parsed.args);
  try {
    const data = await options.tools.dispatch(tool, parsed.args);
    return { tool, args: parsed.args, envelope: ok(data) };
  } catch (err) {
    if (isExpectedFailure(err)) {
      log.info("Tool call rejected", { tool, error: err instanceof Error ? err.message : String(err) });
    } else {
      log.error("Tool failed unexpectedly", err, { tool });
    }
    return { tool, args: parsed.args, envelope: fail(err) };
  }
}

export async function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopResult> {
  const { client, messages, maxIterations, model, maxTokens, temperature } = options;
  const log = options.correlationId ? baseLog.child({ correlationId: options.correlationId }) : baseLog;
  const llmOptions: LLMRequestOptions = { model, maxTokens, temperature, tools: options.tools.toNativeTools() };

  const toolCallsMade: ToolCallRecord[] = [];
  let finalContent = "";
  let iterations = 0;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    iterations = iteration;
    sanitizeMessages(messages);

    const response = await client.chat(messages, llmOptions);
    const toolCalls = response.toolCalls ?? [];
    log.debug(`LLM response (iteration ${iteration})`, {
      model: response.model,
      contentLength: response.content.length,
      tools: toolCalls.map(c => c.function.name),
    });

    if (toolCalls.length === 0) {
      finalContent = response.content;
      messages.push({ role: "assistant", content: finalContent });
      return { iterations, finalContent, completed: true, toolCallsMade };
    }

    messages.push({ role: "assistant", content: response.content, tool_calls: toolCalls });

    for (const call of toolCalls) {
      const record = await executeCall(call, options, log);
      toolCallsMade.push(record);
      options.onToolResult?.(record.tool, record.envelope);
      messages.push({ role: "tool", content: serialize(record.envelope), tool_call_id: call.id });
    }
  }

  // ── Synthesis pass: max iterations hit without a final response ──
  log.warn("Tool loop hit max iterations, running synthesis pass", { maxIterations });
  messages.push({ role: "user", content: SYNTHESIS_PROMPT });
  sanitizeMessages(messages);
  const synthesis = await client.chat(messages, { model, maxTokens, temperature });
  finalContent = synthesis.content || "I made several changes but could not produce a summary.";
  messages.push({ role: "assistant", content: finalContent });

  return { iterations, finalContent, completed: false, toolCallsMade };
}
