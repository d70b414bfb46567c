/**
 * Tool Loop — Shared Types
 *
 * The loop drives one user turn: the model may call tools any number of
 * times (bounded by maxIterations) before it answers in plain text.
 */

import type { ILLMClient, LLMMessage } from "../llm/types.js";
import type { ToolSet } from "../tools/tool-set.js";
import type { ToolEnvelope } from "./respond.js";

export interface ToolLoopOptions {
  client: ILLMClient;
  /** The full conversation so far; the loop appends to it in place. */
  messages: LLMMessage[];
  tools: ToolSet;
  maxIterations: number;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Attached to every log entry the loop writes for this turn. */
  correlationId?: string;

  // ── Callbacks ──
  /** Called before a tool runs, with the arguments as the model sent them. */
  onToolCall?: (tool: string, args: unknown) => void;
  /** Called with the envelope that is sent back to the model. */
  onToolResult?: (tool: string, envelope: ToolEnvelope) => void;
}

export interface ToolCallRecord {
  tool: string;
  args: unknown;
  envelope: ToolEnvelope;
}

export interface ToolLoopResult {
  /** LLM calls made, not counting the synthesis pass. */
  iterations: number;
  finalContent: string;
  /** False when maxIterations ran out and the answer came from the synthesis pass. */
  completed: boolean;
  toolCallsMade: ToolCallRecord[];
}
