/**
 * Chat Session
 *
 * One conversation with the assistant. Holds the message history between
 * turns and runs the tool loop for each user message. The system prompt
 * is not stored in the history; it is rebuilt for every turn.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import type { ILLMClient, LLMMessage } from "../llm/types.js";
import { materializeRecurringTasks, type MaterializeResult } from "../recurrence/materialize.js";
import type { Store } from "../storage/interface.js";
import { runToolLoop, type ToolLoopOptions, type ToolLoopResult } from "../tool-loop/index.js";
import type { ToolSet } from "../tools/tool-set.js";
import { systemClock, type Clock } from "../utils/dates.js";
import { buildSystemPrompt } from "./system-prompt.js";

const log = createComponentLogger("chat");

export interface ChatSessionOptions {
  client: ILLMClient;
  store: Store;
  tools: ToolSet;
  clock?: Clock;
  model?: string;
  /** Tool-calling rounds per user message (default: 8) */
  maxIterations?: number;
  onToolCall?: ToolLoopOptions["onToolCall"];
  onToolResult?: ToolLoopOptions["onToolResult"];
}

export class ChatSession {
  private history: LLMMessage[] = [];
  private readonly clock: Clock;

  constructor(private readonly options: ChatSessionOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /** Generate the recurring tasks that came due since the last run. */
  start(): MaterializeResult {
    const result = materializeRecurringTasks(this.options.store, this.clock.today());
    log.info("Session started", { generated: result.generated.length, templates: result.templates.length });
    return result;
  }

  async send(text: string): Promise<ToolLoopResult> {
    const correlationId = nanoid(8);
    const turnLog = log.child({ correlationId });
    turnLog.debug("Turn started", { historyLength: this.history.length });

    const system: LLMMessage = {
      role: "system",
      content: buildSystemPrompt(this.clock.today(), this.options.tools.describeAll()),
    };
    const messages: LLMMessage[] = [system, ...this.history, { role: "user", content: text }];

    const result = await runToolLoop({
      client: this.options.client,
      messages,
      tools: this.options.tools,
      model: this.options.model,
      maxIterations: this.options.maxIterations ?? 8,
      correlationId,
      onToolCall: this.options.onToolCall,
      onToolResult: this.options.onToolResult,
    });

    // Only a completed turn joins the history; a failed LLM call leaves it as it was
    this.history = messages.slice(1);
    turnLog.debug("Turn finished", { iterations: result.iterations, toolCalls: result.toolCallsMade.length });
    return result;
  }

  get transcript(): readonly LLMMessage[] {
    return this.history;
  }

  reset(): void {
    this.history = [];
  }
}
