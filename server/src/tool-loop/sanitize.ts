/**
 * Message Sanitization
 *
 * Every assistant message with tool_calls must be followed by a tool
 * message for each call id, or chat-completions APIs reject the request
 * with a 400. Repairs in place by inserting placeholder results.
 */

import { createComponentLogger } from "../logging.js";
import type { LLMMessage } from "../llm/types.js";

const log = createComponentLogger("tool-loop.sanitize");

export function sanitizeMessages(messages: LLMMessage[]): void {
  for (let i = 0; i < messages.length; i++) {
    const msg = messages[i];
    if (msg.role !== "assistant" || !msg.tool_calls?.length) continue;

    const expectedIds = new Set(msg.tool_calls.map(tc => tc.id));
    const foundIds = new Set<string>();

    // Results end at the next assistant message
    for (let j = i + 1; j < messages.length; j++) {
      const next = messages[j];
      if (next.role === "assistant") break;
      if (next.role === "tool" && next.tool_call_id) {
        foundIds.add(next.tool_call_id);
        if (foundIds.size === expectedIds.size) break;
      }
    }

    if (foundIds.size < expectedIds.size) {
      const missing = [...expectedIds].filter(id => !foundIds.has(id));
      log.warn(`Patching ${missing.length} missing tool result(s)`, { assistantIdx: i });
      const patches: LLMMessage[] = missing.map(id => ({
        role: "tool",
        content: "(no result: the tool was not run)",
        tool_call_id: id,
      }));
      messages.splice(i + 1 + foundIds.size, 0, ...patches);
    }
  }
}
