/**
 * CLI Interface — Interactive readline prompt for local terminal usage.
 *
 * Anything that is not a command goes to the assistant. Commands:
 *   logs [n]   recent in-memory log entries (default 20)
 *   reset      start a fresh conversation
 *   help
 *   quit / exit
 */

import * as readline from "readline";
import type { LogEntry } from "@waypoint/shared/logging";
import type { ChatSession } from "./chat/session.js";
import { getLogBuffer } from "./logging.js";
import type { ToolEnvelope } from "./tool-loop/respond.js";

export type Print = (line: string) => void;

const HELP = [
  "Talk to the assistant in plain language, e.g. \"add a task to renew my passport by Friday\".",
  "Commands: logs [n], reset, help, quit",
].join("\n");

const MAX_RESULT_CHARS = 240;

// ============================================
// FORMATTING
// ============================================

export function formatToolCall(tool: string, args: unknown): string {
  return `  → ${tool} ${JSON.stringify(args ?? {})}`;
}

export function formatToolResult(tool: string, envelope: ToolEnvelope): string {
  if (!envelope.ok) {
    return `  ✗ ${tool}: ${envelope.error.kind}: ${envelope.error.message}`;
  }
  const data = JSON.stringify(envelope.data) ?? "null";
  const shown = data.length > MAX_RESULT_CHARS ? `${data.slice(0, MAX_RESULT_CHARS - 3)}...` : data;
  return `  ✓ ${tool} ${shown}`;
}

export function formatLogEntry(entry: LogEntry): string {
  const time = entry.timestamp.slice(11, 19);
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  const error = entry.error ? ` (${entry.error.message})` : "";
  return `${time} ${entry.level.toUpperCase().padEnd(5)} [${entry.component}] ${entry.message}${data}${error}`;
}

// ============================================
// COMMANDS
// ============================================

export type LineOutcome = "continue" | "quit";

/** Handle one line of input. Errors from the assistant are printed, not thrown. */
export async function handleLine(line: string, session: ChatSession, print: Print): Promise<LineOutcome> {
  const trimmed = line.trim();
  if (!trimmed) return "continue";

  const [command, arg] = trimmed.split(/\s+/, 2);
  switch (command.toLowerCase()) {
    case "quit":
    case "exit":
      print("Goodbye!");
      return "quit";

    case "help":
      print(HELP);
      return "continue";

    case "reset":
      session.reset();
      print("Started a new conversation.");
      return "continue";

    case "logs": {
      const count = arg === undefined ? 20 : Number.parseInt(arg, 10);
      const entries = getLogBuffer().getLast(Number.isNaN(count) || count < 1 ? 20 : count);
      if (entries.length === 0) print("No log entries yet.");
      for (const entry of entries) print(formatLogEntry(entry));
      return "continue";
    }
  }

  try {
    const result = await session.send(trimmed);
    print(result.finalContent || "(no answer)");
  } catch (error) {
    print(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  return "continue";
}

// ============================================
// PROMPT LOOP
// ============================================

/** Run the REPL until quit/exit or end of input. */
export function runCli(session: ChatSession, print: Print = line => console.log(line)): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  return new Promise(resolve => {
    rl.on("close", () => resolve());

    const promptUser = (): void => {
      rl.question("\n> ", input => {
        handleLine(input, session, print).then(outcome => {
          if (outcome === "quit") rl.close();
          else promptUser();
        }, (error: unknown) => {
          print(`Error: ${error instanceof Error ? error.message : String(error)}`);
          promptUser();
        });
      });
    };

    print(HELP);
    promptUser();
  });
}
