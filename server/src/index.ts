#!/usr/bin/env -S npx tsx
/**
 * Waypoint - Main Entry Point
 *
 * Opens the database, builds the tool catalog, generates recurring tasks
 * that came due, and starts the interactive prompt.
 */

import { loadConfig, loadDotEnv, requireApiKey } from "./config.js";
import { openDatabase } from "./db/index.js";
import { SqliteStore } from "./storage/sqlite-store.js";
import { createToolSet } from "./tools/index.js";
import { OpenAICompatibleClient } from "./llm/providers/openai-compatible/client.js";
import { ChatSession } from "./chat/session.js";
import { formatToolCall, formatToolResult, runCli } from "./cli.js";
import { initServerLogging, createComponentLogger } from "./logging.js";
import { WaypointError } from "./errors.js";

const log = createComponentLogger("main");

async function main(): Promise<void> {
  loadDotEnv();
  const config = loadConfig();
  const logger = initServerLogging({ minLevel: config.logLevel, logDir: config.logDir });

  const client = new OpenAICompatibleClient({
    apiKey: requireApiKey(config),
    baseUrl: config.baseUrl,
    defaultModel: config.model,
  });

  const store = new SqliteStore(openDatabase(config.dbPath));
  const tools = createToolSet(store);
  log.info("Waypoint starting", { model: config.model, baseUrl: config.baseUrl, tools: tools.size });

  const session = new ChatSession({
    client,
    store,
    tools,
    model: config.model,
    maxIterations: config.maxIterations,
    onToolCall: (tool, args) => console.log(formatToolCall(tool, args)),
    onToolResult: (tool, envelope) => console.log(formatToolResult(tool, envelope)),
  });

  const { generated } = session.start();
  if (generated.length > 0) {
    console.log(`Generated ${generated.length} recurring task(s) due up to today.`);
  }

  try {
    await runCli(session);
  } finally {
    store.close();
    await logger.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof WaypointError) {
    console.error(`${error.kind}: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
