/**
 * Configuration
 *
 * Environment variables, with defaults for everything but the API key.
 * `.env` in the working directory is loaded by loadDotEnv(); loadConfig
 * itself only reads the env object it is given.
 */

import { config } from "dotenv";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "@waypoint/shared/logging";

export interface WaypointConfig {
  /** Empty when unset; chat refuses to start without it */
  apiKey: string;
  baseUrl: string;
  model: string;
  dbPath: string;
  logLevel: LogLevel;
  logDir: string;
  maxIterations: number;
}

export const DEFAULTS = {
  baseUrl: "https://api.openai.com/v1",
  model: "gpt-4o-mini",
  dbPath: "~/.waypoint/waypoint.db",
  logLevel: "info",
  logDir: "~/.waypoint/logs",
  maxIterations: 8,
} as const;

export function loadDotEnv(path = resolve(process.cwd(), ".env")): void {
  config({ path });
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function positiveInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WaypointConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || DEFAULTS.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent; got "${logLevel}"`);
  }

  return {
    apiKey: env.WAYPOINT_API_KEY?.trim() ?? "",
    baseUrl: env.WAYPOINT_BASE_URL?.trim() || DEFAULTS.baseUrl,
    model: env.WAYPOINT_MODEL?.trim() || DEFAULTS.model,
    dbPath: expandHome(env.WAYPOINT_DB_PATH?.trim() || DEFAULTS.dbPath),
    logLevel,
    logDir: expandHome(env.LOG_DIR?.trim() || DEFAULTS.logDir),
    maxIterations: positiveInteger("WAYPOINT_MAX_ITERATIONS", env.WAYPOINT_MAX_ITERATIONS, DEFAULTS.maxIterations),
  };
}

/** The API key, or a ConfigError explaining how to set it. */
export function requireApiKey(config: WaypointConfig): string {
  if (!config.apiKey) {
    throw new ConfigError("WAYPOINT_API_KEY is not set. Add it to your environment or to a .env file.");
  }
  return config.apiKey;
}
