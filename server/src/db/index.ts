/**
 * Database Manager
 *
 * Opens the SQLite file that holds goals, tasks and recurring templates,
 * and brings its schema up to date.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { runMigrations } from "./migrations.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

export const IN_MEMORY = ":memory:";

/**
 * Open (creating if needed) the database at `dbPath` and run migrations.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  runMigrations(db);

  log.info("Database ready", { path: dbPath });
  return db;
}

export { runMigrations, schemaVersion } from "./migrations.js";
