/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the database schema
 * from any prior version to the current version. Runs right after the
 * database file is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations against the open database.
 * Already-applied migrations are skipped.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;
  const target = migrations.length - 1;

  if (currentVersion >= target) return;

  log.info("Migrating database schema", { from: currentVersion, to: target });

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i <= target; i++) {
    const migrate = migrations[i];
    db.transaction(() => {
      migrate(db);
      stamp.run(i);
    })();
    log.debug("Applied migration", { version: i });
  }
}

export function schemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  return row?.v ?? -1;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // 0 — baseline
  (db) => {
    db.exec(`
      CREATE TABLE goals (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        status TEXT NOT NULL DEFAULT 'active',
        created_at TEXT NOT NULL
      );

      CREATE TABLE templates (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        goals TEXT NOT NULL DEFAULT '[]',
        estimated_completion_time INTEGER,
        recurrence_rule TEXT NOT NULL,
        start_date TEXT NOT NULL,
        end_date TEXT,
        last_generated_date TEXT,
        can_complete_late INTEGER NOT NULL DEFAULT 1,
        log_instructions TEXT,
        created_at TEXT NOT NULL
      );

      CREATE TABLE tasks (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        scheduled_date TEXT,
        due_date TEXT,
        estimated_completion_time INTEGER,
        actual_completion_time INTEGER,
        goals TEXT NOT NULL DEFAULT '[]',
        dependencies TEXT NOT NULL DEFAULT '[]',
        source_template_id TEXT,
        instance_date TEXT,
        can_complete_late INTEGER NOT NULL DEFAULT 1,
        log TEXT,
        log_instructions TEXT,
        created_at TEXT NOT NULL
      );

      CREATE UNIQUE INDEX idx_tasks_instance ON tasks(source_template_id, instance_date);
      CREATE INDEX idx_tasks_status ON tasks(status);
      CREATE INDEX idx_tasks_due ON tasks(due_date);
    `);
  },
];
