/**
 * Database Connection Module
 *
 * Provides SQLite database connections using better-sqlite3 and Drizzle ORM.
 *
 * Design decisions:
 * - Uses better-sqlite3 for synchronous, fast SQLite access
 * - Each caller owns its handle; there is no module-level connection
 * - WAL mode enabled for better concurrent read performance
 * - Foreign keys enabled so alert back-references are nulled on record purge
 */

import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import * as schema from "./schema";

/**
 * Anything repositories can run queries against: the database itself or a
 * transaction opened on it.
 */
export type InspectionDatabase = BaseSQLiteDatabase<"sync", Database.RunResult, typeof schema>;

export interface DatabaseHandle {
  db: BetterSQLite3Database<typeof schema>;
  sqlite: Database.Database;
  close: () => void;
}

/**
 * Open a database connection and make sure the tables exist.
 *
 * @param dbPath - SQLite file path, or ":memory:" for an isolated in-memory database
 */
export function openDatabase(dbPath: string = getDefaultDbPath()): DatabaseHandle {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);

  // Enable WAL mode for better concurrent read performance
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");

  initializeDatabase(sqlite);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}

/**
 * Default database path: ~/.inspection/inspection.db
 */
export function getDefaultDbPath(): string {
  return path.join(os.homedir(), ".inspection", "inspection.db");
}

/**
 * Initialize database tables
 * Creates tables if they don't exist using raw SQL
 *
 * Note: provisioning and migrations are handled outside the server.
 * This is a convenience for development and testing.
 */
export function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS task_queue (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id TEXT UNIQUE NOT NULL,
      station_id INTEGER NOT NULL,
      task_type INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      params TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL,
      assigned_at INTEGER,
      completed_at INTEGER,
      error TEXT
    )
  `);

  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_task_queue_status ON task_queue (status)`);
  sqlite.exec(`
    CREATE INDEX IF NOT EXISTS idx_task_queue_station_task
    ON task_queue (station_id, task_type)
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS task_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id TEXT NOT NULL,
      task_type INTEGER NOT NULL,
      station_id INTEGER NOT NULL,
      image_ref TEXT,
      result_data TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'normal',
      confidence REAL,
      processing_time REAL,
      timestamp INTEGER NOT NULL
    )
  `);

  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_task_records_task_type ON task_records (task_type)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_task_records_station_id ON task_records (station_id)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_task_records_timestamp ON task_records (timestamp)`);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS alert_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      record_id INTEGER REFERENCES task_records (id) ON DELETE SET NULL,
      level TEXT NOT NULL,
      alert_type TEXT NOT NULL,
      message TEXT NOT NULL,
      handled INTEGER NOT NULL DEFAULT 0,
      timestamp INTEGER NOT NULL
    )
  `);

  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_alert_log_level ON alert_log (level)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_alert_log_handled ON alert_log (handled)`);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS cart_status (
      id INTEGER PRIMARY KEY,
      online INTEGER NOT NULL DEFAULT 0,
      current_station INTEGER,
      mode TEXT NOT NULL DEFAULT 'idle',
      battery_level INTEGER,
      last_activity INTEGER,
      timestamp INTEGER NOT NULL
    )
  `);
}

// Re-export schema for convenience
export { schema };
