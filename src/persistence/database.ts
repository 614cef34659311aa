import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = path || process.env.DATABASE_PATH || join(__dirname, '../../data', 'sleep-metrics.db');
  db = openDatabase(dbPath);
  return db;
}

/** Open (and migrate) a database without touching the shared connection. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  runMigrations(database);

  return database;
}

export function runMigrations(database: Database.Database): void {
  logger.debug('Running database migrations');

  // One row per user and night
  database.exec(`
    CREATE TABLE IF NOT EXISTS sleep_records (
      user_id TEXT NOT NULL,
      date TEXT NOT NULL,
      minutes_asleep INTEGER NOT NULL,
      minutes_awake REAL NOT NULL,
      efficiency_pct REAL NOT NULL,
      deep_minutes REAL NOT NULL,
      light_minutes REAL NOT NULL,
      rem_minutes REAL NOT NULL,
      wake_minutes REAL NOT NULL,
      hrv_ms REAL,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (user_id, date)
    );
  `);

  // Intraday heart rate, timestamps in epoch milliseconds
  database.exec(`
    CREATE TABLE IF NOT EXISTS heart_rate_samples (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      timestamp_ms INTEGER NOT NULL,
      bpm REAL NOT NULL,
      signal_confidence TEXT NOT NULL,
      motion_level TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_heart_rate_user_time ON heart_rate_samples(user_id, timestamp_ms);
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS sleep_intervals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      start_ms INTEGER NOT NULL,
      end_ms INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_sleep_intervals_user ON sleep_intervals(user_id, start_ms);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
