import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MentorError, StorageError, describeError } from './errors.js';

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    username TEXT PRIMARY KEY,
    password_hash TEXT NOT NULL,
    display_name TEXT,
    email TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS user_preferences (
    username TEXT PRIMARY KEY REFERENCES users(username) ON DELETE CASCADE,
    role TEXT NOT NULL,
    learning_goal TEXT,
    skills TEXT NOT NULL DEFAULT '[]',
    difficulty TEXT,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sessions (
    session_id TEXT PRIMARY KEY,
    username TEXT NOT NULL REFERENCES users(username) ON DELETE CASCADE,
    title TEXT,
    topics TEXT NOT NULL DEFAULT '[]',
    current_topic TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_username
    ON sessions(username, created_at);

  CREATE TABLE IF NOT EXISTS chat_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_chat_history_session
    ON chat_history(session_id, id);
`;

/**
 * Open (or create) the mentor database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDb(file: string): Db {
  const inMemory = file === ':memory:';
  if (!inMemory) {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  let db: Db;
  try {
    db = new Database(file);
    if (!inMemory) db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
  } catch (error: unknown) {
    throw new StorageError(`Could not open database at ${file}`, { cause: error });
  }

  if (!inMemory) console.log('Database initialized at', file);
  return db;
}

/**
 * Run a store operation, turning driver failures into StorageError.
 * Errors that are already part of the taxonomy pass through.
 */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    if (error instanceof MentorError) throw error;
    throw new StorageError(`${operation} failed`, { cause: error });
  }
}

/** ISO-8601 timestamp with millisecond precision. */
export function now(): string {
  return new Date().toISOString();
}

const stringListSchema = z.array(z.string());

/** Decode a JSON string-array column. A malformed value reads as empty. */
export function parseStringList(raw: string, column: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error: unknown) {
    console.warn(`Ignoring malformed ${column} column:`, describeError(error));
    return [];
  }

  const parsed = stringListSchema.safeParse(value);
  if (!parsed.success) {
    console.warn(`Ignoring malformed ${column} column: expected a string array`);
    return [];
  }
  return parsed.data;
}
