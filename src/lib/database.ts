import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { SCHEMA_SQL } from "./schema";

export type SqliteDatabase = Database.Database;

const IN_MEMORY = ":memory:";

export function openDatabase(filename: string): SqliteDatabase {
  if (filename !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  if (filename !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  // LIKE and lower() only fold ASCII; text search goes through this instead.
  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value
  );
  db.exec(SCHEMA_SQL);
  return db;
}

/**
 * Runs `work` inside a single transaction. Anything thrown rolls the whole
 * transaction back before the error reaches the caller.
 */
export function withTransaction<T>(db: SqliteDatabase, work: () => T): T {
  return db.transaction(work)();
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}

export function nowIso(): string {
  return new Date().toISOString();
}
