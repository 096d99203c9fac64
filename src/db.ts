import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";

export type Database = BetterSqlite3.Database;
export type Statement = BetterSqlite3.Statement;

const PRAGMAS = [
  "busy_timeout = 5000",
  // a crash may lose the last write but never the table structure
  "synchronous = OFF",
];

const IN_MEMORY = ":memory:";

export function openCacheDb(dbPath: string): Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new BetterSqlite3(dbPath);
  try {
    for (const pragma of PRAGMAS) {
      db.pragma(pragma);
    }

    // no primary key: uniqueness comes from delete-before-insert
    db.exec(`
    CREATE TABLE IF NOT EXISTS cache (
      path        TEXT,
      package     TEXT,
      show        INTEGER,
      fingerprint TEXT
    );
  `);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}
