// src/cache-store.ts
import { openCacheDb, type Database, type Statement } from "./db.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./util.js";

export interface CacheEntry {
  path: string;
  owner: string;
  visible: boolean;
  fingerprint: string;
}

export class StoreUnavailableError extends Error {
  constructor(
    readonly dbPath: string,
    cause: unknown,
  ) {
    super(`cannot open launcher cache ${dbPath}: ${errorMessage(cause)}`);
    this.name = "StoreUnavailableError";
  }
}

function column(row: object, name: string): unknown {
  return name in row ? Reflect.get(row, name) : undefined;
}

/**
 * Convert a raw `cache` row. Rows written by older tools may carry NULLs;
 * those come back as null and are skipped by callers.
 */
export function rowToEntry(row: unknown): CacheEntry | null {
  if (row == null || typeof row !== "object") return null;
  const path = column(row, "path");
  const owner = column(row, "package");
  const show = column(row, "show");
  const fingerprint = column(row, "fingerprint");
  if (typeof path !== "string" || !path) return null;
  if (typeof fingerprint !== "string" || !fingerprint) return null;
  return {
    path,
    owner: typeof owner === "string" ? owner : "",
    visible: show === 1 || show === 1n,
    fingerprint,
  };
}

export class CacheStore {
  private readonly removeStmt: Statement;
  private readonly insertStmt: Statement;
  private readonly getStmt: Statement;
  private readonly allStmt: Statement;
  private readonly countStmt: Statement;
  private closed = false;

  constructor(
    private readonly db: Database,
    private readonly logger: Logger,
  ) {
    this.removeStmt = db.prepare(`DELETE FROM cache WHERE path = ?`);
    this.insertStmt = db.prepare(
      `INSERT INTO cache (path, package, show, fingerprint) VALUES (?, ?, ?, ?)`,
    );
    this.getStmt = db.prepare(
      `SELECT path, package, show, fingerprint FROM cache WHERE path = ?`,
    );
    this.allStmt = db.prepare(
      `SELECT path, package, show, fingerprint FROM cache ORDER BY rowid`,
    );
    this.countStmt = db.prepare(`SELECT COUNT(*) AS n FROM cache`);
  }

  static open(dbPath: string, logger: Logger): CacheStore {
    logger.debug("opening launcher cache", { dbPath });
    let db: Database;
    try {
      db = openCacheDb(dbPath);
    } catch (err) {
      throw new StoreUnavailableError(dbPath, err);
    }
    try {
      return new CacheStore(db, logger);
    } catch (err) {
      db.close();
      throw new StoreUnavailableError(dbPath, err);
    }
  }

  /** Delete the row for `path`; a no-op if there is none. */
  removeByPath(path: string): boolean {
    try {
      this.removeStmt.run(path);
      return true;
    } catch (err) {
      this.logger.warn("SQL error removing entry", {
        path,
        error: errorMessage(err),
      });
      return false;
    }
  }

  /**
   * Replace whatever row exists for `entry.path`. The delete and the insert
   * run as two statements; a crash in between leaves the entry absent until
   * the next rescan.
   */
  upsert(entry: CacheEntry): boolean {
    if (!this.removeByPath(entry.path)) return false;
    try {
      this.insertStmt.run(
        entry.path,
        entry.owner,
        entry.visible ? 1 : 0,
        entry.fingerprint,
      );
      return true;
    } catch (err) {
      this.logger.warn("SQL error adding entry", {
        path: entry.path,
        error: errorMessage(err),
      });
      return false;
    }
  }

  get(path: string): CacheEntry | null {
    try {
      return rowToEntry(this.getStmt.get(path));
    } catch (err) {
      this.logger.warn("SQL error reading entry", {
        path,
        error: errorMessage(err),
      });
      return null;
    }
  }

  all(): CacheEntry[] {
    const out: CacheEntry[] = [];
    for (const row of this.rows()) {
      const entry = rowToEntry(row);
      if (entry) out.push(entry);
    }
    return out;
  }

  count(): number {
    try {
      const row = this.countStmt.get();
      const n = row != null && typeof row === "object" ? column(row, "n") : 0;
      return typeof n === "number" ? n : Number(n ?? 0);
    } catch (err) {
      this.logger.warn("SQL error counting entries", {
        error: errorMessage(err),
      });
      return 0;
    }
  }

  /**
   * Visit every row in storage order. The row set is read up front so the
   * callback may remove or upsert rows while the pass is running. Returns
   * the number of rows handed to the callback.
   */
  async forEach(
    callback: (entry: CacheEntry) => void | Promise<void>,
  ): Promise<number> {
    let visited = 0;
    for (const row of this.rows()) {
      const entry = rowToEntry(row);
      if (!entry) {
        this.logger.warn("skipping malformed cache row", {
          row: JSON.stringify(row),
        });
        continue;
      }
      await callback(entry);
      visited++;
    }
    return visited;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private rows(): unknown[] {
    try {
      return this.allStmt.all();
    } catch (err) {
      this.logger.warn("SQL error listing entries", {
        error: errorMessage(err),
      });
      return [];
    }
  }
}
