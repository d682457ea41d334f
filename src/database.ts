// ============================================================================
// Feed Image Cache — Storage Engine (better-sqlite3)
// ============================================================================

import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import { BUSY_TIMEOUT_MS, FEED_CACHE_TABLE } from "./constants.js";
import { FeedCacheError, OpenError, QueryError, SchemaError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { FeedImageCacheRepo } from "./repositories/index.js";
import { applySchema } from "./schema.js";
import { fromReferenceSeconds, toReferenceSeconds } from "./time.js";
import type { CacheSnapshot, FeedImageCacheRow, FeedImageRecord } from "./types.js";

/**
 * Owns the single SQLite connection behind a feed cache and translates
 * records to and from rows of the FeedImageCache table.
 *
 * better-sqlite3 runs every statement synchronously, so calls on one engine
 * never interleave. The engine does not guard against other processes
 * writing the same file.
 */
export class StorageEngine {
  private readonly repo: FeedImageCacheRepo;

  private constructor(private readonly db: DatabaseType, readonly path: string) {
    this.repo = new FeedImageCacheRepo(db);
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Open (creating if absent) the database at `dbPath`. Nothing is read from
   * the file yet, so a non-database file only surfaces in prepareSchema().
   */
  static open(dbPath: string): StorageEngine {
    let db: DatabaseType;
    try {
      db = new Database(dbPath, { timeout: BUSY_TIMEOUT_MS });
    } catch (err: unknown) {
      log.error("Cannot open feed cache database", { path: dbPath, error: errorMessage(err) });
      throw new OpenError(`Cannot open feed cache database at ${dbPath}: ${errorMessage(err)}`, { path: dbPath }, { cause: err });
    }
    log.debug("Opened feed cache database", { path: dbPath });
    return new StorageEngine(db, dbPath);
  }

  prepareSchema(): void {
    this.assertOpen("prepareSchema");
    try {
      applySchema(this.db);
    } catch (err: unknown) {
      log.error("Cannot create feed cache table", { path: this.path, error: errorMessage(err) });
      throw new SchemaError(`Cannot create ${FEED_CACHE_TABLE}: ${errorMessage(err)}`, { path: this.path }, { cause: err });
    }
    log.debug("Feed cache schema ready", { path: this.path });
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (!this.db.open) return;
    this.db.close();
    log.debug("Closed feed cache database", { path: this.path });
  }

  // ─── Row Operations ──────────────────────────────────────────────────

  /** The stored snapshot, or null when the table is empty. */
  readAll(): CacheSnapshot | null {
    return this.run("readAll", () => {
      const rows = this.repo.getAll();
      const [first] = rows;
      if (!first) return null;
      return {
        items: rows.map(toRecord),
        timestamp: fromReferenceSeconds(first.timestamp),
      };
    });
  }

  deleteAll(): void {
    this.run("deleteAll", () => {
      const removed = this.repo.clear();
      log.debug("Cleared feed cache", { removed });
    });
  }

  /**
   * Write records in order, all sharing `timestamp`. The write is one
   * transaction: a failing row leaves none of this call's rows behind.
   */
  insertAll(records: FeedImageRecord[], timestamp: Date): void {
    this.run("insertAll", () => {
      const seconds = toReferenceSeconds(timestamp);
      const inserted = this.repo.insertBulk(records.map((record) => toRow(record, seconds)));
      log.debug("Wrote feed cache rows", { inserted });
    });
  }

  /**
   * Delete then insert inside a single transaction. A failed delete skips
   * the insert; any failure rolls back to the previous snapshot.
   */
  replaceAll(records: FeedImageRecord[], timestamp: Date): void {
    this.run("replaceAll", () => {
      const tx = this.db.transaction(() => {
        this.deleteAll();
        this.insertAll(records, timestamp);
      });
      tx();
    });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private assertOpen(operation: string): void {
    if (!this.db.open) {
      throw new QueryError(`Feed cache database is closed (${operation}).`, { operation, path: this.path });
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    this.assertOpen(operation);
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof FeedCacheError) throw err;
      log.error(`Feed cache ${operation} failed`, { path: this.path, error: errorMessage(err) });
      throw new QueryError(`${operation} failed: ${errorMessage(err)}`, { operation, path: this.path }, { cause: err });
    }
  }
}

function toRow(record: FeedImageRecord, timestamp: number): FeedImageCacheRow {
  return {
    id: record.id,
    description: record.description,
    location: record.location,
    url: record.url,
    timestamp,
  };
}

function toRecord(row: FeedImageCacheRow): FeedImageRecord {
  return {
    id: row.id,
    description: row.description,
    location: row.location,
    url: row.url,
  };
}
