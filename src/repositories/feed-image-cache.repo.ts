// ============================================================================
// Feed Image Cache — Row Repository
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { z } from "zod";
import { FEED_CACHE_TABLE } from "../constants.js";
import { QueryError } from "../errors.js";
import { describeIssues, feedImageCacheRowSchema } from "../schemas.js";
import type { FeedImageCacheRow } from "../types.js";

export class FeedImageCacheRepo {
    constructor(private db: DatabaseType) { }

    /**
     * Every row in insertion order. A single malformed row (bad UUID, bad
     * URL, missing timestamp) fails the whole read.
     */
    getAll(): FeedImageCacheRow[] {
        const rows = this.db.prepare(
            `SELECT id, description, location, url, timestamp FROM ${FEED_CACHE_TABLE} ORDER BY rowid`
        ).all();

        return rows.map((row, index) => {
            const parsed = feedImageCacheRowSchema.safeParse(row);
            if (!parsed.success) {
                throw new QueryError(`Malformed row ${index} in ${FEED_CACHE_TABLE}.`, {
                    index,
                    issues: describeIssues(parsed.error),
                });
            }
            return parsed.data;
        });
    }

    /** Inserts rows in order inside one transaction. */
    insertBulk(rows: FeedImageCacheRow[]): number {
        const stmt = this.db.prepare(
            `INSERT INTO ${FEED_CACHE_TABLE} (id, description, location, url, timestamp) VALUES (?, ?, ?, ?, ?)`
        );
        const tx = this.db.transaction(() => {
            for (const row of rows) {
                stmt.run(row.id, row.description, row.location, row.url, row.timestamp);
            }
        });
        tx();
        return rows.length;
    }

    clear(): number {
        return this.db.prepare(`DELETE FROM ${FEED_CACHE_TABLE}`).run().changes;
    }

    countAll(): number {
        const count = this.db.prepare(`SELECT COUNT(*) FROM ${FEED_CACHE_TABLE}`).pluck().get();
        return z.number().parse(count);
    }
}
