// ============================================================================
// Feed Image Cache — Cache Store
// ============================================================================

import { StorageEngine } from "./database.js";
import { QueryError, ValidationError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { describeIssues, insertInputSchema } from "./schemas.js";
import type { FeedImageRecord, FeedStore, RetrieveResult } from "./types.js";

/**
 * SQLite-backed {@link FeedStore}. Holds one snapshot (records plus a shared
 * timestamp) and owns its connection until close().
 */
export class FeedImageStore implements FeedStore {
    private constructor(private readonly engine: StorageEngine) { }

    /**
     * Open the store at `dbPath` and make sure the table exists.
     * Throws OpenError or SchemaError; on SchemaError the connection is closed again.
     */
    static open(dbPath: string): FeedImageStore {
        const engine = StorageEngine.open(dbPath);
        try {
            engine.prepareSchema();
        } catch (err: unknown) {
            engine.close();
            throw err;
        }
        log.info("Feed cache store ready", { path: dbPath });
        return new FeedImageStore(engine);
    }

    get isOpen(): boolean {
        return this.engine.isOpen;
    }

    async retrieve(): Promise<RetrieveResult> {
        try {
            const snapshot = this.engine.readAll();
            if (!snapshot || snapshot.items.length === 0) return { kind: "empty" };
            return { kind: "found", items: snapshot.items, timestamp: snapshot.timestamp };
        } catch (err: unknown) {
            const error = err instanceof Error
                ? err
                : new QueryError(`retrieve failed: ${errorMessage(err)}`, undefined, { cause: err });
            return { kind: "failure", error };
        }
    }

    /**
     * Replace the cached snapshot. Input is validated before anything is
     * touched; the delete and the write then commit or roll back together.
     */
    async insert(items: FeedImageRecord[], timestamp: Date): Promise<void> {
        const parsed = insertInputSchema.safeParse({ items, timestamp });
        if (!parsed.success) {
            throw new ValidationError("Invalid feed cache snapshot.", { issues: describeIssues(parsed.error) });
        }
        this.engine.replaceAll(parsed.data.items, parsed.data.timestamp);
    }

    async deleteCachedFeed(): Promise<void> {
        this.engine.deleteAll();
    }

    close(): void {
        this.engine.close();
    }
}
