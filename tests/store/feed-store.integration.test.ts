// ============================================================================
// Cache Store Tests — On-Disk Integration
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { FeedImageStore } from "../../src/feed-store.js";
import { FeedCacheError, OpenError, QueryError, SchemaError } from "../../src/errors.js";
import { applySchema } from "../../src/schema.js";
import { captureError, createTempDbPath, referenceDate, uniqueFeed } from "../helpers/test-db.js";

let dbPath: string;
let dir: string;
let cleanup: () => void;
const openStores: FeedImageStore[] = [];

function makeSUT(): FeedImageStore {
    const store = FeedImageStore.open(dbPath);
    openStores.push(store);
    return store;
}

/** Write straight to the file, bypassing the store. */
function withRawDb(fn: (db: Database.Database) => void): void {
    const db = new Database(dbPath);
    try {
        fn(db);
    } finally {
        db.close();
    }
}

beforeEach(() => {
    ({ dir, dbPath, cleanup } = createTempDbPath());
});

afterEach(() => {
    for (const store of openStores.splice(0)) store.close();
    cleanup();
});

// ─── Persistence Across Instances ────────────────────────────────────

describe("FeedImageStore on disk", () => {
    it("should deliver empty on an empty cache", async () => {
        expect(await makeSUT().retrieve()).toEqual({ kind: "empty" });
    });

    it("should deliver a feed inserted on another instance", async () => {
        const feed = uniqueFeed();
        const timestamp = new Date("2023-11-14T22:13:20.500Z");

        const storeToInsert = makeSUT();
        await storeToInsert.insert(feed, timestamp);
        storeToInsert.close();

        expect(await makeSUT().retrieve()).toEqual({ kind: "found", items: feed, timestamp });
    });

    it("should override a feed inserted on another instance", async () => {
        const storeToInsert = makeSUT();
        await storeToInsert.insert(uniqueFeed(), referenceDate(1));
        storeToInsert.close();

        const latestFeed = uniqueFeed();
        const storeToOverride = makeSUT();
        await storeToOverride.insert(latestFeed, referenceDate(2));
        storeToOverride.close();

        expect(await makeSUT().retrieve()).toEqual({ kind: "found", items: latestFeed, timestamp: referenceDate(2) });
    });

    it("should delete a feed inserted on another instance", async () => {
        const storeToInsert = makeSUT();
        await storeToInsert.insert(uniqueFeed(), referenceDate(1));
        storeToInsert.close();

        const storeToDelete = makeSUT();
        await storeToDelete.deleteCachedFeed();
        storeToDelete.close();

        expect(await makeSUT().retrieve()).toEqual({ kind: "empty" });
    });

    it("should store timestamps as seconds since 2001-01-01", async () => {
        const store = makeSUT();
        await store.insert(uniqueFeed(), new Date("2001-01-01T00:16:40.000Z"));
        store.close();

        withRawDb((db) => {
            const stamps = db.prepare("SELECT DISTINCT timestamp FROM FeedImageCache").pluck().all();
            expect(stamps).toEqual([1000]);
        });
    });
});

// ─── Failures ────────────────────────────────────────────────────────

describe("FeedImageStore failures", () => {
    it("should deliver failure when a stored id is not a UUID", async () => {
        withRawDb((db) => {
            applySchema(db);
            db.prepare("INSERT INTO FeedImageCache VALUES (?, ?, ?, ?, ?)").run("A1", "", "", "http://a.com", 1000);
        });

        const result = await makeSUT().retrieve();

        expect(result.kind).toBe("failure");
        if (result.kind === "failure") expect(result.error).toBeInstanceOf(QueryError);
    });

    it("should deliver failure when a stored url cannot be parsed", async () => {
        withRawDb((db) => {
            applySchema(db);
            db.prepare("INSERT INTO FeedImageCache VALUES (?, ?, ?, ?, ?)")
                .run("a1a1a1a1-0000-4000-8000-000000000001", null, null, "::not a url::", 1000);
        });

        const result = await makeSUT().retrieve();

        expect(result.kind).toBe("failure");
    });

    it("should surface delete and insert errors when the table is gone", async () => {
        const store = makeSUT();
        withRawDb((db) => db.exec("DROP TABLE FeedImageCache"));

        await expect(store.deleteCachedFeed()).rejects.toBeInstanceOf(QueryError);
        await expect(store.insert(uniqueFeed(), new Date())).rejects.toHaveProperty("context.operation", "deleteAll");
    });

    it("should throw OpenError when the directory does not exist", () => {
        const err = captureError(() => FeedImageStore.open(path.join(dir, "missing", "feed.db")));

        expect(err).toBeInstanceOf(OpenError);
    });

    it("should throw SchemaError when the file is not a database", () => {
        fs.writeFileSync(dbPath, "definitely not sqlite\n".repeat(64));

        const err = captureError(() => FeedImageStore.open(dbPath));

        expect(err).toBeInstanceOf(SchemaError);
        expect(err).toBeInstanceOf(FeedCacheError);
        expect(err).toHaveProperty("code", "SCHEMA_ERROR");
    });
});
