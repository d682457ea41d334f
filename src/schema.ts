// ============================================================================
// Feed Image Cache — Table Schema
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { FEED_CACHE_TABLE } from "./constants.js";

// description and location are nullable: an absent value is stored as NULL.
export const CREATE_FEED_CACHE_TABLE = `
  CREATE TABLE IF NOT EXISTS ${FEED_CACHE_TABLE} (
    id TEXT PRIMARY KEY NOT NULL,
    description TEXT,
    location TEXT,
    url TEXT,
    timestamp REAL
  );
`;

export function applySchema(db: DatabaseType): void {
  db.exec(CREATE_FEED_CACHE_TABLE);
}
