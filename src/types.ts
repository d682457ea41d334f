// ============================================================================
// Feed Image Cache — Type Definitions
// ============================================================================

// ─── Domain Types ───────────────────────────────────────────────────────────

export interface FeedImageRecord {
  id: string;                   // canonical UUID text
  description: string | null;
  location: string | null;
  url: string;
}

export interface CacheSnapshot {
  items: FeedImageRecord[];
  timestamp: Date;
}

export type RetrieveResult =
  | { kind: "empty" }
  | { kind: "found"; items: FeedImageRecord[]; timestamp: Date }
  | { kind: "failure"; error: Error };

// ─── Store Contract ─────────────────────────────────────────────────────────

/**
 * Caller-facing cache contract. Every promise settles exactly once, after
 * the operation has taken effect on stored state.
 */
export interface FeedStore {
  retrieve(): Promise<RetrieveResult>;
  insert(items: FeedImageRecord[], timestamp: Date): Promise<void>;
  deleteCachedFeed(): Promise<void>;
}

// ─── Database Row Types ─────────────────────────────────────────────────────

export interface FeedImageCacheRow {
  id: string;
  description: string | null;
  location: string | null;
  url: string;
  timestamp: number;            // seconds since REFERENCE_EPOCH_MS
}
