// ============================================================================
// Feed Image Cache — Public API
// ============================================================================

export { FeedImageStore } from "./feed-store.js";
export { StorageEngine } from "./database.js";
export { FeedCacheError, OpenError, SchemaError, QueryError, ValidationError } from "./errors.js";
export { log, type LogLevel } from "./logger.js";
export { FEED_CACHE_TABLE, REFERENCE_EPOCH_MS } from "./constants.js";
export { toReferenceSeconds, fromReferenceSeconds } from "./time.js";
export type {
  FeedImageRecord,
  CacheSnapshot,
  RetrieveResult,
  FeedStore,
  FeedImageCacheRow,
} from "./types.js";
