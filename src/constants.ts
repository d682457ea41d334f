// ============================================================================
// Feed Image Cache — Constants
// ============================================================================

// Database
export const FEED_CACHE_TABLE = "FeedImageCache";
export const BUSY_TIMEOUT_MS = 5000;

// Timestamps are persisted as seconds since 2001-01-01T00:00:00Z, not the UNIX epoch.
export const REFERENCE_EPOCH_MS = Date.UTC(2001, 0, 1);

// Logging
export const LOG_PREFIX = "[feed-cache]";
export const LOG_LEVEL_ENV = "FEED_CACHE_LOG_LEVEL";
