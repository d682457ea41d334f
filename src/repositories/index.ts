// ============================================================================
// Feed Image Cache — Repository Barrel Export
// ============================================================================

export { FeedImageCacheRepo } from "./feed-image-cache.repo.js";
