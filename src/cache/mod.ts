/**
 * Cache Module
 * @module
 */

export { DEFAULT_CACHE_CONFIG, ResponseCache } from './responseCache.ts'
export type { CacheConfig, CacheStats, ResponseCacheOptions } from './responseCache.ts'
