export { CacheService, CacheStats, MemoizeOptions } from './cache.service';
export { cacheKey, isJsonValue, stableStringify, JsonValue } from './cache.key';
export { CACHE_FORMAT, SweepResult } from './disk.tier';
