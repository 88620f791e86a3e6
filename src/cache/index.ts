export { CacheEntry } from './entry.js';
export {
  CacheManager,
  type CacheConfig,
  type CacheStats,
  type EvictionReason,
} from './manager.js';
