/**
 * Cache Module
 *
 * On-disk caching of raw API responses, keyed by request fingerprint.
 */

export { generateCacheKey, stringifyKeyPart } from './key'
export { CacheStore, DEFAULT_CACHE_DIR } from './store'
export type {
  CacheFault,
  CacheFaultKind,
  CacheKeyPart,
  CachePayload,
  CacheResult
} from './types'
