/**
 * Cache Key Generation
 *
 * Generates deterministic MD5 fingerprints for API request caching.
 * MD5 is a content fingerprint here, not a security measure.
 */

import { createHash } from 'node:crypto'
import { sortKeys } from '../filters/normalize'
import type { CacheKeyPart } from './types'

const DEBUG_PREFIX = 'debug_'

/**
 * String form of a single key part.
 * Booleans and null use True/False/None so keys line up with cache
 * directories written by other EasyData clients.
 */
export function stringifyKeyPart(part: CacheKeyPart): string {
  if (part === null || part === undefined) return 'None'
  if (typeof part === 'boolean') return part ? 'True' : 'False'
  if (typeof part === 'string') return part
  if (typeof part === 'number') return String(part)
  return JSON.stringify(sortKeys(part))
}

/**
 * Generate a cache key from the values that define a request.
 *
 * Parts are concatenated in order with no separator, so callers must pass
 * parts that cannot run into each other (`[1, '23']` and `[12, '3']` collide).
 *
 * @example
 * ```ts
 * generateCacheKey([1066, true, true, 'parquet', null])
 * // Returns: 32 char hex string
 * generateCacheKey([1066], { debug: true })
 * // Returns: 'debug_' + 8 hex chars
 * ```
 */
export function generateCacheKey(
  parts: readonly CacheKeyPart[],
  options: { readonly debug?: boolean } = {}
): string {
  const input = parts.map(stringifyKeyPart).join('')
  const digest = createHash('md5').update(input).digest('hex')

  if (options.debug) {
    return `${DEBUG_PREFIX}${digest.slice(0, 8)}`
  }
  return digest
}
