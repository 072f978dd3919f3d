/**
 * Response Caching Types
 */

import type { JsonValue } from '../types'

/**
 * A single value that feeds a cache key.
 */
export type CacheKeyPart =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }

/** Raw response body as received from the API */
export type CachePayload = string | Uint8Array

export type CacheFaultKind = 'read' | 'parse' | 'write' | 'delete'

export interface CacheFault {
  readonly kind: CacheFaultKind
  readonly path: string
  readonly message: string
}

/**
 * Outcome of a single cache filesystem operation.
 * Never leaves CacheStore: faults become a miss or a debug log line.
 */
export type CacheResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly fault: CacheFault }
