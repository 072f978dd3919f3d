/**
 * JSON helpers
 */

import type { JsonValue } from './types'

/**
 * Parse JSON text.
 *
 * @throws SyntaxError on malformed input
 */
export function parseJson(text: string): JsonValue {
  return JSON.parse(text)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

export function isRecordList(value: unknown): value is Record<string, unknown>[] {
  return Array.isArray(value) && value.every(isRecord)
}
