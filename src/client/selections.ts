/**
 * Selections
 *
 * Maps the API's saved-selection records to the flat shape the client returns.
 */

import { isRecord } from '../json'

export type Selection = {
  /** 1-based position in the response */
  readonly item: number
  readonly pk: number
  readonly title: string
  readonly code_count: number
  readonly is_owner: boolean
  readonly owner: string
  readonly status: string
  readonly description: string
  readonly modified: string
}

function toSelection(raw: unknown, item: number): Selection | null {
  if (!isRecord(raw) || !isRecord(raw.owner)) return null

  const { id, title, is_owner, status, modified, timeseriescodes, description } = raw
  const owner = raw.owner.username
  if (
    typeof id !== 'number' ||
    typeof title !== 'string' ||
    typeof is_owner !== 'boolean' ||
    typeof owner !== 'string' ||
    typeof status !== 'string' ||
    typeof modified !== 'string'
  ) {
    return null
  }

  return {
    item,
    pk: id,
    title,
    code_count: Array.isArray(timeseriescodes) ? timeseriescodes.length : 0,
    is_owner,
    owner,
    status,
    description: typeof description === 'string' ? description : '',
    modified
  }
}

/**
 * Transform a selections response body.
 *
 * An absent body or an empty object means no selections.
 *
 * @returns null when the body is not a list of well-formed selections
 */
export function parseSelections(body: unknown): Selection[] | null {
  if (body === null || body === undefined) return []
  if (isRecord(body) && Object.keys(body).length === 0) return []
  if (!Array.isArray(body)) return null

  const selections: Selection[] = []
  for (const [index, raw] of body.entries()) {
    const selection = toSelection(raw, index + 1)
    if (!selection) return null
    selections.push(selection)
  }
  return selections
}
