/**
 * Client Types
 */

import type { FilterSetInput, JsonValue, Table } from '../types'
import type { Selection } from './selections'

/** A response either loaded into a table (csv mode) or left as parsed JSON */
export type DataPayload =
  | { readonly kind: 'table'; readonly table: Table }
  | { readonly kind: 'json'; readonly data: JsonValue }

export type SelectionsPayload =
  | { readonly kind: 'table'; readonly table: Table }
  | { readonly kind: 'json'; readonly data: { readonly selections: readonly Selection[] } }

export type GridData =
  | { readonly format: 'dataframe'; readonly table: Table }
  | { readonly format: 'csv'; readonly text: string }
  | { readonly format: 'parquet'; readonly bytes: Uint8Array }

export interface DataParams {
  /** Comma-separated time series codes, e.g. "NMS-EC_BUS,NMS-GA_BUS" */
  readonly timeSeriesCodes?: string | undefined
  /** Saved selection id; takes precedence over timeSeriesCodes */
  readonly selectionPk?: number | undefined
  /** Frequency: 'M', 'Q', 'A', ... */
  readonly freq?: string | undefined
  readonly startYear?: string | undefined
  readonly endYear?: string | undefined
  readonly analysis?: boolean | undefined
}

export interface SelectionParams {
  /** Combined status flags: U=Unsaved, P=Private, S=Shared, O=Open (e.g. "PSO") */
  readonly status?: string | undefined
  /** "shared" or "open" */
  readonly show?: string | undefined
  /** e.g. "active" */
  readonly filter?: string | undefined
}

export interface GridDataOptions {
  readonly isExpanded?: boolean | undefined
  readonly isMelted?: boolean | undefined
  /** 'dataframe' (default), 'parquet' or 'csv' */
  readonly respFormat?: string | undefined
  readonly filters?: FilterSetInput | undefined
}
