/**
 * Common Types
 *
 * Shared types used across modules: Result, filters, formats, tables.
 */

// Result Types
export type ApiErrorType = 'rate_limit' | 'auth' | 'network' | 'invalid_response'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

// Dimension filter types
export const VALID_DIMENSIONS = ['d1', 'd2', 'd3', 'd4', 'd5', 'd6', 'd7'] as const

export type Dimension = (typeof VALID_DIMENSIONS)[number]

/**
 * One constraint on a categorical dimension of a grid.
 * Field names follow the API's `selectdimensionnodes` payload.
 */
export interface DimensionFilter {
  readonly dimension: Dimension
  readonly codes?: readonly string[] | undefined
  readonly levels?: readonly number[] | undefined
  readonly children?: boolean | undefined
  readonly children_include_self?: boolean | undefined
}

/** What callers may pass: one filter or a list of them. */
export type FilterSetInput = DimensionFilter | readonly DimensionFilter[]

export type FilterSet =
  | { readonly kind: 'single'; readonly filter: DimensionFilter }
  | { readonly kind: 'many'; readonly filters: readonly DimensionFilter[] }

// Formats
/** Formats the API can send and the cache can store */
export type ApiFormat = 'csv' | 'json' | 'parquet'

/** Formats a cache read can hand back */
export type ReturnFormat = ApiFormat | 'dataframe'

export type GridFormat = 'dataframe' | 'parquet' | 'csv'

// Tabular data
export type Row = Record<string, unknown>

export interface Table {
  readonly columns: readonly string[]
  readonly rows: readonly Row[]
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }
