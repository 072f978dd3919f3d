/**
 * EasyData Client Library
 *
 * Time series, grid, recipe and selection data from the EasyData API,
 * with an optional on-disk cache of raw responses.
 */

// Cache module
export type {
  CacheFault,
  CacheFaultKind,
  CacheKeyPart,
  CachePayload,
  CacheResult
} from './caching/index'
export { CacheStore, DEFAULT_CACHE_DIR, generateCacheKey, stringifyKeyPart } from './caching/index'
// Client
export {
  type DataParams,
  type DataPayload,
  EasyDataClient,
  type GridData,
  type GridDataOptions,
  parseSelections,
  type Selection,
  type SelectionParams,
  type SelectionsPayload
} from './client/index'
// Configuration
export {
  type ClientConfig,
  type ClientOptions,
  DEFAULT_API_URL,
  resolveClientConfig
} from './config'
// Filters module
export {
  filtersOf,
  InvalidInputError,
  normalizeDimensionFilters,
  toFilterSet,
  validateDimensionFilter,
  validateDimensionFilters
} from './filters/index'
// HTTP
export type { HttpResponse } from './http'
// Logging
export { createLogger, type Logger } from './logger'
// Tables
export {
  dropEmptyColumns,
  dropIncompleteRows,
  parseCsvTable,
  parseParquetTable,
  tableFromRecords,
  tableToCsv
} from './table'
// Types
export type {
  ApiError,
  ApiErrorType,
  ApiFormat,
  Dimension,
  DimensionFilter,
  FilterSet,
  FilterSetInput,
  GridFormat,
  JsonValue,
  Result,
  ReturnFormat,
  Row,
  Table
} from './types'
export { VALID_DIMENSIONS } from './types'

export const VERSION = '0.1.0'
