/**
 * Client Configuration
 *
 * Merges explicit client options over EASYDATA_* environment variables.
 */

import { DEFAULT_CACHE_DIR } from './caching/store'
import { InvalidInputError } from './filters/validate'
import type { Logger } from './logger'
import type { ApiFormat } from './types'

export const DEFAULT_API_URL = 'https://www.easydata.co.za/api/v3'

const RESP_FORMATS: readonly ApiFormat[] = ['csv', 'json', 'parquet']

export interface ClientOptions {
  /** API key (or set EASYDATA_API_KEY) */
  apiKey?: string | undefined
  /** Base URL (or set EASYDATA_API_URL) */
  apiUrl?: string | undefined
  /** Format for time series, recipe and selection responses */
  respFormat?: string | undefined
  /** Request tidy time series data */
  isTidy?: boolean | undefined
  /** Cache raw responses on disk */
  useCache?: boolean | undefined
  /** Cache directory (or set EASYDATA_CACHE_DIR) */
  cacheDir?: string | undefined
  logger?: Logger | undefined
}

export interface ClientConfig {
  readonly apiKey: string
  readonly apiUrl: string
  readonly respFormat: ApiFormat
  readonly isTidy: boolean
  readonly useCache: boolean
  readonly cacheDir: string
}

function isApiFormat(value: string): value is ApiFormat {
  return RESP_FORMATS.some((format) => format === value)
}

/**
 * Resolve client configuration.
 *
 * @throws InvalidInputError when no API key is available or the format is unknown
 */
export function resolveClientConfig(
  options: ClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const apiKey = options.apiKey || env.EASYDATA_API_KEY
  if (!apiKey) {
    throw new InvalidInputError(
      'API key must be provided via apiKey option or EASYDATA_API_KEY environment variable'
    )
  }

  const respFormat = options.respFormat ?? 'csv'
  if (!isApiFormat(respFormat)) {
    throw new InvalidInputError("respformat must be 'csv', 'json', or 'parquet'")
  }

  const apiUrl = options.apiUrl || env.EASYDATA_API_URL || DEFAULT_API_URL

  return {
    apiKey,
    apiUrl: apiUrl.replace(/\/+$/, ''),
    respFormat,
    isTidy: options.isTidy ?? true,
    useCache: options.useCache ?? false,
    cacheDir: options.cacheDir || env.EASYDATA_CACHE_DIR || DEFAULT_CACHE_DIR
  }
}
