/**
 * HTTP Utilities
 *
 * Fetch wrapper and uniform error mapping for EasyData API calls.
 */

import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Tests in CI must never reach the real API.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is attempted from tests in CI.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Mock httpFetch in tests instead of calling the API.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
  arrayBuffer(): Promise<ArrayBuffer>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when tests run in CI
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Build a query string. Booleans go out as True/False, which is what
 * the API parses; undefined values are left out.
 */
export function buildQuery(
  params: Record<string, string | number | boolean | undefined>
): URLSearchParams {
  const query = new URLSearchParams()
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue
    query.set(name, typeof value === 'boolean' ? (value ? 'True' : 'False') : String(value))
  }
  return query
}

/**
 * Handle HTTP error responses uniformly across all API calls.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API request failed (${response.status}): ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API calls.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return {
    ok: false,
    error: { type: 'network', message: `Network error: Unable to connect to API (${message})` }
  }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}

/**
 * Create an error result for a response body that could not be decoded.
 */
export function invalidResponseError(what: string, error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return {
    ok: false,
    error: { type: 'invalid_response', message: `Failed to parse ${what} response: ${message}` }
  }
}
