/**
 * Filesystem Response Cache
 *
 * Stores raw API responses as flat files named by cache key:
 * ```
 * ./cache/
 * ├── 3f2a...9c.parquet
 * ├── 81be...04.csv
 * └── debug_1a2b3c4d.json
 * ```
 * Existence of the file is the cache hit signal; there is no index.
 * Entries never expire.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmdirSync,
  unlinkSync,
  writeFileSync
} from 'node:fs'
import { dirname, join } from 'node:path'
import { parseJson } from '../json'
import { defaultLogger, type Logger } from '../logger'
import { dropEmptyColumns, parseCsvTable, parseParquetTable } from '../table'
import type { ApiFormat, JsonValue, ReturnFormat, Table } from '../types'
import type { CacheFault, CacheFaultKind, CachePayload, CacheResult } from './types'

export const DEFAULT_CACHE_DIR = 'cache'

function fault(kind: CacheFaultKind, path: string, error: unknown): CacheFault {
  const message = error instanceof Error ? error.message : String(error)
  return { kind, path, message }
}

function attempt<T>(kind: CacheFaultKind, path: string, fn: () => T): CacheResult<T> {
  try {
    return { ok: true, value: fn() }
  } catch (error) {
    return { ok: false, fault: fault(kind, path, error) }
  }
}

async function attemptAsync<T>(
  kind: CacheFaultKind,
  path: string,
  fn: () => Promise<T>
): Promise<CacheResult<T>> {
  try {
    return { ok: true, value: await fn() }
  } catch (error) {
    return { ok: false, fault: fault(kind, path, error) }
  }
}

export class CacheStore {
  readonly cacheDir: string
  private readonly logger: Logger

  constructor(cacheDir: string = DEFAULT_CACHE_DIR, logger: Logger = defaultLogger()) {
    this.cacheDir = cacheDir
    this.logger = logger
    mkdirSync(cacheDir, { recursive: true })
  }

  /**
   * Get the file path for a cache entry.
   */
  path(key: string, ext: string): string {
    return join(this.cacheDir, `${key}.${ext}`)
  }

  /**
   * Read a cached response.
   *
   * The file is looked up under `apiFormat` when given, else `returnFormat`.
   * Missing, unreadable or unparsable entries all read as null.
   */
  read(key: string, returnFormat: 'csv', apiFormat?: ApiFormat): Promise<string | null>
  read(key: string, returnFormat: 'json', apiFormat?: ApiFormat): Promise<JsonValue | null>
  read(key: string, returnFormat: 'parquet', apiFormat?: ApiFormat): Promise<Uint8Array | null>
  read(key: string, returnFormat: 'dataframe', apiFormat?: ApiFormat): Promise<Table | null>
  read(
    key: string,
    returnFormat: ReturnFormat,
    apiFormat?: ApiFormat
  ): Promise<string | JsonValue | Uint8Array | Table | null>
  async read(
    key: string,
    returnFormat: ReturnFormat,
    apiFormat?: ApiFormat
  ): Promise<string | JsonValue | Uint8Array | Table | null> {
    const path = this.path(key, apiFormat ?? returnFormat)
    if (!existsSync(path)) {
      return null
    }

    const result = await this.load(path, returnFormat, apiFormat)
    if (!result.ok) {
      this.logger.verbose(`Ignoring unreadable cache entry ${path}: ${result.fault.message}`)
      return null
    }
    this.logger.verbose(`Loading from cache: ${path}`)
    return result.value
  }

  private async load(
    path: string,
    returnFormat: ReturnFormat,
    apiFormat: ApiFormat | undefined
  ): Promise<CacheResult<string | JsonValue | Uint8Array | Table>> {
    switch (returnFormat) {
      case 'csv':
        return attempt('read', path, () => readFileSync(path, 'utf-8'))
      case 'json':
        return attempt('parse', path, () => parseJson(readFileSync(path, 'utf-8')))
      case 'parquet':
        return attempt('read', path, () => new Uint8Array(readFileSync(path)))
      case 'dataframe':
        if ((apiFormat ?? '').toLowerCase() === 'parquet') {
          return attemptAsync('parse', path, async () =>
            dropEmptyColumns(await parseParquetTable(new Uint8Array(readFileSync(path))))
          )
        }
        return attempt('parse', path, () =>
          dropEmptyColumns(parseCsvTable(readFileSync(path, 'utf-8')))
        )
    }
  }

  /**
   * Store a raw response. Bytes for parquet, text for everything else.
   *
   * Best-effort: failures are logged at debug level and never thrown.
   */
  write(key: string, format: ApiFormat, payload: CachePayload): void {
    const path = this.path(key, format)
    const result = attempt('write', path, () => {
      mkdirSync(dirname(path), { recursive: true })
      if (format === 'parquet') {
        writeFileSync(path, typeof payload === 'string' ? Buffer.from(payload) : payload)
      } else {
        writeFileSync(
          path,
          typeof payload === 'string' ? payload : new TextDecoder().decode(payload),
          'utf-8'
        )
      }
    })

    if (!result.ok) {
      this.logger.verbose(`Failed to write cache: ${result.fault.message}`)
      return
    }
    this.logger.verbose(`Saved to cache: ${path}`)
  }

  /**
   * Delete every file under the cache directory, then any empty
   * subdirectories, deepest first.
   *
   * @returns number of files deleted
   */
  clear(): number {
    if (!existsSync(this.cacheDir)) {
      return 0
    }

    const files: string[] = []
    const dirs: string[] = []
    this.walk(this.cacheDir, files, dirs)

    let deleted = 0
    for (const file of files) {
      const result = attempt('delete', file, () => unlinkSync(file))
      if (result.ok) {
        deleted++
      } else {
        this.logger.verbose(`Failed to delete cache file ${file}: ${result.fault.message}`)
      }
    }

    // Children sort after their parents, so reverse order removes them first
    for (const dir of [...dirs].sort().reverse()) {
      // Non-empty or protected directories stay
      attempt('delete', dir, () => rmdirSync(dir))
    }

    return deleted
  }

  private walk(dir: string, files: string[], dirs: string[]): void {
    const listing = attempt('read', dir, () => readdirSync(dir, { withFileTypes: true }))
    if (!listing.ok) {
      this.logger.verbose(`Failed to list cache directory ${dir}: ${listing.fault.message}`)
      return
    }

    for (const entry of listing.value) {
      const path = join(dir, entry.name)
      if (entry.isDirectory()) {
        dirs.push(path)
        this.walk(path, files, dirs)
      } else if (entry.isFile()) {
        files.push(path)
      }
    }
  }
}
