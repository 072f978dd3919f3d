/**
 * EasyData Client
 *
 * Time series, grid, recipe and selection requests against the EasyData API.
 * Grid and time series responses can be cached on disk as raw payloads.
 */

import { generateCacheKey } from '../caching/key'
import { CacheStore } from '../caching/store'
import type { CachePayload } from '../caching/types'
import { type ClientConfig, type ClientOptions, resolveClientConfig } from '../config'
import { normalizeDimensionFilters } from '../filters/normalize'
import { InvalidInputError, validateDimensionFilters } from '../filters/validate'
import {
  buildQuery,
  emptyResponseError,
  type HttpResponse,
  handleHttpError,
  handleNetworkError,
  httpFetch,
  invalidResponseError
} from '../http'
import { isRecordList, parseJson } from '../json'
import { defaultLogger, type Logger } from '../logger'
import {
  dropEmptyColumns,
  dropIncompleteRows,
  parseCsvTable,
  parseParquetTable,
  tableFromRecords
} from '../table'
import type { ApiFormat, FilterSetInput, GridFormat, JsonValue, Result, Table } from '../types'
import { parseSelections } from './selections'
import type {
  DataParams,
  DataPayload,
  GridData,
  GridDataOptions,
  SelectionParams,
  SelectionsPayload
} from './types'

const GRID_FORMATS: readonly GridFormat[] = ['dataframe', 'parquet', 'csv']

function isGridFormat(value: string): value is GridFormat {
  return GRID_FORMATS.some((format) => format === value)
}

function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export class EasyDataClient {
  readonly config: ClientConfig
  private readonly logger: Logger
  private readonly cache: CacheStore | null

  /**
   * @throws InvalidInputError when no API key is configured or respFormat is unknown
   */
  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options)
    this.logger = options.logger ?? defaultLogger()
    this.cache = this.config.useCache ? new CacheStore(this.config.cacheDir, this.logger) : null
  }

  /**
   * Fetch time series data by codes or saved selection.
   *
   * @throws InvalidInputError when neither timeSeriesCodes nor selectionPk is given
   */
  async getData(params: DataParams = {}): Promise<Result<DataPayload>> {
    const { timeSeriesCodes, selectionPk, freq = 'M', startYear = '', endYear = '' } = params
    const analysis = params.analysis ?? false
    if (!timeSeriesCodes && selectionPk === undefined) {
      throw new InvalidInputError('Either time_series_codes or selection_pk must be provided')
    }

    const { respFormat, isTidy } = this.config
    const bySelection = selectionPk !== undefined
    const logKey = bySelection ? String(selectionPk) : String(timeSeriesCodes)
    const cacheFormat: ApiFormat = respFormat === 'csv' ? 'csv' : 'json'

    const cacheKey = generateCacheKey([
      'download',
      bySelection ? `selection:${selectionPk}` : `codes:${timeSeriesCodes}`,
      freq,
      startYear,
      endYear,
      isTidy,
      analysis,
      respFormat
    ])

    const cached = this.cache ? await this.cache.read(cacheKey, 'csv', cacheFormat) : null
    if (cached !== null) {
      const payload = this.toDataPayload(cached)
      if (payload.ok) {
        this.logger.verbose(`[${logKey}] -- Loaded time series from cache`)
        return payload
      }
      // Corrupt entry: refetch, the write below replaces it
      this.logger.verbose(
        `[${logKey}] -- Ignoring unreadable cache entry: ${payload.error.message}`
      )
    }

    const query = buildQuery({
      respFormat,
      freqs: freq,
      startYear,
      endYear,
      isTidy,
      analysis,
      ...(bySelection ? { selectionPk } : { timeSeriesCodes })
    })
    this.logger.verbose(`[${logKey}] -- Querying with parameters: ${query.toString()}`)
    query.set('auth_token', this.config.apiKey)

    const response = await this.request(`${this.config.apiUrl}/download/?${query.toString()}`)
    if (!response.ok) return response

    const body = await this.readText(response.value)
    if (!body.ok) return body

    const payload = this.toDataPayload(body.value)
    if (payload.ok) {
      this.cache?.write(cacheKey, cacheFormat, body.value)
      const count =
        payload.value.kind === 'table' ? payload.value.table.rows.length : 'JSON'
      this.logger.verbose(`[${logKey}] -- Found ${count} rows`)
    }
    return payload
  }

  private toDataPayload(text: string): Result<DataPayload> {
    if (this.config.respFormat === 'csv') {
      try {
        return ok<DataPayload>({ kind: 'table', table: dropIncompleteRows(parseCsvTable(text)) })
      } catch (error) {
        return invalidResponseError('CSV', error)
      }
    }
    try {
      return ok<DataPayload>({ kind: 'json', data: parseJson(text) })
    } catch (error) {
      return invalidResponseError('JSON', error)
    }
  }

  /**
   * Fetch the recipes available to this API key.
   */
  async getRecipes(): Promise<Result<DataPayload>> {
    const query = buildQuery({ auth_token: this.config.apiKey })
    const response = await this.request(`${this.config.apiUrl}/recipes/?${query.toString()}`)
    if (!response.ok) return response

    const body = await this.readText(response.value)
    if (!body.ok) return body

    let data: JsonValue
    try {
      data = parseJson(body.value)
    } catch (error) {
      return invalidResponseError('recipes', error)
    }

    if (this.config.respFormat !== 'csv') {
      return ok<DataPayload>({ kind: 'json', data })
    }
    if (!isRecordList(data)) {
      return invalidResponseError('recipes', 'expected a list of recipe records')
    }
    const table = dropEmptyColumns(tableFromRecords(data))
    this.logger.verbose(`Found ${table.rows.length} recipes`)
    return ok<DataPayload>({ kind: 'table', table })
  }

  /**
   * Fetch the saved selections visible to this API key.
   */
  async getSelections(params: SelectionParams = {}): Promise<Result<SelectionsPayload>> {
    const query = buildQuery({
      auth_token: this.config.apiKey,
      format: 'json',
      status: params.status || undefined,
      show: params.show || undefined,
      filter: params.filter || undefined
    })
    this.logger.verbose(
      `Querying selections with parameters: ${JSON.stringify({ ...params, format: 'json' })}`
    )

    const response = await this.request(`${this.config.apiUrl}/selections/?${query.toString()}`)
    if (!response.ok) return response

    const body = await this.readText(response.value)
    if (!body.ok) return body

    let selections: ReturnType<typeof parseSelections>
    try {
      selections = parseSelections(body.value.trim() === '' ? null : parseJson(body.value))
    } catch (error) {
      return invalidResponseError('selections', error)
    }
    if (!selections) {
      return invalidResponseError('selections', 'unexpected selection record')
    }

    this.logger.verbose(`Found ${selections.length} selections`)
    if (this.config.respFormat === 'csv') {
      return ok<SelectionsPayload>({
        kind: 'table',
        table: dropEmptyColumns(tableFromRecords(selections))
      })
    }
    return ok<SelectionsPayload>({ kind: 'json', data: { selections } })
  }

  /**
   * Fetch grid (pivot table) data for a recipe.
   *
   * Filtered requests are sent as POST, unfiltered ones as GET. With caching
   * enabled the raw response is stored and reused for identical requests,
   * however the filters were ordered.
   *
   * @throws InvalidInputError for an unsupported respFormat or malformed filters
   */
  async getGridData(recipePk: number, options: GridDataOptions = {}): Promise<Result<GridData>> {
    const { isExpanded = true, isMelted = true, respFormat = 'dataframe', filters } = options
    if (!isGridFormat(respFormat)) {
      throw new InvalidInputError("resp_format must be 'dataframe', 'parquet', or 'csv'")
    }
    if (filters !== undefined) {
      validateDimensionFilters(filters)
    }

    // Dataframes are built from parquet, the more compact wire format
    const apiFormat: ApiFormat = respFormat === 'dataframe' ? 'parquet' : respFormat
    const cacheKey = generateCacheKey([
      recipePk,
      isExpanded,
      isMelted,
      apiFormat,
      filters === undefined ? null : normalizeDimensionFilters(filters)
    ])

    if (this.cache) {
      const cached = await this.readGridCache(cacheKey, respFormat, apiFormat)
      if (cached) {
        this.logger.verbose(`[${recipePk}] -- Loaded grid data from cache`)
        return ok(cached)
      }
    }

    const fetched = await this.fetchGrid(recipePk, apiFormat, isExpanded, isMelted, filters)
    if (!fetched.ok) return fetched
    if (fetched.value.length === 0) return emptyResponseError()

    this.cache?.write(cacheKey, apiFormat, fetched.value)
    return this.toGridData(recipePk, respFormat, fetched.value)
  }

  private async readGridCache(
    cacheKey: string,
    respFormat: GridFormat,
    apiFormat: ApiFormat
  ): Promise<GridData | null> {
    if (!this.cache) return null
    switch (respFormat) {
      case 'csv': {
        const text = await this.cache.read(cacheKey, 'csv', apiFormat)
        return text === null ? null : { format: 'csv', text }
      }
      case 'parquet': {
        const bytes = await this.cache.read(cacheKey, 'parquet', apiFormat)
        return bytes === null ? null : { format: 'parquet', bytes }
      }
      case 'dataframe': {
        const table = await this.cache.read(cacheKey, 'dataframe', apiFormat)
        return table === null ? null : { format: 'dataframe', table }
      }
    }
  }

  private async fetchGrid(
    recipePk: number,
    apiFormat: ApiFormat,
    isExpanded: boolean,
    isMelted: boolean,
    filters: FilterSetInput | undefined
  ): Promise<Result<CachePayload>> {
    const url = `${this.config.apiUrl}/download/recipes/${recipePk}/`

    let response: Result<HttpResponse>
    if (filters !== undefined) {
      this.logger.verbose(`[${recipePk}] -- POST with filters: ${JSON.stringify(filters)}`)
      response = await this.request(url, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.config.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          respFormat: apiFormat,
          isExpanded,
          isMelted,
          selectdimensionnodes: filters
        })
      })
    } else {
      const query = buildQuery({ respFormat: apiFormat, isExpanded, isMelted })
      this.logger.verbose(`[${recipePk}] -- Querying with parameters: ${query.toString()}`)
      query.set('auth_token', this.config.apiKey)
      response = await this.request(`${url}?${query.toString()}`)
    }
    if (!response.ok) return response

    return apiFormat === 'parquet'
      ? this.readBytes(response.value)
      : this.readText(response.value)
  }

  private async toGridData(
    recipePk: number,
    respFormat: GridFormat,
    payload: CachePayload
  ): Promise<Result<GridData>> {
    switch (respFormat) {
      case 'csv':
        this.logger.verbose(`[${recipePk}] -- Returning raw CSV data`)
        return ok<GridData>({
          format: 'csv',
          text: typeof payload === 'string' ? payload : new TextDecoder().decode(payload)
        })
      case 'parquet':
        this.logger.verbose(`[${recipePk}] -- Returning raw parquet data`)
        return ok<GridData>({
          format: 'parquet',
          bytes: typeof payload === 'string' ? new TextEncoder().encode(payload) : payload
        })
      case 'dataframe': {
        let table: Table
        try {
          table =
            typeof payload === 'string'
              ? parseCsvTable(payload)
              : await parseParquetTable(payload)
        } catch (error) {
          return invalidResponseError(typeof payload === 'string' ? 'CSV' : 'parquet', error)
        }
        const cleaned = dropEmptyColumns(table)
        this.logger.verbose(`[${recipePk}] -- Found ${cleaned.rows.length} rows`)
        return ok<GridData>({ format: 'dataframe', table: cleaned })
      }
    }
  }

  /**
   * Delete every cached response.
   *
   * @returns number of files deleted (0 when caching is off)
   */
  clearCache(): number {
    return this.cache?.clear() ?? 0
  }

  private async request(url: string, init?: RequestInit): Promise<Result<HttpResponse>> {
    let response: HttpResponse
    try {
      response = await httpFetch(url, init)
    } catch (error) {
      return handleNetworkError(error)
    }
    if (!response.ok) {
      return handleHttpError(response)
    }
    return ok(response)
  }

  private async readText(response: HttpResponse): Promise<Result<string>> {
    try {
      return ok(await response.text())
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private async readBytes(response: HttpResponse): Promise<Result<Uint8Array>> {
    try {
      return ok(new Uint8Array(await response.arrayBuffer()))
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

export { parseSelections, type Selection } from './selections'
export type {
  DataParams,
  DataPayload,
  GridData,
  GridDataOptions,
  SelectionParams,
  SelectionsPayload
} from './types'
