/**
 * EasyData Client Tests
 */

import { readdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parquetWriteBuffer } from 'hyparquet-writer'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { HttpResponse } from '../http'
import type { Logger } from '../logger'
import type { FilterSetInput } from '../types'

// Use vi.hoisted to create mock before module mocking
const mockFetch = vi.hoisted(() =>
  vi.fn<(url: string, init?: RequestInit) => Promise<HttpResponse>>()
)

vi.mock('../http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../http')>()
  return { ...actual, httpFetch: mockFetch }
})

import { InvalidInputError } from '../filters/validate'
import { EasyDataClient } from './index'

const API_URL = 'https://api.test/v3'

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buffer).set(bytes)
  return buffer
}

function createMockResponse(body: string | ArrayBuffer, status = 200): HttpResponse {
  const text = typeof body === 'string' ? body : new TextDecoder().decode(body)
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: () => null },
    text: async () => text,
    json: async () => JSON.parse(text),
    arrayBuffer: async () =>
      typeof body === 'string' ? toArrayBuffer(new TextEncoder().encode(body)) : body
  }
}

function createMockLogger(): Logger {
  return { log: vi.fn(), verbose: vi.fn(), success: vi.fn(), error: vi.fn() }
}

function lastInit(): RequestInit | undefined {
  return mockFetch.mock.lastCall?.[1]
}

describe('EasyDataClient', () => {
  let cacheDir: string

  function createClient(options: { respFormat?: string; useCache?: boolean } = {}) {
    return new EasyDataClient({
      apiKey: 'test-key',
      apiUrl: API_URL,
      cacheDir,
      logger: createMockLogger(),
      ...options
    })
  }

  beforeEach(() => {
    mockFetch.mockReset()
    cacheDir = join(tmpdir(), `easydata-client-test-${Date.now()}-${Math.random()}`)
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    rmSync(cacheDir, { recursive: true, force: true })
  })

  describe('constructor', () => {
    it('should throw without an API key', () => {
      vi.stubEnv('EASYDATA_API_KEY', '')

      expect(() => new EasyDataClient({ apiUrl: API_URL })).toThrow(InvalidInputError)
    })

    it('should read the API key from the environment', () => {
      vi.stubEnv('EASYDATA_API_KEY', 'env-key')

      expect(new EasyDataClient({ apiUrl: API_URL }).config.apiKey).toBe('env-key')
    })
  })

  describe('getData', () => {
    it('should require codes or a selection', async () => {
      await expect(createClient().getData()).rejects.toThrow(
        'Either time_series_codes or selection_pk must be provided'
      )
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should download series by code and drop incomplete rows', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse('date,value\n2024-01,1.5\n2024-02,\n2024-03,2\n')
      )

      const result = await createClient().getData({ timeSeriesCodes: 'A,B' })

      expect(mockFetch).toHaveBeenCalledWith(
        `${API_URL}/download/?respFormat=csv&freqs=M&startYear=&endYear=&isTidy=True&analysis=False&timeSeriesCodes=A%2CB&auth_token=test-key`,
        undefined
      )
      expect(result).toEqual({
        ok: true,
        value: {
          kind: 'table',
          table: {
            columns: ['date', 'value'],
            rows: [
              { date: '2024-01', value: 1.5 },
              { date: '2024-03', value: 2 }
            ]
          }
        }
      })
    })

    it('should query by selection when given one', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('date,value\n2024-01,1\n'))

      await createClient().getData({ timeSeriesCodes: 'A', selectionPk: 7, freq: 'Q' })

      const url = mockFetch.mock.lastCall?.[0] ?? ''
      expect(url).toContain('freqs=Q')
      expect(url).toContain('selectionPk=7')
      expect(url).not.toContain('timeSeriesCodes')
    })

    it('should return parsed JSON in json mode', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('[{"date":"2024-01","value":1}]'))

      const result = await createClient({ respFormat: 'json' }).getData({ selectionPk: 7 })

      expect(result).toEqual({
        ok: true,
        value: { kind: 'json', data: [{ date: '2024-01', value: 1 }] }
      })
    })

    it('should serve repeated requests from the cache', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('date,value\n2024-01,1\n'))
      const client = createClient({ useCache: true })

      const first = await client.getData({ timeSeriesCodes: 'A' })
      const second = await client.getData({ timeSeriesCodes: 'A' })

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(second).toEqual(first)
    })

    it('should refetch when the cached entry is corrupt', async () => {
      mockFetch
        .mockResolvedValueOnce(createMockResponse('[{"value":1}]'))
        .mockResolvedValueOnce(createMockResponse('[{"value":2}]'))
      const client = createClient({ respFormat: 'json', useCache: true })

      await client.getData({ timeSeriesCodes: 'A' })
      const [entry] = readdirSync(cacheDir)
      writeFileSync(join(cacheDir, entry ?? ''), '{"a":')

      const second = await client.getData({ timeSeriesCodes: 'A' })
      const third = await client.getData({ timeSeriesCodes: 'A' })

      expect(mockFetch).toHaveBeenCalledTimes(2)
      expect(second).toEqual({ ok: true, value: { kind: 'json', data: [{ value: 2 }] } })
      expect(third).toEqual(second)
    })

    it('should map HTTP errors', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('Invalid token', 401))

      const result = await createClient().getData({ timeSeriesCodes: 'A' })

      expect(result).toEqual({
        ok: false,
        error: { type: 'auth', message: 'Authentication failed: Invalid token' }
      })
    })

    it('should map network failures', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'))

      const result = await createClient().getData({ timeSeriesCodes: 'A' })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('network')
      }
    })
  })

  describe('getRecipes', () => {
    const recipes = '[{"id":1,"title":"GDP","notes":null},{"id":2,"title":"CPI","notes":null}]'

    it('should return recipes as a table without empty columns', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(recipes))

      const result = await createClient().getRecipes()

      expect(mockFetch).toHaveBeenCalledWith(`${API_URL}/recipes/?auth_token=test-key`, undefined)
      expect(result).toEqual({
        ok: true,
        value: {
          kind: 'table',
          table: {
            columns: ['id', 'title'],
            rows: [
              { id: 1, title: 'GDP' },
              { id: 2, title: 'CPI' }
            ]
          }
        }
      })
    })

    it('should return raw JSON in json mode', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(recipes))

      const result = await createClient({ respFormat: 'json' }).getRecipes()

      expect(result.ok && result.value.kind).toBe('json')
    })

    it('should reject a body that is not a list of records', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('{"detail":"nope"}'))

      const result = await createClient().getRecipes()

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('invalid_response')
      }
    })
  })

  describe('getSelections', () => {
    const selections = JSON.stringify([
      {
        id: 5,
        title: 'Mining',
        is_owner: false,
        owner: { username: 'analyst' },
        status: 'S',
        modified: '2024-05-01',
        timeseriescodes: ['M-1']
      }
    ])

    it('should pass filters and flatten records', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(selections))

      const result = await createClient({ respFormat: 'json' }).getSelections({ status: 'PSO' })

      expect(mockFetch).toHaveBeenCalledWith(
        `${API_URL}/selections/?auth_token=test-key&format=json&status=PSO`,
        undefined
      )
      expect(result).toEqual({
        ok: true,
        value: {
          kind: 'json',
          data: {
            selections: [
              {
                item: 1,
                pk: 5,
                title: 'Mining',
                code_count: 1,
                is_owner: false,
                owner: 'analyst',
                status: 'S',
                description: '',
                modified: '2024-05-01'
              }
            ]
          }
        }
      })
    })

    it('should return an empty table for an empty body', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(''))

      const result = await createClient().getSelections()

      expect(result).toEqual({ ok: true, value: { kind: 'table', table: { columns: [], rows: [] } } })
    })
  })

  describe('getGridData', () => {
    it('should reject an unknown format before fetching', async () => {
      await expect(createClient().getGridData(1066, { respFormat: 'xml' })).rejects.toThrow(
        "resp_format must be 'dataframe', 'parquet', or 'csv'"
      )
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should reject invalid filters before fetching', async () => {
      // Filters usually arrive as user JSON, unchecked
      const filters: FilterSetInput = JSON.parse('{"dimension":"d9","levels":[1]}')

      await expect(createClient().getGridData(1066, { filters })).rejects.toThrow(
        InvalidInputError
      )
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should GET unfiltered grids', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('a,b\n1,2\n'))

      const result = await createClient().getGridData(1066, { respFormat: 'csv', isMelted: false })

      expect(mockFetch).toHaveBeenCalledWith(
        `${API_URL}/download/recipes/1066/?respFormat=csv&isExpanded=True&isMelted=False&auth_token=test-key`,
        undefined
      )
      expect(result).toEqual({ ok: true, value: { format: 'csv', text: 'a,b\n1,2\n' } })
    })

    it('should POST filtered grids with token auth', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('a\n1\n'))
      const filters = [{ dimension: 'd3', levels: [2] }] as const

      await createClient().getGridData(1066, { respFormat: 'csv', filters })

      expect(mockFetch.mock.lastCall?.[0]).toBe(`${API_URL}/download/recipes/1066/`)
      const init = lastInit()
      expect(init?.method).toBe('POST')
      expect(init?.headers).toEqual({
        Authorization: 'Token test-key',
        'Content-Type': 'application/json'
      })
      expect(JSON.parse(String(init?.body))).toEqual({
        respFormat: 'csv',
        isExpanded: true,
        isMelted: true,
        selectdimensionnodes: [{ dimension: 'd3', levels: [2] }]
      })
    })

    it('should load dataframes from parquet', async () => {
      const parquet = parquetWriteBuffer({
        columnData: [
          { name: 'region', data: ['North', 'South'] },
          { name: 'value', data: [10.5, 20.5] }
        ]
      })
      mockFetch.mockResolvedValueOnce(createMockResponse(parquet))

      const result = await createClient().getGridData(1066)

      expect(mockFetch.mock.lastCall?.[0]).toContain('respFormat=parquet')
      expect(result).toEqual({
        ok: true,
        value: {
          format: 'dataframe',
          table: {
            columns: ['region', 'value'],
            rows: [
              { region: 'North', value: 10.5 },
              { region: 'South', value: 20.5 }
            ]
          }
        }
      })
    })

    it('should report an unreadable parquet body', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('not parquet'))

      const result = await createClient().getGridData(1066)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('invalid_response')
        expect(result.error.message).toContain('Failed to parse parquet response')
      }
    })

    it('should report an empty grid body without caching it', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(''))
      const client = createClient({ useCache: true })

      const result = await client.getGridData(1066, { respFormat: 'csv' })

      expect(result).toEqual({
        ok: false,
        error: { type: 'invalid_response', message: 'Empty response from API' }
      })
      expect(client.clearCache()).toBe(0)
    })

    it('should reuse the cache however the filters are ordered', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse('a\n1\n'))
      const client = createClient({ useCache: true })

      const first = await client.getGridData(1066, {
        respFormat: 'csv',
        filters: [
          { dimension: 'd1', codes: ['B', 'A'] },
          { dimension: 'd3', levels: [2] }
        ]
      })
      const second = await client.getGridData(1066, {
        respFormat: 'csv',
        filters: [
          { dimension: 'd3', levels: [2] },
          { dimension: 'd1', codes: ['A', 'B'] }
        ]
      })

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(second).toEqual(first)
      expect(client.clearCache()).toBe(1)
    })

    it('should not cache failed requests', async () => {
      mockFetch
        .mockResolvedValueOnce(createMockResponse('Server error', 500))
        .mockResolvedValueOnce(createMockResponse('a\n1\n'))
      const client = createClient({ useCache: true })

      const first = await client.getGridData(1066, { respFormat: 'csv' })
      const second = await client.getGridData(1066, { respFormat: 'csv' })

      expect(first.ok).toBe(false)
      expect(second).toEqual({ ok: true, value: { format: 'csv', text: 'a\n1\n' } })
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })
  })

  describe('clearCache', () => {
    it('should return 0 when caching is off', () => {
      expect(createClient().clearCache()).toBe(0)
    })
  })
})
