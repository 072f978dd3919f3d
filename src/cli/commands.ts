/**
 * CLI Commands
 *
 * Runs a parsed command against the client and prints the result.
 */

import { writeFileSync } from 'node:fs'
import { CacheStore, DEFAULT_CACHE_DIR } from '../caching/store'
import { EasyDataClient } from '../client/index'
import type { GridData } from '../client/types'
import { InvalidInputError, validateDimensionFilters } from '../filters/validate'
import { parseJson } from '../json'
import type { Logger } from '../logger'
import { tableToCsv } from '../table'
import type { FilterSetInput, Result, Table } from '../types'
import type { CLIArgs } from './args'

export interface CommandOutput {
  write: (text: string) => void
}

const stdout: CommandOutput = {
  write: (text: string) => {
    process.stdout.write(text)
  }
}

function formatJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`
}

function formatPayload(
  payload: { kind: 'table'; table: Table } | { kind: 'json'; data: unknown }
): string {
  return payload.kind === 'table' ? tableToCsv(payload.table) : formatJson(payload.data)
}

function parseFilters(json: string): FilterSetInput {
  let filters: unknown
  try {
    filters = parseJson(json)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new InvalidInputError(`--filters is not valid JSON: ${message}`)
  }
  validateDimensionFilters(filters)
  return filters
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(result.error.message)
  }
  return result.value
}

function writeGrid(grid: GridData, args: CLIArgs, out: CommandOutput, logger: Logger): void {
  if (args.output) {
    const content =
      grid.format === 'parquet'
        ? grid.bytes
        : grid.format === 'csv'
          ? grid.text
          : tableToCsv(grid.table)
    writeFileSync(args.output, content)
    logger.success(`Wrote ${args.output}`)
    return
  }

  switch (grid.format) {
    case 'parquet':
      throw new InvalidInputError('Parquet output needs --output <file>')
    case 'csv':
      out.write(grid.text)
      return
    case 'dataframe':
      out.write(tableToCsv(grid.table))
      return
  }
}

function createClient(args: CLIArgs, logger: Logger): EasyDataClient {
  return new EasyDataClient({
    apiKey: args.apiKey,
    apiUrl: args.apiUrl,
    cacheDir: args.cacheDir,
    useCache: args.useCache,
    respFormat: args.respFormat,
    logger
  })
}

/**
 * Run a parsed CLI command.
 *
 * @throws InvalidInputError for bad arguments, Error for failed API calls
 */
export async function runCommand(
  args: CLIArgs,
  logger: Logger,
  out: CommandOutput = stdout
): Promise<void> {
  switch (args.command) {
    case 'help':
      return

    case 'recipes': {
      const recipes = unwrap(await createClient(args, logger).getRecipes())
      out.write(formatPayload(recipes))
      return
    }

    case 'selections': {
      const selections = unwrap(
        await createClient(args, logger).getSelections({
          status: args.status,
          show: args.show,
          filter: args.filter
        })
      )
      out.write(formatPayload(selections))
      return
    }

    case 'data': {
      const data = unwrap(
        await createClient(args, logger).getData({
          timeSeriesCodes: args.timeSeriesCodes,
          selectionPk: args.selectionPk,
          freq: args.freq,
          startYear: args.startYear,
          endYear: args.endYear,
          analysis: args.analysis
        })
      )
      out.write(formatPayload(data))
      return
    }

    case 'grid': {
      if (args.recipePk === undefined) {
        throw new InvalidInputError('Recipe id must be an integer')
      }
      const filters = args.filtersJson === undefined ? undefined : parseFilters(args.filtersJson)
      const grid = unwrap(
        await createClient(args, logger).getGridData(args.recipePk, {
          isExpanded: args.isExpanded,
          isMelted: args.isMelted,
          respFormat: args.gridFormat,
          filters
        })
      )
      writeGrid(grid, args, out, logger)
      return
    }

    case 'cache': {
      if (args.cacheAction !== 'clear') {
        throw new InvalidInputError(`Unknown cache action: ${String(args.cacheAction)}`)
      }
      const cacheDir = args.cacheDir || process.env.EASYDATA_CACHE_DIR || DEFAULT_CACHE_DIR
      const deleted = new CacheStore(cacheDir, logger).clear()
      logger.success(`Deleted ${deleted} cached file${deleted === 1 ? '' : 's'}`)
      return
    }
  }
}
