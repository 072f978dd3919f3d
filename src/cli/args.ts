/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'

export type CommandName = 'recipes' | 'selections' | 'data' | 'grid' | 'cache' | 'help'

export interface CLIArgs {
  command: CommandName
  quiet: boolean
  verbose: boolean
  apiKey: string | undefined
  apiUrl: string | undefined
  cacheDir: string | undefined
  useCache: boolean
  /** Response format for recipes, selections and time series */
  respFormat: string | undefined
  // selections
  status: string | undefined
  show: string | undefined
  filter: string | undefined
  // data
  timeSeriesCodes: string | undefined
  selectionPk: number | undefined
  freq: string
  startYear: string
  endYear: string
  analysis: boolean
  // grid
  recipePk: number | undefined
  gridFormat: string
  /** Raw JSON of the dimension filters */
  filtersJson: string | undefined
  isExpanded: boolean
  isMelted: boolean
  output: string | undefined
  // cache
  cacheAction: string | undefined
}

const DESCRIPTION = `Query the EasyData statistical API from the command line.

Examples:
  $ easydata recipes
  $ easydata selections --status PSO
  $ easydata data --codes NMS-EC_BUS,NMS-GA_BUS --freq Q
  $ easydata grid 1066 --filters '{"dimension":"d3","levels":[2]}'
  $ easydata grid 1066 --format parquet --output grid.parquet
  $ easydata cache clear`

const COMMAND_NAMES: readonly CommandName[] = ['recipes', 'selections', 'data', 'grid', 'cache']

function createProgram(exitOnHelp: boolean): Command {
  const program = new Command()
  if (!exitOnHelp) {
    // Set before adding subcommands so they inherit it
    program.exitOverride()
  }

  program
    .name('easydata')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--api-key <key>', 'API key (or set EASYDATA_API_KEY)')
    .option('--api-url <url>', 'API base URL (or set EASYDATA_API_URL)')
    .option('--cache-dir <dir>', 'Cache directory (or set EASYDATA_CACHE_DIR)')
    .option('--no-cache', 'Always fetch from the API and do not store responses')

  program
    .command('recipes')
    .description('List the recipes available to your API key')
    .option('--resp-format <format>', 'csv or json', 'csv')

  program
    .command('selections')
    .description('List your saved selections')
    .option('--status <flags>', 'Status flags: U=Unsaved, P=Private, S=Shared, O=Open (e.g. PSO)')
    .option('--show <type>', 'Selection type: shared or open')
    .option('--filter <name>', 'Additional filter (e.g. active)')
    .option('--resp-format <format>', 'csv or json', 'csv')

  program
    .command('data')
    .description('Download time series by codes or saved selection')
    .option('--codes <codes>', 'Comma-separated time series codes')
    .option('--selection <pk>', 'Saved selection id (takes precedence over --codes)')
    .option('--freq <freq>', 'Frequency: M, Q, A', 'M')
    .option('--start <date>', 'Start date (YYYY-MM-DD)', '')
    .option('--end <date>', 'End date (YYYY-MM-DD)', '')
    .option('--analysis', 'Include analysis')
    .option('--resp-format <format>', 'csv or json', 'csv')

  program
    .command('grid')
    .description('Download grid (pivot table) data for a recipe')
    .argument('<recipePk>', 'Recipe id')
    .option('-f, --format <format>', 'dataframe, csv or parquet', 'dataframe')
    .option('--filters <json>', 'Dimension filter JSON (one object or a list)')
    .option('--not-expanded', 'Request unexpanded data')
    .option('--not-melted', 'Request unmelted data')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')

  program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear')

  return program
}

function parseInteger(value: unknown): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isInteger(parsed) ? parsed : undefined
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((c) => c === name)
}

function buildCLIArgs(
  command: CommandName,
  argument: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    apiKey: optionalString(opts.apiKey),
    apiUrl: optionalString(opts.apiUrl),
    cacheDir: optionalString(opts.cacheDir),
    useCache: opts.cache !== false,
    respFormat: optionalString(opts.respFormat),
    status: optionalString(opts.status),
    show: optionalString(opts.show),
    filter: optionalString(opts.filter),
    timeSeriesCodes: optionalString(opts.codes),
    selectionPk: parseInteger(opts.selection),
    freq: optionalString(opts.freq) ?? 'M',
    startYear: optionalString(opts.start) ?? '',
    endYear: optionalString(opts.end) ?? '',
    analysis: opts.analysis === true,
    recipePk: command === 'grid' ? parseInteger(argument) : undefined,
    gridFormat: optionalString(opts.format) ?? 'dataframe',
    filtersJson: optionalString(opts.filters),
    isExpanded: opts.notExpanded !== true,
    isMelted: opts.notMelted !== true,
    output: optionalString(opts.output),
    cacheAction: command === 'cache' ? argument : undefined
  }
}

/**
 * Parse CLI arguments (without the node binary and script path).
 * With exitOnHelp off, --help and --version yield the 'help' command
 * instead of exiting.
 */
export function parseArgs(argv: readonly string[], exitOnHelp = true): CLIArgs {
  const program = createProgram(exitOnHelp)

  const parsed: { args?: CLIArgs } = {}

  // Use optsWithGlobals() to include global options from parent program
  for (const cmd of program.commands) {
    const name = cmd.name()
    if (!isCommandName(name)) continue
    cmd.action((argument: unknown) => {
      parsed.args = buildCLIArgs(
        name,
        typeof argument === 'string' ? argument : undefined,
        cmd.optsWithGlobals()
      )
    })
  }

  try {
    program.parse([...argv], { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version and on usage errors
    if (exitOnHelp) throw error
  }

  return parsed.args ?? buildCLIArgs('help', undefined, {})
}

export function parseCliArgs(): CLIArgs {
  return parseArgs(process.argv.slice(2))
}
