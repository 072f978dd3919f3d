/**
 * Logger
 *
 * Console logging shared by the library and the CLI.
 * `verbose` is the debug channel.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}

/**
 * Default logger for library code: nothing but errors, debug output
 * only when EASYDATA_DEBUG=true.
 */
export function defaultLogger(): Logger {
  return createLogger(true, process.env.EASYDATA_DEBUG === 'true')
}
