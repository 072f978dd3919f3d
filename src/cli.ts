#!/usr/bin/env node
/**
 * EasyData CLI
 *
 * Command line front end for the client library.
 */

import { parseCliArgs } from './cli/args'
import { runCommand } from './cli/commands'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    await runCommand(args, logger)
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exitCode = 1
  }
}

void main()
