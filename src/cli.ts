#!/usr/bin/env node
/**
 * chapterpress CLI
 *
 * Local orchestrator for the core library.
 * Handles file IO, configuration, parallel generation and progress reporting.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdCache } from './cli/commands/cache'
import { cmdConfig } from './cli/commands/config'
import { cmdGenerate } from './cli/commands/generate'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'generate':
        await cmdGenerate(args, logger)
        break

      case 'cache':
        await cmdCache(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'chapterpress --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
