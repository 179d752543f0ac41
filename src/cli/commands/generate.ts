/**
 * Generate Command
 *
 * Full pipeline: read → metadata → chapters → images → format → package
 */

import { basename } from 'node:path'
import { VERSION } from '../../index'
import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import type { Logger } from '../logger'
import { runPipeline } from '../pipeline'
import { resolveSettings } from '../settings'

export async function cmdGenerate(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const config = await loadConfig(args.configFile)
  const settings = resolveSettings(config, args, process.env)

  logger.log(`\nchapterpress generate v${VERSION}`)
  logger.log(`\n📁 ${basename(args.input)}`)

  const report = await runPipeline(args.input, settings, logger)

  if (report.dryRun) {
    logger.log('\n✨ Dry run complete (no API calls made)')
    return
  }

  const { summary } = report
  logger.log(`\n✨ "${report.metadata.title}" is ready!`)
  logger.log(
    `   ${summary.total} chapter(s): ${summary.generated} generated, ${summary.cacheHits} cached, ${summary.failed} failed`
  )
  logger.log(`   ${report.package.dir}`)
}
