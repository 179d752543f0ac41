/**
 * Cache Command
 *
 * Show the chapter cache location and size, or clear it.
 */

import { FilesystemCache } from '../../cache/filesystem'
import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import type { Logger } from '../logger'
import { getCacheDir } from '../settings'

export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile)
  const cacheDir = getCacheDir(args.cacheDir, process.env, config ?? undefined)
  const cache = new FilesystemCache(cacheDir, { logger })

  switch (args.cacheAction) {
    case 'stats': {
      const { entryCount } = cache.stats()
      logger.log(`\nCache directory: ${cacheDir}`)
      logger.log(`Cached entries: ${entryCount}`)
      break
    }
    case 'clear': {
      const { entryCount } = cache.stats()
      await cache.clear()
      logger.success(`Removed ${entryCount} cached entries from ${cacheDir}`)
      break
    }
  }
}
