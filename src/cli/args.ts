/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 * Options left unset stay undefined so config file values and defaults can
 * fill them in (see settings.ts).
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CacheAction = 'stats' | 'clear'
export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  input: string
  outputDir: string | undefined
  formats: string[] | undefined
  title: string | undefined
  author: string | undefined
  language: string | undefined
  provider: string | undefined
  model: string | undefined
  workers: number | undefined
  maxAttempts: number | undefined
  illustrations: number | undefined
  sequential: boolean
  images: boolean
  dryRun: boolean
  quiet: boolean
  verbose: boolean
  noCache: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  /** For cache command */
  cacheAction: CacheAction
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Turn a plain-text manuscript into a finished book.

Each section of the manuscript is expanded into a chapter by a language model,
then the book is rendered (PDF, EPUB, HTML) and packaged with its artifacts.
Generated chapters are cached, so re-running only pays for what changed.

Examples:
  $ chapterpress generate notes.txt
  $ chapterpress generate notes.txt -f pdf,epub --title "Tidal Gardens"
  $ chapterpress generate notes.txt --dry-run
  $ chapterpress cache stats`

function createProgram(): Command {
  const program = new Command()
    .name('chapterpress')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--no-cache', 'Ignore cached chapters and regenerate everything')
    .option('--cache-dir <dir>', 'Custom cache directory (or set CHAPTERPRESS_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set CHAPTERPRESS_CONFIG)')

  // ============ GENERATE (full pipeline) ============
  program
    .command('generate')
    .description('Generate a book (read → metadata → chapters → images → format → package)')
    .argument('<input>', 'Manuscript text file')
    .option('-o, --output-dir <dir>', 'Output directory (default: ./output)')
    .option('-f, --format <formats>', 'Output formats: pdf,epub,html (default: pdf)')
    .option('--title <title>', 'Book title (generated when not set)')
    .option('--author <name>', 'Author name')
    .option('--language <code>', 'Book language code (e.g. en)')
    .option('--provider <name>', 'Text provider: anthropic, openai')
    .option('--model <name>', 'Text model')
    .option('-w, --workers <num>', 'Chapters generated concurrently')
    .option('--sequential', 'Generate chapters one at a time')
    .option('--max-attempts <num>', 'Attempts per chapter, including the first')
    .option('--images', 'Generate a cover image (needs OPENAI_API_KEY)')
    .option('--illustrations <num>', 'Chapter illustrations to generate (implies --images)')
    .option('--dry-run', 'Show sections and cache status without API calls')

  // ============ CACHE ============
  program
    .command('cache')
    .description('Inspect or clear the chapter cache')
    .argument('[action]', 'Action: stats (default), clear')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  chapterpress config                           List current settings
  chapterpress config set author "Jane Doe"     Set default author
  chapterpress config set formats pdf,epub      Set default output formats
  chapterpress config unset cacheDir            Remove custom cache dir`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/** NaN is passed through so settings validation can report it. */
function optionalInt(value: unknown): number | undefined {
  return typeof value === 'string' ? Number.parseInt(value, 10) : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  const illustrations = optionalInt(opts.illustrations)

  return {
    command: commandName,
    input,
    outputDir: optionalString(opts.outputDir),
    formats:
      typeof opts.format === 'string'
        ? opts.format
            .split(',')
            .map((f) => f.trim())
            .filter((f) => f.length > 0)
        : undefined,
    title: optionalString(opts.title),
    author: optionalString(opts.author),
    language: optionalString(opts.language),
    provider: optionalString(opts.provider),
    model: optionalString(opts.model),
    workers: optionalInt(opts.workers),
    maxAttempts: optionalInt(opts.maxAttempts),
    illustrations,
    sequential: opts.sequential === true,
    images: opts.images === true || (illustrations !== undefined && illustrations > 0),
    dryRun: opts.dryRun === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noCache: opts.cache === false,
    cacheDir: optionalString(opts.cacheDir),
    configFile: optionalString(opts.configFile),
    cacheAction: 'stats',
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseCacheAction(action: string | undefined): CacheAction {
  return action === 'clear' ? 'clear' : 'stats'
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    switch (cmd.name()) {
      case 'cache':
        cmd.action((action?: string) => {
          onParsed({
            ...buildCLIArgs('cache', '', cmd.optsWithGlobals()),
            cacheAction: parseCacheAction(action)
          })
        })
        break
      case 'config':
        cmd.action((action?: string, key?: string, value?: string) => {
          onParsed({
            ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
            configAction: parseConfigAction(action),
            configKey: key,
            configValue: value
          })
        })
        break
      default:
        cmd.action((input: string) => {
          onParsed(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
        })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version; anything else is a real parse error
    if (!(error instanceof Error && 'code' in error && isHelpOrVersion(error.code))) {
      throw error
    }
  }

  return result ?? buildCLIArgs('help', '', {})
}

function isHelpOrVersion(code: unknown): boolean {
  return code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help'
}
