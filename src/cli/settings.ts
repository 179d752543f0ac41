/**
 * Generation Settings
 *
 * Merges CLI args, the config file and defaults into one validated settings
 * object. Precedence: CLI args > config file > defaults.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_IMAGE_MODEL, DEFAULT_MODELS, getApiKeyEnvVar, isTextProvider } from '../providers/models'
import { DEFAULT_RECOVERABLE_ERRORS, type RetryConfig, validateRetryConfig } from '../retry/index'
import {
  API_ERROR_TYPES,
  type ApiErrorType,
  isApiErrorType,
  isOutputFormat,
  type ModelParameters,
  OUTPUT_FORMATS,
  type OutputFormat,
  type TextProvider
} from '../types'
import type { CLIArgs } from './args'
import { type Config, ConfigError } from './config'

export const DEFAULTS = {
  provider: 'anthropic',
  temperature: 0.7,
  maxTokens: 4000,
  maxWorkers: 3,
  parallel: true,
  useCache: true,
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  requestTimeoutMs: 120_000,
  chunkSize: 2000,
  formats: ['pdf'],
  author: 'Unknown Author',
  language: 'en',
  images: false,
  illustrations: 0,
  maxFailedChapters: 0,
  outputDir: './output'
} as const

export interface GenerationSettings {
  readonly modelParameters: ModelParameters
  readonly imageModel: string
  /** Explicit book title; empty when the model should propose one */
  readonly title: string
  readonly author: string
  readonly language: string
  readonly outputDir: string
  readonly cacheDir: string
  readonly formats: readonly OutputFormat[]
  readonly maxWorkers: number
  readonly parallel: boolean
  /** Read cached chapters (writes happen regardless) */
  readonly useCache: boolean
  readonly retry: RetryConfig
  readonly requestTimeoutMs: number
  readonly chunkSize: number
  readonly images: boolean
  readonly illustrations: number
  readonly maxFailedChapters: number
  readonly dryRun: boolean
  readonly apiKeys: Partial<Record<TextProvider, string>>
}

type Env = Readonly<Record<string, string | undefined>>

/**
 * Get the cache directory: CLI arg > env var > config > default.
 */
export function getCacheDir(override: string | undefined, env: Env, config?: Config): string {
  return (
    override ??
    env.CHAPTERPRESS_CACHE_DIR ??
    config?.cacheDir ??
    join(homedir(), '.cache', 'chapterpress')
  )
}

function checkInteger(problems: string[], name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min} (got ${value})`)
  }
}

/**
 * Resolve and validate settings for the generate command.
 *
 * @throws ConfigError listing every problem found
 */
export function resolveSettings(config: Config | null, args: CLIArgs, env: Env): GenerationSettings {
  const cfg: Config = config ?? {}
  const problems: string[] = []

  const providerName = args.provider ?? cfg.provider ?? DEFAULTS.provider
  let provider: TextProvider = DEFAULTS.provider
  if (isTextProvider(providerName)) {
    provider = providerName
  } else {
    problems.push(`Unknown provider "${providerName}" (expected anthropic or openai)`)
  }

  const formats: OutputFormat[] = []
  for (const format of args.formats ?? cfg.formats ?? DEFAULTS.formats) {
    const normalized = format.toLowerCase()
    if (!isOutputFormat(normalized)) {
      problems.push(`Unknown format "${format}" (expected ${OUTPUT_FORMATS.join(', ')})`)
    } else if (!formats.includes(normalized)) {
      formats.push(normalized)
    }
  }
  if (formats.length === 0 && problems.length === 0) {
    problems.push('At least one output format is required')
  }

  const modelParameters: ModelParameters = {
    provider,
    model: args.model ?? cfg.model ?? DEFAULT_MODELS[provider],
    temperature: cfg.temperature ?? DEFAULTS.temperature,
    maxTokens: cfg.maxTokens ?? DEFAULTS.maxTokens
  }
  if (
    !Number.isFinite(modelParameters.temperature) ||
    modelParameters.temperature < 0 ||
    modelParameters.temperature > 1
  ) {
    problems.push(`temperature must be between 0 and 1 (got ${modelParameters.temperature})`)
  }
  checkInteger(problems, 'maxTokens', modelParameters.maxTokens, 1)

  const recoverableErrors: ApiErrorType[] = []
  for (const kind of cfg.recoverableErrors ?? DEFAULT_RECOVERABLE_ERRORS) {
    if (!isApiErrorType(kind)) {
      problems.push(
        `Unknown error kind "${kind}" in recoverableErrors (expected ${API_ERROR_TYPES.join(', ')})`
      )
    } else if (!recoverableErrors.includes(kind)) {
      recoverableErrors.push(kind)
    }
  }

  const retry: RetryConfig = {
    maxAttempts: args.maxAttempts ?? cfg.maxAttempts ?? DEFAULTS.maxAttempts,
    baseDelayMs: cfg.baseDelayMs ?? DEFAULTS.baseDelayMs,
    backoffMultiplier: cfg.backoffMultiplier ?? DEFAULTS.backoffMultiplier,
    recoverableErrors
  }
  problems.push(...validateRetryConfig(retry))

  const maxWorkers = args.workers ?? cfg.maxWorkers ?? DEFAULTS.maxWorkers
  checkInteger(problems, 'maxWorkers', maxWorkers, 1)
  const requestTimeoutMs = cfg.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs
  checkInteger(problems, 'requestTimeoutMs', requestTimeoutMs, 1)
  const chunkSize = cfg.chunkSize ?? DEFAULTS.chunkSize
  checkInteger(problems, 'chunkSize', chunkSize, 1)
  const illustrations = args.illustrations ?? cfg.illustrations ?? DEFAULTS.illustrations
  checkInteger(problems, 'illustrations', illustrations, 0)
  const maxFailedChapters = cfg.maxFailedChapters ?? DEFAULTS.maxFailedChapters
  checkInteger(problems, 'maxFailedChapters', maxFailedChapters, 0)

  const images = args.images || (cfg.images ?? DEFAULTS.images)

  const apiKeys: Partial<Record<TextProvider, string>> = {}
  const anthropicKey = env.ANTHROPIC_API_KEY
  const openaiKey = env.OPENAI_API_KEY
  if (anthropicKey) apiKeys.anthropic = anthropicKey
  if (openaiKey) apiKeys.openai = openaiKey

  if (!args.dryRun) {
    if (!apiKeys[provider]) {
      problems.push(`${getApiKeyEnvVar(provider)} is not set (required for provider ${provider})`)
    }
    if (images && !openaiKey && provider !== 'openai') {
      problems.push('OPENAI_API_KEY is not set (required for image generation)')
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid settings:\n${problems.map((p) => `  - ${p}`).join('\n')}`)
  }

  return {
    modelParameters,
    imageModel: cfg.imageModel ?? DEFAULT_IMAGE_MODEL,
    title: args.title ?? '',
    author: args.author ?? cfg.author ?? DEFAULTS.author,
    language: args.language ?? cfg.language ?? DEFAULTS.language,
    outputDir: args.outputDir ?? cfg.outputDir ?? DEFAULTS.outputDir,
    cacheDir: getCacheDir(args.cacheDir, env, cfg),
    formats,
    maxWorkers,
    parallel: !args.sequential && (cfg.parallel ?? DEFAULTS.parallel),
    useCache: !args.noCache && (cfg.useCache ?? DEFAULTS.useCache),
    retry,
    requestTimeoutMs,
    chunkSize,
    images,
    illustrations: images ? illustrations : 0,
    maxFailedChapters,
    dryRun: args.dryRun,
    apiKeys
  }
}
