/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/chapterpress/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or CHAPTERPRESS_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

/**
 * Raised for unusable configuration: bad config file, invalid setting values.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Text provider: anthropic or openai */
  provider?: string | undefined
  /** Text model name */
  model?: string | undefined
  /** Image model name */
  imageModel?: string | undefined
  /** Default author name */
  author?: string | undefined
  /** Book language code (e.g. "en") */
  language?: string | undefined
  /** Output directory for packages */
  outputDir?: string | undefined
  /** Custom cache directory */
  cacheDir?: string | undefined

  /** Sampling temperature */
  temperature?: number | undefined
  /** Max tokens per chapter */
  maxTokens?: number | undefined
  /** Chapters generated concurrently */
  maxWorkers?: number | undefined
  /** Attempts per chapter, including the first */
  maxAttempts?: number | undefined
  /** Delay before the first retry (ms) */
  baseDelayMs?: number | undefined
  /** Retry delay multiplier */
  backoffMultiplier?: number | undefined
  /** Per-request timeout (ms) */
  requestTimeoutMs?: number | undefined
  /** Target section size in characters */
  chunkSize?: number | undefined
  /** Chapter illustrations to generate */
  illustrations?: number | undefined
  /** Failed chapters tolerated before aborting */
  maxFailedChapters?: number | undefined

  /** Generate chapters in parallel */
  parallel?: boolean | undefined
  /** Read previously generated chapters from the cache */
  useCache?: boolean | undefined
  /** Generate cover and illustrations */
  images?: boolean | undefined

  /** Output formats (pdf,epub,html) */
  formats?: string[] | undefined
  /** Error kinds retried before a chapter fails */
  recoverableErrors?: string[] | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

type KeysOfType<V> = {
  [K in ConfigKey]-?: NonNullable<Config[K]> extends V ? K : never
}[ConfigKey]

type StringKey = KeysOfType<string>
type NumberKey = KeysOfType<number>
type BooleanKey = KeysOfType<boolean>
type ArrayKey = KeysOfType<string[]>

export type ConfigValue = string | number | boolean | string[]

/** Config keys that accept string values */
const STRING_KEYS: readonly StringKey[] = [
  'provider',
  'model',
  'imageModel',
  'author',
  'language',
  'outputDir',
  'cacheDir'
]
/** Config keys that accept number values */
const NUMBER_KEYS: readonly NumberKey[] = [
  'temperature',
  'maxTokens',
  'maxWorkers',
  'maxAttempts',
  'baseDelayMs',
  'backoffMultiplier',
  'requestTimeoutMs',
  'chunkSize',
  'illustrations',
  'maxFailedChapters'
]
/** Config keys that accept boolean values */
const BOOLEAN_KEYS: readonly BooleanKey[] = ['parallel', 'useCache', 'images']
/** Config keys that accept array values */
const ARRAY_KEYS: readonly ArrayKey[] = ['formats', 'recoverableErrors']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  provider: 'Text provider: anthropic or openai (default: anthropic)',
  model: 'Text model (default: per provider)',
  imageModel: 'Image model (default: dall-e-3)',
  author: 'Author name (default: Unknown Author)',
  language: 'Book language code (default: en)',
  outputDir: 'Output directory for packages (default: ./output)',
  cacheDir: 'Cache directory path (default: ~/.cache/chapterpress)',
  temperature: 'Sampling temperature (default: 0.7)',
  maxTokens: 'Max tokens per chapter (default: 4000)',
  maxWorkers: 'Chapters generated concurrently (default: 3)',
  maxAttempts: 'Attempts per chapter including the first (default: 3)',
  baseDelayMs: 'Delay before the first retry in ms (default: 1000)',
  backoffMultiplier: 'Retry delay multiplier (default: 2)',
  requestTimeoutMs: 'Per-request timeout in ms (default: 120000)',
  chunkSize: 'Target section size in characters (default: 2000)',
  illustrations: 'Chapter illustrations to generate (default: 0)',
  maxFailedChapters: 'Failed chapters tolerated before aborting (default: 0)',
  parallel: 'Generate chapters in parallel (default: true)',
  useCache: 'Reuse previously generated chapters (default: true)',
  images: 'Generate cover and illustrations (default: false)',
  formats: 'Output formats: pdf,epub,html (default: pdf)',
  recoverableErrors:
    'Error kinds to retry (default: rate_limit,network,timeout,invalid_response)'
}

function includesKey<K extends string>(keys: readonly K[], key: string): key is K {
  return keys.some((k) => k === key)
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (includesKey(BOOLEAN_KEYS, key)) return 'boolean'
  if (includesKey(NUMBER_KEYS, key)) return 'number'
  if (includesKey(ARRAY_KEYS, key)) return 'comma-separated'
  return 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get the config file path.
 * Priority: configFile arg > CHAPTERPRESS_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CHAPTERPRESS_CONFIG) {
    return process.env.CHAPTERPRESS_CONFIG
  }
  return join(homedir(), '.config', 'chapterpress', 'config.json')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Keep only known keys holding values of the right type.
 *
 * @throws ConfigError when the data is not a JSON object
 */
export function sanitizeConfig(data: unknown): Config {
  if (!isRecord(data)) {
    throw new ConfigError('Config file must contain a JSON object')
  }
  const config: Config = {}
  for (const key of STRING_KEYS) {
    const value = data[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = data[key]
    if (typeof value === 'number') config[key] = value
  }
  for (const key of BOOLEAN_KEYS) {
    const value = data[key]
    if (typeof value === 'boolean') config[key] = value
  }
  for (const key of ARRAY_KEYS) {
    const value = data[key]
    if (Array.isArray(value)) {
      config[key] = value.filter((v): v is string => typeof v === 'string')
    }
  }
  if (typeof data.updatedAt === 'string') config.updatedAt = data.updatedAt
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError when the file is not valid JSON
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid config file ${path}: ${message}`)
  }
  return sanitizeConfig(data)
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws ConfigError for a number key given something that is not a number
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (includesKey(BOOLEAN_KEYS, key)) {
    return value === 'true' || value === '1' || value === 'yes'
  }
  if (includesKey(NUMBER_KEYS, key)) {
    const parsed = Number(value)
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new ConfigError(`${key} expects a number (got "${value}")`)
    }
    return parsed
  }
  if (includesKey(ARRAY_KEYS, key)) {
    return value
      .split(',')
      .map((v) => v.trim())
      .filter((v) => v.length > 0)
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(',')
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS, ...BOOLEAN_KEYS, ...ARRAY_KEYS].sort()
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return includesKey(getValidConfigKeys(), key)
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(sanitizeConfig({ ...config, [key]: value }), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
