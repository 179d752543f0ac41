import { homedir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'
import { ConfigError } from './config'
import { getCacheDir, resolveSettings } from './settings'

const ENV = { ANTHROPIC_API_KEY: 'test-anthropic-key' }

function generateArgs(...extra: string[]) {
  return parseArgs(['generate', 'notes.txt', ...extra], false)
}

describe('resolveSettings', () => {
  it('applies defaults', () => {
    const settings = resolveSettings(null, generateArgs(), ENV)

    expect(settings.modelParameters).toEqual({
      provider: 'anthropic',
      model: 'claude-sonnet-4-5',
      temperature: 0.7,
      maxTokens: 4000
    })
    expect(settings.retry).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      backoffMultiplier: 2,
      recoverableErrors: ['rate_limit', 'network', 'timeout', 'invalid_response']
    })
    expect(settings.formats).toEqual(['pdf'])
    expect(settings.author).toBe('Unknown Author')
    expect(settings.language).toBe('en')
    expect(settings.title).toBe('')
    expect(settings.outputDir).toBe('./output')
    expect(settings.maxWorkers).toBe(3)
    expect(settings.parallel).toBe(true)
    expect(settings.useCache).toBe(true)
    expect(settings.requestTimeoutMs).toBe(120_000)
    expect(settings.chunkSize).toBe(2000)
    expect(settings.images).toBe(false)
    expect(settings.illustrations).toBe(0)
    expect(settings.maxFailedChapters).toBe(0)
    expect(settings.apiKeys).toEqual({ anthropic: 'test-anthropic-key' })
  })

  it('prefers config values over defaults', () => {
    const settings = resolveSettings(
      { author: 'Config Author', maxWorkers: 6, formats: ['epub', 'html'], temperature: 0.2 },
      generateArgs(),
      ENV
    )

    expect(settings.author).toBe('Config Author')
    expect(settings.maxWorkers).toBe(6)
    expect(settings.formats).toEqual(['epub', 'html'])
    expect(settings.modelParameters.temperature).toBe(0.2)
  })

  it('prefers CLI args over config values', () => {
    const settings = resolveSettings(
      { author: 'Config Author', maxWorkers: 6, formats: ['epub'], parallel: true },
      generateArgs('--author', 'Arg Author', '-w', '2', '-f', 'html', '--sequential'),
      ENV
    )

    expect(settings.author).toBe('Arg Author')
    expect(settings.maxWorkers).toBe(2)
    expect(settings.formats).toEqual(['html'])
    expect(settings.parallel).toBe(false)
  })

  it('uses the provider default model', () => {
    const settings = resolveSettings(
      null,
      generateArgs('--provider', 'openai'),
      { OPENAI_API_KEY: 'test-openai-key' }
    )

    expect(settings.modelParameters.provider).toBe('openai')
    expect(settings.modelParameters.model).toBe('gpt-4o')
  })

  it('turns off cache reads with --no-cache', () => {
    const args = parseArgs(['--no-cache', 'generate', 'notes.txt'], false)

    expect(resolveSettings({ useCache: true }, args, ENV).useCache).toBe(false)
  })

  it('normalizes and dedupes formats', () => {
    const settings = resolveSettings(null, generateArgs('-f', 'PDF,epub,pdf'), ENV)

    expect(settings.formats).toEqual(['pdf', 'epub'])
  })

  it('zeroes illustrations when images are off', () => {
    const settings = resolveSettings({ illustrations: 4 }, generateArgs(), ENV)

    expect(settings.images).toBe(false)
    expect(settings.illustrations).toBe(0)
  })

  it('keeps illustrations when images are on', () => {
    const settings = resolveSettings({ illustrations: 4, images: true }, generateArgs(), {
      ...ENV,
      OPENAI_API_KEY: 'test-openai-key'
    })

    expect(settings.illustrations).toBe(4)
  })

  it('lists every problem in one error', () => {
    let caught: unknown
    try {
      resolveSettings(
        { maxAttempts: 0 },
        generateArgs('--provider', 'mistral', '-f', 'docx', '-w', 'lots'),
        {}
      )
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught instanceof Error ? caught.message : '').toBe(
      [
        'Invalid settings:',
        '  - Unknown provider "mistral" (expected anthropic or openai)',
        '  - Unknown format "docx" (expected pdf, epub, html)',
        '  - maxAttempts must be an integer >= 1 (got 0)',
        '  - maxWorkers must be an integer >= 1 (got NaN)',
        '  - ANTHROPIC_API_KEY is not set (required for provider anthropic)'
      ].join('\n')
    )
  })

  it('reads recoverable error kinds from config', () => {
    const settings = resolveSettings(
      { recoverableErrors: ['network', 'auth', 'network'] },
      generateArgs(),
      ENV
    )

    expect(settings.retry.recoverableErrors).toEqual(['network', 'auth'])
  })

  it('accepts an empty recoverable error list', () => {
    const settings = resolveSettings({ recoverableErrors: [] }, generateArgs(), ENV)

    expect(settings.retry.recoverableErrors).toEqual([])
  })

  it('rejects unknown recoverable error kinds', () => {
    expect(() =>
      resolveSettings({ recoverableErrors: ['network', 'gremlins'] }, generateArgs(), ENV)
    ).toThrow(
      'Unknown error kind "gremlins" in recoverableErrors (expected rate_limit, auth, quota, network, timeout, invalid_response, invalid_request)'
    )
  })

  it('rejects a temperature above 1', () => {
    expect(() => resolveSettings({ temperature: 1.5 }, generateArgs(), ENV)).toThrow(
      'temperature must be between 0 and 1 (got 1.5)'
    )
    expect(resolveSettings({ temperature: 1 }, generateArgs(), ENV).modelParameters.temperature).toBe(1)
  })

  it('requires the provider API key', () => {
    expect(() => resolveSettings(null, generateArgs(), {})).toThrow(
      'ANTHROPIC_API_KEY is not set (required for provider anthropic)'
    )
  })

  it('requires an OpenAI key for images', () => {
    expect(() => resolveSettings(null, generateArgs('--images'), ENV)).toThrow(
      'OPENAI_API_KEY is not set (required for image generation)'
    )
  })

  it('does not require API keys for a dry run', () => {
    const settings = resolveSettings(null, generateArgs('--dry-run', '--images'), {})

    expect(settings.dryRun).toBe(true)
    expect(settings.apiKeys).toEqual({})
  })
})

describe('getCacheDir', () => {
  it('prefers the CLI override', () => {
    expect(getCacheDir('/tmp/arg', { CHAPTERPRESS_CACHE_DIR: '/tmp/env' }, { cacheDir: '/tmp/cfg' })).toBe(
      '/tmp/arg'
    )
  })

  it('falls back to the env var, then config', () => {
    expect(getCacheDir(undefined, { CHAPTERPRESS_CACHE_DIR: '/tmp/env' }, { cacheDir: '/tmp/cfg' })).toBe(
      '/tmp/env'
    )
    expect(getCacheDir(undefined, {}, { cacheDir: '/tmp/cfg' })).toBe('/tmp/cfg')
  })

  it('defaults to ~/.cache/chapterpress', () => {
    expect(getCacheDir(undefined, {})).toBe(join(homedir(), '.cache', 'chapterpress'))
  })
})
