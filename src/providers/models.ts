/**
 * Model Defaults
 *
 * Default model names and API key variables for each text provider.
 */

import type { TextProvider } from '../types'

export const TEXT_PROVIDERS: readonly TextProvider[] = ['anthropic', 'openai']

/** Default models for each provider. */
export const DEFAULT_MODELS: Record<TextProvider, string> = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4o'
}

export const DEFAULT_IMAGE_MODEL = 'dall-e-3'

export function isTextProvider(value: string): value is TextProvider {
  return TEXT_PROVIDERS.some((p) => p === value)
}

/**
 * Environment variable holding the API key for a provider.
 */
export function getApiKeyEnvVar(provider: TextProvider): string {
  switch (provider) {
    case 'anthropic':
      return 'ANTHROPIC_API_KEY'
    case 'openai':
      return 'OPENAI_API_KEY'
  }
}
