export { createImageGenerator, type ImageClientConfig } from './image'
export {
  DEFAULT_IMAGE_MODEL,
  DEFAULT_MODELS,
  getApiKeyEnvVar,
  isTextProvider,
  TEXT_PROVIDERS
} from './models'
export { createTextGenerator, type TextClientConfig } from './text'
