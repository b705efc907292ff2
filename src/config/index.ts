export {
  DEFAULT_CONFIG,
  DEFAULT_TECHNICAL_KEYWORDS,
  getConfig,
  resolvePath,
  validateConfig,
} from './assistant-config.js';
export type { AssistantConfig, IntentMode, LlmProvider } from './assistant-config.js';
export {
  EXTERNAL_DEFAULTS,
  loadConfig,
  loadRuntimeConfig,
  toRuntimeConfig,
  validateExternalConfig,
} from './loader.js';
export type { ExternalConfig, LoadConfigOptions, ResolvedExternalConfig } from './loader.js';
