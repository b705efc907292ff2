/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Overrides (CLI flags, programmatic)
 * 2. Environment variables (SIGNALPATH_*)
 * 3. Project config file (./signalpath.config.json)
 * 4. User config file (~/.signalpath/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, validateConfig, DEFAULT_CONFIG, type AssistantConfig } from './assistant-config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  retrieval?: {
    knowledgeTopK?: number;
    webTopK?: number;
    timeoutMs?: number;
    hybrid?: {
      enabled?: boolean;
      rrfK?: number;
      vectorWeight?: number;
      keywordWeight?: number;
      keywordSearchLimit?: number;
    };
  };
  context?: {
    maxChars?: number;
  };
  orchestrator?: {
    perMessageDeadlineMs?: number;
  };
  conversation?: {
    summarizeTurnThreshold?: number;
    summarizeTokenThreshold?: number;
    retainRecentTurns?: number;
    summarizeTimeoutMs?: number;
    persistAttempts?: number;
  };
  generation?: {
    maxAttempts?: number;
    backoffMs?: number;
    fallbackText?: string;
    assistantName?: string;
  };
  intent?: {
    mode?: 'keyword' | 'model';
    keywords?: string[];
  };
  llm?: {
    provider?: 'anthropic' | 'ollama';
    model?: string;
    baseUrl?: string;
    maxTokens?: number;
    temperature?: number;
  };
  embedding?: {
    baseUrl?: string;
    model?: string;
  };
  web?: {
    enabled?: boolean;
    baseUrl?: string;
    includeDomains?: string[];
    maxSnippetChars?: number;
  };
  storage?: {
    dbPath?: string;
  };
  encryption?: {
    enabled?: boolean;
    cipher?: 'chacha20' | 'sqlcipher';
  };
  server?: {
    port?: number;
    replyWebhookUrl?: string;
    ignoreSenders?: string[];
  };
}

/** Fully-populated external config */
export type ResolvedExternalConfig = { [K in keyof ExternalConfig]-?: NonNullable<ExternalConfig[K]> };

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedExternalConfig = {
  retrieval: {
    knowledgeTopK: DEFAULT_CONFIG.knowledgeTopK,
    webTopK: DEFAULT_CONFIG.webTopK,
    timeoutMs: DEFAULT_CONFIG.retrievalTimeoutMs,
    hybrid: { ...DEFAULT_CONFIG.hybridSearch },
  },
  context: {
    maxChars: DEFAULT_CONFIG.contextMaxChars,
  },
  orchestrator: {
    perMessageDeadlineMs: DEFAULT_CONFIG.perMessageDeadlineMs,
  },
  conversation: {
    summarizeTurnThreshold: DEFAULT_CONFIG.summarizeTurnThreshold,
    summarizeTokenThreshold: DEFAULT_CONFIG.summarizeTokenThreshold,
    retainRecentTurns: DEFAULT_CONFIG.retainRecentTurns,
    summarizeTimeoutMs: DEFAULT_CONFIG.summarizeTimeoutMs,
    persistAttempts: DEFAULT_CONFIG.persistAttempts,
  },
  generation: {
    maxAttempts: DEFAULT_CONFIG.generationMaxAttempts,
    backoffMs: DEFAULT_CONFIG.generationBackoffMs,
    fallbackText: DEFAULT_CONFIG.fallbackText,
    assistantName: DEFAULT_CONFIG.assistantName,
  },
  intent: {
    mode: DEFAULT_CONFIG.intentMode,
    keywords: [...DEFAULT_CONFIG.technicalKeywords],
  },
  llm: {
    provider: DEFAULT_CONFIG.llmProvider,
    model: DEFAULT_CONFIG.llmModel,
    baseUrl: DEFAULT_CONFIG.llmBaseUrl,
    maxTokens: DEFAULT_CONFIG.llmMaxTokens,
    temperature: DEFAULT_CONFIG.llmTemperature,
  },
  embedding: {
    baseUrl: DEFAULT_CONFIG.embeddingBaseUrl,
    model: DEFAULT_CONFIG.embeddingModel,
  },
  web: {
    enabled: DEFAULT_CONFIG.webEnabled,
    baseUrl: DEFAULT_CONFIG.webBaseUrl,
    includeDomains: [...DEFAULT_CONFIG.webIncludeDomains],
    maxSnippetChars: DEFAULT_CONFIG.webMaxSnippetChars,
  },
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
  },
  encryption: {
    enabled: DEFAULT_CONFIG.encryptionEnabled,
    cipher: DEFAULT_CONFIG.encryptionCipher,
  },
  server: {
    port: DEFAULT_CONFIG.port,
    replyWebhookUrl: DEFAULT_CONFIG.replyWebhookUrl,
    ignoreSenders: [...DEFAULT_CONFIG.ignoreSenders],
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load config from a JSON file. Returns null when missing or unparseable.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (!isRecord(parsed)) {
      log.warn(`Ignoring config file ${path}: not a JSON object`);
      return null;
    }
    return parsed as ExternalConfig;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function envFloat(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseFloat(raw);
  return Number.isNaN(value) ? undefined : value;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return raw === 'true';
}

function envList(name: string): string[] | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Drop undefined values so they do not shadow lower-priority sources */
function compact<T extends object>(section: T): T | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? (Object.fromEntries(entries) as T) : undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with SIGNALPATH_ and use underscores for nesting.
 * Examples:
 *   SIGNALPATH_RETRIEVAL_KNOWLEDGE_TOP_K=5
 *   SIGNALPATH_ORCHESTRATOR_DEADLINE_MS=60000
 *   SIGNALPATH_WEB_INCLUDE_DOMAINS=help.example.com,community.example.com
 */
function loadEnvConfig(): ExternalConfig {
  const mode = process.env.SIGNALPATH_INTENT_MODE;
  const provider = process.env.SIGNALPATH_LLM_PROVIDER;
  const cipher = process.env.SIGNALPATH_ENCRYPTION_CIPHER;

  const hybrid = compact({
    enabled: envBool('SIGNALPATH_RETRIEVAL_HYBRID'),
    rrfK: envInt('SIGNALPATH_RETRIEVAL_RRF_K'),
  });

  const config: ExternalConfig = {
    retrieval: compact({
      knowledgeTopK: envInt('SIGNALPATH_RETRIEVAL_KNOWLEDGE_TOP_K'),
      webTopK: envInt('SIGNALPATH_RETRIEVAL_WEB_TOP_K'),
      timeoutMs: envInt('SIGNALPATH_RETRIEVAL_TIMEOUT_MS'),
      hybrid,
    }),
    context: compact({
      maxChars: envInt('SIGNALPATH_CONTEXT_MAX_CHARS'),
    }),
    orchestrator: compact({
      perMessageDeadlineMs: envInt('SIGNALPATH_ORCHESTRATOR_DEADLINE_MS'),
    }),
    conversation: compact({
      summarizeTurnThreshold: envInt('SIGNALPATH_CONVERSATION_SUMMARIZE_TURNS'),
      summarizeTokenThreshold: envInt('SIGNALPATH_CONVERSATION_SUMMARIZE_TOKENS'),
      retainRecentTurns: envInt('SIGNALPATH_CONVERSATION_RETAIN_TURNS'),
      summarizeTimeoutMs: envInt('SIGNALPATH_CONVERSATION_SUMMARIZE_TIMEOUT_MS'),
      persistAttempts: envInt('SIGNALPATH_CONVERSATION_PERSIST_ATTEMPTS'),
    }),
    generation: compact({
      maxAttempts: envInt('SIGNALPATH_GENERATION_MAX_ATTEMPTS'),
      backoffMs: envInt('SIGNALPATH_GENERATION_BACKOFF_MS'),
      fallbackText: process.env.SIGNALPATH_GENERATION_FALLBACK_TEXT || undefined,
      assistantName: process.env.SIGNALPATH_ASSISTANT_NAME || undefined,
    }),
    intent: compact({
      mode: mode === 'keyword' || mode === 'model' ? mode : undefined,
      keywords: envList('SIGNALPATH_INTENT_KEYWORDS'),
    }),
    llm: compact({
      provider: provider === 'anthropic' || provider === 'ollama' ? provider : undefined,
      model: process.env.SIGNALPATH_LLM_MODEL || undefined,
      baseUrl: process.env.SIGNALPATH_LLM_BASE_URL || undefined,
      maxTokens: envInt('SIGNALPATH_LLM_MAX_TOKENS'),
      temperature: envFloat('SIGNALPATH_LLM_TEMPERATURE'),
    }),
    embedding: compact({
      baseUrl: process.env.SIGNALPATH_EMBEDDING_BASE_URL || undefined,
      model: process.env.SIGNALPATH_EMBEDDING_MODEL || undefined,
    }),
    web: compact({
      enabled: envBool('SIGNALPATH_WEB_ENABLED'),
      baseUrl: process.env.SIGNALPATH_WEB_BASE_URL || undefined,
      includeDomains: envList('SIGNALPATH_WEB_INCLUDE_DOMAINS'),
      maxSnippetChars: envInt('SIGNALPATH_WEB_MAX_SNIPPET_CHARS'),
    }),
    storage: compact({
      dbPath: process.env.SIGNALPATH_STORAGE_DB_PATH || undefined,
    }),
    encryption: compact({
      enabled: envBool('SIGNALPATH_ENCRYPTION_ENABLED'),
      cipher: cipher === 'chacha20' || cipher === 'sqlcipher' ? cipher : undefined,
    }),
    server: compact({
      port: envInt('SIGNALPATH_SERVER_PORT'),
      replyWebhookUrl: process.env.SIGNALPATH_SERVER_REPLY_WEBHOOK_URL || undefined,
      ignoreSenders: envList('SIGNALPATH_SERVER_IGNORE_SENDERS'),
    }),
  };

  return compact(config) ?? {};
}

/**
 * Deep merge two config objects, with source overriding target.
 * Nested objects merge key by key; arrays and scalars replace.
 */
function deepMerge<T extends Record<string, unknown>>(target: T, source: Record<string, unknown>): T {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  const nonNegativeInt = (value: number | undefined, path: string): void => {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      errors.push(`${path} must be a non-negative integer`);
    }
  };
  const positive = (value: number | undefined, path: string): void => {
    if (value !== undefined && !(value > 0)) {
      errors.push(`${path} must be positive`);
    }
  };

  nonNegativeInt(config.retrieval?.knowledgeTopK, 'retrieval.knowledgeTopK');
  nonNegativeInt(config.retrieval?.webTopK, 'retrieval.webTopK');
  positive(config.retrieval?.timeoutMs, 'retrieval.timeoutMs');
  positive(config.retrieval?.hybrid?.rrfK, 'retrieval.hybrid.rrfK');
  positive(config.context?.maxChars, 'context.maxChars');
  positive(config.orchestrator?.perMessageDeadlineMs, 'orchestrator.perMessageDeadlineMs');
  positive(config.conversation?.summarizeTurnThreshold, 'conversation.summarizeTurnThreshold');
  positive(config.conversation?.summarizeTokenThreshold, 'conversation.summarizeTokenThreshold');
  nonNegativeInt(config.conversation?.retainRecentTurns, 'conversation.retainRecentTurns');
  positive(config.conversation?.summarizeTimeoutMs, 'conversation.summarizeTimeoutMs');
  positive(config.conversation?.persistAttempts, 'conversation.persistAttempts');
  positive(config.generation?.maxAttempts, 'generation.maxAttempts');
  nonNegativeInt(config.generation?.backoffMs, 'generation.backoffMs');

  if (config.generation?.fallbackText !== undefined && !config.generation.fallbackText.trim()) {
    errors.push('generation.fallbackText cannot be empty');
  }

  const turns = config.conversation?.summarizeTurnThreshold;
  const retain = config.conversation?.retainRecentTurns;
  if (turns !== undefined && retain !== undefined && retain >= turns) {
    errors.push('conversation.retainRecentTurns must be below conversation.summarizeTurnThreshold');
  }

  if (config.llm?.temperature !== undefined) {
    if (config.llm.temperature < 0 || config.llm.temperature > 1) {
      errors.push('llm.temperature must be between 0 and 1 (inclusive)');
    }
  }

  if (config.server?.port !== undefined) {
    if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
      errors.push('server.port must be an integer between 0 and 65535');
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedExternalConfig {
  let config: ResolvedExternalConfig = deepMerge(EXTERNAL_DEFAULTS, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.signalpath/config.json');
    if (userConfig) {
      config = deepMerge(config, { ...userConfig });
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'signalpath.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, { ...projectConfig });
    }
  }

  if (!options.skipEnv) {
    config = deepMerge(config, { ...loadEnvConfig() });
  }

  if (options.overrides) {
    config = deepMerge(config, { ...options.overrides });
  }

  return config;
}

/**
 * Convert the layered external config to the runtime AssistantConfig.
 */
export function toRuntimeConfig(external: ResolvedExternalConfig): AssistantConfig {
  const { retrieval, context, orchestrator, conversation, generation, intent, llm } = external;
  const { embedding, web, storage, encryption, server } = external;
  const hybrid: NonNullable<ExternalConfig['retrieval']>['hybrid'] & object = retrieval.hybrid ?? {};

  return {
    knowledgeTopK: retrieval.knowledgeTopK ?? DEFAULT_CONFIG.knowledgeTopK,
    webTopK: retrieval.webTopK ?? DEFAULT_CONFIG.webTopK,
    retrievalTimeoutMs: retrieval.timeoutMs ?? DEFAULT_CONFIG.retrievalTimeoutMs,
    hybridSearch: {
      enabled: hybrid.enabled ?? DEFAULT_CONFIG.hybridSearch.enabled,
      rrfK: hybrid.rrfK ?? DEFAULT_CONFIG.hybridSearch.rrfK,
      vectorWeight: hybrid.vectorWeight ?? DEFAULT_CONFIG.hybridSearch.vectorWeight,
      keywordWeight: hybrid.keywordWeight ?? DEFAULT_CONFIG.hybridSearch.keywordWeight,
      keywordSearchLimit: hybrid.keywordSearchLimit ?? DEFAULT_CONFIG.hybridSearch.keywordSearchLimit,
    },

    contextMaxChars: context.maxChars ?? DEFAULT_CONFIG.contextMaxChars,

    perMessageDeadlineMs: orchestrator.perMessageDeadlineMs ?? DEFAULT_CONFIG.perMessageDeadlineMs,

    summarizeTurnThreshold:
      conversation.summarizeTurnThreshold ?? DEFAULT_CONFIG.summarizeTurnThreshold,
    summarizeTokenThreshold:
      conversation.summarizeTokenThreshold ?? DEFAULT_CONFIG.summarizeTokenThreshold,
    retainRecentTurns: conversation.retainRecentTurns ?? DEFAULT_CONFIG.retainRecentTurns,
    summarizeTimeoutMs: conversation.summarizeTimeoutMs ?? DEFAULT_CONFIG.summarizeTimeoutMs,
    persistAttempts: conversation.persistAttempts ?? DEFAULT_CONFIG.persistAttempts,

    generationMaxAttempts: generation.maxAttempts ?? DEFAULT_CONFIG.generationMaxAttempts,
    generationBackoffMs: generation.backoffMs ?? DEFAULT_CONFIG.generationBackoffMs,
    fallbackText: generation.fallbackText ?? DEFAULT_CONFIG.fallbackText,
    assistantName: generation.assistantName ?? DEFAULT_CONFIG.assistantName,

    intentMode: intent.mode ?? DEFAULT_CONFIG.intentMode,
    technicalKeywords: intent.keywords ?? [...DEFAULT_CONFIG.technicalKeywords],

    llmProvider: llm.provider ?? DEFAULT_CONFIG.llmProvider,
    llmModel: llm.model ?? DEFAULT_CONFIG.llmModel,
    llmBaseUrl: llm.baseUrl ?? DEFAULT_CONFIG.llmBaseUrl,
    llmMaxTokens: llm.maxTokens ?? DEFAULT_CONFIG.llmMaxTokens,
    llmTemperature: llm.temperature ?? DEFAULT_CONFIG.llmTemperature,

    embeddingBaseUrl: embedding.baseUrl ?? DEFAULT_CONFIG.embeddingBaseUrl,
    embeddingModel: embedding.model ?? DEFAULT_CONFIG.embeddingModel,

    webEnabled: web.enabled ?? DEFAULT_CONFIG.webEnabled,
    webBaseUrl: web.baseUrl ?? DEFAULT_CONFIG.webBaseUrl,
    webIncludeDomains: web.includeDomains ?? [...DEFAULT_CONFIG.webIncludeDomains],
    webMaxSnippetChars: web.maxSnippetChars ?? DEFAULT_CONFIG.webMaxSnippetChars,

    dbPath: storage.dbPath ?? DEFAULT_CONFIG.dbPath,
    encryptionEnabled: encryption.enabled ?? DEFAULT_CONFIG.encryptionEnabled,
    encryptionCipher: encryption.cipher ?? DEFAULT_CONFIG.encryptionCipher,

    port: server.port ?? DEFAULT_CONFIG.port,
    replyWebhookUrl: server.replyWebhookUrl ?? DEFAULT_CONFIG.replyWebhookUrl,
    ignoreSenders: server.ignoreSenders ?? [...DEFAULT_CONFIG.ignoreSenders],
  };
}

/**
 * Load, validate, and convert in one step. Throws ConfigError on invalid values.
 */
export function loadRuntimeConfig(options: LoadConfigOptions = {}): AssistantConfig {
  const external = loadConfig(options);
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  const runtime = toRuntimeConfig(external);
  const runtimeErrors = validateConfig(runtime);
  if (runtimeErrors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${runtimeErrors.join('; ')}`, 'CONFIG_INVALID');
  }
  return runtime;
}

export { EXTERNAL_DEFAULTS };
