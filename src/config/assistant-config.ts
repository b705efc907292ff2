/**
 * Runtime configuration for the assistant.
 *
 * `AssistantConfig` is the flat shape the pipeline consumes. It is produced
 * from the layered external config by `toRuntimeConfig()` in loader.ts, or
 * built directly with `getConfig(overrides)` in tests.
 */

export type IntentMode = 'keyword' | 'model';
export type LlmProvider = 'anthropic' | 'ollama';

/**
 * Product names and task words that mark a message as a technical question.
 * Matching is case-insensitive on word boundaries.
 */
export const DEFAULT_TECHNICAL_KEYWORDS: readonly string[] = [
  'webex',
  'cucm',
  'call manager',
  'expressway',
  'cube',
  'sbc',
  'sip',
  'bgp',
  'ospf',
  'vlan',
  'qos',
  'trunk',
  'dial plan',
  'codec',
  'firmware',
  'license',
  'configure',
  'configuration',
  'install',
  'installation',
  'deployment',
  'upgrade',
  'troubleshoot',
  'error',
  'failed',
  'not working',
  'how do i',
  'how to',
];

/**
 * Complete assistant configuration.
 */
export interface AssistantConfig {
  // Retrieval
  /** Passages requested from the knowledge index */
  knowledgeTopK: number;
  /** Snippets requested from web search */
  webTopK: number;
  /** Per-retriever deadline */
  retrievalTimeoutMs: number;
  /** Hybrid BM25 + vector search over the knowledge index */
  hybridSearch: {
    enabled: boolean;
    /** RRF constant */
    rrfK: number;
    vectorWeight: number;
    keywordWeight: number;
    /** Max keyword results before fusion */
    keywordSearchLimit: number;
  };

  // Context
  /** Character budget for fused evidence */
  contextMaxChars: number;

  // Orchestration
  /** Deadline for one inbound message, classification through generation */
  perMessageDeadlineMs: number;

  // Conversation
  /** Unsummarized turns above this count trigger summarization */
  summarizeTurnThreshold: number;
  /** Unsummarized tokens above this count trigger summarization */
  summarizeTokenThreshold: number;
  /** Newest turns kept verbatim when summarizing */
  retainRecentTurns: number;
  /** Deadline for one summarization model call */
  summarizeTimeoutMs: number;
  /** Attempts to persist an exchange before giving up */
  persistAttempts: number;

  // Generation
  generationMaxAttempts: number;
  generationBackoffMs: number;
  /** Reply used when every generation attempt fails */
  fallbackText: string;
  /** Name the assistant introduces itself with */
  assistantName: string;

  // Intent
  intentMode: IntentMode;
  technicalKeywords: string[];

  // Model endpoint
  llmProvider: LlmProvider;
  llmModel: string;
  llmBaseUrl: string;
  llmMaxTokens: number;
  llmTemperature: number;

  // Embeddings
  embeddingBaseUrl: string;
  embeddingModel: string;

  // Web search
  webEnabled: boolean;
  webBaseUrl: string;
  webIncludeDomains: string[];
  webMaxSnippetChars: number;

  // Storage
  /** Path to SQLite database file */
  dbPath: string;
  encryptionEnabled: boolean;
  encryptionCipher: 'chacha20' | 'sqlcipher';

  // Server
  port: number;
  /** Outbound reply webhook; empty disables it */
  replyWebhookUrl: string;
  /** Sender identities whose messages are ignored (the bot itself) */
  ignoreSenders: string[];
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AssistantConfig = {
  knowledgeTopK: 5,
  webTopK: 2,
  retrievalTimeoutMs: 8_000,
  hybridSearch: {
    enabled: false,
    rrfK: 60,
    vectorWeight: 1.0,
    keywordWeight: 1.0,
    keywordSearchLimit: 20,
  },

  contextMaxChars: 12_000,

  perMessageDeadlineMs: 60_000,

  summarizeTurnThreshold: 6,
  summarizeTokenThreshold: 2_000,
  retainRecentTurns: 2,
  summarizeTimeoutMs: 30_000,
  persistAttempts: 3,

  generationMaxAttempts: 2,
  generationBackoffMs: 500,
  fallbackText:
    "Sorry, I couldn't put an answer together just now. Please try again in a moment.",
  assistantName: 'Signalpath',

  intentMode: 'keyword',
  technicalKeywords: [...DEFAULT_TECHNICAL_KEYWORDS],

  llmProvider: 'anthropic',
  llmModel: 'claude-3-5-haiku-20241022',
  llmBaseUrl: 'http://localhost:11434',
  llmMaxTokens: 1024,
  llmTemperature: 0,

  embeddingBaseUrl: 'http://localhost:11434',
  embeddingModel: 'nomic-embed-text',

  webEnabled: true,
  webBaseUrl: 'https://api.tavily.com',
  webIncludeDomains: [],
  webMaxSnippetChars: 2_000,

  dbPath: '~/.signalpath/signalpath.db',
  encryptionEnabled: false,
  encryptionCipher: 'chacha20',

  port: 3340,
  replyWebhookUrl: '',
  ignoreSenders: [],
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<AssistantConfig> = {}): AssistantConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    hybridSearch: { ...DEFAULT_CONFIG.hybridSearch, ...overrides.hybridSearch },
  };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: AssistantConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.knowledgeTopK) || config.knowledgeTopK < 0) {
    errors.push('knowledgeTopK must be a non-negative integer');
  }
  if (!Number.isInteger(config.webTopK) || config.webTopK < 0) {
    errors.push('webTopK must be a non-negative integer');
  }
  if (config.retrievalTimeoutMs <= 0) {
    errors.push('retrievalTimeoutMs must be positive');
  }
  if (config.perMessageDeadlineMs <= 0) {
    errors.push('perMessageDeadlineMs must be positive');
  }
  if (config.contextMaxChars < 1) {
    errors.push('contextMaxChars must be at least 1');
  }
  if (config.summarizeTurnThreshold < 1) {
    errors.push('summarizeTurnThreshold must be at least 1');
  }
  if (config.retainRecentTurns < 0 || config.retainRecentTurns >= config.summarizeTurnThreshold) {
    errors.push('retainRecentTurns must be >= 0 and below summarizeTurnThreshold');
  }
  if (config.summarizeTimeoutMs <= 0) {
    errors.push('summarizeTimeoutMs must be positive');
  }
  if (config.generationMaxAttempts < 1) {
    errors.push('generationMaxAttempts must be at least 1');
  }
  if (config.persistAttempts < 1) {
    errors.push('persistAttempts must be at least 1');
  }
  if (!config.fallbackText.trim()) {
    errors.push('fallbackText cannot be empty');
  }

  return errors;
}
