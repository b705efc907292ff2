/**
 * Composition root: wires configuration, storage, models, retrievers and
 * the orchestrator into one assistant.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import type { AssistantConfig } from './config/assistant-config.js';
import { loadRuntimeConfig } from './config/loader.js';
import { getDb } from './storage/db.js';
import { ConversationStore } from './storage/conversation-store.js';
import { createModelClient, createEmbedder } from './models/index.js';
import type { ModelClient } from './models/model-client.js';
import type { Embedder } from './models/embedder.js';
import { createIntentClassifier } from './intent/intent-classifier.js';
import type { IntentClassifier } from './intent/types.js';
import { KnowledgeRetriever } from './retrieval/knowledge-retriever.js';
import { WebRetriever } from './retrieval/web-retriever.js';
import { ResponseGenerator } from './generation/response-generator.js';
import {
  Orchestrator,
  type InboundMessage,
  type MessageOutcome,
} from './orchestrator/orchestrator.js';

export interface Assistant {
  readonly config: AssistantConfig;
  readonly model: ModelClient;
  readonly classifier: IntentClassifier;
  readonly knowledge: KnowledgeRetriever;
  readonly web: WebRetriever;
  readonly generator: ResponseGenerator;
  readonly store: ConversationStore;
  readonly orchestrator: Orchestrator;
  handleMessage(event: InboundMessage): Promise<MessageOutcome>;
}

export interface CreateAssistantOptions {
  /** Defaults to loadRuntimeConfig() */
  config?: AssistantConfig;
  db?: Database.Database;
  model?: ModelClient;
  embedder?: Embedder;
  /** Defaults to SIGNALPATH_WEB_API_KEY */
  webApiKey?: string;
}

export function createAssistant(options: CreateAssistantOptions = {}): Assistant {
  const config = options.config ?? loadRuntimeConfig();
  const db =
    options.db ??
    getDb({
      dbPath: config.dbPath,
      encryption: { enabled: config.encryptionEnabled, cipher: config.encryptionCipher },
    });

  const model = options.model ?? createModelClient(config);
  const embedder = options.embedder ?? createEmbedder(config);

  const classifier = createIntentClassifier(config, model);
  const knowledge = new KnowledgeRetriever({ embedder, db, hybrid: config.hybridSearch });
  const web = new WebRetriever({
    enabled: config.webEnabled,
    baseUrl: config.webBaseUrl,
    apiKey: options.webApiKey,
    includeDomains: config.webIncludeDomains,
    maxSnippetChars: config.webMaxSnippetChars,
  });
  const generator = new ResponseGenerator({
    model,
    fallbackText: config.fallbackText,
    assistantName: config.assistantName,
    maxAttempts: config.generationMaxAttempts,
    backoffMs: config.generationBackoffMs,
  });
  const store = new ConversationStore({
    db,
    summarizer: generator,
    policy: {
      turnThreshold: config.summarizeTurnThreshold,
      tokenThreshold: config.summarizeTokenThreshold,
      retainRecentTurns: config.retainRecentTurns,
      timeoutMs: config.summarizeTimeoutMs,
    },
  });
  const orchestrator = new Orchestrator({
    classifier,
    knowledge,
    web,
    generator,
    store,
    settings: config,
  });

  return {
    config,
    model,
    classifier,
    knowledge,
    web,
    generator,
    store,
    orchestrator,
    handleMessage: (event) => orchestrator.handleMessage(event),
  };
}
