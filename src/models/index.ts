/**
 * Model and embedding clients.
 */

import type { AssistantConfig } from '../config/assistant-config.js';
import type { ModelClient } from './model-client.js';
import { AnthropicModelClient } from './anthropic-client.js';
import { OllamaModelClient } from './ollama-client.js';
import { HttpEmbedder, type Embedder } from './embedder.js';

export type { ModelClient, ModelMode, CompletionRequest, ModelSettings } from './model-client.js';
export { settingsForMode, CLASSIFY_MAX_TOKENS } from './model-client.js';
export { AnthropicModelClient } from './anthropic-client.js';
export { OllamaModelClient } from './ollama-client.js';
export { HttpEmbedder } from './embedder.js';
export type { Embedder, HttpEmbedderOptions } from './embedder.js';

/**
 * Build the configured model client.
 */
export function createModelClient(config: AssistantConfig): ModelClient {
  const settings = {
    model: config.llmModel,
    maxTokens: config.llmMaxTokens,
    temperature: config.llmTemperature,
  };

  switch (config.llmProvider) {
    case 'anthropic':
      return new AnthropicModelClient(settings);
    case 'ollama':
      return new OllamaModelClient({ ...settings, baseUrl: config.llmBaseUrl });
  }
}

export function createEmbedder(config: AssistantConfig): Embedder {
  return new HttpEmbedder({ baseUrl: config.embeddingBaseUrl, model: config.embeddingModel });
}
