/**
 * ModelClient backed by the Anthropic Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionRequest, ModelClient, ModelSettings } from './model-client.js';
import { settingsForMode } from './model-client.js';
import { ConfigError, GenerationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('anthropic-client');

export interface AnthropicClientOptions extends ModelSettings {
  /** Defaults to ANTHROPIC_API_KEY */
  apiKey?: string;
  /** Preconstructed SDK client (for testing) */
  client?: Anthropic;
}

export class AnthropicModelClient implements ModelClient {
  private client: Anthropic | null;
  private readonly settings: ModelSettings;
  private readonly apiKey?: string;

  constructor(options: AnthropicClientOptions) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey;
    this.settings = {
      model: options.model,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    };
  }

  get name(): string {
    return `anthropic:${this.settings.model}`;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      const apiKey = this.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new ConfigError(
          'No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.',
          'MISSING_REQUIRED',
        );
      }
      this.client = new Anthropic({ apiKey });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();
    const { maxTokens, temperature } = settingsForMode(this.settings, request.mode);

    let response: Anthropic.Message;
    try {
      response = await client.messages.create(
        {
          model: this.settings.model,
          max_tokens: maxTokens,
          temperature,
          ...(request.system ? { system: request.system } : {}),
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw new GenerationError(`Anthropic request failed: ${errorMessage(error)}`, 'MODEL_FAILED', error);
    }

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }
    const text = parts.join('').trim();

    log.debug('Completion received', {
      mode: request.mode,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });

    if (!text) {
      throw new GenerationError('Anthropic returned no text content', 'MODEL_FAILED');
    }
    return text;
  }
}
