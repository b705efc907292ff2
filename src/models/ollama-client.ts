/**
 * ModelClient for an Ollama-compatible `/api/generate` endpoint.
 */

import type { CompletionRequest, ModelClient, ModelSettings } from './model-client.js';
import { settingsForMode } from './model-client.js';
import { GenerationError, errorMessage } from '../utils/errors.js';

export interface OllamaClientOptions extends ModelSettings {
  baseUrl: string;
}

interface GenerateResponse {
  response: string;
}

function isGenerateResponse(value: unknown): value is GenerateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}

export class OllamaModelClient implements ModelClient {
  private readonly baseUrl: string;
  private readonly settings: ModelSettings;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.settings = {
      model: options.model,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    };
  }

  get name(): string {
    return `ollama:${this.settings.model}`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const { maxTokens, temperature } = settingsForMode(this.settings, request.mode);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.settings.model,
          prompt: request.prompt,
          ...(request.system ? { system: request.system } : {}),
          stream: false,
          options: { temperature, num_predict: maxTokens },
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new GenerationError(`Ollama request failed: ${errorMessage(error)}`, 'MODEL_FAILED', error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new GenerationError(
        `Ollama error ${response.status}: ${body.slice(0, 200)}`,
        'MODEL_FAILED',
      );
    }

    const data: unknown = await response.json();
    if (!isGenerateResponse(data) || !data.response.trim()) {
      throw new GenerationError('Ollama returned no text', 'MODEL_FAILED');
    }
    return data.response.trim();
  }
}
