/**
 * Language model client contract.
 *
 * One `complete()` call per prompt. The mode lets providers pick per-use
 * settings (classification runs at temperature 0 with a tiny token budget).
 */

export type ModelMode = 'classify' | 'respond' | 'summarize';

export interface CompletionRequest {
  prompt: string;
  mode: ModelMode;
  /** System instruction, when the provider supports one */
  system?: string;
  signal?: AbortSignal;
}

export interface ModelClient {
  /** Provider and model, for logs */
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface ModelSettings {
  model: string;
  maxTokens: number;
  temperature: number;
}

/** Token budget for classification replies */
export const CLASSIFY_MAX_TOKENS = 8;

/**
 * Effective sampling settings for a mode.
 */
export function settingsForMode(
  settings: ModelSettings,
  mode: ModelMode,
): { maxTokens: number; temperature: number } {
  switch (mode) {
    case 'classify':
      return { maxTokens: CLASSIFY_MAX_TOKENS, temperature: 0 };
    case 'summarize':
      return { maxTokens: settings.maxTokens, temperature: 0 };
    case 'respond':
      return { maxTokens: settings.maxTokens, temperature: settings.temperature };
  }
}
