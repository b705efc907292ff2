import { describe, it, expect } from 'vitest';
import {
  getConfig,
  resolvePath,
  validateConfig,
  DEFAULT_CONFIG,
} from '../../src/config/assistant-config.js';

describe('getConfig', () => {
  it('applies overrides on top of defaults', () => {
    const config = getConfig({ knowledgeTopK: 3 });

    expect(config.knowledgeTopK).toBe(3);
    expect(config.webTopK).toBe(DEFAULT_CONFIG.webTopK);
  });

  it('merges hybridSearch key by key', () => {
    const config = getConfig({ hybridSearch: { ...DEFAULT_CONFIG.hybridSearch, enabled: true } });

    expect(config.hybridSearch.enabled).toBe(true);
    expect(config.hybridSearch.rrfK).toBe(60);
  });
});

describe('resolvePath', () => {
  it('expands a leading ~', () => {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    expect(resolvePath('~/.signalpath/signalpath.db')).toBe(`${home}/.signalpath/signalpath.db`);
  });

  it('leaves other paths alone', () => {
    expect(resolvePath('/var/lib/signalpath.db')).toBe('/var/lib/signalpath.db');
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  it('allows zero top-k to disable a source', () => {
    expect(validateConfig(getConfig({ knowledgeTopK: 0, webTopK: 0 }))).toEqual([]);
  });

  it('rejects fractional top-k and non-positive deadlines', () => {
    expect(
      validateConfig(getConfig({ webTopK: 1.5, perMessageDeadlineMs: 0, generationMaxAttempts: 0 })),
    ).toEqual([
      'webTopK must be a non-negative integer',
      'perMessageDeadlineMs must be positive',
      'generationMaxAttempts must be at least 1',
    ]);
  });
});
