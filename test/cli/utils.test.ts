import { describe, it, expect } from 'vitest';
import { getFlagValue, positionalArgs, parsePort } from '../../src/cli/utils.js';

describe('getFlagValue', () => {
  it('returns the value after the flag', () => {
    expect(getFlagValue(['ask', '--session', 'room-1'], '--session')).toBe('room-1');
  });

  it('returns undefined when the flag is missing or last', () => {
    expect(getFlagValue(['ask'], '--session')).toBeUndefined();
    expect(getFlagValue(['ask', '--session'], '--session')).toBeUndefined();
  });
});

describe('positionalArgs', () => {
  it('drops flags and flag values', () => {
    expect(positionalArgs(['how', '--session', 'room-1', 'do', '--json', 'I'], ['--session'], ['--json'])).toEqual([
      'how',
      'do',
      'I',
    ]);
  });
});

describe('parsePort', () => {
  it('parses a valid port', () => {
    expect(parsePort('8080', 3340)).toBe(8080);
  });

  it('falls back on missing or invalid values', () => {
    expect(parsePort(undefined, 3340)).toBe(3340);
    expect(parsePort('abc', 3340)).toBe(3340);
    expect(parsePort('70000', 3340)).toBe(3340);
    expect(parsePort('0', 3340)).toBe(3340);
  });
});
