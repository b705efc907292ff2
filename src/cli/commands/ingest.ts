import { readFileSync } from 'node:fs';
import type { Command } from '../types.js';
import { createAssistant } from '../../assistant.js';
import type { PassageInput } from '../../storage/types.js';

function optionalString(record: object, key: string): string | undefined {
  if (!(key in record)) return undefined;
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * Parse a passage file: a JSON array of `{ text, id?, title?, url?, product? }`,
 * or an object with such an array under `passages`.
 */
export function parsePassageFile(content: string): PassageInput[] {
  const data: unknown = JSON.parse(content);
  const list: unknown =
    typeof data === 'object' && data !== null && !Array.isArray(data) && 'passages' in data
      ? data.passages
      : data;

  if (!Array.isArray(list)) {
    throw new Error('Passage file must contain an array of passages');
  }

  return list.map((entry: unknown, index): PassageInput => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Passage ${index} is not an object`);
    }
    const text = optionalString(entry, 'text');
    if (!text) {
      throw new Error(`Passage ${index} has no text`);
    }
    return {
      text,
      id: optionalString(entry, 'id'),
      title: optionalString(entry, 'title'),
      url: optionalString(entry, 'url'),
      product: optionalString(entry, 'product'),
    };
  });
}

const BATCH_SIZE = 64;

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Embed and store knowledge passages from a JSON file',
  usage: 'signalpath ingest <file.json>',
  handler: async (args) => {
    const file = args[0];
    if (!file) {
      console.error('Error: Passage file required');
      console.log('Usage: signalpath ingest <file.json>');
      process.exit(2);
      return;
    }

    const passages = parsePassageFile(readFileSync(file, 'utf-8'));
    const assistant = createAssistant();

    let stored = 0;
    for (let i = 0; i < passages.length; i += BATCH_SIZE) {
      const result = await assistant.knowledge.ingest(passages.slice(i, i + BATCH_SIZE));
      stored += result.ids.length;
      console.log(`Ingested ${stored}/${passages.length} passages`);
    }

    console.log(`Done. ${stored} passages stored.`);
  },
};
