/**
 * Context fusion: merges knowledge and web evidence into one bounded,
 * deterministic bundle.
 *
 * 1. Each source is ordered by score (ties: rank, then text) and capped.
 * 2. Knowledge items precede web items.
 * 3. While over the character budget, the lowest-score item is dropped,
 *    whichever source it came from. Ties drop web before knowledge, then
 *    the later item. Survivors keep their order.
 */

import type { ContextBundle, EvidenceItem } from './types.js';

export interface FuseOptions {
  /** Knowledge cap. Default: 5 */
  knowledgeTopK?: number;
  /** Web cap. Default: 2 */
  webTopK?: number;
  /** Character budget over item texts. Default: 12000 */
  maxChars?: number;
}

export const DEFAULT_FUSE_OPTIONS: Required<FuseOptions> = {
  knowledgeTopK: 5,
  webTopK: 2,
  maxChars: 12_000,
};

function compareWithinSource(a: EvidenceItem, b: EvidenceItem): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.rank !== b.rank) return a.rank - b.rank;
  return a.text < b.text ? -1 : a.text > b.text ? 1 : 0;
}

function orderAndCap(items: EvidenceItem[], cap: number): EvidenceItem[] {
  return [...items].sort(compareWithinSource).slice(0, Math.max(0, cap));
}

/**
 * Index of the item to drop next: lowest score, web before knowledge on a
 * tie, then the later position.
 */
function dropCandidate(items: EvidenceItem[]): number {
  let candidate = 0;
  for (let i = 1; i < items.length; i++) {
    const current = items[candidate];
    const item = items[i];
    if (item.score < current.score) {
      candidate = i;
    } else if (item.score === current.score) {
      const itemIsWeb = item.source === 'web';
      const currentIsWeb = current.source === 'web';
      if (itemIsWeb || !currentIsWeb) candidate = i;
    }
  }
  return candidate;
}

function totalLength(items: EvidenceItem[]): number {
  return items.reduce((sum, item) => sum + item.text.length, 0);
}

export function fuse(
  knowledgeItems: EvidenceItem[],
  webItems: EvidenceItem[],
  options: FuseOptions = {},
): ContextBundle {
  const { knowledgeTopK, webTopK, maxChars } = { ...DEFAULT_FUSE_OPTIONS, ...options };

  const items = [
    ...orderAndCap(knowledgeItems, knowledgeTopK),
    ...orderAndCap(webItems, webTopK),
  ];

  let totalChars = totalLength(items);
  let truncated = false;
  while (items.length > 0 && totalChars > maxChars) {
    const [dropped] = items.splice(dropCandidate(items), 1);
    totalChars -= dropped.text.length;
    truncated = true;
  }

  return {
    items,
    knowledgeCount: items.filter((i) => i.source === 'knowledge').length,
    webCount: items.filter((i) => i.source === 'web').length,
    totalChars,
    truncated,
  };
}
