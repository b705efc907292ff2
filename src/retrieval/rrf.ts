/**
 * Reciprocal Rank Fusion (RRF) for combining ranked lists.
 *
 * Merges vector and keyword results over the knowledge index into one
 * ranked list:
 *   score(id) = Sum(weight_i / (k + rank_i))
 */

export type RankSource = 'vector' | 'keyword';

export interface RankedItem {
  id: string;
  score: number;
  /** Sources that returned this id */
  sources: RankSource[];
}

export interface RRFSource {
  name: RankSource;
  /** Ids in rank order, best first */
  ids: string[];
  weight: number;
}

export const DEFAULT_RRF_K = 60;

/**
 * Fuse ranked lists. Sorted by fused score descending; ties keep the order
 * in which ids were first seen.
 *
 * @param k - Higher values flatten the advantage of top-ranked items
 */
export function fuseRRF(sources: RRFSource[], k: number = DEFAULT_RRF_K): RankedItem[] {
  const scoreMap = new Map<string, { score: number; sources: RankSource[]; order: number }>();

  for (const source of sources) {
    source.ids.forEach((id, index) => {
      const rrfScore = source.weight / (k + index + 1);
      const existing = scoreMap.get(id);
      if (existing) {
        existing.score += rrfScore;
        if (!existing.sources.includes(source.name)) existing.sources.push(source.name);
      } else {
        scoreMap.set(id, { score: rrfScore, sources: [source.name], order: scoreMap.size });
      }
    });
  }

  return [...scoreMap.entries()]
    .sort(([, a], [, b]) => b.score - a.score || a.order - b.order)
    .map(([id, { score, sources }]) => ({ id, score, sources }));
}
