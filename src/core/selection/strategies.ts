/**
 * One ranking function per selection strategy.
 *
 * Each ranker narrows the candidate set to the pool the selector draws from
 * uniformly. Rankers read session memory but never write it; the selector
 * applies `resetSources` and records the pick.
 */

import type { ContentFragment, MetadataIndex, SelectionStrategy } from '../../types/index.js';

export interface RankingContext {
  kbName: string;
  /** Never empty */
  candidates: ContentFragment[];
  recentSourceIds: Set<string>;
  usedFragmentIds: Set<string>;
  askedFragmentIds: Set<string>;
  metadata: MetadataIndex;
  recentTierRatio: number;
}

export interface RankedPool {
  pool: ContentFragment[];
  /** Every source was recently used; start a new coverage cycle */
  resetSources: boolean;
  /** Set when the requested strategy could not apply and another was used */
  appliedStrategy: SelectionStrategy;
}

export type Ranker = (context: RankingContext) => RankedPool;

/**
 * Items whose key is at least the key of the item at the tier boundary,
 * so ties at the boundary stay in the pool
 */
function topTier<T>(items: T[], ratio: number, key: (item: T) => number): T[] {
  const sorted = [...items].sort((a, b) => key(b) - key(a));
  const tierSize = Math.max(1, Math.ceil(sorted.length * ratio));
  const cutoff = key(sorted[tierSize - 1]);
  return sorted.filter(item => key(item) >= cutoff);
}

const rankRandom: Ranker = ({ candidates }) => ({
  pool: candidates,
  resetSources: false,
  appliedStrategy: 'random',
});

const rankDiverse: Ranker = ({ candidates, recentSourceIds }) => {
  const fresh = candidates.filter(c => !recentSourceIds.has(c.sourceId));
  if (fresh.length > 0) {
    return { pool: fresh, resetSources: false, appliedStrategy: 'diverse' };
  }
  return { pool: candidates, resetSources: true, appliedStrategy: 'diverse' };
};

const rankRecent: Ranker = ({ candidates, recentTierRatio }) => ({
  pool: topTier(candidates, recentTierRatio, c => c.createdAt.getTime()),
  resetSources: false,
  appliedStrategy: 'recent',
});

export function conceptDensity(fragmentId: string, metadata: MetadataIndex): number {
  const insights = metadata.get(fragmentId);
  if (!insights) return 0;
  return insights.keyConcepts.length + 0.5 * insights.qaPairs.length;
}

function hasUsableMetadata(metadata: MetadataIndex): boolean {
  for (const insights of metadata.values()) {
    if (insights.keyConcepts.length > 0 || insights.qaPairs.length > 0) {
      return true;
    }
  }
  return false;
}

const rankComprehensive: Ranker = (context) => {
  const { candidates, metadata, usedFragmentIds, askedFragmentIds, recentTierRatio } = context;

  if (!hasUsableMetadata(metadata)) {
    return rankDiverse(context);
  }

  const unasked = candidates.filter(c => !usedFragmentIds.has(c.id) && !askedFragmentIds.has(c.id));
  const eligible = unasked.length > 0 ? unasked : candidates;

  return {
    pool: topTier(eligible, recentTierRatio, c => conceptDensity(c.id, metadata)),
    resetSources: false,
    appliedStrategy: 'comprehensive',
  };
};

export const RANKERS: Record<SelectionStrategy, Ranker> = {
  random: rankRandom,
  diverse: rankDiverse,
  recent: rankRecent,
  comprehensive: rankComprehensive,
};

/**
 * Hard questions need room to reason about; keep fragments at or above the
 * median length. The lower median guarantees a non-empty result.
 */
export function preferLonger(candidates: ContentFragment[]): ContentFragment[] {
  const lengths = candidates.map(c => c.text.length).sort((a, b) => a - b);
  const median = lengths[Math.floor((lengths.length - 1) / 2)];
  return candidates.filter(c => c.text.length >= median);
}
