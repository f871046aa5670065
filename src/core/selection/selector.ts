/**
 * ContentSelector - picks the fragment a question will be written from
 */

import { EmptyKnowledgeBaseError } from '../errors.js';
import { RANKERS, preferLonger } from './strategies.js';
import type { SessionMemory } from '../session/memory.js';
import type {
  ContentFragment,
  Difficulty,
  FragmentCatalog,
  MetadataIndex,
  SelectionStrategy,
} from '../../types/index.js';

export interface ContentSelectorOptions {
  recentTierRatio: number;
  /** Uniform source in [0, 1); injectable for deterministic tests */
  random?: () => number;
}

export class ContentSelector {
  private readonly random: () => number;

  constructor(
    private readonly catalog: FragmentCatalog,
    private readonly memory: SessionMemory,
    private readonly options: ContentSelectorOptions
  ) {
    this.random = options.random ?? Math.random;
  }

  /**
   * Choose a fragment from `kbName` according to `strategy`.
   * Throws KnowledgeBaseNotFoundError or EmptyKnowledgeBaseError.
   */
  async select(
    kbName: string,
    strategy: SelectionStrategy,
    difficulty: Difficulty
  ): Promise<ContentFragment> {
    const candidates = await this.catalog.listFragments(kbName);
    if (candidates.length === 0) {
      throw new EmptyKnowledgeBaseError(kbName);
    }

    const scoped = difficulty === 'hard' ? preferLonger(candidates) : candidates;

    let metadata: MetadataIndex = new Map();
    let askedFragmentIds = new Set<string>();
    if (strategy === 'comprehensive') {
      [metadata, askedFragmentIds] = await Promise.all([
        this.catalog.getMetadataIndex(kbName),
        this.catalog.getAskedFragmentIds(kbName),
      ]);
    }

    const ranked = RANKERS[strategy]({
      kbName,
      candidates: scoped,
      recentSourceIds: this.memory.recentSourceIds(kbName),
      usedFragmentIds: this.memory.usedFragmentIds(kbName),
      askedFragmentIds,
      metadata,
      recentTierRatio: this.options.recentTierRatio,
    });

    if (ranked.appliedStrategy !== strategy) {
      console.warn(`[selector] ${strategy} unavailable for "${kbName}", using ${ranked.appliedStrategy}`);
    }
    if (ranked.resetSources) {
      this.memory.resetSources(kbName);
    }

    const index = Math.min(ranked.pool.length - 1, Math.floor(this.random() * ranked.pool.length));
    const picked = ranked.pool[index];
    this.memory.rememberSelection(kbName, picked);
    return picked;
  }
}
