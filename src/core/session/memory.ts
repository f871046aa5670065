/**
 * Process-local drill memory, scoped to one session.
 *
 * Tracks which sources and fragments were recently selected (for `diverse`
 * and `comprehensive` selection) and which questions were recently produced
 * (for near-duplicate rejection). Nothing here is persisted.
 */

import { LRUCache } from '../../utils/lru-cache.js';
import type { ContentFragment } from '../../types/index.js';

export interface SessionMemoryOptions {
  /** Fragments remembered for `comprehensive` before the oldest is forgotten */
  usedFragmentLimit: number;
  recentQuestionLimit: number;
  /** Knowledge bases tracked at once; the least recently drilled is forgotten */
  maxKnowledgeBases?: number;
}

interface KnowledgeBaseMemory {
  /** Every source drawn in the current coverage cycle */
  sources: Set<string>;
  fragments: LRUCache<string, true>;
  questions: LRUCache<string, string>;
}

export class SessionMemory {
  private readonly perKb: LRUCache<string, KnowledgeBaseMemory>;

  constructor(private readonly options: SessionMemoryOptions) {
    this.perKb = new LRUCache(options.maxKnowledgeBases ?? 64);
  }

  private forKb(kbName: string): KnowledgeBaseMemory {
    const existing = this.perKb.get(kbName);
    if (existing) {
      return existing;
    }
    const created: KnowledgeBaseMemory = {
      sources: new Set(),
      fragments: new LRUCache(this.options.usedFragmentLimit),
      questions: new LRUCache(this.options.recentQuestionLimit),
    };
    this.perKb.set(kbName, created);
    return created;
  }

  rememberSelection(kbName: string, fragment: ContentFragment): void {
    const memory = this.forKb(kbName);
    memory.sources.add(fragment.sourceId);
    memory.fragments.set(fragment.id, true);
  }

  recentSourceIds(kbName: string): Set<string> {
    return new Set(this.perKb.peek(kbName)?.sources ?? []);
  }

  usedFragmentIds(kbName: string): Set<string> {
    return new Set(this.perKb.peek(kbName)?.fragments.keys() ?? []);
  }

  /** Start a new coverage cycle once every source has been visited */
  resetSources(kbName: string): void {
    this.perKb.peek(kbName)?.sources.clear();
  }

  rememberQuestion(kbName: string, question: string): void {
    this.forKb(kbName).questions.set(question.trim(), question);
  }

  /** Oldest first */
  recentQuestions(kbName: string): string[] {
    return this.perKb.peek(kbName)?.questions.values() ?? [];
  }

  clear(kbName?: string): void {
    if (kbName) {
      this.perKb.delete(kbName);
    } else {
      this.perKb.clear();
    }
  }
}
