/**
 * Builds the grading context from the question's own source text plus
 * retrieved neighbours
 */

import { truncateEnd } from '../../utils/text.js';
import type { ContentFragment } from '../../types/index.js';

/** A retrieved addition is cut rather than dropped only if this much room remains */
export const MIN_ADDITION_LENGTH = 100;

export interface GradingContext {
  text: string;
  /** Ids of retrieved fragments that made it into `text`, in order */
  includedFragmentIds: string[];
}

export interface GradingContextInput {
  sourceContext: string;
  sourceFragmentId?: string;
  retrieved: ContentFragment[];
  maxLength: number;
}

/**
 * The source context is always kept whole. Retrieved fragments follow in
 * rank order, deduplicated by id and by text, until `maxLength` characters
 * of content are used; the last one that does not fit is truncated.
 * Section labels do not count toward the budget.
 */
export function buildGradingContext({
  sourceContext,
  sourceFragmentId,
  retrieved,
  maxLength,
}: GradingContextInput): GradingContext {
  const source = sourceContext.trim();
  const sections: string[] = source ? [`【出题原文】\n${source}`] : [];
  const includedFragmentIds: string[] = [];

  const seenIds = new Set<string>(sourceFragmentId ? [sourceFragmentId] : []);
  const seenTexts = new Set<string>(source ? [source] : []);
  let used = source.length;

  for (const fragment of retrieved) {
    const content = fragment.text.trim();
    if (!content || seenIds.has(fragment.id) || seenTexts.has(content)) {
      continue;
    }
    seenIds.add(fragment.id);
    seenTexts.add(content);

    const remaining = maxLength - used;
    if (remaining < MIN_ADDITION_LENGTH && content.length > remaining) {
      break;
    }

    const included = truncateEnd(content, remaining);
    sections.push(`【参考内容 ${includedFragmentIds.length + 1}】\n${included}`);
    includedFragmentIds.push(fragment.id);
    used += included.length;

    if (included.length < content.length) {
      break;
    }
  }

  return { text: sections.join('\n\n'), includedFragmentIds };
}
