/**
 * Strips reasoning traces (<think>...</think> and friends) from model output
 */

const REASONING_TAGS = ['think', 'thinking', 'thought', 'reasoning'];
const TAG_NAMES = REASONING_TAGS.join('|');

const CLOSED_BLOCK = new RegExp(`<(${TAG_NAMES})\\b[^>]*>[\\s\\S]*?<\\/\\1\\s*>`, 'gi');
const OPEN_TAG = new RegExp(`<(?:${TAG_NAMES})\\b[^>]*>`, 'i');
const CLOSE_TAG = new RegExp(`<\\/(?:${TAG_NAMES})\\s*>`, 'gi');

export interface SanitizedResponse {
  text: string;
  removedBlocks: number;
  /** An opening tag was never closed, so everything after it was dropped */
  truncated: boolean;
  /** Removal would have left nothing, so the raw text was returned */
  failOpen: boolean;
}

export function sanitizeDetailed(raw: string): SanitizedResponse {
  let text = raw;
  let removedBlocks = 0;
  let truncated = false;

  let previous: string;
  do {
    previous = text;
    text = text.replace(CLOSED_BLOCK, () => {
      removedBlocks++;
      return '';
    });
  } while (text !== previous);

  // A closing tag with no opener: the trace started before the output did
  let lastClose = -1;
  let closeLength = 0;
  for (const match of text.matchAll(CLOSE_TAG)) {
    lastClose = match.index ?? -1;
    closeLength = match[0].length;
  }
  if (lastClose >= 0) {
    text = text.slice(lastClose + closeLength);
    removedBlocks++;
  }

  const open = OPEN_TAG.exec(text);
  if (open) {
    text = text.slice(0, open.index);
    removedBlocks++;
    truncated = true;
  }

  if (removedBlocks > 0) {
    text = text.replace(/\n{3,}/g, '\n\n');
  }
  text = text.trim();

  if (text.length === 0) {
    return { text: raw, removedBlocks, truncated, failOpen: true };
  }

  return { text, removedBlocks, truncated, failOpen: false };
}

export function sanitize(raw: string): string {
  return sanitizeDetailed(raw).text;
}
