/**
 * Plain text and Markdown parsers
 */

import { readFile } from 'fs/promises';
import type { ParsedDocument } from '../../../types/index.js';

const BOM = '\uFEFF';

async function readUtf8(filepath: string): Promise<string> {
  const content = await readFile(filepath, 'utf-8');
  return content.startsWith(BOM) ? content.slice(1) : content;
}

export async function parseTextFile(filepath: string): Promise<ParsedDocument> {
  const content = await readUtf8(filepath);

  return {
    content: content.trim(),
    metadata: {
      source: filepath,
    },
  };
}

/**
 * Headings stay in the content; the chunker uses them as section titles.
 * The first H1 becomes the document title.
 */
export async function parseMarkdownFile(filepath: string): Promise<ParsedDocument> {
  const content = await readUtf8(filepath);

  const titleMatch = content.match(/^#\s+(.+)$/m);
  const title = titleMatch?.[1]?.trim();

  return {
    content: content.trim(),
    metadata: {
      title,
      source: filepath,
    },
  };
}
