/**
 * Parser factory - routes .txt and .md files to their parser
 */

import { extname } from 'path';
import { stat } from 'fs/promises';
import { parseTextFile, parseMarkdownFile } from './text.js';
import { ValidationError } from '../../errors.js';
import type { ParsedDocument, FileType } from '../../../types/index.js';

const MAX_FILE_SIZE_MB = 20;

const FILE_TYPE_MAP: Record<string, FileType> = {
  '.txt': 'txt',
  '.md': 'md',
  '.markdown': 'md',
};

const MIME_TYPE_MAP: Record<FileType, string> = {
  txt: 'text/plain',
  md: 'text/markdown',
};

export function getFileType(filepath: string): FileType | null {
  const ext = extname(filepath).toLowerCase();
  return FILE_TYPE_MAP[ext] ?? null;
}

export function getMimeType(fileType: FileType): string {
  return MIME_TYPE_MAP[fileType];
}

export function isSupportedFile(filepath: string): boolean {
  return getFileType(filepath) !== null;
}

export function getSupportedExtensions(): string[] {
  return Object.keys(FILE_TYPE_MAP);
}

/**
 * Parse a document based on its extension, refusing oversized files
 */
export async function parseDocument(filepath: string): Promise<ParsedDocument> {
  const fileType = getFileType(filepath);
  if (!fileType) {
    throw new ValidationError(`Unsupported file type: ${extname(filepath) || filepath}`, {
      supported: getSupportedExtensions(),
    });
  }

  const fileStat = await stat(filepath);
  const fileSizeMB = fileStat.size / (1024 * 1024);
  if (fileSizeMB > MAX_FILE_SIZE_MB) {
    throw new ValidationError(`File too large: ${fileSizeMB.toFixed(1)}MB exceeds ${MAX_FILE_SIZE_MB}MB limit`);
  }

  switch (fileType) {
    case 'txt':
      return parseTextFile(filepath);
    case 'md':
      return parseMarkdownFile(filepath);
  }
}

export { parseTextFile, parseMarkdownFile };
