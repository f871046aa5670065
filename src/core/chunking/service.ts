/**
 * Paragraph-aware text chunking with overlap, sized for mixed Chinese and
 * English text
 */

import { config } from '../../config/index.js';
import type { ChunkMetadata } from '../../types/index.js';

export interface ChunkResult {
  content: string;
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkingOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  minChunkSize?: number;
}

/** A contiguous span of the normalized text that is never split further */
interface Unit {
  start: number;
  end: number;
  tokens: number;
  /** Heading in effect for this span */
  heading?: string;
  isHeading: boolean;
}

const WIDE_CHAR = /\p{Script=Han}|\p{Script=Hiragana}|\p{Script=Katakana}|\p{Script=Hangul}/u;
const HEADING = /^#{1,6}\s+(.+)/;
const SENTENCE_BOUNDARY = /[。！？!?；;]+["”’」』）)]*|\.(?=\s)|\n/g;

function charTokens(ch: string): number {
  return WIDE_CHAR.test(ch) ? 1 : 0.25;
}

/**
 * Rough token count: one per CJK character, one per four other characters
 */
export function estimateTokens(text: string): number {
  let tokens = 0;
  for (const ch of text) {
    tokens += charTokens(ch);
  }
  return Math.ceil(tokens);
}

export class ChunkingService {
  private defaultChunkSize: number;
  private defaultOverlap: number;
  private minChunkSize: number;

  constructor() {
    this.defaultChunkSize = config.chunking.defaultSize;
    this.defaultOverlap = config.chunking.defaultOverlap;
    this.minChunkSize = config.chunking.minChunkSize;
  }

  /**
   * Split text into chunks of at most `chunkSize` tokens of new content.
   * Each chunk after the first starts with up to `chunkOverlap` tokens from
   * the end of the previous one.
   */
  chunk(text: string, options: ChunkingOptions = {}): ChunkResult[] {
    const chunkSize = options.chunkSize ?? this.defaultChunkSize;
    const overlap = options.chunkOverlap ?? this.defaultOverlap;
    const minSize = options.minChunkSize ?? this.minChunkSize;

    if (!text || text.trim().length === 0) {
      return [];
    }

    const normalized = this.normalizeText(text);
    const units = this.collectUnits(normalized, chunkSize);

    const chunks: ChunkResult[] = [];
    let current: Unit[] = [];
    let currentTokens = 0;
    let overlapText = '';

    const emit = (group: Unit[]): void => {
      const first = group[0];
      const last = group[group.length - 1];
      const body = normalized.slice(first.start, last.end);
      if (estimateTokens(body) < minSize) {
        return;
      }
      const content = overlapText ? `${overlapText}\n${body}` : body;
      chunks.push({
        content,
        startOffset: Math.max(0, first.start - (overlapText ? overlapText.length + 1 : 0)),
        endOffset: last.end,
        tokenCount: estimateTokens(content),
        metadata: this.buildMetadata(group),
      });
      overlapText = this.getOverlapText(body, overlap);
    };

    for (const unit of units) {
      if (current.length > 0 && currentTokens + unit.tokens > chunkSize) {
        // A heading belongs with the content that follows it
        const carried: Unit[] = [];
        while (current.length > 0 && current[current.length - 1].isHeading) {
          const heading = current.pop();
          if (heading) carried.unshift(heading);
        }
        if (current.length > 0) {
          emit(current);
        }
        current = carried;
        currentTokens = carried.reduce((sum, u) => sum + u.tokens, 0);
      }
      current.push(unit);
      currentTokens += unit.tokens;
    }
    if (current.length > 0) {
      emit(current);
    }

    return chunks;
  }

  estimateTokens(text: string): number {
    return estimateTokens(text);
  }

  /**
   * Paragraphs become units; a paragraph larger than a chunk is split at
   * sentence ends, and a sentence larger than a chunk at character level
   */
  private collectUnits(text: string, chunkSize: number): Unit[] {
    const units: Unit[] = [];
    let heading: string | undefined;
    let position = 0;

    for (const block of text.split('\n\n')) {
      const start = position;
      const end = start + block.length;
      position = end + 2;

      if (!block.trim()) {
        continue;
      }

      const headingMatch = block.match(HEADING);
      if (headingMatch) {
        heading = headingMatch[1].trim();
      }

      const tokens = estimateTokens(block);
      if (tokens <= chunkSize) {
        units.push({ start, end, tokens, heading, isHeading: headingMatch !== null && !block.includes('\n') });
        continue;
      }

      for (const [sentenceStart, sentenceEnd] of this.splitSentences(text, start, end)) {
        const sentenceTokens = estimateTokens(text.slice(sentenceStart, sentenceEnd));
        if (sentenceTokens <= chunkSize) {
          units.push({ start: sentenceStart, end: sentenceEnd, tokens: sentenceTokens, heading, isHeading: false });
          continue;
        }
        for (const [pieceStart, pieceEnd] of this.splitByTokens(text, sentenceStart, sentenceEnd, chunkSize)) {
          units.push({
            start: pieceStart,
            end: pieceEnd,
            tokens: estimateTokens(text.slice(pieceStart, pieceEnd)),
            heading,
            isHeading: false,
          });
        }
      }
    }

    return units;
  }

  private splitSentences(text: string, start: number, end: number): Array<[number, number]> {
    const block = text.slice(start, end);
    const spans: Array<[number, number]> = [];
    let sentenceStart = 0;

    const pushSpan = (from: number, to: number) => {
      const piece = block.slice(from, to);
      const leading = piece.length - piece.trimStart().length;
      const trailing = piece.length - piece.trimEnd().length;
      if (piece.trim()) {
        spans.push([start + from + leading, start + to - trailing]);
      }
    };

    for (const match of block.matchAll(SENTENCE_BOUNDARY)) {
      const boundary = (match.index ?? 0) + match[0].length;
      pushSpan(sentenceStart, boundary);
      sentenceStart = boundary;
    }
    pushSpan(sentenceStart, block.length);

    return spans;
  }

  private splitByTokens(text: string, start: number, end: number, maxTokens: number): Array<[number, number]> {
    const spans: Array<[number, number]> = [];
    let pieceStart = start;
    let offset = start;
    let tokens = 0;

    for (const ch of text.slice(start, end)) {
      const t = charTokens(ch);
      if (tokens + t > maxTokens && offset > pieceStart) {
        spans.push([pieceStart, offset]);
        pieceStart = offset;
        tokens = 0;
      }
      tokens += t;
      offset += ch.length;
    }
    if (offset > pieceStart) {
      spans.push([pieceStart, offset]);
    }

    return spans;
  }

  /**
   * Tail of `content` worth about `overlapTokens`, starting after a sentence
   * or word boundary where one is close
   */
  private getOverlapText(content: string, overlapTokens: number): string {
    if (overlapTokens <= 0) return '';

    const chars = Array.from(content);
    let tokens = 0;
    let index = chars.length;
    while (index > 0 && tokens < overlapTokens) {
      index--;
      tokens += charTokens(chars[index]);
    }
    if (index === 0) {
      return '';
    }

    let tail = chars.slice(index).join('');
    const boundary = tail.search(/[。！？!?；;.\s]/);
    if (boundary >= 0 && boundary < tail.length / 2) {
      tail = tail.slice(boundary + 1);
    }
    return tail.trim();
  }

  private buildMetadata(units: Unit[]): ChunkMetadata {
    const metadata: ChunkMetadata = {};
    const sectionTitle = units[0]?.heading;
    if (sectionTitle) {
      metadata.sectionTitle = sectionTitle;
    }
    const headings = [...new Set(units.filter(u => u.isHeading && u.heading).map(u => u.heading ?? ''))];
    if (headings.length > 0) {
      metadata.headings = headings;
    }
    return metadata;
  }

  /**
   * Normalize line endings and whitespace; blank lines become a single
   * paragraph break
   */
  private normalizeText(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+/g, ' ')
      .split('\n')
      .map(line => line.trimEnd())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}

// Singleton instance
let chunkingService: ChunkingService | null = null;

export function getChunkingService(): ChunkingService {
  if (!chunkingService) {
    chunkingService = new ChunkingService();
  }
  return chunkingService;
}
