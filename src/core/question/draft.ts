/**
 * Extracts the question (and optional background) from sanitized model output
 */

import { z } from 'zod';
import { parseEmbeddedJson } from '../../utils/text.js';

export interface QuestionDraft {
  question: string;
  background?: string;
}

const draftSchema = z.object({
  question: z.string(),
  background: z.string().optional(),
});

const LABEL_PREFIXES = [
  /^(?:问题|问|题目)\s*[:：]\s*/,
  /^(?:question|q)\s*[:：]\s*/i,
  /^\d+\s*[.)、]\s*/,
  /^[-*•]\s+/,
];

function stripCodeFence(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return fenced ? fenced[1].trim() : text;
}

function tryParseJson(text: string): QuestionDraft | null {
  const parsed = parseEmbeddedJson(text);
  if (parsed === undefined) {
    return null;
  }

  const result = draftSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  const background = result.data.background?.trim();
  return {
    question: cleanQuestionText(result.data.question),
    background: background ? background : undefined,
  };
}

export function cleanQuestionText(text: string): string {
  let cleaned = text.replace(/\s+/g, ' ').trim();
  for (const prefix of LABEL_PREFIXES) {
    cleaned = cleaned.replace(prefix, '');
  }
  return cleaned.replace(/^["“「](.*)["”」]$/, '$1').trim();
}

/**
 * Accepts the requested JSON shape, or plain text where the first line that
 * looks like a question wins
 */
export function extractDraft(sanitized: string): QuestionDraft {
  const body = stripCodeFence(sanitized);

  const fromJson = tryParseJson(body);
  if (fromJson) {
    return fromJson;
  }

  const lines = body
    .split('\n')
    .map(line => cleanQuestionText(line))
    .filter(line => line.length > 0);

  const questionLine = lines.find(line => /[?？]/.test(line)) ?? lines[0] ?? '';
  return { question: questionLine };
}
