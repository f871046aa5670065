/**
 * Reads the grader's response into evaluation fields.
 *
 * The prompt asks for `[TAG]` sections; header drift (`VERDICT:`, Markdown
 * headings, bold labels, Chinese headers) and the older JSON object shape
 * are accepted as well. Verdict and score are mandatory, every other
 * section defaults to empty.
 */

import { z } from 'zod';
import { EvaluationParseError } from '../errors.js';
import { parseEmbeddedJson } from '../../utils/text.js';

export interface ParsedEvaluation {
  verdict: boolean;
  score: number;
  feedback: string;
  missingPoints: string[];
  strengths: string[];
  referenceAnswer: string;
}

export type ParseOutcome =
  | { ok: true; value: ParsedEvaluation }
  | { ok: false; error: EvaluationParseError };

type SectionKey = 'verdict' | 'score' | 'feedback' | 'missingPoints' | 'strengths' | 'referenceAnswer';

const SECTION_ALIASES: Record<SectionKey, string[]> = {
  verdict: ['VERDICT', 'IS_CORRECT', 'CORRECTNESS', '判定', '结论', '是否正确'],
  score: ['SCORE', '评分', '分数', '得分'],
  feedback: ['FEEDBACK', '反馈', '评价'],
  missingPoints: ['MISSING_POINTS', '缺失要点', '遗漏要点', '不足'],
  strengths: ['STRENGTHS', '优点', '亮点'],
  referenceAnswer: ['REFERENCE_ANSWER', '参考答案', '标准答案'],
};

const ALIAS_TO_KEY = new Map<string, SectionKey>();
for (const [key, aliases] of Object.entries(SECTION_ALIASES)) {
  for (const alias of aliases) {
    if (isSectionKey(key)) ALIAS_TO_KEY.set(alias, key);
  }
}

function isSectionKey(value: string): value is SectionKey {
  return value in SECTION_ALIASES;
}

// Longest first so MISSING_POINTS wins over any shorter prefix
const ALIAS_PATTERN = [...ALIAS_TO_KEY.keys()]
  .sort((a, b) => b.length - a.length)
  .map(alias => alias.replace(/_/g, '[\\s_]'))
  .join('|');

const HEADER_PATTERNS = [
  // [VERDICT] / 【判定】, optionally bold or a heading, content may follow
  new RegExp(`^(?:#{1,6}\\s*)?(?:\\*\\*)?[\\[【]\\s*(${ALIAS_PATTERN})\\s*[\\]】](?:\\*\\*)?\\s*[:：]?\\s*(.*)$`, 'i'),
  // VERDICT: / **评分**： / ## Score:
  new RegExp(`^(?:#{1,6}\\s*)?(?:\\*\\*)?(${ALIAS_PATTERN})(?:\\*\\*)?\\s*[:：](?:\\*\\*)?\\s*(.*)$`, 'i'),
  // ## Feedback / **优点**
  new RegExp(`^(?:#{1,6}\\s*(?:\\*\\*)?|\\*\\*)(${ALIAS_PATTERN})(?:\\*\\*)?\\s*()$`, 'i'),
];

const BULLET = /^\s*(?:[-*•·+–—]|\d+\s*[.)、]|[（(]\d+[)）])\s*/;
const EMPTY_ITEM = /^(?:无|没有|暂无|none|n\/a|nothing|-)[。.]?$/i;

const NEGATIVE_VERDICT = /不正确|不对|错误|部分正确|incorrect|not\s+correct|wrong|false|partial|^否|^no\b|[✗×]/i;
const POSITIVE_VERDICT = /正确|^对|correct|true|right|^是|^yes\b|[✓√]/i;

const CHINESE_NUMERALS: Record<string, number> = {
  零: 0, 一: 1, 二: 2, 两: 2, 三: 3, 四: 4, 五: 5, 六: 6, 七: 7, 八: 8, 九: 9, 十: 10,
};

function matchHeader(line: string): { key: SectionKey; rest: string } | null {
  const trimmed = line.trim();
  for (const pattern of HEADER_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match) {
      const alias = match[1].toUpperCase().replace(/[\s_]+/g, '_');
      const key = ALIAS_TO_KEY.get(alias);
      if (key) {
        return { key, rest: match[2].trim() };
      }
    }
  }
  return null;
}

/**
 * Split text into sections by header line; text before the first header is
 * ignored, and a repeated header only fills a section that is still empty
 */
export function splitSections(text: string): Partial<Record<SectionKey, string>> {
  const collected = new Map<SectionKey, string[]>();
  let current: string[] | null = null;

  for (const line of text.split(/\r?\n/)) {
    const header = matchHeader(line);
    if (header) {
      const existing = collected.get(header.key);
      if (existing && existing.join('').trim().length > 0) {
        current = [];
      } else {
        current = header.rest ? [header.rest] : [];
        collected.set(header.key, current);
      }
      continue;
    }
    current?.push(line);
  }

  const sections: Partial<Record<SectionKey, string>> = {};
  for (const [key, lines] of collected) {
    sections[key] = lines.join('\n').trim();
  }
  return sections;
}

/**
 * Normalize a score to the 0-10 scale. Accepts `7`, `7.5`, `7/10`, `85/100`,
 * `85%`, `八分`. Only a denominator or a percent sign rescales; a bare
 * number is clamped to [0, 10].
 */
export function parseScore(text: string): number | null {
  const numeric = text.match(/(-?\d+(?:\.\d+)?)\s*(?:[/／]\s*(\d+(?:\.\d+)?)|(%|％))?/);

  let score: number;
  if (numeric) {
    const value = Number(numeric[1]);
    const outOf = numeric[2] !== undefined ? Number(numeric[2]) : undefined;
    if (outOf !== undefined && outOf > 0) {
      score = (value / outOf) * 10;
    } else if (numeric[3] !== undefined) {
      score = value / 10;
    } else {
      score = value;
    }
  } else {
    const chinese = text.trim().match(/^([零一二两三四五六七八九十])\s*分?/);
    if (!chinese) {
      return null;
    }
    score = CHINESE_NUMERALS[chinese[1]];
  }

  if (!Number.isFinite(score)) {
    return null;
  }
  const clamped = Math.min(10, Math.max(0, score));
  return Math.round(clamped * 100) / 100;
}

/** Negative wording is checked first so "不正确" never reads as "正确" */
export function parseVerdict(text: string): boolean | null {
  const firstLine = text.trim().split('\n')[0]?.trim() ?? '';
  if (!firstLine) {
    return null;
  }
  if (NEGATIVE_VERDICT.test(firstLine)) {
    return false;
  }
  if (POSITIVE_VERDICT.test(firstLine)) {
    return true;
  }
  return null;
}

export function parseList(text: string | undefined): string[] {
  if (!text) {
    return [];
  }
  return text
    .split('\n')
    .map(line => line.replace(BULLET, '').trim())
    .filter(item => item.length > 0 && !EMPTY_ITEM.test(item));
}

const jsonEvaluationSchema = z.object({
  is_correct: z.union([z.boolean(), z.string()]),
  score: z.union([z.number(), z.string()]),
  feedback: z.string().default(''),
  missing_points: z.array(z.string()).default([]),
  strengths: z.array(z.string()).default([]),
  reference_answer: z.string().default(''),
});

function parseJsonShape(text: string): ParsedEvaluation | null {
  const candidate = parseEmbeddedJson(text);
  if (candidate === undefined) {
    return null;
  }
  const result = jsonEvaluationSchema.safeParse(candidate);
  if (!result.success) {
    return null;
  }

  const data = result.data;
  const verdict = typeof data.is_correct === 'boolean' ? data.is_correct : parseVerdict(data.is_correct);
  const score = parseScore(String(data.score));
  if (verdict === null || score === null) {
    return null;
  }

  return {
    verdict,
    score,
    feedback: data.feedback.trim(),
    missingPoints: data.missing_points.map(p => p.trim()).filter(p => p.length > 0),
    strengths: data.strengths.map(s => s.trim()).filter(s => s.length > 0),
    referenceAnswer: data.reference_answer.trim(),
  };
}

export function parseEvaluation(text: string): ParseOutcome {
  const sections = splitSections(text);
  const verdict = sections.verdict !== undefined ? parseVerdict(sections.verdict) : null;
  const score = sections.score !== undefined ? parseScore(sections.score) : null;

  if (verdict !== null && score !== null) {
    return {
      ok: true,
      value: {
        verdict,
        score,
        feedback: sections.feedback ?? '',
        missingPoints: parseList(sections.missingPoints),
        strengths: parseList(sections.strengths),
        referenceAnswer: sections.referenceAnswer ?? '',
      },
    };
  }

  const fromJson = parseJsonShape(text);
  if (fromJson) {
    return { ok: true, value: fromJson };
  }

  const missing: string[] = [];
  if (verdict === null) missing.push('verdict');
  if (score === null) missing.push('score');
  return { ok: false, error: new EvaluationParseError(missing, text) };
}
