/**
 * Per-chunk enrichment built at ingestion time: Q/A pairs already present in
 * the text, and key concepts named by the model
 */

import { sanitize } from '../llm/sanitizer.js';
import type { FragmentInsights, QAPair, TextCompletionModel } from '../../types/index.js';

const MAX_QA_PAIRS = 10;
const MAX_CONCEPTS = 8;
const CONCEPT_SAMPLE_LENGTH = 1500;

const QA_PATTERN =
  /(?:^|\n)[ \t]*(?:问题|疑问|问|Q)[ \t]*[:：][ \t]*([^\n]+?[？?])[ \t]*\n?[ \t]*(?:答案|解答|答|A)[ \t]*[:：][ \t]*([\s\S]*?)(?=\n[ \t]*\n|\n[ \t]*(?:问题|疑问|问|Q)[ \t]*[:：]|$)/gi;

const QUESTION_WORD = /什么|为什么|如何|怎么|怎样|哪|谁|多少|是否|吗|\b(?:what|why|how|which|who|when|where)\b/i;

const CONCEPT_SYSTEM_PROMPT = `你是一名知识整理助手，负责从文本中提取核心概念。

要求：
- 提取 3 到 8 个关键概念、术语或实体
- 每个概念尽量简短，不超过 20 个字
- 只输出 JSON 数组，不要输出其他内容

输出示例：["装饰器", "闭包", "作用域"]`;

function isValidPair(question: string, answer: string): boolean {
  if (question.length < 5 || answer.length < 10) {
    return false;
  }
  if (!/[？?]/.test(question) && !QUESTION_WORD.test(question)) {
    return false;
  }
  return !/[？?]/.test(answer);
}

/**
 * Find `Q:`/`A:` and `问：`/`答：` pairs in the text
 */
export function extractQAPairs(text: string): QAPair[] {
  const pairs: QAPair[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(QA_PATTERN)) {
    const question = match[1].trim();
    const answer = match[2].replace(/\s+/g, ' ').trim();
    if (!isValidPair(question, answer) || seen.has(question)) {
      continue;
    }
    seen.add(question);
    pairs.push({ question, answer });
    if (pairs.length >= MAX_QA_PAIRS) break;
  }

  return pairs;
}

/**
 * Read a JSON array of concept names out of model output
 */
export function parseConcepts(output: string): string[] {
  const match = sanitize(output).match(/\[[\s\S]*\]/);
  if (!match) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    console.error('[metadata] concepts response is not valid JSON:', match[0]);
    return [];
  }
  if (!Array.isArray(parsed)) {
    return [];
  }

  const concepts = parsed
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0 && item.length <= 50);
  return [...new Set(concepts)].slice(0, MAX_CONCEPTS);
}

export interface MetadataExtractorOptions {
  /** Omit to skip key-concept extraction */
  model?: TextCompletionModel;
  maxTokens?: number;
}

export class MetadataExtractor {
  private model?: TextCompletionModel;
  private maxTokens: number;

  constructor(options: MetadataExtractorOptions = {}) {
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 200;
  }

  async extract(fragmentId: string, text: string, signal?: AbortSignal): Promise<FragmentInsights> {
    return {
      fragmentId,
      qaPairs: extractQAPairs(text),
      keyConcepts: await this.extractKeyConcepts(text, signal),
    };
  }

  /**
   * Ask the model for key concepts. Any failure yields an empty list.
   */
  async extractKeyConcepts(text: string, signal?: AbortSignal): Promise<string[]> {
    if (!this.model || text.trim().length === 0) {
      return [];
    }

    const prompt = `请提取以下文本的关键概念：

${text.slice(0, CONCEPT_SAMPLE_LENGTH)}

只输出 JSON 数组。`;

    try {
      const output = await this.model.complete({
        prompt,
        systemPrompt: CONCEPT_SYSTEM_PROMPT,
        temperature: 0.2,
        maxTokens: this.maxTokens,
        signal,
      });
      return parseConcepts(output);
    } catch (error) {
      console.error('[metadata] key concept extraction failed:', error instanceof Error ? error.message : error);
      return [];
    }
  }
}
