/**
 * Question quality checks. Returns the list of problems; empty means valid.
 */

import { diceSimilarity } from '../../utils/text.js';

export interface QuestionValidationOptions {
  maxLength: number;
  minLength?: number;
  duplicateSimilarity: number;
  recentQuestions: string[];
}

const QUESTION_MARK = /[?？]/;

const INTERROGATIVE_PATTERNS = [
  /什么|如何|为什么|为何|怎样|怎么|哪些|哪个|哪里|哪种|谁|何时|何地|多少|是否|能否/,
  /[吗呢][。.!！]?$/,
  /^(?:请)?(?:解释|描述|分析|比较|评价|讨论|说明|概括|阐述)/,
  /^(?:what|why|how|when|where|which|who|whom|whose|is|are|was|were|do|does|did|can|could|should|would|will|explain|describe|compare|discuss)\b/i,
];

const MULTIPLE_CHOICE_OPTION = /(?:^|\s)[A-D][.)、．]/g;

export function hasQuestionForm(text: string): boolean {
  return QUESTION_MARK.test(text) || INTERROGATIVE_PATTERNS.some(pattern => pattern.test(text));
}

export function looksLikeMultipleChoice(text: string): boolean {
  if (/(?:以下|下面|下列).*(?:选择|选项|哪一项)/.test(text)) {
    return true;
  }
  return (text.match(MULTIPLE_CHOICE_OPTION) ?? []).length >= 2;
}

export function validateQuestion(text: string, options: QuestionValidationOptions): string[] {
  const { maxLength, minLength = 5, duplicateSimilarity, recentQuestions } = options;
  const question = text.trim();

  if (question.length === 0 || /^[?？\s]+$/.test(question)) {
    return ['question is empty'];
  }

  const issues: string[] = [];

  if (question.length < minLength) {
    issues.push(`question is shorter than ${minLength} characters`);
  }
  if (question.length > maxLength) {
    issues.push(`question is longer than ${maxLength} characters`);
  }
  if (!hasQuestionForm(question)) {
    issues.push('text is not phrased as a question');
  }
  if (looksLikeMultipleChoice(question)) {
    issues.push('multiple-choice questions are not allowed');
  }

  const duplicate = recentQuestions.find(recent => diceSimilarity(recent, question) >= duplicateSimilarity);
  if (duplicate) {
    issues.push('near-duplicate of a recent question');
  }

  return issues;
}
