/**
 * Prompt templates for question generation
 */

import type { Difficulty } from '../../types/index.js';

interface DifficultyRubric {
  label: string;
  requirements: string[];
}

export const DIFFICULTY_RUBRICS: Record<Difficulty, DifficultyRubric> = {
  easy: {
    label: '简单',
    requirements: [
      '考查基本概念、术语或定义',
      '问题直截了当，只涉及一个知识点',
      '答案可以直接在知识内容中找到',
    ],
  },
  medium: {
    label: '中等',
    requirements: [
      '考查对概念的理解和运用',
      '需要一定的分析或推理，不能只复述原文',
      '可以结合知识内容中的两到三个要点',
    ],
  },
  hard: {
    label: '困难',
    requirements: [
      '考查深层理解和批判性思考',
      '需要综合、比较、评价或迁移到新场景',
      '回答需要组织多个要点并给出理由',
    ],
  },
};

export const QUESTION_SYSTEM_PROMPT = `你是一名出题老师，根据给定的学习材料编写用于自测的开放式问题。
只输出要求的 JSON，不要输出解释或其他内容。`;

export interface QuestionPromptInput {
  content: string;
  difficulty: Difficulty;
  /** Why the previous attempt was rejected, if this is a retry */
  previousIssues?: string;
}

export function buildQuestionPrompt({ content, difficulty, previousIssues }: QuestionPromptInput): string {
  const rubric = DIFFICULTY_RUBRICS[difficulty];
  const requirements = rubric.requirements.map(r => `- ${r}`).join('\n');
  const retryNote = previousIssues
    ? `\n上一次生成的问题未通过检查（${previousIssues}），请换一个角度重新出题。\n`
    : '';

  return `请根据以下知识内容，生成一个${rubric.label}难度的学习问题，并附上简短的背景说明。

知识内容：
${content}

难度要求：
${requirements}

生成规则：
1. 问题使用知识内容所用的语言
2. 问题清晰具体，以问号结尾
3. 不要出是非题或选择题
4. 问题长度控制在 10 到 100 个字之间
${retryNote}
按以下 JSON 格式返回：
{"question": "问题内容", "background": "与问题相关的背景信息"}`;
}
