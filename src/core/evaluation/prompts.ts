/**
 * Prompt templates for answer evaluation
 */

export const EVALUATION_SYSTEM_PROMPT = `你是一名严谨的阅卷老师，依据提供的参考知识评估学生答案。
严格按照要求的标记格式输出，不要添加额外的说明。`;

export interface EvaluationPromptInput {
  question: string;
  userAnswer: string;
  context: string;
  correctThreshold: number;
  /** Why the previous response could not be read, if this is a retry */
  previousIssue?: string;
}

export function buildEvaluationPrompt({
  question,
  userAnswer,
  context,
  correctThreshold,
  previousIssue,
}: EvaluationPromptInput): string {
  const retryNote = previousIssue
    ? `\n注意：上一次的回复无法解析（${previousIssue}），请务必使用下面的标记格式。\n`
    : '';

  return `请评估以下学生答案。

问题：
${question}

学生答案：
${userAnswer}

参考知识：
${context || '（没有可用的参考内容，请依据常识谨慎评估）'}

评分标准（0-10 分）：
- 9-10 分：准确完整，覆盖所有关键要点
- 7-8 分：基本正确，有少量遗漏
- 4-6 分：部分正确，有重要遗漏
- 0-3 分：错误、严重不完整或答非所问
得分达到 ${correctThreshold} 分及以上判定为"正确"，否则判定为"错误"。
${retryNote}
请严格按照以下格式返回，每个标记单独占一行：
[VERDICT]
正确 或 错误
[SCORE]
0 到 10 之间的数字
[FEEDBACK]
具体的反馈，重点说明需要改进的地方
[MISSING_POINTS]
- 答案缺失的要点（没有则写"无"）
[STRENGTHS]
- 答案的优点（没有则写"无"）
[REFERENCE_ANSWER]
基于参考知识的标准答案`;
}
