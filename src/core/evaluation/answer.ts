/**
 * Rejects answers that carry nothing to grade
 */

const MIN_ANSWER_LENGTH = 2;

const PLACEHOLDER_PATTERNS = [
  /^(?:不知道|不清楚|不会|不懂|没有|无|没|略)$/,
  /^[？?。.，,!！\s-]+$/,
  /^(?:i\s*don'?t\s*know|idk|no\s*idea|n\/a|none|pass|skip)[.!]?$/i,
];

export function validateAnswer(answer: string): string[] {
  const trimmed = answer.trim();
  if (!trimmed) {
    return ['answer is empty'];
  }

  const issues: string[] = [];
  if (PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed))) {
    issues.push('answer is a placeholder');
  } else if (Array.from(trimmed).length < MIN_ANSWER_LENGTH) {
    issues.push(`answer is shorter than ${MIN_ANSWER_LENGTH} characters`);
  }
  return issues;
}
