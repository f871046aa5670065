/**
 * Text helpers shared by the drill pipelines
 */

/**
 * Keep the opening of `text`, cutting from the end so the result fits in
 * `maxLength` characters including the trailing ellipsis
 */
export function truncateEnd(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= 3) {
    return text.slice(0, maxLength);
  }
  return text.slice(0, maxLength - 3).trimEnd() + '...';
}

function normalizeForComparison(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

function bigramCounts(text: string): Map<string, number> {
  const chars = Array.from(normalizeForComparison(text));
  const counts = new Map<string, number>();

  if (chars.length === 1) {
    counts.set(chars[0], 1);
    return counts;
  }

  for (let i = 0; i < chars.length - 1; i++) {
    const gram = chars[i] + chars[i + 1];
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sørensen–Dice coefficient over character bigrams, ignoring case, spaces
 * and punctuation. Works for CJK text, which has no word boundaries.
 */
export function diceSimilarity(a: string, b: string): number {
  const left = bigramCounts(a);
  const right = bigramCounts(b);

  let leftTotal = 0;
  for (const count of left.values()) leftTotal += count;
  let rightTotal = 0;
  for (const count of right.values()) rightTotal += count;

  if (leftTotal === 0 || rightTotal === 0) {
    return leftTotal === rightTotal ? 1 : 0;
  }

  let overlap = 0;
  for (const [gram, count] of left) {
    overlap += Math.min(count, right.get(gram) ?? 0);
  }

  return (2 * overlap) / (leftTotal + rightTotal);
}

/**
 * Parse the outermost `{...}` object in model output, ignoring code fences
 * and surrounding prose. Returns undefined when nothing parses.
 */
export function parseEmbeddedJson(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = fenced ? fenced[1] : text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return undefined;
  }

  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch {
    return undefined;
  }
}
