import { containsAny } from '../utils/text.js';

// Requests that are usually simple to act on.
export const SIMPLE_KEYWORDS = ['practice', 'question', 'progress', 'simple', 'basic', 'help', 'show'] as const;
export const COMPLEX_KEYWORDS = [
  'analyze', 'complex', 'detailed', 'comprehensive', 'intricate',
  'elaborate', 'sophisticated', 'nuanced', 'multifaceted', 'explain',
] as const;
export const AMBIGUOUS_KEYWORDS = ['something', 'anything', 'whatever', "i don't know", 'not sure', 'maybe'] as const;

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Heuristic confidence for a plan, used when the model does not report one.
 * Starts at 0.8 and moves with the wording and length of the request.
 */
export function assessConfidence(text: string, plannedTools: number): number {
  const lc = text.toLowerCase();
  const complex = containsAny(lc, COMPLEX_KEYWORDS);
  let confidence = 0.8;
  if (containsAny(lc, SIMPLE_KEYWORDS)) confidence += 0.1;
  if (complex) confidence -= 0.3;
  if (containsAny(lc, AMBIGUOUS_KEYWORDS)) confidence -= 0.4;
  if (text.length > 200) confidence -= 0.2;
  else if (text.length < 20) confidence += 0.1;
  if (plannedTools === 0 && complex) confidence -= 0.2;
  // Two decimals, so 0.8 - 0.3 compares as 0.5 and not 0.49999999999999994.
  return Math.round(clampConfidence(confidence) * 100) / 100;
}
