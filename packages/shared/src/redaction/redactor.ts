/**
 * PII Redaction
 *
 * Masks Indian government identifiers in the serialized analysis before it is
 * displayed or exported. Works on the serialized text, so identifier-shaped
 * substrings inside evidence quotes are masked too.
 */

import type { AnalysisResult } from '../types';

export type PiiKind = 'pan' | 'aadhaar';

interface RedactionRule {
  kind: PiiKind;
  pattern: RegExp;
  replacement: string;
}

/**
 * Applied in order.
 * - pan: 5 letters, 4 digits, 1 letter (ABCDE1234F)
 * - aadhaar: three space-separated groups of 4 digits (1234 5678 9012)
 */
export const REDACTION_RULES: readonly RedactionRule[] = [
  { kind: 'pan', pattern: /[A-Z]{5}[0-9]{4}[A-Z]/g, replacement: '[REDACTED_PAN]' },
  { kind: 'aadhaar', pattern: /\d{4}\s\d{4}\s\d{4}/g, replacement: '[REDACTED_UID]' },
];

export function serializeAnalysis(result: AnalysisResult): string {
  return JSON.stringify(result, null, 2);
}

export function redactText(text: string): string {
  return REDACTION_RULES.reduce(
    (redacted, rule) => redacted.replace(rule.pattern, rule.replacement),
    text
  );
}

/**
 * Number of identifiers each rule would mask in the text
 */
export function countRedactions(text: string): Record<PiiKind, number> {
  const counts: Record<PiiKind, number> = { pan: 0, aadhaar: 0 };
  for (const rule of REDACTION_RULES) {
    counts[rule.kind] = text.match(rule.pattern)?.length ?? 0;
  }
  return counts;
}

/**
 * Serialize an analysis result and mask PII in it. The result is not modified.
 */
export function redactAnalysis(result: AnalysisResult): string {
  return redactText(serializeAnalysis(result));
}
