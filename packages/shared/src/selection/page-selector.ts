/**
 * Related Party Page Selection
 *
 * Scores each page of an annual report against keyword sets and keeps the pages
 * that look like the Related Party Transactions disclosure. When nothing
 * qualifies, the first pages of the report (usually the executive summary) are
 * used instead.
 */

import { config } from '../config';
import type { PageText } from '../types';

export interface PageSelectorOptions {
  /** Section titles and note numbers that mark a related-party disclosure */
  primaryKeywords: string[];
  /** Role and entity terms that add context */
  secondaryKeywords: string[];
  primaryWeight: number;
  secondaryWeight: number;
  /** Minimum score for a page to qualify */
  threshold: number;
  fallbackPageCount: number;
  maxChars: number;
}

export const DEFAULT_PRIMARY_KEYWORDS = ['Related Party Disclosures', 'Note 32', 'Section 188'];

export const DEFAULT_SECONDARY_KEYWORDS = [
  'Key Management Personnel',
  'KMP',
  'Subsidiary',
  'Associate',
  'Joint Venture',
];

export function createPageSelectorOptions(
  overrides: Partial<PageSelectorOptions> = {}
): PageSelectorOptions {
  return {
    primaryKeywords: DEFAULT_PRIMARY_KEYWORDS,
    secondaryKeywords: DEFAULT_SECONDARY_KEYWORDS,
    primaryWeight: 3,
    secondaryWeight: 1,
    threshold: 3,
    fallbackPageCount: config.fallbackPageCount,
    maxChars: config.maxFocusedSectionChars,
    ...overrides,
  };
}

export interface PageScore {
  pageNumber: number;
  score: number;
}

export interface PageSelection {
  focusedSection: string;
  /** Page numbers that reached the threshold, in page order */
  matchedPages: number[];
  usedFallback: boolean;
  scores: PageScore[];
}

function containsAny(haystack: string, keywords: string[]): boolean {
  return keywords.some((k) => haystack.includes(k.toLowerCase()));
}

/**
 * Score a single page: primary keyword hit + secondary keyword hit
 */
export function scorePage(text: string, options: PageSelectorOptions): number {
  const lower = text.toLowerCase();
  let score = 0;
  if (containsAny(lower, options.primaryKeywords)) {
    score += options.primaryWeight;
  }
  if (containsAny(lower, options.secondaryKeywords)) {
    score += options.secondaryWeight;
  }
  return score;
}

export function formatPageBlock(page: PageText): string {
  return `--- PAGE ${page.pageNumber} ---\n${page.text}`;
}

/**
 * Select the related-party pages of a document and build the focused section.
 */
export function selectRelevantPages(
  pages: PageText[],
  options: PageSelectorOptions = createPageSelectorOptions()
): PageSelection {
  const scores: PageScore[] = pages.map((page) => ({
    pageNumber: page.pageNumber,
    score: scorePage(page.text, options),
  }));

  const matched = pages.filter((_, i) => scores[i].score >= options.threshold);

  let content = matched.map(formatPageBlock).join('\n');
  const usedFallback = content === '';

  if (usedFallback) {
    content = pages
      .slice(0, Math.min(options.fallbackPageCount, pages.length))
      .map((page) => page.text)
      .join('');
  }

  return {
    focusedSection: content.slice(0, options.maxChars),
    matchedPages: matched.map((page) => page.pageNumber),
    usedFallback,
    scores,
  };
}
