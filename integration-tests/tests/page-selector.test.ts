/**
 * Related Party Page Selection Tests
 */

import {
  createPageSelectorOptions,
  scorePage,
  selectRelevantPages,
} from '@governance-audit/shared';
import type { PageText } from '@governance-audit/shared';

function toPages(texts: string[]): PageText[] {
  return texts.map((text, i) => ({ pageNumber: i + 1, text }));
}

describe('scorePage', () => {
  const options = createPageSelectorOptions();

  it('should score a primary keyword hit at 3', () => {
    expect(scorePage('Note 32 - Details of transactions', options)).toBe(3);
  });

  it('should add 1 for a secondary keyword', () => {
    expect(scorePage('Section 188 contracts with Key Management Personnel', options)).toBe(4);
  });

  it('should score secondary keywords alone below the threshold', () => {
    expect(scorePage('Our Subsidiary and Joint Venture partners', options)).toBe(1);
  });

  it('should match keywords case-insensitively', () => {
    expect(scorePage('RELATED PARTY DISCLOSURES', options)).toBe(3);
    expect(scorePage('transactions with kmp', options)).toBe(1);
  });

  it('should score unrelated text at 0', () => {
    expect(scorePage('Directors report on sustainability', options)).toBe(0);
  });
});

describe('selectRelevantPages', () => {
  it('should emit labeled blocks for qualifying pages in page order', () => {
    const pages = toPages([
      'Chairman message',
      'Note 32 Related Party Disclosures\nLoans to Subsidiary',
      'Cash flow statement',
      'Section 188 contracts with KMP',
    ]);

    const selection = selectRelevantPages(pages);

    expect(selection.focusedSection).toBe(
      '--- PAGE 2 ---\nNote 32 Related Party Disclosures\nLoans to Subsidiary\n' +
        '--- PAGE 4 ---\nSection 188 contracts with KMP'
    );
    expect(selection.matchedPages).toEqual([2, 4]);
    expect(selection.usedFallback).toBe(false);
    expect(selection.scores.map((s) => s.score)).toEqual([0, 4, 0, 4]);
  });

  it('should fall back to the first 10 pages when only secondary keywords appear', () => {
    const texts = Array.from(
      { length: 12 },
      (_, i) => `Page ${i + 1}: investments in Subsidiary and Joint Venture entities.\n`
    );

    const selection = selectRelevantPages(toPages(texts));

    expect(selection.usedFallback).toBe(true);
    expect(selection.matchedPages).toEqual([]);
    expect(selection.focusedSection).toBe(texts.slice(0, 10).join(''));
  });

  it('should use every page in the fallback when the document is shorter than 10 pages', () => {
    const texts = ['Cover page\n', 'Board of directors\n', 'Financial highlights\n'];

    const selection = selectRelevantPages(toPages(texts));

    expect(selection.focusedSection).toBe('Cover page\nBoard of directors\nFinancial highlights\n');
  });

  it('should return an empty string for an empty document', () => {
    const selection = selectRelevantPages([]);

    expect(selection.focusedSection).toBe('');
    expect(selection.usedFallback).toBe(true);
  });

  it('should truncate the focused section to 30,000 characters', () => {
    const oversized = `Related Party Disclosures\n${'x'.repeat(40000)}`;

    const selection = selectRelevantPages(toPages([oversized]));

    expect(selection.focusedSection).toHaveLength(30000);
    expect(selection.focusedSection.startsWith('--- PAGE 1 ---\nRelated Party Disclosures\n')).toBe(true);
  });

  it('should truncate the fallback text as well', () => {
    const texts = Array.from({ length: 5 }, () => 'y'.repeat(8000));

    const selection = selectRelevantPages(toPages(texts));

    expect(selection.usedFallback).toBe(true);
    expect(selection.focusedSection).toHaveLength(30000);
  });

  it('should honor custom keyword sets and limits', () => {
    const options = createPageSelectorOptions({
      primaryKeywords: ['Ind AS 24'],
      fallbackPageCount: 1,
      maxChars: 20,
    });
    const pages = toPages(['First page text', 'Disclosure under Ind AS 24 follows']);

    const selection = selectRelevantPages(pages, options);

    expect(selection.matchedPages).toEqual([2]);
    expect(selection.focusedSection).toBe('--- PAGE 2 ---\nDiscl');
  });
});
