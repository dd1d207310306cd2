/**
 * Keyword Classifier Tests
 *
 * Scoring is deterministic, so confidences are asserted exactly:
 * confidence = raw / (raw + 4).
 */

import {
  KeywordClassifier,
  StrategyRegistry,
  defineStrategy,
  countOccurrences,
  keywordWeight,
  saturate,
  scoreDocumentType,
  UnknownIndustryError,
} from '@doctype/core';
import type { ExtractedContent } from '@doctype/core';

function content(text: string): ExtractedContent {
  return {
    raw_text: text,
    tables: [],
    headers: [],
    footers: [],
    format: 'PDF',
    media_type: 'application/pdf',
    properties: {},
  };
}

const office = defineStrategy({
  industry_name: 'office',
  document_types: ['memo', 'letter'],
  keywords: {
    memo: ['memo', 'subject'],
    letter: ['dear', 'sincerely'],
  },
  scoring_weights: { letter: 2, 'keyword:subject': 3 },
});

const legal = defineStrategy({
  industry_name: 'legal',
  document_types: ['contract'],
  keywords: { contract: ['agreement', 'memo'] },
  scoring_weights: { contract: 5 },
});

function registryOf(...strategies: Array<ReturnType<typeof defineStrategy>>): StrategyRegistry {
  const registry = new StrategyRegistry();
  strategies.forEach((strategy) => registry.register(strategy));
  return registry;
}

describe('Keyword matching', () => {
  it('should match whole words case-insensitively', () => {
    expect(countOccurrences('Account accounts ACCOUNT', 'account')).toBe(2);
    expect(countOccurrences('form 1040 vs form 10401', 'form 1040')).toBe(1);
    expect(countOccurrences('Café menu, Cafés', 'café')).toBe(1);
  });

  it('should treat punctuation as a boundary', () => {
    expect(countOccurrences('e-mail and mail', 'mail')).toBe(2);
    expect(countOccurrences('Passport No. 123, passport no', 'passport no')).toBe(2);
    expect(countOccurrences('X-Ray imaging', 'x-ray')).toBe(1);
  });

  it('should match phrases across whitespace runs and line breaks', () => {
    expect(countOccurrences('Balance\n  Sheet', 'balance sheet')).toBe(1);
  });

  it('should escape pattern characters in keywords', () => {
    expect(countOccurrences('Total (USD) due', 'total (usd)')).toBe(1);
    expect(countOccurrences('a+b', 'a.b')).toBe(0);
  });

  it('should prefer keyword weights over document type weights', () => {
    expect(keywordWeight(office, 'memo', 'subject')).toBe(3);
    expect(keywordWeight(office, 'letter', 'dear')).toBe(2);
    expect(keywordWeight(office, 'memo', 'memo')).toBe(1);
  });

  it('should score a document type as weighted occurrences', () => {
    expect(scoreDocumentType('Memo. Subject: x. Subject: y.', office, 'memo')).toEqual({
      documentType: 'memo',
      raw: 7,
      occurrences: 3,
    });
  });
});

describe('saturate', () => {
  it('should map raw scores into [0, 1)', () => {
    expect(saturate(0, 4)).toBe(0);
    expect(saturate(4, 4)).toBe(0.5);
    expect(saturate(12, 4)).toBe(0.75);
    expect(saturate(1e12, 4)).toBeLessThan(1);
  });
});

describe('KeywordClassifier', () => {
  it('should pick the highest scoring document type', () => {
    const classifier = new KeywordClassifier(registryOf(office));

    const result = classifier.classify(content('MEMO\nSubject: Budget review\nDear team'));

    expect(result).toEqual({
      document_type: 'memo',
      industry: 'office',
      confidence: 0.5,
      matched_keywords: { memo: 2, letter: 1 },
      method: 'keyword_matching',
    });
  });

  it('should score across every registered industry without a hint', () => {
    const classifier = new KeywordClassifier(registryOf(office, legal));

    const result = classifier.classify(content('Memo about the agreement'));

    // legal/contract: (1 + 1) * 5 = 10 → 10/14
    expect(result.industry).toBe('legal');
    expect(result.document_type).toBe('contract');
    expect(result.confidence).toBeCloseTo(10 / 14, 10);
    expect(result.matched_keywords).toEqual({ contract: 2 });
  });

  it('should only consider the hinted industry', () => {
    const classifier = new KeywordClassifier(registryOf(office, legal));

    const result = classifier.classify(content('Memo about the agreement. Subject: terms'), 'office');

    // office/memo: 1 + 3 = 4 → 0.5
    expect(result.industry).toBe('office');
    expect(result.document_type).toBe('memo');
    expect(result.confidence).toBe(0.5);
  });

  it('should reject an unknown industry hint', () => {
    const classifier = new KeywordClassifier(registryOf(office));

    expect(() => classifier.classify(content('memo'), 'retail')).toThrow(UnknownIndustryError);
  });

  it('should keep the earlier candidate on a tie', () => {
    const first = defineStrategy({ industry_name: 'first', document_types: ['alpha', 'beta'], keywords: { alpha: ['ping'], beta: ['ping'] } });
    const second = defineStrategy({ industry_name: 'second', document_types: ['gamma'], keywords: { gamma: ['ping'] } });
    const classifier = new KeywordClassifier(registryOf(first, second), { minConfidence: 0.1 });

    const result = classifier.classify(content('ping'));

    expect(result.industry).toBe('first');
    expect(result.document_type).toBe('alpha');
    expect(result.confidence).toBe(0.2);
  });

  it('should report unknown below the confidence floor', () => {
    const classifier = new KeywordClassifier(registryOf(office));

    expect(classifier.classify(content('memo only'))).toEqual({
      document_type: 'unknown',
      industry: 'office',
      confidence: 0.2,
      matched_keywords: { memo: 1 },
      method: 'below_threshold',
    });
  });

  it('should report an unknown industry when nothing matches', () => {
    const classifier = new KeywordClassifier(registryOf(office, legal));

    expect(classifier.classify(content('Nothing relevant here'))).toEqual({
      document_type: 'unknown',
      industry: 'unknown',
      confidence: 0,
      matched_keywords: {},
      method: 'below_threshold',
    });
    expect(classifier.classify(content('Nothing relevant here'), 'legal').industry).toBe('legal');
  });

  it('should return identical results for identical input', () => {
    const classifier = new KeywordClassifier(registryOf(office, legal));
    const text = content('Dear reader, sincerely yours. Memo attached.');

    expect(classifier.classify(text)).toEqual(classifier.classify(text));
  });

  it('should validate its options', () => {
    const registry = registryOf(office);

    expect(() => new KeywordClassifier(registry, { saturationK: 0 })).toThrow(RangeError);
    expect(() => new KeywordClassifier(registry, { minConfidence: 1.5 })).toThrow(RangeError);
  });
});
