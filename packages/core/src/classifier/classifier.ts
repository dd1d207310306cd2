/**
 * Keyword Classifier
 *
 * Scores every (industry, document type) candidate against the extracted
 * text and keeps the strongest. Pure and deterministic for a given registry.
 */

import type { Classification, ExtractedContent, IndustryStrategy } from '../types';
import { UNKNOWN_DOCUMENT_TYPE, UNKNOWN_INDUSTRY } from '../types';
import { ClassificationError, ClassifierError } from '../errors';
import { config } from '../config';
import type { StrategyRegistry } from '../strategies/registry';
import { countOccurrences, saturate, scoreDocumentType } from './scoring';

export interface ClassifierOptions {
  /** Saturation constant: confidence = raw / (raw + k) */
  saturationK?: number;
  /** Below this confidence the document type is 'unknown' */
  minConfidence?: number;
}

interface Candidate {
  strategy: Readonly<IndustryStrategy>;
  documentType: string;
  raw: number;
  confidence: number;
}

export class KeywordClassifier {
  readonly saturationK: number;
  readonly minConfidence: number;

  constructor(private readonly strategies: StrategyRegistry, options: ClassifierOptions = {}) {
    this.saturationK = options.saturationK ?? config.saturationK;
    this.minConfidence = options.minConfidence ?? config.minConfidence;

    if (!(this.saturationK > 0)) {
      throw new RangeError(`Saturation constant must be positive, got ${this.saturationK}`);
    }
    if (!(this.minConfidence >= 0 && this.minConfidence <= 1)) {
      throw new RangeError(`Minimum confidence must be within [0, 1], got ${this.minConfidence}`);
    }
  }

  /**
   * @throws UnknownIndustryError when the hint names no registered strategy
   * @throws ClassifierError on any unexpected failure while scoring
   */
  classify(content: ExtractedContent, industry?: string): Classification {
    const candidates = this.strategies.strategiesFor(industry);

    try {
      return this.decide(content.raw_text, candidates, industry);
    } catch (error) {
      if (error instanceof ClassificationError) throw error;
      throw new ClassifierError(
        `Scoring failed: ${error instanceof Error ? error.message : String(error)}`,
        { industry }
      );
    }
  }

  private decide(
    text: string,
    strategies: Readonly<IndustryStrategy>[],
    hint: string | undefined
  ): Classification {
    let best: Candidate | undefined;

    for (const strategy of strategies) {
      for (const documentType of strategy.document_types) {
        const { raw } = scoreDocumentType(text, strategy, documentType);
        const confidence = saturate(raw, this.saturationK);
        // Strictly greater: ties keep the earlier strategy and document type
        if (!best || confidence > best.confidence) {
          best = { strategy, documentType, raw, confidence };
        }
      }
    }

    const confidence = best?.confidence ?? 0;

    if (!best || confidence < this.minConfidence) {
      return {
        document_type: UNKNOWN_DOCUMENT_TYPE,
        industry: hint ?? (best && best.raw > 0 ? best.strategy.industry_name : UNKNOWN_INDUSTRY),
        confidence,
        matched_keywords: best && best.raw > 0 ? this.matchedKeywords(text, best.strategy) : {},
        method: 'below_threshold',
      };
    }

    return {
      document_type: best.documentType,
      industry: best.strategy.industry_name,
      confidence,
      matched_keywords: this.matchedKeywords(text, best.strategy),
      method: 'keyword_matching',
    };
  }

  /**
   * Non-zero keyword occurrence counts per document type of one strategy.
   */
  private matchedKeywords(text: string, strategy: Readonly<IndustryStrategy>): Record<string, number> {
    const matched: Record<string, number> = {};
    for (const documentType of strategy.document_types) {
      let count = 0;
      for (const keyword of strategy.keywords[documentType] ?? []) {
        count += countOccurrences(text, keyword);
      }
      if (count > 0) matched[documentType] = count;
    }
    return matched;
  }
}
