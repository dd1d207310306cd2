/**
 * Industry Strategy Definitions
 *
 * Strategies are data: validated against industry_strategy.schema.json,
 * normalized, and frozen before they reach the registry.
 */

import fs from 'fs';
import path from 'path';
import type { IndustryStrategy } from '../types';
import { ValidationError } from '../errors';
import { validateStrategyDefinition } from '../schemas';
import { deepFreeze } from '../extractors/text';
import { logger } from '../logger';

export const KEYWORD_WEIGHT_PREFIX = 'keyword:';

/** Built-in strategies, in registration order */
export const BUILTIN_STRATEGY_FILES = ['financial.json', 'healthcare.json', 'identity.json'] as const;

export function normalizeKeyword(keyword: string): string {
  return keyword.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Validate and normalize a strategy definition.
 *
 * Keywords are lowercased, whitespace-collapsed and deduplicated per document
 * type. Every keyword set must belong to a declared document type.
 *
 * @throws ValidationError when the definition does not match the schema
 */
export function defineStrategy(definition: unknown): Readonly<IndustryStrategy> {
  const validation = validateStrategyDefinition(definition);
  if (!validation.valid) {
    throw new ValidationError('Invalid industry strategy definition', validation.errors);
  }

  const input = validation.data;
  const documentTypes = new Set(input.document_types);

  const undeclared = Object.keys(input.keywords).filter((type) => !documentTypes.has(type));
  if (undeclared.length > 0) {
    throw new ValidationError(`Strategy ${input.industry_name} has keywords for undeclared document types`, undeclared);
  }

  const keywords: Record<string, string[]> = {};
  for (const documentType of input.document_types) {
    const normalized = (input.keywords[documentType] ?? []).map(normalizeKeyword).filter(Boolean);
    keywords[documentType] = Array.from(new Set(normalized));
  }

  const scoringWeights: Record<string, number> = {};
  for (const [feature, weight] of Object.entries(input.scoring_weights ?? {})) {
    if (feature.startsWith(KEYWORD_WEIGHT_PREFIX)) {
      scoringWeights[KEYWORD_WEIGHT_PREFIX + normalizeKeyword(feature.slice(KEYWORD_WEIGHT_PREFIX.length))] = weight;
    } else {
      if (!documentTypes.has(feature)) {
        logger.warn('Scoring weight for undeclared document type ignored', {
          industry: input.industry_name,
          feature,
        });
        continue;
      }
      scoringWeights[feature] = weight;
    }
  }

  return deepFreeze({
    industry_name: input.industry_name,
    ...(input.description !== undefined && { description: input.description }),
    document_types: [...input.document_types],
    keywords,
    scoring_weights: scoringWeights,
  });
}

function resolveStrategyFile(fileName: string): string {
  const possiblePaths = [
    // From packages/core/src/strategies
    path.join(__dirname, '../../data/strategies', fileName),
    // From dist/packages/core/src/strategies
    path.join(__dirname, '../../../../../packages/core/data/strategies', fileName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'packages/core/data/strategies', fileName),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Strategy data file not found: ${fileName}`);
  }
  return found;
}

/**
 * Load the built-in strategies from packages/core/data/strategies.
 */
export function loadBuiltinStrategies(): Readonly<IndustryStrategy>[] {
  return BUILTIN_STRATEGY_FILES.map((fileName) => {
    const content = fs.readFileSync(resolveStrategyFile(fileName), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return defineStrategy(parsed);
  });
}
