/**
 * Strategy Registry
 *
 * Industry name → strategy. Re-registering an industry replaces its strategy
 * in place, keeping the original registration position.
 */

import type { IndustryStrategy } from '../types';
import { UnknownIndustryError } from '../errors';
import { logger } from '../logger';
import { loadBuiltinStrategies } from './definition';

export interface StrategyDescription {
  industry: string;
  description?: string;
  document_types: string[];
  keyword_count: number;
}

export class StrategyRegistry {
  // Map iteration order is insertion order; set() on an existing key keeps it
  private readonly strategies = new Map<string, Readonly<IndustryStrategy>>();
  private sealed = false;

  register(strategy: Readonly<IndustryStrategy>): void {
    if (this.sealed) {
      throw new Error('Strategy registry is sealed; call reset() before registering');
    }

    const replaced = this.strategies.has(strategy.industry_name);
    this.strategies.set(strategy.industry_name, strategy);

    logger.debug(replaced ? 'Replaced strategy' : 'Registered strategy', {
      industry: strategy.industry_name,
      document_types: strategy.document_types.length,
    });
  }

  /**
   * Candidate strategies for a classification call.
   *
   * @throws UnknownIndustryError when a hint names no registered strategy
   */
  strategiesFor(industry?: string): Readonly<IndustryStrategy>[] {
    if (industry === undefined) {
      return Array.from(this.strategies.values());
    }

    const strategy = this.strategies.get(industry);
    if (!strategy) {
      throw new UnknownIndustryError(industry, this.industries());
    }
    return [strategy];
  }

  has(industry: string): boolean {
    return this.strategies.has(industry);
  }

  get(industry: string): Readonly<IndustryStrategy> | undefined {
    return this.strategies.get(industry);
  }

  industries(): string[] {
    return Array.from(this.strategies.keys());
  }

  describe(): StrategyDescription[] {
    return Array.from(this.strategies.values()).map((strategy) => ({
      industry: strategy.industry_name,
      ...(strategy.description !== undefined && { description: strategy.description }),
      document_types: [...strategy.document_types],
      keyword_count: Object.values(strategy.keywords).reduce((sum, list) => sum + list.length, 0),
    }));
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Clear all strategies and unseal.
   * Useful for testing.
   */
  reset(): void {
    this.strategies.clear();
    this.sealed = false;
  }
}

/**
 * Registry holding the built-in strategies (financial, healthcare, identity), sealed.
 */
export function createDefaultStrategyRegistry(): StrategyRegistry {
  const registry = new StrategyRegistry();
  for (const strategy of loadBuiltinStrategies()) {
    registry.register(strategy);
  }
  registry.seal();
  return registry;
}
