export {
  defineStrategy,
  loadBuiltinStrategies,
  normalizeKeyword,
  KEYWORD_WEIGHT_PREFIX,
  BUILTIN_STRATEGY_FILES,
} from './definition';
export { StrategyRegistry, createDefaultStrategyRegistry, type StrategyDescription } from './registry';
