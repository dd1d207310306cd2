export { ResultEnhancer, summarizeTables, formatFeatures, type ResultSource } from './result-enhancer';
export {
  analyzeFooters,
  analyzeHeaders,
  classifyTable,
  countWords,
  findAmounts,
  findDates,
  hasHeaderRow,
  isNumericCell,
  MAX_REPORTED_VALUES,
  type FooterPatterns,
  type HeaderPatterns,
} from './patterns';
