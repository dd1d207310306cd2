export { KeywordClassifier, type ClassifierOptions } from './classifier';
export {
  compileKeyword,
  countOccurrences,
  keywordWeight,
  saturate,
  scoreDocumentType,
  type DocumentTypeScore,
} from './scoring';
