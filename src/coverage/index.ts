export {
  CoverageAnalyzer,
  analyzeMece,
  type CoverageAnalyzerOptions,
} from './coverage-analyzer.js'
export { findCollisions, uncoveredTerms, namingSuggestions, meceScore, pairKey } from './mece.js'
export { parseModelDocument } from './model-document.js'
