export {
  nameSimilarity,
  tokenSortRatio,
  indelSimilarity,
  sortTokens,
  clamp01,
  type TokenSortOptions,
} from './name.js'
export {
  dtypeCompatScore,
  canonicalDtype,
  WEAK_DTYPE_SCORE,
  type DtypeBucket,
} from './dtype.js'
export { semanticHintScore, SEMANTIC_HINTS } from './semantic.js'
export {
  columnEvidenceScore,
  nullRatioFromStats,
  uniquenessFromStats,
} from './evidence.js'
export {
  candidateConfidence,
  componentScores,
  blendScores,
  CONFIDENCE_WEIGHTS,
} from './confidence.js'
