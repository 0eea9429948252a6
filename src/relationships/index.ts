export {
  evidenceForFk,
  classifyCardinality,
  guessKeyName,
  normaliseIdentifier,
  ONE_TO_MANY_ABOVE,
  ONE_TO_ONE_FROM,
} from './evidence.js'
export { enrichWithEvidence, type EnrichmentContext, type ProfiledTable } from './enrich.js'
export { foreignKeyEvidenceFromPayload, coerceCount } from './foreign-key-evidence.js'
export { refreshOutcome, validateReviewTransition, type RefreshOutcome } from './lifecycle.js'
export {
  RelationshipInferenceService,
  DEFAULT_RELATIONSHIP_TYPE,
} from './inference-service.js'
