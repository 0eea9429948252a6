export type {
  ColumnStats,
  LogicalAttribute,
  PhysicalColumn,
  PhysicalTable,
  EntityRef,
  AttributeInput,
  SourceInput,
} from './source.js'

export type {
  ComponentScores,
  MappingCandidate,
  AttributePlan,
  MappingStatus,
  MappingRecord,
  MappingStore,
  DraftPersistResult,
} from './mapping.js'
export { MAPPING_STATUSES } from './mapping.js'

export type {
  Cardinality,
  FkEvidence,
  RelationshipProposalInput,
  RelationshipProposal,
  InferenceStatus,
  ForeignKeyEvidencePayload,
  RelationshipKey,
  RelationshipRecord,
  DomainEntity,
  DomainRecord,
  RelationshipStore,
  ForeignKeyProfileInput,
} from './relationship.js'
export { INFERENCE_STATUSES } from './relationship.js'

export type {
  ModelDocument,
  ModelEntity,
  CollisionFinding,
  CoverageGap,
  NamingSuggestion,
  MeceReport,
  CoverageReport,
} from './coverage.js'
