/**
 * Relationship proposal, evidence and lifecycle types
 * @module types/relationship
 */

/**
 * Cardinality derived from profiling evidence. The empty string means the
 * evidence is inconclusive and the proposed type should be kept.
 */
export type Cardinality = 'one_to_many' | 'one_to_one' | ''

/**
 * Coverage and fan-out evidence for a proposed foreign key
 */
export interface FkEvidence {
  /** Share of child rows with a non-null key, in [0, 1] */
  coverage: number | null
  /** Child rows per distinct parent key */
  childPerParentMean: number | null
}

/**
 * A relationship proposed by an external modeler (e.g. an LLM draft)
 */
export interface RelationshipProposalInput {
  from?: unknown
  to?: unknown
  type?: unknown
  rule?: unknown
}

/**
 * A proposal with evidence attached. `type` is replaced by the evidence
 * classification whenever that classification is conclusive.
 */
export interface RelationshipProposal {
  from: string
  to: string
  type: string
  rule: string | null
  evidence: FkEvidence
}

/**
 * Inference lifecycle
 * - manual: authored by a user, never modified unless it already carries evidence
 * - pending: machine proposed, awaiting review
 * - approved: accepted by a reviewer
 * - rejected: dismissed by a reviewer; revived to pending by fresh evidence
 */
export type InferenceStatus = 'manual' | 'pending' | 'approved' | 'rejected'

export const INFERENCE_STATUSES: readonly InferenceStatus[] = [
  'manual',
  'pending',
  'approved',
  'rejected',
]

/**
 * Evidence persisted on a relationship inferred from a foreign-key profile
 */
export interface ForeignKeyEvidencePayload {
  source: string
  column: string
  target: string
  targetColumn: string
  rowCount: number
  matchCount: number
  coverage: number
}

/**
 * Identity of a relationship row. A different relationship type is a
 * different row.
 */
export interface RelationshipKey {
  domainId: string | number
  fromEntityId: string | number
  toEntityId: string | number
  relationshipType: string
}

/**
 * A persisted relationship between two entities of a domain
 */
export interface RelationshipRecord extends RelationshipKey {
  id: string
  description: string | null
  inferenceStatus: InferenceStatus
  evidence: ForeignKeyEvidencePayload | null
  createdAt: Date
  updatedAt: Date
}

export interface DomainEntity {
  id: string | number
  name: string
}

export interface DomainRecord {
  id: string | number
  name: string
  entities: DomainEntity[]
}

/**
 * Persistence seam for relationships. Each call is its own transaction
 * boundary ("one relationship row").
 */
export interface RelationshipStore {
  findDomain(domainId: string | number): Promise<DomainRecord | null>
  findRelationship(key: RelationshipKey): Promise<RelationshipRecord | null>
  getRelationship(id: string): Promise<RelationshipRecord | null>
  insertRelationship(relationship: RelationshipRecord): Promise<RelationshipRecord>
  updateRelationship(
    id: string,
    updates: Partial<Omit<RelationshipRecord, 'id' | 'createdAt'>>
  ): Promise<RelationshipRecord>
}

/**
 * Profiling payload describing the foreign keys found in one source
 */
export interface ForeignKeyProfileInput {
  name?: unknown
  row_count?: unknown
  rowCount?: unknown
  foreign_keys?: unknown
  foreignKeys?: unknown
}
