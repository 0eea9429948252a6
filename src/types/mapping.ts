/**
 * Mapping candidate and draft mapping types
 * @module types/mapping
 */

/**
 * Per-signal scores behind a candidate's confidence, each in [0, 1]
 */
export interface ComponentScores {
  name: number
  dtype: number
  semantic: number
  evidence: number
}

/**
 * A proposed source column for one logical attribute
 */
export interface MappingCandidate {
  /** Identifier of the source table the column belongs to */
  sourceTableId: string | number | null
  /** Bare column name */
  columnName: string
  /** `table.column`, or the bare column when the table has no name */
  columnPath: string
  /** Weighted blend of the component scores, in [0, 1] */
  confidence: number
  /** Human-readable explanation built from the component score bands */
  rationale: string
  componentScores: ComponentScores
  /** Reserved for authoring tools; the planner always emits null */
  transforms: Record<string, unknown> | null
  /** Reserved for authoring tools; the planner always emits null */
  joinRecipe: string | null
}

/**
 * Ranked candidates for one attribute. Candidates are sorted by descending
 * confidence; ties keep scan order (table order, then column order).
 */
export interface AttributePlan {
  attributeId: string | number | null
  attribute: string
  candidates: MappingCandidate[]
}

/**
 * Mapping lifecycle
 * - draft: proposed by the planner, awaiting review
 * - approved: accepted by a reviewer
 * - rejected: dismissed by a reviewer
 */
export type MappingStatus = 'draft' | 'approved' | 'rejected'

export const MAPPING_STATUSES: readonly MappingStatus[] = [
  'draft',
  'approved',
  'rejected',
]

/**
 * A persisted attribute-to-column mapping
 */
export interface MappingRecord {
  id: string
  entityId: string | number
  attributeId: string | number
  sourceTableId: string | number
  columnPath: string
  confidence: number
  rationale: string
  status: MappingStatus
  transforms: Record<string, unknown> | null
  joinRecipe: string | null
  createdAt: Date
  updatedAt: Date
}

/**
 * Persistence seam for mappings. Each call is its own transaction boundary.
 */
export interface MappingStore {
  findDraftForAttribute(attributeId: string | number): Promise<MappingRecord | null>
  findMapping(id: string): Promise<MappingRecord | null>
  insertMapping(mapping: MappingRecord): Promise<MappingRecord>
  updateMapping(
    id: string,
    updates: Partial<Omit<MappingRecord, 'id' | 'createdAt'>>
  ): Promise<MappingRecord>
}

/**
 * Outcome of persisting the top candidates of a planning run
 */
export interface DraftPersistResult {
  /** Number of newly inserted draft mappings */
  created: number
  /** Draft mapping per attribute id, inserted or updated */
  persisted: Map<string | number, MappingRecord>
}
