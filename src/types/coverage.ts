/**
 * Coverage (MECE) analysis types
 * @module types/coverage
 */

/**
 * A drafted logical model as parsed from JSON
 */
export interface ModelDocument {
  entities: ModelEntity[]
}

export interface ModelEntity {
  name: string
  attributes: string[]
}

/**
 * Two attributes on different entities whose names are near-duplicates.
 * Findings are grouped by the exact pair of (entity, attribute) tuples;
 * three entities sharing a name yield three overlapping findings.
 */
export interface CollisionFinding {
  entities: { nameA: string; nameB: string }
  /** The shorter of the two attribute names */
  attribute: string
  /** Similarity per pair key (`entity.attribute|entity.attribute`) */
  scores: Record<string, number>
}

export interface CoverageGap {
  canonicalEntity: string
  missingAttributes: string[]
  reason: 'ontology_gap'
}

export interface NamingSuggestion {
  entity: string
  from: string
  to: string
}

export interface MeceReport {
  collisions: CollisionFinding[]
  uncoveredTerms: CoverageGap[]
  namingSuggestions: NamingSuggestion[]
  meceScore: number
}

/**
 * Name-level comparison of a model against the ontology vocabulary
 */
export interface CoverageReport {
  entityOverlaps: string[]
  attributeOverlaps: string[]
  entityCollisions: string[]
  attributeCollisions: string[]
  uncoveredEntities: string[]
  uncoveredAttributes: string[]
}
