/**
 * Mutually-exclusive / collectively-exhaustive checks of a drafted model
 * @module coverage/mece
 */

import type {
  CollisionFinding,
  CoverageGap,
  ModelDocument,
  NamingSuggestion,
} from '../types/coverage.js'
import type { Ontology } from '../ontology/ontology.js'
import { nameSimilarity } from '../core/similarity/name.js'
import { DEFAULT_COLLISION_THRESHOLD } from '../builder/engine-options.js'

/** Findings at which each penalty term reaches its full weight */
const PENALTY_SATURATION = 10

function normaliseName(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase()
}

interface AttributeTuple {
  entity: string
  attribute: string
}

function compareTuples(a: AttributeTuple, b: AttributeTuple): number {
  if (a.entity !== b.entity) return a.entity < b.entity ? -1 : 1
  if (a.attribute !== b.attribute) return a.attribute < b.attribute ? -1 : 1
  return 0
}

/**
 * Order-independent key for a pair of (entity, attribute) tuples.
 * Names may contain any character, so the tuples are JSON-encoded rather
 * than joined with a separator.
 */
export function pairKey(a: AttributeTuple, b: AttributeTuple): string {
  const [first, second] = [a, b].sort(compareTuples)
  return JSON.stringify([
    [first.entity, first.attribute],
    [second.entity, second.attribute],
  ])
}

/**
 * Reports attribute names on different entities whose similarity reaches
 * `threshold`.
 *
 * Findings are grouped by the exact pair of (entity, attribute) tuples, not
 * by transitive clusters: when three entities share a near-duplicate name,
 * three overlapping findings come back. The shorter name is the
 * representative.
 */
export function findCollisions(
  model: ModelDocument,
  threshold: number = DEFAULT_COLLISION_THRESHOLD
): CollisionFinding[] {
  const tuples: AttributeTuple[] = model.entities.flatMap((entity) =>
    entity.attributes.map((attribute) => ({ entity: entity.name, attribute }))
  )

  const findings = new Map<string, CollisionFinding>()
  for (let i = 0; i < tuples.length; i++) {
    for (let j = i + 1; j < tuples.length; j++) {
      const a = tuples[i]
      const b = tuples[j]
      if (normaliseName(a.entity) === normaliseName(b.entity)) continue

      const similarity = nameSimilarity(a.attribute, b.attribute)
      if (similarity < threshold) continue

      const key = pairKey(a, b)
      const existing = findings.get(key)
      if (existing) {
        existing.scores[key] = similarity
        continue
      }

      findings.set(key, {
        entities: { nameA: a.entity, nameB: b.entity },
        attribute: b.attribute.length < a.attribute.length ? b.attribute : a.attribute,
        scores: { [key]: similarity },
      })
    }
  }

  return [...findings.values()]
}

/**
 * Modeled attribute names per canonical entity, normalised
 */
function attributesByCanonicalEntity(
  model: ModelDocument,
  ontology: Ontology
): Map<string, Set<string>> {
  const byEntity = new Map<string, Set<string>>()
  for (const entity of model.entities) {
    const canonical = ontology.canonicalEntityName(entity.name)
    const names = byEntity.get(canonical) ?? new Set<string>()
    for (const attribute of entity.attributes) {
      names.add(normaliseName(attribute))
    }
    byEntity.set(canonical, names)
  }
  return byEntity
}

/**
 * Lists ontology concepts the model does not cover.
 *
 * An ontology entity that no modeled entity canonicalises to is reported
 * with all of its preferred attributes. For a modeled entity, a preferred
 * attribute is missing when neither it nor any of its synonyms is among the
 * modeled attribute names.
 */
export function uncoveredTerms(model: ModelDocument, ontology: Ontology): CoverageGap[] {
  const modeled = attributesByCanonicalEntity(model, ontology)
  const gaps: CoverageGap[] = []

  for (const [canonical, entity] of ontology.entities) {
    const attributes = modeled.get(canonical)
    const missing: string[] = []

    for (const [preferred, synonyms] of entity.preferredAttributes) {
      if (!attributes) {
        missing.push(preferred)
        continue
      }
      const covered =
        attributes.has(normaliseName(preferred)) ||
        [...synonyms].some((synonym) => attributes.has(normaliseName(synonym)))
      if (!covered) missing.push(preferred)
    }

    if (!attributes || missing.length > 0) {
      gaps.push({
        canonicalEntity: canonical,
        missingAttributes: missing,
        reason: 'ontology_gap',
      })
    }
  }

  return gaps
}

/**
 * Suggests renaming attributes that use a known synonym of a preferred
 * ontology attribute.
 *
 * @example
 * ```typescript
 * // Member.dob → date_of_birth, because 'member' canonicalises to 'beneficiary'
 * namingSuggestions(model, ontology)
 * // [{ entity: 'Member', from: 'dob', to: 'date_of_birth' }]
 * ```
 */
export function namingSuggestions(
  model: ModelDocument,
  ontology: Ontology
): NamingSuggestion[] {
  const suggestions: NamingSuggestion[] = []
  for (const entity of model.entities) {
    const canonical = ontology.canonicalEntityName(entity.name)
    for (const attribute of entity.attributes) {
      const preferred = ontology.suggestPreferredAttribute(canonical, attribute)
      if (preferred && preferred !== attribute) {
        suggestions.push({ entity: entity.name, from: attribute, to: preferred })
      }
    }
  }
  return suggestions
}

/**
 * Linear penalty score:
 * `1 - min(1, 0.5·collisions/10 + 0.5·uncovered/10)`, clamped to [0, 1] and
 * rounded to 4 decimals.
 */
export function meceScore(
  collisions: readonly unknown[],
  uncovered: readonly unknown[]
): number {
  const penalty =
    0.5 * (collisions.length / PENALTY_SATURATION) +
    0.5 * (uncovered.length / PENALTY_SATURATION)
  const score = Math.min(1, Math.max(0, 1 - Math.min(1, penalty)))
  return Math.round(score * 10000) / 10000
}
