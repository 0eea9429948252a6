/**
 * Model-quality analysis against the ontology
 * @module coverage/coverage-analyzer
 */

import type {
  CollisionFinding,
  CoverageGap,
  CoverageReport,
  MeceReport,
  ModelDocument,
  NamingSuggestion,
} from '../types/coverage.js'
import type { Ontology } from '../ontology/ontology.js'
import type { Logger } from '../utils/logger.js'
import { mergeEngineOptions } from '../builder/engine-options.js'
import { parseModelDocument } from './model-document.js'
import { findCollisions, meceScore, namingSuggestions, uncoveredTerms } from './mece.js'

export interface CoverageAnalyzerOptions {
  /** Minimum name similarity reported as a collision. Default: 0.9 */
  collisionThreshold?: number
  logger?: Logger
}

function normaliseName(value: string): string {
  return value.trim().toLowerCase()
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort()
}

/**
 * Checks drafted models for overlapping attributes and for ontology concepts
 * they leave out.
 *
 * @example
 * ```typescript
 * const analyzer = new CoverageAnalyzer(loadDefaultOntology())
 * const report = analyzer.analyze('{"entities":[{"name":"Member","attributes":["dob"]}]}')
 * report.namingSuggestions // [{ entity: 'Member', from: 'dob', to: 'date_of_birth' }]
 * ```
 */
export class CoverageAnalyzer {
  private readonly collisionThreshold: number
  private readonly logger: Logger

  /**
   * @throws {InvalidParameterError} If `collisionThreshold` is outside [0, 1]
   */
  constructor(
    private readonly ontology: Ontology,
    options: CoverageAnalyzerOptions = {}
  ) {
    const resolved = mergeEngineOptions(options)
    this.collisionThreshold = resolved.collisionThreshold
    this.logger = resolved.logger
  }

  /**
   * Runs every check over a model given as a JSON string or parsed value.
   *
   * @throws {InvalidModelError} If the input is not a JSON object
   */
  analyze(modelJson: unknown): MeceReport {
    const model = parseModelDocument(modelJson)

    const collisions = this.findCollisions(model)
    const gaps = this.uncoveredTerms(model)
    const suggestions = this.namingSuggestions(model)
    const score = meceScore(collisions, gaps)

    this.logger.debug('Analyzed model coverage', {
      entities: model.entities.length,
      collisions: collisions.length,
      uncovered: gaps.length,
      suggestions: suggestions.length,
      meceScore: score,
    })

    return {
      collisions,
      uncoveredTerms: gaps,
      namingSuggestions: suggestions,
      meceScore: score,
    }
  }

  findCollisions(model: ModelDocument, threshold?: number): CollisionFinding[] {
    return findCollisions(model, threshold ?? this.collisionThreshold)
  }

  uncoveredTerms(model: ModelDocument): CoverageGap[] {
    return uncoveredTerms(model, this.ontology)
  }

  namingSuggestions(model: ModelDocument): NamingSuggestion[] {
    return namingSuggestions(model, this.ontology)
  }

  /**
   * Name-level comparison of the model with the ontology vocabulary.
   *
   * Entities are compared by canonical name, so a synonym such as `Member`
   * overlaps `beneficiary`. Attributes are compared against the union of
   * preferred attribute names. Collisions keep the model's spelling; every
   * list is sorted and de-duplicated.
   *
   * @throws {InvalidModelError} If the input is not a JSON object
   */
  coverageReport(modelJson: unknown): CoverageReport {
    const model = parseModelDocument(modelJson)

    const ontologyEntities = new Set(this.ontology.entities.keys())
    const ontologyAttributes = new Set<string>()
    for (const entity of this.ontology.entities.values()) {
      for (const preferred of entity.preferredAttributes.keys()) {
        ontologyAttributes.add(normaliseName(preferred))
      }
    }

    const modeledEntities = new Set<string>()
    const entityCollisions = new Map<string, string>()
    const modeledAttributes = new Map<string, string>()

    for (const entity of model.entities) {
      const canonical = this.ontology.canonicalEntityName(entity.name)
      if (ontologyEntities.has(canonical)) {
        modeledEntities.add(canonical)
      } else {
        entityCollisions.set(canonical, entity.name.trim())
      }
      for (const attribute of entity.attributes) {
        const name = normaliseName(attribute)
        if (name) modeledAttributes.set(name, attribute.trim())
      }
    }

    const attributeOverlaps = [...modeledAttributes.keys()].filter((name) =>
      ontologyAttributes.has(name)
    )
    const attributeCollisions = [...modeledAttributes]
      .filter(([name]) => !ontologyAttributes.has(name))
      .map(([, original]) => original)

    return {
      entityOverlaps: sortedUnique(modeledEntities),
      attributeOverlaps: sortedUnique(attributeOverlaps),
      entityCollisions: sortedUnique(entityCollisions.values()),
      attributeCollisions: sortedUnique(attributeCollisions),
      uncoveredEntities: sortedUnique(
        [...ontologyEntities].filter((name) => !modeledEntities.has(name))
      ),
      uncoveredAttributes: sortedUnique(
        [...ontologyAttributes].filter((name) => !modeledAttributes.has(name))
      ),
    }
  }
}

/**
 * One-shot MECE analysis with a given ontology.
 *
 * @throws {InvalidModelError} If the input is not a JSON object
 */
export function analyzeMece(
  modelJson: unknown,
  ontology: Ontology,
  options?: CoverageAnalyzerOptions
): MeceReport {
  return new CoverageAnalyzer(ontology, options).analyze(modelJson)
}
