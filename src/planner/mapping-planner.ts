/**
 * Attribute-to-column mapping proposals
 * @module planner/mapping-planner
 */

import type { AttributePlan, MappingCandidate } from '../types/mapping.js'
import type { LogicalAttribute, PhysicalTable } from '../types/source.js'
import type { Logger } from '../utils/logger.js'
import {
  asArray,
  toEntityRef,
  toLogicalAttribute,
  toPhysicalTable,
} from '../core/input/coercion.js'
import { componentScores, blendScores } from '../core/similarity/confidence.js'
import { mergeEngineOptions } from '../builder/engine-options.js'
import { buildRationale } from './rationale.js'

export interface MappingPlannerOptions {
  /** Maximum candidates per attribute (default: 3) */
  maxCandidates?: number
  logger?: Logger
}

/**
 * Scores every column of every source table against each logical attribute
 * and keeps the best candidates.
 *
 * Planning is a pure read: nothing is persisted, and the same inputs always
 * produce the same plans. Malformed attribute or source payloads degrade to
 * empty or zero contributions instead of throwing.
 */
export class MappingPlanner {
  private readonly maxCandidates: number
  private readonly logger: Logger

  constructor(options: MappingPlannerOptions = {}) {
    const resolved = mergeEngineOptions(options)
    this.maxCandidates = resolved.maxCandidates
    this.logger = resolved.logger
  }

  /**
   * Proposes mapping candidates for each attribute across the supplied
   * sources. The result follows input attribute order.
   *
   * @param entity - The entity being mapped (`{ id, name }`)
   * @param attributes - Attribute payloads (`{ id, name, datatype|data_type, semantic_type, required }`)
   * @param sources - Source payloads (`{ id, name, schema_json, stats_json }`)
   */
  autoplan(entity: unknown, attributes: unknown, sources: unknown): AttributePlan[] {
    const entityRef = toEntityRef(entity)
    const tables = asArray(sources).map(toPhysicalTable)
    const plans = asArray(attributes)
      .map(toLogicalAttribute)
      .map((attribute) => this.planAttribute(attribute, tables))

    this.logger.debug('Planned attribute mappings', {
      entity: entityRef.name,
      attributes: plans.length,
      tables: tables.length,
      withCandidates: plans.filter((plan) => plan.candidates.length > 0).length,
    })

    return plans
  }

  /**
   * Ranks the columns of `tables` for one attribute. Zero-confidence
   * candidates are dropped; ties keep scan order.
   */
  planAttribute(
    attribute: LogicalAttribute,
    tables: readonly PhysicalTable[]
  ): AttributePlan {
    const candidates: MappingCandidate[] = []

    for (const table of tables) {
      for (const column of table.columns) {
        const scores = componentScores(
          attribute,
          column.name,
          column.dataType,
          column.statistics
        )
        const confidence = blendScores(scores)
        if (confidence <= 0) continue

        candidates.push({
          sourceTableId: table.id,
          columnName: column.name,
          columnPath: table.qualifiedName
            ? `${table.qualifiedName}.${column.name}`
            : column.name,
          confidence,
          rationale: buildRationale(column.name, scores),
          componentScores: scores,
          transforms: null,
          joinRecipe: null,
        })
      }
    }

    // Array.prototype.sort is stable, so equal confidences keep scan order
    candidates.sort((a, b) => b.confidence - a.confidence)

    return {
      attributeId: attribute.id,
      attribute: attribute.name,
      candidates: candidates.slice(0, this.maxCandidates),
    }
  }
}

/**
 * Plans mappings with the default options (top 3 candidates, silent).
 */
export function autoplan(
  entity: unknown,
  attributes: unknown,
  sources: unknown
): AttributePlan[] {
  return new MappingPlanner().autoplan(entity, attributes, sources)
}
