/**
 * Persistence of planner output as draft mappings
 * @module planner/draft-mappings
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  AttributePlan,
  DraftPersistResult,
  MappingRecord,
  MappingStatus,
  MappingStore,
} from '../types/mapping.js'
import { MAPPING_STATUSES } from '../types/mapping.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import {
  MappingNotFoundError,
  requireOneOf,
} from '../utils/errors.js'
import { callStore } from '../utils/store.js'

/**
 * Parses a raw status value against the mapping lifecycle
 * @throws {InvalidParameterError} If the value is not a known status
 */
export function parseMappingStatus(value: unknown): MappingStatus {
  return requireOneOf(value, MAPPING_STATUSES, 'status')
}

/**
 * Keeps at most one draft mapping per attribute, pointing at the planner's
 * top candidate.
 */
export class DraftMappingService {
  private readonly logger: Logger

  constructor(
    private readonly store: MappingStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * Upserts the top candidate of each plan as that attribute's draft.
   * Plans without an attribute id, without candidates, or whose top
   * candidate has no source table are skipped.
   */
  async persistDrafts(
    entityId: string | number,
    plans: readonly AttributePlan[]
  ): Promise<DraftPersistResult> {
    let created = 0
    const persisted = new Map<string | number, MappingRecord>()

    for (const plan of plans) {
      const top = plan.candidates[0]
      const attributeId = plan.attributeId
      if (attributeId === null || !top || top.sourceTableId === null) {
        continue
      }

      const fields = {
        entityId,
        sourceTableId: top.sourceTableId,
        columnPath: top.columnPath,
        confidence: top.confidence,
        rationale: top.rationale,
        transforms: top.transforms,
        joinRecipe: top.joinRecipe,
      }

      const mapping = await callStore('persistDrafts', async () => {
        const existing = await this.store.findDraftForAttribute(attributeId)
        if (existing) {
          return this.store.updateMapping(existing.id, {
            ...fields,
            updatedAt: new Date(),
          })
        }

        const now = new Date()
        created++
        return this.store.insertMapping({
          id: uuidv4(),
          attributeId,
          status: 'draft',
          createdAt: now,
          updatedAt: now,
          ...fields,
        })
      })

      persisted.set(attributeId, mapping)
    }

    this.logger.info('Persisted draft mappings', {
      entityId,
      created,
      persisted: persisted.size,
    })

    return { created, persisted }
  }

  /**
   * Sets a mapping's review status from a raw value
   * @throws {InvalidParameterError} If the status is not a known value
   * @throws {MappingNotFoundError} If the mapping does not exist
   */
  async updateStatus(mappingId: string, status: unknown): Promise<MappingRecord> {
    const next = parseMappingStatus(status)

    return callStore('updateStatus', async () => {
      const mapping = await this.store.findMapping(mappingId)
      if (!mapping) {
        throw new MappingNotFoundError(mappingId)
      }
      if (mapping.status === next) {
        return mapping
      }
      return this.store.updateMapping(mappingId, {
        status: next,
        updatedAt: new Date(),
      })
    })
  }
}
