/**
 * Store-backed inference of relationships from foreign-key profiles
 * @module relationships/inference-service
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  DomainEntity,
  InferenceStatus,
  RelationshipRecord,
  RelationshipStore,
} from '../types/relationship.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import {
  DomainNotFoundError,
  RelationshipNotFoundError,
} from '../utils/errors.js'
import { callStore } from '../utils/store.js'
import { asArray, asRecord, asString } from '../core/input/coercion.js'
import { coerceCount, foreignKeyEvidenceFromPayload } from './foreign-key-evidence.js'
import { refreshOutcome, validateReviewTransition } from './lifecycle.js'

export const DEFAULT_RELATIONSHIP_TYPE = 'inferred_foreign_key'

/**
 * Creates or refreshes machine-proposed relationships and applies reviewer
 * decisions. Every store call is its own transaction boundary.
 */
export class RelationshipInferenceService {
  private readonly logger: Logger

  constructor(
    private readonly store: RelationshipStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * Creates or updates pending relationships for `domainId`.
   *
   * @param domainId - Domain being profiled
   * @param sources - Profiling payloads, each with a `name`, a `row_count`
   *   and a `foreign_keys` list of matches
   * @returns The relationships that were created or refreshed, in payload order
   * @throws {DomainNotFoundError} If the domain does not exist
   */
  async inferRelationships(
    domainId: string | number,
    sources: unknown
  ): Promise<RelationshipRecord[]> {
    const domain = await callStore('findDomain', () => this.store.findDomain(domainId))
    if (!domain) {
      throw new DomainNotFoundError(domainId)
    }

    const entityLookup = new Map<string, DomainEntity>()
    for (const entity of domain.entities) {
      if (entity.name) entityLookup.set(entity.name.toLowerCase(), entity)
    }

    const inferred: RelationshipRecord[] = []
    let skipped = 0

    for (const rawSource of asArray(sources)) {
      const source = asRecord(rawSource)
      const sourceName = asString(source?.name)?.trim()
      if (!source || !sourceName) {
        skipped++
        continue
      }

      const fromEntity = entityLookup.get(sourceName.toLowerCase())
      if (!fromEntity) {
        this.logger.debug('Skipping source without a matching entity', {
          source: sourceName,
        })
        skipped++
        continue
      }

      const rowCount = coerceCount(source.row_count ?? source.rowCount)
      const foreignKeys = asArray(source.foreign_keys ?? source.foreignKeys)

      for (const rawKey of foreignKeys) {
        const fkPayload = asRecord(rawKey)
        if (!fkPayload) {
          skipped++
          continue
        }

        const evidence = foreignKeyEvidenceFromPayload(sourceName, rowCount, fkPayload)
        const toEntity = entityLookup.get(evidence.target.toLowerCase())
        if (!toEntity) {
          this.logger.debug('Skipping foreign key to an unknown entity', {
            source: sourceName,
            target: evidence.target,
          })
          skipped++
          continue
        }

        const relationshipType =
          asString(fkPayload.relationship_type)?.trim() ||
          asString(fkPayload.type)?.trim() ||
          DEFAULT_RELATIONSHIP_TYPE
        const description = asString(fkPayload.description)?.trim() || null

        const key = {
          domainId,
          fromEntityId: fromEntity.id,
          toEntityId: toEntity.id,
          relationshipType,
        }

        const existing = await callStore('findRelationship', () =>
          this.store.findRelationship(key)
        )

        if (!existing) {
          const now = new Date()
          const created = await callStore('insertRelationship', () =>
            this.store.insertRelationship({
              id: uuidv4(),
              ...key,
              description,
              inferenceStatus: 'pending',
              evidence,
              createdAt: now,
              updatedAt: now,
            })
          )
          inferred.push(created)
          continue
        }

        const outcome = refreshOutcome(existing.inferenceStatus, existing.evidence !== null)
        if (outcome.action === 'skip') {
          this.logger.debug('Leaving manual relationship untouched', {
            relationshipId: existing.id,
          })
          skipped++
          continue
        }

        const refreshed = await callStore('updateRelationship', () =>
          this.store.updateRelationship(existing.id, {
            description: description ?? existing.description,
            evidence,
            inferenceStatus: outcome.status,
            updatedAt: new Date(),
          })
        )
        inferred.push(refreshed)
      }
    }

    this.logger.info('Inferred relationships', {
      domainId,
      inferred: inferred.length,
      skipped,
    })

    return inferred
  }

  /**
   * Marks a relationship as approved by a reviewer
   * @throws {RelationshipNotFoundError} If the relationship does not exist
   * @throws {InvalidStatusTransitionError} If the lifecycle forbids it
   */
  async approve(relationshipId: string): Promise<RelationshipRecord> {
    return this.review(relationshipId, 'approved')
  }

  /**
   * Marks a relationship as rejected by a reviewer
   * @throws {RelationshipNotFoundError} If the relationship does not exist
   * @throws {InvalidStatusTransitionError} If the lifecycle forbids it
   */
  async reject(relationshipId: string): Promise<RelationshipRecord> {
    return this.review(relationshipId, 'rejected')
  }

  private async review(
    relationshipId: string,
    status: InferenceStatus
  ): Promise<RelationshipRecord> {
    const relationship = await callStore('getRelationship', () =>
      this.store.getRelationship(relationshipId)
    )
    if (!relationship) {
      throw new RelationshipNotFoundError(relationshipId)
    }
    if (relationship.inferenceStatus === status) {
      return relationship
    }

    validateReviewTransition(relationship.inferenceStatus, status)

    return callStore('updateRelationship', () =>
      this.store.updateRelationship(relationshipId, {
        inferenceStatus: status,
        updatedAt: new Date(),
      })
    )
  }
}
