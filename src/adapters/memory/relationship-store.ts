import type {
  DomainRecord,
  RelationshipKey,
  RelationshipRecord,
  RelationshipStore,
} from '../../types/relationship.js'
import { RelationshipNotFoundError } from '../../utils/errors.js'

function sameKey(record: RelationshipKey, key: RelationshipKey): boolean {
  return (
    record.domainId === key.domainId &&
    record.fromEntityId === key.fromEntityId &&
    record.toEntityId === key.toEntityId &&
    record.relationshipType === key.relationshipType
  )
}

/**
 * In-memory implementation of RelationshipStore.
 *
 * Records are copied on the way in and out, so callers never hold a
 * reference into the store.
 */
export class InMemoryRelationshipStore implements RelationshipStore {
  private readonly domains = new Map<string | number, DomainRecord>()
  private readonly relationships = new Map<string, RelationshipRecord>()

  addDomain(domain: DomainRecord): this {
    this.domains.set(domain.id, {
      ...domain,
      entities: domain.entities.map((entity) => ({ ...entity })),
    })
    return this
  }

  /**
   * Stores a relationship as-is, e.g. a manual one authored by a user
   */
  seedRelationship(relationship: RelationshipRecord): this {
    this.relationships.set(relationship.id, { ...relationship })
    return this
  }

  all(): RelationshipRecord[] {
    return [...this.relationships.values()].map((record) => ({ ...record }))
  }

  async findDomain(domainId: string | number): Promise<DomainRecord | null> {
    const domain = this.domains.get(domainId)
    return domain ? { ...domain, entities: [...domain.entities] } : null
  }

  async findRelationship(key: RelationshipKey): Promise<RelationshipRecord | null> {
    for (const record of this.relationships.values()) {
      if (sameKey(record, key)) return { ...record }
    }
    return null
  }

  async getRelationship(id: string): Promise<RelationshipRecord | null> {
    const record = this.relationships.get(id)
    return record ? { ...record } : null
  }

  async insertRelationship(relationship: RelationshipRecord): Promise<RelationshipRecord> {
    this.relationships.set(relationship.id, { ...relationship })
    return { ...relationship }
  }

  async updateRelationship(
    id: string,
    updates: Partial<Omit<RelationshipRecord, 'id' | 'createdAt'>>
  ): Promise<RelationshipRecord> {
    const existing = this.relationships.get(id)
    if (!existing) {
      throw new RelationshipNotFoundError(id)
    }
    const updated = { ...existing, ...updates }
    this.relationships.set(id, updated)
    return { ...updated }
  }
}
