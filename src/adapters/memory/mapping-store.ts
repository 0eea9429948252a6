import type { MappingRecord, MappingStore } from '../../types/mapping.js'
import { MappingNotFoundError } from '../../utils/errors.js'

/**
 * In-memory implementation of MappingStore
 */
export class InMemoryMappingStore implements MappingStore {
  private readonly mappings = new Map<string, MappingRecord>()

  seedMapping(mapping: MappingRecord): this {
    this.mappings.set(mapping.id, { ...mapping })
    return this
  }

  all(): MappingRecord[] {
    return [...this.mappings.values()].map((record) => ({ ...record }))
  }

  async findDraftForAttribute(attributeId: string | number): Promise<MappingRecord | null> {
    for (const record of this.mappings.values()) {
      if (record.attributeId === attributeId && record.status === 'draft') {
        return { ...record }
      }
    }
    return null
  }

  async findMapping(id: string): Promise<MappingRecord | null> {
    const record = this.mappings.get(id)
    return record ? { ...record } : null
  }

  async insertMapping(mapping: MappingRecord): Promise<MappingRecord> {
    this.mappings.set(mapping.id, { ...mapping })
    return { ...mapping }
  }

  async updateMapping(
    id: string,
    updates: Partial<Omit<MappingRecord, 'id' | 'createdAt'>>
  ): Promise<MappingRecord> {
    const existing = this.mappings.get(id)
    if (!existing) {
      throw new MappingNotFoundError(id)
    }
    const updated = { ...existing, ...updates }
    this.mappings.set(id, updated)
    return { ...updated }
  }
}
