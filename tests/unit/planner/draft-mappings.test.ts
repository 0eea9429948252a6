import { describe, it, expect, beforeEach } from 'vitest'
import {
  DraftMappingService,
  parseMappingStatus,
} from '../../../src/planner/draft-mappings.js'
import { InMemoryMappingStore } from '../../../src/adapters/memory/mapping-store.js'
import type { AttributePlan, MappingCandidate, MappingStore } from '../../../src/types/mapping.js'
import {
  InvalidParameterError,
  MappingNotFoundError,
} from '../../../src/utils/errors.js'

function candidate(overrides: Partial<MappingCandidate> = {}): MappingCandidate {
  return {
    sourceTableId: 10,
    columnName: 'member_id',
    columnPath: 'raw.members.member_id',
    confidence: 0.9,
    rationale: 'strong name match',
    componentScores: { name: 1, dtype: 1, semantic: 1, evidence: 0 },
    transforms: null,
    joinRecipe: null,
    ...overrides,
  }
}

function plan(attributeId: string | number | null, candidates: MappingCandidate[]): AttributePlan {
  return { attributeId, attribute: 'member_id', candidates }
}

describe('parseMappingStatus', () => {
  it('accepts known statuses', () => {
    expect(parseMappingStatus('approved')).toBe('approved')
  })

  it('rejects unknown values', () => {
    expect(() => parseMappingStatus('archived')).toThrow(
      "Invalid parameter 'status': must be one of: draft, approved, rejected"
    )
    expect(() => parseMappingStatus(undefined)).toThrow(InvalidParameterError)
  })
})

describe('DraftMappingService', () => {
  let store: InMemoryMappingStore
  let service: DraftMappingService

  beforeEach(() => {
    store = new InMemoryMappingStore()
    service = new DraftMappingService(store)
  })

  describe('persistDrafts', () => {
    it('creates a draft from the top candidate', async () => {
      const result = await service.persistDrafts(1, [
        plan(5, [candidate(), candidate({ columnPath: 'raw.members.mbr_id', confidence: 0.8 })]),
      ])

      expect(result.created).toBe(1)
      const draft = result.persisted.get(5)
      expect(draft).toMatchObject({
        entityId: 1,
        attributeId: 5,
        sourceTableId: 10,
        columnPath: 'raw.members.member_id',
        confidence: 0.9,
        status: 'draft',
      })
      expect(store.all()).toHaveLength(1)
    })

    it('updates the existing draft instead of adding another', async () => {
      await service.persistDrafts(1, [plan(5, [candidate()])])
      const result = await service.persistDrafts(1, [
        plan(5, [candidate({ columnPath: 'raw.members.mbr_id', confidence: 0.7 })]),
      ])

      expect(result.created).toBe(0)
      const mappings = store.all()
      expect(mappings).toHaveLength(1)
      expect(mappings[0].columnPath).toBe('raw.members.mbr_id')
      expect(mappings[0].confidence).toBe(0.7)
    })

    it('skips plans that cannot be persisted', async () => {
      const result = await service.persistDrafts(1, [
        plan(null, [candidate()]),
        plan(6, []),
        plan(7, [candidate({ sourceTableId: null })]),
      ])

      expect(result.created).toBe(0)
      expect(result.persisted.size).toBe(0)
      expect(store.all()).toEqual([])
    })

    it('leaves reviewed mappings alone and starts a new draft', async () => {
      const now = new Date()
      store.seedMapping({
        id: 'm-approved',
        entityId: 1,
        attributeId: 5,
        sourceTableId: 10,
        columnPath: 'raw.members.member_id',
        confidence: 0.9,
        rationale: 'strong name match',
        status: 'approved',
        transforms: null,
        joinRecipe: null,
        createdAt: now,
        updatedAt: now,
      })

      const result = await service.persistDrafts(1, [plan(5, [candidate()])])

      expect(result.created).toBe(1)
      const statuses = store.all().map((mapping) => mapping.status).sort()
      expect(statuses).toEqual(['approved', 'draft'])
    })

    it('wraps store failures', async () => {
      const failing: MappingStore = {
        findDraftForAttribute: async () => {
          throw new Error('connection reset')
        },
        findMapping: async () => null,
        insertMapping: async (mapping) => mapping,
        updateMapping: async () => {
          throw new Error('unused')
        },
      }

      await expect(
        new DraftMappingService(failing).persistDrafts(1, [plan(5, [candidate()])])
      ).rejects.toThrow("Store operation 'persistDrafts' failed: connection reset")
    })
  })

  describe('updateStatus', () => {
    it('changes the review status', async () => {
      const { persisted } = await service.persistDrafts(1, [plan(5, [candidate()])])
      const draft = persisted.get(5)
      if (!draft) throw new Error('draft missing')

      const updated = await service.updateStatus(draft.id, 'approved')

      expect(updated.status).toBe('approved')
      expect((await store.findMapping(draft.id))?.status).toBe('approved')
    })

    it('returns the mapping unchanged when the status is the same', async () => {
      const { persisted } = await service.persistDrafts(1, [plan(5, [candidate()])])
      const draft = persisted.get(5)
      if (!draft) throw new Error('draft missing')

      const result = await service.updateStatus(draft.id, 'draft')

      expect(result.updatedAt).toEqual(draft.updatedAt)
    })

    it('throws for unknown mappings', async () => {
      await expect(service.updateStatus('missing', 'approved')).rejects.toThrow(
        MappingNotFoundError
      )
    })

    it('validates the status before touching the store', async () => {
      await expect(service.updateStatus('missing', 'archived')).rejects.toThrow(
        InvalidParameterError
      )
    })
  })
})
