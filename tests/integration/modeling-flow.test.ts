import { describe, it, expect } from 'vitest'
import {
  Schemawright,
  InMemoryMappingStore,
  InMemoryRelationshipStore,
  enrichWithEvidence,
  InvalidModelError,
} from '../../src/index.js'

const entity = { id: 'e-member', name: 'Member' }

const attributes = [
  { id: 'a-1', name: 'member_id', data_type: 'string', semantic_type: 'member_id', required: true },
  { id: 'a-2', name: 'date_of_birth', datatype: 'date' },
]

const sources = [
  {
    id: 't-1',
    name: 'raw.members',
    schema_json: { member_id: 'varchar', mbr_id: 'varchar', dob: 'date', birth_dt: 'timestamp' },
    stats_json: { member_id: { null_pct: 0, distinct_count: 100, total: 100 } },
  },
]

describe('modeling flow', () => {
  const engine = Schemawright.create().build()

  it('plans mappings and persists the top candidates as drafts', async () => {
    const plans = engine.autoplan(entity, attributes, sources)
    const store = new InMemoryMappingStore()
    const drafts = engine.draftMappingService(store)

    const { created, persisted } = await drafts.persistDrafts(entity.id, plans)

    expect(created).toBe(2)
    expect(persisted.get('a-1')?.columnPath).toBe('raw.members.member_id')
    expect(persisted.get('a-2')?.columnPath).toBe('raw.members.birth_dt')

    const approved = await drafts.updateStatus(persisted.get('a-1')?.id ?? '', 'approved')
    expect(approved.status).toBe('approved')

    const rerun = await drafts.persistDrafts(entity.id, engine.autoplan(entity, attributes, sources))
    expect(rerun.created).toBe(1)
    expect(store.all()).toHaveLength(3)
  })

  it('infers relationships and carries review decisions across runs', async () => {
    const store = new InMemoryRelationshipStore().addDomain({
      id: 'd-1',
      name: 'Claims',
      entities: [
        { id: 'e-claim', name: 'Claim' },
        { id: 'e-member', name: 'Member' },
      ],
    })
    const service = engine.relationshipService(store)
    const profile = [
      {
        name: 'claim',
        row_count: 1000,
        foreign_keys: [{ column: 'member_id', referenced_source: 'member', match_count: 980 }],
      },
    ]

    const [proposed] = await service.inferRelationships('d-1', profile)
    expect(proposed.inferenceStatus).toBe('pending')
    expect(proposed.evidence?.coverage).toBe(0.98)

    await service.reject(proposed.id)
    const [revived] = await service.inferRelationships('d-1', profile)
    expect(revived.id).toBe(proposed.id)
    expect(revived.inferenceStatus).toBe('pending')

    await service.approve(proposed.id)
    const [kept] = await service.inferRelationships('d-1', profile)
    expect(kept.inferenceStatus).toBe('approved')
  })

  it('checks a drafted model against the ontology', () => {
    const model = {
      entities: [
        { name: 'Member', attributes: ['member_id', 'dob'] },
        { name: 'Claim', attributes: ['claim_id', 'member_id', 'claim_date', 'total_amount'] },
      ],
    }

    const report = engine.analyzeMece(JSON.stringify(model))

    expect(report.collisions).toHaveLength(1)
    expect(report.collisions[0].entities).toEqual({ nameA: 'Member', nameB: 'Claim' })
    expect(report.uncoveredTerms.map((gap) => gap.canonicalEntity)).toEqual([
      'beneficiary',
      'provider',
      'scheme',
      'claim_line',
      'authorization',
      'remittance',
    ])
    expect(report.meceScore).toBe(0.65)

    const [relationship] = enrichWithEvidence([{ from: 'Claim', to: 'Member' }], {
      entities: model.entities,
      tables: [
        {
          tableName: 'claims',
          displayName: 'Claim',
          rowCount: 500,
          columns: [{ name: 'claim_id', statistics: { null_pct: 0 } }],
        },
        {
          tableName: 'members',
          displayName: 'Member',
          columns: [{ name: 'member_id', statistics: { distinct_count: 100 } }],
        },
      ],
    })
    expect(relationship.type).toBe('one_to_many')
    expect(relationship.evidence).toEqual({ coverage: 1, childPerParentMean: 5 })
  })

  it('rejects models that are not JSON objects', () => {
    expect(() => engine.analyzeMece('[]')).toThrow(InvalidModelError)
  })
})
