import { describe, it, expect, vi } from 'vitest'
import { CoverageAnalyzer, analyzeMece } from '../../../src/coverage/coverage-analyzer.js'
import { loadDefaultOntology } from '../../../src/ontology/loader.js'
import { InvalidModelError, InvalidParameterError } from '../../../src/utils/errors.js'
import type { Logger } from '../../../src/utils/logger.js'

const ontology = loadDefaultOntology()

const beneficiaryOnly = JSON.stringify({
  entities: [{ name: 'Beneficiary', attributes: ['member_id', 'dob'] }],
})

describe('CoverageAnalyzer', () => {
  describe('analyze', () => {
    it('combines every check into one report', () => {
      const report = new CoverageAnalyzer(ontology).analyze(beneficiaryOnly)

      expect(report.collisions).toEqual([])
      expect(report.uncoveredTerms).toHaveLength(7)
      expect(report.uncoveredTerms[2]).toEqual({
        canonicalEntity: 'scheme',
        missingAttributes: ['scheme_id', 'scheme_name'],
        reason: 'ontology_gap',
      })
      expect(report.namingSuggestions).toEqual([
        { entity: 'Beneficiary', from: 'member_id', to: 'beneficiary_id' },
        { entity: 'Beneficiary', from: 'dob', to: 'date_of_birth' },
      ])
      expect(report.meceScore).toBe(0.65)
    })

    it('uses the configured collision threshold', () => {
      const model = {
        entities: [
          { name: 'Claim', attributes: ['claim_identifier'] },
          { name: 'Remittance', attributes: ['claim identifier'] },
        ],
      }

      expect(new CoverageAnalyzer(ontology).analyze(model).collisions).toHaveLength(1)
      expect(
        new CoverageAnalyzer(ontology, { collisionThreshold: 0.95 }).analyze(model).collisions
      ).toEqual([])
    })

    it('is deterministic', () => {
      const analyzer = new CoverageAnalyzer(ontology)
      expect(analyzer.analyze(beneficiaryOnly)).toEqual(analyzer.analyze(beneficiaryOnly))
    })

    it('rejects payloads that are not JSON objects', () => {
      const analyzer = new CoverageAnalyzer(ontology)
      expect(() => analyzer.analyze('not json')).toThrow(InvalidModelError)
      expect(() => analyzer.analyze('[]')).toThrow(InvalidModelError)
    })

    it('logs a summary', () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      new CoverageAnalyzer(ontology, { logger }).analyze(beneficiaryOnly)

      expect(logger.debug).toHaveBeenCalledWith('Analyzed model coverage', {
        entities: 1,
        collisions: 0,
        uncovered: 7,
        suggestions: 2,
        meceScore: 0.65,
      })
    })
  })

  describe('coverageReport', () => {
    it('compares model names with the ontology vocabulary', () => {
      const report = new CoverageAnalyzer(ontology).coverageReport({
        entities: [
          { name: 'Member', attributes: ['dob', 'member_id', 'Beneficiary_ID'] },
          { name: 'Orders', attributes: ['order_id', 'dob'] },
        ],
      })

      expect(report.entityOverlaps).toEqual(['beneficiary'])
      expect(report.entityCollisions).toEqual(['Orders'])
      expect(report.uncoveredEntities).toEqual([
        'authorization',
        'claim',
        'claim_line',
        'provider',
        'remittance',
        'scheme',
      ])
      expect(report.attributeOverlaps).toEqual(['beneficiary_id'])
      expect(report.attributeCollisions).toEqual(['dob', 'member_id', 'order_id'])
      expect(report.uncoveredAttributes).toHaveLength(25)
      expect(report.uncoveredAttributes.slice(0, 3)).toEqual([
        'authorization_id',
        'claim_date',
        'claim_id',
      ])
    })

    it('keeps the model spelling of collisions', () => {
      const report = new CoverageAnalyzer(ontology).coverageReport({
        entities: [
          { name: ' Order Lines ', attributes: ['Order_ID', ' Line Total '] },
          { name: 'Member', attributes: ['BENEFICIARY_ID', 'Order_ID'] },
        ],
      })

      expect(report.entityCollisions).toEqual(['Order Lines'])
      expect(report.attributeCollisions).toEqual(['Line Total', 'Order_ID'])
      expect(report.attributeOverlaps).toEqual(['beneficiary_id'])
    })

    it('reports everything as uncovered for an empty model', () => {
      const report = new CoverageAnalyzer(ontology).coverageReport('{"entities": []}')

      expect(report.entityOverlaps).toEqual([])
      expect(report.uncoveredEntities).toHaveLength(7)
      expect(report.uncoveredAttributes).toHaveLength(26)
    })
  })

  it('rejects an out-of-range collision threshold', () => {
    expect(() => new CoverageAnalyzer(ontology, { collisionThreshold: 1.5 })).toThrow(
      InvalidParameterError
    )
  })
})

describe('analyzeMece', () => {
  it('analyzes with a one-off analyzer', () => {
    expect(analyzeMece(beneficiaryOnly, ontology).meceScore).toBe(0.65)
  })
})
