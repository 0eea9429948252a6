import { describe, it, expect } from 'vitest'
import { parseModelDocument } from '../../../src/coverage/model-document.js'
import { InvalidModelError } from '../../../src/utils/errors.js'

describe('parseModelDocument', () => {
  it('parses a JSON string', () => {
    expect(
      parseModelDocument('{"entities":[{"name":"Claim","attributes":["claim_id","amount"]}]}')
    ).toEqual({ entities: [{ name: 'Claim', attributes: ['claim_id', 'amount'] }] })
  })

  it('accepts attribute objects and skips unnamed entries', () => {
    expect(
      parseModelDocument({
        entities: [
          { name: ' Member ', attributes: [{ name: 'dob' }, 'member_id', '  ', { type: 'x' }, null] },
          { attributes: ['orphan'] },
          'not an entity',
        ],
      })
    ).toEqual({ entities: [{ name: 'Member', attributes: ['dob', 'member_id'] }] })
  })

  it('treats a missing entity list as empty', () => {
    expect(parseModelDocument({})).toEqual({ entities: [] })
  })

  it('rejects JSON that does not parse', () => {
    expect(() => parseModelDocument('{"entities": [')).toThrow(
      'Invalid model payload: model JSON does not parse'
    )
  })

  it('rejects values that are not objects', () => {
    expect(() => parseModelDocument('[1, 2]')).toThrow(InvalidModelError)
    expect(() => parseModelDocument(null)).toThrow('Invalid model payload: model must be a JSON object')
    expect(() => parseModelDocument(42)).toThrow(InvalidModelError)
  })

  it('reports what it received', () => {
    try {
      parseModelDocument('"text"')
      expect.fail('should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidModelError)
      if (error instanceof InvalidModelError) {
        expect(error.code).toBe('INVALID_MODEL')
        expect(error.context).toEqual({ reason: 'model must be a JSON object', received: 'string' })
      }
    }
  })
})
