import { describe, it, expect } from 'vitest'
import {
  indelSimilarity,
  nameSimilarity,
  sortTokens,
  tokenSortRatio,
  clamp01,
} from '../../../src/core/similarity/name.js'

describe('indelSimilarity', () => {
  it('returns 1 for identical strings', () => {
    expect(indelSimilarity('claim_id', 'claim_id')).toBe(1)
  })

  it('returns 1 for two empty strings', () => {
    expect(indelSimilarity('', '')).toBe(1)
  })

  it('returns 0 when no characters are shared', () => {
    expect(indelSimilarity('abc', 'xyz')).toBe(0)
  })

  it('counts a substitution as an insertion plus a deletion', () => {
    expect(indelSimilarity('claim_id', 'claim id')).toBe(0.875)
  })
})

describe('sortTokens', () => {
  it('sorts whitespace-separated tokens', () => {
    expect(sortTokens('member  id')).toBe('id member')
  })

  it('drops leading and trailing whitespace', () => {
    expect(sortTokens('  b a ')).toBe('a b')
  })

  it('keeps underscores inside a token', () => {
    expect(sortTokens('claim_id')).toBe('claim_id')
  })
})

describe('tokenSortRatio', () => {
  it('ignores word order', () => {
    expect(tokenSortRatio('member id', 'id member')).toBe(1)
  })

  it('is case-insensitive by default', () => {
    expect(tokenSortRatio('CLAIM', 'claim')).toBe(1)
  })

  it('can compare case-sensitively', () => {
    expect(tokenSortRatio('ABC', 'abc', { caseSensitive: true })).toBe(0)
  })

  it('returns 0 when either side has no tokens', () => {
    expect(tokenSortRatio('   ', 'claim')).toBe(0)
    expect(tokenSortRatio('claim', '')).toBe(0)
  })
})

describe('nameSimilarity', () => {
  it('scores names that differ by case and separator', () => {
    expect(nameSimilarity('Claim_Identifier', 'claim identifier')).toBe(0.9375)
  })

  it('scores abbreviations partially', () => {
    expect(nameSimilarity('member_id', 'mbr_id')).toBe(0.8)
  })

  it('returns 0 for missing names', () => {
    expect(nameSimilarity('', 'member_id')).toBe(0)
    expect(nameSimilarity(null, 'member_id')).toBe(0)
    expect(nameSimilarity('member_id', undefined)).toBe(0)
  })

  it('is symmetric', () => {
    const pairs: Array<[string, string]> = [
      ['claim_identifier', 'claim identifier'],
      ['provider_name', 'name'],
      ['total_amount', 'amount_total'],
      ['Date Of Birth', 'dob'],
    ]
    for (const [a, b] of pairs) {
      expect(nameSimilarity(a, b)).toBe(nameSimilarity(b, a))
    }
  })

  it('stays within [0, 1]', () => {
    const names = ['a', 'member_id', 'MEMBER ID', 'x y z', 'claim_line_amount', '']
    for (const a of names) {
      for (const b of names) {
        const score = nameSimilarity(a, b)
        expect(score).toBeGreaterThanOrEqual(0)
        expect(score).toBeLessThanOrEqual(1)
      }
    }
  })
})

describe('clamp01', () => {
  it('clamps out-of-range values', () => {
    expect(clamp01(-0.5)).toBe(0)
    expect(clamp01(1.5)).toBe(1)
    expect(clamp01(0.42)).toBe(0.42)
  })

  it('maps NaN to 0', () => {
    expect(clamp01(Number.NaN)).toBe(0)
  })
})
