import { describe, it, expect } from 'vitest'
import {
  columnEvidenceScore,
  nullRatioFromStats,
  uniquenessFromStats,
} from '../../../src/core/similarity/evidence.js'

describe('nullRatioFromStats', () => {
  it('prefers a direct ratio key', () => {
    expect(nullRatioFromStats({ pct_null: 0.2, nulls: 50, total: 100 })).toBe(0.2)
  })

  it('derives the ratio from raw counts', () => {
    expect(nullRatioFromStats({ nulls: 25, total: 100 })).toBe(0.25)
    expect(nullRatioFromStats({ null_count: 5, total: 50 })).toBe(0.1)
  })

  it('is undefined without a total', () => {
    expect(nullRatioFromStats({ nulls: 5 })).toBeUndefined()
    expect(nullRatioFromStats({ nulls: 5, total: 0 })).toBeUndefined()
  })
})

describe('uniquenessFromStats', () => {
  it('divides distinct values by row count', () => {
    expect(uniquenessFromStats({ approx_distinct: 30, row_count: 60 })).toBe(0.5)
  })

  it('is undefined without both counts', () => {
    expect(uniquenessFromStats({ distinct: 5 })).toBeUndefined()
    expect(uniquenessFromStats({ distinct: 5, total: 0 })).toBeUndefined()
  })
})

describe('columnEvidenceScore', () => {
  it('gives full credit to a complete, unique id column', () => {
    expect(
      columnEvidenceScore('member_id', { null_pct: 0.01, distinct_count: 95, total: 100 })
    ).toBe(1)
  })

  it('rewards low cardinality on non-id columns', () => {
    expect(
      columnEvidenceScore('status', { null_ratio: 0.1, distinct: 3, row_count: 100 })
    ).toBeCloseTo(0.6, 10)
    expect(
      columnEvidenceScore('name', { nulls: 10, total: 100, distinct_count: 40 })
    ).toBeCloseTo(0.5, 10)
  })

  it('parses numeric strings', () => {
    expect(
      columnEvidenceScore('provider_id', { null_pct: '0.02', distinct_count: 60, count: 100 })
    ).toBeCloseTo(0.8, 10)
  })

  it('bands completeness', () => {
    expect(columnEvidenceScore('notes', { null_pct: 0.3 })).toBe(0.2)
    expect(columnEvidenceScore('notes', { null_pct: 0.5 })).toBe(0)
  })

  it('ignores unparseable statistics', () => {
    expect(columnEvidenceScore('notes', { null_pct: 'unknown', distinct: true })).toBe(0)
  })

  it('returns 0 without statistics', () => {
    expect(columnEvidenceScore('notes', undefined)).toBe(0)
  })
})
