import type { ColumnStats } from '../../types/source.js'
import { firstStat } from '../input/coercion.js'

/** Statistic keys that carry a null ratio directly */
export const NULL_RATIO_KEYS = ['null_pct', 'null_ratio', 'pct_null'] as const
export const ROW_COUNT_KEYS = ['total', 'count', 'row_count'] as const
export const NULL_COUNT_KEYS = ['nulls', 'null_count'] as const
export const DISTINCT_KEYS = ['distinct_count', 'distinct', 'approx_distinct'] as const

/**
 * Derives a column's null ratio: a direct ratio key when present,
 * otherwise `nulls / total` from raw counts.
 */
export function nullRatioFromStats(stats: ColumnStats | undefined): number | undefined {
  const direct = firstStat(stats, NULL_RATIO_KEYS)
  if (direct !== undefined) return direct

  const total = firstStat(stats, ['total'])
  if (!total) return undefined

  const nulls = firstStat(stats, NULL_COUNT_KEYS)
  return nulls === undefined ? undefined : nulls / total
}

/**
 * Derives `distinct / total`, or undefined without both counts.
 */
export function uniquenessFromStats(stats: ColumnStats | undefined): number | undefined {
  const distinct = firstStat(stats, DISTINCT_KEYS)
  const total = firstStat(stats, ROW_COUNT_KEYS)
  if (distinct === undefined || !total) return undefined
  return distinct / total
}

/**
 * Scores how well profiling statistics support a column as a mapping target.
 *
 * Completeness contributes up to 0.6 (0.6 at ≤5% nulls, 0.4 at ≤20%,
 * 0.2 at ≤35%). Uniqueness contributes up to 0.4 for id-like columns
 * (≥0.9 distinct ratio full credit, ≥0.5 half) or up to 0.2 for other
 * columns with low cardinality (≤0.1 → 0.2, ≤0.5 → 0.1).
 * Missing or unparseable statistics contribute nothing.
 */
export function columnEvidenceScore(
  columnName: string | null | undefined,
  stats: ColumnStats | undefined
): number {
  if (!stats) return 0

  const column = (columnName ?? '').toLowerCase()
  let score = 0

  const nullRatio = nullRatioFromStats(stats)
  if (nullRatio !== undefined) {
    if (nullRatio <= 0.05) {
      score += 0.6
    } else if (nullRatio <= 0.2) {
      score += 0.4
    } else if (nullRatio <= 0.35) {
      score += 0.2
    }
  }

  const uniqueness = uniquenessFromStats(stats)
  if (uniqueness !== undefined) {
    if (column.includes('id')) {
      if (uniqueness >= 0.9) {
        score += 0.4
      } else if (uniqueness >= 0.5) {
        score += 0.2
      }
    } else if (uniqueness <= 0.1) {
      score += 0.2
    } else if (uniqueness <= 0.5) {
      score += 0.1
    }
  }

  return Math.min(score, 1)
}
