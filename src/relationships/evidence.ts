/**
 * Foreign-key evidence and cardinality classification
 * @module relationships/evidence
 */

import type { Cardinality, FkEvidence } from '../types/relationship.js'
import type { ColumnStats } from '../types/source.js'
import { firstStat } from '../core/input/coercion.js'

const CHILD_NULL_KEYS = ['null_pct', 'null_percent', 'null_ratio', 'pct_null'] as const
const CHILD_ROW_KEYS = ['row_count', 'count', 'non_null_count'] as const
const PARENT_DISTINCT_KEYS = ['distinct_count', 'distinct', 'unique_count'] as const

/** Fan-out above this is one-to-many */
export const ONE_TO_MANY_ABOVE = 1.2
/** Fan-out at or above this (and at or below {@link ONE_TO_MANY_ABOVE}) is one-to-one */
export const ONE_TO_ONE_FROM = 0.8

/**
 * Computes coverage and fan-out evidence for a proposed foreign key.
 *
 * - `coverage` is `1 - nullRatio` of the child key column. Ratios above 1
 *   are read as percentages (0-100) and scaled down; anything above 100
 *   counts as fully null. Null when the child stats carry no null ratio.
 * - `childPerParentMean` is `childRows / parentDistinct`, null unless the
 *   parent distinct count is positive and the result is finite.
 *
 * @example
 * ```typescript
 * evidenceForFk({ null_pct: 5 }, undefined)
 * // { coverage: 0.95, childPerParentMean: null }
 * evidenceForFk({ row_count: 300 }, { distinct_count: 100 })
 * // { coverage: null, childPerParentMean: 3 }
 * ```
 */
export function evidenceForFk(
  childStats: ColumnStats | null | undefined,
  parentStats: ColumnStats | null | undefined
): FkEvidence {
  const child = childStats ?? undefined
  const parent = parentStats ?? undefined

  let coverage: number | null = null
  const rawNull = firstStat(child, CHILD_NULL_KEYS)
  if (rawNull !== undefined) {
    let nullRatio = rawNull
    if (nullRatio > 1) {
      nullRatio = nullRatio <= 100 ? nullRatio / 100 : 1
    }
    nullRatio = Math.max(0, Math.min(nullRatio, 1))
    coverage = 1 - nullRatio
  }

  let childPerParentMean: number | null = null
  const childRows = firstStat(child, CHILD_ROW_KEYS)
  const parentDistinct = firstStat(parent, PARENT_DISTINCT_KEYS)
  if (childRows !== undefined && parentDistinct !== undefined && parentDistinct > 0) {
    const mean = childRows / parentDistinct
    childPerParentMean = Number.isFinite(mean) ? mean : null
  }

  return { coverage, childPerParentMean }
}

/**
 * Classifies cardinality from the observed child-per-parent mean.
 *
 * - null → `'one_to_many'`
 * - mean > 1.2 → `'one_to_many'`
 * - 0.8 ≤ mean ≤ 1.2 → `'one_to_one'`
 * - otherwise `''`: not enough evidence to override the proposed type
 */
export function classifyCardinality(childPerParentMean: number | null | undefined): Cardinality {
  if (childPerParentMean === null || childPerParentMean === undefined) {
    return 'one_to_many'
  }
  if (childPerParentMean > ONE_TO_MANY_ABOVE) return 'one_to_many'
  if (childPerParentMean >= ONE_TO_ONE_FROM) return 'one_to_one'
  return ''
}

function keyRank(name: string): number {
  const lower = name.toLowerCase()
  if (lower.endsWith('_id')) return 0
  if (lower === 'id') return 1
  if (lower.endsWith('id')) return 2
  return 3
}

/**
 * Picks the attribute most likely to be a key column: names ending in `_id`
 * first, then `id`, then anything ending in `id`. Ties go to the shorter
 * name, then to list order. Null when there are no named attributes.
 *
 * @example
 * ```typescript
 * guessKeyName(['name', 'id', 'member_id'])   // 'member_id'
 * guessKeyName(['plan_ref', 'planid'])        // 'planid'
 * ```
 */
export function guessKeyName(names: readonly string[]): string | null {
  const named = names.filter((name) => name.length > 0)
  if (named.length === 0) return null

  const ranked = [...named].sort(
    (a, b) => keyRank(a) - keyRank(b) || a.length - b.length
  )
  return ranked[0]
}

/**
 * Normalises a table or entity name for lookups: camelCase boundaries become
 * underscores, runs of non-alphanumerics collapse to one underscore, and the
 * result is trimmed of underscores and lower-cased.
 *
 * @example
 * ```typescript
 * normaliseIdentifier('ClaimLine')        // 'claim_line'
 * normaliseIdentifier('dbo.Claim Lines')  // 'dbo_claim_lines'
 * ```
 */
export function normaliseIdentifier(value: string | null | undefined): string {
  if (!value) return ''
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-z0-9]+/gi, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase()
}
