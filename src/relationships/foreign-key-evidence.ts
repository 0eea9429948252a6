import type { ForeignKeyEvidencePayload } from '../types/relationship.js'
import { asNumber, asRecord, asString } from '../core/input/coercion.js'

function text(...values: unknown[]): string {
  for (const value of values) {
    const str = asString(value)?.trim()
    if (str) return str
  }
  return ''
}

/**
 * Converts a raw count to a non-negative integer, 0 when unparseable
 */
export function coerceCount(value: unknown): number {
  const parsed = asNumber(value)
  if (parsed === undefined) return 0
  return Math.max(Math.trunc(parsed), 0)
}

/**
 * Builds the evidence stored on a relationship from one foreign-key match
 * reported by the profiler.
 *
 * Reads `column|from_column`, `referenced_source|to_source`,
 * `referenced_column|to_column` (default `id`) and `match_count|matches`.
 * Coverage is the matched share of the source's rows, capped at 1 and
 * rounded to 6 decimals; 0 when the source has no rows.
 */
export function foreignKeyEvidenceFromPayload(
  source: string,
  rowCount: number,
  payload: unknown
): ForeignKeyEvidencePayload {
  const raw = asRecord(payload) ?? {}
  const matchCount = coerceCount(raw.match_count ?? raw.matches)

  let coverage = 0
  if (rowCount > 0) {
    coverage = Number(Math.min(matchCount / rowCount, 1).toFixed(6))
  }

  return {
    source,
    column: text(raw.column, raw.from_column),
    target: text(raw.referenced_source, raw.to_source),
    targetColumn: text(raw.referenced_column, raw.to_column) || 'id',
    rowCount,
    matchCount,
    coverage,
  }
}
