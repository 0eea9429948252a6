/**
 * Canonical datatype buckets. Aliases are compared after trimming and
 * lower-casing.
 */
export type DtypeBucket = 'string' | 'int' | 'decimal' | 'date'

const CANONICAL_DTYPES: Record<DtypeBucket, ReadonlySet<string>> = {
  string: new Set([
    'string',
    'varchar',
    'char',
    'text',
    'nvarchar',
    'character varying',
  ]),
  int: new Set(['int', 'integer', 'bigint', 'smallint', 'number']),
  decimal: new Set(['decimal', 'numeric', 'float', 'double', 'real']),
  date: new Set(['date', 'datetime', 'timestamp', 'timestamptz']),
}

/** Bucket pairs that can hold each other's values with some loss */
const WEAKLY_COMPATIBLE: ReadonlyArray<readonly [DtypeBucket, DtypeBucket]> = [
  ['string', 'decimal'],
  ['string', 'int'],
  ['decimal', 'int'],
]

export const WEAK_DTYPE_SCORE = 0.25

function normaliseDtype(value: string | null | undefined): string {
  if (!value) return ''
  return value.trim().toLowerCase()
}

/**
 * Maps a datatype string to its canonical bucket. Unknown types map to
 * their own normalised spelling, so two identical unknown types still match.
 */
export function canonicalDtype(value: string | null | undefined): string {
  const normalised = normaliseDtype(value)
  if (!normalised) return ''

  for (const [bucket, aliases] of Object.entries(CANONICAL_DTYPES)) {
    if (aliases.has(normalised)) return bucket
  }
  return normalised
}

/**
 * Scores how well a column type can carry an attribute type:
 * 1 for the same bucket, 0.25 for a weakly compatible pair, otherwise 0.
 * Empty or missing types score 0.
 *
 * @example
 * ```typescript
 * dtypeCompatScore('string', 'VARCHAR')   // 1
 * dtypeCompatScore('int', 'numeric')      // 0.25
 * dtypeCompatScore('date', 'int')         // 0
 * dtypeCompatScore('geometry', 'Geometry') // 1 (literal match)
 * ```
 */
export function dtypeCompatScore(
  attrType: string | null | undefined,
  colType: string | null | undefined
): number {
  const attrKey = canonicalDtype(attrType)
  const colKey = canonicalDtype(colType)
  if (!attrKey || !colKey) return 0

  if (attrKey === colKey) return 1

  const weak = WEAKLY_COMPATIBLE.some(
    ([left, right]) =>
      (left === attrKey && right === colKey) ||
      (left === colKey && right === attrKey)
  )
  return weak ? WEAK_DTYPE_SCORE : 0
}
