/**
 * Tolerant parsing of raw authoring-layer payloads into typed records.
 *
 * Every function here is total: missing or wrong-typed fields become
 * `undefined` (or an empty default) and nothing throws. Scoring code only
 * ever sees the typed records produced here.
 *
 * @module core/input/coercion
 */

import type {
  ColumnStats,
  EntityRef,
  LogicalAttribute,
  PhysicalColumn,
  PhysicalTable,
} from '../../types/source.js'

/**
 * Narrows a value to a plain object (not null, not an array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isPlainObject(value) ? value : undefined
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

/**
 * Returns the value when it is a string; numbers are stringified.
 */
export function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}

/**
 * Returns the first argument that is a non-blank string
 */
export function firstNonEmptyString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.trim().length > 0) {
      return value
    }
  }
  return undefined
}

/**
 * Parses finite numbers and numeric strings. Booleans, blanks, NaN and
 * infinities are rejected.
 */
export function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed.length === 0) return undefined
    const parsed = Number(trimmed)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

/**
 * Returns the first statistic among `keys` that parses as a number
 */
export function firstStat(
  stats: ColumnStats | undefined,
  keys: readonly string[]
): number | undefined {
  if (!stats) return undefined
  for (const key of keys) {
    const value = asNumber(stats[key])
    if (value !== undefined) return value
  }
  return undefined
}

export function asIdentifier(value: unknown): string | number | null {
  if (typeof value === 'string' && value.length > 0) return value
  if (typeof value === 'number' && Number.isFinite(value)) return value
  return null
}

export function toColumnStats(value: unknown): ColumnStats | undefined {
  const record = asRecord(value)
  if (!record || Object.keys(record).length === 0) return undefined
  return record
}

export function toEntityRef(value: unknown): EntityRef {
  const raw = asRecord(value) ?? {}
  return {
    id: asIdentifier(raw.id),
    name: asString(raw.name) ?? '',
  }
}

/**
 * Parses an attribute payload. Accepts `datatype`, `data_type` or `dataType`
 * and `semantic_type` or `semanticType`.
 */
export function toLogicalAttribute(value: unknown): LogicalAttribute {
  const raw = asRecord(value) ?? {}
  return {
    id: asIdentifier(raw.id),
    name: asString(raw.name) ?? '',
    datatype: firstNonEmptyString(raw.datatype, raw.data_type, raw.dataType),
    semanticType: firstNonEmptyString(raw.semantic_type, raw.semanticType),
    required: raw.required === true,
  }
}

/**
 * Parses a source table payload of shape
 * `{ id, name, schema_json: {column: dtype}, stats_json: {column: stats} }`.
 * Column order follows the key order of `schema_json`.
 */
export function toPhysicalTable(value: unknown): PhysicalTable {
  const raw = asRecord(value) ?? {}
  const schema = asRecord(raw.schema_json) ?? asRecord(raw.schemaJson) ?? {}
  const stats = asRecord(raw.stats_json) ?? asRecord(raw.statsJson) ?? {}

  const columns: PhysicalColumn[] = Object.entries(schema).map(
    ([name, dtype]) => ({
      name,
      dataType: typeof dtype === 'string' ? dtype : undefined,
      statistics: toColumnStats(stats[name]),
    })
  )

  return {
    id: asIdentifier(raw.id),
    qualifiedName: asString(raw.name) ?? '',
    columns,
  }
}
