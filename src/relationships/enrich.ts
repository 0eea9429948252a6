/**
 * Attaching profiling evidence to proposed relationships
 * @module relationships/enrich
 */

import type { FkEvidence, RelationshipProposal } from '../types/relationship.js'
import type { ModelEntity } from '../types/coverage.js'
import type { ColumnStats } from '../types/source.js'
import { asArray, asRecord, asString, toColumnStats } from '../core/input/coercion.js'
import {
  classifyCardinality,
  evidenceForFk,
  guessKeyName,
  normaliseIdentifier,
} from './evidence.js'

/**
 * A profiled source table as known to the authoring layer
 */
export interface ProfiledTable {
  tableName: string
  schemaName?: string | null
  displayName?: string | null
  rowCount?: number | null
  columns: readonly { name: string; statistics?: ColumnStats | null }[]
  /** Table-level profile; `columns` maps column name → stats */
  tableStatistics?: Readonly<Record<string, unknown>> | null
}

export interface EnrichmentContext {
  entities: readonly ModelEntity[]
  tables: readonly ProfiledTable[]
}

const DEFAULT_PROPOSED_TYPE = 'one_to_many'

function buildTableLookup(tables: readonly ProfiledTable[]): Map<string, ProfiledTable> {
  const lookup = new Map<string, ProfiledTable>()
  for (const table of tables) {
    const candidates = [
      normaliseIdentifier(table.tableName),
      normaliseIdentifier(table.displayName),
      normaliseIdentifier(`${table.schemaName ?? ''}_${table.tableName}`),
    ]
    for (const candidate of candidates) {
      if (candidate && !lookup.has(candidate)) {
        lookup.set(candidate, table)
      }
    }
  }
  return lookup
}

/**
 * Column stats keyed by lower-cased column name. Per-column statistics
 * override the table-level profile.
 */
function columnStatsFor(table: ProfiledTable): Map<string, ColumnStats> {
  const stats = new Map<string, ColumnStats>()

  const tableColumns = asRecord(table.tableStatistics?.columns)
  if (tableColumns) {
    for (const [name, payload] of Object.entries(tableColumns)) {
      const parsed = toColumnStats(payload)
      if (parsed) stats.set(name.toLowerCase(), parsed)
    }
  }
  for (const column of table.columns) {
    const parsed = toColumnStats(column.statistics)
    if (parsed) stats.set(column.name.toLowerCase(), parsed)
  }

  return stats
}

function evidenceFor(
  fromEntity: ModelEntity | undefined,
  toEntity: ModelEntity | undefined,
  tableLookup: Map<string, ProfiledTable>
): FkEvidence {
  const childKey = guessKeyName(fromEntity?.attributes ?? [])
  const parentKey = guessKeyName(toEntity?.attributes ?? [])
  if (!fromEntity || !toEntity || !childKey || !parentKey) {
    return { coverage: null, childPerParentMean: null }
  }

  const fromTable = tableLookup.get(normaliseIdentifier(fromEntity.name))
  const toTable = tableLookup.get(normaliseIdentifier(toEntity.name))

  let childStats: Record<string, unknown> | undefined
  if (fromTable) {
    childStats = { ...columnStatsFor(fromTable).get(childKey.toLowerCase()) }
    const rowCount = fromTable.rowCount
    if (rowCount !== null && rowCount !== undefined && !('row_count' in childStats)) {
      childStats.row_count = rowCount
    }
  }

  const parentStats = toTable
    ? columnStatsFor(toTable).get(parentKey.toLowerCase())
    : undefined

  return evidenceForFk(childStats, parentStats)
}

/**
 * Attaches foreign-key evidence to relationship proposals and lets the
 * observed cardinality replace the proposed type whenever it is conclusive.
 *
 * Entities match proposals case-insensitively; tables match entities by
 * normalised identifier against their table name, display name and
 * `schema_table`. Proposals whose entities, keys or tables cannot be found
 * get null evidence.
 *
 * @param proposals - `{ from, to, type?, rule? }` payloads
 * @param context - Model entities with attribute names, and profiled tables
 */
export function enrichWithEvidence(
  proposals: unknown,
  context: EnrichmentContext
): RelationshipProposal[] {
  const entityLookup = new Map<string, ModelEntity>()
  for (const entity of context.entities) {
    const key = entity.name.trim().toLowerCase()
    if (key && !entityLookup.has(key)) entityLookup.set(key, entity)
  }
  const tableLookup = buildTableLookup(context.tables)

  return asArray(proposals).map((rawProposal) => {
    const proposal = asRecord(rawProposal) ?? {}
    const from = asString(proposal.from)?.trim() ?? ''
    const to = asString(proposal.to)?.trim() ?? ''
    const proposedType = asString(proposal.type)?.trim() || DEFAULT_PROPOSED_TYPE

    const evidence = evidenceFor(
      entityLookup.get(from.toLowerCase()),
      entityLookup.get(to.toLowerCase()),
      tableLookup
    )
    const classification = classifyCardinality(evidence.childPerParentMean)

    return {
      from,
      to,
      type: classification || proposedType,
      rule: asString(proposal.rule) ?? null,
      evidence,
    }
  })
}
