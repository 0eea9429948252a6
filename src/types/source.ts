/**
 * Logical attributes and physical source tables consumed by the engine.
 * These are plain value records; the engine never mutates them.
 */

/**
 * Profiling statistics for one column. An open bag: a missing key means
 * "unknown", never zero.
 */
export type ColumnStats = Readonly<Record<string, unknown>>

/**
 * A logical attribute of a modeled entity
 */
export interface LogicalAttribute {
  readonly id: string | number | null
  readonly name: string
  readonly datatype?: string
  readonly semanticType?: string
  readonly required: boolean
}

/**
 * A physical column of a profiled source table
 */
export interface PhysicalColumn {
  readonly name: string
  readonly dataType?: string
  readonly statistics?: ColumnStats
}

/**
 * A profiled source table. Column names are unique; `columns` keeps
 * declaration order.
 */
export interface PhysicalTable {
  readonly id: string | number | null
  readonly qualifiedName: string
  readonly columns: readonly PhysicalColumn[]
}

/**
 * The entity an attribute plan is produced for
 */
export interface EntityRef {
  readonly id: string | number | null
  readonly name: string
}

/**
 * Raw attribute payload as supplied by the authoring layer.
 * Both snake_case and camelCase keys are accepted.
 */
export interface AttributeInput {
  id?: unknown
  name?: unknown
  datatype?: unknown
  data_type?: unknown
  dataType?: unknown
  semantic_type?: unknown
  semanticType?: unknown
  required?: unknown
}

/**
 * Raw source table payload: column name → dtype, column name → stats
 */
export interface SourceInput {
  id?: unknown
  name?: unknown
  schema_json?: unknown
  schemaJson?: unknown
  stats_json?: unknown
  statsJson?: unknown
}
