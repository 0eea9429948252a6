// Main entry point
export { Schemawright, EngineBuilder } from './builder/engine-builder.js'
export { ModelingEngine } from './core/modeling-engine.js'

// Configuration
export {
  mergeEngineOptions,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_COLLISION_THRESHOLD,
  type EngineOptions,
  type ResolvedEngineOptions,
} from './builder/engine-options.js'

// Similarity primitives
export * from './core/similarity/index.js'

// Ontology
export * from './ontology/index.js'

// Mapping planner
export {
  MappingPlanner,
  autoplan,
  type MappingPlannerOptions,
} from './planner/mapping-planner.js'
export { DraftMappingService, parseMappingStatus } from './planner/draft-mappings.js'
export { buildRationale } from './planner/rationale.js'

// Relationship inference
export * from './relationships/index.js'

// Coverage (MECE)
export * from './coverage/index.js'

// In-memory stores
export { InMemoryRelationshipStore, InMemoryMappingStore } from './adapters/memory/index.js'

// Types
export * from './types/index.js'

// Errors
export {
  SchemawrightError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  InvalidModelError,
  OntologyError,
  NotFoundError,
  DomainNotFoundError,
  RelationshipNotFoundError,
  MappingNotFoundError,
  InvalidStatusTransitionError,
  StoreOperationError,
  isSchemawrightError,
} from './utils/errors.js'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createLevelLogger,
  type Logger,
  type LogLevel,
} from './utils/logger.js'
