/**
 * Facade over the planner, analyzer and persistence services
 * @module core/modeling-engine
 */

import type { Ontology } from '../ontology/ontology.js'
import type { AttributePlan, MappingStore } from '../types/mapping.js'
import type { RelationshipStore } from '../types/relationship.js'
import type { CoverageReport, MeceReport } from '../types/coverage.js'
import type { ResolvedEngineOptions } from '../builder/engine-options.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger } from '../utils/logger.js'
import { MappingPlanner } from '../planner/mapping-planner.js'
import { DraftMappingService } from '../planner/draft-mappings.js'
import { CoverageAnalyzer } from '../coverage/coverage-analyzer.js'
import { RelationshipInferenceService } from '../relationships/inference-service.js'

/**
 * Holds one ontology snapshot and the components configured against it.
 * Created by {@link EngineBuilder}; safe to share, since nothing in it is
 * mutated after construction.
 */
export class ModelingEngine {
  readonly ontology: Ontology
  readonly planner: MappingPlanner
  readonly coverage: CoverageAnalyzer

  private readonly logger: Logger

  constructor(ontology: Ontology, options: ResolvedEngineOptions) {
    this.ontology = ontology
    this.logger = options.logger
    this.planner = new MappingPlanner({
      maxCandidates: options.maxCandidates,
      logger: createPrefixedLogger('planner', this.logger),
    })
    this.coverage = new CoverageAnalyzer(ontology, {
      collisionThreshold: options.collisionThreshold,
      logger: createPrefixedLogger('coverage', this.logger),
    })
  }

  autoplan(entity: unknown, attributes: unknown, sources: unknown): AttributePlan[] {
    return this.planner.autoplan(entity, attributes, sources)
  }

  analyzeMece(modelJson: unknown): MeceReport {
    return this.coverage.analyze(modelJson)
  }

  coverageReport(modelJson: unknown): CoverageReport {
    return this.coverage.coverageReport(modelJson)
  }

  relationshipService(store: RelationshipStore): RelationshipInferenceService {
    return new RelationshipInferenceService(
      store,
      createPrefixedLogger('relationships', this.logger)
    )
  }

  draftMappingService(store: MappingStore): DraftMappingService {
    return new DraftMappingService(store, createPrefixedLogger('mappings', this.logger))
  }
}
