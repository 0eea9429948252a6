import type { Ontology } from '../ontology/ontology.js'
import type { Logger } from '../utils/logger.js'
import type { EngineOptions } from './engine-options.js'
import { mergeEngineOptions } from './engine-options.js'
import { loadDefaultOntology, loadOntology } from '../ontology/loader.js'
import { ModelingEngine } from '../core/modeling-engine.js'
import { ConfigurationError, requireNonNull } from '../utils/errors.js'

/**
 * Fluent builder for a {@link ModelingEngine}.
 *
 * @example
 * ```typescript
 * const engine = Schemawright.create()
 *   .withOntologyFile('./config/ontology.json')
 *   .withMaxCandidates(5)
 *   .withCollisionThreshold(0.85)
 *   .build()
 *
 * const plans = engine.autoplan(entity, attributes, sources)
 * ```
 */
export class EngineBuilder {
  private ontology?: Ontology
  private ontologyPath?: string
  private readonly options: EngineOptions = {}

  /**
   * Use an already-built ontology
   */
  withOntology(ontology: Ontology): this {
    this.ontology = requireNonNull(ontology, 'ontology')
    this.ontologyPath = undefined
    return this
  }

  /**
   * Load the ontology from a JSON file when the engine is built
   *
   * @throws {ConfigurationError} If the path is blank
   */
  withOntologyFile(path: string): this {
    if (path.trim() === '') {
      throw new ConfigurationError('Ontology file path must not be empty', 'ontologyPath')
    }
    this.ontologyPath = path
    this.ontology = undefined
    return this
  }

  withLogger(logger: Logger): this {
    this.options.logger = logger
    return this
  }

  withMaxCandidates(maxCandidates: number): this {
    this.options.maxCandidates = maxCandidates
    return this
  }

  withCollisionThreshold(threshold: number): this {
    this.options.collisionThreshold = threshold
    return this
  }

  /**
   * Build the engine. Without an ontology, the bundled payor ontology is
   * loaded.
   *
   * @throws {InvalidParameterError} If an option is out of range
   * @throws {OntologyError} If the ontology file cannot be loaded
   */
  build(): ModelingEngine {
    const resolved = mergeEngineOptions(this.options)
    const ontology =
      this.ontology ??
      (this.ontologyPath !== undefined
        ? loadOntology(this.ontologyPath)
        : loadDefaultOntology())

    resolved.logger.debug('Built modeling engine', {
      entities: ontology.entities.size,
      maxCandidates: resolved.maxCandidates,
      collisionThreshold: resolved.collisionThreshold,
    })

    return new ModelingEngine(ontology, resolved)
  }
}

/**
 * Main entry point for creating an engine with the fluent builder API.
 */
export const Schemawright = {
  create(): EngineBuilder {
    return new EngineBuilder()
  },
}
