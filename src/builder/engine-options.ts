/**
 * Configuration options for the matching and model-quality engine
 * @module builder/engine-options
 */

import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { requireInRange, requirePositiveInteger } from '../utils/errors.js'

export interface EngineOptions {
  /**
   * Maximum number of mapping candidates returned per attribute.
   * Default: 3
   */
  maxCandidates?: number

  /**
   * Minimum name similarity (0-1) for two attributes on different entities
   * to be reported as a collision.
   * Default: 0.9
   */
  collisionThreshold?: number

  /**
   * Logger for planner, analyzer and service diagnostics.
   * Default: silent
   */
  logger?: Logger
}

export type ResolvedEngineOptions = Required<EngineOptions>

export const DEFAULT_MAX_CANDIDATES = 3
export const DEFAULT_COLLISION_THRESHOLD = 0.9

/**
 * Merges user-provided engine options with defaults
 * @throws {InvalidParameterError} If a provided value is out of range
 */
export function mergeEngineOptions(options?: EngineOptions): ResolvedEngineOptions {
  const maxCandidates = options?.maxCandidates ?? DEFAULT_MAX_CANDIDATES
  const collisionThreshold =
    options?.collisionThreshold ?? DEFAULT_COLLISION_THRESHOLD

  return {
    maxCandidates: requirePositiveInteger(maxCandidates, 'maxCandidates'),
    collisionThreshold: requireInRange(collisionThreshold, 0, 1, 'collisionThreshold'),
    logger: options?.logger ?? createSilentLogger(),
  }
}
