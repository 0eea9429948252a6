/**
 * Relationship inference lifecycle rules
 * @module relationships/lifecycle
 */

import type { InferenceStatus } from '../types/relationship.js'
import { InvalidStatusTransitionError } from '../utils/errors.js'

/**
 * Status changes a reviewer may request. Machine refreshes are governed by
 * {@link refreshOutcome} instead.
 */
const REVIEW_TRANSITIONS: Record<InferenceStatus, readonly InferenceStatus[]> = {
  manual: ['approved', 'rejected'],
  pending: ['approved', 'rejected'],
  approved: ['rejected'],
  rejected: ['approved'],
}

/**
 * What fresh profiling evidence does to an existing relationship
 */
export type RefreshOutcome =
  | { action: 'skip'; reason: 'manual_without_evidence' }
  | { action: 'refresh'; status: InferenceStatus }

/**
 * Decides how an existing relationship reacts to new evidence:
 * - manual with no evidence: untouched
 * - manual that already carries evidence: back to pending
 * - rejected: revived to pending
 * - pending: stays pending
 * - approved: stays approved, evidence refreshed
 */
export function refreshOutcome(
  status: InferenceStatus,
  hasEvidence: boolean
): RefreshOutcome {
  switch (status) {
    case 'manual':
      return hasEvidence
        ? { action: 'refresh', status: 'pending' }
        : { action: 'skip', reason: 'manual_without_evidence' }
    case 'rejected':
      return { action: 'refresh', status: 'pending' }
    case 'pending':
      return { action: 'refresh', status: 'pending' }
    case 'approved':
      return { action: 'refresh', status: 'approved' }
    default: {
      const unreachable: never = status
      return unreachable
    }
  }
}

/**
 * Validates a reviewer-requested status change
 * @throws {InvalidStatusTransitionError} If the transition is not allowed
 */
export function validateReviewTransition(
  from: InferenceStatus,
  to: InferenceStatus
): void {
  const allowed = REVIEW_TRANSITIONS[from]

  if (!allowed.includes(to)) {
    throw new InvalidStatusTransitionError(
      from,
      to,
      `allowed transitions: ${allowed.join(', ')}`
    )
  }
}
