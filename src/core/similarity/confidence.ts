import type { ColumnStats, LogicalAttribute } from '../../types/source.js'
import type { ComponentScores } from '../../types/mapping.js'
import { nameSimilarity, clamp01 } from './name.js'
import { dtypeCompatScore } from './dtype.js'
import { semanticHintScore } from './semantic.js'
import { columnEvidenceScore } from './evidence.js'

/**
 * Fixed blend of the four matching signals. These weights are part of the
 * scoring contract: they are not tuned or learned, and results are only
 * comparable across runs because they never change.
 */
export const CONFIDENCE_WEIGHTS: Readonly<ComponentScores> = Object.freeze({
  name: 0.5,
  dtype: 0.2,
  semantic: 0.2,
  evidence: 0.1,
})

/**
 * Computes every component score for one attribute/column pair.
 * The semantic signal reads the attribute's semantic type, falling back to
 * its name.
 */
export function componentScores(
  attr: LogicalAttribute,
  columnName: string,
  colDtype: string | undefined,
  stats: ColumnStats | undefined
): ComponentScores {
  const semanticSource = attr.semanticType || attr.name
  return {
    name: nameSimilarity(attr.name, columnName),
    dtype: dtypeCompatScore(attr.datatype, colDtype),
    semantic: semanticHintScore(semanticSource, columnName),
    evidence: columnEvidenceScore(columnName, stats),
  }
}

/**
 * Applies {@link CONFIDENCE_WEIGHTS} to a set of component scores.
 */
export function blendScores(scores: ComponentScores): number {
  const combined =
    CONFIDENCE_WEIGHTS.name * scores.name +
    CONFIDENCE_WEIGHTS.dtype * scores.dtype +
    CONFIDENCE_WEIGHTS.semantic * scores.semantic +
    CONFIDENCE_WEIGHTS.evidence * scores.evidence
  return clamp01(combined)
}

/**
 * Confidence that `columnName` is the source of `attr`:
 * `0.5·name + 0.2·dtype + 0.2·semantic + 0.1·evidence`, clamped to [0, 1].
 */
export function candidateConfidence(
  attr: LogicalAttribute,
  columnName: string,
  colDtype: string | undefined,
  stats: ColumnStats | undefined
): number {
  return blendScores(componentScores(attr, columnName, colDtype, stats))
}
