import type { ComponentScores } from '../types/mapping.js'

interface Band {
  min: number
  label: string
}

/**
 * Score bands per signal, strongest first. A signal contributes the label
 * of the first band its score reaches, or nothing.
 */
const RATIONALE_BANDS: Record<keyof ComponentScores, readonly Band[]> = {
  name: [
    { min: 0.85, label: 'strong name match' },
    { min: 0.6, label: 'partial name similarity' },
  ],
  dtype: [
    { min: 0.85, label: 'compatible data type' },
    { min: 0.25, label: 'loosely compatible type' },
  ],
  semantic: [
    { min: 0.75, label: 'semantic keyword alignment' },
    { min: 0.5, label: 'possible semantic hint' },
  ],
  evidence: [
    { min: 0.5, label: 'good profiling coverage' },
    { min: 0.25, label: 'some statistical support' },
  ],
}

const SIGNAL_ORDER: readonly (keyof ComponentScores)[] = [
  'name',
  'dtype',
  'semantic',
  'evidence',
]

/**
 * Returns the band label for one signal's score, if any band fires
 */
export function bandLabel(
  signal: keyof ComponentScores,
  score: number
): string | undefined {
  return RATIONALE_BANDS[signal].find((band) => score >= band.min)?.label
}

/**
 * Builds a comma-separated rationale for a mapping candidate.
 *
 * @example
 * ```typescript
 * buildRationale('member_id', { name: 1, dtype: 1, semantic: 1, evidence: 0 })
 * // 'strong name match, compatible data type, semantic keyword alignment'
 * buildRationale('col_x', { name: 0.2, dtype: 0, semantic: 0, evidence: 0.1 })
 * // 'column col_x has limited supporting evidence'
 * ```
 */
export function buildRationale(columnName: string, scores: ComponentScores): string {
  const reasons: string[] = []
  for (const signal of SIGNAL_ORDER) {
    const label = bandLabel(signal, scores[signal])
    if (label) reasons.push(label)
  }

  if (reasons.length === 0) {
    return `column ${columnName} has limited supporting evidence`
  }
  return reasons.join(', ')
}
