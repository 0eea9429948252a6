/**
 * Options for token-sort name comparison.
 */
export interface TokenSortOptions {
  /** Whether comparison should be case-sensitive (default: false) */
  caseSensitive?: boolean
}

/**
 * Calculates the normalized Indel similarity between two strings.
 *
 * Indel distance counts the insertions and deletions needed to turn one
 * string into the other (a substitution costs 2). The similarity is
 * `1 - distance / (|a| + |b|)`, which equals `2 * LCS / (|a| + |b|)`.
 *
 * @example
 * ```typescript
 * indelSimilarity('claim_id', 'claim_id')    // 1.0
 * indelSimilarity('claim_id', 'claim id')    // 0.875
 * indelSimilarity('abc', 'xyz')              // 0.0
 * ```
 */
export function indelSimilarity(a: string, b: string): number {
  const lenSum = a.length + b.length
  if (lenSum === 0) return 1
  if (a === b) return 1

  return (2 * longestCommonSubsequence(a, b)) / lenSum
}

/**
 * Length of the longest common subsequence, two-row dynamic programming.
 * @internal
 */
function longestCommonSubsequence(a: string, b: string): number {
  let previous: number[] = new Array<number>(b.length + 1).fill(0)
  let current: number[] = new Array<number>(b.length + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1
      } else {
        current[j] = Math.max(previous[j], current[j - 1])
      }
    }
    const swap = previous
    previous = current
    current = swap
    current.fill(0)
  }

  return previous[b.length]
}

/**
 * Sorts the whitespace-separated tokens of a string and rejoins them with
 * single spaces.
 */
export function sortTokens(value: string): string {
  return value
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .sort()
    .join(' ')
}

/**
 * Token-sort ratio: Indel similarity after sorting each string's tokens, so
 * word order does not matter.
 *
 * @example
 * ```typescript
 * tokenSortRatio('member id', 'id member')           // 1.0
 * tokenSortRatio('Claim_Identifier', 'claim identifier') // 0.9375
 * ```
 */
export function tokenSortRatio(
  a: string,
  b: string,
  options: TokenSortOptions = {}
): number {
  const { caseSensitive = false } = options
  const left = sortTokens(caseSensitive ? a : a.toLowerCase())
  const right = sortTokens(caseSensitive ? b : b.toLowerCase())

  if (left.length === 0 || right.length === 0) return 0

  return indelSimilarity(left, right)
}

/**
 * Case-insensitive token-sort similarity between two attribute or column
 * names, in [0, 1]. Returns 0 if either name is empty. Symmetric.
 */
export function nameSimilarity(a: string | null | undefined, b: string | null | undefined): number {
  if (!a || !b) return 0
  return clamp01(tokenSortRatio(a, b))
}

/**
 * Clamps a score into [0, 1]; NaN becomes 0.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.min(1, Math.max(0, value))
}
