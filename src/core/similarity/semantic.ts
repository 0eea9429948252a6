/**
 * Semantic keys and the keywords that signal them in a semantic type or
 * column name.
 */
export const SEMANTIC_HINTS: Readonly<Record<string, readonly string[]>> = {
  id: ['id', 'identifier', 'key'],
  dob: ['dob', 'birth', 'birthdate', 'birth_date', 'date_of_birth'],
  gender: ['gender', 'sex'],
  npi: ['npi'],
  icd: ['icd'],
  cpt: ['cpt'],
  ndc: ['ndc'],
}

/**
 * Scores keyword alignment between a semantic type and a column name.
 *
 * For every semantic key whose aliases occur in the semantic type:
 * 1 if the column name contains the key or an alias, 0.75 if it starts with
 * the key, otherwise 0.5. The best key wins; 0 when no key applies.
 */
export function semanticHintScore(
  semanticType: string | null | undefined,
  columnName: string | null | undefined
): number {
  if (!semanticType || !columnName) return 0

  const semantic = semanticType.trim().toLowerCase()
  const column = columnName.trim().toLowerCase()
  if (!semantic || !column) return 0

  let score = 0
  for (const [key, aliases] of Object.entries(SEMANTIC_HINTS)) {
    if (!aliases.some((alias) => semantic.includes(alias))) continue

    if (column.includes(key) || aliases.some((alias) => column.includes(alias))) {
      score = Math.max(score, 1)
    } else if (column.startsWith(key)) {
      score = Math.max(score, 0.75)
    } else {
      score = Math.max(score, 0.5)
    }
  }

  return score
}
