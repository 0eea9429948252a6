/**
 * Ontology definition types
 * @module ontology/types
 */

/**
 * A canonical entity with its synonyms and preferred attributes.
 * Keys of `preferredAttributes` are canonical attribute names; values are
 * the synonyms that should be renamed to them.
 */
export interface OntologyEntity {
  readonly canonicalName: string
  readonly synonyms: ReadonlySet<string>
  readonly preferredAttributes: ReadonlyMap<string, ReadonlySet<string>>
}

/**
 * Serialized form of an ontology, as stored in the JSON artifact
 */
export interface OntologyDefinition {
  entities: Record<
    string,
    {
      synonyms?: string[]
      preferred_attributes?: Record<string, string[]>
    }
  >
  semantic_aliases?: Record<string, string[]>
}
