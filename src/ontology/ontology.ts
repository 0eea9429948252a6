import type { OntologyDefinition, OntologyEntity } from './types.js'

function normalise(value: string): string {
  return value.trim().toLowerCase()
}

/**
 * Read-only knowledge base of canonical entity and attribute names.
 *
 * Built once at startup and passed by reference to the planner and the
 * coverage analyzer. Every lookup is case- and whitespace-insensitive.
 */
export class Ontology {
  readonly entities: ReadonlyMap<string, OntologyEntity>
  readonly semanticAliases: ReadonlyMap<string, readonly string[]>

  private readonly synonymIndex: ReadonlyMap<string, string>

  private constructor(
    entities: Map<string, OntologyEntity>,
    semanticAliases: Map<string, readonly string[]>
  ) {
    this.entities = entities
    this.semanticAliases = semanticAliases

    const index = new Map<string, string>()
    for (const [canonical, entity] of entities) {
      if (!index.has(canonical)) index.set(canonical, canonical)
      for (const synonym of entity.synonyms) {
        if (!index.has(synonym)) index.set(synonym, canonical)
      }
    }
    this.synonymIndex = index
    Object.freeze(this)
  }

  /**
   * Builds an ontology from its serialized definition. Entity order follows
   * the definition's key order.
   */
  static fromDefinition(definition: OntologyDefinition): Ontology {
    const entities = new Map<string, OntologyEntity>()
    for (const [name, raw] of Object.entries(definition.entities)) {
      const canonicalName = normalise(name)
      const preferredAttributes = new Map<string, ReadonlySet<string>>()
      for (const [attribute, synonyms] of Object.entries(raw.preferred_attributes ?? {})) {
        preferredAttributes.set(attribute.trim(), new Set(synonyms.map(normalise)))
      }
      entities.set(canonicalName, {
        canonicalName,
        synonyms: new Set((raw.synonyms ?? []).map(normalise)),
        preferredAttributes,
      })
    }

    const aliases = new Map<string, readonly string[]>()
    for (const [group, keywords] of Object.entries(definition.semantic_aliases ?? {})) {
      aliases.set(normalise(group), Object.freeze(keywords.map(normalise)))
    }

    return new Ontology(entities, aliases)
  }

  /**
   * Maps an entity name or synonym to its canonical name. Unknown names come
   * back normalised (trimmed, lower-cased).
   *
   * @example
   * ```typescript
   * ontology.canonicalEntityName('Member')   // 'beneficiary'
   * ontology.canonicalEntityName(' Orders ') // 'orders'
   * ```
   */
  canonicalEntityName(name: string): string {
    const candidate = normalise(name)
    return this.synonymIndex.get(candidate) ?? candidate
  }

  entity(canonicalName: string): OntologyEntity | undefined {
    return this.entities.get(normalise(canonicalName))
  }

  hasEntity(canonicalName: string): boolean {
    return this.entities.has(normalise(canonicalName))
  }

  /**
   * Returns the preferred attribute name when `attrName` is that name or
   * one of its synonyms for the given canonical entity, else null.
   */
  suggestPreferredAttribute(entityCanon: string, attrName: string): string | null {
    if (!attrName) return null

    const entity = this.entity(entityCanon)
    if (!entity) return null

    const candidate = normalise(attrName)
    for (const [preferred, synonyms] of entity.preferredAttributes) {
      if (candidate === normalise(preferred) || synonyms.has(candidate)) {
        return preferred
      }
    }
    return null
  }

  /**
   * Semantic alias groups a column name falls into. A keyword starting with
   * `*` matches as a suffix (`*_id`); any other keyword matches as a
   * substring.
   */
  semanticGroups(columnName: string): string[] {
    const column = normalise(columnName)
    if (!column) return []

    const groups: string[] = []
    for (const [group, keywords] of this.semanticAliases) {
      const hit = keywords.some((keyword) =>
        keyword.startsWith('*')
          ? column.endsWith(keyword.slice(1))
          : column.includes(keyword)
      )
      if (hit) groups.push(group)
    }
    return groups
  }
}
