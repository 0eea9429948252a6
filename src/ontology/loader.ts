/**
 * Loading and validation of ontology artifacts
 * @module ontology/loader
 */

import { existsSync, readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { OntologyError } from '../utils/errors.js'
import { isPlainObject } from '../core/input/coercion.js'
import { Ontology } from './ontology.js'
import type { OntologyDefinition } from './types.js'

/**
 * Location of the bundled healthcare-payor ontology. Resolves to the
 * repository's `ontology/` directory from both `src/` and `dist/`.
 */
export const DEFAULT_ONTOLOGY_PATH = fileURLToPath(
  new URL('../../ontology/payor-ontology.json', import.meta.url)
)

function requireStringArray(value: unknown, path: string, source: string): string[] {
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    throw new OntologyError(`${path} must be an array of strings`, source, { path })
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new OntologyError(`${path}[${index}] must be a string`, source, { path })
    }
    return item
  })
}

/**
 * Validates a parsed ontology document and returns its typed definition
 * @throws {OntologyError} If the document does not have the expected shape
 */
export function parseOntologyDefinition(
  raw: unknown,
  source = '<inline>'
): OntologyDefinition {
  if (!isPlainObject(raw)) {
    throw new OntologyError('Ontology must be a JSON object', source)
  }
  if (!isPlainObject(raw.entities)) {
    throw new OntologyError("Ontology 'entities' must be an object", source)
  }

  const entities: OntologyDefinition['entities'] = {}
  for (const [name, entry] of Object.entries(raw.entities)) {
    if (!name.trim()) {
      throw new OntologyError('Ontology entity names must not be blank', source)
    }
    if (!isPlainObject(entry)) {
      throw new OntologyError(`Ontology entity '${name}' must be an object`, source)
    }

    const preferred: Record<string, string[]> = {}
    const rawPreferred = entry.preferred_attributes ?? {}
    if (!isPlainObject(rawPreferred)) {
      throw new OntologyError(
        `entities.${name}.preferred_attributes must be an object`,
        source
      )
    }
    for (const [attribute, synonyms] of Object.entries(rawPreferred)) {
      preferred[attribute] = requireStringArray(
        synonyms,
        `entities.${name}.preferred_attributes.${attribute}`,
        source
      )
    }

    entities[name] = {
      synonyms: requireStringArray(entry.synonyms, `entities.${name}.synonyms`, source),
      preferred_attributes: preferred,
    }
  }

  const semanticAliases: Record<string, string[]> = {}
  const rawAliases = raw.semantic_aliases ?? {}
  if (!isPlainObject(rawAliases)) {
    throw new OntologyError("Ontology 'semantic_aliases' must be an object", source)
  }
  for (const [group, keywords] of Object.entries(rawAliases)) {
    semanticAliases[group] = requireStringArray(
      keywords,
      `semantic_aliases.${group}`,
      source
    )
  }

  return { entities, semantic_aliases: semanticAliases }
}

/**
 * Reads an ontology JSON file from disk
 * @throws {OntologyError} If the file is missing, is not JSON, or is malformed
 */
export function loadOntology(path: string): Ontology {
  if (!existsSync(path)) {
    throw new OntologyError(`Ontology file not found: ${path}`, path)
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    throw new OntologyError(`Ontology file is not valid JSON: ${path}`, path, {
      error: error instanceof Error ? error.message : String(error),
    })
  }

  return Ontology.fromDefinition(parseOntologyDefinition(raw, path))
}

/**
 * Reads the bundled healthcare-payor ontology
 */
export function loadDefaultOntology(): Ontology {
  return loadOntology(DEFAULT_ONTOLOGY_PATH)
}
