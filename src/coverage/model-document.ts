import type { ModelDocument, ModelEntity } from '../types/coverage.js'
import { InvalidModelError } from '../utils/errors.js'
import { asArray, asRecord, asString, isPlainObject } from '../core/input/coercion.js'

function attributeName(value: unknown): string | undefined {
  const direct = asString(value)
  if (direct !== undefined) return direct
  return asString(asRecord(value)?.name)
}

/**
 * Parses a drafted model from a JSON string or an already-parsed value.
 *
 * The top level must be a JSON object; anything else raises. Inside it,
 * parsing is tolerant: entities without a name are skipped, and attributes
 * may be plain names or objects with a `name`.
 *
 * @throws {InvalidModelError} If the JSON does not parse or is not an object
 */
export function parseModelDocument(input: unknown): ModelDocument {
  let raw: unknown = input
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input)
    } catch (error) {
      throw new InvalidModelError('model JSON does not parse', {
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  if (!isPlainObject(raw)) {
    throw new InvalidModelError('model must be a JSON object', {
      received: Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw,
    })
  }

  const entities: ModelEntity[] = []
  for (const rawEntity of asArray(raw.entities)) {
    const entity = asRecord(rawEntity)
    const name = asString(entity?.name)?.trim()
    if (!entity || !name) continue

    const attributes = asArray(entity.attributes)
      .map(attributeName)
      .filter((attr): attr is string => attr !== undefined && attr.trim().length > 0)

    entities.push({ name, attributes })
  }

  return { entities }
}
