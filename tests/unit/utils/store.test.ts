import { describe, it, expect } from 'vitest'
import { callStore } from '../../../src/utils/store.js'
import { MappingNotFoundError, StoreOperationError } from '../../../src/utils/errors.js'

describe('callStore', () => {
  it('returns the result', async () => {
    expect(await callStore('read', async () => 5)).toBe(5)
  })

  it('wraps foreign errors', async () => {
    await expect(
      callStore('read', async () => {
        throw new Error('socket closed')
      })
    ).rejects.toThrow(StoreOperationError)
  })

  it('wraps thrown non-errors', async () => {
    await expect(
      callStore('read', async () => {
        throw 'boom'
      })
    ).rejects.toThrow("Store operation 'read' failed: boom")
  })

  it('rethrows library errors unchanged', async () => {
    const error = new MappingNotFoundError('m1')
    await expect(
      callStore('read', async () => {
        throw error
      })
    ).rejects.toBe(error)
  })
})
