/**
 * AsyncDocumentTemplate tests
 */

import { beforeEach, describe, it, expect, vi } from 'vitest'
import {
  DelegateError,
  ErrorCode,
  MappingError,
  NonUniqueResultError,
  ValidationError,
} from '../../src/errors'
import { AsyncCollectionAdapter, MemoryCollectionManager } from '../../src/manager'
import { AsyncDocumentTemplate } from '../../src/template'
import { noopLogger, setLogger } from '../../src/utils'
import { Person, Unmapped, absent, person } from '../fixtures'

interface Outcome<R> {
  error: Error | null
  result: R | undefined
  calls: number
}

describe('AsyncDocumentTemplate', () => {
  let memory: MemoryCollectionManager
  let template: AsyncDocumentTemplate

  beforeEach(() => {
    memory = new MemoryCollectionManager({ idName: 'native_id' })
    template = new AsyncDocumentTemplate(new AsyncCollectionAdapter(memory))
  })

  /**
   * Resolve with the first callback delivery, then wait one more macrotask
   * so that a second delivery would be counted
   */
  function outcome<R>(start: (callback: (error: Error | null, result?: R) => void) => void): Promise<Outcome<R>> {
    return new Promise((resolve) => {
      const seen: Outcome<R> = { error: null, result: undefined, calls: 0 }
      start((error, result) => {
        seen.calls++
        if (seen.calls > 1) return
        seen.error = error
        seen.result = result
        setTimeout(() => resolve(seen), 0)
      })
    })
  }

  describe('promises', () => {
    it('inserts and returns the stored entity', async () => {
      const saved = await template.insert(person({ name: 'Ada' }))
      expect(saved).toBeInstanceOf(Person)
      expect(saved.id).toBe(1)
      expect(memory.count('Person')).toBe(1)
    })

    it('inserts batches in order', async () => {
      const saved = await template.insert([person({ name: 'Ada' }), person({ name: 'Grace' })], 60000)
      expect(saved.map((p) => [p.id, p.name])).toEqual([
        [1, 'Ada'],
        [2, 'Grace'],
      ])
    })

    it('updates entities', async () => {
      await template.insert(person({ id: 1, name: 'Ada' }))
      const [updated] = await template.update([person({ id: 1, name: 'Ada Lovelace' })])
      expect(updated?.name).toBe('Ada Lovelace')
      expect((await template.findById(Person, 1))?.name).toBe('Ada Lovelace')
    })

    it('finds, fetches single results and deletes', async () => {
      await template.insert([person({ id: 1, name: 'Ada', age: 36 }), person({ id: 2, name: 'Grace', age: 85 })])

      const adults = await template.find(Person, template.select(Person).where('age').gte(18).orderBy('age', 'desc').build())
      expect([...adults].map((p) => p.name)).toEqual(['Grace', 'Ada'])

      expect((await template.singleResult(Person, template.select(Person).where('name').eq('Ada').build()))?.id).toBe(1)
      expect(await template.singleResult(Person, template.select(Person).where('name').eq('Nobody').build())).toBeUndefined()
      await expect(template.singleResult(Person, template.select(Person).build())).rejects.toThrow(NonUniqueResultError)

      await template.delete(template.deleteFrom(Person).where('age').gt(80).build())
      await template.deleteById(Person, '1')
      expect(memory.count('Person')).toBe(0)
    })

    it('rejects with DelegateError when the manager fails', async () => {
      await expect(template.update(person({ id: 9 }))).rejects.toThrow(
        "Collection manager failed during update: Record with id number:9 not found in 'Person'"
      )
      await expect(template.update(person({ id: 9 }))).rejects.toBeInstanceOf(DelegateError)
    })

    it('stops a batch at the first manager failure', async () => {
      await template.insert(person({ id: 2 }))
      await expect(template.insert([person({ id: 1 }), person({ id: 2 }), person({ id: 3 })])).rejects.toMatchObject({
        code: ErrorCode.DELEGATE_FAILED,
      })
      expect(memory.count('Person')).toBe(2)
    })

    it('rejects when a post hook fails', async () => {
      template.hooks.on('post', 'insert', () => {
        throw new Error('audit offline')
      })
      await expect(template.insert(person({ id: 1 }))).rejects.toMatchObject({
        message: 'Post-insert hook failed: audit offline',
        code: ErrorCode.HOOK_FAILED,
      })
      expect(memory.count('Person')).toBe(1)
    })
  })

  describe('synchronous failures', () => {
    it('throws validation failures before returning', () => {
      expect(() => template.insert(absent<Person>(null))).toThrow(ValidationError)
      expect(() => template.insert(person({ id: 1 }), -1)).toThrow(
        'Time-to-live must be a positive number of milliseconds, got -1'
      )
    })

    it('throws mapping failures before returning', () => {
      expect(() => template.insert(new Unmapped())).toThrow(MappingError)
      expect(() => template.select(Person).where('nmae')).toThrow(MappingError)
    })

    it('validates a whole batch before storing any of it', () => {
      expect(() => template.insert([person({ id: 1 }), absent<Person>(null)])).toThrow(
        'insert requires an entity, got null'
      )
      expect(() => template.update([person({ id: 1 }), new Unmapped()])).toThrow(MappingError)
      expect(memory.count('Person')).toBe(0)
    })

    it('rejects with pre hook failures', async () => {
      template.hooks.on('pre', 'insert', () => {
        throw new Error('read-only')
      })
      const pending = template.insert(person({ id: 1 }))
      await expect(pending).rejects.toThrow('Pre-insert hook failed: read-only')
      await expect(pending).rejects.toMatchObject({ code: ErrorCode.HOOK_FAILED })
      expect(memory.count('Person')).toBe(0)
    })

    it('throws for missing queries', () => {
      expect(() => template.delete(absent<{ collection: string }>(null))).toThrow('delete requires a query, got null')
    })
  })

  describe('callbacks', () => {
    it('delivers the result once', async () => {
      const seen = await outcome<Person>((callback) => template.insert(person({ name: 'Ada' }), undefined, callback))
      expect(seen.calls).toBe(1)
      expect(seen.error).toBeNull()
      expect(seen.result?.id).toBe(1)
    })

    it('delivers batch results', async () => {
      const seen = await outcome<Person[]>((callback) =>
        template.update([person({ id: 1 })], callback)
      )
      expect(seen.calls).toBe(1)
      expect(seen.error).toBeInstanceOf(DelegateError)
      expect(seen.result).toBeUndefined()
    })

    it('delivers pre hook failures to the callback', async () => {
      template.hooks.on('pre', 'insert', () => {
        throw new Error('read-only')
      })
      template.hooks.on('pre', 'select', () => {
        throw new Error('no reads')
      })

      const single = await outcome<Person>((callback) => template.insert(person({ id: 1 }), undefined, callback))
      expect(single.calls).toBe(1)
      expect(single.error).toBeInstanceOf(DelegateError)
      expect(single.error?.message).toBe('Pre-insert hook failed: read-only')

      const batch = await outcome<Person[]>((callback) => template.insert([person({ id: 1 })], undefined, callback))
      expect(batch.calls).toBe(1)
      expect(batch.error?.message).toBe('Pre-insert hook failed: read-only')

      const found = await outcome<IterableIterator<Person>>((callback) =>
        template.find(Person, template.select(Person).build(), callback)
      )
      expect(found.calls).toBe(1)
      expect(found.error?.message).toBe('Pre-select hook failed: no reads')
      expect(memory.count('Person')).toBe(0)
    })

    it('delivers failures as the first argument', async () => {
      const seen = await outcome<Person>((callback) => template.update(person({ id: 9 }), callback))
      expect(seen.calls).toBe(1)
      expect(seen.error).toBeInstanceOf(DelegateError)
      expect(seen.error?.message).toBe(
        "Collection manager failed during update: Record with id number:9 not found in 'Person'"
      )
    })

    it('delivers query results', async () => {
      await template.insert(person({ id: 1, name: 'Ada' }))

      const found = await outcome<IterableIterator<Person>>((callback) =>
        template.find(Person, template.select(Person).build(), callback)
      )
      expect([...(found.result ?? [])].map((p) => p.name)).toEqual(['Ada'])

      const single = await outcome<Person | undefined>((callback) =>
        template.singleResult(Person, template.select(Person).where('id').eq(1).build(), callback)
      )
      expect(single.result?.name).toBe('Ada')

      const removed = await outcome<void>((callback) =>
        template.delete(template.deleteFrom(Person).build(), callback)
      )
      expect(removed).toEqual({ error: null, result: undefined, calls: 1 })
      expect(memory.count('Person')).toBe(0)
    })

    it('reports callbacks that throw without calling them again', async () => {
      const errors: string[] = []
      setLogger({ ...noopLogger, error: (message) => errors.push(message) })
      const onCallbackError = vi.fn()
      const failing = new AsyncDocumentTemplate(new AsyncCollectionAdapter(memory), { onCallbackError })
      const callback = vi.fn(() => {
        throw new Error('consumer bug')
      })

      failing.insert(person({ id: 1 }), undefined, callback)
      await vi.waitFor(() => expect(onCallbackError).toHaveBeenCalledTimes(1))

      expect(callback).toHaveBeenCalledTimes(1)
      expect(onCallbackError).toHaveBeenCalledWith(new Error('consumer bug'), { operation: 'insert' })
      expect(errors).toEqual(['[AsyncDocumentTemplate] Callback error (context: operation=insert): consumer bug'])
    })

    it('reports callbacks that reject', async () => {
      const onCallbackError = vi.fn()
      const failing = new AsyncDocumentTemplate(new AsyncCollectionAdapter(memory), { onCallbackError })

      failing.update(person({ id: 9 }), async () => {
        throw new Error('late failure')
      })
      await vi.waitFor(() => expect(onCallbackError).toHaveBeenCalledTimes(1))
      expect(onCallbackError).toHaveBeenCalledWith(new Error('late failure'), { operation: 'update' })
    })
  })
})
