import { describe, it, expect, beforeEach } from 'vitest'
import { InMemorySessionStore } from '../../storage/in-memory-session-store'

describe('InMemorySessionStore', () => {
  let now: number
  let store: InMemorySessionStore

  beforeEach(() => {
    now = 1_000
    let n = 0
    store = new InMemorySessionStore({ now: () => now, generateId: () => `s-${++n}` })
  })

  describe('sessions', () => {
    it('creates sessions with generated ids', async () => {
      expect(await store.create({ behavior: 'release' })).toBe('s-1')
      expect(await store.create({ behavior: 'delete', ttl: 10 })).toBe('s-2')
      expect(store.sessionCount).toBe(2)
    })

    it('expires a ttl session unless renewed', async () => {
      const sessionId = await store.create({ behavior: 'release', ttl: 10 })

      now += 9_000
      expect(await store.renew(sessionId)).toBe(true)

      now += 9_999
      expect(store.sessionCount).toBe(1)

      now += 1
      expect(await store.renew(sessionId)).toBe(false)
      expect(store.sessionCount).toBe(0)
    })

    it('keeps sessions without ttl alive', async () => {
      const sessionId = await store.create({ behavior: 'release' })

      now += 86_400_000
      expect(await store.renew(sessionId)).toBe(true)
    })

    it('reports whether destroy removed a session', async () => {
      const sessionId = await store.create({ behavior: 'release' })

      expect(await store.destroy(sessionId)).toBe(true)
      expect(await store.destroy(sessionId)).toBe(false)
      expect(await store.renew(sessionId)).toBe(false)
    })
  })

  describe('conditional writes', () => {
    it('lets only one session acquire a key', async () => {
      const a = await store.create({ behavior: 'release' })
      const b = await store.create({ behavior: 'release' })

      expect(await store.put('locks/job', 'a', { acquire: a })).toBe(true)
      expect(await store.put('locks/job', 'b', { acquire: b })).toBe(false)
      expect(store.holderOf('locks/job')).toBe(a)
      expect(store.valueOf('locks/job')).toBe('a')
    })

    it('lets the holder acquire again', async () => {
      const a = await store.create({ behavior: 'release' })

      await store.put('locks/job', 'first', { acquire: a })
      expect(await store.put('locks/job', 'second', { acquire: a })).toBe(true)
      expect(store.valueOf('locks/job')).toBe('second')
    })

    it('rejects acquire for an unknown session', async () => {
      expect(await store.put('locks/job', undefined, { acquire: 'missing' })).toBe(false)
      expect(store.hasKey('locks/job')).toBe(false)
    })

    it('releases only for the holder', async () => {
      const a = await store.create({ behavior: 'release' })
      const b = await store.create({ behavior: 'release' })
      await store.put('locks/job', 'a', { acquire: a })

      expect(await store.put('locks/job', undefined, { release: b })).toBe(false)
      expect(await store.put('locks/job', undefined, { release: a })).toBe(true)
      expect(store.hasKey('locks/job')).toBe(true)
      expect(store.holderOf('locks/job')).toBeUndefined()

      expect(await store.put('locks/job', 'b', { acquire: b })).toBe(true)
    })

    it('deletes keys outright', async () => {
      const a = await store.create({ behavior: 'release' })
      await store.put('locks/job', 'a', { acquire: a })

      expect(await store.delete('locks/job')).toBe(true)
      expect(await store.delete('locks/job')).toBe(false)
      expect(store.hasKey('locks/job')).toBe(false)
    })
  })

  describe('session behavior', () => {
    it('frees keys of an expired release session', async () => {
      const a = await store.create({ behavior: 'release', ttl: 10 })
      const b = await store.create({ behavior: 'release' })
      await store.put('locks/job', 'a', { acquire: a })

      now += 10_000

      expect(store.hasKey('locks/job')).toBe(true)
      expect(store.holderOf('locks/job')).toBeUndefined()
      expect(await store.put('locks/job', 'b', { acquire: b })).toBe(true)
    })

    it('removes keys of an expired delete session', async () => {
      const a = await store.create({ behavior: 'delete', ttl: 10 })
      await store.put('locks/job', 'a', { acquire: a })

      now += 10_000

      expect(store.hasKey('locks/job')).toBe(false)
    })

    it('applies the behavior on destroy', async () => {
      const a = await store.create({ behavior: 'delete' })
      const b = await store.create({ behavior: 'release' })
      await store.put('locks/a', 'a', { acquire: a })
      await store.put('locks/b', 'b', { acquire: b })

      await store.destroy(a)
      await store.destroy(b)

      expect(store.hasKey('locks/a')).toBe(false)
      expect(store.hasKey('locks/b')).toBe(true)
      expect(store.holderOf('locks/b')).toBeUndefined()
    })
  })
})
