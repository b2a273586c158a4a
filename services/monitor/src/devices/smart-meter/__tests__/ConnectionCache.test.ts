import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { ConnectionCache, parseCachedConnection } from '../ConnectionCache.js'
import type { Session } from '../types.js'
import { CACHED, RecordingSink } from './fakeAdapter.js'

describe('ConnectionCache', () => {
    let dir: string
    let file: string
    let sink: RecordingSink

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'broute-cache-'))
        file = path.join(dir, 'nested', 'wisun_cache.json')
        sink = new RecordingSink()
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('returns null when no file exists', async () => {
        const cache = new ConnectionCache(file, sink)
        await expect(cache.load()).resolves.toBeNull()
        expect(sink.events).toEqual([])
    })

    it('round-trips a saved session', async () => {
        const cache = new ConnectionCache(file, sink)
        const session: Session = { ...CACHED, establishedAt: '2024-05-01T00:00:00.000Z', fromCache: false }
        await cache.save(session)

        await expect(cache.load()).resolves.toEqual(CACHED)
        expect(JSON.parse(await readFile(file, 'utf8'))).toEqual(CACHED)
    })

    it('treats malformed files as absent', async () => {
        const cache = new ConnectionCache(file, sink)
        await cache.save(CACHED)
        await writeFile(file, '{not json', 'utf8')

        await expect(cache.load()).resolves.toBeNull()
        expect(sink.ofKind('cache-error').map((e) => e.operation)).toEqual(['read'])
    })

    it('deletes the record on clear', async () => {
        const cache = new ConnectionCache(file, sink)
        await cache.save(CACHED)
        await cache.clear()
        await cache.clear()

        await expect(cache.load()).resolves.toBeNull()
        expect(sink.events).toEqual([])
    })
})

describe('parseCachedConnection', () => {
    it('requires every field as a non-empty string', () => {
        expect(parseCachedConnection(CACHED)).toEqual(CACHED)
        expect(parseCachedConnection({ ...CACHED, panId: '' })).toBeNull()
        expect(parseCachedConnection({ ...CACHED, channel: 21 })).toBeNull()
        expect(parseCachedConnection(null)).toBeNull()
        expect(parseCachedConnection('x')).toBeNull()
    })
})
