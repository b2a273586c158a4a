import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { CommandTransport } from '../../wisun-adapter/CommandTransport.js'
import { JoinFailureError } from '../errors.js'
import { JoinEngine } from '../JoinEngine.js'
import {
    CACHED,
    FakeMeterAdapter,
    METER_ADDR,
    METER_MAC,
    MemoryStore,
    RecordingSink,
    flush,
    step,
    testConfig,
    useTestTimers,
} from './fakeAdapter.js'

describe('JoinEngine', () => {
    let adapter: FakeMeterAdapter
    let transport: CommandTransport
    let sink: RecordingSink

    beforeEach(async () => {
        adapter = new FakeMeterAdapter()
        transport = new CommandTransport(adapter.port, { commandTimeoutMs: 1_000 })
        await transport.open()
        sink = new RecordingSink()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    function engine(store: MemoryStore): JoinEngine {
        return new JoinEngine(testConfig(), { transport, cache: store, events: sink })
    }

    it('scans, resolves the address and joins without a cached session', async () => {
        const store = new MemoryStore()
        const join = engine(store)

        const session = await join.attempt()

        expect(adapter.port.commands).toEqual([
            'SKVER',
            `SKSETRBID ${'0'.repeat(32)}`,
            'SKSETPWD C TESTPASSWORD',
            'SKSREG SA2 1',
            'SKSCAN 2 FFFFFFFF 4 0',
            `SKLL64 ${METER_MAC}`,
            'SKSREG S2 21',
            'SKSREG S3 8888',
            `SKJOIN ${METER_ADDR}`,
            'SKINFO',
        ])
        expect(session).toMatchObject({
            channel: '21',
            panId: '8888',
            macAddress: METER_MAC,
            linkLocalAddress: METER_ADDR,
            fromCache: false,
        })
        expect(Object.isFrozen(session)).toBe(true)
        expect(store.value).toEqual(CACHED)

        expect(sink.ofKind('join-state').map((e) => e.state)).toEqual([
            'idle',
            'credentials-set',
            'scanning',
            'scanned',
            'joining',
            'joined',
        ])
        expect(sink.ofKind('join-scan-result')).toMatchObject([{ duration: 4, found: 1 }])
        expect(join.getFirmwareVersion()).toBe('1.5.2')
        expect(join.getAdapterInfo()).toMatchObject({ channel: '21', panId: '8888', shortAddress: 'FFFE' })
    })

    it('skips the scan when a cached session exists', async () => {
        const join = engine(new MemoryStore(CACHED))

        const session = await join.attempt()

        expect(adapter.scans).toBe(0)
        expect(session.fromCache).toBe(true)
        expect(sink.ofKind('join-state').map((e) => e.state)).toEqual(['idle', 'credentials-set', 'joining', 'joined'])
    })

    it('discards the cache after two failed fast-path joins and scans on the next attempt', async () => {
        const store = new MemoryStore(CACHED)
        const join = engine(store)
        adapter.joinOutcome = 'reject'

        await expect(join.attempt()).rejects.toMatchObject({ reason: 'auth-rejected' })
        expect(store.cleared).toBe(0)

        await expect(join.attempt({ reset: true })).rejects.toMatchObject({ reason: 'auth-rejected' })
        expect(store.cleared).toBe(1)
        expect(sink.ofKind('cache-invalidated')).toHaveLength(1)
        expect(join.getLastError()?.code).toBe('cache-invalid')
        expect(adapter.scans).toBe(0)

        adapter.joinOutcome = 'accept'
        const session = await join.attempt({ reset: true })

        expect(adapter.scans).toBe(1)
        expect(session.fromCache).toBe(false)
        expect(store.value).toEqual(CACHED)
    })

    it('terminates and resets the adapter before a retry', async () => {
        const join = engine(new MemoryStore(CACHED))

        await join.attempt({ reset: true })

        expect(adapter.port.commands.slice(0, 3)).toEqual(['SKTERM', 'SKRESET', 'SKVER'])
    })

    it('escalates the scan duration and gives up when no meter answers', async () => {
        adapter.meterVisible = false
        const join = engine(new MemoryStore())

        const err = await join.attempt().catch((e: unknown) => e)

        expect(err).toBeInstanceOf(JoinFailureError)
        expect(err).toMatchObject({ reason: 'no-meter-found' })
        expect(sink.ofKind('join-scan-result').map((e) => e.duration)).toEqual([4, 8, 8, 8])
        expect(join.getState()).toBe('failed')
    })

    it('reports an unresponsive adapter', async () => {
        adapter.port.responder = () => ['FAIL ER04']
        const join = engine(new MemoryStore())

        await expect(join.attempt()).rejects.toMatchObject({ reason: 'adapter-unresponsive' })
    })

    it('times out when the meter never answers PANA', async () => {
        useTestTimers()
        adapter.joinOutcome = 'silent'
        const join = engine(new MemoryStore(CACHED))

        const pending = join.attempt()
        const assertion = expect(pending).rejects.toMatchObject({ reason: 'auth-timeout' })
        await flush()

        await step(2_000)
        await assertion
    })

    it('gives up after the attempt budget', async () => {
        useTestTimers()
        adapter.joinOutcome = 'reject'
        const join = engine(new MemoryStore())

        const pending = join.connect()
        const assertion = expect(pending).rejects.toMatchObject({ reason: 'retries-exhausted' })
        await flush()

        await step(1_000)
        await step(1_000)
        await assertion

        expect(adapter.joins).toHaveLength(3)
        expect(sink.ofKind('join-attempt-failed').map((e) => e.attempt)).toEqual([1, 2, 3])
        expect(join.getState()).toBe('failed')
    })

    it('stops retrying when aborted', async () => {
        useTestTimers()
        adapter.joinOutcome = 'reject'
        const join = engine(new MemoryStore())
        const ac = new AbortController()

        const pending = join.connect(ac.signal)
        const assertion = expect(pending).rejects.toMatchObject({ code: 'aborted' })
        await flush()

        ac.abort()
        await flush()
        await assertion
        expect(adapter.joins).toHaveLength(1)
    })
})
