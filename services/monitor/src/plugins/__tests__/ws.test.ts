import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { FastifyInstance } from 'fastify'
import WebSocket from 'ws'
import { makeClientBuffer } from '@broute-monitor/logging'

import { buildApp } from '../../app.js'
import { buildMonitorConfigFromEnv } from '../../config/monitor.config.js'
import { StubSource, instant } from '../../routes/__tests__/stubSource.js'

/** WebSocket client that records every JSON frame it receives. */
class FrameClient {
    readonly frames: unknown[] = []
    private waiters: Array<{ count: number; resolve: () => void }> = []

    constructor(readonly ws: WebSocket) {
        ws.on('message', (raw: WebSocket.RawData) => {
            this.frames.push(JSON.parse(raw.toString()))
            this.waiters = this.waiters.filter((w) => {
                if (this.frames.length < w.count) return true
                w.resolve()
                return false
            })
        })
    }

    /** Resolves once `count` frames have arrived in total. */
    waitFor(count: number): Promise<unknown[]> {
        if (this.frames.length >= count) return Promise.resolve(this.frames)
        return new Promise<unknown[]>((resolve) => {
            this.waiters.push({ count, resolve: () => resolve(this.frames) })
        })
    }
}

describe('/ws/power', () => {
    let source: StubSource
    let app: FastifyInstance
    let url: string
    const clients: FrameClient[] = []

    beforeEach(async () => {
        // Only the status cycle is faked; sockets keep their real timers.
        vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] })

        source = new StubSource()
        app = buildApp(buildMonitorConfigFromEnv({ MOCK_MODE: 'true' }, []), {
            source,
            clientBuf: makeClientBuffer(50),
        })
        await app.listen({ host: '127.0.0.1', port: 0 })

        const addr = app.server.address()
        if (addr === null || typeof addr === 'string') throw new Error('server has no TCP address')
        url = `ws://127.0.0.1:${addr.port}/ws/power`
    })

    afterEach(async () => {
        for (const c of clients) c.ws.terminate()
        clients.length = 0
        await app.close()
        vi.useRealTimers()
    })

    function connect(): FrameClient {
        const client = new FrameClient(new WebSocket(url))
        clients.push(client)
        return client
    }

    it('sends only a status frame before the first reading', async () => {
        const client = connect()

        expect(await client.waitFor(1)).toEqual([{ type: 'status', data: source.status }])
    })

    it('sends the latest reading, then status, on connect', async () => {
        source.history = [instant(400, 0), instant(420, 1)]

        const client = connect()

        expect(await client.waitFor(2)).toEqual([
            { type: 'instant', data: instant(420, 1) },
            { type: 'status', data: source.status },
        ])
    })

    it('pushes every reading to every client', async () => {
        const a = connect()
        const b = connect()
        await a.waitFor(1)
        await b.waitFor(1)

        source.emit({ type: 'instant', data: instant(510, 5) })

        expect((await a.waitFor(2))[1]).toEqual({ type: 'instant', data: instant(510, 5) })
        expect((await b.waitFor(2))[1]).toEqual({ type: 'instant', data: instant(510, 5) })
    })

    it('answers text and JSON pings with pong and ignores other messages', async () => {
        const client = connect()
        await client.waitFor(1)

        client.ws.send('hello')
        client.ws.send('ping')
        client.ws.send(JSON.stringify({ type: 'ping' }))

        expect(await client.waitFor(3)).toEqual([
            { type: 'status', data: source.status },
            { type: 'pong' },
            { type: 'pong' },
        ])
    })

    it('broadcasts status frames on the status interval', async () => {
        const client = connect()
        await client.waitFor(1)

        source.status = { ...source.status, state: 'degraded', consecutiveFailures: 3 }
        vi.advanceTimersByTime(10_000)

        expect((await client.waitFor(2))[1]).toEqual({
            type: 'status',
            data: { ...source.status, state: 'degraded', consecutiveFailures: 3 },
        })
    })

    it('counts connected clients in /api/status', async () => {
        const client = connect()
        await client.waitFor(1)

        const res = await app.inject({ method: 'GET', url: '/api/status' })

        expect(res.json()).toMatchObject({ connectedClients: 1 })
    })
})
