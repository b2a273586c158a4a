// services/monitor/src/plugins/ws.ts

import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import { createLogger, LogChannel } from '@broute-monitor/logging'

import type { MeterReading } from '../devices/smart-meter/types.js'

declare module 'fastify' {
    interface FastifyInstance {
        powerClients: () => number
    }
}

export interface WsPluginOptions {
    statusIntervalMs: number
}

// 💓 heartbeat logging toggle
const HB_LOG = String(process.env.WS_HEARTBEAT_LOG ?? 'false').toLowerCase() === 'true'

function isPing(raw: RawData): boolean {
    const text = raw.toString().trim()
    if (text === 'ping') return true
    try {
        const msg: unknown = JSON.parse(text)
        return typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === 'ping'
    } catch {
        return false
    }
}

const wsPlugin: FastifyPluginAsync<WsPluginOptions> = async (app: FastifyInstance, opts) => {
    const { channel } = createLogger('monitor:ws', app.clientBuf)
    const logWs = channel(LogChannel.websocket)

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true,
        },
    })

    const sockets = new Set<WSSocket>()

    const send = (ws: WSSocket, payload: string): void => {
        try {
            if (ws.readyState === ws.OPEN) ws.send(payload)
        } catch (e) {
            logWs.debug('send failed', { err: e instanceof Error ? e.message : String(e) })
        }
    }

    const broadcast = (payload: string): void => {
        for (const ws of sockets) send(ws, payload)
    }

    const statusFrame = (): string =>
        JSON.stringify({ type: 'status', data: app.meter.connectionStatus() })

    // Readings -> every connected client
    const unsubscribe = app.meter.onReading((reading: MeterReading) => {
        if (sockets.size === 0) return
        broadcast(JSON.stringify(reading))
    })

    let statusTimer: NodeJS.Timeout | null = null

    app.decorate('powerClients', () => sockets.size)

    app.get('/ws/power', { websocket: true }, (socket: WSSocket) => {
        sockets.add(socket)
        logWs.info(`client connected clients=${sockets.size}`)

        const latest = app.meter.latestInstantReading()
        if (latest) send(socket, JSON.stringify({ type: 'instant', data: latest }))
        send(socket, statusFrame())

        if (!statusTimer) {
            statusTimer = setInterval(() => {
                if (sockets.size > 0) broadcast(statusFrame())
            }, opts.statusIntervalMs)
        }

        socket.on('message', (raw: RawData) => {
            if (!isPing(raw)) return
            if (HB_LOG) logWs.debug('ping')
            send(socket, JSON.stringify({ type: 'pong' }))
        })

        socket.on('close', () => {
            sockets.delete(socket)
            logWs.info(`client disconnected clients=${sockets.size}`)
            if (sockets.size === 0 && statusTimer) {
                clearInterval(statusTimer)
                statusTimer = null
            }
        })

        socket.on('error', (err: Error) => {
            logWs.warn('socket error', { err: err.message })
        })
    })

    app.addHook('onClose', async () => {
        unsubscribe()
        if (statusTimer) clearInterval(statusTimer)
        statusTimer = null
        for (const ws of sockets) {
            try {
                ws.close(1001, 'server shutting down')
            } catch (e) {
                logWs.debug('close failed', { err: e instanceof Error ? e.message : String(e) })
            }
        }
        sockets.clear()
    })
}

export default fp(wsPlugin, { name: 'ws-plugin', dependencies: ['meter-plugin'] })
