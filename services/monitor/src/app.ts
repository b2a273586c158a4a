import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@broute-monitor/logging'

import type { MonitorConfig } from './config/monitor.config.js'
import type { MeterDataSource } from './devices/smart-meter/types.js'
import meterPlugin from './plugins/meter.js'
import wsPlugin from './plugins/ws.js'
import powerRoutes from './routes/power.js'

export const APP_NAME = 'broute-monitor'
export const APP_VERSION = '0.1.0'

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    /** Replaces the data source the config would build (tests). */
    source?: MeterDataSource
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

export function buildApp(config: MonitorConfig, opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('monitor', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    // CORS
    void app.register(cors, { origin: true })

    // Data source, live stream, REST
    void app.register(meterPlugin, { config, source: opts.source })
    void app.register(wsPlugin, { statusIntervalMs: config.api.statusIntervalMs })
    void app.register(powerRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return
        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)
        if (REQUEST_VERBOSE) logReq.debug('request detail', { id: req.id, ip: req.ip })
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)
        logReq.debug(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))
    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    app.setNotFoundHandler((_req, reply) => {
        reply.status(404).send({ error: 'Not found' })
    })

    logApp.info(`app built mode=${config.mockMode ? 'mock' : 'live'}`)
    return app
}
