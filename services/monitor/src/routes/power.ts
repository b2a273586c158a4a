// services/monitor/src/routes/power.ts

import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import { createLogger, LogChannel } from '@broute-monitor/logging'

interface HistoryQuery {
    limit?: string
}

interface LogsQuery {
    n?: string
}

const LOGS_DEFAULT = 200

function parseLimit(raw: string | undefined): number {
    if (raw === undefined) return 0
    const n = Number.parseInt(raw, 10)
    return Number.isFinite(n) && n > 0 ? n : 0
}

/**
 * REST snapshot routes over the data source contract.
 */
export default fp(
    async function powerRoutes(app: FastifyInstance) {
        const { channel } = createLogger('monitor:routes', app.clientBuf)
        const logRoutes = channel(LogChannel.app)

        app.get('/api/power', async () => {
            const status = app.meter.connectionStatus()
            const latest = app.meter.latestInstantReading()
            return {
                instantPower: latest?.instantPower ?? null,
                instantCurrentR: latest?.instantCurrentR ?? null,
                instantCurrentT: latest?.instantCurrentT ?? null,
                timestamp: latest?.timestamp ?? null,
                stale: status.stale,
                state: status.state,
            }
        })

        app.get('/api/energy', async () => {
            const latest = app.meter.latestEnergyReading()
            return {
                cumulativeEnergy: latest?.cumulativeEnergy ?? null,
                cumulativeEnergyReverse: latest?.cumulativeEnergyReverse ?? null,
                fixedEnergy: latest?.fixedEnergy ?? null,
                energyUnit: latest?.energyUnit ?? null,
                timestamp: latest?.timestamp ?? null,
            }
        })

        app.get<{ Querystring: HistoryQuery }>('/api/history', async (req) => {
            const history = app.meter.recentHistory()
            const limit = parseLimit(req.query.limit)
            return limit > 0 ? history.slice(-limit) : history
        })

        app.get('/api/connection', async () => app.meter.connectionStatus())

        app.get('/api/status', async () => {
            const link = app.meter.connectionStatus()
            return {
                status: 'running',
                mode: app.meter.mode,
                historyCount: app.meter.recentHistory().length,
                connectedClients: app.hasDecorator('powerClients') ? app.powerClients() : 0,
                lastUpdate: app.meter.latestInstantReading()?.timestamp ?? null,
                link,
            }
        })

        // A join can take minutes; the outcome shows up in /api/connection.
        app.post('/api/reconnect', async (_req, reply) => {
            void app.meter.forceReconnect().catch((err: unknown) => {
                logRoutes.warn('reconnect failed', { err: err instanceof Error ? err.message : String(err) })
            })
            reply.code(202)
            return { ok: true, state: app.meter.connectionStatus().state }
        })

        app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
            const n = parseLimit(req.query.n) || LOGS_DEFAULT
            return { entries: app.clientBuf.getLatest(n) }
        })
    },
    { name: 'power-routes', dependencies: ['meter-plugin'] }
)
