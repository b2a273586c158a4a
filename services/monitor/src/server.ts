import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    LogChannel
} from '@broute-monitor/logging'

import { buildApp } from './app.js'
import { buildMonitorConfigFromEnv } from './config/monitor.config.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function start() {
    const { channel } = createLogger('monitor')
    const logOrch = channel(LogChannel.orchestrator)

    let app: FastifyInstance | null = null

    try {
        // Throws ConfigError before any port is opened.
        const config = buildMonitorConfigFromEnv()

        app = buildApp(config)
        await app.listen({ port: config.api.port, host: config.api.host })

        const env = process.env.NODE_ENV ?? 'development'
        logOrch.info(
            `listening host=${config.api.host} port=${config.api.port} env=${env} mode=${config.mockMode ? 'mock' : 'live'}`
        )
        if (!config.mockMode) {
            logOrch.info(`adapter port=${config.serial.path} baud=${config.serial.baudRate}`)
        }

        // Graceful shutdown
        const running = app
        const shutdown = async (signal: NodeJS.Signals) => {
            try {
                logOrch.info(`received ${signal}, shutting down`)
                await running.close()
                logOrch.info('monitor closed')
                process.exit(0)
            } catch (err) {
                logOrch.error('error during shutdown', { err: err instanceof Error ? err.message : String(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logOrch.error(`failed to start err="${err instanceof Error ? err.message : String(err)}"`)
        try {
            await app?.close()
        } catch (closeErr) {
            logOrch.warn('error closing after failed start', {
                err: closeErr instanceof Error ? closeErr.message : String(closeErr)
            })
        }
        process.exit(1)
    }
}

void start()
