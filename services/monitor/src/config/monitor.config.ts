// services/monitor/src/config/monitor.config.ts

import { ConfigError } from '../devices/smart-meter/errors.js'
import type { MeterLinkConfig } from '../devices/smart-meter/types.js'

export type MonitorConfig = {
    mockMode: boolean

    serial: {
        path: string
        baudRate: number
    }

    link: MeterLinkConfig

    api: {
        host: string
        port: number
        /** Period of `status` frames on /ws/power. */
        statusIntervalMs: number
    }
}

const RBID_LENGTH = 32
const PASSWORD_LENGTH = 12

function parseBool(v: string | undefined, def: boolean): boolean {
    if (v === undefined) return def
    const n = v.trim().toLowerCase()
    if (n === 'true' || n === '1' || n === 'yes') return true
    if (n === 'false' || n === '0' || n === 'no') return false
    return def
}

/**
 * Collects every problem instead of stopping at the first one, so a
 * misconfigured deployment sees the whole list at once.
 */
class EnvReader {
    readonly problems: string[] = []

    constructor(private readonly env: NodeJS.ProcessEnv) {}

    string(name: string, def: string): string {
        const v = (this.env[name] ?? '').trim()
        return v || def
    }

    optional(name: string): string | null {
        const v = (this.env[name] ?? '').trim()
        return v || null
    }

    int(name: string, def: number, min: number, max: number): number {
        const raw = this.env[name]
        if (raw === undefined || raw.trim() === '') return def

        if (!/^-?\d+$/.test(raw.trim())) {
            this.problems.push(`${name} must be an integer (got "${raw}")`)
            return def
        }
        const n = Number.parseInt(raw, 10)
        if (n < min || n > max) {
            this.problems.push(`${name} must be between ${min} and ${max} (got ${n})`)
            return def
        }
        return n
    }
}

/**
 * Build and validate the monitor configuration. Throws ConfigError listing
 * every problem found; nothing is opened before this returns.
 */
export function buildMonitorConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    argv: readonly string[] = process.argv.slice(2)
): MonitorConfig {
    const r = new EnvReader(env)

    const mockMode = argv.includes('--mock') || parseBool(env.MOCK_MODE, false)

    const rbid = r.optional('BROUTE_ID')
    const password = r.optional('BROUTE_PASSWORD')

    if (!mockMode) {
        if (rbid === null) r.problems.push('BROUTE_ID is required unless MOCK_MODE is set')
        else if (rbid.length !== RBID_LENGTH) {
            r.problems.push(`BROUTE_ID must be ${RBID_LENGTH} characters (got ${rbid.length})`)
        }

        if (password === null) r.problems.push('BROUTE_PASSWORD is required unless MOCK_MODE is set')
        else if (password.length !== PASSWORD_LENGTH) {
            r.problems.push(`BROUTE_PASSWORD must be ${PASSWORD_LENGTH} characters (got ${password.length})`)
        }
    }

    const fastSec = r.int('POLL_FAST_INTERVAL_SEC', 5, 1, 3_600)
    const slowSec = r.int('POLL_SLOW_INTERVAL_SEC', 1_800, 1, 86_400)

    const degradedAfter = r.int('HEALTH_DEGRADED_AFTER', 3, 1, 1_000)
    const disconnectedAfter = r.int('HEALTH_DISCONNECTED_AFTER', 5, 1, 1_000)
    if (disconnectedAfter < degradedAfter) {
        r.problems.push(
            `HEALTH_DISCONNECTED_AFTER (${disconnectedAfter}) must not be below HEALTH_DEGRADED_AFTER (${degradedAfter})`
        )
    }

    const link: MeterLinkConfig = {
        credentials: { rbid: rbid ?? '', password: password ?? '' },
        cacheFile: r.string('WISUN_CACHE_FILE', 'wisun_cache.json'),
        transport: {
            commandTimeoutMs: r.int('WISUN_COMMAND_TIMEOUT_MS', 5_000, 100, 600_000),
        },
        join: {
            joinTimeoutMs: r.int('WISUN_JOIN_TIMEOUT_MS', 30_000, 1_000, 600_000),
            scanTimeoutMs: r.int('WISUN_SCAN_TIMEOUT_MS', 120_000, 1_000, 3_600_000),
            scanInitialDuration: r.int('WISUN_SCAN_INITIAL_DURATION', 4, 1, 14),
            scanMaxDuration: r.int('WISUN_SCAN_MAX_DURATION', 8, 1, 14),
            scanMaxAttempts: r.int('WISUN_SCAN_MAX_ATTEMPTS', 4, 1, 100),
            maxAttempts: r.int('WISUN_JOIN_MAX_ATTEMPTS', 5, 1, 1_000),
            retryDelayMs: r.int('WISUN_JOIN_RETRY_DELAY_MS', 10_000, 0, 3_600_000),
        },
        polling: {
            fastIntervalMs: fastSec * 1_000,
            slowIntervalMs: slowSec * 1_000,
            requestTimeoutMs: r.int('POLL_REQUEST_TIMEOUT_MS', 5_000, 100, 600_000),
        },
        health: {
            degradedAfter,
            disconnectedAfter,
            staleAfterMs: r.int('HEALTH_STALE_AFTER_MS', fastSec * 3_000, 1_000, 86_400_000),
        },
        reconnect: {
            baseDelayMs: r.int('RECONNECT_BASE_DELAY_MS', 5_000, 100, 3_600_000),
            maxDelayMs: r.int('RECONNECT_MAX_DELAY_MS', 300_000, 100, 86_400_000),
            maxAttempts: r.int('RECONNECT_MAX_ATTEMPTS', 0, 0, 100_000),
        },
        feed: {
            subscriberQueue: r.int('FEED_SUBSCRIBER_QUEUE', 64, 1, 100_000),
        },
    }

    const config: MonitorConfig = {
        mockMode,
        serial: {
            path: r.string('WISUN_SERIAL_PORT', '/dev/ttyUSB0'),
            baudRate: r.int('WISUN_BAUD_RATE', 115_200, 1_200, 921_600),
        },
        link,
        api: {
            host: r.string('API_HOST', '0.0.0.0'),
            port: r.int('API_PORT', 8_000, 0, 65_535),
            statusIntervalMs: r.int('WS_STATUS_INTERVAL_MS', 10_000, 1_000, 3_600_000),
        },
    }

    if (r.problems.length > 0) throw new ConfigError(r.problems)

    return deepFreeze(config)
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
    for (const value of Object.values(obj)) {
        if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) deepFreeze(value)
    }
    return Object.freeze(obj)
}
