import { describe, expect, it } from 'vitest'

import { ConfigError } from '../../devices/smart-meter/errors.js'
import { buildMonitorConfigFromEnv } from '../monitor.config.js'

const CREDS = {
    BROUTE_ID: '0'.repeat(32),
    BROUTE_PASSWORD: 'TESTPASSWORD',
}

function problemsOf(fn: () => unknown): string[] {
    try {
        fn()
    } catch (err) {
        if (err instanceof ConfigError) return err.problems
        throw err
    }
    return []
}

describe('buildMonitorConfigFromEnv', () => {
    it('applies defaults', () => {
        const cfg = buildMonitorConfigFromEnv(CREDS, [])

        expect(cfg.mockMode).toBe(false)
        expect(cfg.serial).toEqual({ path: '/dev/ttyUSB0', baudRate: 115_200 })
        expect(cfg.api).toEqual({ host: '0.0.0.0', port: 8_000, statusIntervalMs: 10_000 })
        expect(cfg.link.polling).toEqual({ fastIntervalMs: 5_000, slowIntervalMs: 1_800_000, requestTimeoutMs: 5_000 })
        expect(cfg.link.health).toEqual({ degradedAfter: 3, disconnectedAfter: 5, staleAfterMs: 15_000 })
        expect(cfg.link.join.scanTimeoutMs).toBe(120_000)
        expect(cfg.link.feed.subscriberQueue).toBe(64)
        expect(Object.isFrozen(cfg.link.polling)).toBe(true)
    })

    it('reads overrides from the environment', () => {
        const cfg = buildMonitorConfigFromEnv(
            { ...CREDS, POLL_FAST_INTERVAL_SEC: '10', WISUN_SERIAL_PORT: '/dev/ttyAMA0', API_PORT: '9000' },
            []
        )

        expect(cfg.link.polling.fastIntervalMs).toBe(10_000)
        expect(cfg.link.health.staleAfterMs).toBe(30_000)
        expect(cfg.serial.path).toBe('/dev/ttyAMA0')
        expect(cfg.api.port).toBe(9_000)
    })

    it('does not require credentials in mock mode', () => {
        expect(buildMonitorConfigFromEnv({ MOCK_MODE: 'true' }, []).mockMode).toBe(true)
        expect(buildMonitorConfigFromEnv({}, ['--mock']).mockMode).toBe(true)
    })

    it('lists every problem at once', () => {
        const problems = problemsOf(() =>
            buildMonitorConfigFromEnv(
                {
                    BROUTE_ID: 'short',
                    POLL_FAST_INTERVAL_SEC: 'fast',
                    HEALTH_DEGRADED_AFTER: '6',
                    API_PORT: '70000',
                },
                []
            )
        )

        expect(problems).toEqual([
            'BROUTE_ID must be 32 characters (got 5)',
            'BROUTE_PASSWORD is required unless MOCK_MODE is set',
            'POLL_FAST_INTERVAL_SEC must be an integer (got "fast")',
            'HEALTH_DISCONNECTED_AFTER (5) must not be below HEALTH_DEGRADED_AFTER (6)',
            'API_PORT must be between 0 and 65535 (got 70000)',
        ])
    })

    it('raises ConfigError with a readable message', () => {
        expect(() => buildMonitorConfigFromEnv({}, [])).toThrow(ConfigError)
        expect(() => buildMonitorConfigFromEnv({}, [])).toThrow(
            'invalid configuration:\n  - BROUTE_ID is required unless MOCK_MODE is set\n  - BROUTE_PASSWORD is required unless MOCK_MODE is set'
        )
    })
})
