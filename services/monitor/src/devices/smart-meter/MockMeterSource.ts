// services/monitor/src/devices/smart-meter/MockMeterSource.ts

import { ReadingHistory, historyCapacity } from './history.js'
import { ReadingFeed } from './ReadingFeed.js'
import type {
    ConnectionStatus,
    EnergyReading,
    InstantReading,
    LinkState,
    MeterDataSource,
    MeterLinkConfig,
    MeterLinkEventSink,
    MeterReading,
    ReadingListener,
} from './types.js'
import { rssiQuality } from './utils.js'

const HALF_HOUR_MS = 30 * 60 * 1000
const VOLTAGE = 100
const ENERGY_UNIT = 0.1

// Locally administered EUI-64 and the link-local address derived from it.
const MOCK_PAN_ID = '1234'
const MOCK_MAC = '0200000000000001'
const MOCK_IPV6 = 'FE80:0000:0000:0000:0000:0000:0000:0001'

export interface MockMeterOptions {
    /** [0, 1) */
    random?: () => number
    now?: () => Date
}

/**
 * Household load in watts for a fractional local hour: an overnight floor
 * with breakfast, midday and dinner peaks.
 */
export function dailyLoadCurve(hour: number): number {
    const peak = (center: number, width: number, height: number) => {
        const d = Math.abs(hour - center)
        const wrapped = Math.min(d, 24 - d)
        return height * Math.exp(-(wrapped * wrapped) / (2 * width * width))
    }
    return 250 + peak(7.5, 1.0, 1400) + peak(12.5, 2.0, 600) + peak(19, 1.8, 2200)
}

/** Reverse flow (kW) from rooftop solar around midday. */
function exportKw(hour: number): number {
    if (hour < 9 || hour > 15) return 0
    return 0.4 * Math.sin(((hour - 9) / 6) * Math.PI)
}

function localHour(at: Date): number {
    return at.getHours() + at.getMinutes() / 60 + at.getSeconds() / 3600
}

function formatLocal(at: Date): string {
    const p = (n: number) => String(n).padStart(2, '0')
    return (
        `${at.getFullYear()}-${p(at.getMonth() + 1)}-${p(at.getDate())} ` +
        `${p(at.getHours())}:${p(at.getMinutes())}:${p(at.getSeconds())}`
    )
}

function round1(n: number): number {
    return Math.round(n * 10) / 10
}

/**
 * Synthetic stand-in for the live link. Same contract, no adapter I/O.
 */
export class MockMeterSource implements MeterDataSource {
    public readonly mode = 'mock' as const

    private readonly config: Pick<MeterLinkConfig, 'polling' | 'health' | 'feed'>
    private readonly events: MeterLinkEventSink | undefined
    private readonly random: () => number
    private readonly now: () => Date

    private readonly history: ReadingHistory
    private readonly feed: ReadingFeed

    private state: LinkState = 'idle'
    private latestInstant: InstantReading | null = null
    private latestEnergy: EnergyReading | null = null
    private rssi: number | null = null
    private lastReadingAt: number | null = null

    private forwardKwh = 0
    private reverseKwh = 0
    private lastSampleAt: number | null = null
    private fixed: { boundary: number; energy: number } | null = null

    private fastTimer: NodeJS.Timeout | null = null
    private slowTimer: NodeJS.Timeout | null = null

    constructor(
        config: Pick<MeterLinkConfig, 'polling' | 'health' | 'feed'>,
        events?: MeterLinkEventSink,
        options: MockMeterOptions = {}
    ) {
        this.config = config
        this.events = events
        this.random = options.random ?? Math.random
        this.now = options.now ?? (() => new Date())
        this.history = new ReadingHistory(historyCapacity(config.polling.fastIntervalMs))
        this.feed = new ReadingFeed(config.feed.subscriberQueue, events)
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    public async start(): Promise<void> {
        if (this.fastTimer) return

        const now = this.now()
        // Start from a plausible month-to-date total.
        this.forwardKwh = now.getDate() * 20 + this.random() * 5
        this.reverseKwh = now.getDate() * 5 + this.random() * 2
        this.lastSampleAt = now.getTime()
        this.fixed = { boundary: Math.floor(now.getTime() / HALF_HOUR_MS) * HALF_HOUR_MS, energy: this.forwardKwh }

        this.setState('connected', 'mock session')

        this.emitInstant()
        this.emitEnergy()

        this.fastTimer = setInterval(() => this.emitInstant(), this.config.polling.fastIntervalMs)
        this.slowTimer = setInterval(() => this.emitEnergy(), this.config.polling.slowIntervalMs)
    }

    public async stop(): Promise<void> {
        if (this.fastTimer) clearInterval(this.fastTimer)
        if (this.slowTimer) clearInterval(this.slowTimer)
        this.fastTimer = null
        this.slowTimer = null
        this.feed.close()
        this.setState('stopped', 'stopped')
    }

    /* ---------------------------------------------------------------------- */
    /*  MeterDataSource                                                       */
    /* ---------------------------------------------------------------------- */

    public latestInstantReading(): InstantReading | null {
        return this.latestInstant
    }

    public latestEnergyReading(): EnergyReading | null {
        return this.latestEnergy
    }

    public recentHistory(): InstantReading[] {
        return this.history.toArray()
    }

    public connectionStatus(): ConnectionStatus {
        const live = this.state === 'connected'
        const stale =
            !live ||
            this.lastReadingAt === null ||
            this.now().getTime() - this.lastReadingAt > this.config.health.staleAfterMs

        return Object.freeze({
            state: this.state,
            mode: this.mode,
            channel: '33',
            panId: MOCK_PAN_ID,
            macAddress: MOCK_MAC,
            ipv6Address: MOCK_IPV6,
            rssi: this.rssi,
            rssiQuality: rssiQuality(this.rssi),
            lastReadingAt: this.lastReadingAt === null ? null : new Date(this.lastReadingAt).toISOString(),
            stale,
            consecutiveFailures: 0,
        })
    }

    public onReading(listener: ReadingListener): () => void {
        return this.feed.subscribe(listener)
    }

    public async forceReconnect(): Promise<void> {
        this.events?.publish({ kind: 'reconnect-succeeded', at: Date.now(), attempt: 1 })
    }

    /* ---------------------------------------------------------------------- */
    /*  Synthesis                                                             */
    /* ---------------------------------------------------------------------- */

    /** One instant reading for `at`, with bounded jitter. */
    public sampleInstant(at: Date): InstantReading {
        const base = dailyLoadCurve(localHour(at))
        const jitter = base * (this.random() - 0.5) * 0.3 + (this.random() - 0.5) * 100
        const power = Math.max(0, Math.round(base + jitter))
        const amps = power / VOLTAGE

        return Object.freeze({
            instantPower: power,
            instantCurrentR: round1(amps * 0.55),
            instantCurrentT: round1(amps * 0.45),
            timestamp: at.toISOString(),
        })
    }

    private emitInstant(): void {
        const at = this.now()
        const reading = this.sampleInstant(at)

        this.integrate(at, reading.instantPower ?? 0)
        this.rssi = -80 + Math.floor(this.random() * 31)
        this.latestInstant = reading
        this.lastReadingAt = at.getTime()
        this.history.append(reading)
        this.publish({ type: 'instant', data: reading })
    }

    private emitEnergy(): void {
        const at = this.now()
        const fixed = this.fixed

        const reading: EnergyReading = Object.freeze({
            cumulativeEnergy: round1(this.forwardKwh),
            cumulativeEnergyReverse: round1(this.reverseKwh),
            fixedEnergy: fixed
                ? Object.freeze({ timestamp: formatLocal(new Date(fixed.boundary)), energy: round1(fixed.energy) })
                : null,
            energyUnit: ENERGY_UNIT,
            timestamp: at.toISOString(),
        })

        this.latestEnergy = reading
        this.publish({ type: 'energy', data: reading })
    }

    private integrate(at: Date, watts: number): void {
        const t = at.getTime()
        const boundary = Math.floor(t / HALF_HOUR_MS) * HALF_HOUR_MS

        if (this.fixed && boundary > this.fixed.boundary) {
            this.fixed = { boundary, energy: this.forwardKwh }
        }

        if (this.lastSampleAt !== null && t > this.lastSampleAt) {
            const hours = (t - this.lastSampleAt) / 3_600_000
            this.forwardKwh += (watts / 1000) * hours
            this.reverseKwh += exportKw(localHour(at)) * hours
        }
        this.lastSampleAt = t
    }

    private setState(to: LinkState, reason: string): void {
        const from = this.state
        if (from === to) return
        this.state = to
        this.events?.publish({ kind: 'link-state', at: Date.now(), from, to, reason })
    }

    private publish(reading: MeterReading): void {
        this.events?.publish({ kind: 'reading', at: Date.now(), reading })
        this.feed.publish(reading)
    }
}
