// services/monitor/src/devices/smart-meter/PollingOrchestrator.ts

import { ENERGY_PROPERTIES, INSTANT_PROPERTIES, toEnergyReading, toInstantReading } from './echonet.js'
import { ProtocolError, TransportTimeoutError, MeterLinkError, errorMessage } from './errors.js'
import type { FrameResponse } from './FrameRequester.js'
import type { RequestDispatcher } from './RequestDispatcher.js'
import type {
    EnergyReading,
    InstantReading,
    MeterLinkConfig,
    MeterLinkEventSink,
    PollCycle,
    PollCycleStats,
} from './types.js'

export interface FrameSource {
    request(properties: readonly number[]): Promise<FrameResponse>
}

export interface PollingDeps {
    dispatcher: RequestDispatcher
    frames: FrameSource
    events: MeterLinkEventSink
    onInstant(reading: InstantReading, rssi: number | null): void
    onEnergy(reading: EnergyReading): void
    onFailure(cycle: PollCycle, err: unknown): void
}

function emptyStats(): PollCycleStats {
    return { requests: 0, successes: 0, timeouts: 0, protocolErrors: 0, otherErrors: 0, lastSuccessAt: null }
}

/**
 * Two independent periodic cycles over the single request dispatcher:
 * fast (instant power and current) and slow (cumulative energy).
 */
export class PollingOrchestrator {
    private readonly config: MeterLinkConfig['polling']
    private readonly deps: PollingDeps

    private readonly timers: Record<PollCycle, NodeJS.Timeout | null> = { fast: null, slow: null }
    private readonly queued: Record<PollCycle, boolean> = { fast: false, slow: false }
    private readonly stats: Record<PollCycle, PollCycleStats> = { fast: emptyStats(), slow: emptyStats() }

    private energyUnit: number | null = null
    private running = false

    constructor(config: MeterLinkConfig['polling'], deps: PollingDeps) {
        this.config = config
        this.deps = deps
    }

    /** Both cycles run once immediately, then on their intervals. */
    public start(): void {
        if (this.running) return
        this.running = true

        this.tick('fast')
        this.tick('slow')

        this.timers.fast = setInterval(() => this.tick('fast'), this.config.fastIntervalMs)
        this.timers.slow = setInterval(() => this.tick('slow'), this.config.slowIntervalMs)
    }

    public stop(): void {
        this.running = false
        for (const cycle of ['fast', 'slow'] as const) {
            const t = this.timers[cycle]
            if (t) clearInterval(t)
            this.timers[cycle] = null
        }
    }

    public isRunning(): boolean {
        return this.running
    }

    public getStats(): Record<PollCycle, PollCycleStats> {
        return { fast: { ...this.stats.fast }, slow: { ...this.stats.slow } }
    }

    /**
     * Queue one poll of `cycle` unless one is already waiting for the
     * dispatcher.
     */
    public tick(cycle: PollCycle): void {
        if (!this.running || this.queued[cycle]) return
        this.queued[cycle] = true

        void this.deps.dispatcher
            .submit(() => {
                this.queued[cycle] = false
                return this.poll(cycle)
            })
            .then((outcome) => {
                if (outcome.status === 'dropped') this.queued[cycle] = false
            })
            .catch((err: unknown) => {
                this.queued[cycle] = false
                this.deps.onFailure(cycle, err)
            })
    }

    private async poll(cycle: PollCycle): Promise<void> {
        const stats = this.stats[cycle]
        const properties = cycle === 'fast' ? INSTANT_PROPERTIES : ENERGY_PROPERTIES
        const started = Date.now()
        stats.requests += 1

        try {
            const { frame, rssi } = await this.deps.frames.request(properties)
            const now = new Date()

            if (cycle === 'fast') {
                const reading = Object.freeze(toInstantReading(frame, now))
                this.recordSuccess(cycle, started)
                this.deps.onInstant(reading, rssi)
            } else {
                const reading = Object.freeze(toEnergyReading(frame, now, this.energyUnit))
                if (reading.energyUnit !== null) this.energyUnit = reading.energyUnit
                this.recordSuccess(cycle, started)
                this.deps.onEnergy(reading)
            }
        } catch (err) {
            if (err instanceof TransportTimeoutError) stats.timeouts += 1
            else if (err instanceof ProtocolError) stats.protocolErrors += 1
            else stats.otherErrors += 1

            this.deps.events.publish({
                kind: 'poll-failure',
                at: Date.now(),
                cycle,
                code: err instanceof MeterLinkError ? err.code : 'unknown',
                error: errorMessage(err),
            })
            this.deps.onFailure(cycle, err)
        }
    }

    private recordSuccess(cycle: PollCycle, started: number): void {
        const now = Date.now()
        this.stats[cycle].successes += 1
        this.stats[cycle].lastSuccessAt = now
        this.deps.events.publish({ kind: 'poll-success', at: now, cycle, durationMs: now - started })
    }
}
