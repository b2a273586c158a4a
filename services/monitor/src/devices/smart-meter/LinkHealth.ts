// services/monitor/src/devices/smart-meter/LinkHealth.ts

import { LinkAbortedError, errorMessage } from './errors.js'
import type { LinkState, MeterLinkConfig, MeterLinkEventSink } from './types.js'
import { computeReconnectDelay } from './utils.js'

export interface LinkHealthDeps {
    events: MeterLinkEventSink
    /** Quiesce polling; resolves once the in-flight request has finished. */
    suspendPolling(): Promise<void>
    resumePolling(): void
    /** One join attempt against the adapter (fast path or full scan). */
    rejoin(signal: AbortSignal): Promise<void>
}

/**
 * Tracks poll outcomes and session events, and owns the reconnection loop.
 *
 *   connected ⇄ degraded → disconnected → reconnecting → connected
 *                                              ↓
 *                                            failed
 */
export class LinkHealth {
    private readonly config: Pick<MeterLinkConfig, 'health' | 'reconnect'>
    private readonly deps: LinkHealthDeps

    private state: LinkState = 'idle'
    private consecutiveFailures = 0
    private lastReadingAt: number | null = null

    private reconnectAttempts = 0
    private reconnectTimer: NodeJS.Timeout | null = null
    private reconnectAbort: AbortController | null = null
    private reconnecting: Promise<void> | null = null

    constructor(config: Pick<MeterLinkConfig, 'health' | 'reconnect'>, deps: LinkHealthDeps) {
        this.config = config
        this.deps = deps
    }

    /* ---------------------------------------------------------------------- */
    /*  Accessors                                                             */
    /* ---------------------------------------------------------------------- */

    public getState(): LinkState {
        return this.state
    }

    public getConsecutiveFailures(): number {
        return this.consecutiveFailures
    }

    public getLastReadingAt(): number | null {
        return this.lastReadingAt
    }

    public getReconnectAttempts(): number {
        return this.reconnectAttempts
    }

    public isStale(now = Date.now()): boolean {
        if (this.state !== 'connected' && this.state !== 'degraded') return true
        if (this.lastReadingAt === null) return true
        return now - this.lastReadingAt > this.config.health.staleAfterMs
    }

    /* ---------------------------------------------------------------------- */
    /*  Inputs                                                                */
    /* ---------------------------------------------------------------------- */

    public setState(to: LinkState, reason: string): void {
        const from = this.state
        if (from === to) return
        this.state = to
        this.deps.events.publish({ kind: 'link-state', at: Date.now(), from, to, reason })
    }

    public markConnected(reason: string): void {
        this.consecutiveFailures = 0
        this.reconnectAttempts = 0
        this.setState('connected', reason)
    }

    public recordSuccess(at = Date.now()): void {
        this.lastReadingAt = at
        this.consecutiveFailures = 0
        if (this.state === 'degraded') this.setState('connected', 'poll succeeded')
    }

    public recordFailure(): void {
        if (this.state !== 'connected' && this.state !== 'degraded') return

        this.consecutiveFailures += 1
        const { degradedAfter, disconnectedAfter } = this.config.health

        if (this.consecutiveFailures >= disconnectedAfter) {
            this.disconnect(`${this.consecutiveFailures} consecutive poll failures`)
        } else if (this.consecutiveFailures >= degradedAfter) {
            this.setState('degraded', `${this.consecutiveFailures} consecutive poll failures`)
        }
    }

    /** The adapter reported the session gone (EVENT 26–29, failed send). */
    public sessionLost(eventCode: number): void {
        if (this.state !== 'connected' && this.state !== 'degraded') return
        this.deps.events.publish({ kind: 'session-lost', at: Date.now(), eventCode })
        this.disconnect(`session lost (EVENT ${eventCode.toString(16).toUpperCase()})`)
    }

    /** The adapter's port went away under a live session. */
    public linkLost(reason: string): void {
        if (this.state !== 'connected' && this.state !== 'degraded') return
        this.disconnect(reason)
    }

    /** Initial join exhausted its budget. */
    public fail(error: string): void {
        this.clearReconnectTimer()
        this.setState('failed', error)
        this.deps.events.publish({ kind: 'fatal-error', at: Date.now(), error })
    }

    /* ---------------------------------------------------------------------- */
    /*  Reconnection                                                          */
    /* ---------------------------------------------------------------------- */

    /**
     * Reconnect now, skipping any backoff wait. Clears `failed`. Resolves
     * when this reconnection attempt has finished.
     */
    public async forceReconnect(): Promise<void> {
        if (this.state === 'stopped' || this.state === 'idle') return
        if (this.reconnecting) return this.reconnecting
        // The initial join is still running.
        if (this.state === 'connecting') return

        this.clearReconnectTimer()
        if (this.state === 'failed') this.reconnectAttempts = 0

        await this.deps.suspendPolling()
        this.setState('disconnected', 'reconnect requested')
        await this.tryReconnect()
    }

    public stop(): void {
        this.clearReconnectTimer()
        this.reconnectAbort?.abort()
        this.reconnectAbort = null
        this.setState('stopped', 'stopped')
    }

    private disconnect(reason: string): void {
        this.setState('disconnected', reason)
        this.consecutiveFailures = 0
        this.reconnectAttempts = 0

        void this.deps
            .suspendPolling()
            .then(() => this.tryReconnect())
    }

    private tryReconnect(): Promise<void> {
        if (this.reconnecting) return this.reconnecting
        if (this.state !== 'disconnected') return Promise.resolve()

        this.reconnecting = this.runReconnect().finally(() => {
            this.reconnecting = null
        })
        return this.reconnecting
    }

    private async runReconnect(): Promise<void> {
        const attempt = ++this.reconnectAttempts
        const abort = new AbortController()
        this.reconnectAbort = abort

        this.setState('reconnecting', `attempt ${attempt}`)
        this.deps.events.publish({ kind: 'reconnect-attempt', at: Date.now(), attempt })

        try {
            await this.deps.rejoin(abort.signal)
        } catch (err) {
            if (err instanceof LinkAbortedError || this.state === 'stopped') return

            this.deps.events.publish({ kind: 'reconnect-failed', at: Date.now(), attempt, error: errorMessage(err) })
            this.scheduleNext(errorMessage(err))
            return
        } finally {
            if (this.reconnectAbort === abort) this.reconnectAbort = null
        }

        if (this.state === 'stopped') return

        this.deps.events.publish({ kind: 'reconnect-succeeded', at: Date.now(), attempt })
        this.markConnected(`reconnected after ${attempt} attempt(s)`)
        this.deps.resumePolling()
    }

    private scheduleNext(lastError: string): void {
        const { baseDelayMs, maxDelayMs, maxAttempts } = this.config.reconnect

        if (maxAttempts > 0 && this.reconnectAttempts >= maxAttempts) {
            this.fail(`reconnect gave up after ${this.reconnectAttempts} attempts: ${lastError}`)
            return
        }

        this.setState('disconnected', lastError)

        const delayMs = computeReconnectDelay(baseDelayMs, maxDelayMs, this.reconnectAttempts)
        this.deps.events.publish({
            kind: 'reconnect-scheduled',
            at: Date.now(),
            attempt: this.reconnectAttempts + 1,
            delayMs,
        })

        this.clearReconnectTimer()
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null
            void this.tryReconnect()
        }, delayMs)
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = null
        }
    }
}
