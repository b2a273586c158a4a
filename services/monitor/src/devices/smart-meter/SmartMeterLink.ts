// services/monitor/src/devices/smart-meter/SmartMeterLink.ts

import { CommandTransport } from '../wisun-adapter/CommandTransport.js'
import {
    AdapterEventCode,
    type LinePort,
    type TransportDiagnosticSink,
    type TransportStats,
} from '../wisun-adapter/types.js'
import { ConnectionCache } from './ConnectionCache.js'
import { LinkAbortedError, TransportClosedError, errorMessage } from './errors.js'
import { FrameRequester } from './FrameRequester.js'
import { ReadingHistory, historyCapacity } from './history.js'
import { JoinEngine } from './JoinEngine.js'
import { LinkHealth } from './LinkHealth.js'
import { PollingOrchestrator } from './PollingOrchestrator.js'
import { ReadingFeed } from './ReadingFeed.js'
import { RequestDispatcher } from './RequestDispatcher.js'
import type {
    CachedConnection,
    ConnectionStatus,
    ConnectionStore,
    EnergyReading,
    InstantReading,
    JoinState,
    MeterDataSource,
    MeterLinkConfig,
    MeterLinkEventSink,
    MeterReading,
    PollCycle,
    PollCycleStats,
    ReadingListener,
} from './types.js'
import { rssiQuality } from './utils.js'

const SESSION_END_EVENTS: ReadonlySet<number> = new Set([
    AdapterEventCode.sessionTerminateRequested,
    AdapterEventCode.sessionTerminated,
    AdapterEventCode.sessionTerminateTimeout,
    AdapterEventCode.sessionLifetimeExpired,
])

export interface SmartMeterLinkDeps {
    port: LinePort
    events: MeterLinkEventSink
    diagnostics?: TransportDiagnosticSink
    /** Defaults to a ConnectionCache on `config.cacheFile`. */
    cache?: ConnectionStore
}

export interface LinkDiagnostics {
    joinState: JoinState
    firmwareVersion: string | null
    reconnectAttempts: number
    lastError: string | null
    polling: Record<PollCycle, PollCycleStats>
    transport: TransportStats
    subscribers: number
}

/**
 * The live data source: adapter transport, join engine, polling and health
 * wired together behind the MeterDataSource contract.
 */
export class SmartMeterLink implements MeterDataSource {
    public readonly mode = 'live' as const

    private readonly events: MeterLinkEventSink

    private readonly transport: CommandTransport
    private readonly dispatcher = new RequestDispatcher()
    private readonly join: JoinEngine
    private readonly requester: FrameRequester
    private readonly poller: PollingOrchestrator
    private readonly health: LinkHealth
    private readonly history: ReadingHistory
    private readonly feed: ReadingFeed

    private latestInstant: InstantReading | null = null
    private latestEnergy: EnergyReading | null = null
    private rssi: number | null = null
    private knownSession: CachedConnection | null = null

    private started = false
    private readonly abort = new AbortController()
    private background: Promise<void>[] = []

    constructor(config: MeterLinkConfig, deps: SmartMeterLinkDeps) {
        this.events = deps.events

        this.transport = new CommandTransport(
            deps.port,
            { commandTimeoutMs: config.transport.commandTimeoutMs },
            deps.diagnostics
        )

        this.join = new JoinEngine(config, {
            transport: this.transport,
            cache: deps.cache ?? new ConnectionCache(config.cacheFile, deps.events),
            events: deps.events,
        })

        this.requester = new FrameRequester(
            {
                transport: this.transport,
                events: deps.events,
                destination: () => this.join.getSession()?.linkLocalAddress ?? null,
                onRssi: (rssi) => {
                    this.rssi = rssi
                },
            },
            config.polling.requestTimeoutMs
        )

        this.history = new ReadingHistory(historyCapacity(config.polling.fastIntervalMs))
        this.feed = new ReadingFeed(config.feed.subscriberQueue, deps.events)

        this.health = new LinkHealth(config, {
            events: deps.events,
            suspendPolling: () => this.dispatcher.suspend(),
            resumePolling: () => {
                this.dispatcher.resume()
                if (!this.poller.isRunning()) this.poller.start()
            },
            rejoin: (signal) => this.rejoin(signal),
        })

        this.poller = new PollingOrchestrator(config.polling, {
            dispatcher: this.dispatcher,
            frames: this.requester,
            events: deps.events,
            onInstant: (reading, rssi) => this.handleInstant(reading, rssi),
            onEnergy: (reading) => this.handleEnergy(reading),
            onFailure: () => this.health.recordFailure(),
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Opens the adapter port and starts joining in the background. Join
     * exhaustion is reported as `state: 'failed'`, never thrown.
     */
    public async start(): Promise<void> {
        if (this.started) return
        this.started = true

        await this.transport.open()

        this.background.push(this.watchSession())
        this.health.setState('connecting', 'start')
        this.background.push(this.connectInitial())
    }

    public async stop(): Promise<void> {
        if (!this.started) return
        this.started = false

        this.abort.abort()
        this.poller.stop()
        this.health.stop()
        this.requester.dispose()
        // Closing the port first rejects any command a join is waiting on.
        await this.transport.close()
        await this.dispatcher.suspend()
        this.feed.close()
        await Promise.all(this.background)
        this.background = []
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
        const session = this.join.getSession() ?? this.knownSession
        const info = this.join.getAdapterInfo()
        const lastReadingAt = this.health.getLastReadingAt()

        return Object.freeze({
            state: this.health.getState(),
            mode: this.mode,
            channel: session?.channel ?? info?.channel ?? null,
            panId: session?.panId ?? info?.panId ?? null,
            macAddress: session?.macAddress ?? null,
            ipv6Address: session?.linkLocalAddress ?? info?.ipv6Address ?? null,
            rssi: this.rssi,
            rssiQuality: rssiQuality(this.rssi),
            lastReadingAt: lastReadingAt === null ? null : new Date(lastReadingAt).toISOString(),
            stale: this.health.isStale(),
            consecutiveFailures: this.health.getConsecutiveFailures(),
        })
    }

    public onReading(listener: ReadingListener): () => void {
        return this.feed.subscribe(listener)
    }

    public forceReconnect(): Promise<void> {
        return this.health.forceReconnect()
    }

    public getDiagnostics(): LinkDiagnostics {
        return {
            joinState: this.join.getState(),
            firmwareVersion: this.join.getFirmwareVersion(),
            reconnectAttempts: this.health.getReconnectAttempts(),
            lastError: this.join.getLastError()?.message ?? null,
            polling: this.poller.getStats(),
            transport: this.transport.getStats(),
            subscribers: this.feed.subscriberCount,
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private async connectInitial(): Promise<void> {
        try {
            const session = await this.dispatcher.runExclusive(() => this.join.connect(this.abort.signal))
            this.knownSession = session
        } catch (err) {
            if (err instanceof LinkAbortedError || !this.started) return
            this.health.fail(errorMessage(err))
            return
        }

        if (!this.started) return
        this.health.markConnected('joined')
        this.poller.start()
    }

    private async rejoin(signal: AbortSignal): Promise<void> {
        this.requester.cancel(new TransportClosedError('frame request: reconnecting'))

        // The adapter may have been reset or replugged since the last join.
        if (!this.transport.isOpen()) {
            await this.transport.open()
            this.background.push(this.watchSession())
        }

        const session = await this.dispatcher.runExclusive(() => this.join.attempt({ reset: true, signal }))
        this.knownSession = session
    }

    /**
     * Consumes adapter events until the transport closes. A port that closes
     * under a live session counts as link loss; `rejoin` reopens it and
     * starts a fresh watcher.
     */
    private async watchSession(): Promise<void> {
        for await (const evt of this.transport.subscribeEvents()) {
            if (evt.kind !== 'event') continue

            const live = this.health.getState() === 'connected' || this.health.getState() === 'degraded'
            if (!live) continue

            const sendFailed =
                evt.code === AdapterEventCode.udpSendComplete && evt.param !== null && evt.param !== '00'

            if (SESSION_END_EVENTS.has(evt.code) || sendFailed) {
                this.join.invalidateSession()
                this.health.sessionLost(evt.code)
            }
        }

        if (!this.started) return
        this.join.invalidateSession()
        this.health.linkLost('adapter port closed')
    }

    private handleInstant(reading: InstantReading, rssi: number | null): void {
        if (rssi !== null) this.rssi = rssi
        this.latestInstant = reading
        this.history.append(reading)
        this.health.recordSuccess()
        this.publish({ type: 'instant', data: reading })
    }

    private handleEnergy(reading: EnergyReading): void {
        this.latestEnergy = reading
        this.health.recordSuccess()
        this.publish({ type: 'energy', data: reading })
    }

    private publish(reading: MeterReading): void {
        this.events.publish({ kind: 'reading', at: Date.now(), reading })
        this.feed.publish(reading)
    }
}
