// services/monitor/src/devices/smart-meter/JoinEngine.ts

import type { CommandTransport } from '../wisun-adapter/CommandTransport.js'
import {
    AdapterEventCode,
    type AdapterEvent,
    type AdapterInfo,
    type PanDescriptor,
} from '../wisun-adapter/types.js'
import { isLinkLocalAddress, parseInfoLine } from '../wisun-adapter/utils.js'
import {
    CacheInvalidError,
    CommandRejectedError,
    JoinFailureError,
    LinkAbortedError,
    MeterLinkError,
    TransportTimeoutError,
    errorMessage,
} from './errors.js'
import type {
    CachedConnection,
    ConnectionStore,
    JoinState,
    MeterLinkConfig,
    MeterLinkEventSink,
    Session,
} from './types.js'
import { abortableSleep } from './utils.js'

type PanaEvent = Extract<AdapterEvent, { kind: 'event' }>

const isPanaResult = (evt: AdapterEvent): evt is PanaEvent =>
    evt.kind === 'event' &&
    (evt.code === AdapterEventCode.panaConnected || evt.code === AdapterEventCode.panaConnectFailed)

const isScanComplete = (evt: AdapterEvent): evt is PanaEvent =>
    evt.kind === 'event' && evt.code === AdapterEventCode.activeScanComplete

/** Consecutive fast-path failures that invalidate the cache. */
const CACHE_FAILURE_LIMIT = 2

export interface JoinEngineDeps {
    transport: CommandTransport
    cache: ConnectionStore
    events: MeterLinkEventSink
}

export interface AttemptOptions {
    /** SKTERM + SKRESET before starting (retries and reconnects). */
    reset?: boolean
    signal?: AbortSignal
}

/**
 * Drives the adapter from power-on (or reset) to an authenticated PANA
 * session with the meter:
 *
 *   idle → credentials-set → scanning → scanned → joining → joined
 *
 * With a cached session the scan is skipped and `joining` follows
 * `credentials-set` directly. Any failure ends in `failed`.
 */
export class JoinEngine {
    private readonly config: Pick<MeterLinkConfig, 'credentials' | 'join'>
    private readonly deps: JoinEngineDeps

    private state: JoinState = 'idle'
    private session: Session | null = null
    private adapterInfo: AdapterInfo | null = null
    private firmware: string | null = null

    /** Consecutive failed joins that used cached parameters. */
    private cacheFailures = 0
    private lastAttemptUsedCache = false
    private lastError: MeterLinkError | null = null

    constructor(config: Pick<MeterLinkConfig, 'credentials' | 'join'>, deps: JoinEngineDeps) {
        this.config = config
        this.deps = deps
    }

    /* ---------------------------------------------------------------------- */
    /*  Accessors                                                             */
    /* ---------------------------------------------------------------------- */

    public getState(): JoinState {
        return this.state
    }

    public getSession(): Session | null {
        return this.session
    }

    public getAdapterInfo(): AdapterInfo | null {
        return this.adapterInfo
    }

    public getFirmwareVersion(): string | null {
        return this.firmware
    }

    public getLastError(): MeterLinkError | null {
        return this.lastError
    }

    /** Forget the current session (the adapter reported it gone). */
    public invalidateSession(): void {
        this.session = null
    }

    /* ---------------------------------------------------------------------- */
    /*  Public operations                                                     */
    /* ---------------------------------------------------------------------- */

    /**
     * Up to `join.maxAttempts` whole attempts, `join.retryDelayMs` apart.
     * Every attempt after the first resets the adapter.
     */
    public async connect(signal?: AbortSignal): Promise<Session> {
        const { maxAttempts, retryDelayMs } = this.config.join
        const budget = Math.max(1, maxAttempts)

        for (let attempt = 1; attempt <= budget; attempt++) {
            try {
                return await this.attempt({ reset: attempt > 1, signal })
            } catch (err) {
                if (err instanceof LinkAbortedError) throw err
                this.publishAttemptFailed(attempt, err)
            }

            if (attempt < budget) {
                await abortableSleep(retryDelayMs, signal, () => new LinkAbortedError('join retry'))
            }
        }

        const fatal = new JoinFailureError(
            'retries-exhausted',
            `join failed after ${budget} attempts (last: ${this.lastError?.message ?? 'unknown'})`
        )
        this.lastError = fatal
        this.setState('failed')
        throw fatal
    }

    /**
     * One join attempt: fast path when a cached session exists, full scan
     * otherwise.
     */
    public async attempt(opts: AttemptOptions = {}): Promise<Session> {
        const { signal } = opts
        this.session = null
        this.setState('idle')

        let usedCache = false
        this.lastAttemptUsedCache = false
        try {
            if (opts.reset) await this.resetAdapter(signal)

            await this.checkAdapter(signal)
            await this.setCredentials(signal)

            const cached = this.cacheFailures < CACHE_FAILURE_LIMIT ? await this.deps.cache.load() : null

            let params: CachedConnection
            if (cached) {
                usedCache = true
                this.lastAttemptUsedCache = true
                params = cached
            } else {
                const descriptor = await this.scan(signal)
                params = await this.resolveDescriptor(descriptor, signal)
            }

            const session = await this.join(params, usedCache, signal)
            this.cacheFailures = 0
            this.lastError = null
            return session
        } catch (err) {
            const error = toLinkError(err)
            this.lastError = error
            this.setState('failed')

            if (usedCache && !(error instanceof LinkAbortedError)) {
                await this.recordCacheFailure()
            }
            throw error
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Steps                                                                 */
    /* ---------------------------------------------------------------------- */

    private async resetAdapter(signal?: AbortSignal): Promise<void> {
        this.checkAborted(signal)
        try {
            await this.deps.transport.sendCommand('SKTERM')
        } catch (err) {
            // No session to terminate.
            if (!(err instanceof CommandRejectedError) && !(err instanceof TransportTimeoutError)) throw err
        }

        this.checkAborted(signal)
        await this.deps.transport.sendCommand('SKRESET')
    }

    private async checkAdapter(signal?: AbortSignal): Promise<void> {
        this.checkAborted(signal)

        let lines: string[]
        try {
            ({ lines } = await this.deps.transport.sendCommand('SKVER'))
        } catch (err) {
            if (err instanceof TransportTimeoutError || err instanceof CommandRejectedError) {
                throw new JoinFailureError('adapter-unresponsive', `SKVER failed: ${err.message}`)
            }
            throw err
        }

        const ever = lines.find((l) => l.startsWith('EVER'))
        if (!ever) {
            throw new JoinFailureError('adapter-unresponsive', 'adapter did not report a firmware version')
        }
        this.firmware = ever.slice('EVER'.length).trim()
    }

    private async setCredentials(signal?: AbortSignal): Promise<void> {
        const { rbid, password } = this.config.credentials
        const t = this.deps.transport

        this.checkAborted(signal)
        await t.sendCommand(`SKSETRBID ${rbid}`)
        this.checkAborted(signal)
        await t.sendCommand(`SKSETPWD C ${password}`)

        this.checkAborted(signal)
        try {
            await t.sendCommand('SKSREG SA2 1')
        } catch (err) {
            // Older firmware has no SA2; frames then arrive without RSSI.
            if (!(err instanceof CommandRejectedError)) throw err
        }

        this.setState('credentials-set')
    }

    /**
     * Active scan with escalating duration. The strongest responding meter
     * wins.
     */
    private async scan(signal?: AbortSignal): Promise<PanDescriptor> {
        const { scanInitialDuration, scanMaxDuration, scanMaxAttempts, scanTimeoutMs } = this.config.join
        const t = this.deps.transport

        let duration = scanInitialDuration
        for (let i = 0; i < Math.max(1, scanMaxAttempts); i++) {
            this.checkAborted(signal)
            this.setState('scanning')

            const found: PanDescriptor[] = []
            const off = t.onEvent((evt) => {
                if (evt.kind === 'pan-desc') found.push(evt.descriptor)
            })
            const done = t.waitForEvent(isScanComplete)

            try {
                await t.sendCommand(`SKSCAN 2 FFFFFFFF ${duration} 0`)
                await done.wait(scanTimeoutMs, signal)
            } catch (err) {
                // A scan that never reports completion counts as empty.
                if (!(err instanceof TransportTimeoutError)) throw err
            } finally {
                done.cancel()
                off()
            }

            this.deps.events.publish({ kind: 'join-scan-result', at: Date.now(), duration, found: found.length })

            const best = pickStrongest(found)
            if (best) {
                this.setState('scanned')
                return best
            }

            duration = Math.min(duration * 2, scanMaxDuration)
        }

        throw new JoinFailureError('no-meter-found', `no meter answered after ${scanMaxAttempts} scans`)
    }

    private async resolveDescriptor(d: PanDescriptor, signal?: AbortSignal): Promise<CachedConnection> {
        this.checkAborted(signal)

        let terminator: string
        try {
            ({ terminator } = await this.deps.transport.sendCommand(`SKLL64 ${d.macAddress}`, {
                terminators: [/^FE80:/i],
            }))
        } catch (err) {
            if (err instanceof TransportTimeoutError || err instanceof CommandRejectedError) {
                throw new JoinFailureError('address-unresolved', `SKLL64 ${d.macAddress}: ${err.message}`)
            }
            throw err
        }

        if (!isLinkLocalAddress(terminator)) {
            throw new JoinFailureError('address-unresolved', `SKLL64 returned ${terminator}`)
        }

        return {
            channel: d.channel,
            panId: d.panId,
            macAddress: d.macAddress,
            linkLocalAddress: terminator,
        }
    }

    private async join(params: CachedConnection, fromCache: boolean, signal?: AbortSignal): Promise<Session> {
        const t = this.deps.transport

        this.checkAborted(signal)
        await t.sendCommand(`SKSREG S2 ${params.channel}`)
        this.checkAborted(signal)
        await t.sendCommand(`SKSREG S3 ${params.panId}`)

        this.checkAborted(signal)
        this.setState('joining')

        const result = t.waitForEvent(isPanaResult)
        let evt: PanaEvent
        try {
            await t.sendCommand(`SKJOIN ${params.linkLocalAddress}`)
            evt = await result.wait(this.config.join.joinTimeoutMs, signal)
        } catch (err) {
            if (err instanceof TransportTimeoutError) {
                throw new JoinFailureError('auth-timeout', `no PANA result within ${this.config.join.joinTimeoutMs}ms`)
            }
            throw err
        } finally {
            result.cancel()
        }

        if (evt.code === AdapterEventCode.panaConnectFailed) {
            throw new JoinFailureError('auth-rejected', 'PANA authentication rejected (EVENT 24)')
        }

        const session: Session = Object.freeze({
            ...params,
            establishedAt: new Date().toISOString(),
            fromCache,
        })

        this.session = session
        this.setState('joined')
        this.deps.events.publish({ kind: 'session-established', at: Date.now(), session })

        await this.deps.cache.save(params)
        await this.queryAdapterInfo()

        return session
    }

    private async queryAdapterInfo(): Promise<void> {
        try {
            const { lines } = await this.deps.transport.sendCommand('SKINFO')
            const info = lines.map(parseInfoLine).find((i) => i !== null)
            if (info) this.adapterInfo = info
        } catch (err) {
            this.deps.events.publish({ kind: 'adapter-info-failed', at: Date.now(), error: errorMessage(err) })
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private async recordCacheFailure(): Promise<void> {
        this.cacheFailures += 1
        if (this.cacheFailures < CACHE_FAILURE_LIMIT) return

        await this.deps.cache.clear()
        const err = new CacheInvalidError(this.cacheFailures)
        this.lastError = err
        this.deps.events.publish({ kind: 'cache-invalidated', at: Date.now(), reason: err.message })
        // The next attempt scans; a success there re-arms the fast path.
        this.cacheFailures = CACHE_FAILURE_LIMIT
    }

    private publishAttemptFailed(attempt: number, err: unknown): void {
        this.deps.events.publish({
            kind: 'join-attempt-failed',
            at: Date.now(),
            attempt,
            fromCache: this.lastAttemptUsedCache,
            error: errorMessage(err),
        })
    }

    private setState(next: JoinState): void {
        this.state = next
        this.deps.events.publish({ kind: 'join-state', at: Date.now(), state: next })
    }

    private checkAborted(signal?: AbortSignal): void {
        if (signal?.aborted) throw new LinkAbortedError('join')
    }
}

function pickStrongest(found: PanDescriptor[]): PanDescriptor | null {
    let best: PanDescriptor | null = null
    for (const d of found) {
        if (!best || (d.rssi ?? -Infinity) > (best.rssi ?? -Infinity)) best = d
    }
    return best
}

function toLinkError(err: unknown): MeterLinkError {
    if (err instanceof MeterLinkError) return err
    return new JoinFailureError('adapter-unresponsive', errorMessage(err))
}
