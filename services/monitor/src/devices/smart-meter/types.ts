// services/monitor/src/devices/smart-meter/types.ts

/* -------------------------------------------------------------------------- */
/*  Core configuration                                                        */
/* -------------------------------------------------------------------------- */

export interface MeterLinkConfig {
    credentials: {
        /** 32-character B-route authentication ID. */
        rbid: string
        /** 12-character B-route password. */
        password: string
    }

    /** Path of the ConnectionCache JSON file. */
    cacheFile: string

    transport: {
        /** Default bounded wait for a command reply. */
        commandTimeoutMs: number
    }

    join: {
        /** Wait for EVENT 25 after SKJOIN. */
        joinTimeoutMs: number
        /** Wait for EVENT 22 after SKSCAN. */
        scanTimeoutMs: number
        /** First SKSCAN duration exponent; doubled on each empty scan. */
        scanInitialDuration: number
        scanMaxDuration: number
        scanMaxAttempts: number
        /** Whole join attempts made by connect() before giving up. */
        maxAttempts: number
        retryDelayMs: number
    }

    polling: {
        fastIntervalMs: number
        slowIntervalMs: number
        /** Wait for the matching ECHONET Lite response. */
        requestTimeoutMs: number
    }

    health: {
        degradedAfter: number
        disconnectedAfter: number
        /** No reading for this long marks the status stale. */
        staleAfterMs: number
    }

    reconnect: {
        baseDelayMs: number
        maxDelayMs: number
        /** 0 or negative means unbounded. */
        maxAttempts: number
    }

    feed: {
        /** Per-subscriber queue bound; oldest readings are dropped beyond it. */
        subscriberQueue: number
    }
}

/* -------------------------------------------------------------------------- */
/*  Session                                                                   */
/* -------------------------------------------------------------------------- */

/** Parameters needed to rejoin the meter without scanning. */
export interface CachedConnection {
    channel: string
    panId: string
    macAddress: string
    linkLocalAddress: string
}

export interface Session extends CachedConnection {
    establishedAt: string
    /** true when the join skipped the scan and used the cache. */
    fromCache: boolean
}

/** Persistence for the last successful join parameters. */
export interface ConnectionStore {
    load(): Promise<CachedConnection | null>
    save(conn: CachedConnection): Promise<void>
    clear(): Promise<void>
}

export type JoinState =
    | 'idle'
    | 'credentials-set'
    | 'scanning'
    | 'scanned'
    | 'joining'
    | 'joined'
    | 'failed'

/* -------------------------------------------------------------------------- */
/*  Readings                                                                  */
/* -------------------------------------------------------------------------- */

export interface InstantReading {
    /** Watts; negative while exporting. */
    instantPower: number | null
    /** Amps on the R phase. */
    instantCurrentR: number | null
    /** Amps on the T phase; null when the meter does not measure it. */
    instantCurrentT: number | null
    timestamp: string
}

export interface FixedEnergy {
    /** ISO timestamp of the 30-minute boundary the meter captured. */
    timestamp: string
    /** kWh */
    energy: number | null
}

export interface EnergyReading {
    /** Forward cumulative energy, kWh. */
    cumulativeEnergy: number | null
    /** Reverse cumulative energy, kWh. */
    cumulativeEnergyReverse: number | null
    fixedEnergy: FixedEnergy | null
    /** kWh per count, e.g. 0.1. */
    energyUnit: number | null
    timestamp: string
}

export type MeterReading =
    | { type: 'instant'; data: InstantReading }
    | { type: 'energy'; data: EnergyReading }

/* -------------------------------------------------------------------------- */
/*  Connection status                                                         */
/* -------------------------------------------------------------------------- */

export type LinkState =
    | 'idle'
    | 'connecting'
    | 'connected'
    | 'degraded'
    | 'disconnected'
    | 'reconnecting'
    | 'failed'
    | 'stopped'

export type RssiQuality = 'excellent' | 'good' | 'fair' | 'poor'

export type SourceMode = 'live' | 'mock'

export interface ConnectionStatus {
    state: LinkState
    mode: SourceMode
    channel: string | null
    panId: string | null
    macAddress: string | null
    ipv6Address: string | null
    /** dBm */
    rssi: number | null
    rssiQuality: RssiQuality | null
    lastReadingAt: string | null
    stale: boolean
    consecutiveFailures: number
}

/* -------------------------------------------------------------------------- */
/*  Polling                                                                   */
/* -------------------------------------------------------------------------- */

export type PollCycle = 'fast' | 'slow'

export interface PollCycleStats {
    requests: number
    successes: number
    timeouts: number
    protocolErrors: number
    otherErrors: number
    lastSuccessAt: number | null
}

/* -------------------------------------------------------------------------- */
/*  Data source contract                                                      */
/* -------------------------------------------------------------------------- */

export type ReadingListener = (reading: MeterReading) => void | Promise<void>

/**
 * What the API layer consumes. Implemented by the live link and the mock
 * source alike.
 */
export interface MeterDataSource {
    readonly mode: SourceMode
    start(): Promise<void>
    stop(): Promise<void>
    latestInstantReading(): InstantReading | null
    latestEnergyReading(): EnergyReading | null
    connectionStatus(): ConnectionStatus
    /** Last hour of instant readings, oldest first. */
    recentHistory(): InstantReading[]
    onReading(listener: ReadingListener): () => void
    forceReconnect(): Promise<void>
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface MeterLinkEventSink {
    publish(evt: MeterLinkEvent): void
}

export type MeterLinkEvent =
    | {
        kind: 'join-state'
        at: number
        state: JoinState
    }
    | {
        kind: 'join-scan-result'
        at: number
        duration: number
        found: number
    }
    | {
        kind: 'join-attempt-failed'
        at: number
        attempt: number
        fromCache: boolean
        error: string
    }
    | {
        kind: 'session-established'
        at: number
        session: Session
    }
    | {
        kind: 'cache-invalidated'
        at: number
        reason: string
    }
    | {
        kind: 'cache-error'
        at: number
        operation: 'read' | 'write' | 'delete'
        error: string
    }
    | {
        kind: 'adapter-info-failed'
        at: number
        error: string
    }
    | {
        kind: 'protocol-error'
        at: number
        detail: string
    }
    | {
        kind: 'poll-success'
        at: number
        cycle: PollCycle
        durationMs: number
    }
    | {
        kind: 'poll-failure'
        at: number
        cycle: PollCycle
        code: string
        error: string
    }
    | {
        kind: 'reading'
        at: number
        reading: MeterReading
    }
    | {
        kind: 'link-state'
        at: number
        from: LinkState
        to: LinkState
        reason: string
    }
    | {
        kind: 'session-lost'
        at: number
        eventCode: number
    }
    | {
        kind: 'reconnect-scheduled'
        at: number
        attempt: number
        delayMs: number
    }
    | {
        kind: 'reconnect-attempt'
        at: number
        attempt: number
    }
    | {
        kind: 'reconnect-succeeded'
        at: number
        attempt: number
    }
    | {
        kind: 'reconnect-failed'
        at: number
        attempt: number
        error: string
    }
    | {
        kind: 'fatal-error'
        at: number
        error: string
    }
    | {
        kind: 'subscriber-dropped'
        at: number
        dropped: number
    }
    | {
        kind: 'subscriber-error'
        at: number
        error: string
    }
