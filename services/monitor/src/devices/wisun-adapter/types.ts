// services/monitor/src/devices/wisun-adapter/types.ts

/* -------------------------------------------------------------------------- */
/*  Byte stream                                                               */
/* -------------------------------------------------------------------------- */

/**
 * Minimal line-oriented view of the adapter's serial console.
 *
 * The production implementation wraps `serialport` + a CRLF readline parser;
 * tests script a fake implementation in process.
 */
export interface LinePort {
    open(): Promise<void>
    close(): Promise<void>
    isOpen(): boolean
    /** Write raw bytes (command text, optionally followed by a binary payload). */
    write(data: Buffer): Promise<void>
    /** Each complete line received, without the CRLF terminator. */
    onLine(cb: (line: string) => void): void
    onError(cb: (err: Error) => void): void
    onClose(cb: () => void): void
}

/* -------------------------------------------------------------------------- */
/*  Commands                                                                  */
/* -------------------------------------------------------------------------- */

export type LineMatcher = string | RegExp

export interface CommandOptions {
    /**
     * Lines that end the reply. A string matches by equality or prefix
     * followed by a space; a RegExp is tested against the trimmed line.
     * Defaults to `OK` and `FAIL …`.
     */
    terminators?: LineMatcher[]
    /** Bounded wait for a terminator (defaults to the transport's timeout). */
    timeoutMs?: number
}

export interface CommandResponse {
    /** Reply lines in arrival order, terminator included, echo excluded. */
    lines: string[]
    terminator: string
}

export type LineKind = 'ok' | 'fail' | 'event' | 'rx' | 'pan-desc' | 'pan-desc-field' | 'data'

/* -------------------------------------------------------------------------- */
/*  Asynchronous adapter events                                               */
/* -------------------------------------------------------------------------- */

/** Adapter `EVENT` numbers the link cares about. */
export const AdapterEventCode = {
    nsReceived: 0x02,
    beaconReceived: 0x20,
    udpSendComplete: 0x21,
    activeScanComplete: 0x22,
    panaConnectFailed: 0x24,
    panaConnected: 0x25,
    sessionTerminateRequested: 0x26,
    sessionTerminated: 0x27,
    sessionTerminateTimeout: 0x28,
    sessionLifetimeExpired: 0x29,
    transmitLimitExceeded: 0x32,
    transmitLimitReleased: 0x33,
} as const

export interface PanDescriptor {
    channel: string
    channelPage: string | null
    panId: string
    macAddress: string
    lqi: number | null
    /** Estimated from LQI: 0.275 × LQI − 104.27 dBm. */
    rssi: number | null
    pairId: string | null
}

export type AdapterEvent =
    | {
        kind: 'event'
        code: number
        sender: string
        /** Present on adapters that report the radio side (BP35C2). */
        side: string | null
        /** Extra parameter, e.g. the EVENT 21 send result. */
        param: string | null
        raw: string
    }
    | {
        kind: 'rx'
        sender: string
        dest: string
        remotePort: number
        localPort: number
        senderMac: string
        /** dBm, when the adapter reports RSSI (`SKSREG SA2 1`). */
        rssi: number | null
        secured: boolean
        payload: Buffer
        raw: string
    }
    | {
        kind: 'pan-desc'
        descriptor: PanDescriptor
    }

export type AdapterEventListener = (evt: AdapterEvent) => void

/** Parsed `EINFO` reply to `SKINFO`. */
export interface AdapterInfo {
    ipv6Address: string
    macAddress: string
    channel: string
    panId: string
    shortAddress: string
}

/* -------------------------------------------------------------------------- */
/*  Transport diagnostics                                                     */
/* -------------------------------------------------------------------------- */

export interface TransportStats {
    commandsSent: number
    commandTimeouts: number
    linesReceived: number
    eventsDispatched: number
    unknownLines: number
}

export type TransportDiagnostic =
    | { kind: 'line-received'; at: number; line: string }
    | { kind: 'line-unknown'; at: number; line: string }
    | { kind: 'port-error'; at: number; error: string }
    | { kind: 'port-closed'; at: number }
    | { kind: 'listener-error'; at: number; error: string }

export interface TransportDiagnosticSink {
    publish(evt: TransportDiagnostic): void
}
