// services/monitor/src/devices/smart-meter/errors.ts

import { MeterLinkError } from '../wisun-adapter/errors.js'

export {
    MeterLinkError,
    TransportTimeoutError,
    TransportBusyError,
    TransportClosedError,
    CommandRejectedError,
    LinkAbortedError,
    errorMessage,
} from '../wisun-adapter/errors.js'

/** Malformed or mismatched ECHONET Lite frame. Discarded, counted as a failure. */
export class ProtocolError extends MeterLinkError {
    constructor(public readonly detail: string) {
        super('protocol-error', `protocol error: ${detail}`, true)
        this.name = 'ProtocolError'
    }
}

export type JoinFailureReason =
    | 'adapter-unresponsive'
    | 'no-meter-found'
    | 'address-unresolved'
    | 'auth-rejected'
    | 'auth-timeout'
    | 'retries-exhausted'

export class JoinFailureError extends MeterLinkError {
    constructor(public readonly reason: JoinFailureReason, message: string) {
        super('join-failure', message, reason !== 'retries-exhausted')
        this.name = 'JoinFailureError'
    }
}

/** The cached session failed twice in a row and was discarded. */
export class CacheInvalidError extends MeterLinkError {
    constructor(public readonly failures: number) {
        super('cache-invalid', `cached session failed ${failures} times; cache cleared`, true)
        this.name = 'CacheInvalidError'
    }
}

export class ConfigError extends MeterLinkError {
    constructor(public readonly problems: string[]) {
        super('config-error', `invalid configuration:\n  - ${problems.join('\n  - ')}`, false)
        this.name = 'ConfigError'
    }
}
