// services/monitor/src/devices/wisun-adapter/errors.ts

export type MeterLinkErrorCode =
    | 'transport-timeout'
    | 'transport-busy'
    | 'transport-closed'
    | 'command-rejected'
    | 'aborted'
    | 'protocol-error'
    | 'join-failure'
    | 'cache-invalid'
    | 'config-error'

/**
 * Base class for every error the smart meter link raises. `retryable`
 * tells callers whether their retry policy should apply.
 */
export class MeterLinkError extends Error {
    constructor(
        public readonly code: MeterLinkErrorCode,
        message: string,
        public readonly retryable: boolean
    ) {
        super(message)
        this.name = 'MeterLinkError'
    }

    toJSON() {
        return { name: this.name, code: this.code, message: this.message, retryable: this.retryable }
    }
}

/** No terminating line (or awaited event) arrived before the deadline. */
export class TransportTimeoutError extends MeterLinkError {
    constructor(public readonly operation: string, public readonly timeoutMs: number) {
        super('transport-timeout', `${operation} timed out after ${timeoutMs}ms`, true)
        this.name = 'TransportTimeoutError'
    }
}

/** A second send was attempted while a command still awaited its reply. */
export class TransportBusyError extends MeterLinkError {
    constructor(public readonly command: string, public readonly pendingCommand: string) {
        super('transport-busy', `cannot send "${command}" while "${pendingCommand}" is pending`, false)
        this.name = 'TransportBusyError'
    }
}

export class TransportClosedError extends MeterLinkError {
    constructor(operation: string) {
        super('transport-closed', `${operation}: adapter port is not open`, true)
        this.name = 'TransportClosedError'
    }
}

/** The adapter answered `FAIL ERxx`. */
export class CommandRejectedError extends MeterLinkError {
    constructor(public readonly command: string, public readonly failCode: string | null) {
        super('command-rejected', `"${command}" rejected by adapter (${failCode ?? 'FAIL'})`, true)
        this.name = 'CommandRejectedError'
    }
}

export class LinkAbortedError extends MeterLinkError {
    constructor(operation: string) {
        super('aborted', `${operation} aborted`, false)
        this.name = 'LinkAbortedError'
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
