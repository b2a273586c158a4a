// services/monitor/src/devices/smart-meter/FrameRequester.ts

import type { CommandTransport } from '../wisun-adapter/CommandTransport.js'
import type { AdapterEvent } from '../wisun-adapter/types.js'
import { toHex4 } from '../wisun-adapter/utils.js'
import { decodeFrame, encodeGetRequest, isEchonetFrame, validateResponse, type EchonetFrame } from './echonet.js'
import { ProtocolError, TransportClosedError, TransportTimeoutError } from './errors.js'
import type { MeterLinkEventSink } from './types.js'

const ECHONET_PORT = '0E1A'

export interface FrameResponse {
    frame: EchonetFrame
    /** RSSI of the received frame, when the adapter reports it. */
    rssi: number | null
}

type RequestOutcome = { ok: true; response: FrameResponse } | { ok: false; error: Error }

interface PendingRequest {
    transactionId: number
    properties: readonly number[]
    issuedAt: number
    timeoutMs: number
    timer: NodeJS.Timeout | null
    settle: (outcome: RequestOutcome) => void
}

export interface FrameRequesterDeps {
    transport: CommandTransport
    events: MeterLinkEventSink
    /** Link-local address of the joined meter, or null without a session. */
    destination: () => string | null
    /** Called with the RSSI of every unicast ECHONET Lite frame received. */
    onRssi?: (rssi: number) => void
}

/**
 * Issues ECHONET Lite Get requests over SKSENDTO and matches the ERXUDP
 * response by transaction id. At most one request is outstanding.
 */
export class FrameRequester {
    private readonly deps: FrameRequesterDeps
    private readonly timeoutMs: number
    private nextTid = 0
    private pending: PendingRequest | null = null
    private readonly unsubscribe: () => void

    constructor(deps: FrameRequesterDeps, timeoutMs: number) {
        this.deps = deps
        this.timeoutMs = timeoutMs
        this.unsubscribe = deps.transport.onEvent((evt) => this.handleEvent(evt))
    }

    public hasPending(): boolean {
        return this.pending !== null
    }

    public async request(properties: readonly number[]): Promise<FrameResponse> {
        const label = `Get ${properties.map((p) => p.toString(16).toUpperCase()).join(',')}`

        const outstanding = this.pending
        if (outstanding) {
            throw new ProtocolError(`request ${label} issued while TID ${outstanding.transactionId} is outstanding`)
        }
        const destination = this.deps.destination()
        if (!destination) {
            throw new TransportClosedError(`${label}: no session`)
        }

        this.nextTid = (this.nextTid + 1) & 0xffff
        const transactionId = this.nextTid
        const payload = encodeGetRequest(transactionId, properties)

        // Registered before sending so a fast response is never missed.
        const outcome = new Promise<RequestOutcome>((settle) => {
            this.pending = {
                transactionId,
                properties,
                issuedAt: Date.now(),
                timeoutMs: this.timeoutMs,
                timer: null,
                settle,
            }
        })

        const command = `SKSENDTO 1 ${destination} ${ECHONET_PORT} 1 0 ${toHex4(payload.length)} `
        try {
            await this.deps.transport.sendFrame(command, payload)
        } catch (err) {
            this.fail(transactionId, err instanceof Error ? err : new Error(String(err)))
        }

        // The response wait starts once the adapter has taken the frame.
        const p = this.pending
        if (p?.transactionId === transactionId) {
            p.timer = setTimeout(() => {
                this.fail(transactionId, new TransportTimeoutError(label, this.timeoutMs))
            }, this.timeoutMs)
        }

        const result = await outcome
        if (!result.ok) throw result.error
        return result.response
    }

    public cancel(reason: Error): void {
        const p = this.pending
        if (!p) return
        this.fail(p.transactionId, reason)
    }

    public dispose(): void {
        this.unsubscribe()
        this.cancel(new TransportClosedError('frame request'))
    }

    private handleEvent(evt: AdapterEvent): void {
        if (evt.kind !== 'rx') return
        if (evt.dest.toUpperCase().startsWith('FF02:')) return
        if (!isEchonetFrame(evt.payload)) return

        if (evt.rssi !== null) this.deps.onRssi?.(evt.rssi)

        const pending = this.pending
        const tid = evt.payload.length >= 4 ? evt.payload.readUInt16BE(2) : null

        if (!pending) {
            this.protocolError(`unsolicited frame (TID ${tid ?? '?'})`)
            return
        }
        if (tid !== pending.transactionId) {
            this.protocolError(`TID mismatch: expected ${pending.transactionId}, got ${tid ?? '?'}`)
            return
        }

        let frame: EchonetFrame
        try {
            frame = decodeFrame(evt.payload)
            validateResponse(frame, pending.properties)
        } catch (err) {
            const error = err instanceof ProtocolError ? err : new ProtocolError(String(err))
            this.protocolError(error.detail)
            this.fail(pending.transactionId, error)
            return
        }

        this.finish(pending.transactionId, { ok: true, response: { frame, rssi: evt.rssi } })
    }

    private fail(transactionId: number, error: Error): void {
        this.finish(transactionId, { ok: false, error })
    }

    private finish(transactionId: number, outcome: RequestOutcome): void {
        const p = this.pending
        if (!p || p.transactionId !== transactionId) return
        if (p.timer) clearTimeout(p.timer)
        this.pending = null
        p.settle(outcome)
    }

    private protocolError(detail: string): void {
        this.deps.events.publish({ kind: 'protocol-error', at: Date.now(), detail })
    }
}
