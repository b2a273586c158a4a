// services/monitor/src/devices/wisun-adapter/CommandTransport.ts

import {
    CommandRejectedError,
    LinkAbortedError,
    TransportBusyError,
    TransportClosedError,
    TransportTimeoutError,
    errorMessage,
} from './errors.js'
import type {
    AdapterEvent,
    AdapterEventListener,
    CommandOptions,
    CommandResponse,
    LineMatcher,
    LinePort,
    TransportDiagnostic,
    TransportDiagnosticSink,
    TransportStats,
} from './types.js'
import {
    PanDescriptorBuilder,
    classifyLine,
    matchesLine,
    parseErxudpLine,
    parseEventLine,
    parseFailCode,
} from './utils.js'

export interface CommandTransportOptions {
    /** Default bounded wait for a command's terminator. */
    commandTimeoutMs: number
    /** Per-subscription buffer for `subscribeEvents()`; oldest events are dropped beyond it. */
    subscriptionBuffer: number
}

const DEFAULT_OPTIONS: CommandTransportOptions = {
    commandTimeoutMs: 5_000,
    subscriptionBuffer: 256,
}

const DEFAULT_TERMINATORS: LineMatcher[] = ['OK']

interface PendingCommand {
    command: string
    terminators: LineMatcher[]
    lines: string[]
    timer: NodeJS.Timeout
    resolve: (res: CommandResponse) => void
    reject: (err: Error) => void
}

/**
 * Line-oriented command/response channel to the Wi-SUN adapter.
 *
 * At most one command is in flight. Asynchronous lines (EVENT, ERXUDP,
 * EPANDESC) interleave freely with replies and are always routed to event
 * listeners, never into a command's reply.
 */
export class CommandTransport {
    private readonly port: LinePort
    private readonly options: CommandTransportOptions
    private readonly diagnostics: TransportDiagnosticSink | null

    private pending: PendingCommand | null = null
    private panBuilder: PanDescriptorBuilder | null = null
    private readonly listeners = new Set<AdapterEventListener>()
    private readonly subscriptions = new Set<EventSubscription>()

    private wired = false
    private closed = true

    private readonly stats: TransportStats = {
        commandsSent: 0,
        commandTimeouts: 0,
        linesReceived: 0,
        eventsDispatched: 0,
        unknownLines: 0,
    }

    constructor(
        port: LinePort,
        options: Partial<CommandTransportOptions> = {},
        diagnostics?: TransportDiagnosticSink
    ) {
        this.port = port
        this.options = { ...DEFAULT_OPTIONS, ...options }
        this.diagnostics = diagnostics ?? null
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    public async open(): Promise<void> {
        if (!this.wired) {
            this.port.onLine((line) => this.handleLine(line))
            this.port.onError((err) => {
                this.emitDiagnostic({ kind: 'port-error', at: Date.now(), error: err.message })
            })
            this.port.onClose(() => {
                this.emitDiagnostic({ kind: 'port-closed', at: Date.now() })
                this.shutdown()
            })
            this.wired = true
        }

        if (!this.port.isOpen()) {
            await this.port.open()
        }
        this.closed = false
    }

    public async close(): Promise<void> {
        this.shutdown()
        await this.port.close()
    }

    public isOpen(): boolean {
        return !this.closed && this.port.isOpen()
    }

    public isBusy(): boolean {
        return this.pending !== null
    }

    public getStats(): TransportStats {
        return { ...this.stats }
    }

    /* ---------------------------------------------------------------------- */
    /*  Commands                                                              */
    /* ---------------------------------------------------------------------- */

    /**
     * Send one CRLF-terminated command and collect its reply up to a
     * terminator. A `FAIL` line always ends the reply and rejects.
     */
    public sendCommand(command: string, opts: CommandOptions = {}): Promise<CommandResponse> {
        return this.send(command, Buffer.from(`${command}\r\n`, 'ascii'), opts)
    }

    /**
     * Send a command prefix immediately followed by a binary payload, with
     * no CRLF (the SKSENDTO form).
     */
    public sendFrame(commandPrefix: string, payload: Buffer, opts: CommandOptions = {}): Promise<CommandResponse> {
        const bytes = Buffer.concat([Buffer.from(commandPrefix, 'ascii'), payload])
        return this.send(commandPrefix.trim(), bytes, opts)
    }

    private send(command: string, bytes: Buffer, opts: CommandOptions): Promise<CommandResponse> {
        if (this.pending) {
            return Promise.reject(new TransportBusyError(command, this.pending.command))
        }
        if (!this.isOpen()) {
            return Promise.reject(new TransportClosedError(command))
        }

        const timeoutMs = opts.timeoutMs ?? this.options.commandTimeoutMs
        const terminators = opts.terminators ?? DEFAULT_TERMINATORS

        return new Promise<CommandResponse>((resolve, reject) => {
            const timer = setTimeout(() => {
                if (this.pending?.timer !== timer) return
                this.pending = null
                this.stats.commandTimeouts += 1
                reject(new TransportTimeoutError(command, timeoutMs))
            }, timeoutMs)

            const pending: PendingCommand = { command, terminators, lines: [], timer, resolve, reject }
            this.pending = pending
            this.stats.commandsSent += 1

            this.port.write(bytes).catch((err: unknown) => {
                if (this.pending !== pending) return
                clearTimeout(timer)
                this.pending = null
                reject(err instanceof Error ? err : new Error(errorMessage(err)))
            })
        })
    }

    private finishPending(fn: (p: PendingCommand) => void): void {
        const p = this.pending
        if (!p) return
        clearTimeout(p.timer)
        this.pending = null
        fn(p)
    }

    /* ---------------------------------------------------------------------- */
    /*  Events                                                                */
    /* ---------------------------------------------------------------------- */

    public onEvent(listener: AdapterEventListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    /**
     * Arm a one-shot capture of the first event matching `predicate`. Arm it
     * before sending the command that triggers the event, then call
     * `wait()` once the command is acknowledged.
     */
    public waitForEvent<T extends AdapterEvent>(predicate: (evt: AdapterEvent) => evt is T): EventWaiter<T> {
        return new EventWaiter<T>((l) => this.onEvent(l), predicate)
    }

    /**
     * Async iterator over every adapter event. Ends when the transport
     * closes or the consumer breaks out of its loop.
     */
    public subscribeEvents(): AsyncIterableIterator<AdapterEvent> {
        const sub = new EventSubscription(this.options.subscriptionBuffer, () => {
            this.subscriptions.delete(sub)
        })
        if (this.closed) {
            sub.end()
        } else {
            this.subscriptions.add(sub)
        }
        return sub
    }

    private dispatch(evt: AdapterEvent): void {
        this.stats.eventsDispatched += 1

        for (const listener of [...this.listeners]) {
            try {
                listener(evt)
            } catch (err) {
                this.emitDiagnostic({ kind: 'listener-error', at: Date.now(), error: errorMessage(err) })
            }
        }
        for (const sub of this.subscriptions) {
            sub.push(evt)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Line routing                                                          */
    /* ---------------------------------------------------------------------- */

    private handleLine(line: string): void {
        if (line.trim() === '') return

        this.stats.linesReceived += 1
        this.emitDiagnostic({ kind: 'line-received', at: Date.now(), line })

        const kind = classifyLine(line)

        if (this.panBuilder) {
            if (kind === 'pan-desc-field') {
                this.panBuilder.add(line)
                if (this.panBuilder.isComplete()) this.flushPanDescriptor()
                return
            }
            this.flushPanDescriptor()
        }

        switch (kind) {
            case 'pan-desc':
                this.panBuilder = new PanDescriptorBuilder()
                return

            case 'event': {
                const evt = parseEventLine(line)
                if (evt) this.dispatch(evt)
                else this.unknownLine(line)
                return
            }

            case 'rx': {
                const evt = parseErxudpLine(line)
                if (evt) this.dispatch(evt)
                else this.unknownLine(line)
                return
            }

            case 'fail':
                if (!this.pending) {
                    this.unknownLine(line)
                    return
                }
                this.finishPending((p) => {
                    p.reject(new CommandRejectedError(p.command, parseFailCode(line)))
                })
                return

            case 'ok':
            case 'data':
            case 'pan-desc-field':
                this.replyLine(line)
                return
        }
    }

    private replyLine(line: string): void {
        const p = this.pending
        if (!p) {
            this.unknownLine(line)
            return
        }

        const trimmed = line.trim()

        // Local echo of the command itself.
        if (trimmed.startsWith('SK')) return

        p.lines.push(trimmed)

        if (p.terminators.some((m) => matchesLine(trimmed, m))) {
            this.finishPending((done) => {
                done.resolve({ lines: done.lines, terminator: trimmed })
            })
        }
    }

    private flushPanDescriptor(): void {
        const builder = this.panBuilder
        this.panBuilder = null
        const descriptor = builder?.build()
        if (descriptor) this.dispatch({ kind: 'pan-desc', descriptor })
    }

    private unknownLine(line: string): void {
        this.stats.unknownLines += 1
        this.emitDiagnostic({ kind: 'line-unknown', at: Date.now(), line })
    }

    private shutdown(): void {
        if (this.closed) return
        this.closed = true
        this.panBuilder = null

        this.finishPending((p) => {
            p.reject(new TransportClosedError(p.command))
        })

        for (const sub of [...this.subscriptions]) sub.end()
        this.subscriptions.clear()
    }

    private emitDiagnostic(evt: TransportDiagnostic): void {
        this.diagnostics?.publish(evt)
    }
}

/* -------------------------------------------------------------------------- */
/*  One-shot event capture                                                    */
/* -------------------------------------------------------------------------- */

export class EventWaiter<T extends AdapterEvent> {
    private captured: T | null = null
    private settle: ((evt: T) => void) | null = null
    private readonly unsubscribe: () => void

    constructor(
        subscribe: (listener: AdapterEventListener) => () => void,
        predicate: (evt: AdapterEvent) => evt is T
    ) {
        this.unsubscribe = subscribe((evt) => {
            if (this.captured || !predicate(evt)) return
            this.captured = evt
            this.settle?.(evt)
        })
    }

    /**
     * Resolve with the captured event, waiting up to `timeoutMs` for it if
     * it has not arrived yet. The waiter is spent afterwards.
     */
    public wait(timeoutMs: number, signal?: AbortSignal): Promise<T> {
        const captured = this.captured
        if (captured) {
            this.cancel()
            return Promise.resolve(captured)
        }
        if (signal?.aborted) {
            this.cancel()
            return Promise.reject(new LinkAbortedError('event wait'))
        }

        return new Promise<T>((resolve, reject) => {
            const onAbort = () => {
                cleanup()
                reject(new LinkAbortedError('event wait'))
            }
            const timer = setTimeout(() => {
                cleanup()
                reject(new TransportTimeoutError('event wait', timeoutMs))
            }, timeoutMs)
            const cleanup = () => {
                clearTimeout(timer)
                signal?.removeEventListener('abort', onAbort)
                this.cancel()
            }

            signal?.addEventListener('abort', onAbort, { once: true })
            this.settle = (evt) => {
                cleanup()
                resolve(evt)
            }
        })
    }

    public cancel(): void {
        this.settle = null
        this.unsubscribe()
    }
}

/* -------------------------------------------------------------------------- */
/*  Async event subscription                                                  */
/* -------------------------------------------------------------------------- */

class EventSubscription implements AsyncIterableIterator<AdapterEvent> {
    private readonly queue: AdapterEvent[] = []
    private waiter: ((res: IteratorResult<AdapterEvent>) => void) | null = null
    private done = false

    constructor(private readonly limit: number, private readonly onEnd: () => void) {}

    push(evt: AdapterEvent): void {
        if (this.done) return
        const waiter = this.waiter
        if (waiter) {
            this.waiter = null
            waiter({ value: evt, done: false })
            return
        }
        this.queue.push(evt)
        if (this.queue.length > this.limit) this.queue.shift()
    }

    end(): void {
        if (this.done) return
        this.done = true
        this.onEnd()
        const waiter = this.waiter
        this.waiter = null
        waiter?.({ value: undefined, done: true })
    }

    next(): Promise<IteratorResult<AdapterEvent>> {
        const head = this.queue.shift()
        if (head) return Promise.resolve({ value: head, done: false })
        if (this.done) return Promise.resolve({ value: undefined, done: true })
        return new Promise((resolve) => {
            this.waiter = resolve
        })
    }

    return(): Promise<IteratorResult<AdapterEvent>> {
        this.queue.length = 0
        this.end()
        return Promise.resolve({ value: undefined, done: true })
    }

    [Symbol.asyncIterator](): AsyncIterableIterator<AdapterEvent> {
        return this
    }
}
