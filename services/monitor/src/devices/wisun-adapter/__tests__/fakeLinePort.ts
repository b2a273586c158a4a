// services/monitor/src/devices/wisun-adapter/__tests__/fakeLinePort.ts

import type { LinePort } from '../types.js'

/** Returns the lines the adapter would print in reply to one write. */
export type Responder = (text: string, raw: Buffer) => string[] | undefined

/**
 * In-process stand-in for the adapter's serial console. Replies are emitted
 * on a microtask after each write so they never race the caller's setup.
 */
export class FakeLinePort implements LinePort {
    public readonly writes: Buffer[] = []
    public responder: Responder | null = null
    public failWrites = false

    private opened = false
    private lineCb: Array<(line: string) => void> = []
    private errorCb: Array<(err: Error) => void> = []
    private closeCb: Array<() => void> = []

    async open(): Promise<void> {
        this.opened = true
    }

    async close(): Promise<void> {
        this.opened = false
    }

    isOpen(): boolean {
        return this.opened
    }

    async write(data: Buffer): Promise<void> {
        if (this.failWrites) throw new Error('write failed')
        this.writes.push(data)
        const text = data.toString('latin1')
        const reply = this.responder?.(text, data)
        if (reply && reply.length > 0) {
            queueMicrotask(() => this.emit(...reply))
        }
    }

    /** Lines written so far, as text without CRLF. */
    get commands(): string[] {
        return this.writes.map((b) => b.toString('latin1').replace(/\r\n$/, ''))
    }

    emit(...lines: string[]): void {
        for (const line of lines) {
            for (const cb of this.lineCb) cb(line)
        }
    }

    fail(err: Error): void {
        for (const cb of this.errorCb) cb(err)
    }

    drop(): void {
        this.opened = false
        for (const cb of this.closeCb) cb()
    }

    onLine(cb: (line: string) => void): void {
        this.lineCb.push(cb)
    }

    onError(cb: (err: Error) => void): void {
        this.errorCb.push(cb)
    }

    onClose(cb: () => void): void {
        this.closeCb.push(cb)
    }
}
