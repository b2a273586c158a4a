// services/monitor/src/devices/smart-meter/ReadingFeed.ts

import { errorMessage } from './errors.js'
import type { MeterLinkEventSink, MeterReading, ReadingListener } from './types.js'

class Subscriber {
    private readonly queue: MeterReading[] = []
    private draining = false
    private closed = false

    constructor(
        private readonly listener: ReadingListener,
        private readonly limit: number,
        private readonly events: MeterLinkEventSink | undefined
    ) {}

    push(reading: MeterReading): void {
        if (this.closed) return

        this.queue.push(reading)
        if (this.queue.length > this.limit) {
            const dropped = this.queue.length - this.limit
            this.queue.splice(0, dropped)
            this.events?.publish({ kind: 'subscriber-dropped', at: Date.now(), dropped })
        }

        if (!this.draining) {
            this.draining = true
            queueMicrotask(() => {
                void this.drain()
            })
        }
    }

    close(): void {
        this.closed = true
        this.queue.length = 0
    }

    private async drain(): Promise<void> {
        let next = this.queue.shift()
        while (next && !this.closed) {
            try {
                await this.listener(next)
            } catch (err) {
                this.events?.publish({ kind: 'subscriber-error', at: Date.now(), error: errorMessage(err) })
            }
            next = this.queue.shift()
        }
        this.draining = false
    }
}

/**
 * Fan-out of readings to any number of subscribers. Each subscriber drains
 * its own bounded queue asynchronously; when it falls behind, the oldest
 * queued readings are dropped.
 */
export class ReadingFeed {
    private readonly subscribers = new Set<Subscriber>()

    constructor(
        private readonly queueLimit: number,
        private readonly events?: MeterLinkEventSink
    ) {}

    subscribe(listener: ReadingListener): () => void {
        const sub = new Subscriber(listener, Math.max(1, this.queueLimit), this.events)
        this.subscribers.add(sub)
        return () => {
            sub.close()
            this.subscribers.delete(sub)
        }
    }

    publish(reading: MeterReading): void {
        for (const sub of this.subscribers) sub.push(reading)
    }

    get subscriberCount(): number {
        return this.subscribers.size
    }

    close(): void {
        for (const sub of this.subscribers) sub.close()
        this.subscribers.clear()
    }
}
