// services/monitor/src/devices/smart-meter/history.ts

import type { InstantReading } from './types.js'

const WINDOW_SEC = 3600

/** One hour of readings at the given fast-cycle interval. */
export function historyCapacity(fastIntervalMs: number): number {
    const sec = Math.max(1, fastIntervalMs / 1000)
    return Math.max(1, Math.floor(WINDOW_SEC / sec))
}

/**
 * Fixed-capacity ring of instant readings; appending past capacity evicts
 * the oldest.
 */
export class ReadingHistory {
    private readonly slots: Array<InstantReading | undefined>
    private head = 0
    private count = 0

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`history capacity must be a positive integer, got ${capacity}`)
        }
        this.slots = new Array<InstantReading | undefined>(capacity)
    }

    append(reading: InstantReading): void {
        const idx = (this.head + this.count) % this.capacity
        this.slots[idx] = reading
        if (this.count < this.capacity) {
            this.count += 1
        } else {
            this.head = (this.head + 1) % this.capacity
        }
    }

    get size(): number {
        return this.count
    }

    /** Oldest first. With `limit` > 0, only the newest `limit` entries. */
    toArray(limit?: number): InstantReading[] {
        const out: InstantReading[] = []
        for (let i = 0; i < this.count; i++) {
            const r = this.slots[(this.head + i) % this.capacity]
            if (r) out.push(r)
        }
        return limit !== undefined && limit > 0 ? out.slice(-limit) : out
    }

    clear(): void {
        this.slots.fill(undefined)
        this.head = 0
        this.count = 0
    }
}
