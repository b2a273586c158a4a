// services/monitor/src/devices/smart-meter/RequestDispatcher.ts

/**
 * Single-slot mailbox in front of the adapter console.
 *
 * Poll ticks are `submit`ted and run one at a time in FIFO order. Join runs
 * go through `runExclusive`, which waits for the in-flight job and then runs
 * ahead of anything queued, even while the dispatcher is suspended.
 */

export type DispatchOutcome<T> =
    | { status: 'completed'; value: T }
    | { status: 'dropped' }

interface QueuedJob {
    run(): Promise<void>
    drop(): void
}

export class Mutex {
    private locked = false
    private readonly waiters: Array<(release: () => void) => void> = []

    async acquire(): Promise<() => void> {
        if (!this.locked) {
            this.locked = true
            return () => this.release()
        }

        return await new Promise<() => void>((resolve) => {
            this.waiters.push(resolve)
        })
    }

    private release() {
        const next = this.waiters.shift()
        if (next) {
            // still locked, transfer ownership
            next(() => this.release())
            return
        }
        this.locked = false
    }

    isLocked(): boolean {
        return this.locked
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire()
        try {
            return await fn()
        } finally {
            release()
        }
    }
}

export class RequestDispatcher {
    private readonly mutex = new Mutex()
    private readonly queue: QueuedJob[] = []
    private pumping = false
    private suspended = false

    /**
     * Queue a job. While suspended (or if suspended before it starts) the
     * job is dropped instead of run.
     */
    submit<T>(job: () => Promise<T>): Promise<DispatchOutcome<T>> {
        if (this.suspended) return Promise.resolve({ status: 'dropped' })

        return new Promise<DispatchOutcome<T>>((resolve, reject) => {
            this.queue.push({
                run: async () => {
                    if (this.suspended) {
                        resolve({ status: 'dropped' })
                        return
                    }
                    try {
                        resolve({ status: 'completed', value: await job() })
                    } catch (err) {
                        reject(err)
                    }
                },
                drop: () => resolve({ status: 'dropped' }),
            })
            this.pump()
        })
    }

    runExclusive<T>(job: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(job)
    }

    /**
     * Drop queued jobs and stop dispatching. Resolves once the in-flight job
     * (if any) has finished.
     */
    async suspend(): Promise<void> {
        this.suspended = true
        for (const job of this.queue.splice(0)) job.drop()
        await this.mutex.runExclusive(async () => undefined)
    }

    resume(): void {
        if (!this.suspended) return
        this.suspended = false
        this.pump()
    }

    isSuspended(): boolean {
        return this.suspended
    }

    get pending(): number {
        return this.queue.length
    }

    get busy(): boolean {
        return this.mutex.isLocked()
    }

    private pump(): void {
        if (this.pumping || this.suspended) return
        const next = this.queue.shift()
        if (!next) return

        this.pumping = true
        void this.mutex.runExclusive(() => next.run()).then(() => {
            this.pumping = false
            this.pump()
        })
    }
}
