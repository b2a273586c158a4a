import type {
    ConnectionStatus,
    EnergyReading,
    InstantReading,
    MeterDataSource,
    MeterReading,
    ReadingListener,
} from '../../devices/smart-meter/types.js'

export function instant(power: number, second: number): InstantReading {
    return {
        instantPower: power,
        instantCurrentR: 5.5,
        instantCurrentT: 4.5,
        timestamp: `2024-05-01T12:00:${String(second).padStart(2, '0')}.000Z`,
    }
}

/** Data source whose state the test sets directly. */
export class StubSource implements MeterDataSource {
    readonly mode = 'mock' as const
    history: InstantReading[] = []
    energy: EnergyReading | null = null
    reconnects = 0
    started = false
    stopped = false
    status: ConnectionStatus = {
        state: 'connected',
        mode: 'mock',
        channel: '33',
        panId: '8888',
        macAddress: '001D129000000001',
        ipv6Address: null,
        rssi: -65,
        rssiQuality: 'good',
        lastReadingAt: '2024-05-01T12:00:02.000Z',
        stale: false,
        consecutiveFailures: 0,
    }

    private readonly listeners = new Set<ReadingListener>()

    async start(): Promise<void> {
        this.started = true
    }

    async stop(): Promise<void> {
        this.stopped = true
    }

    latestInstantReading(): InstantReading | null {
        return this.history[this.history.length - 1] ?? null
    }

    latestEnergyReading(): EnergyReading | null {
        return this.energy
    }

    connectionStatus(): ConnectionStatus {
        return this.status
    }

    recentHistory(): InstantReading[] {
        return [...this.history]
    }

    onReading(listener: ReadingListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    async forceReconnect(): Promise<void> {
        this.reconnects += 1
    }

    emit(reading: MeterReading): void {
        for (const listener of this.listeners) void listener(reading)
    }
}
