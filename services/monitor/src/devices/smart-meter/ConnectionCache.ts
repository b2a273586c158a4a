// services/monitor/src/devices/smart-meter/ConnectionCache.ts

import { promises as fs } from 'node:fs'
import path from 'node:path'

import { errorMessage } from './errors.js'
import type { CachedConnection, ConnectionStore, MeterLinkEventSink } from './types.js'

const FIELDS = ['channel', 'panId', 'macAddress', 'linkLocalAddress'] as const

/**
 * Last successful join parameters, persisted as a single JSON record so a
 * restart can skip the channel scan.
 */
export class ConnectionCache implements ConnectionStore {
    constructor(
        private readonly filePath: string,
        private readonly events?: MeterLinkEventSink
    ) {}

    get path(): string {
        return this.filePath
    }

    /** Unreadable or malformed files count as absent. */
    async load(): Promise<CachedConnection | null> {
        let text: string
        try {
            text = await fs.readFile(this.filePath, 'utf8')
        } catch (err) {
            if (!isNotFound(err)) this.report('read', err)
            return null
        }

        try {
            return parseCachedConnection(JSON.parse(text))
        } catch (err) {
            this.report('read', err)
            return null
        }
    }

    async save(conn: CachedConnection): Promise<void> {
        const record: CachedConnection = {
            channel: conn.channel,
            panId: conn.panId,
            macAddress: conn.macAddress,
            linkLocalAddress: conn.linkLocalAddress,
        }
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true })
            const tmp = `${this.filePath}.tmp`
            await fs.writeFile(tmp, JSON.stringify(record, null, 2), 'utf8')
            await fs.rename(tmp, this.filePath)
        } catch (err) {
            this.report('write', err)
        }
    }

    async clear(): Promise<void> {
        try {
            await fs.unlink(this.filePath)
        } catch (err) {
            if (!isNotFound(err)) this.report('delete', err)
        }
    }

    private report(operation: 'read' | 'write' | 'delete', err: unknown): void {
        this.events?.publish({
            kind: 'cache-error',
            at: Date.now(),
            operation,
            error: errorMessage(err),
        })
    }
}

export function parseCachedConnection(value: unknown): CachedConnection | null {
    if (typeof value !== 'object' || value === null) return null

    const out: Partial<Record<(typeof FIELDS)[number], string>> = {}
    for (const key of FIELDS) {
        const field: unknown = Reflect.get(value, key)
        if (typeof field !== 'string' || field.trim() === '') return null
        out[key] = field.trim()
    }

    const { channel, panId, macAddress, linkLocalAddress } = out
    if (!channel || !panId || !macAddress || !linkLocalAddress) return null
    return { channel, panId, macAddress, linkLocalAddress }
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
