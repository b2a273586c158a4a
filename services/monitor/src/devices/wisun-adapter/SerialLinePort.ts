// services/monitor/src/devices/wisun-adapter/SerialLinePort.ts

import { SerialPort } from 'serialport'
import { ReadlineParser } from '@serialport/parser-readline'

import type { LinePort } from './types.js'

export interface SerialLinePortOptions {
    path: string
    baudRate: number
}

/**
 * LinePort over a real serial device. The adapter terminates every line with
 * CRLF; the parser strips it.
 */
export class SerialLinePort implements LinePort {
    private readonly options: SerialLinePortOptions

    private port: SerialPort | null = null
    private parser: ReadlineParser | null = null

    private readonly lineListeners: Array<(line: string) => void> = []
    private readonly errorListeners: Array<(err: Error) => void> = []
    private readonly closeListeners: Array<() => void> = []

    constructor(options: SerialLinePortOptions) {
        this.options = options
    }

    public async open(): Promise<void> {
        if (this.port?.isOpen) return

        const { path, baudRate } = this.options

        const port = new SerialPort({
            path,
            baudRate,
            autoOpen: false,
            dataBits: 8,
            parity: 'none',
            stopBits: 1,
        })

        await new Promise<void>((resolve, reject) => {
            port.open((err) => {
                if (err) reject(err)
                else resolve()
            })
        })

        const parser = port.pipe(new ReadlineParser({ delimiter: '\r\n', encoding: 'utf8' }))
        parser.on('data', (line: string) => {
            for (const cb of this.lineListeners) cb(line)
        })

        port.on('error', (err: Error) => {
            for (const cb of this.errorListeners) cb(err)
        })

        port.on('close', () => {
            this.port = null
            this.parser = null
            for (const cb of this.closeListeners) cb()
        })

        this.port = port
        this.parser = parser
    }

    public async close(): Promise<void> {
        const port = this.port
        this.port = null

        if (this.parser) {
            this.parser.removeAllListeners('data')
            this.parser = null
        }

        if (port && port.isOpen) {
            await new Promise<void>((resolve) => {
                port.close(() => resolve())
            })
        }
    }

    public isOpen(): boolean {
        return this.port?.isOpen ?? false
    }

    public async write(data: Buffer): Promise<void> {
        const port = this.port
        if (!port || !port.isOpen) {
            throw new Error('write: serial port not open')
        }

        await new Promise<void>((resolve, reject) => {
            port.write(data, (err) => {
                if (err) {
                    reject(err)
                    return
                }
                port.drain((drainErr) => {
                    if (drainErr) reject(drainErr)
                    else resolve()
                })
            })
        })
    }

    public onLine(cb: (line: string) => void): void {
        this.lineListeners.push(cb)
    }

    public onError(cb: (err: Error) => void): void {
        this.errorListeners.push(cb)
    }

    public onClose(cb: () => void): void {
        this.closeListeners.push(cb)
    }
}
