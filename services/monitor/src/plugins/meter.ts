// services/monitor/src/plugins/meter.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@broute-monitor/logging'

import type { MonitorConfig } from '../config/monitor.config.js'
import { MockMeterSource } from '../devices/smart-meter/MockMeterSource.js'
import { SmartMeterLink } from '../devices/smart-meter/SmartMeterLink.js'
import type {
    MeterDataSource,
    MeterLinkEvent,
    MeterLinkEventSink,
} from '../devices/smart-meter/types.js'
import { SerialLinePort } from '../devices/wisun-adapter/SerialLinePort.js'
import type {
    TransportDiagnostic,
    TransportDiagnosticSink,
} from '../devices/wisun-adapter/types.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        meter: MeterDataSource
        clientBuf: ClientLogBuffer
    }
}

export interface MeterPluginOptions {
    config: MonitorConfig
    /** Injected data source (tests); otherwise built from `config`. */
    source?: MeterDataSource
}

// ---- Event sinks using monitor logging -------------------------------------

export class MeterLinkLoggerEventSink implements MeterLinkEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: MeterLinkEvent): void {
        switch (evt.kind) {
            case 'reading':
            case 'poll-success':
                // High frequency -> debug only
                this.log.debug(`kind=${evt.kind}`)
                break

            case 'join-state':
                this.log.info(`kind=${evt.kind} state=${evt.state}`)
                break

            case 'join-scan-result':
                this.log.info(`kind=${evt.kind} duration=${evt.duration} found=${evt.found}`)
                break

            case 'join-attempt-failed':
                this.log.warn(
                    `kind=${evt.kind} attempt=${evt.attempt} fromCache=${evt.fromCache} error=${evt.error}`
                )
                break

            case 'session-established': {
                const s = evt.session
                this.log.info(
                    `kind=${evt.kind} channel=${s.channel} panId=${s.panId} addr=${s.linkLocalAddress} fromCache=${s.fromCache}`
                )
                break
            }

            case 'cache-invalidated':
                this.log.warn(`kind=${evt.kind} reason=${evt.reason}`)
                break

            case 'cache-error':
                this.log.warn(`kind=${evt.kind} op=${evt.operation} error=${evt.error}`)
                break

            case 'adapter-info-failed':
                this.log.warn(`kind=${evt.kind} error=${evt.error}`)
                break

            case 'protocol-error':
                this.log.warn(`kind=${evt.kind} detail=${evt.detail}`)
                break

            case 'poll-failure':
                this.log.warn(`kind=${evt.kind} cycle=${evt.cycle} code=${evt.code} error=${evt.error}`)
                break

            case 'link-state':
                this.log.info(`kind=${evt.kind} ${evt.from} -> ${evt.to} reason=${evt.reason}`)
                break

            case 'session-lost':
                this.log.warn(`kind=${evt.kind} event=${evt.eventCode.toString(16).toUpperCase()}`)
                break

            case 'reconnect-scheduled':
                this.log.info(`kind=${evt.kind} attempt=${evt.attempt} delayMs=${evt.delayMs}`)
                break

            case 'reconnect-attempt':
            case 'reconnect-succeeded':
                this.log.info(`kind=${evt.kind} attempt=${evt.attempt}`)
                break

            case 'reconnect-failed':
                this.log.warn(`kind=${evt.kind} attempt=${evt.attempt} error=${evt.error}`)
                break

            case 'fatal-error':
                this.log.error(`kind=${evt.kind} error=${evt.error}`)
                break

            case 'subscriber-dropped':
                this.log.warn(`kind=${evt.kind} dropped=${evt.dropped}`)
                break

            case 'subscriber-error':
                this.log.warn(`kind=${evt.kind} error=${evt.error}`)
                break
        }
    }
}

class TransportLoggerSink implements TransportDiagnosticSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: TransportDiagnostic): void {
        switch (evt.kind) {
            case 'line-received':
                this.log.debug(`rx ${JSON.stringify(evt.line)}`)
                break
            case 'line-unknown':
                this.log.debug(`kind=${evt.kind} line=${JSON.stringify(evt.line)}`)
                break
            case 'port-error':
            case 'listener-error':
                this.log.warn(`kind=${evt.kind} error=${evt.error}`)
                break
            case 'port-closed':
                this.log.warn(`kind=${evt.kind}`)
                break
        }
    }
}

// ---- Fanout sink -----------------------------------------------------------

export class FanoutMeterLinkEventSink implements MeterLinkEventSink {
    private readonly sinks: MeterLinkEventSink[]

    constructor(...sinks: MeterLinkEventSink[]) {
        this.sinks = sinks
    }

    publish(evt: MeterLinkEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch {
                // A bad consumer must not break the link.
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const meterPlugin: FastifyPluginAsync<MeterPluginOptions> = async (app: FastifyInstance, opts) => {
    const { channel } = createLogger('meter-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.app)
    const { config } = opts

    const buildSource = (): MeterDataSource => {
        if (config.mockMode) {
            const events = new FanoutMeterLinkEventSink(new MeterLinkLoggerEventSink(channel(LogChannel.mock)))
            return new MockMeterSource(config.link, events)
        }

        const events = new FanoutMeterLinkEventSink(new MeterLinkLoggerEventSink(channel(LogChannel.meter)))
        return new SmartMeterLink(config.link, {
            port: new SerialLinePort(config.serial),
            events,
            diagnostics: new TransportLoggerSink(channel(LogChannel.wisun)),
        })
    }

    const source = opts.source ?? buildSource()

    app.decorate('meter', source)

    app.addHook('onReady', async () => {
        logPlugin.info(`starting ${source.mode} data source`)
        await source.start()
    })

    app.addHook('onClose', async () => {
        logPlugin.info(`stopping ${source.mode} data source`)
        await source.stop().catch((err: unknown) => {
            logPlugin.warn('error stopping data source', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })
}

export default fp(meterPlugin, {
    name: 'meter-plugin',
})
