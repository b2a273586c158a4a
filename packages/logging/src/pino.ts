import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ChannelLogger,
    type ClientLogBuffer,
    type ClientLogLevel,
    type LoggerBundle,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS } from './channels.js'

export interface CreateLoggerOptions {
    /** Defaults to LOG_LEVEL, then 'info'. */
    level?: string
    /** Defaults to PRETTY_LOGS (true unless set to something other than 'true'). */
    pretty?: boolean
}

const CHANNEL_NAMES = new Set<string>(Object.values(LogChannel))

function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && CHANNEL_NAMES.has(value)
}

function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}

/**
 * `[{ channel }, msg]` → `[{ channel }, '<prefix> msg']`, so pretty output
 * carries the channel badge without a custom formatter.
 */
function prefixArgs(args: unknown[]): void {
    const first = args[0]
    if (typeof first !== 'object' || first === null || !('channel' in first)) return
    if (!isLogChannel(first.channel)) return

    const prefix = channelPrefix(first.channel)
    if (typeof args[1] === 'string') args[1] = `${prefix} ${args[1]}`
    else args.push(prefix)
}

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const pretty = opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const level = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    let base: Logger<LogChannel>

    const options: LoggerOptions<LogChannel> = {
        level,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            // channel already names the line; drop pino's numeric level
            level() { return { lvl: '' } }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                prefixArgs(args)
                Reflect.apply(method, base, args)
            }
        }
    }

    base = pretty
        ? pino<LogChannel>(options, pinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel,lvl'
        }))
        : pino<LogChannel>(options)

    const write = (
        ch: LogChannel,
        lvl: ClientLogLevel,
        msg: string,
        extra?: Record<string, unknown>
    ): void => {
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }

        // Info goes through the channel's own level so `logger.meter(...)`
        // and `channel(meter).info(...)` are the same line.
        if (lvl === 'info') base[ch](obj, msg)
        else base[lvl](obj, msg)

        if (!clientBuf) return
        const meta = CHANNELS[ch]
        clientBuf.push({ ts: Date.now(), channel: ch, emoji: meta.emoji, color: meta.color, level: lvl, message: msg })
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => write(ch, 'debug', msg, extra),
        info: (msg, extra) => write(ch, 'info', msg, extra),
        warn: (msg, extra) => write(ch, 'warn', msg, extra),
        error: (msg, extra) => write(ch, 'error', msg, extra),
        fatal: (msg, extra) => write(ch, 'fatal', msg, extra)
    })

    return { base, channel }
}
