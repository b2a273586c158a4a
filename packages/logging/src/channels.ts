import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.orchestrator]: { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:          { emoji: '📦', color: 'blue' },
    [LogChannel.request]:      { emoji: '📝', color: 'purple' },
    [LogChannel.websocket]:    { emoji: '🔗', color: 'cyan' },
    [LogChannel.wisun]:        { emoji: '📡', color: 'magenta' },
    [LogChannel.meter]:        { emoji: '🔌', color: 'yellow' },
    [LogChannel.mock]:         { emoji: '🧪', color: 'green' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// Channel names double as pino custom levels so `logger.meter(...)` works.
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.orchestrator]: 30,
    [LogChannel.app]:          30,
    [LogChannel.request]:      30,
    [LogChannel.websocket]:    30,
    [LogChannel.wisun]:        30,
    [LogChannel.meter]:        30,
    [LogChannel.mock]:         30,
}
