export {
    LogChannel,
    type ChannelColor,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogLevel,
    type ClientLogListener,
    type ChannelLogger,
    type LoggerBundle,
} from './types.js'
export { CHANNELS, ANSI, RESET, CUSTOM_LEVELS } from './channels.js'
export { makeClientBuffer } from './buffer.js'
export { createLogger, type CreateLoggerOptions } from './pino.js'
