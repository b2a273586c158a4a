// services/monitor/src/devices/smart-meter/utils.ts

import type { RssiQuality } from './types.js'

/**
 * Exponential backoff: base, 2×base, 4×base … clamped to max.
 */
export function computeReconnectDelay(
    baseDelayMs: number,
    maxDelayMs: number,
    attempt: number
): number {
    if (baseDelayMs <= 0) baseDelayMs = 1000
    if (maxDelayMs < baseDelayMs) maxDelayMs = baseDelayMs

    const exp = Math.pow(2, Math.max(0, attempt - 1))
    let candidate = baseDelayMs * exp

    if (candidate > maxDelayMs) candidate = maxDelayMs
    if (candidate < baseDelayMs) candidate = baseDelayMs

    return candidate
}

export function rssiQuality(rssi: number | null): RssiQuality | null {
    if (rssi === null) return null
    if (rssi >= -60) return 'excellent'
    if (rssi >= -70) return 'good'
    if (rssi >= -80) return 'fair'
    return 'poor'
}

/** Resolves after `ms`, or rejects with `onAbort()` as soon as the signal fires. */
export function abortableSleep(ms: number, signal: AbortSignal | undefined, onAbort: () => Error): Promise<void> {
    if (signal?.aborted) return Promise.reject(onAbort())

    return new Promise<void>((resolve, reject) => {
        const abort = () => {
            clearTimeout(timer)
            reject(onAbort())
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', abort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', abort, { once: true })
    })
}
