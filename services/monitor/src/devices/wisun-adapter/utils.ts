// services/monitor/src/devices/wisun-adapter/utils.ts

import type {
    AdapterEvent,
    AdapterInfo,
    LineKind,
    LineMatcher,
    PanDescriptor,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Line classification                                                       */
/* -------------------------------------------------------------------------- */

const PAN_DESC_FIELD = /^\s+[A-Za-z][A-Za-z ]*:\s*\S*/

/**
 * Classify one console line. Indentation is significant (EPANDESC fields are
 * indented), so pass the line untrimmed.
 */
export function classifyLine(line: string): LineKind {
    const trimmed = line.trim()

    if (trimmed === 'OK' || trimmed.startsWith('OK ')) return 'ok'
    if (trimmed === 'FAIL' || trimmed.startsWith('FAIL ')) return 'fail'
    if (trimmed.startsWith('EVENT ')) return 'event'
    if (trimmed.startsWith('ERXUDP ')) return 'rx'
    if (trimmed === 'EPANDESC') return 'pan-desc'
    if (PAN_DESC_FIELD.test(line)) return 'pan-desc-field'
    return 'data'
}

/** `FAIL ER04` → `ER04`. */
export function parseFailCode(line: string): string | null {
    const parts = line.trim().split(/\s+/)
    return parts.length >= 2 ? parts[1] : null
}

export function matchesLine(line: string, matcher: LineMatcher): boolean {
    const trimmed = line.trim()
    if (typeof matcher === 'string') {
        return trimmed === matcher || trimmed.startsWith(`${matcher} `)
    }
    return matcher.test(trimmed)
}

/* -------------------------------------------------------------------------- */
/*  EVENT / ERXUDP parsing                                                    */
/* -------------------------------------------------------------------------- */

/**
 * `EVENT <NUM> <SENDER> [<SIDE>] [<PARAM>]`. NUM is hex.
 *
 * BP35A1 omits SIDE, so a single trailing field is the PARAM for EVENT 21
 * (send result) and the SIDE otherwise.
 */
export function parseEventLine(line: string): AdapterEvent | null {
    const parts = line.trim().split(/\s+/)
    if (parts.length < 3 || parts[0] !== 'EVENT') return null

    const code = Number.parseInt(parts[1], 16)
    if (Number.isNaN(code)) return null

    const rest = parts.slice(3)
    let side: string | null = null
    let param: string | null = null

    if (rest.length >= 2) {
        side = rest[0]
        param = rest[1]
    } else if (rest.length === 1) {
        if (code === 0x21) param = rest[0]
        else side = rest[0]
    }

    return { kind: 'event', code, sender: parts[2], side, param, raw: line.trim() }
}

/**
 * ERXUDP layouts:
 *   9 fields  SENDER DEST RPORT LPORT SENDERLLA SECURED DATALEN DATA             (BP35A1)
 *   10 fields SENDER DEST RPORT LPORT SENDERLLA SECURED SIDE DATALEN DATA        (BP35C2)
 *   11 fields SENDER DEST RPORT LPORT SENDERLLA RSSI SECURED SIDE DATALEN DATA   (BP35C2, SA2=1)
 * (field counts include the ERXUDP token). DATA is ASCII hex.
 */
export function parseErxudpLine(line: string): AdapterEvent | null {
    const parts = line.trim().split(/\s+/)
    if (parts[0] !== 'ERXUDP') return null

    let rssi: number | null = null
    let securedField: string
    let data: string

    if (parts.length >= 11) {
        const raw = Number.parseInt(parts[6], 16)
        rssi = Number.isNaN(raw) ? null : raw - 107
        securedField = parts[7]
        data = parts[10]
    } else if (parts.length === 10) {
        securedField = parts[6]
        data = parts[9]
    } else if (parts.length === 9) {
        securedField = parts[6]
        data = parts[8]
    } else {
        return null
    }

    const payload = hexToBuffer(data)
    if (!payload) return null

    return {
        kind: 'rx',
        sender: parts[1],
        dest: parts[2],
        remotePort: Number.parseInt(parts[3], 16),
        localPort: Number.parseInt(parts[4], 16),
        senderMac: parts[5],
        rssi,
        secured: securedField === '1',
        payload,
        raw: line.trim(),
    }
}

/* -------------------------------------------------------------------------- */
/*  EPANDESC assembly                                                         */
/* -------------------------------------------------------------------------- */

/**
 * Accumulates the indented `Key:Value` lines following `EPANDESC`.
 */
export class PanDescriptorBuilder {
    private fields = new Map<string, string>()

    add(line: string): void {
        const trimmed = line.trim()
        const idx = trimmed.indexOf(':')
        if (idx <= 0) return
        this.fields.set(trimmed.slice(0, idx).trim().toLowerCase(), trimmed.slice(idx + 1).trim())
    }

    /** PairID is the last field the adapter prints. */
    isComplete(): boolean {
        return this.fields.has('pairid')
    }

    build(): PanDescriptor | null {
        const channel = this.fields.get('channel')
        const panId = this.fields.get('pan id')
        const macAddress = this.fields.get('addr')
        if (!channel || !panId || !macAddress) return null

        const lqiRaw = this.fields.get('lqi')
        const lqi = lqiRaw ? Number.parseInt(lqiRaw, 16) : Number.NaN

        return {
            channel,
            channelPage: this.fields.get('channel page') ?? null,
            panId,
            macAddress,
            lqi: Number.isNaN(lqi) ? null : lqi,
            rssi: Number.isNaN(lqi) ? null : lqiToRssi(lqi),
            pairId: this.fields.get('pairid') ?? null,
        }
    }
}

/** BP35A1 datasheet approximation. */
export function lqiToRssi(lqi: number): number {
    return Math.round((0.275 * lqi - 104.27) * 10) / 10
}

/* -------------------------------------------------------------------------- */
/*  Synchronous replies                                                       */
/* -------------------------------------------------------------------------- */

/** `EINFO <IPADDR> <ADDR64> <CHANNEL> <PANID> <ADDR16>` */
export function parseInfoLine(line: string): AdapterInfo | null {
    const parts = line.trim().split(/\s+/)
    if (parts[0] !== 'EINFO' || parts.length < 6) return null
    return {
        ipv6Address: parts[1],
        macAddress: parts[2],
        channel: parts[3],
        panId: parts[4],
        shortAddress: parts[5],
    }
}

const LINK_LOCAL = /^FE80:/i

export function isLinkLocalAddress(line: string): boolean {
    return LINK_LOCAL.test(line.trim())
}

/* -------------------------------------------------------------------------- */
/*  Hex helpers                                                               */
/* -------------------------------------------------------------------------- */

export function hexToBuffer(hex: string): Buffer | null {
    if (hex.length % 2 !== 0 || !/^[0-9A-Fa-f]*$/.test(hex)) return null
    return Buffer.from(hex, 'hex')
}

/** Four upper-case hex digits, as SKSENDTO expects for DATALEN. */
export function toHex4(n: number): string {
    return n.toString(16).toUpperCase().padStart(4, '0')
}
