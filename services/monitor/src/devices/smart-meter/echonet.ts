// services/monitor/src/devices/smart-meter/echonet.ts

import { ProtocolError } from './errors.js'
import type { EnergyReading, FixedEnergy, InstantReading } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Constants                                                                 */
/* -------------------------------------------------------------------------- */

export const EHD = 0x1081

/** Controller (us). */
export const SEOJ_CONTROLLER = Buffer.from([0x05, 0xff, 0x01])
/** Low-voltage smart electric energy meter. */
export const EOJ_SMART_METER = Buffer.from([0x02, 0x88, 0x01])

export const ESV = {
    get: 0x62,
    getRes: 0x72,
    getSna: 0x52,
} as const

export const EPC = {
    coefficient: 0xd3,
    cumulativeEnergy: 0xe0,
    energyUnit: 0xe1,
    cumulativeEnergyReverse: 0xe3,
    instantPower: 0xe7,
    instantCurrent: 0xe8,
    fixedEnergy: 0xea,
} as const

export const INSTANT_PROPERTIES: readonly number[] = [EPC.instantPower, EPC.instantCurrent]

export const ENERGY_PROPERTIES: readonly number[] = [
    EPC.cumulativeEnergy,
    EPC.cumulativeEnergyReverse,
    EPC.fixedEnergy,
    EPC.energyUnit,
    EPC.coefficient,
]

/** E1 code → kWh per count. */
const ENERGY_UNITS: ReadonlyMap<number, number> = new Map([
    [0x00, 1],
    [0x01, 0.1],
    [0x02, 0.01],
    [0x03, 0.001],
    [0x04, 0.0001],
    [0x0a, 10],
    [0x0b, 100],
    [0x0c, 1000],
    [0x0d, 10000],
])

const NO_DATA_U32 = 0xfffffffe
const NOT_MEASURED_S16 = 0x7ffe

const HEADER_LENGTH = 12

/* -------------------------------------------------------------------------- */
/*  Frames                                                                    */
/* -------------------------------------------------------------------------- */

export interface EchonetProperty {
    epc: number
    edt: Buffer
}

export interface EchonetFrame {
    tid: number
    seoj: Buffer
    deoj: Buffer
    esv: number
    properties: EchonetProperty[]
}

/**
 * Build a Get request for `epcs` (each with PDC 0).
 */
export function encodeGetRequest(tid: number, epcs: readonly number[]): Buffer {
    if (!Number.isInteger(tid) || tid < 0 || tid > 0xffff) {
        throw new RangeError(`transaction id out of range: ${tid}`)
    }
    if (epcs.length === 0 || epcs.length > 0xff) {
        throw new RangeError(`property count out of range: ${epcs.length}`)
    }

    const frame = Buffer.alloc(HEADER_LENGTH + epcs.length * 2)
    frame.writeUInt16BE(EHD, 0)
    frame.writeUInt16BE(tid, 2)
    SEOJ_CONTROLLER.copy(frame, 4)
    EOJ_SMART_METER.copy(frame, 7)
    frame.writeUInt8(ESV.get, 10)
    frame.writeUInt8(epcs.length, 11)

    epcs.forEach((epc, i) => {
        frame.writeUInt8(epc, HEADER_LENGTH + i * 2)
        frame.writeUInt8(0, HEADER_LENGTH + i * 2 + 1)
    })

    return frame
}

export function isEchonetFrame(payload: Buffer): boolean {
    return payload.length >= 2 && payload.readUInt16BE(0) === EHD
}

/**
 * Decode the frame structure. Throws ProtocolError on anything truncated or
 * not ECHONET Lite.
 */
export function decodeFrame(payload: Buffer): EchonetFrame {
    if (payload.length < HEADER_LENGTH) {
        throw new ProtocolError(`frame too short (${payload.length} bytes)`)
    }
    if (payload.readUInt16BE(0) !== EHD) {
        throw new ProtocolError(`unexpected header 0x${payload.readUInt16BE(0).toString(16)}`)
    }

    const opc = payload.readUInt8(11)
    const properties: EchonetProperty[] = []
    let pos = HEADER_LENGTH

    for (let i = 0; i < opc; i++) {
        if (pos + 2 > payload.length) {
            throw new ProtocolError(`property ${i + 1}/${opc} truncated`)
        }
        const epc = payload.readUInt8(pos)
        const pdc = payload.readUInt8(pos + 1)
        if (pos + 2 + pdc > payload.length) {
            throw new ProtocolError(`EPC 0x${hex2(epc)} declares ${pdc} bytes past the end of the frame`)
        }
        properties.push({ epc, edt: payload.subarray(pos + 2, pos + 2 + pdc) })
        pos += 2 + pdc
    }

    return {
        tid: payload.readUInt16BE(2),
        seoj: payload.subarray(4, 7),
        deoj: payload.subarray(7, 10),
        esv: payload.readUInt8(10),
        properties,
    }
}

/**
 * Check that a decoded frame answers one of our Get requests: it comes from
 * the smart meter, carries Get_Res or Get_SNA, and lists every requested
 * property.
 */
export function validateResponse(frame: EchonetFrame, requested: readonly number[]): void {
    if (!frame.seoj.equals(EOJ_SMART_METER)) {
        throw new ProtocolError(`unexpected source object ${frame.seoj.toString('hex')}`)
    }
    if (frame.esv !== ESV.getRes && frame.esv !== ESV.getSna) {
        throw new ProtocolError(`unexpected ESV 0x${hex2(frame.esv)}`)
    }
    for (const epc of requested) {
        if (!frame.properties.some((p) => p.epc === epc)) {
            throw new ProtocolError(`response is missing EPC 0x${hex2(epc)}`)
        }
    }
}

/* -------------------------------------------------------------------------- */
/*  Property values                                                           */
/* -------------------------------------------------------------------------- */

/** E7: signed 32-bit watts. */
export function decodeInstantPower(edt: Buffer): number | null {
    if (edt.length === 0) return null
    if (edt.length !== 4) throw new ProtocolError(`E7 expects 4 bytes, got ${edt.length}`)
    return edt.readInt32BE(0)
}

/** E8: R and T phase, signed 16-bit in 0.1 A. */
export function decodeInstantCurrent(edt: Buffer): { r: number | null; t: number | null } {
    if (edt.length === 0) return { r: null, t: null }
    if (edt.length !== 4 && edt.length !== 2) {
        throw new ProtocolError(`E8 expects 4 bytes, got ${edt.length}`)
    }
    return {
        r: decodeDeciAmps(edt.readInt16BE(0)),
        t: edt.length === 4 ? decodeDeciAmps(edt.readInt16BE(2)) : null,
    }
}

function decodeDeciAmps(raw: number): number | null {
    if (raw === NOT_MEASURED_S16) return null
    return round(raw * 0.1, 1)
}

/** E1: unit code → kWh per count. Unknown codes yield null. */
export function decodeEnergyUnit(edt: Buffer): number | null {
    if (edt.length !== 1) return null
    return ENERGY_UNITS.get(edt.readUInt8(0)) ?? null
}

/** D3: multiplier applied to cumulative energy counts. */
export function decodeCoefficient(edt: Buffer): number | null {
    if (edt.length !== 4) return null
    const value = edt.readUInt32BE(0)
    return value === 0 ? null : value
}

/** E0 / E3: unsigned 32-bit count × unit × coefficient, in kWh. */
export function decodeCumulativeEnergy(edt: Buffer, unit: number, coefficient = 1): number | null {
    if (edt.length === 0) return null
    if (edt.length !== 4) throw new ProtocolError(`cumulative energy expects 4 bytes, got ${edt.length}`)
    return scaleEnergy(edt.readUInt32BE(0), unit, coefficient)
}

/**
 * EA: 7-byte timestamp (year u16, month, day, hour, minute, second) followed
 * by a u32 count. The timestamp is binary; meters that pack it as BCD are
 * recognised when the binary reading is not a valid date.
 */
export function decodeFixedEnergy(edt: Buffer, unit: number, coefficient = 1): FixedEnergy | null {
    if (edt.length === 0) return null
    if (edt.length !== 11) throw new ProtocolError(`EA expects 11 bytes, got ${edt.length}`)

    const timestamp = decodeMeterTimestamp(edt.subarray(0, 7))
    if (!timestamp) return null

    return Object.freeze({ timestamp, energy: scaleEnergy(edt.readUInt32BE(7), unit, coefficient) })
}

function scaleEnergy(raw: number, unit: number, coefficient: number): number | null {
    if (raw === NO_DATA_U32) return null
    return round(raw * unit * coefficient, 4)
}

/**
 * Formats as `YYYY-MM-DD HH:MM:SS` in the meter's local time.
 */
export function decodeMeterTimestamp(bytes: Buffer): string | null {
    const binary = {
        year: bytes.readUInt16BE(0),
        month: bytes[2],
        day: bytes[3],
        hour: bytes[4],
        minute: bytes[5],
        second: bytes[6],
    }
    if (isValidDate(binary)) return formatTimestamp(binary)

    const bcd = [...bytes].map(fromBcd)
    if (bcd.some((v) => v === null)) return null
    const [yHi, yLo, month, day, hour, minute, second] = bcd.map((v) => v ?? 0)
    const packed = { year: yHi * 100 + yLo, month, day, hour, minute, second }

    return isValidDate(packed) ? formatTimestamp(packed) : null
}

interface DateParts {
    year: number
    month: number
    day: number
    hour: number
    minute: number
    second: number
}

function isValidDate(d: DateParts): boolean {
    if (d.year < 2000 || d.year > 2099) return false
    if (d.month < 1 || d.month > 12) return false
    if (d.hour > 23 || d.minute > 59 || d.second > 59) return false
    const daysInMonth = new Date(Date.UTC(d.year, d.month, 0)).getUTCDate()
    return d.day >= 1 && d.day <= daysInMonth
}

function fromBcd(byte: number): number | null {
    const hi = byte >> 4
    const lo = byte & 0x0f
    if (hi > 9 || lo > 9) return null
    return hi * 10 + lo
}

function formatTimestamp(d: DateParts): string {
    const p = (n: number) => String(n).padStart(2, '0')
    return `${d.year}-${p(d.month)}-${p(d.day)} ${p(d.hour)}:${p(d.minute)}:${p(d.second)}`
}

/* -------------------------------------------------------------------------- */
/*  Readings                                                                  */
/* -------------------------------------------------------------------------- */

function edtOf(frame: EchonetFrame, epc: number): Buffer {
    return frame.properties.find((p) => p.epc === epc)?.edt ?? Buffer.alloc(0)
}

export function toInstantReading(frame: EchonetFrame, at: Date): InstantReading {
    const current = decodeInstantCurrent(edtOf(frame, EPC.instantCurrent))
    return {
        instantPower: decodeInstantPower(edtOf(frame, EPC.instantPower)),
        instantCurrentR: current.r,
        instantCurrentT: current.t,
        timestamp: at.toISOString(),
    }
}

/**
 * `fallbackUnit` is used when the meter declines E1 in this response (the
 * last unit seen, or 0.1).
 */
export function toEnergyReading(frame: EchonetFrame, at: Date, fallbackUnit: number | null): EnergyReading {
    const reported = decodeEnergyUnit(edtOf(frame, EPC.energyUnit))
    const unit = reported ?? fallbackUnit ?? 0.1
    const coefficient = decodeCoefficient(edtOf(frame, EPC.coefficient)) ?? 1

    return {
        cumulativeEnergy: decodeCumulativeEnergy(edtOf(frame, EPC.cumulativeEnergy), unit, coefficient),
        cumulativeEnergyReverse: decodeCumulativeEnergy(edtOf(frame, EPC.cumulativeEnergyReverse), unit, coefficient),
        fixedEnergy: decodeFixedEnergy(edtOf(frame, EPC.fixedEnergy), unit, coefficient),
        energyUnit: reported ?? fallbackUnit,
        timestamp: at.toISOString(),
    }
}

/* -------------------------------------------------------------------------- */
/*  Helpers                                                                   */
/* -------------------------------------------------------------------------- */

function round(value: number, digits: number): number {
    const f = 10 ** digits
    return Math.round(value * f) / f
}

function hex2(n: number): string {
    return n.toString(16).toUpperCase().padStart(2, '0')
}
