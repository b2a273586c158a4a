import { describe, expect, it } from 'vitest'

import {
    EPC,
    ENERGY_PROPERTIES,
    INSTANT_PROPERTIES,
    decodeCumulativeEnergy,
    decodeEnergyUnit,
    decodeFixedEnergy,
    decodeFrame,
    decodeInstantCurrent,
    decodeMeterTimestamp,
    encodeGetRequest,
    isEchonetFrame,
    toEnergyReading,
    toInstantReading,
    validateResponse,
} from '../echonet.js'
import { ProtocolError } from '../errors.js'
import { buildResponse, defaultMeterValues } from './fakeAdapter.js'

const AT = new Date('2024-05-01T03:30:05.000Z')

describe('encodeGetRequest', () => {
    it('builds a Get for the instant properties', () => {
        const frame = encodeGetRequest(1, INSTANT_PROPERTIES)
        expect(frame.toString('hex')).toBe('1081000105ff010288016202e700e800')
    })

    it('rejects out-of-range transaction ids and empty requests', () => {
        expect(() => encodeGetRequest(0x10000, [EPC.instantPower])).toThrow(RangeError)
        expect(() => encodeGetRequest(1, [])).toThrow(RangeError)
    })
})

describe('decodeFrame', () => {
    it('parses header and properties', () => {
        const req = encodeGetRequest(0x1234, INSTANT_PROPERTIES)
        const frame = decodeFrame(buildResponse(req, defaultMeterValues()))

        expect(frame.tid).toBe(0x1234)
        expect(frame.esv).toBe(0x72)
        expect(frame.seoj.toString('hex')).toBe('028801')
        expect(frame.properties.map((p) => p.epc)).toEqual([0xe7, 0xe8])
    })

    it('rejects truncated frames', () => {
        expect(() => decodeFrame(Buffer.from('1081000102880105ff01', 'hex'))).toThrow(ProtocolError)

        const req = encodeGetRequest(1, [EPC.instantPower])
        const full = buildResponse(req, defaultMeterValues())
        expect(() => decodeFrame(full.subarray(0, full.length - 1))).toThrow(ProtocolError)
    })

    it('rejects a foreign header', () => {
        expect(() => decodeFrame(Buffer.alloc(14))).toThrow(/unexpected header/)
        expect(isEchonetFrame(Buffer.from([0x10, 0x81]))).toBe(true)
        expect(isEchonetFrame(Buffer.from([0x10]))).toBe(false)
    })
})

describe('validateResponse', () => {
    const req = encodeGetRequest(7, INSTANT_PROPERTIES)

    it('accepts a complete Get_Res from the meter', () => {
        const frame = decodeFrame(buildResponse(req, defaultMeterValues()))
        expect(() => validateResponse(frame, INSTANT_PROPERTIES)).not.toThrow()
    })

    it('rejects other service codes', () => {
        const bytes = buildResponse(req, defaultMeterValues())
        bytes.writeUInt8(0x71, 10)
        expect(() => validateResponse(decodeFrame(bytes), INSTANT_PROPERTIES)).toThrow(/unexpected ESV 0x71/)
    })

    it('rejects frames from other objects', () => {
        const bytes = buildResponse(req, defaultMeterValues())
        bytes.writeUInt8(0x87, 5)
        expect(() => validateResponse(decodeFrame(bytes), INSTANT_PROPERTIES)).toThrow(/source object 028701/)
    })

    it('rejects responses missing a requested property', () => {
        const frame = decodeFrame(buildResponse(encodeGetRequest(7, [EPC.instantPower]), defaultMeterValues()))
        expect(() => validateResponse(frame, INSTANT_PROPERTIES)).toThrow(/missing EPC 0xE8/)
    })
})

describe('property decoding', () => {
    it('scales instant current and maps 0x7FFE to null', () => {
        expect(decodeInstantCurrent(Buffer.from('0069ff9c', 'hex'))).toEqual({ r: 10.5, t: -10 })
        expect(decodeInstantCurrent(Buffer.from('00697ffe', 'hex'))).toEqual({ r: 10.5, t: null })
    })

    it('maps energy unit codes', () => {
        expect(decodeEnergyUnit(Buffer.from([0x00]))).toBe(1)
        expect(decodeEnergyUnit(Buffer.from([0x01]))).toBe(0.1)
        expect(decodeEnergyUnit(Buffer.from([0x04]))).toBe(0.0001)
        expect(decodeEnergyUnit(Buffer.from([0x0a]))).toBe(10)
        expect(decodeEnergyUnit(Buffer.from([0x0d]))).toBe(10000)
        expect(decodeEnergyUnit(Buffer.from([0x05]))).toBeNull()
    })

    it('scales cumulative energy by the unit', () => {
        expect(decodeCumulativeEnergy(Buffer.from('0000291e', 'hex'), 0.1)).toBe(1052.6)
        expect(decodeCumulativeEnergy(Buffer.from('0000291e', 'hex'), 0.01, 10)).toBe(1052.6)
    })

    it('maps the no-data sentinel to null', () => {
        expect(decodeCumulativeEnergy(Buffer.from('fffffffe', 'hex'), 0.1)).toBeNull()
    })

    it('reads binary fixed-time timestamps', () => {
        const edt = Buffer.from('07e805010c1e0000002904', 'hex')
        expect(decodeFixedEnergy(edt, 0.1)).toEqual({ timestamp: '2024-05-01 12:30:00', energy: 1050 })
    })

    it('falls back to BCD when the binary reading is not a date', () => {
        expect(decodeMeterTimestamp(Buffer.from('20240501123000', 'hex'))).toBe('2024-05-01 12:30:00')
        expect(decodeMeterTimestamp(Buffer.from('ffffffffffffff', 'hex'))).toBeNull()
    })

    it('rejects property values of the wrong length', () => {
        expect(() => decodeCumulativeEnergy(Buffer.from('0102', 'hex'), 0.1)).toThrow(ProtocolError)
    })
})

describe('readings', () => {
    it('decodes an instant reading', () => {
        const frame = decodeFrame(buildResponse(encodeGetRequest(1, INSTANT_PROPERTIES), defaultMeterValues()))
        expect(toInstantReading(frame, AT)).toEqual({
            instantPower: 1234,
            instantCurrentR: 10.5,
            instantCurrentT: null,
            timestamp: '2024-05-01T03:30:05.000Z',
        })
    })

    it('decodes an energy reading', () => {
        const frame = decodeFrame(buildResponse(encodeGetRequest(2, ENERGY_PROPERTIES), defaultMeterValues()))
        expect(toEnergyReading(frame, AT, null)).toEqual({
            cumulativeEnergy: 1052.6,
            cumulativeEnergyReverse: 25,
            fixedEnergy: { timestamp: '2024-05-01 12:30:00', energy: 1050 },
            energyUnit: 0.1,
            timestamp: '2024-05-01T03:30:05.000Z',
        })
    })

    it('yields nulls for properties the meter declined', () => {
        const values = defaultMeterValues()
        values.delete(EPC.instantPower)
        const bytes = buildResponse(encodeGetRequest(3, INSTANT_PROPERTIES), values)
        bytes.writeUInt8(0x52, 10)

        const frame = decodeFrame(bytes)
        validateResponse(frame, INSTANT_PROPERTIES)
        expect(toInstantReading(frame, AT).instantPower).toBeNull()
    })

    it('uses the previous unit when E1 is declined', () => {
        const values = defaultMeterValues()
        values.delete(EPC.energyUnit)
        const frame = decodeFrame(buildResponse(encodeGetRequest(4, ENERGY_PROPERTIES), values))

        const reading = toEnergyReading(frame, AT, 0.01)
        expect(reading.energyUnit).toBe(0.01)
        expect(reading.cumulativeEnergy).toBe(105.26)
    })
})
