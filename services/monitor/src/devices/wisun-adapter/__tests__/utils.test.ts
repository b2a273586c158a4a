import { describe, expect, it } from 'vitest'

import {
    PanDescriptorBuilder,
    classifyLine,
    isLinkLocalAddress,
    lqiToRssi,
    matchesLine,
    parseErxudpLine,
    parseEventLine,
    parseFailCode,
    parseInfoLine,
    toHex4,
} from '../utils.js'

describe('classifyLine', () => {
    it('recognises reply terminators', () => {
        expect(classifyLine('OK')).toBe('ok')
        expect(classifyLine('OK 01')).toBe('ok')
        expect(classifyLine('FAIL ER04')).toBe('fail')
    })

    it('recognises asynchronous lines', () => {
        expect(classifyLine('EVENT 22 FE80:0000:0000:0000:021D:1290:1234:5678 0')).toBe('event')
        expect(classifyLine('ERXUDP FE80::1 FE80::2 0E1A 0E1A 001D129012345678 1 0012 1081')).toBe('rx')
        expect(classifyLine('EPANDESC')).toBe('pan-desc')
    })

    it('treats indented key/value lines as descriptor fields', () => {
        expect(classifyLine('  Channel:21')).toBe('pan-desc-field')
        expect(classifyLine('  Channel Page:09')).toBe('pan-desc-field')
        expect(classifyLine('Channel:21')).toBe('data')
        expect(classifyLine('EVER 1.2.10')).toBe('data')
    })
})

describe('matchesLine', () => {
    it('matches strings by equality or prefix and a space', () => {
        expect(matchesLine('OK', 'OK')).toBe(true)
        expect(matchesLine('EVER 1.2.10', 'EVER')).toBe(true)
        expect(matchesLine('EVERY', 'EVER')).toBe(false)
    })

    it('tests regular expressions against the trimmed line', () => {
        expect(matchesLine('  FE80:0000:0000:0000:021D:1290:1234:5678', /^FE80:/)).toBe(true)
    })
})

describe('parseFailCode', () => {
    it('extracts the error code', () => {
        expect(parseFailCode('FAIL ER10')).toBe('ER10')
        expect(parseFailCode('FAIL')).toBeNull()
    })
})

describe('parseEventLine', () => {
    it('parses the two-field form as side and param', () => {
        expect(parseEventLine('EVENT 21 FE80:0000:0000:0000:021D:1290:1234:5678 0 00')).toEqual({
            kind: 'event',
            code: 0x21,
            sender: 'FE80:0000:0000:0000:021D:1290:1234:5678',
            side: '0',
            param: '00',
            raw: 'EVENT 21 FE80:0000:0000:0000:021D:1290:1234:5678 0 00',
        })
    })

    it('reads a lone trailing field as the send result for EVENT 21', () => {
        const evt = parseEventLine('EVENT 21 FE80::1 01')
        expect(evt).toMatchObject({ code: 0x21, side: null, param: '01' })
    })

    it('reads a lone trailing field as the side for other events', () => {
        const evt = parseEventLine('EVENT 25 FE80::1 0')
        expect(evt).toMatchObject({ code: 0x25, side: '0', param: null })
    })

    it('rejects malformed lines', () => {
        expect(parseEventLine('EVENT')).toBeNull()
        expect(parseEventLine('EVENT ZZ FE80::1')).toBeNull()
    })
})

describe('parseErxudpLine', () => {
    const sender = 'FE80:0000:0000:0000:021D:1290:1234:5678'
    const dest = 'FE80:0000:0000:0000:021D:1290:0003:C890'

    it('parses the 9-field layout', () => {
        const evt = parseErxudpLine(`ERXUDP ${sender} ${dest} 0E1A 0E1A 001D129012345678 1 0004 10810001`)
        expect(evt).toMatchObject({
            kind: 'rx',
            sender,
            dest,
            remotePort: 0x0e1a,
            localPort: 0x0e1a,
            senderMac: '001D129012345678',
            rssi: null,
            secured: true,
        })
        if (evt?.kind !== 'rx') throw new Error('expected rx')
        expect(evt.payload.toString('hex')).toBe('10810001')
    })

    it('parses the 10-field layout with a side field', () => {
        const evt = parseErxudpLine(`ERXUDP ${sender} ${dest} 0E1A 0E1A 001D129012345678 0 0 0002 1081`)
        expect(evt).toMatchObject({ secured: false, rssi: null })
    })

    it('derives RSSI from the 11-field layout', () => {
        const evt = parseErxudpLine(`ERXUDP ${sender} ${dest} 0E1A 0E1A 001D129012345678 2D 1 0 0002 1081`)
        expect(evt).toMatchObject({ rssi: 45 - 107, secured: true })
    })

    it('rejects layouts it does not know and bad hex', () => {
        expect(parseErxudpLine(`ERXUDP ${sender} ${dest}`)).toBeNull()
        expect(parseErxudpLine(`ERXUDP ${sender} ${dest} 0E1A 0E1A 001D129012345678 1 0002 108`)).toBeNull()
    })
})

describe('PanDescriptorBuilder', () => {
    it('assembles a descriptor from field lines', () => {
        const b = new PanDescriptorBuilder()
        for (const line of [
            '  Channel:21',
            '  Channel Page:09',
            '  Pan ID:8888',
            '  Addr:001D129012345678',
            '  LQI:A0',
        ]) {
            b.add(line)
        }
        expect(b.isComplete()).toBe(false)
        b.add('  PairID:00AABBCC')
        expect(b.isComplete()).toBe(true)

        expect(b.build()).toEqual({
            channel: '21',
            channelPage: '09',
            panId: '8888',
            macAddress: '001D129012345678',
            lqi: 160,
            rssi: lqiToRssi(160),
            pairId: '00AABBCC',
        })
    })

    it('returns null without the mandatory fields', () => {
        const b = new PanDescriptorBuilder()
        b.add('  Channel:21')
        expect(b.build()).toBeNull()
    })
})

describe('helpers', () => {
    it('estimates RSSI from LQI', () => {
        expect(lqiToRssi(160)).toBe(-60.3)
        expect(lqiToRssi(0)).toBe(-104.3)
    })

    it('parses EINFO', () => {
        expect(parseInfoLine('EINFO FE80:0000:0000:0000:021D:1290:0003:C890 001D129000003C890 21 8888 FFFE')).toEqual({
            ipv6Address: 'FE80:0000:0000:0000:021D:1290:0003:C890',
            macAddress: '001D129000003C890',
            channel: '21',
            panId: '8888',
            shortAddress: 'FFFE',
        })
        expect(parseInfoLine('EINFO FE80::1')).toBeNull()
    })

    it('detects link-local addresses', () => {
        expect(isLinkLocalAddress('FE80:0000:0000:0000:021D:1290:1234:5678')).toBe(true)
        expect(isLinkLocalAddress('OK')).toBe(false)
    })

    it('formats four hex digits', () => {
        expect(toHex4(14)).toBe('000E')
        expect(toHex4(0x1a2b)).toBe('1A2B')
    })
})
