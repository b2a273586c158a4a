import { describe, expect, it } from 'vitest'

import { ReadingHistory, historyCapacity } from '../history.js'
import type { InstantReading } from '../types.js'

function reading(i: number): InstantReading {
    return {
        instantPower: i,
        instantCurrentR: null,
        instantCurrentT: null,
        timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, i)).toISOString(),
    }
}

describe('historyCapacity', () => {
    it('covers one hour at the fast interval', () => {
        expect(historyCapacity(5_000)).toBe(720)
        expect(historyCapacity(7_000)).toBe(514)
        expect(historyCapacity(3_600_000)).toBe(1)
    })
})

describe('ReadingHistory', () => {
    it('keeps insertion order below capacity', () => {
        const h = new ReadingHistory(3)
        h.append(reading(1))
        h.append(reading(2))

        expect(h.size).toBe(2)
        expect(h.toArray().map((r) => r.instantPower)).toEqual([1, 2])
    })

    it('evicts the oldest entries once full', () => {
        const h = new ReadingHistory(3)
        for (let i = 1; i <= 5; i++) h.append(reading(i))

        expect(h.size).toBe(3)
        expect(h.toArray().map((r) => r.instantPower)).toEqual([3, 4, 5])
    })

    it('returns only the newest entries for a limit', () => {
        const h = new ReadingHistory(4)
        for (let i = 1; i <= 6; i++) h.append(reading(i))

        expect(h.toArray(2).map((r) => r.instantPower)).toEqual([5, 6])
        expect(h.toArray(0).map((r) => r.instantPower)).toEqual([3, 4, 5, 6])
    })

    it('rejects a non-positive capacity', () => {
        expect(() => new ReadingHistory(0)).toThrow(RangeError)
    })

    it('clears', () => {
        const h = new ReadingHistory(2)
        h.append(reading(1))
        h.clear()
        expect(h.toArray()).toEqual([])
    })
})
