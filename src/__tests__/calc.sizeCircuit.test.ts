import { describe, expect, it } from 'vitest'
import { sizeCircuit } from '../calc'
import { CHARGER_CAPACITY_OPTIONS, DEFAULT_PARAMETERS } from '../config'
import { CABLE_AMPACITY, STANDARD_BREAKERS } from '../standards'
import type { CircuitDesign, CircuitResult } from '../models'

function expectOk(result: CircuitResult): CircuitDesign {
  if (result.status !== 'ok') throw new Error(`expected ok, got ${result.failure.kind}`)
  return result.design
}

describe('sizeCircuit', () => {
  it('sizes a 7 kW AC charger as a single-phase 230 V circuit', () => {
    const c = expectOk(sizeCircuit('AC', 7, DEFAULT_PARAMETERS))
    expect(c.voltage).toBe(230)
    expect(c.phase).toBe('Single')
    expect(c.fullLoadCurrent).toBeCloseTo(30.43, 2)
    expect(c.deratedCurrent).toBeCloseTo(38.04, 2)
    expect(c.acInputCurrent).toBe(c.fullLoadCurrent)
    expect(c.breaker).toEqual({
      standard: 'AS/NZS 60898', curve: 'C', ratingA: 40, ratedVoltage: 240, supply: 'AC', poles: 1, frame: 'MCB', breakingCapacityKa: 10,
    })
    expect(c.cable).toEqual({ cores: '2C', sizeMm2: 10, ampacityA: 46, insulation: 'PVC/XLPE', conductor: 'Cu' })
  })

  it('sizes a 22 kW AC charger as a three-phase 4-core circuit', () => {
    const c = expectOk(sizeCircuit('AC', 22, DEFAULT_PARAMETERS))
    expect(c.voltage).toBe(400)
    expect(c.phase).toBe('Three')
    expect(c.fullLoadCurrent).toBeCloseTo(31.75, 2)
    expect(c.deratedCurrent).toBeCloseTo(39.69, 2)
    expect(c.breaker.ratingA).toBe(40)
    expect(c.breaker.poles).toBe(3)
    expect(c.breaker.ratedVoltage).toBe(400)
    expect(c.cable).toMatchObject({ cores: '4C', sizeMm2: 16, ampacityA: 49 })
  })

  it('sizes a 100 kW DC charger on the DC bus and grosses up its AC input', () => {
    const c = expectOk(sizeCircuit('DC', 100, DEFAULT_PARAMETERS))
    expect(c.voltage).toBe(500)
    expect(c.phase).toBe('DC')
    expect(c.fullLoadCurrent).toBe(200)
    expect(c.deratedCurrent).toBe(250)
    expect(c.acInputCurrent).toBeCloseTo(159.93, 2)
    expect(c.deratedAcCurrent).toBeCloseTo(199.91, 2)
    expect(c.breaker).toEqual({
      standard: 'AS/NZS 60947.2', ratingA: 250, ratedVoltage: 500, supply: 'DC', poles: 2, frame: 'MCCB', breakingCapacityKa: 10,
    })
    expect(c.cable).toMatchObject({ cores: '2C', sizeMm2: 150, ampacityA: 255 })
  })

  it('sizes the cable off the breaker rating rather than the load current', () => {
    const c = expectOk(sizeCircuit('DC', 150, DEFAULT_PARAMETERS))
    expect(c.deratedCurrent).toBe(375)
    expect(c.breaker.ratingA).toBe(400)
    expect(c.cable).toMatchObject({ sizeMm2: 300, ampacityA: 409 })
  })

  it('compares the unrounded current against the breaker ladder', () => {
    const c = expectOk(sizeCircuit('DC', 16.01, DEFAULT_PARAMETERS))
    expect(c.deratedCurrent).toBeGreaterThan(40)
    expect(c.breaker.ratingA).toBe(50)
  })

  it('reports CableAmpacityExceeded when no 2-core cable carries the breaker rating', () => {
    expect(sizeCircuit('DC', 300, DEFAULT_PARAMETERS)).toEqual({
      status: 'failed',
      failure: { kind: 'CableAmpacityExceeded', requiredA: 800, limitA: 674 },
    })
  })

  it('reports BreakerRatingExceeded above the largest standard breaker', () => {
    expect(sizeCircuit('DC', 1000, DEFAULT_PARAMETERS)).toEqual({
      status: 'failed',
      failure: { kind: 'BreakerRatingExceeded', requiredA: 2500, limitA: 2000 },
    })
  })

  it('follows the supplied voltages', () => {
    const dc = expectOk(sizeCircuit('DC', 300, { ...DEFAULT_PARAMETERS, dcVoltage: 750 }))
    expect(dc.fullLoadCurrent).toBe(400)
    expect(dc.breaker.ratingA).toBe(500)
    expect(dc.breaker.ratedVoltage).toBe(750)
    expect(dc.cable).toMatchObject({ sizeMm2: 500, ampacityA: 569 })

    const ac = expectOk(sizeCircuit('DC', 100, { ...DEFAULT_PARAMETERS, acVoltage: 415 }))
    expect(ac.acInputCurrent).toBeCloseTo(154.15, 2)
  })

  it('treats AC ratings up to 7 kW as single-phase and above as three-phase', () => {
    expect(expectOk(sizeCircuit('AC', 3.6, DEFAULT_PARAMETERS)).phase).toBe('Single')
    expect(expectOk(sizeCircuit('AC', 11, DEFAULT_PARAMETERS)).phase).toBe('Three')
  })

  it('is deterministic', () => {
    expect(sizeCircuit('DC', 120, DEFAULT_PARAMETERS)).toEqual(sizeCircuit('DC', 120, DEFAULT_PARAMETERS))
  })

  it('picks the minimal breaker and cable for every menu rating it can size', () => {
    for (const type of ['AC', 'DC'] as const) {
      for (const kw of CHARGER_CAPACITY_OPTIONS[type]) {
        const result = sizeCircuit(type, kw, DEFAULT_PARAMETERS)
        if (result.status !== 'ok') continue
        const c = result.design
        const ladderIdx = STANDARD_BREAKERS.indexOf(c.breaker.ratingA)
        expect(c.breaker.ratingA).toBeGreaterThanOrEqual(c.deratedCurrent)
        if (ladderIdx > 0) expect(STANDARD_BREAKERS[ladderIdx - 1]).toBeLessThan(c.deratedCurrent)

        const rows = CABLE_AMPACITY[c.cable.cores]
        const rowIdx = rows.findIndex(r => r.sizeMm2 === c.cable.sizeMm2)
        expect(c.cable.ampacityA).toBeGreaterThanOrEqual(c.breaker.ratingA)
        if (rowIdx > 0) expect(rows[rowIdx - 1]?.ampacityA).toBeLessThan(c.breaker.ratingA)
      }
    }
  })

  it('never shrinks the breaker or cable as DC capacity grows', () => {
    let prevBreaker = 0
    let prevCable = 0
    for (const kw of CHARGER_CAPACITY_OPTIONS.DC) {
      const result = sizeCircuit('DC', kw, DEFAULT_PARAMETERS)
      if (result.status !== 'ok') break
      expect(result.design.breaker.ratingA).toBeGreaterThanOrEqual(prevBreaker)
      expect(result.design.cable.sizeMm2).toBeGreaterThanOrEqual(prevCable)
      prevBreaker = result.design.breaker.ratingA
      prevCable = result.design.cable.sizeMm2
    }
    expect(prevBreaker).toBe(400)
  })
})
