import { describe, expect, it } from 'vitest'
import {
  CABLE_AMPACITY, MAX_BREAKER_A, STANDARD_BREAKERS, SWITCHBOARD_CATALOG,
  maxAmpacity, maxBusbar, selectBreaker, selectCable, selectIncomerCable, selectSwitchboard,
} from '../standards'
import type { CoreConfiguration } from '../models'

const CORES: CoreConfiguration[] = ['1C', '2C', '3C', '4C']

describe('standards tables', () => {
  it('breaker ladder is strictly increasing and tops out at 2000 A', () => {
    expect(STANDARD_BREAKERS).toHaveLength(24)
    for (let i = 1; i < STANDARD_BREAKERS.length; i++) {
      expect(STANDARD_BREAKERS[i]).toBeGreaterThan(STANDARD_BREAKERS[i - 1] ?? 0)
    }
    expect(MAX_BREAKER_A).toBe(2000)
  })

  it('cable ampacity never drops as the cross-section grows', () => {
    for (const cores of CORES) {
      const rows = CABLE_AMPACITY[cores]
      expect(rows).toHaveLength(19)
      for (let i = 1; i < rows.length; i++) {
        const prev = rows[i - 1]
        const row = rows[i]
        if (!prev || !row) throw new Error('missing row')
        expect(row.sizeMm2).toBeGreaterThan(prev.sizeMm2)
        expect(row.ampacityA).toBeGreaterThanOrEqual(prev.ampacityA)
      }
    }
  })

  it('switchboard busbars cover their enclosure rating', () => {
    for (const sb of SWITCHBOARD_CATALOG) expect(sb.busbarA).toBeGreaterThanOrEqual(sb.ratedA)
    expect(maxBusbar()).toBe(3000)
  })
})

describe('selection helpers', () => {
  it('selectBreaker picks the smallest rating at or above the current', () => {
    expect(selectBreaker(38.04)).toBe(40)
    expect(selectBreaker(40)).toBe(40)
    expect(selectBreaker(40.025)).toBe(50)
    expect(selectBreaker(2000.1)).toBeUndefined()
  })

  it('selectCable walks the core table in size order', () => {
    expect(selectCable('2C', 40)).toEqual({ cores: '2C', sizeMm2: 10, ampacityA: 46, insulation: 'PVC/XLPE', conductor: 'Cu' })
    expect(selectCable('4C', 40)?.sizeMm2).toBe(16)
    expect(selectCable('4C', 40)?.ampacityA).toBe(49)
    expect(selectCable('2C', 250)?.sizeMm2).toBe(150)
    expect(selectCable('2C', 800)).toBeUndefined()
    expect(maxAmpacity('2C')).toBe(674)
    expect(maxAmpacity('4C')).toBe(555)
  })

  it('selectSwitchboard returns the first board whose busbar carries the current', () => {
    expect(selectSwitchboard(69.96)?.ratedA).toBe(100)
    expect(selectSwitchboard(100)?.ratedA).toBe(100)
    expect(selectSwitchboard(269.9)?.ratedA).toBe(400)
    expect(selectSwitchboard(3000.5)).toBeUndefined()
  })

  it('selectIncomerCable steps on the diversified current', () => {
    expect(selectIncomerCable(69.96)).toEqual({ cores: '4C', sizeMm2: 120, ampacityA: 178, insulation: 'PVC/XLPE', conductor: 'Cu' })
    expect(selectIncomerCable(250).sizeMm2).toBe(120)
    expect(selectIncomerCable(250.1).sizeMm2).toBe(185)
    expect(selectIncomerCable(719.7).ampacityA).toBe(400)
    expect(selectIncomerCable(1500)).toMatchObject({ sizeMm2: 500, ampacityA: 464 })
  })
})
