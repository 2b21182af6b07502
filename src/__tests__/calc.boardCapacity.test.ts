import { describe, expect, it, vi } from 'vitest'
import { aggregate, sizeCircuit } from '../calc'
import { DEFAULT_PARAMETERS } from '../config'
import type { SwitchboardConfig } from '../models'

const { SMALL_CATALOG } = vi.hoisted(() => {
  const catalog: SwitchboardConfig[] = [
    { ratedA: 100, dimensionsMm: '300x200x150', busbarA: 100 },
    { ratedA: 200, dimensionsMm: '400x250x200', busbarA: 200 },
  ]
  return { SMALL_CATALOG: catalog }
})

vi.mock('../standards', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../standards')>()
  return {
    ...actual,
    SWITCHBOARD_CATALOG: SMALL_CATALOG,
    selectSwitchboard: (current: number) => SMALL_CATALOG.find(sb => sb.busbarA >= current),
    maxBusbar: () => 200,
  }
})

describe('aggregate with a limited switchboard catalog', () => {
  it('reports DistributionBoardCapacityExceeded when the main breaker fits but no board does', () => {
    const sized = sizeCircuit('DC', 100, DEFAULT_PARAMETERS)
    if (sized.status !== 'ok') throw new Error('expected a sized circuit')
    const result = aggregate([{ circuit: sized.design, quantity: 2 }], DEFAULT_PARAMETERS)
    if (result.status !== 'failed') throw new Error(`expected failure, got ${result.status}`)
    expect(result.failure.kind).toBe('DistributionBoardCapacityExceeded')
    expect(result.failure.requiredA).toBeCloseTo(359.844, 3)
    expect(result.failure.limitA).toBe(200)
  })

  it('still sizes installations the catalog can hold', () => {
    const sized = sizeCircuit('AC', 22, DEFAULT_PARAMETERS)
    if (sized.status !== 'ok') throw new Error('expected a sized circuit')
    const result = aggregate([{ circuit: sized.design, quantity: 1 }], DEFAULT_PARAMETERS)
    expect(result.status).toBe('ok')
  })
})
