import { describe, expect, it } from 'vitest'
import { computeDesign } from '../calc'
import { DEFAULT_PARAMETERS } from '../config'
import { renderTopology, transformerRatingKva, type SizedEntry } from '../sld'
import type { ChargerEntry, DistributionDesign, TopologyGraph } from '../models'

function buildGraph(entries: ChargerEntry[]): { graph: TopologyGraph; sized: SizedEntry[]; distribution: DistributionDesign } {
  const design = computeDesign(entries, DEFAULT_PARAMETERS)
  if (design.distribution.status !== 'ok') throw new Error('expected a sized installation')
  const sized: SizedEntry[] = []
  for (const { entry, result } of design.entries) {
    if (result.status === 'ok') sized.push({ entry, circuit: result.design })
  }
  return { graph: renderTopology(sized, design.distribution.design, DEFAULT_PARAMETERS), sized, distribution: design.distribution.design }
}

const ENTRIES: ChargerEntry[] = [
  { id: 'a', type: 'AC', capacityKw: 7, quantity: 1 },
  { id: 'b', type: 'DC', capacityKw: 50, quantity: 2 },
]

describe('transformerRatingKva', () => {
  it('rounds up to 100 kVA with a 500 kVA floor', () => {
    expect(transformerRatingKva(29, 0.95)).toBe(500)
    expect(transformerRatingKva(1000, 0.95)).toBe(1100)
  })
})

describe('renderTopology', () => {
  it('lays out transformer, board, one breaker and charger per entry, then the legend', () => {
    const { graph } = buildGraph(ENTRIES)
    expect(graph.title).toBe('EV CHARGER SINGLE LINE DIAGRAM (AS/NZS 3000 COMPLIANT)')
    expect(graph.nodes.map(n => n.id)).toEqual(['TR', 'EVDB', 'CB_0', 'CH_0', 'CB_1', 'CH_1', 'LEGEND'])
    expect(graph.edges.map(e => e.id)).toEqual(['TR-EVDB', 'EVDB-CB_0', 'CB_0-CH_0', 'EVDB-CB_1', 'CB_1-CH_1'])
  })

  it('carries the distribution design onto the transformer and board', () => {
    const { graph, distribution } = buildGraph(ENTRIES)
    const tr = graph.nodes.find(n => n.id === 'TR')
    expect(tr).toEqual({ id: 'TR', kind: 'Transformer', ratingKva: 500, primaryKv: 11, secondaryV: 415, impedancePct: 6, vectorGroup: 'Dyn11' })
    const board = graph.nodes.find(n => n.id === 'EVDB')
    expect(board).toMatchObject({
      kind: 'DistributionBoard',
      incomerA: distribution.mainBreakerA,
      busbarA: distribution.busbarRatingA,
      sccrKa: 65,
      switchboard: distribution.switchboard,
    })
    const incomer = graph.edges.find(e => e.id === 'TR-EVDB')
    expect(incomer?.cable).toBe(distribution.incomerCable)
    expect(incomer?.voltage).toBe(415)
  })

  it('takes circuit data straight from the sized circuits', () => {
    const { graph, sized } = buildGraph(ENTRIES)
    const second = sized[1]
    if (!second) throw new Error('missing circuit')
    expect(graph.nodes.find(n => n.id === 'CB_1')).toEqual({ id: 'CB_1', kind: 'Breaker', entryId: 'b', device: second.circuit.breaker })
    expect(graph.nodes.find(n => n.id === 'CH_1')).toEqual({
      id: 'CH_1', kind: 'Charger', entryId: 'b', index: 2, chargerType: 'DC', powerKw: 50, voltage: 500, quantity: 2,
    })
    const feeder = graph.edges.find(e => e.id === 'CB_1-CH_1')
    expect(feeder?.cable).toBe(second.circuit.cable)
    expect(feeder?.voltage).toBe(500)
    expect(graph.edges.find(e => e.id === 'EVDB-CB_1')?.cable).toBeUndefined()
  })
})
