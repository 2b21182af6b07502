import type {
  CalculationParameters, ChargerEntry, CircuitDesign, DistributionDesign, TopologyEdge, TopologyGraph, TopologyNode,
} from './models'

export const MIN_TRANSFORMER_KVA = 500
export const AC_CHARGER_COLOR = '#c8e6c9'
export const DC_CHARGER_COLOR = '#bbdefb'

export type SizedEntry = { entry: ChargerEntry; circuit: CircuitDesign }

/** AS/NZS 60076 distribution transformer, rounded up to 100 kVA steps */
export function transformerRatingKva(totalConnectedLoadKw: number, powerFactor: number): number {
  const kva = totalConnectedLoadKw / powerFactor
  return Math.max(Math.ceil(kva / 100) * 100, MIN_TRANSFORMER_KVA)
}

export function renderTopology(circuits: readonly SizedEntry[], distribution: DistributionDesign, params: CalculationParameters): TopologyGraph {
  const nodes: TopologyNode[] = []
  const edges: TopologyEdge[] = []

  nodes.push({
    id: 'TR',
    kind: 'Transformer',
    ratingKva: transformerRatingKva(distribution.totalConnectedLoadKw, params.powerFactor),
    primaryKv: 11,
    secondaryV: 415,
    impedancePct: 6,
    vectorGroup: 'Dyn11',
  })
  nodes.push({
    id: 'EVDB',
    kind: 'DistributionBoard',
    incomerA: distribution.mainBreakerA,
    sccrKa: 65,
    busbarA: distribution.busbarRatingA,
    switchboard: distribution.switchboard,
    rcd: 'Type B RCD (AS/NZS 3000:2018 7.9.2)',
  })
  edges.push({ id: 'TR-EVDB', from: 'TR', to: 'EVDB', cable: distribution.incomerCable, voltage: 415 })

  circuits.forEach(({ entry, circuit }, i) => {
    const breakerId = `CB_${i}`
    const chargerId = `CH_${i}`
    nodes.push({ id: breakerId, kind: 'Breaker', entryId: entry.id, device: circuit.breaker })
    nodes.push({
      id: chargerId,
      kind: 'Charger',
      entryId: entry.id,
      index: i + 1,
      chargerType: circuit.chargerType,
      powerKw: circuit.powerKw,
      voltage: circuit.voltage,
      quantity: entry.quantity,
    })
    edges.push({ id: `EVDB-${breakerId}`, from: 'EVDB', to: breakerId })
    edges.push({ id: `${breakerId}-${chargerId}`, from: breakerId, to: chargerId, cable: circuit.cable, voltage: circuit.voltage })
  })

  nodes.push({
    id: 'LEGEND',
    kind: 'Legend',
    items: [
      { label: 'AC Charger', color: AC_CHARGER_COLOR },
      { label: 'DC Charger', color: DC_CHARGER_COLOR },
    ],
    notes: ['Design to AS/NZS 3000:2018 Wiring Rules', 'EV Charging: Clause 7.9'],
  })

  return { title: 'EV CHARGER SINGLE LINE DIAGRAM (AS/NZS 3000 COMPLIANT)', nodes, edges }
}
