import type { CableSelection, CoreConfiguration, SwitchboardConfig } from './models'
import tables from './data/standards.json'

export type CableRow = { sizeMm2: number; ampacityA: number }
type IncomerStep = { maxCurrentA: number | null; sizeMm2: number }

// AS/NZS 60898 / 60947.2 preferred ratings
export const STANDARD_BREAKERS: readonly number[] = tables.breakers
// AS/NZS 3008.1, PVC/XLPE insulated copper, enclosed in conduit
export const CABLE_AMPACITY: Readonly<Record<CoreConfiguration, readonly CableRow[]>> = tables.cableAmpacity
// AS/NZS 3439 low-voltage switchgear assemblies
export const SWITCHBOARD_CATALOG: readonly SwitchboardConfig[] = tables.switchboards
export const INCOMER_CABLE_STEPS: readonly IncomerStep[] = tables.incomerCableSteps

export const MAX_BREAKER_A = STANDARD_BREAKERS[STANDARD_BREAKERS.length - 1] ?? 0

export function selectBreaker(current: number): number | undefined {
  return STANDARD_BREAKERS.find(rating => rating >= current)
}

export function maxAmpacity(cores: CoreConfiguration): number {
  return CABLE_AMPACITY[cores].reduce((max, row) => Math.max(max, row.ampacityA), 0)
}

export function selectCable(cores: CoreConfiguration, minAmpacity: number): CableSelection | undefined {
  const rows = [...CABLE_AMPACITY[cores]].sort((a, b) => a.sizeMm2 - b.sizeMm2)
  const row = rows.find(r => r.ampacityA >= minAmpacity)
  if (!row) return undefined
  return { cores, sizeMm2: row.sizeMm2, ampacityA: row.ampacityA, insulation: 'PVC/XLPE', conductor: 'Cu' }
}

export function selectSwitchboard(current: number): SwitchboardConfig | undefined {
  return SWITCHBOARD_CATALOG.find(sb => sb.busbarA >= current)
}

export function maxBusbar(): number {
  return SWITCHBOARD_CATALOG.reduce((max, sb) => Math.max(max, sb.busbarA), 0)
}

/**
 * 4-core incomer between transformer and EV board, stepped on the diversified
 * current. The last step has no upper bound.
 */
export function selectIncomerCable(current: number): CableSelection {
  const step = INCOMER_CABLE_STEPS.find(s => s.maxCurrentA === null || current <= s.maxCurrentA)
  const sizeMm2 = step?.sizeMm2 ?? 500
  const row = CABLE_AMPACITY['4C'].find(r => r.sizeMm2 === sizeMm2)
  return { cores: '4C', sizeMm2, ampacityA: row?.ampacityA ?? 0, insulation: 'PVC/XLPE', conductor: 'Cu' }
}
