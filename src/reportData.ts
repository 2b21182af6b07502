import type { DesignSnapshot } from './models'
import { AC_CHARGER_COLOR, DC_CHARGER_COLOR } from './sld'

export type LoadSlice = {
  id: string
  label: string
  value: number
  color: string
}

/**
 * Share of the switchboard's derated AC current per configured charger entry.
 * Entries that failed sizing contribute nothing.
 */
export function buildLoadShareData(design: DesignSnapshot): LoadSlice[] {
  const slices: LoadSlice[] = []
  design.entries.forEach(({ entry, result }, i) => {
    if (result.status !== 'ok') return
    slices.push({
      id: entry.id,
      label: `Charger ${i + 1} (${entry.capacityKw} kW ${entry.type} × ${entry.quantity})`,
      value: result.design.deratedAcCurrent * entry.quantity,
      color: entry.type === 'DC' ? DC_CHARGER_COLOR : AC_CHARGER_COLOR,
    })
  })
  return slices.filter(s => s.value > 1e-9).sort((a, b) => b.value - a.value)
}
