import YAML from 'yaml'
import type { CalculationParameters, DesignSnapshot } from './models'
import { describeFailure, formatBreakerSpec, formatCable } from './utils/format'

export type ScheduleFormat = 'yaml' | 'json'

const DEFAULT_EXPORT_FORMAT: ScheduleFormat = 'yaml'

const round1 = (n: number) => Math.round(n * 10) / 10

export type ScheduleRow = {
  index: number
  type: string
  capacityKw: number
  quantity: number
  voltage?: number
  phase?: string
  fullLoadCurrentA?: number
  deratedCurrentA?: number
  acInputCurrentA?: number
  deratedAcCurrentA?: number
  breakerA?: number
  breakerSpec?: string
  cable?: string
  cableAmpacityA?: number
  error?: string
}

export type SwitchboardSchedule = {
  totalConnectedLoadKw: number
  totalDeratedAcCurrentA: number
  diversityFactor: number
  diversifiedCurrentA: number
  mainBreakerA: number
  recommendedMsbA: number
  busbarRatingA: number
  dimensionsMm: string
  configuration: string
  incomerCable: string
}

export type DesignSchedule = {
  designDate: string
  parameters: CalculationParameters
  chargers: ScheduleRow[]
  switchboard: SwitchboardSchedule | null
}

/** Display-rounded, flat view of a computed design for export */
export function buildSchedule(design: DesignSnapshot, parameters: CalculationParameters, designDate: string): DesignSchedule {
  const chargers = design.entries.map(({ entry, result }, i): ScheduleRow => {
    const base = { index: i + 1, type: entry.type, capacityKw: entry.capacityKw, quantity: entry.quantity }
    if (result.status === 'failed') return { ...base, error: describeFailure(result.failure) }
    const c = result.design
    return {
      ...base,
      voltage: c.voltage,
      phase: c.phase,
      fullLoadCurrentA: round1(c.fullLoadCurrent),
      deratedCurrentA: round1(c.deratedCurrent),
      acInputCurrentA: round1(c.acInputCurrent),
      deratedAcCurrentA: round1(c.deratedAcCurrent),
      breakerA: c.breaker.ratingA,
      breakerSpec: formatBreakerSpec(c.breaker),
      cable: formatCable(c.cable),
      cableAmpacityA: c.cable.ampacityA,
    }
  })
  const dist = design.distribution
  const switchboard: SwitchboardSchedule | null = dist.status !== 'ok' ? null : {
    totalConnectedLoadKw: round1(dist.design.totalConnectedLoadKw),
    totalDeratedAcCurrentA: round1(dist.design.totalDeratedAcCurrent),
    diversityFactor: dist.design.diversityFactor,
    diversifiedCurrentA: round1(dist.design.diversifiedCurrent),
    mainBreakerA: dist.design.mainBreakerA,
    recommendedMsbA: dist.design.switchboard.ratedA,
    busbarRatingA: dist.design.busbarRatingA,
    dimensionsMm: dist.design.switchboard.dimensionsMm,
    configuration: `${dist.design.switchboard.ratedA}A Main Switchboard`,
    incomerCable: formatCable(dist.design.incomerCable),
  }
  return { designDate, parameters: { ...parameters }, chargers, switchboard }
}

export function serializeSchedule(schedule: DesignSchedule, format: ScheduleFormat = DEFAULT_EXPORT_FORMAT): string {
  if (format === 'yaml'){
    return YAML.stringify(schedule)
  }
  return JSON.stringify(schedule, null, 2)
}

export function scheduleFileName(designDate: string, format: ScheduleFormat): string {
  return `ev_charger_design_${designDate}.${format === 'yaml' ? 'yaml' : 'json'}`
}

export function download(filename: string, content: BlobPart, mime: string){
  const blob = new Blob([content], { type: mime })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  document.body.appendChild(a)
  a.click()
  a.remove()
  URL.revokeObjectURL(url)
}
