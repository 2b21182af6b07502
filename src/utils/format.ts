import type { CableSelection, ProtectiveDevice, SizingFailure } from '../models'
import { fmt } from '../utils'

/** Currents are kept at full precision and only rounded for display. */
export function fmtAmps(current: number, digits = 1): string {
  return `${fmt(current, digits)} A`
}

export function formatBreakerSpec(device: ProtectiveDevice): string {
  const parts: string[] = [device.standard]
  if (device.curve) parts.push(`${device.curve}-curve`)
  parts.push(`${device.ratingA}A`, `${device.ratedVoltage}V ${device.supply}`, `${device.poles}P`)
  return parts.join(', ')
}

export function formatCable(cable: CableSelection): string {
  return `${cable.sizeMm2} mm² ${cable.cores} ${cable.insulation} ${cable.conductor}`
}

export function describeFailure(failure: SizingFailure): string {
  const required = fmt(failure.requiredA)
  switch (failure.kind) {
    case 'BreakerRatingExceeded':
      return `Required current ${required} A exceeds the largest standard breaker rating (${failure.limitA} A).`
    case 'CableAmpacityExceeded':
      return `No cable in the AS/NZS 3008 table carries ${required} A (largest is ${failure.limitA} A).`
    case 'DistributionBoardCapacityExceeded':
      return `Diversified current ${required} A exceeds the largest standard switchboard busbar (${failure.limitA} A).`
  }
}

export const MITIGATIONS: readonly string[] = [
  'Use a higher system voltage',
  'Split the load across multiple MSBs',
  'Consult a specialist for a custom solution',
]
