import type { CalculationParameters, ChargerSpec } from './models'
import { CHARGER_CAPACITY_OPTIONS, PARAMETER_KEYS, PARAMETER_LIMITS } from './config'

export function parameterIssue(key: keyof CalculationParameters, value: number): string | undefined {
  const limit = PARAMETER_LIMITS[key]
  if (!Number.isFinite(value)) return `${limit.label} must be a number.`
  if (value < limit.min || value > limit.max) return `${limit.label} must be between ${limit.min} and ${limit.max}${limit.unit ?? ''}.`
  return undefined
}

export function validateParameters(params: CalculationParameters): string[] {
  const warnings: string[] = []
  for (const key of PARAMETER_KEYS){
    const issue = parameterIssue(key, params[key])
    if (issue) warnings.push(issue)
  }
  return warnings
}

export function validateChargerSpec(spec: ChargerSpec): string[] {
  const warnings: string[] = []
  const options = CHARGER_CAPACITY_OPTIONS[spec.type]
  if (!options.includes(spec.capacityKw)) warnings.push(`${spec.capacityKw} kW is not an available ${spec.type} charger rating (${options.join(', ')} kW).`)
  if (!Number.isInteger(spec.quantity) || spec.quantity < 1) warnings.push('Quantity must be a whole number of at least 1.')
  return warnings
}
