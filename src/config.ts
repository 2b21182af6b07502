import type { CalculationParameters, ChargerType } from './models'

export const DEFAULT_PARAMETERS: CalculationParameters = {
  safetyFactor: 1.25,
  diversityFactor: 0.9,
  dcEfficiency: 0.95,
  powerFactor: 0.95,
  acVoltage: 400,
  dcVoltage: 500,
}

export type ParameterLimit = { label: string; min: number; max: number; step: number; help: string; unit?: string }

export const PARAMETER_LIMITS: Record<keyof CalculationParameters, ParameterLimit> = {
  safetyFactor: { label: 'Safety Factor (continuous loads)', min: 1.0, max: 2.0, step: 0.05, help: 'AS/NZS 3000 Clause 2.5.7.2 recommends 125% for continuous loads' },
  diversityFactor: { label: 'Diversity Factor', min: 0.1, max: 1.0, step: 0.05, help: 'Factor applied to total load (AS/NZS 3000 Clause 2.2)' },
  dcEfficiency: { label: 'DC Charger Efficiency', min: 0.8, max: 1.0, step: 0.01, help: 'Typical efficiency of DC chargers (92-96%)' },
  powerFactor: { label: 'Power Factor', min: 0.8, max: 1.0, step: 0.01, help: 'Power factor for AC-DC conversion' },
  acVoltage: { label: 'AC System Voltage', min: 100, max: 500, step: 10, help: 'Three-phase AC system voltage', unit: 'V' },
  dcVoltage: { label: 'DC Charger Voltage', min: 100, max: 1000, step: 50, help: 'DC charger output voltage', unit: 'V' },
}

export const PARAMETER_KEYS: readonly (keyof CalculationParameters)[] = [
  'safetyFactor', 'diversityFactor', 'dcEfficiency', 'powerFactor', 'acVoltage', 'dcVoltage',
]

export const CHARGER_CAPACITY_OPTIONS: Record<ChargerType, readonly number[]> = {
  AC: [7, 22],
  DC: [25, 50, 75, 100, 120, 150, 300, 350],
}

// AC chargers at or below this rating are single-phase 230 V
export const SINGLE_PHASE_MAX_KW = 7
export const SINGLE_PHASE_VOLTAGE = 230
// Nameplate voltage of single-phase AS/NZS 60898 devices
export const SINGLE_PHASE_DEVICE_VOLTAGE = 240
export const MCB_MAX_A = 100
export const BRANCH_BREAKING_CAPACITY_KA = 10
