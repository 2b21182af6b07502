import { create } from 'zustand'
import type { CalculationParameters, ChargerEntry, ChargerSpec, DesignSnapshot } from '../models'
import { DEFAULT_PARAMETERS, PARAMETER_KEYS } from '../config'
import { computeDesign, sizeCircuit } from '../calc'
import { parameterIssue, validateChargerSpec } from '../rules'
import { describeFailure } from '../utils/format'
import { genId, localDateString } from '../utils'

export type AddChargerResult = { ok: true; entry: ChargerEntry } | { ok: false; errors: string[] }

type State = {
  entries: ChargerEntry[]
  parameters: CalculationParameters
  designDate: string
  addCharger: (spec: ChargerSpec) => AddChargerResult
  removeCharger: (id: string) => void
  clearChargers: () => void
  setParameters: (patch: Partial<CalculationParameters>) => string[]
  resetParameters: () => void
}

export const useStore = create<State>((set, get) => ({
  entries: [],
  parameters: { ...DEFAULT_PARAMETERS },
  designDate: localDateString(new Date()),
  addCharger: (spec) => {
    const errors = validateChargerSpec(spec)
    if (errors.length) {
      console.warn('Charger entry rejected', errors)
      return { ok: false, errors }
    }
    const result = sizeCircuit(spec.type, spec.capacityKw, get().parameters)
    if (result.status === 'failed') {
      const message = describeFailure(result.failure)
      console.warn('Charger sizing failed', result.failure)
      return { ok: false, errors: [`Could not size a ${spec.capacityKw} kW ${spec.type} charger: ${message}`] }
    }
    const entry: ChargerEntry = { id: genId('charger_'), type: spec.type, capacityKw: spec.capacityKw, quantity: spec.quantity }
    set(state => ({ entries: [...state.entries, entry] }))
    return { ok: true, entry }
  },
  removeCharger: (id) => set(state => ({ entries: state.entries.filter(e => e.id !== id) })),
  clearChargers: () => set({ entries: [] }),
  setParameters: (patch) => {
    // Out-of-range values never reach the design; the last valid value stays
    const accepted: Partial<CalculationParameters> = {}
    const errors: string[] = []
    for (const key of PARAMETER_KEYS){
      const value = patch[key]
      if (value === undefined) continue
      const issue = parameterIssue(key, value)
      if (issue) errors.push(issue)
      else accepted[key] = value
    }
    if (errors.length) console.warn('Parameter change rejected', errors)
    set(state => ({ parameters: { ...state.parameters, ...accepted } }))
    return errors
  },
  resetParameters: () => set({ parameters: { ...DEFAULT_PARAMETERS } }),
}))

/** Full recompute from the current entries and parameters */
export function selectDesign(state: Pick<State, 'entries'|'parameters'>): DesignSnapshot {
  return computeDesign(state.entries, state.parameters)
}
