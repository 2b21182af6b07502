import type {
  CalculationParameters, ChargerEntry, ChargerType, CircuitDesign, CircuitResult, CircuitWithQuantity,
  CoreConfiguration, DesignSnapshot, DistributionResult, EntryOutcome, PhaseType, ProtectiveDevice,
} from './models'
import {
  BRANCH_BREAKING_CAPACITY_KA, MCB_MAX_A, SINGLE_PHASE_DEVICE_VOLTAGE, SINGLE_PHASE_MAX_KW, SINGLE_PHASE_VOLTAGE,
} from './config'
import {
  MAX_BREAKER_A, maxAmpacity, maxBusbar, selectBreaker, selectCable, selectIncomerCable, selectSwitchboard,
} from './standards'

const SQRT3 = Math.sqrt(3)

type Configuration = { voltage: number; phase: PhaseType; cores: CoreConfiguration; current: number }

function resolveConfiguration(type: ChargerType, capacityKw: number, params: CalculationParameters): Configuration {
  const watts = capacityKw * 1000
  if (type === 'DC') {
    return { voltage: params.dcVoltage, phase: 'DC', cores: '2C', current: watts / params.dcVoltage }
  }
  if (capacityKw <= SINGLE_PHASE_MAX_KW) {
    // active + neutral
    return { voltage: SINGLE_PHASE_VOLTAGE, phase: 'Single', cores: '2C', current: watts / SINGLE_PHASE_VOLTAGE }
  }
  // three phases + neutral
  return { voltage: params.acVoltage, phase: 'Three', cores: '4C', current: watts / (params.acVoltage * SQRT3) }
}

/**
 * Current the charger draws from the three-phase AC supply. A DC charger's
 * rectifier front end draws its output power grossed up by efficiency and
 * power factor.
 */
export function acEquivalentCurrent(type: ChargerType, capacityKw: number, loadCurrent: number, params: CalculationParameters): number {
  if (type === 'AC') return loadCurrent
  const acPowerKw = capacityKw / (params.dcEfficiency * params.powerFactor)
  return (acPowerKw * 1000) / (params.acVoltage * SQRT3)
}

function protectiveDevice(config: Configuration, ratingA: number): ProtectiveDevice {
  const frame = ratingA > MCB_MAX_A ? 'MCCB' : 'MCB'
  const common = { ratingA, frame, breakingCapacityKa: BRANCH_BREAKING_CAPACITY_KA } as const
  if (config.phase === 'DC') {
    return { ...common, standard: 'AS/NZS 60947.2', ratedVoltage: config.voltage, supply: 'DC', poles: 2 }
  }
  if (config.phase === 'Single') {
    return { ...common, standard: 'AS/NZS 60898', curve: 'C', ratedVoltage: SINGLE_PHASE_DEVICE_VOLTAGE, supply: 'AC', poles: 1 }
  }
  return { ...common, standard: 'AS/NZS 60898', curve: 'C', ratedVoltage: config.voltage, supply: 'AC', poles: 3 }
}

export function sizeCircuit(type: ChargerType, capacityKw: number, params: CalculationParameters): CircuitResult {
  const config = resolveConfiguration(type, capacityKw, params)
  const acInputCurrent = acEquivalentCurrent(type, capacityKw, config.current, params)
  const deratedCurrent = config.current * params.safetyFactor
  const deratedAcCurrent = acInputCurrent * params.safetyFactor

  const ratingA = selectBreaker(deratedCurrent)
  if (ratingA === undefined) {
    return { status: 'failed', failure: { kind: 'BreakerRatingExceeded', requiredA: deratedCurrent, limitA: MAX_BREAKER_A } }
  }
  // Cable must carry whatever the breaker lets through, not just the load
  const cable = selectCable(config.cores, ratingA)
  if (!cable) {
    return { status: 'failed', failure: { kind: 'CableAmpacityExceeded', requiredA: ratingA, limitA: maxAmpacity(config.cores) } }
  }

  const design: CircuitDesign = {
    chargerType: type,
    powerKw: capacityKw,
    voltage: config.voltage,
    phase: config.phase,
    fullLoadCurrent: config.current,
    deratedCurrent,
    acInputCurrent,
    deratedAcCurrent,
    breaker: protectiveDevice(config, ratingA),
    cable,
  }
  return { status: 'ok', design }
}

export function aggregate(circuits: readonly CircuitWithQuantity[], params: CalculationParameters): DistributionResult {
  if (circuits.length === 0) return { status: 'noLoad' }

  let totalDeratedAcCurrent = 0
  let totalConnectedLoadKw = 0
  for (const { circuit, quantity } of circuits) {
    totalDeratedAcCurrent += circuit.deratedAcCurrent * quantity
    totalConnectedLoadKw += circuit.powerKw * quantity
  }
  const diversifiedCurrent = totalDeratedAcCurrent * params.diversityFactor

  const mainBreakerA = selectBreaker(diversifiedCurrent)
  if (mainBreakerA === undefined) {
    return { status: 'failed', failure: { kind: 'BreakerRatingExceeded', requiredA: diversifiedCurrent, limitA: MAX_BREAKER_A } }
  }
  const switchboard = selectSwitchboard(diversifiedCurrent)
  if (!switchboard) {
    return { status: 'failed', failure: { kind: 'DistributionBoardCapacityExceeded', requiredA: diversifiedCurrent, limitA: maxBusbar() } }
  }

  return {
    status: 'ok',
    design: {
      totalConnectedLoadKw,
      totalDeratedAcCurrent,
      diversityFactor: params.diversityFactor,
      diversifiedCurrent,
      mainBreakerA,
      switchboard,
      // 100 A copper busbar increments, independent of the enclosure rating
      busbarRatingA: Math.ceil(diversifiedCurrent / 100) * 100,
      incomerCable: selectIncomerCable(diversifiedCurrent),
    },
  }
}

/** Sizes every entry of a session snapshot and aggregates them when all succeed. */
export function computeDesign(entries: readonly ChargerEntry[], params: CalculationParameters): DesignSnapshot {
  const outcomes: EntryOutcome[] = entries.map(entry => ({ entry, result: sizeCircuit(entry.type, entry.capacityKw, params) }))
  const failedEntryIds = outcomes.filter(o => o.result.status === 'failed').map(o => o.entry.id)
  if (failedEntryIds.length) {
    return { entries: outcomes, distribution: { status: 'blocked', failedEntryIds } }
  }
  const circuits: CircuitWithQuantity[] = []
  for (const { entry, result } of outcomes) {
    if (result.status === 'ok') circuits.push({ circuit: result.design, quantity: entry.quantity })
  }
  return { entries: outcomes, distribution: aggregate(circuits, params) }
}
