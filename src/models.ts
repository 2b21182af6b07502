export type ChargerType = 'AC'|'DC'
export type PhaseType = 'Single'|'Three'|'DC'
export type CoreConfiguration = '1C'|'2C'|'3C'|'4C'

export type CalculationParameters = {
  /** Continuous-load derating multiplier (AS/NZS 3000 recommends 1.25) */
  safetyFactor: number
  /** Applied to the summed derated AC current of all circuits */
  diversityFactor: number
  dcEfficiency: number
  powerFactor: number
  /** Nominal three-phase AC system voltage (V) */
  acVoltage: number
  /** Nominal DC charger output voltage (V) */
  dcVoltage: number
}

export type ChargerSpec = { type: ChargerType; capacityKw: number; quantity: number }
export type ChargerEntry = ChargerSpec & { id: string }

export type BreakerStandard = 'AS/NZS 60898'|'AS/NZS 60947.2'
export type ProtectiveDevice = {
  standard: BreakerStandard
  curve?: 'C'
  ratingA: number
  ratedVoltage: number
  supply: 'AC'|'DC'
  poles: 1|2|3
  frame: 'MCB'|'MCCB'
  breakingCapacityKa: number
}

export type CableSelection = {
  cores: CoreConfiguration
  sizeMm2: number
  ampacityA: number
  insulation: 'PVC/XLPE'
  conductor: 'Cu'
}

export type CircuitDesign = {
  chargerType: ChargerType
  powerKw: number
  voltage: number
  phase: PhaseType
  fullLoadCurrent: number
  deratedCurrent: number
  /** Current drawn from the AC supply; equals fullLoadCurrent for AC chargers */
  acInputCurrent: number
  deratedAcCurrent: number
  breaker: ProtectiveDevice
  cable: CableSelection
}

export type SwitchboardConfig = { ratedA: number; dimensionsMm: string; busbarA: number }

export type DistributionDesign = {
  totalConnectedLoadKw: number
  totalDeratedAcCurrent: number
  diversityFactor: number
  diversifiedCurrent: number
  mainBreakerA: number
  switchboard: SwitchboardConfig
  busbarRatingA: number
  incomerCable: CableSelection
}

export type SizingFailureKind = 'BreakerRatingExceeded'|'CableAmpacityExceeded'|'DistributionBoardCapacityExceeded'
export type SizingFailure = { kind: SizingFailureKind; requiredA: number; limitA: number }

export type CircuitResult =
 | { status: 'ok'; design: CircuitDesign }
 | { status: 'failed'; failure: SizingFailure }
export type DistributionResult =
 | { status: 'ok'; design: DistributionDesign }
 | { status: 'failed'; failure: SizingFailure }
 | { status: 'noLoad' }
 | { status: 'blocked'; failedEntryIds: string[] }

export type CircuitWithQuantity = { circuit: CircuitDesign; quantity: number }
export type EntryOutcome = { entry: ChargerEntry; result: CircuitResult }
export type DesignSnapshot = { entries: EntryOutcome[]; distribution: DistributionResult }

export type TopologyNodeKind = 'Transformer'|'DistributionBoard'|'Breaker'|'Charger'|'Legend'
export type TransformerNode = { id: string; kind: 'Transformer'; ratingKva: number; primaryKv: number; secondaryV: number; impedancePct: number; vectorGroup: string }
export type DistributionBoardNode = { id: string; kind: 'DistributionBoard'; incomerA: number; sccrKa: number; busbarA: number; switchboard: SwitchboardConfig; rcd: string }
export type BreakerNode = { id: string; kind: 'Breaker'; entryId: string; device: ProtectiveDevice }
export type ChargerNode = { id: string; kind: 'Charger'; entryId: string; index: number; chargerType: ChargerType; powerKw: number; voltage: number; quantity: number }
export type LegendNode = { id: string; kind: 'Legend'; items: { label: string; color: string }[]; notes: string[] }
export type TopologyNode = TransformerNode|DistributionBoardNode|BreakerNode|ChargerNode|LegendNode
export type TopologyEdge = {
  id: string
  from: string
  to: string
  /** Absent on busbar taps inside the board */
  cable?: CableSelection
  voltage?: number
}
export type TopologyGraph = { title: string; nodes: TopologyNode[]; edges: TopologyEdge[] }
