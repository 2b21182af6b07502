import type { TopologyGraph, TopologyNode } from '../models'

export type Position = { x: number; y: number }
export type LayoutOptions = { columnSpacing?: number; rowSpacing?: number }

const DEFAULT_COLUMN_SPACING = 320
const DEFAULT_ROW_SPACING = 150
const COLUMN_START_X = 40
const ROW_START_Y = 40

const columnOf = (node: TopologyNode): number => {
  switch (node.kind) {
    case 'Transformer':
      return 0
    case 'DistributionBoard':
      return 1
    case 'Breaker':
      return 2
    case 'Charger':
      return 3
    case 'Legend':
      return 4
  }
}

/**
 * Left-to-right columns: transformer, board, breakers, chargers, legend.
 * Each breaker shares a row with its charger; the transformer and board are
 * centred on the circuit rows.
 */
export function layoutTopology(graph: TopologyGraph, options: LayoutOptions = {}): Map<string, Position> {
  const columnSpacing = options.columnSpacing ?? DEFAULT_COLUMN_SPACING
  const rowSpacing = options.rowSpacing ?? DEFAULT_ROW_SPACING
  const positions = new Map<string, Position>()

  const circuitRows = Math.max(1, graph.nodes.filter(n => n.kind === 'Breaker').length)
  const centreY = ROW_START_Y + ((circuitRows - 1) * rowSpacing) / 2

  let breakerRow = 0
  let chargerRow = 0
  for (const node of graph.nodes) {
    const x = COLUMN_START_X + columnOf(node) * columnSpacing
    if (node.kind === 'Breaker') {
      positions.set(node.id, { x, y: ROW_START_Y + breakerRow++ * rowSpacing })
    } else if (node.kind === 'Charger') {
      positions.set(node.id, { x, y: ROW_START_Y + chargerRow++ * rowSpacing })
    } else if (node.kind === 'Legend') {
      positions.set(node.id, { x, y: ROW_START_Y })
    } else {
      positions.set(node.id, { x, y: centreY })
    }
  }
  return positions
}
