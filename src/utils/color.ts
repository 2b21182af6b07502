import type { TopologyEdge } from '../models'

const BUSBAR_COLOR = '#64748b'

// Stable hue per voltage so feeders at the same level read as one colour
export function voltageToEdgeColor(voltage?: number): string {
  if (typeof voltage !== 'number' || !isFinite(voltage)) return BUSBAR_COLOR
  const quantised = Math.round(voltage / 10)
  const hue = ((quantised * 124.89) % 360 + 360) % 360
  const lightnessPalette = [36, 42, 48]
  const lightness = lightnessPalette[quantised % lightnessPalette.length]
  return `hsl(${hue.toFixed(1)}, 52%, ${lightness}%)`
}

export function edgeColor(edge: TopologyEdge): string {
  return edge.cable ? voltageToEdgeColor(edge.voltage) : BUSBAR_COLOR
}
