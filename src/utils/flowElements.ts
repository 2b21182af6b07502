import type { Edge as RFEdge, Node as RFNode } from 'reactflow'
import { MarkerType } from 'reactflow'
import type { TopologyEdge, TopologyGraph, TopologyNode } from '../models'
import { AC_CHARGER_COLOR, DC_CHARGER_COLOR } from '../sld'
import { layoutTopology, type LayoutOptions } from './autoLayout'
import { edgeColor } from './color'
import { formatCable } from './format'

export type SldNodeData = { title: string; lines: string[]; fill?: string; kind: TopologyNode['kind'] }

export function nodeTitle(node: TopologyNode): string {
  switch (node.kind) {
    case 'Transformer':
      return 'DISTRIBUTION TRANSFORMER'
    case 'DistributionBoard':
      return 'EV DISTRIBUTION BOARD'
    case 'Breaker':
      return node.device.frame
    case 'Charger':
      return `EV CHARGER ${node.index}`
    case 'Legend':
      return 'LEGEND & STANDARDS'
  }
}

export function nodeLines(node: TopologyNode): string[] {
  switch (node.kind) {
    case 'Transformer':
      return [
        `Rating: ${node.ratingKva}kVA`,
        `Voltage: ${node.primaryKv}kV/${node.secondaryV}V ±5%`,
        `Impedance: ${node.impedancePct}% (AS/NZS 60076)`,
        `Vector Group: ${node.vectorGroup}`,
      ]
    case 'DistributionBoard':
      return [
        `Incomer: ${node.incomerA}A, ${node.sccrKa}kA SCCR`,
        `Busbar: ${node.busbarA}A, Cu, 1A/mm²`,
        `Enclosure: ${node.switchboard.ratedA}A, ${node.switchboard.dimensionsMm} mm`,
        `Protection: ${node.rcd}`,
        'Standard: AS/NZS 3439.1 (Form 4B)',
      ]
    case 'Breaker':
      return [`${node.device.ratingA}A, ${node.device.breakingCapacityKa}kA`, node.device.standard]
    case 'Charger': {
      const lines = [`${node.powerKw}kW ${node.chargerType}`, `${node.voltage}V`]
      if (node.quantity > 1) lines.push(`× ${node.quantity}`)
      lines.push('AS/NZS 3000:2018 7.9')
      return lines
    }
    case 'Legend':
      return [...node.items.map(i => i.label), ...node.notes]
  }
}

export function edgeLabel(edge: TopologyEdge): string | undefined {
  if (!edge.cable) return undefined
  return `${edge.voltage ?? ''}V ${formatCable(edge.cable)} · ${edge.cable.ampacityA}A`
}

const nodeFill = (node: TopologyNode): string | undefined => {
  if (node.kind !== 'Charger') return undefined
  return node.chargerType === 'DC' ? DC_CHARGER_COLOR : AC_CHARGER_COLOR
}

export function toFlowElements(graph: TopologyGraph, options?: LayoutOptions): { nodes: RFNode<SldNodeData>[]; edges: RFEdge[] } {
  const positions = layoutTopology(graph, options)
  const nodes = graph.nodes.map((node): RFNode<SldNodeData> => ({
    id: node.id,
    type: 'sld',
    position: positions.get(node.id) ?? { x: 0, y: 0 },
    data: { title: nodeTitle(node), lines: nodeLines(node), fill: nodeFill(node), kind: node.kind },
    draggable: false,
  }))
  const edges = graph.edges.map((edge): RFEdge => {
    const color = edgeColor(edge)
    return {
      id: edge.id,
      source: edge.from,
      target: edge.to,
      type: 'smoothstep',
      label: edgeLabel(edge),
      style: { stroke: color, strokeWidth: edge.cable ? 2 : 1.5 },
      markerEnd: edge.cable ? { type: MarkerType.ArrowClosed, color } : undefined,
    }
  })
  return { nodes, edges }
}
