import React, { useMemo } from 'react'
import ReactFlow, { Background, Controls, Handle, Position } from 'reactflow'
import type { NodeProps } from 'reactflow'
import 'reactflow/dist/style.css'
import type { TopologyGraph } from '../models'
import { toFlowElements, type SldNodeData } from '../utils/flowElements'

function SldNode({ data }: NodeProps<SldNodeData>){
  const rounded = data.kind === 'Charger' ? 'rounded-xl' : 'rounded-sm'
  return (
    <div className={`min-w-[160px] border border-slate-500 bg-white text-[11px] text-slate-800 ${rounded}`} style={data.fill ? { backgroundColor: data.fill } : undefined}>
      {data.kind !== 'Transformer' && data.kind !== 'Legend' && <Handle type="target" position={Position.Left} />}
      <div className="border-b border-slate-300 bg-slate-100 px-2 py-1 font-semibold">{data.title}</div>
      <div className="px-2 py-1 space-y-0.5">
        {data.lines.map(line => <div key={line}>{line}</div>)}
      </div>
      {data.kind !== 'Charger' && data.kind !== 'Legend' && <Handle type="source" position={Position.Right} />}
    </div>
  )
}

export default function SingleLineDiagram({ graph }:{ graph: TopologyGraph }){
  const nodeTypes = useMemo(() => ({ sld: SldNode }), [])
  const { nodes, edges } = useMemo(() => toFlowElements(graph), [graph])

  return (
    <div className="w-full rounded-xl border border-slate-200">
      <div className="px-3 pt-2 text-xs font-semibold tracking-wide text-slate-600">{graph.title}</div>
      <div className="h-[480px]">
        <ReactFlow
          nodes={nodes}
          edges={edges}
          nodeTypes={nodeTypes}
          fitView
          nodesConnectable={false}
          elementsSelectable={false}
          proOptions={{ hideAttribution: true }}
        >
          <Background />
          <Controls showInteractive={false} />
        </ReactFlow>
      </div>
    </div>
  )
}
