import React from 'react'
import { PieChart, Pie, Cell, Tooltip, ResponsiveContainer } from 'recharts'
import type { NameType, ValueType } from 'recharts/types/component/DefaultTooltipContent'
import type { LoadSlice } from '../reportData'
import { fmt } from '../utils'

export default function LoadSharePie({ data }:{ data: LoadSlice[] }){
  const total = data.reduce((a, s) => a + s.value, 0)
  if (!data.length) return null
  const tooltipFormatter = (value: ValueType, name: NameType) => {
    const amps = Number(value)
    return [`${fmt(amps)} A (${(amps/Math.max(total,1e-9)*100).toFixed(1)}%)`, String(name)]
  }

  return (
    <div className="w-full flex flex-col">
      <div className="text-sm font-semibold text-slate-700 mb-2">Derated AC current by charger</div>
      <div className="h-[240px]">
        <ResponsiveContainer width="100%" height="100%">
          <PieChart>
            <Pie data={data} dataKey="value" nameKey="label" innerRadius={50} outerRadius={90} stroke="#475569" strokeWidth={1} isAnimationActive={false}>
              {data.map(entry => (
                <Cell key={`cell-${entry.id}`} fill={entry.color} />
              ))}
            </Pie>
            <Tooltip formatter={tooltipFormatter} />
          </PieChart>
        </ResponsiveContainer>
      </div>
      <div className="text-xs text-slate-500 mt-1">Total: {fmt(total)} A</div>
    </div>
  )
}
