import React from 'react'
import type { DistributionResult } from '../models'
import { MITIGATIONS, describeFailure, fmtAmps, formatCable } from '../utils/format'
import { fmt } from '../utils'
import { Card, CardContent, CardHeader } from './ui/card'
import { Alert } from './ui/alert'

function Metric({ label, value }:{ label: string, value: string }){
  return (
    <div>
      <div className="text-xs text-slate-500">{label}</div>
      <div className="text-lg font-semibold text-slate-800">{value}</div>
    </div>
  )
}

export default function SwitchboardSummary({ distribution }:{ distribution: DistributionResult }){
  if (distribution.status === 'noLoad') return null

  let body: React.ReactNode
  if (distribution.status === 'blocked') {
    body = <Alert variant="warning">Remove or change the chargers that could not be sized to calculate the main switchboard.</Alert>
  } else if (distribution.status === 'failed') {
    body = (
      <Alert variant="destructive">
        <div className="font-medium">MSB calculation failed. {describeFailure(distribution.failure)}</div>
        <div>Consider:</div>
        <ul className="list-disc pl-5">{MITIGATIONS.map(m => <li key={m}>{m}</li>)}</ul>
      </Alert>
    )
  } else {
    const d = distribution.design
    body = (
      <div className="space-y-3">
        <div className="grid grid-cols-2 gap-4 md:grid-cols-3">
          <Metric label="Total Connected Load" value={`${fmt(d.totalConnectedLoadKw)} kW`} />
          <Metric label="Total Derated AC Current" value={fmtAmps(d.totalDeratedAcCurrent)} />
          <Metric label="Diversified Current" value={fmtAmps(d.diversifiedCurrent)} />
          <Metric label="MSB Main Breaker Size" value={`${d.mainBreakerA} A`} />
          <Metric label="Recommended MSB Size" value={`${d.switchboard.ratedA}A`} />
          <Metric label="Busbar Rating" value={`${d.busbarRatingA}A`} />
        </div>
        <div className="text-sm text-slate-700"><b>MSB Dimensions:</b> {d.switchboard.dimensionsMm} mm</div>
        <div className="text-sm text-slate-700"><b>MSB Configuration:</b> {d.switchboard.ratedA}A Main Switchboard</div>
        <div className="text-sm text-slate-700"><b>Incomer Cable:</b> {formatCable(d.incomerCable)} ({d.incomerCable.ampacityA} A)</div>
      </div>
    )
  }

  return (
    <Card>
      <CardHeader>Main Switchboard (MSB) Requirements</CardHeader>
      <CardContent>{body}</CardContent>
    </Card>
  )
}
