import React from 'react'
import { Trash2, XCircle } from 'lucide-react'
import { useStore } from '../state/store'
import type { DesignSnapshot } from '../models'
import { describeFailure, fmtAmps, formatBreakerSpec } from '../utils/format'
import { Button } from './ui/button'
import { Card, CardContent, CardHeader } from './ui/card'
import { Tooltip } from './ui/tooltip'

export default function ChargerTable({ design }:{ design: DesignSnapshot }){
  const removeCharger = useStore(s=>s.removeCharger)
  const clearChargers = useStore(s=>s.clearChargers)
  if (!design.entries.length) return null

  return (
    <Card>
      <CardHeader className="flex items-center justify-between">
        <span>Configured Chargers</span>
        <Button size="xs" variant="danger" onClick={clearChargers}><XCircle size={12} />Clear All Chargers</Button>
      </CardHeader>
      <CardContent>
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-slate-500">
              <th className="py-1">#</th>
              <th>Type</th>
              <th>Capacity (kW)</th>
              <th>Qty</th>
              <th>Derated (A)</th>
              <th>EV Breaker (A)</th>
              <th>Cable (mm²)</th>
              <th><span className="sr-only">Actions</span></th>
            </tr>
          </thead>
          <tbody>
            {design.entries.map(({ entry, result }, idx) => (
              <tr key={entry.id} className="border-t border-slate-100">
                <td className="py-1">{idx + 1}</td>
                <td>{entry.type}</td>
                <td>{entry.capacityKw}</td>
                <td>{entry.quantity}</td>
                {result.status === 'ok' ? (
                  <>
                    <td>{fmtAmps(result.design.deratedCurrent)}</td>
                    <td>
                      <Tooltip label={formatBreakerSpec(result.design.breaker)}>
                        <span>{result.design.breaker.ratingA}</span>
                      </Tooltip>
                    </td>
                    <td>{result.design.cable.sizeMm2} ({result.design.cable.cores})</td>
                  </>
                ) : (
                  <td colSpan={3} className="text-red-700">{describeFailure(result.failure)}</td>
                )}
                <td className="text-right">
                  <Button size="xs" variant="ghost" aria-label={`Remove charger ${idx + 1}`} onClick={()=>removeCharger(entry.id)}>
                    <Trash2 size={14} />
                  </Button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </CardContent>
    </Card>
  )
}
