import React from 'react'
import { Plus } from 'lucide-react'
import { useStore } from '../state/store'
import { CHARGER_CAPACITY_OPTIONS } from '../config'
import type { ChargerType } from '../models'
import { Button } from './ui/button'
import { Card, CardContent, CardHeader } from './ui/card'
import { Alert } from './ui/alert'

const CHARGER_TYPES: ChargerType[] = ['AC', 'DC']

export default function ChargerForm(){
  const addCharger = useStore(s=>s.addCharger)
  const [type, setType] = React.useState<ChargerType>('AC')
  const [capacityKw, setCapacityKw] = React.useState<number>(CHARGER_CAPACITY_OPTIONS.AC[0] ?? 7)
  const [quantity, setQuantity] = React.useState<number>(1)
  const [errors, setErrors] = React.useState<string[]>([])

  const options = CHARGER_CAPACITY_OPTIONS[type]

  const onTypeChange = (next: ChargerType) => {
    setType(next)
    setCapacityKw(CHARGER_CAPACITY_OPTIONS[next][0] ?? 0)
    setErrors([])
  }

  const onAdd = () => {
    const result = addCharger({ type, capacityKw, quantity })
    setErrors(result.ok ? [] : result.errors)
  }

  return (
    <Card>
      <CardHeader>Add Chargers</CardHeader>
      <CardContent className="space-y-3">
        <div className="flex flex-wrap items-end gap-4">
          <fieldset className="flex items-center gap-3">
            <legend className="text-xs text-slate-500 mb-1">Charger Type</legend>
            {CHARGER_TYPES.map(t => (
              <label key={t} className="flex items-center gap-1 text-sm">
                <input type="radio" name="charger-type" value={t} checked={type===t} onChange={()=>onTypeChange(t)} />
                {t}
              </label>
            ))}
          </fieldset>
          <label className="flex flex-col text-xs text-slate-500">
            Capacity (kW)
            <select
              aria-label="Capacity (kW)"
              className="mt-1 rounded-md border border-slate-300 px-2 py-1 text-sm text-slate-800"
              value={capacityKw}
              onChange={e=>setCapacityKw(Number(e.target.value))}
            >
              {options.map(o => <option key={o} value={o}>{o}</option>)}
            </select>
          </label>
          <label className="flex flex-col text-xs text-slate-500">
            Quantity
            <input
              aria-label="Quantity"
              type="number"
              min={1}
              step={1}
              className="mt-1 w-20 rounded-md border border-slate-300 px-2 py-1 text-sm text-slate-800"
              value={quantity}
              onChange={e=>setQuantity(Number(e.target.value))}
            />
          </label>
          <Button size="sm" onClick={onAdd}><Plus size={16} />Add Charger</Button>
        </div>
        {errors.length > 0 && (
          <Alert variant="destructive">{errors.map(e => <div key={e}>{e}</div>)}</Alert>
        )}
      </CardContent>
    </Card>
  )
}
