import React from 'react'
import { RotateCcw } from 'lucide-react'
import { useStore } from '../state/store'
import { DEFAULT_PARAMETERS, PARAMETER_KEYS, PARAMETER_LIMITS } from '../config'
import { parameterIssue } from '../rules'
import type { CalculationParameters } from '../models'
import { Button } from './ui/button'
import { Card, CardContent, CardHeader } from './ui/card'
import { Alert } from './ui/alert'
import { HelpTooltip } from './ui/tooltip'

function toDrafts(params: CalculationParameters): Record<keyof CalculationParameters, string> {
  return {
    safetyFactor: String(params.safetyFactor),
    diversityFactor: String(params.diversityFactor),
    dcEfficiency: String(params.dcEfficiency),
    powerFactor: String(params.powerFactor),
    acVoltage: String(params.acVoltage),
    dcVoltage: String(params.dcVoltage),
  }
}

export default function ParametersPanel(){
  const parameters = useStore(s=>s.parameters)
  const setParameters = useStore(s=>s.setParameters)
  const resetParameters = useStore(s=>s.resetParameters)
  // Field text may be mid-edit or out of range; only valid values reach the store
  const [drafts, setDrafts] = React.useState<Record<keyof CalculationParameters, string>>(() => toDrafts(parameters))
  const warnings: string[] = []
  for (const key of PARAMETER_KEYS){
    const text = drafts[key]
    const issue = parameterIssue(key, text === '' ? Number.NaN : Number(text))
    if (issue) warnings.push(issue)
  }

  const onReset = () => {
    resetParameters()
    setDrafts(toDrafts(DEFAULT_PARAMETERS))
  }

  return (
    <Card>
      <CardHeader className="flex items-center justify-between">
        <span>Calculation Parameters</span>
        <Button size="xs" variant="outline" onClick={onReset}><RotateCcw size={12} />Defaults</Button>
      </CardHeader>
      <CardContent className="grid grid-cols-2 gap-3">
        {PARAMETER_KEYS.map(key => {
          const limit = PARAMETER_LIMITS[key]
          return (
            <label key={key} className="flex flex-col text-xs text-slate-500">
              <span className="flex items-center gap-1">
                {limit.label}{limit.unit ? ` (${limit.unit})` : ''}
                <HelpTooltip text={limit.help} />
              </span>
              <input
                aria-label={limit.label}
                type="number"
                min={limit.min}
                max={limit.max}
                step={limit.step}
                className="mt-1 rounded-md border border-slate-300 px-2 py-1 text-sm text-slate-800"
                value={drafts[key]}
                onChange={e=>{
                  const text = e.target.value
                  setDrafts(prev => ({ ...prev, [key]: text }))
                  if (text === '') return
                  const patch: Partial<CalculationParameters> = {}
                  patch[key] = Number(text)
                  setParameters(patch)
                }}
              />
            </label>
          )
        })}
        {warnings.length > 0 && (
          <div className="col-span-2">
            <Alert variant="warning">{warnings.map(w => <div key={w}>{w}</div>)}</Alert>
          </div>
        )}
      </CardContent>
    </Card>
  )
}
