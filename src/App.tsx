import React from 'react'
import { FileDown, FileSpreadsheet, FileText, Zap } from 'lucide-react'
import { ReactFlowProvider } from 'reactflow'
import { useStore } from './state/store'
import { computeDesign } from './calc'
import { renderTopology, type SizedEntry } from './sld'
import { buildSchedule, download, scheduleFileName, serializeSchedule } from './io'
import { DISCLAIMER, exportReport, technicalNotes } from './report'
import { exportSpreadsheetReport } from './spreadsheetReport'
import { buildLoadShareData } from './reportData'
import ChargerForm from './components/ChargerForm'
import ParametersPanel from './components/ParametersPanel'
import ChargerTable from './components/ChargerTable'
import SwitchboardSummary from './components/SwitchboardSummary'
import LoadSharePie from './components/LoadSharePie'
import SingleLineDiagram from './components/SingleLineDiagram'
import { Button } from './components/ui/button'
import { Card, CardContent, CardHeader } from './components/ui/card'
import { TooltipProvider } from './components/ui/tooltip'

type ErrorBoundaryState = { error: Error | null }

class ErrorBoundary extends React.Component<{children: React.ReactNode}, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error }
  }
  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    console.error('ErrorBoundary caught:', error, errorInfo)
  }
  render() {
    if (this.state.error) {
      return <div style={{padding: 32, color: 'red'}}>
        <h1>Something went wrong.</h1>
        <pre>{String(this.state.error)}</pre>
      </div>
    }
    return this.props.children
  }
}

function Workspace(){
  const entries = useStore(s=>s.entries)
  const parameters = useStore(s=>s.parameters)
  const designDate = useStore(s=>s.designDate)

  // Parameter changes invalidate every circuit, so always recompute from scratch
  const design = React.useMemo(() => computeDesign(entries, parameters), [entries, parameters])
  const graph = React.useMemo(() => {
    if (design.distribution.status !== 'ok') return null
    const sized: SizedEntry[] = []
    for (const { entry, result } of design.entries) {
      if (result.status === 'ok') sized.push({ entry, circuit: result.design })
    }
    return renderTopology(sized, design.distribution.design, parameters)
  }, [design, parameters])
  const schedule = React.useMemo(() => buildSchedule(design, parameters, designDate), [design, parameters, designDate])
  const loadShare = React.useMemo(() => buildLoadShareData(design), [design])

  const onExportYaml = () => download(scheduleFileName(designDate, 'yaml'), serializeSchedule(schedule, 'yaml'), 'text/yaml')
  const onExportJson = () => download(scheduleFileName(designDate, 'json'), serializeSchedule(schedule, 'json'), 'application/json')
  const onExportXlsx = React.useCallback(async () => {
    try {
      await exportSpreadsheetReport(schedule)
    } catch (err) {
      console.error('Failed to export spreadsheet', err)
    }
  }, [schedule])

  return (
    <div className="mx-auto max-w-6xl space-y-4 p-4">
      <header className="flex flex-wrap items-center justify-between gap-2">
        <div>
          <h1 className="flex items-center gap-2 text-2xl font-bold text-slate-900"><Zap className="text-amber-500" />EV Charger System Calculator</h1>
          <div className="text-sm text-slate-500">Australian Market - AS/NZS Standards</div>
        </div>
        <div className="flex gap-2">
          <Button size="sm" variant="outline" disabled={!entries.length} onClick={onExportYaml}><FileDown size={14} />YAML</Button>
          <Button size="sm" variant="outline" disabled={!entries.length} onClick={onExportJson}><FileDown size={14} />JSON</Button>
          <Button size="sm" variant="outline" disabled={!entries.length} onClick={()=>exportReport(schedule)}><FileText size={14} />Report</Button>
          <Button size="sm" variant="outline" disabled={!entries.length} onClick={()=>{ void onExportXlsx() }}><FileSpreadsheet size={14} />Spreadsheet</Button>
        </div>
      </header>

      <ParametersPanel />
      <ChargerForm />
      <ChargerTable design={design} />
      <SwitchboardSummary distribution={design.distribution} />

      {graph && (
        <Card>
          <CardHeader>Single Line Diagram (SLD)</CardHeader>
          <CardContent className="space-y-4">
            <SingleLineDiagram graph={graph} />
            <LoadSharePie data={loadShare} />
            <div>
              <div className="text-sm font-semibold text-slate-700">Technical Notes:</div>
              <ul className="list-disc pl-5 text-sm text-slate-600">
                {technicalNotes(parameters).map(n => <li key={n}>{n}</li>)}
              </ul>
            </div>
          </CardContent>
        </Card>
      )}

      <footer className="border-t border-slate-200 pt-3 text-xs text-slate-500 space-y-1">
        <div><b>Design Date:</b> {designDate}</div>
        <div><b>Disclaimer:</b> {DISCLAIMER}</div>
      </footer>
    </div>
  )
}

export default function App(){
  return (
    <ErrorBoundary>
      <TooltipProvider>
        <ReactFlowProvider>
          <Workspace />
        </ReactFlowProvider>
      </TooltipProvider>
    </ErrorBoundary>
  )
}
