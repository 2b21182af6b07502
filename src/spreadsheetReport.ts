import ExcelJS from 'exceljs'
import type { DesignSchedule } from './io'
import { download } from './io'
import { technicalNotes } from './report'

type Cell = string | number

export function buildChargerTable(schedule: DesignSchedule): Cell[][] {
  const header: Cell[] = ['#', 'Type', 'Capacity (kW)', 'Qty', 'Voltage (V)', 'Phase', 'Full Load Current (A)', 'Derated Current (A)', 'Derated AC Current (A)', 'Breaker (A)', 'Breaker Specs', 'Cable', 'Cable Capacity (A)']
  const rows = schedule.chargers.map((c): Cell[] => c.error
    ? [c.index, c.type, c.capacityKw, c.quantity, '', '', '', '', '', '', c.error, '', '']
    : [c.index, c.type, c.capacityKw, c.quantity, c.voltage ?? '', c.phase ?? '', c.fullLoadCurrentA ?? '', c.deratedCurrentA ?? '', c.deratedAcCurrentA ?? '', c.breakerA ?? '', c.breakerSpec ?? '', c.cable ?? '', c.cableAmpacityA ?? ''])
  return [header, ...rows]
}

export function buildSwitchboardTable(schedule: DesignSchedule): Cell[][] {
  const sb = schedule.switchboard
  const rows: Cell[][] = [['Item', 'Value']]
  if (sb) {
    rows.push(
      ['Total Connected Load (kW)', sb.totalConnectedLoadKw],
      ['Total Derated AC Current (A)', sb.totalDeratedAcCurrentA],
      ['Diversification Factor', sb.diversityFactor],
      ['Diversified Current (A)', sb.diversifiedCurrentA],
      ['Main Breaker Size (A)', sb.mainBreakerA],
      ['Recommended MSB Size (A)', sb.recommendedMsbA],
      ['Busbar Rating (A)', sb.busbarRatingA],
      ['MSB Dimensions (mm)', sb.dimensionsMm],
      ['MSB Configuration', sb.configuration],
      ['Incomer Cable', sb.incomerCable],
    )
  } else {
    rows.push(['Status', 'MSB calculation failed'])
  }
  for (const note of technicalNotes(schedule.parameters)) rows.push(['Note', note])
  return rows
}

export function buildWorkbook(schedule: DesignSchedule): ExcelJS.Workbook {
  const wb = new ExcelJS.Workbook()
  wb.created = new Date()
  wb.modified = new Date()

  const addSheetWithRows = (title: string, rows: Cell[][]) => {
    const ws = wb.addWorksheet(title)
    rows.forEach(r => ws.addRow(r))
    ws.getRow(1).font = { bold: true }
    const colCount = rows[0]?.length ?? 0
    for (let c=1; c<=colCount; c++){
      let max = 8
      for (const row of rows){
        const len = String(row[c-1] ?? '').length
        if (len > max) max = len
      }
      ws.getColumn(c).width = Math.min(40, Math.max(10, Math.ceil(max*0.9)))
    }
    return ws
  }

  addSheetWithRows('Chargers', buildChargerTable(schedule))
  addSheetWithRows('MSB', buildSwitchboardTable(schedule))
  return wb
}

export async function exportSpreadsheetReport(schedule: DesignSchedule){
  const out = await buildWorkbook(schedule).xlsx.writeBuffer()
  download(`ev_charger_schedule_${schedule.designDate}.xlsx`, out, 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
}
