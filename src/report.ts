import type { CalculationParameters } from './models'
import type { DesignSchedule } from './io'
import { download } from './io'
import { MITIGATIONS } from './utils/format'

export const DISCLAIMER = 'This calculator provides estimates based on Australian Standards. Actual installations must be designed by a qualified electrician. Always verify with current AS/NZS standards.'

export function technicalNotes(params: CalculationParameters): string[] {
  return [
    `Safety Factor: ${params.safetyFactor}x for continuous loads`,
    `Diversity Factor: ${params.diversityFactor} applied`,
    `DC Charger Efficiency: ${Math.round(params.dcEfficiency * 1000) / 10}%`,
    `Power Factor: ${params.powerFactor}`,
    `AC System Voltage: ${params.acVoltage}V`,
    `DC Charger Voltage: ${params.dcVoltage}V`,
  ]
}

export function generateMarkdown(schedule: DesignSchedule): string {
const rows = schedule.chargers.map(c => c.error
  ? `| ${c.index} | ${c.type} | ${c.capacityKw} | ${c.quantity} | — | ${c.error} |`
  : `| ${c.index} | ${c.type} | ${c.capacityKw} | ${c.quantity} | ${c.breakerA} | ${c.cable} |`)
const sb = schedule.switchboard
const msb = sb ? `- Total Connected Load: ${sb.totalConnectedLoadKw} kW
- Total Derated AC Current: ${sb.totalDeratedAcCurrentA} A
- Diversified Current: ${sb.diversifiedCurrentA} A
- Main Breaker Size: ${sb.mainBreakerA} A
- Recommended MSB: ${sb.recommendedMsbA} A (${sb.dimensionsMm} mm)
- Busbar Rating: ${sb.busbarRatingA} A
- Incomer Cable: ${sb.incomerCable}` : `- MSB calculation failed. Consider:
${MITIGATIONS.map(m => '  - ' + m).join('\n')}`
return `# EV Charger System Report

**Design Date:** ${schedule.designDate}

## Chargers
| # | Type | Capacity (kW) | Qty | Breaker (A) | Cable |
|---|------|---------------|-----|-------------|-------|
${rows.join('\n')}

## Main Switchboard
${msb}

## Technical Notes
${technicalNotes(schedule.parameters).map(n => '- ' + n).join('\n')}

---
${DISCLAIMER}
`}

export function exportReport(schedule: DesignSchedule){ const md = generateMarkdown(schedule); download(`ev_charger_report_${schedule.designDate}.md`, md, 'text/markdown') }
