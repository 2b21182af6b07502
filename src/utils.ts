export function fmt(n:number, digits=1){ if (!isFinite(n)) return '—'; return Number(n).toFixed(digits) }
export function genId(prefix:string){ return prefix + Math.random().toString(36).slice(2,8) }

/** Calendar date in the local time zone, as YYYY-MM-DD */
export function localDateString(date: Date){
  const pad = (n:number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}
