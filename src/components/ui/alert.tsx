import * as React from 'react'
type AlertVariant = 'default'|'warning'|'destructive'
const variants: Record<AlertVariant,string> = {
  default:'bg-slate-50 text-slate-700 border border-slate-200',
  warning:'bg-amber-50 text-amber-800 border border-amber-200',
  destructive:'bg-red-50 text-red-700 border border-red-200',
}
export function Alert({children, variant='default'}:{children:React.ReactNode, variant?:AlertVariant}){
  return <div role="alert" className={'rounded-xl px-3 py-2 text-sm ' + variants[variant]}>{children}</div>
}
