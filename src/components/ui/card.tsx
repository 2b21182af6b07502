import * as React from 'react'
type Slot = { children: React.ReactNode, className?: string }
export function Card({children, className=''}: Slot){ return <section className={'rounded-2xl bg-white shadow-sm border border-slate-200 ' + className}>{children}</section> }
export function CardHeader({children, className=''}: Slot){ return <header className={'px-4 py-3 border-b border-slate-200 font-semibold text-slate-800 ' + className}>{children}</header> }
export function CardContent({children, className=''}: Slot){ return <div className={'p-4 ' + className}>{children}</div> }
