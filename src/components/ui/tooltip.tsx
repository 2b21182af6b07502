import * as React from 'react'
import * as TooltipPrimitive from '@radix-ui/react-tooltip'
import { Info } from 'lucide-react'

export const TooltipProvider = TooltipPrimitive.Provider

type TooltipProps = {
  label: React.ReactNode
  children: React.ReactElement
  side?: TooltipPrimitive.TooltipContentProps['side']
}

export function Tooltip({ label, children, side = 'top' }: TooltipProps) {
  return (
    <TooltipPrimitive.Root delayDuration={150}>
      <TooltipPrimitive.Trigger asChild>{children}</TooltipPrimitive.Trigger>
      <TooltipPrimitive.Portal>
        <TooltipPrimitive.Content
          side={side}
          className="z-50 max-w-xs rounded-md bg-slate-900 px-2 py-1 text-xs font-medium text-white shadow-lg"
        >
          {label}
          <TooltipPrimitive.Arrow className="fill-slate-900" />
        </TooltipPrimitive.Content>
      </TooltipPrimitive.Portal>
    </TooltipPrimitive.Root>
  )
}

/** Small info icon that reveals help text for a form field */
export function HelpTooltip({ text }: { text: string }) {
  return (
    <Tooltip label={text}>
      <button type="button" aria-label={text} className="text-slate-400 hover:text-slate-600">
        <Info size={14} />
      </button>
    </Tooltip>
  )
}
