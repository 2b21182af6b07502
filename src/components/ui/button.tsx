import * as React from 'react'
type ButtonVariant = 'default'|'outline'|'ghost'|'danger'
type Props = React.ButtonHTMLAttributes<HTMLButtonElement> & { variant?: ButtonVariant, size?: 'xs'|'sm'|'md' }
export const Button = React.forwardRef<HTMLButtonElement, Props>(function Button({ className='', variant='default', size='md', type='button', ...props }, ref) {
  const base = 'inline-flex items-center justify-center gap-1.5 rounded-lg font-medium shadow-sm focus:outline-none focus:ring-2 focus:ring-emerald-500 disabled:opacity-50 transition-colors'
  const variants: Record<ButtonVariant,string> = {
    default:'bg-emerald-600 text-white hover:bg-emerald-700',
    outline:'border border-slate-300 bg-white hover:bg-slate-50',
    ghost:'hover:bg-slate-100',
    danger:'bg-red-600 text-white hover:bg-red-700'
  }
  const sizes: Record<NonNullable<Props['size']>,string> = {
    xs:'text-xs px-2.5 py-1',
    sm:'text-sm px-3.5 py-1.5',
    md:'text-base px-4 py-2'
  }
  return <button ref={ref} type={type} className={[base, variants[variant], sizes[size], className].join(' ')} {...props} />
})
