import React, { useId } from 'react'
import { cn } from '../../utils/cn'

interface FieldFrameProps {
  id: string
  label?: string
  error?: string
  helperText?: string
  children: React.ReactNode
}

const controlStyles =
  'w-full px-3 py-2 text-sm bg-white border rounded-md placeholder-neutral-400 focus:outline-none focus:ring-2 focus:ring-offset-0 disabled:bg-neutral-50 disabled:text-neutral-500'

const borderFor = (error?: string) =>
  error
    ? 'border-error-500 focus:border-error-500 focus:ring-error-500/10'
    : 'border-neutral-300 focus:border-primary-500 focus:ring-primary-500/10'

const FieldFrame = ({ id, label, error, helperText, children }: FieldFrameProps) => (
  <div className="w-full">
    {label && (
      <label htmlFor={id} className="block text-sm font-medium text-neutral-700 mb-1">
        {label}
      </label>
    )}
    {children}
    {error && (
      <p className="mt-1 text-xs text-error-600" role="alert">
        {error}
      </p>
    )}
    {helperText && !error && <p className="mt-1 text-xs text-neutral-500">{helperText}</p>}
  </div>
)

interface FieldChrome {
  label?: string
  error?: string
  helperText?: string
}

export type InputProps = React.InputHTMLAttributes<HTMLInputElement> & FieldChrome

const Input = React.forwardRef<HTMLInputElement, InputProps>(
  ({ className, label, error, helperText, id, ...props }, ref) => {
    const generatedId = useId()
    const inputId = id ?? generatedId
    return (
      <FieldFrame id={inputId} label={label} error={error} helperText={helperText}>
        <input ref={ref} id={inputId} className={cn(controlStyles, borderFor(error), className)} {...props} />
      </FieldFrame>
    )
  },
)
Input.displayName = 'Input'

export type TextAreaProps = React.TextareaHTMLAttributes<HTMLTextAreaElement> & FieldChrome

const TextArea = React.forwardRef<HTMLTextAreaElement, TextAreaProps>(
  ({ className, label, error, helperText, id, rows = 3, ...props }, ref) => {
    const generatedId = useId()
    const areaId = id ?? generatedId
    return (
      <FieldFrame id={areaId} label={label} error={error} helperText={helperText}>
        <textarea
          ref={ref}
          id={areaId}
          rows={rows}
          className={cn(controlStyles, borderFor(error), 'font-mono', className)}
          {...props}
        />
      </FieldFrame>
    )
  },
)
TextArea.displayName = 'TextArea'

export interface SelectOption {
  value: string
  label: string
}

export type SelectProps = React.SelectHTMLAttributes<HTMLSelectElement> &
  FieldChrome & {
    options: ReadonlyArray<SelectOption | string>
  }

const Select = React.forwardRef<HTMLSelectElement, SelectProps>(
  ({ className, label, error, helperText, id, options, ...props }, ref) => {
    const generatedId = useId()
    const selectId = id ?? generatedId
    return (
      <FieldFrame id={selectId} label={label} error={error} helperText={helperText}>
        <select ref={ref} id={selectId} className={cn(controlStyles, borderFor(error), className)} {...props}>
          {options.map((option) => {
            const { value, label: text } = typeof option === 'string' ? { value: option, label: option } : option
            return (
              <option key={value} value={value}>
                {text}
              </option>
            )
          })}
        </select>
      </FieldFrame>
    )
  },
)
Select.displayName = 'Select'

export { Input, TextArea, Select }
