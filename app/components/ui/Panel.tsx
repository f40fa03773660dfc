import React from 'react'
import { cn } from '../../utils/cn'

export interface SectionProps {
  title?: string
  description?: string
  actions?: React.ReactNode
  className?: string
  children: React.ReactNode
}

const Section: React.FC<SectionProps> = ({ title, description, actions, className, children }) => (
  <section className={cn('bg-white border border-neutral-200 rounded-lg p-4 space-y-3', className)}>
    {(title || actions) && (
      <header className="flex items-start justify-between gap-4">
        <div>
          {title && <h3 className="text-base font-semibold text-neutral-900">{title}</h3>}
          {description && <p className="text-sm text-neutral-600">{description}</p>}
        </div>
        {actions}
      </header>
    )}
    {children}
  </section>
)

export interface EmptyStateProps {
  title: string
  description?: string
  icon?: React.ReactNode
  action?: React.ReactNode
  className?: string
}

const EmptyState: React.FC<EmptyStateProps> = ({ title, description, icon, action, className }) => (
  <div className={cn('flex flex-col items-center justify-center p-8 text-center', className)}>
    {icon && <div className="mb-4 text-neutral-400">{icon}</div>}
    <h3 className="text-lg font-medium text-neutral-900 mb-2">{title}</h3>
    {description && <p className="text-sm text-neutral-600 mb-4">{description}</p>}
    {action}
  </div>
)

/** Read-only JSON dump of a document fragment. */
const JsonView: React.FC<{ value: unknown; label?: string }> = ({ value, label }) => (
  <pre aria-label={label} className="max-h-96 overflow-auto rounded-md bg-neutral-900 p-3 text-xs text-neutral-100">
    {JSON.stringify(value, null, 2)}
  </pre>
)

export { Section, EmptyState, JsonView }
