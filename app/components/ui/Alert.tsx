import React from 'react'
import { AlertTriangle, CheckCircle2, Info, XCircle } from 'lucide-react'
import { cn } from '../../utils/cn'

export interface AlertProps extends React.HTMLAttributes<HTMLDivElement> {
  variant?: 'success' | 'warning' | 'error' | 'info'
  title?: string
  children?: React.ReactNode
}

const variants = {
  success: 'bg-success-50 border-success-200 text-success-800',
  warning: 'bg-warning-50 border-warning-200 text-warning-800',
  error: 'bg-error-50 border-error-200 text-error-800',
  info: 'bg-info-50 border-info-200 text-info-800',
}

const icons = {
  success: CheckCircle2,
  warning: AlertTriangle,
  error: XCircle,
  info: Info,
}

const Alert = React.forwardRef<HTMLDivElement, AlertProps>(
  ({ className, variant = 'info', title, children, ...props }, ref) => {
    const Icon = icons[variant]
    return (
      <div ref={ref} role="alert" className={cn('p-3 rounded-md border text-sm', variants[variant], className)} {...props}>
        <div className="flex items-start gap-3">
          <Icon className="h-5 w-5 flex-shrink-0" aria-hidden="true" />
          <div className="flex-grow">
            {title && <h4 className="font-medium mb-1">{title}</h4>}
            {children}
          </div>
        </div>
      </div>
    )
  },
)

Alert.displayName = 'Alert'

export { Alert }
