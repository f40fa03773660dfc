'use client'
import { useCallback, useState } from 'react'
import { Alert } from '../ui'
import type { ActionResult } from '../../types'

export interface Feedback {
  variant: 'success' | 'warning'
  message: string
}

/** Turn store action results into a transient success/warning message. */
export const useActionFeedback = () => {
  const [feedback, setFeedback] = useState<Feedback | null>(null)

  const report = useCallback((result: ActionResult, successMessage: string): boolean => {
    if (result.ok) {
      setFeedback({ variant: 'success', message: successMessage })
      return true
    }
    setFeedback({ variant: 'warning', message: result.reason })
    return false
  }, [])

  const warn = useCallback((message: string) => setFeedback({ variant: 'warning', message }), [])

  return { feedback, report, warn, clear: () => setFeedback(null) }
}

export function ActionFeedback({ feedback }: { feedback: Feedback | null }) {
  if (!feedback) return null
  return <Alert variant={feedback.variant}>{feedback.message}</Alert>
}
