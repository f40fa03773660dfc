'use client'
import { useState } from 'react'
import { Alert, Button } from '../ui'
import { findReferenceWarnings, validateCampaignDocument, type ValidationIssue } from '../../schema/validate'
import type { CampaignDocument } from '../../types'

interface ValidationReport {
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}

export const checkDocument = (document: CampaignDocument): ValidationReport => {
  const validation = validateCampaignDocument(document)
  return {
    errors: validation.issues,
    warnings: findReferenceWarnings(document.campaign),
  }
}

const IssueList = ({ issues }: { issues: ValidationIssue[] }) => (
  <ul className="mt-1 space-y-0.5 font-mono text-xs">
    {issues.map((issue) => (
      <li key={`${issue.path}:${issue.message}`}>
        {issue.path}: {issue.message}
      </li>
    ))}
  </ul>
)

export default function ValidatePanel({ document }: { document: CampaignDocument }) {
  const [report, setReport] = useState<ValidationReport | null>(null)

  return (
    <div className="space-y-2">
      <Button variant="secondary" size="sm" onClick={() => setReport(checkDocument(document))}>
        Validate now
      </Button>
      {report &&
        (report.errors.length === 0 ? (
          <Alert variant="success">Valid ✓</Alert>
        ) : (
          <Alert variant="error" title={`${report.errors.length} validation error(s):`}>
            <IssueList issues={report.errors} />
          </Alert>
        ))}
      {report && report.warnings.length > 0 && (
        <Alert variant="warning" title="Unresolved references">
          <IssueList issues={report.warnings} />
        </Alert>
      )}
    </div>
  )
}
