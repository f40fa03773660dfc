import type { ZodIssue } from 'zod'
import type { Campaign, CampaignDocument } from '../types'
import { hasOwnKey } from '../utils/records'
import { campaignDocumentSchema } from './campaignSchema'

export interface ValidationIssue {
  path: string
  message: string
}

export type CampaignValidation =
  | { valid: true; document: CampaignDocument; issues: [] }
  | { valid: false; issues: ValidationIssue[] }

/** Render a path as `$.campaign.segments[0].mode`. */
export const formatIssuePath = (path: ReadonlyArray<string | number>): string =>
  '$' + path.map((part) => (typeof part === 'number' ? `[${part}]` : `.${part}`)).join('')

const toValidationIssue = (issue: ZodIssue): ValidationIssue => ({
  path: formatIssuePath(issue.path),
  message: issue.message,
})

const byPath = (a: ValidationIssue, b: ValidationIssue) =>
  a.path < b.path ? -1 : a.path > b.path ? 1 : 0

export const validateCampaignDocument = (value: unknown): CampaignValidation => {
  const result = campaignDocumentSchema.safeParse(value)
  if (result.success) {
    return { valid: true, document: result.data, issues: [] }
  }
  return { valid: false, issues: result.error.issues.map(toValidationIssue).sort(byPath) }
}

/**
 * Cross-references the schema cannot express: segments that point at arms or
 * selection circuits the campaign does not declare. These never block export.
 */
export const findReferenceWarnings = (campaign: Campaign): ValidationIssue[] => {
  const warnings: ValidationIssue[] = []
  campaign.segments.forEach((segment, index) => {
    segment.applied_to_arms.forEach((armId, armIndex) => {
      if (!hasOwnKey(campaign.arms, armId)) {
        warnings.push({
          path: formatIssuePath(['campaign', 'segments', index, 'applied_to_arms', armIndex]),
          message: `Unknown arm "${armId}"`,
        })
      }
    })
    const circuitId = segment.selection_design.selection_circuit_id
    if (circuitId && !hasOwnKey(campaign.selection_circuits, circuitId)) {
      warnings.push({
        path: formatIssuePath(['campaign', 'segments', index, 'selection_design', 'selection_circuit_id']),
        message: `Unknown selection circuit "${circuitId}"`,
      })
    }
  })
  return warnings
}
