// purpose: JSON/YAML export and validated import of campaign documents
// status: experimental

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { validateCampaignDocument, type ValidationIssue } from '../schema/validate'
import type { CampaignDocument } from '../types'

export type CampaignFormat = 'json' | 'yaml'

export class CampaignImportError extends Error {
  readonly issues: ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message)
    this.name = 'CampaignImportError'
    this.issues = issues
  }
}

export const campaignToJson = (document: CampaignDocument): string => JSON.stringify(document, null, 2)

export const campaignToYaml = (document: CampaignDocument): string => stringifyYaml(document)

export const detectCampaignFormat = (filename: string): CampaignFormat =>
  /\.ya?ml$/i.test(filename) ? 'yaml' : 'json'

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))

/** Parse and validate exported text. Throws CampaignImportError on malformed or invalid input. */
export const parseCampaignText = (text: string, format: CampaignFormat): CampaignDocument => {
  let raw: unknown
  try {
    raw = format === 'yaml' ? parseYaml(text) : JSON.parse(text)
  } catch (error) {
    throw new CampaignImportError(`Failed to parse ${format.toUpperCase()}: ${describeError(error)}`)
  }
  const validation = validateCampaignDocument(raw)
  if (!validation.valid) {
    throw new CampaignImportError(
      `${validation.issues.length} validation error(s) in imported campaign`,
      validation.issues,
    )
  }
  return validation.document
}
