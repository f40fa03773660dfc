// purpose: environment-driven settings for the campaign editor session
// status: experimental

export const SCHEMA_VERSION = '0.1.0'

export const CAMPAIGN_STORAGE_KEY =
  process.env.NEXT_PUBLIC_CAMPAIGN_STORAGE_KEY || 'pace-campaign-document'

export const CAMPAIGN_PERSISTENCE_ENABLED = process.env.NEXT_PUBLIC_CAMPAIGN_PERSIST !== 'false'

export const STAGING_PREFIXES = {
  fastq: 'attached_fastqs',
  analysisOutput: 'attached_outputs',
  attachment: 'attachments',
} as const

export type StagingPrefix = (typeof STAGING_PREFIXES)[keyof typeof STAGING_PREFIXES]

export const EXPORT_FILENAMES = {
  json: 'campaign.json',
  yaml: 'campaign.yaml',
} as const
