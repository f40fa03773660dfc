'use client'

// purpose: wrap asynchronous file work (import, hashing) in react-query mutations
// status: experimental

import { useMutation } from '@tanstack/react-query'
import { detectCampaignFormat, parseCampaignText } from '../campaign/serialization'
import { stageAttachment, stageFastq, stageFiles, type StageableFile } from '../campaign/staging'
import { STAGING_PREFIXES } from '../config/campaign'
import { useCampaign } from '../store/useCampaign'
import type { AnalysisOutputs, Attachment, CampaignDocument, FastqFile } from '../types'

export interface ImportableFile extends StageableFile {
  text: () => Promise<string>
}

export const useImportCampaign = () => {
  const loadDocument = useCampaign((state) => state.loadDocument)
  return useMutation({
    mutationFn: async (file: ImportableFile): Promise<CampaignDocument> =>
      parseCampaignText(await file.text(), detectCampaignFormat(file.name)),
    onSuccess: (document) => loadDocument(document),
    onError: (error) => console.error('Campaign import failed:', error),
  })
}

export interface FastqPair {
  r1?: StageableFile | null
  r2?: StageableFile | null
}

export const useStageFastqs = () =>
  useMutation({
    mutationFn: async ({ r1, r2 }: FastqPair): Promise<FastqFile[]> => {
      const staged: FastqFile[] = []
      if (r1) staged.push(await stageFastq('R1', r1, STAGING_PREFIXES.fastq))
      if (r2) staged.push(await stageFastq('R2', r2, STAGING_PREFIXES.fastq))
      return staged
    },
  })

export interface AnalysisOutputFiles {
  alignments: StageableFile[]
  variant_tables: StageableFile[]
  consensus_sequences: StageableFile[]
  selection_scores: StageableFile[]
}

export const useStageAnalysisOutputs = () =>
  useMutation({
    mutationFn: async (files: AnalysisOutputFiles): Promise<AnalysisOutputs> => {
      const prefix = STAGING_PREFIXES.analysisOutput
      const [alignments, variant_tables, consensus_sequences, selection_scores] = await Promise.all([
        stageFiles(files.alignments, prefix),
        stageFiles(files.variant_tables, prefix),
        stageFiles(files.consensus_sequences, prefix),
        stageFiles(files.selection_scores, prefix),
      ])
      return { alignments, variant_tables, consensus_sequences, selection_scores }
    },
  })

export const useStageAttachments = () => {
  const addAttachments = useCampaign((state) => state.addAttachments)
  return useMutation({
    mutationFn: (files: StageableFile[]): Promise<Attachment[]> =>
      Promise.all(files.map((file) => stageAttachment(file, STAGING_PREFIXES.attachment))),
    onSuccess: (attachments) => addAttachments(attachments),
  })
}
