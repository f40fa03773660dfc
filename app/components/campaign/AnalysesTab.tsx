'use client'
import { useState } from 'react'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, Input, JsonView, Section, TextArea } from '../ui'
import { analysisFormSchema, type AnalysisFormValues } from '../../schema/forms'
import { useStageAnalysisOutputs, type AnalysisOutputFiles } from '../../hooks/useCampaignFiles'
import { useCampaign } from '../../store/useCampaign'
import { parseCommaList } from '../../utils/listInput'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const analysisDefaults: AnalysisFormValues = {
  analysis_id: '',
  pipeline_id: '',
  code_hash: '',
  env: '',
  ref_seq_id: '',
  inputs: '',
  notes: '',
}

const noOutputs = (): AnalysisOutputFiles => ({
  alignments: [],
  variant_tables: [],
  consensus_sequences: [],
  selection_scores: [],
})

const OUTPUT_FIELDS: Array<{ key: keyof AnalysisOutputFiles; label: string }> = [
  { key: 'alignments', label: 'Alignments file(s) (optional)' },
  { key: 'variant_tables', label: 'Variant table(s) (optional)' },
  { key: 'consensus_sequences', label: 'Consensus FASTA(s) (optional)' },
  { key: 'selection_scores', label: 'Selection score table(s) (optional)' },
]

export default function AnalysesTab() {
  const analyses = useCampaign((s) => s.document.campaign.analyses)
  const addAnalysis = useCampaign((s) => s.addAnalysis)
  const stageOutputs = useStageAnalysisOutputs()
  const { feedback, report, warn } = useActionFeedback()
  const [outputs, setOutputs] = useState<AnalysisOutputFiles>(noOutputs)
  const form = useForm<AnalysisFormValues>({ resolver: zodResolver(analysisFormSchema), defaultValues: analysisDefaults })

  const onSubmit = (values: AnalysisFormValues) => {
    stageOutputs.mutate(outputs, {
      onSuccess: (staged) => {
        const result = addAnalysis({ ...values, inputs: parseCommaList(values.inputs), outputs: staged }, new Date())
        if (report(result, `Added analysis ${values.analysis_id}`)) {
          form.reset(analysisDefaults)
          setOutputs(noOutputs())
        }
      },
      onError: (error) => warn(`Failed to stage analysis outputs: ${error.message}`),
    })
  }

  return (
    <div className="space-y-4">
      <Section title="Add analysis">
        <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input label="Analysis ID (slug)" placeholder="an-amplicon-01" {...form.register('analysis_id')} />
            <Input label="Pipeline (name@version)" placeholder="pace-amplicon@0.1.0" {...form.register('pipeline_id')} />
            <Input label="Code hash (git or sha)" placeholder="a1b2c3d" {...form.register('code_hash')} />
            <Input label="Reference seq ID" placeholder="Mdh_v0" {...form.register('ref_seq_id')} />
          </div>
          <TextArea label="Env lock (text/URI)" placeholder="conda-lock.yaml or s3://bucket/env.yaml" {...form.register('env')} />
          <Input label="Inputs (IDs; comma-separated)" placeholder="lib-001, lib-002" {...form.register('inputs')} />
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            {OUTPUT_FIELDS.map(({ key, label }) => (
              <Input
                key={key}
                label={label}
                type="file"
                multiple
                onChange={(e) => {
                  const files = Array.from(e.target.files ?? [])
                  setOutputs((current) => ({ ...current, [key]: files }))
                }}
              />
            ))}
          </div>
          <TextArea label="Notes" placeholder="Parameters, commits, run context…" {...form.register('notes')} />
          <Button type="submit" loading={stageOutputs.isPending}>
            Add analysis
          </Button>
        </form>
        <ActionFeedback feedback={feedback} />
      </Section>

      {analyses.length > 0 && <JsonView value={analyses} label="Analyses" />}
    </div>
  )
}
