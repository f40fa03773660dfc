'use client'
import { useState } from 'react'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, EmptyState, Input, JsonView, Section, Select } from '../ui'
import {
  lagoonFormSchema,
  libraryFormSchema,
  runFormSchema,
  sampleFormSchema,
  type LagoonFormValues,
  type LibraryFormValues,
  type RunFormValues,
  type SampleFormValues,
} from '../../schema/forms'
import { useStageFastqs } from '../../hooks/useCampaignFiles'
import { useCampaign, type LagoonLocator } from '../../store/useCampaign'
import { EXPERIMENT_MODES, SAMPLE_TYPES, TITER_METHODS, type Lagoon } from '../../types'
import { parseNamedQuantities } from '../../utils/listInput'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const lagoonDefaults: LagoonFormValues = {
  lagoon_id: '',
  condition_label: '',
  mutagenesis_on: false,
  mode: 'PACE',
  volume_ml: 40,
  dilution_rate_vol_per_hr: 1,
  passage_fraction: 0,
  temp_c: 37,
  media: '2xYT+glucose',
  inducers: '',
  antibiotics: '',
  titer_value: 1e8,
  titer_method: 'plaque',
}

const indexOptions = (labels: string[]) => labels.map((label, index) => ({ value: String(index), label }))

const clampIndex = (selected: number, length: number) => (selected < length ? selected : 0)

export default function LagoonsTab() {
  const arms = useCampaign((s) => s.document.campaign.arms)
  const addLagoon = useCampaign((s) => s.addLagoon)
  const { feedback, report } = useActionFeedback()
  const armIds = Object.keys(arms)
  const [armChoice, setArmChoice] = useState('')
  const [timepointChoice, setTimepointChoice] = useState(0)
  const form = useForm<LagoonFormValues>({ resolver: zodResolver(lagoonFormSchema), defaultValues: lagoonDefaults })

  if (armIds.length === 0) {
    return <EmptyState title="No arms yet" description="Add an arm and a timepoint before recording lagoons." />
  }

  const armId = armIds.includes(armChoice) ? armChoice : armIds[0]
  const arm = arms[armId]
  if (arm.timepoints.length === 0) {
    return (
      <div className="space-y-4">
        <Select label="Arm" options={armIds} value={armId} onChange={(e) => setArmChoice(e.target.value)} />
        <EmptyState title="No timepoints" description={`Add a timepoint to ${armId} first.`} />
      </div>
    )
  }

  const timepointIndex = clampIndex(timepointChoice, arm.timepoints.length)
  const timepoint = arm.timepoints[timepointIndex]
  const mode = form.watch('mode')
  const errors = form.formState.errors

  const onSubmit = (values: LagoonFormValues) => {
    const result = addLagoon(armId, timepointIndex, {
      ...values,
      inducers: parseNamedQuantities(values.inducers).map(({ name, value }) => ({ name, concentration_mM: value })),
      antibiotics: parseNamedQuantities(values.antibiotics).map(({ name, value }) => ({
        name,
        concentration_ug_per_ml: value,
      })),
    })
    if (report(result, `Added lagoon ${values.lagoon_id}`)) {
      form.reset(lagoonDefaults)
    }
  }

  return (
    <div className="space-y-4">
      <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
        <Select label="Arm" options={armIds} value={armId} onChange={(e) => setArmChoice(e.target.value)} />
        <Select
          label="Timepoint"
          options={indexOptions(arm.timepoints.map((tp) => `t=${tp.t}`))}
          value={String(timepointIndex)}
          onChange={(e) => setTimepointChoice(Number(e.target.value))}
        />
      </div>

      <Section title="Add lagoon">
        <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input label="Lagoon ID (slug)" placeholder="lg-1" {...form.register('lagoon_id')} />
            <Input
              label="Condition label"
              placeholder="Step1_T7/T3_low_stringency"
              {...form.register('condition_label')}
            />
            <Select label="Mode" options={EXPERIMENT_MODES} {...form.register('mode')} />
            <label className="flex items-center gap-2 text-sm text-neutral-700">
              <input type="checkbox" {...form.register('mutagenesis_on')} />
              Mutagenesis ON?
            </label>
            <Input
              label="Volume (ml)"
              type="number"
              step="any"
              error={errors.volume_ml?.message}
              {...form.register('volume_ml', { valueAsNumber: true })}
            />
            {mode === 'PACE' ? (
              <Input
                label="Dilution rate (vol/hr)"
                type="number"
                step="any"
                error={errors.dilution_rate_vol_per_hr?.message}
                {...form.register('dilution_rate_vol_per_hr', { valueAsNumber: true })}
              />
            ) : (
              <Input
                label="Passage fraction"
                type="number"
                step="any"
                error={errors.passage_fraction?.message}
                {...form.register('passage_fraction', { valueAsNumber: true })}
              />
            )}
            <Input
              label="Temp (°C)"
              type="number"
              step="any"
              error={errors.temp_c?.message}
              {...form.register('temp_c', { valueAsNumber: true })}
            />
            <Input label="Media" placeholder="2xYT+glucose" {...form.register('media')} />
          </div>
          <Input
            label="Inducers (name:conc_mM; comma-separated)"
            placeholder="arabinose:10, IPTG:0.5"
            {...form.register('inducers')}
          />
          <Input
            label="Antibiotics (name:ug_per_ml; comma-separated)"
            placeholder="ampicillin:100, chloramphenicol:25"
            {...form.register('antibiotics')}
          />
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input
              label="Phage titer (PFU/ml)"
              type="number"
              step="any"
              error={errors.titer_value?.message}
              {...form.register('titer_value', { valueAsNumber: true })}
            />
            <Select label="Titer method" options={TITER_METHODS} {...form.register('titer_method')} />
          </div>
          <Button type="submit">Add lagoon</Button>
        </form>
        <ActionFeedback feedback={feedback} />
      </Section>

      {Object.keys(timepoint.lagoons).length > 0 && (
        <SampleChain armId={armId} timepointIndex={timepointIndex} lagoons={timepoint.lagoons} />
      )}
    </div>
  )
}

interface SampleChainProps {
  armId: string
  timepointIndex: number
  lagoons: Record<string, Lagoon>
}

function SampleChain({ armId, timepointIndex, lagoons }: SampleChainProps) {
  const lagoonIds = Object.keys(lagoons)
  const [lagoonChoice, setLagoonChoice] = useState('')
  const lagoonId = lagoonIds.includes(lagoonChoice) ? lagoonChoice : lagoonIds[0]
  const lagoon = lagoons[lagoonId]
  const locator: LagoonLocator = { armId, timepointIndex, lagoonId }

  return (
    <Section title="Samples, libraries and runs">
      <Select label="Edit lagoon" options={lagoonIds} value={lagoonId} onChange={(e) => setLagoonChoice(e.target.value)} />
      <SampleForm locator={locator} />
      {lagoon.samples.length > 0 && <LibraryChain locator={locator} lagoon={lagoon} />}
      <JsonView value={lagoon} label={`Lagoon ${lagoonId}`} />
    </Section>
  )
}

function SampleForm({ locator }: { locator: LagoonLocator }) {
  const addSample = useCampaign((s) => s.addSample)
  const { feedback, report } = useActionFeedback()
  const defaults: SampleFormValues = { sample_id: '', sample_type: 'phage_supernatant' }
  const form = useForm<SampleFormValues>({ resolver: zodResolver(sampleFormSchema), defaultValues: defaults })

  const onSubmit = (values: SampleFormValues) => {
    if (report(addSample(locator, values), `Added sample ${values.sample_id}`)) form.reset(defaults)
  }

  return (
    <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
      <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
        <Input label="Sample ID (slug)" placeholder="s-armA-t000-lg1" {...form.register('sample_id')} />
        <Select label="Sample type" options={SAMPLE_TYPES} {...form.register('sample_type')} />
      </div>
      <Button type="submit" variant="secondary">
        Add sample
      </Button>
      <ActionFeedback feedback={feedback} />
    </form>
  )
}

function LibraryChain({ locator, lagoon }: { locator: LagoonLocator; lagoon: Lagoon }) {
  const addLibraryPrep = useCampaign((s) => s.addLibraryPrep)
  const { feedback, report } = useActionFeedback()
  const [sampleChoice, setSampleChoice] = useState(0)
  const sampleIndex = clampIndex(sampleChoice, lagoon.samples.length)
  const sample = lagoon.samples[sampleIndex]
  const defaults: LibraryFormValues = { library_id: '', protocol: '', amplicon_targets: '' }
  const form = useForm<LibraryFormValues>({ resolver: zodResolver(libraryFormSchema), defaultValues: defaults })

  const onSubmit = (values: LibraryFormValues) => {
    if (report(addLibraryPrep(locator, sampleIndex, values), `Added library ${values.library_id}`)) {
      form.reset(defaults)
    }
  }

  return (
    <div className="space-y-3 border-t border-neutral-200 pt-3">
      <Select
        label="Select sample"
        options={indexOptions(lagoon.samples.map((s) => s.sample_id))}
        value={String(sampleIndex)}
        onChange={(e) => setSampleChoice(Number(e.target.value))}
      />
      <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
        <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
          <Input label="Library ID (slug)" placeholder="lib-001" {...form.register('library_id')} />
          <Input label="Protocol name/version" placeholder="Amplicon-v1" {...form.register('protocol')} />
          <Input
            label="Amplicon targets (free text)"
            placeholder="mdh_region1; primers XYZ"
            {...form.register('amplicon_targets')}
          />
        </div>
        <Button type="submit" variant="secondary">
          Add library prep
        </Button>
        <ActionFeedback feedback={feedback} />
      </form>
      {sample.library_preps.length > 0 && (
        <RunForm locator={locator} sampleIndex={sampleIndex} libraryIds={sample.library_preps.map((l) => l.library_id)} />
      )}
    </div>
  )
}

interface RunFormProps {
  locator: LagoonLocator
  sampleIndex: number
  libraryIds: string[]
}

function RunForm({ locator, sampleIndex, libraryIds }: RunFormProps) {
  const addSequencingRun = useCampaign((s) => s.addSequencingRun)
  const stageFastqs = useStageFastqs()
  const { feedback, report, warn } = useActionFeedback()
  const [libraryChoice, setLibraryChoice] = useState(0)
  const [r1, setR1] = useState<File | null>(null)
  const [r2, setR2] = useState<File | null>(null)
  const libraryIndex = clampIndex(libraryChoice, libraryIds.length)
  const defaults: RunFormValues = { run_id: '', platform: '' }
  const form = useForm<RunFormValues>({ resolver: zodResolver(runFormSchema), defaultValues: defaults })

  const onSubmit = (values: RunFormValues) => {
    stageFastqs.mutate(
      { r1, r2 },
      {
        onSuccess: (fastq) => {
          const result = addSequencingRun(locator, sampleIndex, libraryIndex, { ...values, fastq })
          if (report(result, `Added sequencing run ${values.run_id}`)) {
            form.reset(defaults)
            setR1(null)
            setR2(null)
          }
        },
        onError: (error) => warn(`Failed to stage FASTQ files: ${error.message}`),
      },
    )
  }

  return (
    <div className="space-y-3 border-t border-neutral-200 pt-3">
      <Select
        label="Select library"
        options={indexOptions(libraryIds)}
        value={String(libraryIndex)}
        onChange={(e) => setLibraryChoice(Number(e.target.value))}
      />
      <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
        <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
          <Input label="Run ID (slug)" placeholder="nsq-240815" {...form.register('run_id')} />
          <Input label="Platform" placeholder="NextSeq2000 P2 100x100" {...form.register('platform')} />
          <Input
            label="R1 FASTQ"
            type="file"
            accept=".fastq,.fq,.gz"
            onChange={(e) => setR1(e.target.files?.[0] ?? null)}
          />
          <Input
            label="R2 FASTQ"
            type="file"
            accept=".fastq,.fq,.gz"
            onChange={(e) => setR2(e.target.files?.[0] ?? null)}
          />
        </div>
        <Button type="submit" variant="secondary" loading={stageFastqs.isPending}>
          Add sequencing run
        </Button>
        <ActionFeedback feedback={feedback} />
      </form>
    </div>
  )
}
