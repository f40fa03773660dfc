'use client'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, EmptyState, Input, JsonView, Section, Select } from '../ui'
import { segmentFormSchema, type SegmentFormValues } from '../../schema/forms'
import { useCampaign } from '../../store/useCampaign'
import { EXPERIMENT_MODES } from '../../types'
import { parseCommaList } from '../../utils/listInput'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const segmentDefaults = (): SegmentFormValues => ({
  segment_id: '',
  mode: 'PACE',
  applied_to_arms: [],
  start_time: new Date().toISOString(),
  end_time: '',
  selection_circuit_id: '',
  stepping_stones: '',
})

export default function SegmentsTab() {
  const campaign = useCampaign((s) => s.document.campaign)
  const addSegment = useCampaign((s) => s.addSegment)
  const { feedback, report } = useActionFeedback()
  const form = useForm<SegmentFormValues>({ resolver: zodResolver(segmentFormSchema), defaultValues: segmentDefaults() })
  const armIds = Object.keys(campaign.arms)
  const circuitIds = Object.keys(campaign.selection_circuits)

  if (armIds.length === 0) {
    return <EmptyState title="No arms yet" description="Create arms first." />
  }

  const onSubmit = (values: SegmentFormValues) => {
    const result = addSegment({ ...values, stepping_stones: parseCommaList(values.stepping_stones) })
    if (report(result, `Added segment ${values.segment_id}`)) {
      form.reset(segmentDefaults())
    }
  }

  return (
    <div className="space-y-4">
      <Section title="Add segment" description="A contiguous phase run on one or more arms under one selection circuit">
        <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input label="Segment ID (slug)" placeholder="seg-01" {...form.register('segment_id')} />
            <Select label="Mode" options={EXPERIMENT_MODES} {...form.register('mode')} />
          </div>
          <Select
            label="Applied to arms"
            multiple
            options={armIds}
            helperText="Hold Ctrl or Cmd to select several arms"
            {...form.register('applied_to_arms')}
          />
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input
              label="Start time (ISO8601)"
              placeholder="2025-08-16T09:00:00Z"
              {...form.register('start_time')}
            />
            <Input
              label="End time (ISO8601, optional)"
              placeholder="2025-08-17T09:00:00Z"
              {...form.register('end_time')}
            />
          </div>
          {circuitIds.length > 0 ? (
            <Select
              label="Selection circuit"
              options={[{ value: '', label: 'Select a circuit' }, ...circuitIds]}
              {...form.register('selection_circuit_id')}
            />
          ) : (
            <Input
              label="Selection circuit ID"
              placeholder="sel-rnap-final-v3"
              {...form.register('selection_circuit_id')}
            />
          )}
          <Input
            label="Stepping stones (comma-separated)"
            placeholder="T7/T3, T3, final"
            {...form.register('stepping_stones')}
          />
          <Button type="submit">Add segment</Button>
        </form>
        <ActionFeedback feedback={feedback} />
      </Section>

      {campaign.segments.length > 0 && <JsonView value={campaign.segments} label="Segments" />}
    </div>
  )
}
