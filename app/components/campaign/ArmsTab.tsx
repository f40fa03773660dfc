'use client'
import { useState } from 'react'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, Input, JsonView, Section, Select, TextArea } from '../ui'
import {
  armFormSchema,
  timepointFormSchema,
  type ArmFormValues,
  type TimepointFormValues,
} from '../../schema/forms'
import { useCampaign } from '../../store/useCampaign'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const armDefaults: ArmFormValues = { arm_id: '', label: '', description: '' }

export default function ArmsTab() {
  const arms = useCampaign((s) => s.document.campaign.arms)
  const addArm = useCampaign((s) => s.addArm)
  const addTimepoint = useCampaign((s) => s.addTimepoint)
  const armFeedback = useActionFeedback()
  const timepointFeedback = useActionFeedback()
  const armIds = Object.keys(arms)
  const [selected, setSelected] = useState('')
  const activeArmId = armIds.includes(selected) ? selected : (armIds[0] ?? '')
  const activeArm = activeArmId ? arms[activeArmId] : undefined

  const armForm = useForm<ArmFormValues>({ resolver: zodResolver(armFormSchema), defaultValues: armDefaults })
  const timepointForm = useForm<TimepointFormValues>({
    resolver: zodResolver(timepointFormSchema),
    defaultValues: { t: 0, timestamp: new Date().toISOString() },
  })

  const onAddArm = (values: ArmFormValues) => {
    if (armFeedback.report(addArm(values), `Added arm ${values.arm_id}`)) {
      setSelected(values.arm_id)
      armForm.reset(armDefaults)
    }
  }

  const onAddTimepoint = (values: TimepointFormValues) => {
    if (timepointFeedback.report(addTimepoint(activeArmId, values), `Added timepoint t=${values.t}`)) {
      timepointForm.reset({ t: values.t + 1, timestamp: new Date().toISOString() })
    }
  }

  return (
    <div className="space-y-4">
      <Section title="Add arm">
        <form onSubmit={armForm.handleSubmit(onAddArm)} className="space-y-3">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input label="Arm ID (slug)" placeholder="arm-a" {...armForm.register('arm_id')} />
            <Input label="Label" placeholder="High stringency" {...armForm.register('label')} />
          </div>
          <TextArea label="Description" {...armForm.register('description')} />
          <Button type="submit">Add arm</Button>
        </form>
        <ActionFeedback feedback={armFeedback.feedback} />
      </Section>

      {activeArm && (
        <Section title="Timepoints" description="Add a timepoint to the selected arm">
          <Select
            label="Arm"
            options={armIds}
            value={activeArmId}
            onChange={(e) => setSelected(e.target.value)}
          />
          <form onSubmit={timepointForm.handleSubmit(onAddTimepoint)} className="space-y-3">
            <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
              <Input
                label="t (index)"
                type="number"
                min={0}
                step={1}
                error={timepointForm.formState.errors.t?.message}
                {...timepointForm.register('t', { valueAsNumber: true })}
              />
              <Input label="Timestamp (ISO8601)" {...timepointForm.register('timestamp')} />
            </div>
            <Button type="submit">Add timepoint</Button>
          </form>
          <ActionFeedback feedback={timepointFeedback.feedback} />
          <JsonView value={activeArm.timepoints} label={`Timepoints for ${activeArmId}`} />
        </Section>
      )}
    </div>
  )
}
