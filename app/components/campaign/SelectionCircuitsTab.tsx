'use client'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, Input, JsonView, Section, Select } from '../ui'
import { circuitFormSchema, type CircuitFormValues } from '../../schema/forms'
import { useCampaign } from '../../store/useCampaign'
import { CIRCUIT_TYPES, REPORTER_GENES } from '../../types'
import { parseCommaList } from '../../utils/listInput'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const defaultValues: CircuitFormValues = {
  id: '',
  type: 'RNAP_promoter',
  ap_details: '',
  cp_details: '',
  reporter_gene: 'gIII',
  negative_selection: '',
  stepping_stones: '',
  version: '',
}

export default function SelectionCircuitsTab() {
  const circuits = useCampaign((s) => s.document.campaign.selection_circuits)
  const addSelectionCircuit = useCampaign((s) => s.addSelectionCircuit)
  const { feedback, report } = useActionFeedback()
  const form = useForm<CircuitFormValues>({ resolver: zodResolver(circuitFormSchema), defaultValues })

  const onSubmit = (values: CircuitFormValues) => {
    const result = addSelectionCircuit({
      ...values,
      stepping_stones: parseCommaList(values.stepping_stones),
    })
    if (report(result, `Added selection circuit ${values.id}`)) {
      form.reset(defaultValues)
    }
  }

  return (
    <div className="space-y-4">
      <Section title="Add selection circuit" description="e.g., RNAP_promoter for pIII under an engineered promoter">
        <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Input label="Circuit ID (slug)" placeholder="sel-rnap-final-v3" {...form.register('id')} />
            <Select label="Type" options={CIRCUIT_TYPES} {...form.register('type')} />
          </div>
          <Input label="AP details" placeholder="pBAD variant; pIII under T7 promoter" {...form.register('ap_details')} />
          <Input label="CP details" placeholder="T7 RNAP expressed via arabinose" {...form.register('cp_details')} />
          <Select label="Reporter gene" options={REPORTER_GENES} {...form.register('reporter_gene')} />
          <Input label="Negative selection" placeholder="gIII-neg (AraC-pIIIneg)" {...form.register('negative_selection')} />
          <Input
            label="Stepping stones (comma-separated)"
            placeholder="T7/T3, T3, final"
            {...form.register('stepping_stones')}
          />
          <Input label="Version" placeholder="3.1" {...form.register('version')} />
          <Button type="submit">Add circuit</Button>
        </form>
        <ActionFeedback feedback={feedback} />
      </Section>

      {Object.keys(circuits).length > 0 && <JsonView value={circuits} label="Selection circuits" />}
    </div>
  )
}
