'use client'
import { useForm } from 'react-hook-form'
import { zodResolver } from '@hookform/resolvers/zod'
import { Button, Input, JsonView, Section } from '../ui'
import { ontologyFormSchema, type OntologyFormValues } from '../../schema/forms'
import { useCampaign } from '../../store/useCampaign'
import { parseCommaList } from '../../utils/listInput'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

const ontologyDefaults: OntologyFormValues = { key: '', values: '' }

export default function OntologiesTab() {
  const ontologies = useCampaign((s) => s.document.campaign.ontologies)
  const setOntology = useCampaign((s) => s.setOntology)
  const { feedback, report } = useActionFeedback()
  const form = useForm<OntologyFormValues>({ resolver: zodResolver(ontologyFormSchema), defaultValues: ontologyDefaults })

  const onSubmit = ({ key, values }: OntologyFormValues) => {
    const trimmedKey = key.trim()
    if (report(setOntology(trimmedKey, parseCommaList(values)), `Saved ontology ${trimmedKey}`)) {
      form.reset(ontologyDefaults)
    }
  }

  return (
    <Section title="Ontologies" description="Controlled vocabularies keyed by name; saving an existing key replaces it">
      <form onSubmit={form.handleSubmit(onSubmit)} className="space-y-3">
        <div className="grid grid-cols-1 md:grid-cols-2 gap-3">
          <Input label="Key" placeholder="media" {...form.register('key')} />
          <Input label="Values (comma-separated)" placeholder="2xYT, LB" {...form.register('values')} />
        </div>
        <Button type="submit">Save ontology</Button>
      </form>
      <ActionFeedback feedback={feedback} />
      <JsonView value={ontologies} label="Ontologies" />
    </Section>
  )
}
