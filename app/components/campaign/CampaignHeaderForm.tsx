'use client'
import { Input, Section, TextArea } from '../ui'
import { useCampaign } from '../../store/useCampaign'
import type { PlasmidSet } from '../../types'
import { CommaListInput } from './CommaListInput'

const PLASMID_FIELDS: Array<{ key: keyof PlasmidSet; label: string; placeholder: string }> = [
  { key: 'AP', label: 'AP plasmid', placeholder: 'ap-pt7-v3' },
  { key: 'CP', label: 'CP plasmid', placeholder: 'cp-T7RNAP' },
  { key: 'MP', label: 'MP plasmid', placeholder: 'MP6' },
  { key: 'DP', label: 'DP plasmid', placeholder: 'DP6' },
]

export default function CampaignHeaderForm() {
  const campaign = useCampaign((s) => s.document.campaign)
  const updateCampaign = useCampaign((s) => s.updateCampaign)
  const updateStartingProtein = useCampaign((s) => s.updateStartingProtein)
  const updateHostSystem = useCampaign((s) => s.updateHostSystem)
  const updatePlasmids = useCampaign((s) => s.updatePlasmids)
  const protein = campaign.starting_protein
  const host = campaign.host_system

  return (
    <div className="space-y-4">
      <Section title="Campaign Header">
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          <div className="space-y-3">
            <Input
              label="Campaign ID (slug)"
              value={campaign.campaign_id}
              placeholder="cmp-2025-mdh-evolution"
              onChange={(e) => updateCampaign({ campaign_id: e.target.value })}
            />
            <Input
              label="Title"
              value={campaign.title}
              placeholder="Evolving Mdh variants to promoter X"
              onChange={(e) => updateCampaign({ title: e.target.value })}
            />
            <Input
              label="Created by"
              value={campaign.created_by}
              placeholder="liu-lab"
              onChange={(e) => updateCampaign({ created_by: e.target.value })}
            />
          </div>
          <div className="space-y-3">
            <Input
              label="Created at (ISO8601)"
              value={campaign.created_at}
              placeholder="2025-08-15T19:22:00-04:00"
              onChange={(e) => updateCampaign({ created_at: e.target.value })}
            />
            <TextArea
              label="Notes"
              value={campaign.notes}
              placeholder="Observations, deviations, etc."
              onChange={(e) => updateCampaign({ notes: e.target.value })}
            />
          </div>
        </div>
      </Section>

      <Section title="Starting Protein">
        <Input
          label="Starting protein name"
          value={protein.name}
          placeholder="Mdh_v0"
          onChange={(e) => updateStartingProtein({ name: e.target.value })}
        />
        <TextArea
          label="DNA sequence"
          rows={4}
          value={protein.dna_seq}
          placeholder="ATG...TAA"
          onChange={(e) => updateStartingProtein({ dna_seq: e.target.value })}
        />
        <TextArea
          label="AA sequence"
          rows={4}
          value={protein.aa_seq}
          placeholder="M...*"
          onChange={(e) => updateStartingProtein({ aa_seq: e.target.value })}
        />
        <Input
          label="Vector context"
          value={protein.vector_context}
          placeholder="pBAD-MCS; N-term 6xHis"
          onChange={(e) => updateStartingProtein({ vector_context: e.target.value })}
        />
        <CommaListInput
          label="Features (comma-separated)"
          values={protein.features}
          placeholder="His-tag, TEV site"
          onCommit={(features) => updateStartingProtein({ features })}
        />
      </Section>

      <Section title="Host System">
        <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
          <Input
            label="Strain"
            value={host.strain}
            placeholder="S2060"
            onChange={(e) => updateHostSystem({ strain: e.target.value })}
          />
          <Input
            label="Genotype"
            value={host.genotype}
            placeholder="ΔendA ΔrecA F+"
            onChange={(e) => updateHostSystem({ genotype: e.target.value })}
          />
          <Input
            label="F' status"
            value={host.F_prime_status}
            placeholder="F' lacIq"
            onChange={(e) => updateHostSystem({ F_prime_status: e.target.value })}
          />
        </div>
        <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
          {PLASMID_FIELDS.map(({ key, label, placeholder }) => (
            <Input
              key={key}
              label={label}
              value={host.plasmids[key]}
              placeholder={placeholder}
              onChange={(e) => updatePlasmids({ [key]: e.target.value })}
            />
          ))}
        </div>
        <CommaListInput
          label="Resistances (comma-separated)"
          values={host.resistances}
          placeholder="ampicillin, chloramphenicol"
          onCommit={(resistances) => updateHostSystem({ resistances })}
        />
      </Section>
    </div>
  )
}
