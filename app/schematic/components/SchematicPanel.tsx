'use client'
import { useMemo, useState } from 'react'
import { GitBranch, RefreshCw } from 'lucide-react'
import { Button, EmptyState, Section } from '../../components/ui'
import { useCampaignSchematic } from '../../hooks/useCampaignSchematic'
import { useCampaign } from '../../store/useCampaign'
import { PROMOTER_COLORS, PROMOTER_KINDS, PROMOTER_LABELS } from '../promoterClassifier'
import { summariseCampaign } from '../summary'
import SchematicChart from './SchematicChart'

const SETUP_STEPS = [
  'Create arms in the Arms tab',
  'Add selection circuits in the Selection Circuits tab',
  'Create segments in the Segments tab and assign them to arms',
]

const Metric = ({ label, value }: { label: string; value: string | number }) => (
  <div className="rounded-md border border-neutral-200 p-3">
    <div className="text-xs text-neutral-500">{label}</div>
    <div className="text-lg font-semibold text-neutral-900">{value}</div>
  </div>
)

export default function SchematicPanel() {
  const campaign = useCampaign((s) => s.document.campaign)
  const loadSampleCampaign = useCampaign((s) => s.loadSampleCampaign)
  const [reference, setReference] = useState(() => new Date())
  const scene = useCampaignSchematic(campaign, reference)
  const summary = useMemo(() => summariseCampaign(campaign), [campaign])

  const loadSample = () => {
    const now = new Date()
    loadSampleCampaign(now)
    setReference(now)
  }

  const actions = (
    <div className="flex gap-2">
      <Button size="sm" variant="ghost" onClick={() => setReference(new Date())}>
        <RefreshCw className="h-4 w-4" aria-hidden="true" /> Refresh
      </Button>
      <Button size="sm" variant="secondary" onClick={loadSample}>
        Load sample data
      </Button>
    </div>
  )

  if (!scene) {
    return (
      <Section title="Campaign Schematic" actions={actions}>
        <EmptyState
          icon={<GitBranch className="h-8 w-8" aria-hidden="true" />}
          title="No timeline to draw yet"
          description="Add arms and segments to see the campaign schematic."
        />
        <ol className="list-decimal space-y-1 pl-6 text-sm text-neutral-700">
          {SETUP_STEPS.map((step) => (
            <li key={step}>{step}</li>
          ))}
        </ol>
        <p className="text-sm text-neutral-600" data-testid="schematic-counts">
          Arms: {summary.arm_count} · Segments: {summary.segment_count} · Circuits: {summary.circuit_count}
        </p>
      </Section>
    )
  }

  return (
    <Section title="Campaign Schematic" actions={actions}>
      <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
        <Metric label="Arms" value={summary.arm_count} />
        <Metric label="Segments" value={summary.segment_count} />
        <Metric label="Selection circuits" value={summary.circuit_count} />
        <Metric label="Max duration" value={`${summary.max_duration_hours.toFixed(1)}h`} />
      </div>

      <div className="overflow-x-auto">
        <SchematicChart scene={scene} />
      </div>

      <div>
        <h4 className="text-sm font-semibold text-neutral-900 mb-2">Promoter colours</h4>
        <ul className="grid grid-cols-2 md:grid-cols-4 gap-2 text-xs text-neutral-700">
          {PROMOTER_KINDS.map((kind) => (
            <li key={kind} className="flex items-center gap-2">
              <span className="inline-block h-3 w-3 rounded-sm" style={{ backgroundColor: PROMOTER_COLORS[kind] }} />
              {PROMOTER_LABELS[kind]}
            </li>
          ))}
        </ul>
      </div>

      <details>
        <summary className="cursor-pointer text-sm font-medium text-neutral-700">Segment details</summary>
        <table className="mt-2 w-full text-left text-xs">
          <thead>
            <tr className="text-neutral-500">
              <th className="py-1">Arm</th>
              <th className="py-1">Segment</th>
              <th className="py-1">Promoter</th>
              <th className="py-1">Start (h)</th>
              <th className="py-1">End (h)</th>
            </tr>
          </thead>
          <tbody>
            {scene.segments.map((segment, index) => (
              <tr key={`${segment.armId}:${segment.segmentId}:${index}`} className="border-t border-neutral-100">
                <td className="py-1">{segment.armId}</td>
                <td className="py-1">{segment.segmentId}</td>
                <td className="py-1">{PROMOTER_LABELS[segment.promoter]}</td>
                <td className="py-1">{segment.x0.toFixed(1)}</td>
                <td className="py-1">{segment.x1.toFixed(1)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </details>
    </Section>
  )
}
