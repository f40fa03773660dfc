'use client'
import { useState, type ComponentType } from 'react'
import { Tabs, type TabItem } from './components/ui'
import AnalysesTab from './components/campaign/AnalysesTab'
import ArmsTab from './components/campaign/ArmsTab'
import AttachmentsTab from './components/campaign/AttachmentsTab'
import CampaignHeaderForm from './components/campaign/CampaignHeaderForm'
import ImportExportSidebar from './components/campaign/ImportExportSidebar'
import LagoonsTab from './components/campaign/LagoonsTab'
import OntologiesTab from './components/campaign/OntologiesTab'
import SegmentsTab from './components/campaign/SegmentsTab'
import SelectionCircuitsTab from './components/campaign/SelectionCircuitsTab'
import SchematicPanel from './schematic/components/SchematicPanel'

type EditorTab = 'circuits' | 'arms' | 'lagoons' | 'segments' | 'analyses' | 'attachments' | 'ontologies'

const EDITOR_TABS: ReadonlyArray<TabItem<EditorTab>> = [
  { key: 'circuits', label: 'Selection Circuits' },
  { key: 'arms', label: 'Arms & Timepoints' },
  { key: 'lagoons', label: 'Lagoons & Samples' },
  { key: 'segments', label: 'Segments' },
  { key: 'analyses', label: 'Analyses' },
  { key: 'attachments', label: 'Attachments' },
  { key: 'ontologies', label: 'Ontologies' },
]

const TAB_CONTENT: Record<EditorTab, ComponentType> = {
  circuits: SelectionCircuitsTab,
  arms: ArmsTab,
  lagoons: LagoonsTab,
  segments: SegmentsTab,
  analyses: AnalysesTab,
  attachments: AttachmentsTab,
  ontologies: OntologiesTab,
}

export default function Home() {
  const [activeTab, setActiveTab] = useState<EditorTab>('circuits')
  const ActivePanel = TAB_CONTENT[activeTab]

  return (
    <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
      <div className="grid grid-cols-1 lg:grid-cols-4 gap-8">
        <div id="editor" className="lg:col-span-3 space-y-6">
          <CampaignHeaderForm />
          <Tabs tabs={EDITOR_TABS} active={activeTab} onChange={setActiveTab} />
          <ActivePanel />
        </div>
        <ImportExportSidebar />
      </div>
      <div id="schematic" className="mt-8">
        <SchematicPanel />
      </div>
    </div>
  )
}
