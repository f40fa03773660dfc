'use client'
import { FlaskConical } from 'lucide-react'
import { useCampaign } from '../../store/useCampaign'

const NAV_ITEMS = [
  { href: '#editor', label: 'Editor' },
  { href: '#schematic', label: 'Schematic' },
]

export default function Header() {
  const campaignId = useCampaign((s) => s.document.campaign.campaign_id)
  const schemaVersion = useCampaign((s) => s.document.schema_version)

  return (
    <header className="bg-white border-b border-neutral-200 sticky top-0 z-50">
      <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
        <div className="flex justify-between items-center h-16">
          <a href="#editor" className="flex items-center space-x-3">
            <div className="w-8 h-8 bg-primary-500 rounded-lg flex items-center justify-center">
              <FlaskConical className="w-5 h-5 text-white" aria-hidden="true" />
            </div>
            <span className="text-xl font-bold text-neutral-900">PACE/PANCE Campaign Builder</span>
          </a>

          <nav className="hidden md:flex items-center space-x-1">
            {NAV_ITEMS.map((item) => (
              <a
                key={item.href}
                href={item.href}
                className="px-3 py-2 text-sm font-medium text-neutral-700 hover:text-primary-600 hover:bg-primary-50 rounded-md transition-colors"
              >
                {item.label}
              </a>
            ))}
          </nav>

          <div className="text-xs text-neutral-500 text-right">
            <div className="font-mono">{campaignId || 'untitled campaign'}</div>
            <div>schema v{schemaVersion}</div>
          </div>
        </div>
      </div>
    </header>
  )
}
