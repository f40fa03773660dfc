'use client'
import { Download, RotateCcw, Upload } from 'lucide-react'
import { Alert, Button, Input } from '../ui'
import { CampaignImportError, campaignToJson, campaignToYaml } from '../../campaign/serialization'
import { EXPORT_FILENAMES } from '../../config/campaign'
import { useImportCampaign } from '../../hooks/useCampaignFiles'
import { useCampaign } from '../../store/useCampaign'
import { downloadText } from '../../utils/download'
import ValidatePanel from './ValidatePanel'

export default function ImportExportSidebar() {
  const campaignDocument = useCampaign((s) => s.document)
  const resetCampaign = useCampaign((s) => s.resetCampaign)
  const importCampaign = useImportCampaign()
  const importError = importCampaign.error

  return (
    <aside className="space-y-6">
      <section className="space-y-2">
        <h2 className="flex items-center gap-2 text-sm font-semibold text-neutral-900">
          <Upload className="h-4 w-4" aria-hidden="true" /> Import
        </h2>
        <Input
          label="Import existing JSON or YAML"
          type="file"
          accept=".json,.yaml,.yml"
          disabled={importCampaign.isPending}
          onChange={(e) => {
            const file = e.target.files?.[0]
            if (file) importCampaign.mutate(file)
          }}
        />
        {importCampaign.isSuccess && <Alert variant="success">Loaded campaign into session.</Alert>}
        {importError && (
          <Alert variant="error" title={importError.message}>
            {importError instanceof CampaignImportError && importError.issues.length > 0 && (
              <ul className="mt-1 space-y-0.5 font-mono text-xs">
                {importError.issues.map((issue) => (
                  <li key={`${issue.path}:${issue.message}`}>
                    {issue.path}: {issue.message}
                  </li>
                ))}
              </ul>
            )}
          </Alert>
        )}
      </section>

      <section className="space-y-2">
        <h2 className="flex items-center gap-2 text-sm font-semibold text-neutral-900">
          <Download className="h-4 w-4" aria-hidden="true" /> Export
        </h2>
        <div className="flex flex-wrap gap-2">
          <Button
            size="sm"
            onClick={() => downloadText(campaignToJson(campaignDocument), EXPORT_FILENAMES.json, 'application/json')}
          >
            Download JSON
          </Button>
          <Button
            size="sm"
            variant="secondary"
            onClick={() => downloadText(campaignToYaml(campaignDocument), EXPORT_FILENAMES.yaml, 'application/x-yaml')}
          >
            Download YAML
          </Button>
        </div>
        <ValidatePanel document={campaignDocument} />
      </section>

      <Button variant="ghost" size="sm" onClick={() => resetCampaign(new Date())}>
        <RotateCcw className="h-4 w-4" aria-hidden="true" /> Start new campaign
      </Button>
    </aside>
  )
}
