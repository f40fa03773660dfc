'use client'
import { Paperclip } from 'lucide-react'
import { EmptyState, Input, JsonView, Section } from '../ui'
import { useStageAttachments } from '../../hooks/useCampaignFiles'
import { useCampaign } from '../../store/useCampaign'
import { ActionFeedback, useActionFeedback } from './ActionFeedback'

export default function AttachmentsTab() {
  const attachments = useCampaign((s) => s.document.campaign.attachments)
  const stageAttachments = useStageAttachments()
  const { feedback, report, warn } = useActionFeedback()

  const onFiles = (files: File[]) => {
    if (files.length === 0) return
    stageAttachments.mutate(files, {
      onSuccess: (staged) => report({ ok: true }, `Attached ${staged.length} file(s)`),
      onError: (error) => warn(`Failed to attach files: ${error.message}`),
    })
  }

  return (
    <Section title="Attachments" description="Files are hashed and recorded by reference">
      <Input
        label="Attach files"
        type="file"
        multiple
        disabled={stageAttachments.isPending}
        onChange={(e) => onFiles(Array.from(e.target.files ?? []))}
      />
      <ActionFeedback feedback={feedback} />
      {attachments.length > 0 ? (
        <JsonView value={attachments} label="Attachments" />
      ) : (
        <EmptyState title="No attachments" icon={<Paperclip className="h-8 w-8" aria-hidden="true" />} />
      )}
    </Section>
  )
}
