import React from 'react'
import { fireEvent, render, screen } from '@testing-library/react'
import { describe, expect, it } from 'vitest'

import { createEmptyCampaign, createSampleCampaign } from '../../../campaign/factories'
import ValidatePanel, { checkDocument } from '../ValidatePanel'

const now = new Date('2025-06-01T08:00:00Z')

describe('ValidatePanel', () => {
  it('confirms a valid document on demand', () => {
    render(<ValidatePanel document={createEmptyCampaign(now)} />)
    expect(screen.queryByText('Valid ✓')).toBeNull()

    fireEvent.click(screen.getByRole('button', { name: 'Validate now' }))
    expect(screen.getByText('Valid ✓')).toBeTruthy()
  })

  it('lists unresolved segment references as warnings', () => {
    const document = createSampleCampaign(now)
    const [first] = document.campaign.segments
    const withGhostArm = {
      ...document,
      campaign: { ...document.campaign, segments: [{ ...first, applied_to_arms: ['arm-ghost'] }] },
    }

    expect(checkDocument(withGhostArm)).toEqual({
      errors: [],
      warnings: [{ path: '$.campaign.segments[0].applied_to_arms[0]', message: 'Unknown arm "arm-ghost"' }],
    })

    render(<ValidatePanel document={withGhostArm} />)
    fireEvent.click(screen.getByRole('button', { name: 'Validate now' }))
    expect(screen.getByText('Unresolved references')).toBeTruthy()
  })
})
