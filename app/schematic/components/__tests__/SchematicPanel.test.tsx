import React from 'react'
import { fireEvent, render, screen } from '@testing-library/react'
import { beforeEach, describe, expect, it } from 'vitest'

import { createEmptyCampaign } from '../../../campaign/factories'
import { useCampaign } from '../../../store/useCampaign'
import SchematicPanel from '../SchematicPanel'

// purpose: verify the schematic panel switches between setup guidance and the drawn timeline
// status: experimental

describe('SchematicPanel', () => {
  beforeEach(() => {
    useCampaign.setState({ document: createEmptyCampaign(new Date('2025-06-01T08:00:00Z')) })
  })

  it('shows setup steps and counts when there is nothing to draw', () => {
    useCampaign.getState().addArm({ arm_id: 'arm-a', label: '', description: '' })
    render(<SchematicPanel />)

    expect(screen.getByText('No timeline to draw yet')).toBeTruthy()
    expect(screen.getByText('Create arms in the Arms tab')).toBeTruthy()
    expect(screen.getByTestId('schematic-counts').textContent).toBe('Arms: 1 · Segments: 0 · Circuits: 0')
  })

  it('draws the sample campaign', () => {
    const { container } = render(<SchematicPanel />)

    fireEvent.click(screen.getByRole('button', { name: 'Load sample data' }))

    expect(screen.queryByText('No timeline to draw yet')).toBeNull()
    expect(screen.getByText('48.0h')).toBeTruthy()
    expect(container.querySelectorAll('[data-testid="schematic-segment"]')).toHaveLength(6)
    expect(container.querySelectorAll('[data-testid="schematic-band"]')).toHaveLength(2)
    const rows = Array.from(container.querySelectorAll('[data-testid="schematic-row"]'), (row) => row.textContent)
    expect(rows).toEqual(['arm-sp6', 'arm-t3'])
  })

  it('lists segment timings in the details table', () => {
    render(<SchematicPanel />)
    fireEvent.click(screen.getByRole('button', { name: 'Load sample data' }))

    const cells = screen.getAllByText('seg-02-t3-evolve')
    const row = cells.find((cell) => cell.tagName === 'TD')?.closest('tr')
    expect(Array.from(row?.querySelectorAll('td') ?? [], (cell) => cell.textContent)).toEqual([
      'arm-t3',
      'seg-02-t3-evolve',
      'T7/T3',
      '48.0',
      '96.0',
    ])
  })
})
