'use client'

import { useEffect, useMemo, useRef } from 'react'
import { buildSchematic, type SchematicScene } from '../schematic/schematicLayout'
import type { Campaign } from '../types'

/**
 * Memoised schematic for the current campaign. `reference` is the instant
 * hour offsets are measured from; pass a new Date to re-anchor the timeline.
 */
export const useCampaignSchematic = (campaign: Campaign, reference: Date): SchematicScene | null => {
  const scene = useMemo(() => buildSchematic(campaign, reference), [campaign, reference])
  const loggedKey = useRef('')

  useEffect(() => {
    if (!scene) return
    // header edits rebuild the scene with the same fallbacks; log only real changes
    const key = JSON.stringify(scene.diagnostics)
    if (key === loggedKey.current) return
    loggedKey.current = key
    for (const diagnostic of scene.diagnostics) {
      console.warn('Schematic fallback applied', diagnostic)
    }
  }, [scene])

  return scene
}
