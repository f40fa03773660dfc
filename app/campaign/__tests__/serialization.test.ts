import { describe, expect, it } from 'vitest'

import { createSampleCampaign } from '../factories'
import {
  CampaignImportError,
  campaignToJson,
  campaignToYaml,
  detectCampaignFormat,
  parseCampaignText,
} from '../serialization'

const now = new Date('2025-06-01T08:00:00Z')

describe('detectCampaignFormat', () => {
  it('picks YAML by extension and JSON otherwise', () => {
    expect(detectCampaignFormat('campaign.yaml')).toBe('yaml')
    expect(detectCampaignFormat('CAMPAIGN.YML')).toBe('yaml')
    expect(detectCampaignFormat('campaign.json')).toBe('json')
    expect(detectCampaignFormat('campaign')).toBe('json')
  })
})

describe('campaign export', () => {
  it('writes indented JSON', () => {
    const text = campaignToJson(createSampleCampaign(now))
    expect(text.startsWith('{\n  "schema_version": "0.1.0",\n  "campaign": {\n    "campaign_id": "sample-campaign"')).toBe(true)
  })

  it('writes YAML that imports back to the same document', () => {
    const document = createSampleCampaign(now)
    const text = campaignToYaml(document)
    expect(text.split('\n')[0]).toBe('schema_version: 0.1.0')
    expect(parseCampaignText(text, 'yaml')).toEqual(document)
  })
})

describe('parseCampaignText', () => {
  it('reads exported JSON', () => {
    const document = createSampleCampaign(now)
    expect(parseCampaignText(campaignToJson(document), 'json')).toEqual(document)
  })

  it('keeps fields the editor does not model', () => {
    const document = createSampleCampaign(now)
    const extended = {
      ...document,
      campaign: {
        ...document.campaign,
        funding: 'grant-42',
        segments: document.campaign.segments.map((segment, index) =>
          index === 0 ? { ...segment, operator: 'alice' } : segment,
        ),
      },
    }

    const imported = parseCampaignText(JSON.stringify(extended), 'json')
    expect(JSON.parse(campaignToJson(imported))).toEqual(extended)
    expect(parseCampaignText(campaignToYaml(imported), 'yaml')).toEqual(extended)
  })

  it('fills omitted editor fields with empty values', () => {
    const document = createSampleCampaign(now)
    const { notes: _notes, ...campaign } = document.campaign
    const { mode: _mode, ...segment } = document.campaign.segments[0]

    const text = JSON.stringify({ ...document, campaign: { ...campaign, segments: [segment] } })

    const imported = parseCampaignText(text, 'json')
    expect(imported.campaign.notes).toBe('')
    expect(imported.campaign.segments[0].mode).toBe('PACE')
    expect(imported.campaign.segments[0].segment_id).toBe('seg-01-t3-init')
  })

  it('reports malformed text', () => {
    expect(() => parseCampaignText('{"campaign": ', 'json')).toThrow(/^Failed to parse JSON: /)
  })

  it('carries validation issues on the error', () => {
    let caught: unknown
    try {
      parseCampaignText('{"schema_version": "0.1.0"}', 'json')
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(CampaignImportError)
    if (!(caught instanceof CampaignImportError)) return
    expect(caught.message).toBe('1 validation error(s) in imported campaign')
    expect(caught.issues).toEqual([{ path: '$.campaign', message: 'Required' }])
  })
})
