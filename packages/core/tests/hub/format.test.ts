import { describe, it, expect } from 'vitest'
import { Ok, Err, StudioError } from '../../src/common/index.js'
import { createMission, createWaypoint } from '../../src/projects/index.js'
import type { DatasetSplit, Project } from '../../src/projects/index.js'
import { loadDefaultMissionTypes } from '../../src/mission-types/index.js'
import {
  buildDataset,
  entryToMission,
  parseDatasetInfo,
  parseSplitFile,
  renderDatasetCard,
} from '../../src/hub/index.js'

const NOW = '2024-05-01T10:00:00.000Z'
const encode = (value: unknown) => new TextEncoder().encode(JSON.stringify(value))

function project(): Project {
  const first = createMission(
    {
      name: 'report 001',
      missionType: 'locate_and_report',
      instruction: 'Report detail at house number 12.',
      datasetSplit: 'sft_train',
      waypoints: [
        createWaypoint(0, {
          isTarget: true,
          gtEntities: { house_number: '12' },
          media: { forward_image: 'media/m1/waypoint_01/forward_image.PNG', ground_image: 'media/m1/waypoint_01/ground.png' },
        }),
      ],
    },
    NOW,
  )
  const second = createMission(
    { name: 'report 002', missionType: 'locate_and_report', datasetSplit: 'validation', waypoints: [createWaypoint(0)] },
    NOW,
  )
  return {
    schemaVersion: 1,
    id: 'p1',
    name: 'Field day',
    description: '',
    createdAt: NOW,
    updatedAt: NOW,
    missionTypes: ['locate_and_report'],
    missions: [
      { ...first, id: 'm1' },
      { ...second, id: 'm2' },
    ],
  }
}

describe('buildDataset', () => {
  it('writes media, split files, info and card, skipping missing media', async () => {
    const defaults = await loadDefaultMissionTypes()
    if (!defaults.ok) throw defaults.error
    const reader = async (path: string) =>
      path.endsWith('ground.png') ? Err(StudioError.notFound('Media', path)) : Ok(new TextEncoder().encode('img'))

    const files = await buildDataset(project(), defaults.value, reader)
    expect(files.ok).toBe(true)
    if (!files.ok) return

    expect(files.value.map((f) => f.path)).toEqual([
      'images/m1/waypoint_01/forward_image.png',
      'data/sft_train.json',
      'data/validation.json',
      'dataset_info.json',
      'README.md',
    ])

    const train = JSON.parse(new TextDecoder().decode(files.value[1].data))
    expect(train).toHaveLength(1)
    expect(train[0].type).toBe('locate_and_report')
    expect(train[0].state_config.initial_state).toBe('search')
    expect(train[0].waypoints[0]).toMatchObject({
      id: 'waypoint_01',
      is_target: true,
      gt_entities: { house_number: '12' },
      media: ['images/m1/waypoint_01/forward_image.png'],
      media_labels: ['forward_image'],
    })

    const info = JSON.parse(new TextDecoder().decode(files.value[3].data))
    expect(info.schema_version).toBe(1)
    expect(info.splits).toEqual(['sft_train', 'validation'])
    expect(info.mission_count).toBe(2)
    expect(Object.keys(info.mission_types)).toEqual(['locate_and_report', 'locate_and_land_safely', 'locate_and_track'])
  })

  it('fails on media errors other than a missing file', async () => {
    const reader = async () => Err(StudioError.io('disk on fire'))
    const files = await buildDataset(project(), [], reader)
    expect(files.ok).toBe(false)
    if (!files.ok) expect(files.error.message).toBe('disk on fire')
  })
})

describe('renderDatasetCard', () => {
  it('lists each split in the front matter and the table', () => {
    const card = renderDatasetCard(
      project(),
      new Map<DatasetSplit, number>([
        ['sft_train', 1],
        ['validation', 1],
      ]),
    )
    expect(card).toBe(
      [
        '---',
        'configs:',
        '- config_name: default',
        '  data_files:',
        '  - split: sft_train',
        '    path: data/sft_train.json',
        '  - split: validation',
        '    path: data/validation.json',
        '---',
        '',
        '# Field day',
        '',
        '| Split | Missions |',
        '|---|---|',
        '| sft_train | 1 |',
        '| validation | 1 |',
        '',
        'Mission types: `locate_and_report`',
        '',
      ].join('\n'),
    )
  })
})

describe('parseDatasetInfo', () => {
  const info = {
    schema_version: 1,
    project: { name: 'Field day' },
    mission_types: {},
    splits: ['sft_train'],
  }

  it('accepts the current schema version', () => {
    const result = parseDatasetInfo(encode(info))
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.project.description).toBe('')
  })

  it('rejects other schema versions and bad JSON', () => {
    const version = parseDatasetInfo(encode({ ...info, schema_version: 2 }))
    expect(version.ok).toBe(false)
    if (!version.ok) expect(version.error.message).toBe('Unsupported dataset schema version 2 (expected 1)')

    const garbage = parseDatasetInfo(new TextEncoder().encode('<html>'))
    expect(garbage.ok).toBe(false)
    if (!garbage.ok) expect(garbage.error.message).toBe('dataset_info.json is not valid JSON')
  })

  it('names the offending field', () => {
    const result = parseDatasetInfo(encode({ ...info, splits: ['test'] }))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message.startsWith('dataset_info.json: splits.0: ')).toBe(true)
  })
})

describe('entryToMission', () => {
  const entry = {
    id: 'm1',
    type: 'locate_and_report',
    dataset_split: 'rl_train',
    instruction: '',
    mission_instruction: 'Report detail at house number 12.',
    waypoints: [
      {
        id: 'waypoint_01',
        gt_entities: { house_number: 12 },
        is_target: true,
        media: ['images/m1/waypoint_01/forward_image.png', 'images/m1/waypoint_01/other.JPG'],
        media_labels: ['forward_image.png', 'forward_image'],
      },
    ],
  }

  function parse(value: unknown) {
    const parsed = parseSplitFile(encode([value]), 'rl_train')
    if (!parsed.ok) throw parsed.error
    return parsed.value[0]
  }

  it('maps entries to imported missions and plans media targets', () => {
    const result = entryToMission(parse(entry), NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const { mission, media } = result.value
    expect(mission.name).toBe('m1')
    expect(mission.creationSource).toBe('imported')
    expect(mission.instruction).toBe('Report detail at house number 12.')
    expect(mission.createdAt).toBe(NOW)
    expect(mission.waypoints[0].gtEntities).toEqual({ house_number: '12' })
    expect(mission.waypoints[0].media).toEqual({
      forward_image: 'media/m1/waypoint_01/forward_image.png',
      forward_image_1: 'media/m1/waypoint_01/forward_image_1.jpg',
    })
    expect(media).toEqual([
      { source: 'images/m1/waypoint_01/forward_image.png', target: 'media/m1/waypoint_01/forward_image.png' },
      { source: 'images/m1/waypoint_01/other.JPG', target: 'media/m1/waypoint_01/forward_image_1.jpg' },
    ])
  })

  it('rejects media outside images/ and unsupported types', () => {
    const outside = entryToMission(parse({ ...entry, waypoints: [{ ...entry.waypoints[0], media: ['data/x.png'] }] }), NOW)
    expect(outside.ok).toBe(false)
    if (!outside.ok) expect(outside.error.message).toBe('Mission m1: media path outside images/: data/x.png')

    const bmp = entryToMission(parse({ ...entry, waypoints: [{ ...entry.waypoints[0], media: ['images/x.bmp'] }] }), NOW)
    expect(bmp.ok).toBe(false)
    if (!bmp.ok) expect(bmp.error.message).toBe('Mission m1: unsupported media type: images/x.bmp')
  })

  it('reports malformed split files as FORMAT_ERROR', () => {
    const result = parseSplitFile(encode([{ id: 'm1' }]), 'rl_train')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('FORMAT_ERROR')
      expect(result.error.message.startsWith('data/rl_train.json: 0.')).toBe(true)
    }
  })
})
