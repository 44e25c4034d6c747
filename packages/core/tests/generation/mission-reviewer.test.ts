import { describe, it, expect } from 'vitest'
import {
  applyReviewThreshold,
  buildReviewPrompt,
  failedReview,
  parseReviewReply,
} from '../../src/generation/index.js'
import { createMission, createWaypoint } from '../../src/projects/index.js'

const mission = createMission({
  name: 'Report 001',
  missionType: 'locate_and_report',
  instruction: 'Report house number 42.',
  waypoints: [
    createWaypoint(0, { gtEntities: { house_number: '17' } }),
    createWaypoint(1, { isTarget: true, gtEntities: { house_number: '42' } }),
  ],
})

describe('buildReviewPrompt', () => {
  it('places each image after the waypoint it belongs to', () => {
    const image = { waypointId: 'waypoint_02', label: 'forward_image', data: new Uint8Array([1]), ext: 'png' }
    const parts = buildReviewPrompt(mission, [image])

    expect(parts.map((p) => p.kind)).toEqual(['text', 'text', 'text', 'text', 'image', 'text'])
    expect(parts[0].kind === 'text' && parts[0].text).toContain('Instruction: "Report house number 42."')
    expect(parts[1]).toEqual({
      kind: 'text',
      text: 'Waypoint waypoint_01 [DISTRACTOR (must not match)] expected entities: house_number=17',
    })
    expect(parts[2]).toEqual({
      kind: 'text',
      text: 'Waypoint waypoint_02 [TARGET (must match)] expected entities: house_number=42',
    })
    expect(parts[3]).toEqual({ kind: 'text', text: 'Image (forward_image):' })
    expect(parts[4]).toEqual({ kind: 'image', image })
  })
})

describe('parseReviewReply', () => {
  it('maps the reply fields onto a mission validation', () => {
    const reply = '```json\n{"mission_is_valid": true, "confidence_score": 0.92, "needs_human_review": false, "reasoning": "Number 42 is legible."}\n```'
    expect(parseReviewReply(reply)).toEqual({
      ok: true,
      value: { isValid: true, confidence: 0.92, needsHumanReview: false, reasoning: 'Number 42 is legible.' },
    })
  })

  it('rejects replies that are not JSON or miss fields', () => {
    const notJson = parseReviewReply('looks fine to me')
    expect(notJson.ok).toBe(false)
    if (!notJson.ok) expect(notJson.error.message).toBe('Review reply is not valid JSON')

    const partial = parseReviewReply('{"mission_is_valid": true, "confidence_score": 2}')
    expect(partial.ok).toBe(false)
    if (!partial.ok) expect(partial.error.message.startsWith('Review reply is malformed at confidence_score: ')).toBe(true)
  })
})

describe('applyReviewThreshold', () => {
  const verdict = { isValid: true, confidence: 0.7, needsHumanReview: false, reasoning: 'Partly hidden.' }

  it('forces review below the threshold', () => {
    expect(applyReviewThreshold(verdict, 0.75)).toEqual({
      ...verdict,
      needsHumanReview: true,
      reasoning: 'Partly hidden. [review forced: confidence 0.7 is below 0.75]',
    })
  })

  it('leaves confident or already flagged verdicts alone', () => {
    expect(applyReviewThreshold(verdict, 0.7)).toEqual(verdict)
    const flagged = { ...verdict, needsHumanReview: true }
    expect(applyReviewThreshold(flagged, 0.75)).toBe(flagged)
  })

  it('treats a failed review as invalid and needing a person', () => {
    expect(failedReview('timeout')).toEqual({
      isValid: false,
      confidence: 0,
      needsHumanReview: true,
      reasoning: 'Review failed: timeout',
    })
  })
})
