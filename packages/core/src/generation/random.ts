/**
 * Seeded randomness for reproducible generation runs.
 */

import type { Landmark } from '../projects/index.js'

export type Rng = () => number

export const LANDMARK_DISTRIBUTIONS = ['model', 'uniform', 'clustered'] as const
export type LandmarkDistribution = (typeof LANDMARK_DISTRIBUTIONS)[number]

/** mulberry32. Without a seed the stream is seeded from Math.random. */
export function createRng(seed?: number): Rng {
  let state = (seed ?? Math.floor(Math.random() * 2 ** 32)) >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Pick an entry with probability proportional to its weight. Weights must sum above zero. */
export function weightedChoice<T>(rng: Rng, entries: ReadonlyArray<readonly [T, number]>): T {
  const total = entries.reduce((sum, [, w]) => sum + Math.max(0, w), 0)
  if (entries.length === 0 || total <= 0) {
    throw new RangeError('weightedChoice needs at least one positive weight')
  }
  let roll = rng() * total
  for (const [value, weight] of entries) {
    if (weight <= 0) continue
    roll -= weight
    if (roll < 0) return value
  }
  // Floating-point slack: fall back to the last positive entry.
  for (let i = entries.length - 1; i >= 0; i--) {
    if (entries[i][1] > 0) return entries[i][0]
  }
  return entries[entries.length - 1][0]
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n))
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000
}

const CLUSTER_SPREAD = 0.3

/**
 * Landmark placement.
 * `model` keeps the positions the model proposed (clamped to the image),
 * `uniform` samples every landmark independently over the image,
 * `clustered` samples one centre per waypoint and scatters landmarks around it.
 */
export function placeLandmarks(landmarks: Landmark[], policy: LandmarkDistribution, rng: Rng): Landmark[] {
  switch (policy) {
    case 'model':
      return landmarks.map((l): Landmark => ({
        ...l,
        position: [round3(clamp01(l.position[0])), round3(clamp01(l.position[1]))],
      }))
    case 'uniform':
      return landmarks.map((l): Landmark => ({ ...l, position: [round3(rng()), round3(rng())] }))
    case 'clustered': {
      const cx = 0.2 + 0.6 * rng()
      const cy = 0.2 + 0.6 * rng()
      return landmarks.map((l): Landmark => ({
        ...l,
        position: [
          round3(clamp01(cx + (rng() - 0.5) * CLUSTER_SPREAD)),
          round3(clamp01(cy + (rng() - 0.5) * CLUSTER_SPREAD)),
        ],
      }))
    }
  }
}
