// =============================================================================
// Stepweave - Lane Evaluation
// =============================================================================
//
// A lane holds no cursor. Its position is recomputed from the rhythm step on
// every call, so evaluating the same step twice gives the same result.

import { MAX_GATE_PERCENT, MAX_REGISTER_NOTES } from '../constants'
import { clampInt } from '../config/normalize'
import { chanceHit, signedOffset, stepRand } from '../random/prng'
import type { GlobalConfig, LaneConfig, OctaveRange } from '../types'
import { euclideanHit } from './euclidean'

/** Octave jumps a lane may pick from, per range setting */
export const OCTAVE_OFFSETS: Readonly<Record<OctaveRange, readonly number[]>> = {
  '+1': [0, 1],
  '-1': [-1, 0],
  '+-1': [-1, 0, 1],
  '+2': [0, 1, 2],
  '-2': [-2, -1, 0],
  '+-2': [-2, -1, 0, 1, 2]
}

const SALT = {
  DROP: 0x1000,
  NOTE: 0x2000,
  OCTAVE: 0x3000,
  VELOCITY: 0x4000,
  GATE: 0x5000,
  MISSING_NOTE: 0x6000
} as const

export type LaneSettings = Pick<
  GlobalConfig,
  | 'velocity'
  | 'velocityRandom'
  | 'gate'
  | 'gateRandom'
  | 'randomSeed'
  | 'randCycle'
  | 'missingNotePolicy'
  | 'missingNoteSeed'
  | 'octave'
>

export interface LaneContext {
  settings: LaneSettings
  /** Register shared by every lane for this anchor step */
  register: readonly number[]
  rhythmStep: number
}

export type LaneOutcome =
  | { kind: 'rest' }
  | { kind: 'dropped' }
  | { kind: 'missing' }
  | { kind: 'note'; pitch: number; velocity: number; gate: number }

// =============================================================================
// Seeds
// =============================================================================

/** Every random draw repeats after `randCycle` steps. */
export function cycleStep(settings: Pick<LaneSettings, 'randCycle'>, rhythmStep: number): number {
  return rhythmStep % clampInt(settings.randCycle, 1, 128)
}

function globalLaneSeed(seed: number, laneIndex: number, offset: number): number {
  return (seed + 1 + (laneIndex + 1) * 1000 + offset) >>> 0
}

// =============================================================================
// Register Index
// =============================================================================

/**
 * Reflect an index back into [0, count) like a triangle wave.
 */
export function foldIndex(index: number, count: number): number {
  if (count <= 1) return 0
  const period = (count - 1) * 2
  let i = index % period
  if (i < 0) i += period
  return i >= count ? period - i : i
}

/**
 * Map a requested register index onto the current register, applying the
 * missing-note policy when it falls outside. Returns -1 when the lane should
 * stay silent.
 */
export function resolveRegisterIndex(
  requested: number,
  registerLength: number,
  laneIndex: number,
  settings: LaneSettings,
  rhythmStep: number
): number {
  if (registerLength <= 0) return -1
  if (requested >= 0 && requested < registerLength) return requested

  switch (settings.missingNotePolicy) {
    case 'fold':
      return foldIndex(requested, registerLength)
    case 'wrap':
      return ((requested % registerLength) + registerLength) % registerLength
    case 'random': {
      const draw = stepRand(
        globalLaneSeed(settings.missingNoteSeed, laneIndex, SALT.MISSING_NOTE),
        cycleStep(settings, rhythmStep),
        SALT.MISSING_NOTE
      )
      return draw % registerLength
    }
    case 'skip':
    default:
      return -1
  }
}

// =============================================================================
// Per-Hit Values
// =============================================================================

export function laneVelocity(
  lane: LaneConfig,
  laneIndex: number,
  settings: LaneSettings,
  rhythmStep: number
): number {
  let velocity = clampInt(lane.velocity > 0 ? lane.velocity : settings.velocity, 1, 127)
  if (settings.velocityRandom > 0) {
    const draw = stepRand(
      globalLaneSeed(settings.randomSeed, laneIndex, SALT.VELOCITY),
      cycleStep(settings, rhythmStep),
      SALT.VELOCITY
    )
    velocity += signedOffset(draw, settings.velocityRandom)
  }
  return clampInt(velocity, 1, 127)
}

export function laneGate(
  lane: LaneConfig,
  laneIndex: number,
  settings: LaneSettings,
  rhythmStep: number
): number {
  let gate = clampInt(lane.gate > 0 ? lane.gate : settings.gate, 0, MAX_GATE_PERCENT)
  if (settings.gateRandom > 0) {
    const draw = stepRand(
      globalLaneSeed(settings.randomSeed, laneIndex, SALT.GATE),
      cycleStep(settings, rhythmStep),
      SALT.GATE
    )
    gate += signedOffset(draw, settings.gateRandom)
  }
  return clampInt(gate, 0, MAX_GATE_PERCENT)
}

/**
 * Pitch for a hit, or -1 when the register has nothing for this lane.
 */
export function selectLanePitch(
  lane: LaneConfig,
  laneIndex: number,
  context: LaneContext
): number {
  const { register, settings, rhythmStep } = context
  const folded = cycleStep(settings, rhythmStep)
  const requested = clampInt(lane.note, 1, MAX_REGISTER_NOTES) - 1
  const base = resolveRegisterIndex(requested, register.length, laneIndex, settings, rhythmStep)
  if (base < 0) return -1

  let index = base
  if (lane.noteRandom > 0 && register.length > 1) {
    const draw = stepRand(lane.noteSeed + 1, folded, SALT.NOTE + laneIndex)
    if (chanceHit(draw, lane.noteRandom)) {
      // Pick among the other indices so a substitution always changes the note
      index = (draw >>> 8) % (register.length - 1)
      if (index >= base) index++
    }
  }

  let pitch = register[index]
  pitch += clampInt(settings.octave, -3, 3) * 12
  pitch += clampInt(lane.octave, -3, 3) * 12
  if (lane.octaveRandom > 0) {
    const draw = stepRand(lane.octaveSeed + 1, folded, SALT.OCTAVE + laneIndex)
    if (chanceHit(draw, lane.octaveRandom)) {
      const offsets = OCTAVE_OFFSETS[lane.octaveRange]
      pitch += offsets[(draw >>> 8) % offsets.length] * 12
    }
  }
  return clampInt(pitch, 0, 127)
}

// =============================================================================
// Lane Evaluation
// =============================================================================

/**
 * Decide what a lane plays on one step.
 *
 * @param laneIndex - Zero-based lane index (seeds and salts key off it)
 */
export function evaluateLane(lane: LaneConfig, laneIndex: number, context: LaneContext): LaneOutcome {
  const { settings, rhythmStep } = context
  if (!lane.enabled) return { kind: 'rest' }
  if (!euclideanHit(rhythmStep, clampInt(lane.steps, 1, 128), clampInt(lane.pulses, 0, 128), lane.rotation)) {
    return { kind: 'rest' }
  }

  if (lane.drop > 0) {
    const draw = stepRand(lane.dropSeed + 1, cycleStep(settings, rhythmStep), SALT.DROP + laneIndex)
    if (chanceHit(draw, lane.drop)) return { kind: 'dropped' }
  }

  const pitch = selectLanePitch(lane, laneIndex, context)
  if (pitch < 0) return { kind: 'missing' }

  return {
    kind: 'note',
    pitch,
    velocity: laneVelocity(lane, laneIndex, settings, rhythmStep),
    gate: laneGate(lane, laneIndex, settings, rhythmStep)
  }
}
