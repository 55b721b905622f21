/**
 * Clamping rules for every configuration field.
 *
 * Out-of-range values are never rejected; they are pulled to the nearest
 * legal value when assigned. Enumerated fields fall back to their factory
 * default, not the value they held, when handed a value outside the type
 * (possible from untyped callers).
 */

import { MAX_GATE_PERCENT, MAX_REGISTER_NOTES, MAX_SEED, MAX_VOICES } from '../constants'
import {
  HELD_ORDERS,
  MISSING_NOTE_POLICIES,
  OCTAVE_RANGES,
  PLAY_MODES,
  RATES,
  REGISTER_MODES,
  RETRIGGER_MODES,
  SCALE_MODES,
  SYNC_MODES,
  isOneOf,
  type GlobalConfig,
  type LaneConfig
} from '../types'
import { DEFAULT_GLOBAL_CONFIG, createDefaultLane } from './defaults'

/**
 * Truncate to an integer and clamp into [lo, hi]. NaN maps to `lo`.
 */
export function clampInt(value: number, lo: number, hi: number): number {
  if (Number.isNaN(value)) return lo
  return Math.min(hi, Math.max(lo, Math.trunc(value)))
}

function range(lo: number, hi: number): (value: number) => number {
  return value => clampInt(value, lo, hi)
}

function oneOf<T extends string>(values: readonly T[], fallback: T): (value: T) => T {
  return value => (isOneOf(values, value) ? value : fallback)
}

const seed = range(0, MAX_SEED)
const percent = range(0, 100)
const octave = range(-3, 3)

type Normalizers<T> = { [K in keyof T]: (value: T[K]) => T[K] }

export const GLOBAL_NORMALIZERS: Normalizers<GlobalConfig> = {
  playMode: oneOf(PLAY_MODES, DEFAULT_GLOBAL_CONFIG.playMode),
  retriggerMode: oneOf(RETRIGGER_MODES, DEFAULT_GLOBAL_CONFIG.retriggerMode),
  rate: oneOf(RATES, DEFAULT_GLOBAL_CONFIG.rate),
  sync: oneOf(SYNC_MODES, DEFAULT_GLOBAL_CONFIG.sync),
  bpm: range(40, 240),
  swing: percent,
  maxVoices: range(1, MAX_VOICES),
  velocity: range(1, 127),
  velocityRandom: range(0, 127),
  gate: range(1, MAX_GATE_PERCENT),
  gateRandom: range(0, MAX_GATE_PERCENT),
  randomSeed: seed,
  randCycle: range(1, 128),
  registerMode: oneOf(REGISTER_MODES, DEFAULT_GLOBAL_CONFIG.registerMode),
  heldOrder: oneOf(HELD_ORDERS, DEFAULT_GLOBAL_CONFIG.heldOrder),
  heldOrderSeed: seed,
  missingNotePolicy: oneOf(MISSING_NOTE_POLICIES, DEFAULT_GLOBAL_CONFIG.missingNotePolicy),
  missingNoteSeed: seed,
  scaleMode: oneOf(SCALE_MODES, DEFAULT_GLOBAL_CONFIG.scaleMode),
  scaleRange: range(1, MAX_REGISTER_NOTES),
  rootNote: range(0, 11),
  octave
}

export const LANE_NORMALIZERS: Normalizers<LaneConfig> = {
  enabled: value => value === true,
  steps: range(1, 128),
  pulses: range(0, 128),
  rotation: range(0, 127),
  drop: percent,
  dropSeed: seed,
  note: range(1, MAX_REGISTER_NOTES),
  noteRandom: percent,
  noteSeed: seed,
  octave,
  octaveRandom: percent,
  octaveSeed: seed,
  octaveRange: oneOf(OCTAVE_RANGES, createDefaultLane(0).octaveRange),
  velocity: range(0, 127),
  gate: range(0, MAX_GATE_PERCENT)
}

export function normalizeGlobalField<K extends keyof GlobalConfig>(
  key: K,
  value: GlobalConfig[K]
): GlobalConfig[K] {
  return GLOBAL_NORMALIZERS[key](value)
}

export function normalizeLaneField<K extends keyof LaneConfig>(
  key: K,
  value: LaneConfig[K]
): LaneConfig[K] {
  return LANE_NORMALIZERS[key](value)
}

/**
 * Apply the cross-field lane rules: pulses never exceed steps and the
 * rotation stays inside the pattern.
 */
export function normalizeLane(lane: LaneConfig): void {
  lane.steps = clampInt(lane.steps, 1, 128)
  lane.pulses = clampInt(lane.pulses, 0, lane.steps)
  lane.rotation = clampInt(lane.rotation, 0, lane.steps - 1)
}
