// =============================================================================
// Stepweave - Flat Parameter Surface
// =============================================================================
//
// String get/set for hosts that only speak key/value pairs, plus the `state`
// key that carries every setting as one flat JSON object.

import {
  HELD_ORDERS,
  LANE_COUNT,
  MISSING_NOTE_POLICIES,
  OCTAVE_RANGES,
  PLAY_MODES,
  RATES,
  REGISTER_MODES,
  RETRIGGER_MODES,
  SCALE_MODES,
  SYNC_MODES,
  isLaneNumber,
  type ConfigSurface,
  type LaneNumber
} from '@stepweave/core'
import {
  enumCodec,
  globalBinding,
  intCodec,
  laneBinding,
  onOffCodec,
  type ParamBinding
} from './bindings'

export const STATE_KEY = 'state'

/** Keys answered with fixed text; setting them is refused */
export const READ_ONLY_PARAMS: ReadonlyMap<string, string> = new Map([
  ['name', 'Stepweave'],
  ['bank_name', 'Factory']
])

export type ParamValue = string | number

export interface ApplyStateResult {
  /** Keys whose values were accepted, in application order */
  applied: string[]
  /** Known keys whose values could not be parsed */
  skipped: string[]
  /** Set when the payload was not a JSON object */
  error?: string
}

// =============================================================================
// Key Table (canonical order: globals, then lanes 1-4)
// =============================================================================

export const GLOBAL_BINDINGS: readonly ParamBinding[] = [
  globalBinding('play_mode', 'playMode', enumCodec(PLAY_MODES)),
  globalBinding('retrigger_mode', 'retriggerMode', enumCodec(RETRIGGER_MODES)),
  globalBinding('rate', 'rate', enumCodec(RATES)),
  globalBinding('sync', 'sync', enumCodec(SYNC_MODES)),
  globalBinding('bpm', 'bpm', intCodec),
  globalBinding('swing', 'swing', intCodec),
  globalBinding('max_voices', 'maxVoices', intCodec),
  globalBinding('global_velocity', 'velocity', intCodec),
  globalBinding('global_v_rnd', 'velocityRandom', intCodec),
  globalBinding('global_gate', 'gate', intCodec),
  globalBinding('global_g_rnd', 'gateRandom', intCodec),
  globalBinding('global_rnd_seed', 'randomSeed', intCodec),
  globalBinding('rand_cycle', 'randCycle', intCodec),
  globalBinding('register_mode', 'registerMode', enumCodec(REGISTER_MODES)),
  globalBinding('held_order', 'heldOrder', enumCodec(HELD_ORDERS)),
  globalBinding('held_order_seed', 'heldOrderSeed', intCodec),
  globalBinding('missing_note_policy', 'missingNotePolicy', enumCodec(MISSING_NOTE_POLICIES)),
  globalBinding('missing_note_seed', 'missingNoteSeed', intCodec),
  globalBinding('scale_mode', 'scaleMode', enumCodec(SCALE_MODES)),
  globalBinding('scale_rng', 'scaleRange', intCodec),
  globalBinding('root_note', 'rootNote', intCodec),
  globalBinding('octave', 'octave', intCodec)
]

export function laneBindings(lane: LaneNumber): ParamBinding[] {
  return [
    laneBinding(lane, 'enabled', 'enabled', onOffCodec),
    laneBinding(lane, 'steps', 'steps', intCodec),
    laneBinding(lane, 'pulses', 'pulses', intCodec),
    laneBinding(lane, 'rotation', 'rotation', intCodec),
    laneBinding(lane, 'drop', 'drop', intCodec),
    laneBinding(lane, 'drop_seed', 'dropSeed', intCodec),
    laneBinding(lane, 'note', 'note', intCodec),
    laneBinding(lane, 'n_rnd', 'noteRandom', intCodec),
    laneBinding(lane, 'n_seed', 'noteSeed', intCodec),
    laneBinding(lane, 'octave', 'octave', intCodec),
    laneBinding(lane, 'oct_rnd', 'octaveRandom', intCodec),
    laneBinding(lane, 'oct_seed', 'octaveSeed', intCodec),
    laneBinding(lane, 'oct_rng', 'octaveRange', enumCodec(OCTAVE_RANGES)),
    laneBinding(lane, 'velocity', 'velocity', intCodec),
    laneBinding(lane, 'gate', 'gate', intCodec)
  ]
}

function allLaneBindings(): ParamBinding[] {
  const bindings: ParamBinding[] = []
  for (let lane = 1; lane <= LANE_COUNT; lane++) {
    if (isLaneNumber(lane)) bindings.push(...laneBindings(lane))
  }
  return bindings
}

/** Every writable key, in canonical order */
export const PARAM_BINDINGS: readonly ParamBinding[] = [...GLOBAL_BINDINGS, ...allLaneBindings()]

const BINDINGS_BY_KEY: ReadonlyMap<string, ParamBinding> = new Map(
  PARAM_BINDINGS.map(binding => [binding.key, binding])
)

export function isParamKey(key: string): boolean {
  return BINDINGS_BY_KEY.has(key) || key === STATE_KEY || READ_ONLY_PARAMS.has(key)
}

// =============================================================================
// Get / Set
// =============================================================================

/**
 * Set one parameter from its string form. `state` applies a JSON object.
 *
 * @returns False for unknown or read-only keys and rejected values
 */
export function setParam(target: ConfigSurface, key: string, value: string): boolean {
  if (key === STATE_KEY) {
    const result = applyState(target, value)
    return result.error === undefined && result.skipped.length === 0
  }
  const binding = BINDINGS_BY_KEY.get(key)
  if (!binding) return false
  return binding.set(target, value)
}

/**
 * Current value of a parameter as a string, or undefined for unknown keys.
 */
export function getParam(target: ConfigSurface, key: string): string | undefined {
  if (key === STATE_KEY) return JSON.stringify(getState(target))
  const fixed = READ_ONLY_PARAMS.get(key)
  if (fixed !== undefined) return fixed
  return BINDINGS_BY_KEY.get(key)?.get(target)
}

// =============================================================================
// State
// =============================================================================

/**
 * Every setting as a flat object. Enumerated fields are strings, numeric
 * fields numbers.
 */
export function getState(target: ConfigSurface): Record<string, ParamValue> {
  const state: Record<string, ParamValue> = {}
  for (const binding of PARAM_BINDINGS) {
    state[binding.key] = binding.encode(target)
  }
  return state
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toRaw(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(Math.trunc(value))
  return undefined
}

/**
 * Apply a state JSON object key by key in canonical order. Unknown keys are
 * ignored; values that do not parse are skipped without touching the field.
 */
export function applyState(target: ConfigSurface, json: string): ApplyStateResult {
  const result: ApplyStateResult = { applied: [], skipped: [] }

  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    result.error = error instanceof Error ? error.message : String(error)
    return result
  }
  if (!isRecord(parsed)) {
    result.error = 'state must be a JSON object'
    return result
  }

  for (const binding of PARAM_BINDINGS) {
    if (!Object.prototype.hasOwnProperty.call(parsed, binding.key)) continue
    const raw = toRaw(parsed[binding.key])
    if (raw !== undefined && binding.set(target, raw)) {
      result.applied.push(binding.key)
    } else {
      result.skipped.push(binding.key)
    }
  }
  return result
}
