// =============================================================================
// Stepweave - Core Types
// =============================================================================

// --- Enumerations (value lists double as runtime validators) ---

export const PLAY_MODES = ['hold', 'latch'] as const
export type PlayMode = typeof PLAY_MODES[number]

export const RETRIGGER_MODES = ['restart', 'cont'] as const
export type RetriggerMode = typeof RETRIGGER_MODES[number]

export const SYNC_MODES = ['internal', 'clock'] as const
export type SyncMode = typeof SYNC_MODES[number]

export const RATES = ['1/32', '1/16T', '1/16', '1/8T', '1/8', '1/4T', '1/4', '1/2', '1'] as const
export type Rate = typeof RATES[number]

export const REGISTER_MODES = ['held', 'scale'] as const
export type RegisterMode = typeof REGISTER_MODES[number]

export const HELD_ORDERS = ['up', 'down', 'played', 'rand'] as const
export type HeldOrder = typeof HELD_ORDERS[number]

export const MISSING_NOTE_POLICIES = ['skip', 'fold', 'wrap', 'random'] as const
export type MissingNotePolicy = typeof MISSING_NOTE_POLICIES[number]

export const SCALE_MODES = [
  'major',
  'natural_minor',
  'harmonic_minor',
  'melodic_minor',
  'dorian',
  'phrygian',
  'lydian',
  'mixolydian',
  'locrian',
  'pentatonic_major',
  'pentatonic_minor',
  'blues',
  'whole_tone',
  'chromatic'
] as const
export type ScaleMode = typeof SCALE_MODES[number]

export const OCTAVE_RANGES = ['+1', '-1', '+-1', '+2', '-2', '+-2'] as const
export type OctaveRange = typeof OCTAVE_RANGES[number]

/** Lanes are addressed 1-4, matching the flat parameter names */
export type LaneNumber = 1 | 2 | 3 | 4

// =============================================================================
// Configuration
// =============================================================================

/**
 * Per-lane settings. Percentages are 0-100; seeds 0-65535.
 */
export interface LaneConfig {
  enabled: boolean
  /** Pattern length, 1-128 */
  steps: number
  /** Hits per pattern, 0..steps */
  pulses: number
  /** Pattern offset, 0..steps-1 */
  rotation: number
  /** Chance to drop a hit */
  drop: number
  dropSeed: number
  /** 1-based register index */
  note: number
  /** Chance to substitute another register note */
  noteRandom: number
  noteSeed: number
  /** Octave shift, -3..3 */
  octave: number
  /** Chance of a random octave jump */
  octaveRandom: number
  octaveSeed: number
  octaveRange: OctaveRange
  /** 0 inherits the global velocity */
  velocity: number
  /** Gate percent, 0 inherits the global gate */
  gate: number
}

/**
 * Settings shared by all lanes.
 */
export interface GlobalConfig {
  playMode: PlayMode
  retriggerMode: RetriggerMode
  rate: Rate
  sync: SyncMode
  /** 40-240 */
  bpm: number
  /** 0-100 */
  swing: number
  /** 1-64 */
  maxVoices: number
  /** 1-127 */
  velocity: number
  /** Signed random velocity span, 0-127 */
  velocityRandom: number
  /** Gate percent, 1-1600 */
  gate: number
  /** Signed random gate span, 0-1600 */
  gateRandom: number
  randomSeed: number
  /** Period (in steps) after which every random draw repeats, 1-128 */
  randCycle: number
  registerMode: RegisterMode
  heldOrder: HeldOrder
  heldOrderSeed: number
  missingNotePolicy: MissingNotePolicy
  missingNoteSeed: number
  scaleMode: ScaleMode
  /** Scale register length, 1-24 */
  scaleRange: number
  /** Scale root pitch class, 0-11 */
  rootNote: number
  /** Global octave shift, -3..3 */
  octave: number
}

export interface SequencerConfig {
  readonly global: Readonly<GlobalConfig>
  readonly lanes: ReadonlyArray<Readonly<LaneConfig>>
}

/**
 * Typed configuration access exposed by the sequencer. Every setter clamps
 * and returns the canonical value that was stored.
 */
export interface ConfigSurface {
  getGlobal<K extends keyof GlobalConfig>(key: K): GlobalConfig[K]
  setGlobal<K extends keyof GlobalConfig>(key: K, value: GlobalConfig[K]): GlobalConfig[K]
  getLane<K extends keyof LaneConfig>(lane: LaneNumber, key: K): LaneConfig[K]
  setLane<K extends keyof LaneConfig>(lane: LaneNumber, key: K, value: LaneConfig[K]): LaneConfig[K]
}

// =============================================================================
// MIDI
// =============================================================================

/** Raw MIDI message, 1-3 bytes */
export type MidiMessage = readonly number[]

export function isLaneNumber(value: number): value is LaneNumber {
  return value === 1 || value === 2 || value === 3 || value === 4
}

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value)
}
