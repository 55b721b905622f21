// =============================================================================
// @stepweave/core - Public API
// Step engine: transport clocks, note state, register, lanes, voices
// =============================================================================

// --- Engine ---
export { Sequencer, createSequencer } from './engine/Sequencer'
export type {
  EngineLogger,
  HostCapabilities,
  MidiEffect,
  NoteStateInspection,
  SequencerInspection
} from './engine/types'

// --- Types ---
export {
  PLAY_MODES,
  RETRIGGER_MODES,
  SYNC_MODES,
  RATES,
  REGISTER_MODES,
  HELD_ORDERS,
  MISSING_NOTE_POLICIES,
  SCALE_MODES,
  OCTAVE_RANGES,
  isLaneNumber,
  isOneOf
} from './types'
export type {
  PlayMode,
  RetriggerMode,
  SyncMode,
  Rate,
  RegisterMode,
  HeldOrder,
  MissingNotePolicy,
  ScaleMode,
  OctaveRange,
  LaneNumber,
  LaneConfig,
  GlobalConfig,
  SequencerConfig,
  ConfigSurface,
  MidiMessage
} from './types'

// --- Configuration ---
export { DEFAULT_GLOBAL_CONFIG, createDefaultLane, createDefaultLanes } from './config/defaults'
export { clampInt, normalizeGlobalField, normalizeLaneField, normalizeLane } from './config/normalize'

// --- Constants ---
export {
  LANE_COUNT,
  MAX_HELD_NOTES,
  MAX_REGISTER_NOTES,
  MAX_VOICES,
  MAX_PENDING_STEP_TRIGGERS,
  DEFAULT_MAX_OUTPUT,
  DEFAULT_SAMPLE_RATE,
  MAX_GATE_PERCENT,
  MAX_SEED,
  MIDI
} from './constants'

// --- Clock ---
export type { StepClock, GateUnit, ClockTiming, ClockInspection } from './clock/StepClock'
export { InternalStepClock } from './clock/InternalStepClock'
export { MidiStepClock } from './clock/MidiStepClock'
export { NOTES_PER_BEAT, clocksPerStep, framesPerStep, isTripletRate } from './clock/rate'
export type { TransportState } from './clock/transport'

// --- Building Blocks ---
export { NoteStateTracker } from './notes/NoteStateTracker'
export type { NoteSetView } from './notes/NoteStateTracker'
export { buildRegister, buildHeldRegister, buildScaleRegister } from './register/RegisterBuilder'
export { SCALE_INTERVALS } from './register/scales'
export { euclideanHit, euclideanPattern } from './lanes/euclidean'
export { evaluateLane, foldIndex, OCTAVE_OFFSETS } from './lanes/LaneEngine'
export type { LaneOutcome, LaneContext } from './lanes/LaneEngine'
export { VoiceManager } from './voices/VoiceManager'
export type { Voice, NoteRequest } from './voices/VoiceManager'
export { OutputBuffer } from './output/OutputBuffer'

// --- Random ---
export { mixU32, nextU32, stepRand, chanceHit, signedOffset, fnv1a, shuffleInPlace } from './random/prng'
