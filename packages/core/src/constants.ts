// =============================================================================
// Stepweave - Engine Constants
// =============================================================================

/** Number of Euclidean lanes evaluated per anchor step */
export const LANE_COUNT = 4

/** Maximum simultaneously tracked keys (physical and active sets) */
export const MAX_HELD_NOTES = 16

/** Maximum length of the note register a lane can index into */
export const MAX_REGISTER_NOTES = 24

/** Upper bound for the polyphony setting */
export const MAX_VOICES = 64

/** MIDI note the scale register starts from (before the root offset) */
export const SCALE_BASE_NOTE = 60

/** MIDI clock resolution (pulses per quarter note) */
export const CLOCKS_PER_QUARTER = 24

/** Sample rate assumed when the transport starts before the first audio block */
export const DEFAULT_SAMPLE_RATE = 44100

/**
 * Cap on queued step triggers in clock mode. Keeps a paused or bursty
 * external clock from replaying a long backlog of steps at once.
 */
export const MAX_PENDING_STEP_TRIGGERS = 8

/** Output capacity used when a caller does not pass one */
export const DEFAULT_MAX_OUTPUT = 64

/** Highest gate percentage (16 steps) */
export const MAX_GATE_PERCENT = 1600

/** Highest seed value accepted by any seed field */
export const MAX_SEED = 65535

// =============================================================================
// MIDI Status Bytes
// =============================================================================

export const MIDI = {
  NOTE_OFF: 0x80,
  NOTE_ON: 0x90,
  CONTROL_CHANGE: 0xB0,
  CLOCK: 0xF8,
  START: 0xFA,
  CONTINUE: 0xFB,
  STOP: 0xFC,
  /** CC 123 = All Notes Off */
  ALL_NOTES_OFF: 123
} as const
