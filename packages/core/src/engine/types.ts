import type { ClockInspection } from '../clock/StepClock'
import type { TransportState } from '../clock/transport'
import type { MidiMessage } from '../types'
import type { Voice } from '../voices/VoiceManager'

/**
 * Trace sink for transport events. Console-shaped so `console` itself fits.
 */
export interface EngineLogger {
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
}

/**
 * What the host hands the engine at creation.
 */
export interface HostCapabilities {
  logger?: EngineLogger
}

/**
 * Host-facing MIDI effect contract. Every call is synchronous and returns
 * at most `maxOut` messages.
 */
export interface MidiEffect {
  /** Feed one incoming MIDI message (1-3 bytes). */
  processMidi(message: MidiMessage, maxOut?: number): MidiMessage[]
  /** Advance time by one audio block. Negative `frames` is ignored. */
  tick(frames: number, sampleRate: number, maxOut?: number): MidiMessage[]
  dispose(): void
}

export interface NoteStateInspection {
  physical: number[]
  physicalAsPlayed: number[]
  active: number[]
  activeAsPlayed: number[]
  latchReadyToReplace: boolean
}

export interface SequencerInspection {
  clock: ClockInspection
  transport: TransportState
  notes: NoteStateInspection
  voices: Voice[]
}
