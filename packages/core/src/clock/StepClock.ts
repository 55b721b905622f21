/**
 * Step clock contract.
 *
 * The engine fires anchor steps and times gates against whichever clock is
 * active; it never looks at ticks or frames directly. Two implementations
 * exist: a sample-driven internal clock and a MIDI-clock-driven one.
 */

import type { Rate, SyncMode } from '../types'

/** Unit a voice's remaining duration is counted in */
export type GateUnit = 'ticks' | 'frames'

export interface ClockTiming {
  bpm: number
  rate: Rate
  swing: number
}

export interface ClockInspection {
  mode: SyncMode
  running: boolean
  /** Clock pulses per step (clock mode) */
  clocksPerStep: number
  /** Pulses since start (clock mode) */
  tickTotal: number
  /** Position inside the current step, 0..clocksPerStep-1 (clock mode) */
  tickPhase: number
  /** Queued step triggers (clock mode) */
  pendingSteps: number
  /** Frames per step (internal mode) */
  stepInterval: number
  /** Frames until the next step (internal mode) */
  framesUntilStep: number
  /** Frames since start (internal mode) */
  frameTotal: number
}

export interface StepClock {
  readonly mode: SyncMode
  readonly gateUnit: GateUnit
  readonly running: boolean

  /** Apply tempo, rate and swing. Realigns phase when timing changes. */
  configure(timing: ClockTiming): void

  /** Called when this clock becomes the active one. */
  activate(): void

  /** Transport Start: reset counters and arm an immediate step. */
  start(): void

  /**
   * Transport Continue.
   *
   * @returns True when the clock restarted from zero
   */
  resume(): boolean

  /** Transport Stop: zero all counters. */
  stop(): void

  /** Account for an audio block of `frames` frames. */
  advance(frames: number): void

  /** Account for one incoming MIDI clock pulse. */
  pulse(): void

  /** Whether an anchor step is due. */
  hasDueStep(): boolean

  /** Mark the due step as fired. */
  completeStep(): void

  /** Gate length for a percentage of one step, in `gateUnit`, at least 1. */
  gateLength(percent: number): number

  inspect(): ClockInspection
}
