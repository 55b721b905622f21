import { MAX_GATE_PERCENT, MAX_PENDING_STEP_TRIGGERS } from '../constants'
import { clampInt } from '../config/normalize'
import type { Rate } from '../types'
import { clocksPerStep } from './rate'
import type { ClockInspection, ClockTiming, GateUnit, StepClock } from './StepClock'

/**
 * Step clock driven by external MIDI clock (24 pulses per quarter note).
 *
 * Pulses queue step triggers; the engine drains them on its next audio
 * block. The queue is capped so a long stall cannot build a backlog.
 */
export class MidiStepClock implements StepClock {
  readonly mode = 'clock'
  readonly gateUnit: GateUnit = 'ticks'

  private rate: Rate
  private pulsesPerStep: number
  private isRunning = true
  private tickTotal = 0
  private tickPhase = 0
  private pending = 0

  constructor(rate: Rate = '1/16') {
    this.rate = rate
    this.pulsesPerStep = clocksPerStep(rate)
  }

  get running(): boolean {
    return this.isRunning
  }

  configure(timing: ClockTiming): void {
    if (timing.rate === this.rate) return
    this.rate = timing.rate
    this.pulsesPerStep = clocksPerStep(timing.rate)
    this.pending = 0
  }

  activate(): void {
    this.pulsesPerStep = clocksPerStep(this.rate)
    this.pending = 0
    this.isRunning = true
  }

  start(): void {
    this.isRunning = true
    this.tickTotal = 0
    this.tickPhase = 0
    this.pending = 1
  }

  resume(): boolean {
    if (this.isRunning) return false
    this.start()
    return true
  }

  stop(): void {
    this.isRunning = false
    this.tickTotal = 0
    this.tickPhase = 0
    this.pending = 0
  }

  advance(_frames: number): void {
    // Step timing comes from pulses only
  }

  pulse(): void {
    if (!this.isRunning) return
    this.tickTotal++
    this.tickPhase = this.tickTotal % this.pulsesPerStep
    if (this.tickPhase === 0 && this.pending < MAX_PENDING_STEP_TRIGGERS) {
      this.pending++
    }
  }

  hasDueStep(): boolean {
    return this.pending > 0
  }

  completeStep(): void {
    if (this.pending > 0) this.pending--
  }

  gateLength(percent: number): number {
    const pct = clampInt(percent, 0, MAX_GATE_PERCENT)
    return Math.max(1, Math.floor((this.pulsesPerStep * pct) / 100))
  }

  inspect(): ClockInspection {
    return {
      mode: this.mode,
      running: this.isRunning,
      clocksPerStep: this.pulsesPerStep,
      tickTotal: this.tickTotal,
      tickPhase: this.tickPhase,
      pendingSteps: this.pending,
      stepInterval: 0,
      framesUntilStep: 0,
      frameTotal: 0
    }
  }
}
