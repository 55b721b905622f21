import { DEFAULT_SAMPLE_RATE, MAX_GATE_PERCENT } from '../constants'
import { clampInt } from '../config/normalize'
import type { Rate } from '../types'
import { clocksPerStep, framesPerStep, isTripletRate } from './rate'
import type { ClockInspection, ClockTiming, GateUnit, StepClock } from './StepClock'

/**
 * Sample-driven step clock.
 *
 * Keeps a fractional countdown to the next step so that long runs stay in
 * phase with the tempo, and a rounded interval for gate lengths. The clock
 * free-runs: Stop only resets its countdown, it never halts it.
 */
export class InternalStepClock implements StepClock {
  readonly mode = 'internal'
  readonly gateUnit: GateUnit = 'frames'

  private sampleRate = 0
  private bpm = 120
  private rate: Rate = '1/16'
  private swing = 0
  private dirty = true

  /** Fractional frames per step */
  private interval = 1
  /** Whole frames per step, for gate lengths */
  private intervalFrames = 1
  private countdown = 0
  private frameTotal = 0
  private swingLong = true

  constructor(timing?: Partial<ClockTiming>) {
    this.bpm = timing?.bpm ?? this.bpm
    this.rate = timing?.rate ?? this.rate
    this.swing = timing?.swing ?? this.swing
    this.recalc(DEFAULT_SAMPLE_RATE)
    this.sampleRate = 0
    this.dirty = true
  }

  get running(): boolean {
    return true
  }

  /**
   * Bring timing up to date with the host's sample rate. Called at the top of
   * every audio block.
   */
  prepare(sampleRate: number): void {
    if (sampleRate <= 0) return
    if (this.dirty || sampleRate !== this.sampleRate) {
      this.recalc(sampleRate)
    }
  }

  configure(timing: ClockTiming): void {
    const retimed = timing.bpm !== this.bpm || timing.rate !== this.rate
    this.bpm = timing.bpm
    this.rate = timing.rate
    this.swing = timing.swing
    if (!retimed) return
    this.dirty = true
    if (this.sampleRate > 0) {
      this.recalc(this.sampleRate)
      this.realign()
    }
  }

  activate(): void {
    if (this.sampleRate > 0) {
      this.recalc(this.sampleRate)
      this.realign()
    }
  }

  start(): void {
    if (this.dirty || this.sampleRate <= 0) {
      this.recalc(this.sampleRate > 0 ? this.sampleRate : DEFAULT_SAMPLE_RATE)
    }
    this.frameTotal = 0
    this.countdown = 0
    this.swingLong = true
  }

  resume(): boolean {
    this.start()
    return true
  }

  stop(): void {
    this.frameTotal = 0
    this.countdown = this.interval
    this.swingLong = true
  }

  advance(frames: number): void {
    this.frameTotal += frames
    this.countdown -= frames
  }

  pulse(): void {
    // Internal timing ignores MIDI clock
  }

  hasDueStep(): boolean {
    return this.countdown <= 0
  }

  completeStep(): void {
    this.countdown += this.nextInterval()
  }

  gateLength(percent: number): number {
    const pct = clampInt(percent, 0, MAX_GATE_PERCENT)
    return Math.max(1, Math.floor((this.intervalFrames * pct) / 100))
  }

  inspect(): ClockInspection {
    return {
      mode: this.mode,
      running: this.running,
      clocksPerStep: clocksPerStep(this.rate),
      tickTotal: 0,
      tickPhase: 0,
      pendingSteps: 0,
      stepInterval: this.interval,
      framesUntilStep: this.countdown,
      frameTotal: this.frameTotal
    }
  }

  // ===========================================================================
  // Timing
  // ===========================================================================

  private recalc(sampleRate: number): void {
    this.sampleRate = sampleRate
    this.interval = framesPerStep(sampleRate, this.bpm, this.rate)
    this.intervalFrames = Math.max(1, Math.floor(this.interval + 0.5))
    if (this.countdown > this.interval) this.countdown = this.interval
    this.dirty = false
  }

  /**
   * Place the next step on the tempo grid measured from the last reset, so a
   * tempo change does not jump the phase.
   */
  private realign(): void {
    const phase = this.frameTotal % this.interval
    const untilNext = phase < 1e-9 ? this.interval : this.interval - phase
    this.countdown = Math.max(1, untilNext)
    this.swingLong = true
  }

  /** Next step length; swing alternates long then short. */
  private nextInterval(): number {
    const swing = clampInt(this.swing, 0, 100)
    if (swing <= 0 || isTripletRate(this.rate)) return this.interval
    const delta = (this.interval * swing) / 200
    const long = this.swingLong
    this.swingLong = !long
    if (long) return this.interval + delta
    return Math.max(1, this.interval - delta)
  }
}
