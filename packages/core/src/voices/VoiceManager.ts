import { MAX_GATE_PERCENT, MAX_VOICES } from '../constants'
import { clampInt } from '../config/normalize'
import type { GateUnit, StepClock } from '../clock/StepClock'
import { OutputBuffer, noteOff, noteOn } from '../output/OutputBuffer'

export interface Voice {
  pitch: number
  /** Gate time left, in `unit` */
  remaining: number
  unit: GateUnit
}

export interface NoteRequest {
  pitch: number
  velocity: number
  /** Percent of one step; 0 plays a note-on/note-off pair */
  gate: number
}

/**
 * Sounding notes and their gate countdowns, oldest first.
 *
 * Invariants: at most `limit` voices, and no two voices share a pitch.
 */
export class VoiceManager {
  private readonly voices: Voice[] = []
  private limit: number

  constructor(limit = 8) {
    this.limit = clampInt(limit, 1, MAX_VOICES)
  }

  get count(): number {
    return this.voices.length
  }

  get voiceLimit(): number {
    return this.limit
  }

  /** Lowering the limit takes effect on the next scheduled note. */
  setLimit(limit: number): void {
    this.limit = clampInt(limit, 1, MAX_VOICES)
  }

  list(): Voice[] {
    return this.voices.map(voice => ({ ...voice }))
  }

  /**
   * Start a note, releasing a voice of the same pitch and the oldest voices
   * over the limit first.
   *
   * Nothing is emitted unless every message the note needs fits in `out`.
   *
   * @returns True when the note was emitted
   */
  schedule(request: NoteRequest, clock: Pick<StepClock, 'gateUnit' | 'gateLength'>, out: OutputBuffer): boolean {
    const pitch = clampInt(request.pitch, 0, 127)
    const velocity = clampInt(request.velocity, 1, 127)
    const gate = clampInt(request.gate, 0, MAX_GATE_PERCENT)

    const retriggered = this.voices.filter(voice => voice.pitch === pitch).length
    const survivors = this.voices.length - retriggered
    const evictions = gate > 0 ? Math.max(0, survivors - (this.limit - 1)) : 0
    const needed = retriggered + evictions + 1 + (gate > 0 ? 0 : 1)
    if (out.remaining < needed) return false

    for (let i = this.voices.length - 1; i >= 0; i--) {
      if (this.voices[i].pitch === pitch) {
        out.push(noteOff(pitch))
        this.voices.splice(i, 1)
      }
    }
    for (let i = 0; i < evictions; i++) {
      const oldest = this.voices.shift()
      if (oldest) out.push(noteOff(oldest.pitch))
    }

    out.push(noteOn(pitch, velocity))
    if (gate === 0) {
      out.push(noteOff(pitch))
      return true
    }

    this.voices.push({ pitch, remaining: clock.gateLength(gate), unit: clock.gateUnit })
    return true
  }

  /**
   * Count gates down by `amount` and release the voices that run out.
   * Voices timed in another unit are released outright. Stops early when
   * `out` fills.
   *
   * @returns Number of note-offs emitted
   */
  advance(unit: GateUnit, amount: number, out: OutputBuffer): number {
    let emitted = 0
    let i = 0
    while (i < this.voices.length) {
      const voice = this.voices[i]
      if (voice.unit === unit && voice.remaining > 0) voice.remaining -= amount
      if (voice.unit === unit && voice.remaining > 0) {
        i++
        continue
      }
      if (!out.push(noteOff(voice.pitch))) break
      this.voices.splice(i, 1)
      emitted++
    }
    return emitted
  }

  /**
   * Release voices oldest first while `out` has room.
   *
   * @returns Number of note-offs emitted
   */
  flush(out: OutputBuffer): number {
    let emitted = 0
    while (this.voices.length > 0) {
      if (!out.push(noteOff(this.voices[0].pitch))) break
      this.voices.shift()
      emitted++
    }
    return emitted
  }

  /** Forget every voice without emitting anything. */
  clear(): void {
    this.voices.length = 0
  }
}
