import { MIDI } from '../constants'
import type { MidiMessage } from '../types'

/**
 * Bounded list of outgoing MIDI messages for one engine call.
 *
 * Writers check `remaining` before committing anything that needs more than
 * one slot; a push past capacity is refused rather than truncated.
 */
export class OutputBuffer {
  private readonly items: MidiMessage[] = []
  readonly capacity: number

  constructor(capacity: number) {
    this.capacity = Number.isFinite(capacity) ? Math.max(0, Math.floor(capacity)) : 0
  }

  get messages(): MidiMessage[] {
    return this.items
  }

  get length(): number {
    return this.items.length
  }

  get remaining(): number {
    return this.capacity - this.items.length
  }

  get full(): boolean {
    return this.items.length >= this.capacity
  }

  push(message: MidiMessage): boolean {
    if (this.full) return false
    this.items.push(message)
    return true
  }
}

// =============================================================================
// Message Builders (channel 1)
// =============================================================================

export function noteOn(pitch: number, velocity: number): MidiMessage {
  return [MIDI.NOTE_ON, pitch, velocity]
}

export function noteOff(pitch: number): MidiMessage {
  return [MIDI.NOTE_OFF, pitch, 0]
}

export function controlChange(controller: number, value: number): MidiMessage {
  return [MIDI.CONTROL_CHANGE, controller, value]
}
