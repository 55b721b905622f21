/**
 * Note register construction.
 *
 * The register is the ordered pool of pitches lanes index into. It is rebuilt
 * from scratch for every anchor step, so it always reflects the current note
 * state and settings.
 */

import { MAX_REGISTER_NOTES, SCALE_BASE_NOTE } from '../constants'
import { clampInt } from '../config/normalize'
import { fnv1a, shuffleInPlace } from '../random/prng'
import type { GlobalConfig } from '../types'
import type { NoteSetView } from '../notes/NoteStateTracker'
import { SCALE_INTERVALS } from './scales'

export type RegisterSettings = Pick<
  GlobalConfig,
  'registerMode' | 'heldOrder' | 'heldOrderSeed' | 'scaleMode' | 'scaleRange' | 'rootNote'
>

/**
 * Ascending scale ladder from middle C plus the root, repeating the mode's
 * intervals an octave higher until `scaleRange` notes are collected.
 */
export function buildScaleRegister(settings: RegisterSettings): number[] {
  const intervals = SCALE_INTERVALS[settings.scaleMode]
  const count = clampInt(settings.scaleRange, 1, MAX_REGISTER_NOTES)
  const base = SCALE_BASE_NOTE + clampInt(settings.rootNote, 0, 11)
  const notes: number[] = []
  for (let i = 0; i < count; i++) {
    const degree = i % intervals.length
    const octave = Math.floor(i / intervals.length)
    notes.push(clampInt(base + intervals[degree] + octave * 12, 0, 127))
  }
  return notes
}

/**
 * Active notes in the configured held order.
 *
 * `rand` shuffles with a seed mixed from the active set itself, so the order
 * changes whenever the set changes and stays put otherwise.
 */
export function buildHeldRegister(notes: NoteSetView, settings: RegisterSettings): number[] {
  const active = notes.active.slice(0, MAX_REGISTER_NOTES)
  if (active.length === 0) return []

  switch (settings.heldOrder) {
    case 'played':
      if (notes.activeAsPlayed.length > 0) {
        return notes.activeAsPlayed
          .filter(note => active.includes(note))
          .slice(0, active.length)
      }
      return active
    case 'down':
      return active.reverse()
    case 'rand':
      return shuffleInPlace(active, (settings.heldOrderSeed ^ fnv1a(notes.active)) >>> 0)
    case 'up':
    default:
      return active
  }
}

export function buildRegister(notes: NoteSetView, settings: RegisterSettings): number[] {
  if (settings.registerMode === 'scale') {
    return buildScaleRegister(settings)
  }
  return buildHeldRegister(notes, settings)
}
