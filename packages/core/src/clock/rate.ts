import { CLOCKS_PER_QUARTER } from '../constants'
import type { Rate } from '../types'

/** Steps per quarter note for each rate */
export const NOTES_PER_BEAT: Readonly<Record<Rate, number>> = {
  '1/32': 8,
  '1/16T': 6,
  '1/16': 4,
  '1/8T': 3,
  '1/8': 2,
  '1/4T': 1.5,
  '1/4': 1,
  '1/2': 0.5,
  '1': 0.25
}

export function isTripletRate(rate: Rate): boolean {
  return rate === '1/16T' || rate === '1/8T' || rate === '1/4T'
}

/**
 * MIDI clock pulses per step (24 ppqn), at least 1.
 */
export function clocksPerStep(rate: Rate): number {
  return Math.max(1, Math.floor(CLOCKS_PER_QUARTER / NOTES_PER_BEAT[rate] + 0.5))
}

/**
 * Audio frames per step, at least 1. Fractional; callers round where they
 * need whole frames.
 */
export function framesPerStep(sampleRate: number, bpm: number, rate: Rate): number {
  return Math.max(1, (sampleRate * 60) / (bpm * NOTES_PER_BEAT[rate]))
}
