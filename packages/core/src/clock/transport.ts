/**
 * Step position state shared by both clocks.
 */

import type { RetriggerMode } from '../types'

export interface TransportState {
  /** Monotonic step counter, advanced once per fired step */
  anchorStep: number
  /** Anchor step the current phrase started on */
  phraseAnchorStep: number
  /** Snap the phrase anchor on the next step that has notes to play */
  phraseRestartPending: boolean
}

export function createTransport(): TransportState {
  return {
    anchorStep: 0,
    phraseAnchorStep: 0,
    phraseRestartPending: false
  }
}

export function resetTransport(transport: TransportState, armRestart: boolean): void {
  transport.anchorStep = 0
  transport.phraseAnchorStep = 0
  transport.phraseRestartPending = armRestart
}

/**
 * Step the lanes read their pattern position from.
 */
export function getRhythmStep(transport: TransportState, retrigger: RetriggerMode): number {
  if (retrigger === 'restart') {
    return Math.max(0, transport.anchorStep - transport.phraseAnchorStep)
  }
  return transport.anchorStep
}

/**
 * Start a new phrase at the current anchor step if one is armed and there
 * are notes to play.
 *
 * @returns True when the phrase anchor moved
 */
export function snapPhraseAnchor(transport: TransportState, hasActiveNotes: boolean): boolean {
  if (!transport.phraseRestartPending || !hasActiveNotes) return false
  transport.phraseAnchorStep = transport.anchorStep
  transport.phraseRestartPending = false
  return true
}
