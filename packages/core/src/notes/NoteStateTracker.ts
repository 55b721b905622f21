import { MAX_HELD_NOTES } from '../constants'
import type { PlayMode } from '../types'

/**
 * Read-only view of the tracked note sets.
 */
export interface NoteSetView {
  /** Keys physically down, ascending */
  readonly physical: readonly number[]
  /** Keys physically down, in the order they were pressed */
  readonly physicalAsPlayed: readonly number[]
  /** Notes the lanes play from, ascending */
  readonly active: readonly number[]
  /** Active notes in press order */
  readonly activeAsPlayed: readonly number[]
}

// =============================================================================
// Bounded Ordered Sets
// =============================================================================

function addSorted(notes: number[], note: number): void {
  if (notes.length >= MAX_HELD_NOTES) return
  let i = 0
  while (i < notes.length && notes[i] < note) i++
  if (notes[i] === note) return
  notes.splice(i, 0, note)
}

function addTail(notes: number[], note: number): void {
  if (notes.length >= MAX_HELD_NOTES || notes.includes(note)) return
  notes.push(note)
}

function remove(notes: number[], note: number): void {
  const index = notes.indexOf(note)
  if (index >= 0) notes.splice(index, 1)
}

// =============================================================================
// NoteStateTracker
// =============================================================================

/**
 * Tracks physical keys and the active note set the lanes read.
 *
 * In hold mode the active set mirrors the keys that are down. In latch mode
 * the active set survives key release; the first note-on after every key has
 * been released replaces it.
 */
export class NoteStateTracker implements NoteSetView {
  private readonly physicalNotes: number[] = []
  private readonly physicalPlayed: number[] = []
  private readonly activeNotes: number[] = []
  private readonly activePlayed: number[] = []
  private mode: PlayMode
  private readyToReplace = false

  constructor(mode: PlayMode = 'hold') {
    this.mode = mode
    this.readyToReplace = mode === 'latch'
  }

  get physical(): readonly number[] {
    return this.physicalNotes
  }

  get physicalAsPlayed(): readonly number[] {
    return this.physicalPlayed
  }

  get active(): readonly number[] {
    return this.activeNotes
  }

  get activeAsPlayed(): readonly number[] {
    return this.activePlayed
  }

  get activeCount(): number {
    return this.activeNotes.length
  }

  get playMode(): PlayMode {
    return this.mode
  }

  /** Whether the next note-on replaces the latched set */
  get latchReadyToReplace(): boolean {
    return this.readyToReplace
  }

  setPlayMode(mode: PlayMode): void {
    if (mode === this.mode) return
    this.mode = mode
    if (mode === 'hold') {
      this.readyToReplace = false
      this.syncActiveToPhysical()
    } else if (this.physicalNotes.length > 0) {
      this.syncActiveToPhysical()
      this.readyToReplace = false
    } else {
      this.readyToReplace = true
    }
  }

  /**
   * Register a key press.
   *
   * @returns True when the press replaced a latched note set
   */
  noteOn(note: number): boolean {
    const replacing = this.mode === 'latch' && this.readyToReplace
    addSorted(this.physicalNotes, note)
    addTail(this.physicalPlayed, note)

    if (this.mode === 'hold') {
      this.syncActiveToPhysical()
      return false
    }

    if (replacing) {
      this.clearActive()
      this.readyToReplace = false
    }
    addSorted(this.activeNotes, note)
    addTail(this.activePlayed, note)
    return replacing
  }

  noteOff(note: number): void {
    remove(this.physicalNotes, note)
    remove(this.physicalPlayed, note)
    if (this.mode === 'latch') {
      if (this.physicalNotes.length === 0) this.readyToReplace = true
    } else {
      this.syncActiveToPhysical()
    }
  }

  /**
   * Forget every key (transport stop). Latch mode waits for a fresh set.
   */
  clear(): void {
    this.physicalNotes.length = 0
    this.physicalPlayed.length = 0
    this.clearActive()
    this.readyToReplace = this.mode === 'latch'
  }

  private clearActive(): void {
    this.activeNotes.length = 0
    this.activePlayed.length = 0
  }

  private syncActiveToPhysical(): void {
    this.clearActive()
    for (const note of this.physicalNotes) addSorted(this.activeNotes, note)
    for (const note of this.physicalPlayed) {
      if (this.activeNotes.includes(note)) addTail(this.activePlayed, note)
    }
  }
}
