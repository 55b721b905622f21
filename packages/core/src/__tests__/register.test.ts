import { DEFAULT_GLOBAL_CONFIG } from '../config/defaults'
import { NoteStateTracker } from '../notes/NoteStateTracker'
import {
  buildHeldRegister,
  buildRegister,
  buildScaleRegister,
  type RegisterSettings
} from '../register/RegisterBuilder'

function settings(overrides: Partial<RegisterSettings> = {}): RegisterSettings {
  return { ...DEFAULT_GLOBAL_CONFIG, ...overrides }
}

function held(...notes: number[]): NoteStateTracker {
  const tracker = new NoteStateTracker('hold')
  for (const note of notes) tracker.noteOn(note)
  return tracker
}

describe('buildScaleRegister', () => {
  it('walks the major scale from middle C', () => {
    expect(buildScaleRegister(settings())).toEqual([60, 62, 64, 65, 67, 69, 71, 72])
  })

  it('offsets by the root note', () => {
    expect(buildScaleRegister(settings({ scaleMode: 'dorian', rootNote: 2, scaleRange: 3 }))).toEqual([62, 64, 65])
  })

  it('repeats short modes an octave up', () => {
    expect(buildScaleRegister(settings({ scaleMode: 'blues' }))).toEqual([60, 63, 65, 66, 67, 70, 72, 75])
    expect(buildScaleRegister(settings({ scaleMode: 'pentatonic_major', scaleRange: 7 }))).toEqual([
      60, 62, 64, 67, 69, 72, 74
    ])
  })

  it('holds at most 24 notes', () => {
    const register = buildScaleRegister(settings({ scaleMode: 'chromatic', rootNote: 11, scaleRange: 40 }))
    expect(register).toHaveLength(24)
    expect(register[0]).toBe(71)
    expect(register[23]).toBe(94)
  })
})

describe('buildHeldRegister', () => {
  const notes = held(67, 60, 64)

  it('orders up', () => {
    expect(buildHeldRegister(notes, settings({ heldOrder: 'up' }))).toEqual([60, 64, 67])
  })

  it('orders down', () => {
    expect(buildHeldRegister(notes, settings({ heldOrder: 'down' }))).toEqual([67, 64, 60])
  })

  it('keeps the order notes were played in', () => {
    expect(buildHeldRegister(notes, settings({ heldOrder: 'played' }))).toEqual([67, 60, 64])
  })

  it('shuffles from the seed and the note set', () => {
    expect(buildHeldRegister(notes, settings({ heldOrder: 'rand' }))).toEqual([64, 67, 60])
    expect(buildHeldRegister(notes, settings({ heldOrder: 'rand', heldOrderSeed: 5 }))).toEqual([67, 64, 60])
    expect(buildHeldRegister(held(60, 64, 67, 72), settings({ heldOrder: 'rand' }))).toEqual([60, 72, 67, 64])
  })

  it('does not disturb the tracked notes', () => {
    buildHeldRegister(notes, settings({ heldOrder: 'rand' }))
    expect(notes.active).toEqual([60, 64, 67])
  })

  it('is empty without notes', () => {
    expect(buildHeldRegister(held(), settings())).toEqual([])
  })
})

describe('buildRegister', () => {
  it('picks the pool by register mode', () => {
    const notes = held(50)
    expect(buildRegister(notes, settings())).toEqual([50])
    expect(buildRegister(notes, settings({ registerMode: 'scale', scaleRange: 2 }))).toEqual([60, 62])
  })
})
