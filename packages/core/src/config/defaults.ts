import { LANE_COUNT } from '../constants'
import type { GlobalConfig, LaneConfig } from '../types'

export const DEFAULT_GLOBAL_CONFIG: Readonly<GlobalConfig> = Object.freeze({
  playMode: 'hold',
  retriggerMode: 'cont',
  rate: '1/16',
  sync: 'internal',
  bpm: 120,
  swing: 0,
  maxVoices: 8,
  velocity: 100,
  velocityRandom: 0,
  gate: 100,
  gateRandom: 0,
  randomSeed: 0,
  randCycle: 16,
  registerMode: 'held',
  heldOrder: 'up',
  heldOrderSeed: 0,
  missingNotePolicy: 'skip',
  missingNoteSeed: 0,
  scaleMode: 'major',
  scaleRange: 8,
  rootNote: 0,
  octave: 0
})

/**
 * Default settings for a lane. Only lane 1 starts enabled; each lane
 * points at the register note matching its number.
 */
export function createDefaultLane(index: number): LaneConfig {
  return {
    enabled: index === 0,
    steps: 16,
    pulses: 4,
    rotation: 0,
    drop: 0,
    dropSeed: 0,
    note: index + 1,
    noteRandom: 0,
    noteSeed: 0,
    octave: 0,
    octaveRandom: 0,
    octaveSeed: 0,
    octaveRange: '+-1',
    velocity: 0,
    gate: 0
  }
}

export function createDefaultLanes(): LaneConfig[] {
  return Array.from({ length: LANE_COUNT }, (_, index) => createDefaultLane(index))
}
