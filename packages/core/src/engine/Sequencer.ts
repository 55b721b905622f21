// =============================================================================
// Stepweave - Sequencer
// =============================================================================
//
// Ties note state, the step clocks, the lanes and the voice manager together
// behind the MidiEffect contract. One instance per host slot; nothing here is
// shared between instances.

import { DEFAULT_MAX_OUTPUT, LANE_COUNT, MIDI } from '../constants'
import { DEFAULT_GLOBAL_CONFIG, createDefaultLanes } from '../config/defaults'
import { normalizeGlobalField, normalizeLane, normalizeLaneField } from '../config/normalize'
import { InternalStepClock } from '../clock/InternalStepClock'
import { MidiStepClock } from '../clock/MidiStepClock'
import type { ClockTiming, StepClock } from '../clock/StepClock'
import {
  createTransport,
  getRhythmStep,
  resetTransport,
  snapPhraseAnchor,
  type TransportState
} from '../clock/transport'
import { evaluateLane, type LaneContext } from '../lanes/LaneEngine'
import { NoteStateTracker } from '../notes/NoteStateTracker'
import { OutputBuffer, controlChange } from '../output/OutputBuffer'
import { buildRegister } from '../register/RegisterBuilder'
import type {
  ConfigSurface,
  GlobalConfig,
  LaneConfig,
  LaneNumber,
  MidiMessage,
  SequencerConfig
} from '../types'
import { VoiceManager } from '../voices/VoiceManager'
import type { EngineLogger, HostCapabilities, MidiEffect, SequencerInspection } from './types'

const LOG_PREFIX = '[Sequencer]'

const SILENT_LOGGER: EngineLogger = {
  debug: () => undefined,
  warn: () => undefined
}

/**
 * Euclidean step sequencer.
 *
 * Consumes held notes and transport messages and emits note-on/note-off
 * pairs on channel 1. Configuration is typed and clamped on assignment.
 */
export class Sequencer implements MidiEffect, ConfigSurface {
  private readonly global: GlobalConfig
  private readonly lanes: LaneConfig[]
  private readonly notes: NoteStateTracker
  private readonly voices: VoiceManager
  private readonly internalClock: InternalStepClock
  private readonly midiClock: MidiStepClock
  private readonly transport: TransportState
  private readonly logger: EngineLogger
  private clock: StepClock
  /** Voices owed a release since a mode change emptied the active set */
  private flushPending = false
  private disposed = false

  constructor(host: HostCapabilities = {}) {
    this.logger = host.logger ?? SILENT_LOGGER
    this.global = { ...DEFAULT_GLOBAL_CONFIG }
    this.lanes = createDefaultLanes()
    this.notes = new NoteStateTracker(this.global.playMode)
    this.voices = new VoiceManager(this.global.maxVoices)
    this.internalClock = new InternalStepClock(this.timing())
    this.midiClock = new MidiStepClock(this.global.rate)
    this.clock = this.global.sync === 'clock' ? this.midiClock : this.internalClock
    this.transport = createTransport()
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  getGlobal<K extends keyof GlobalConfig>(key: K): GlobalConfig[K] {
    return this.global[key]
  }

  setGlobal<K extends keyof GlobalConfig>(key: K, value: GlobalConfig[K]): GlobalConfig[K] {
    const next = normalizeGlobalField(key, value)
    this.global[key] = next
    this.applyGlobal(key)
    return next
  }

  getLane<K extends keyof LaneConfig>(lane: LaneNumber, key: K): LaneConfig[K] {
    return this.lanes[lane - 1][key]
  }

  setLane<K extends keyof LaneConfig>(lane: LaneNumber, key: K, value: LaneConfig[K]): LaneConfig[K] {
    const config = this.lanes[lane - 1]
    config[key] = normalizeLaneField(key, value)
    normalizeLane(config)
    return config[key]
  }

  /**
   * Frozen copy of the whole configuration.
   */
  snapshot(): SequencerConfig {
    return Object.freeze({
      global: Object.freeze({ ...this.global }),
      lanes: Object.freeze(this.lanes.map(lane => Object.freeze({ ...lane })))
    })
  }

  private applyGlobal(key: keyof GlobalConfig): void {
    switch (key) {
      case 'playMode': {
        const before = this.notes.activeCount
        this.notes.setPlayMode(this.global.playMode)
        if (before > 0 && this.notes.activeCount === 0 && this.releasesOnEmpty()) {
          this.flushPending = true
        }
        break
      }
      case 'bpm':
      case 'rate':
      case 'swing':
        this.internalClock.configure(this.timing())
        this.midiClock.configure(this.timing())
        break
      case 'sync':
        this.switchClock()
        break
      case 'maxVoices':
        this.voices.setLimit(this.global.maxVoices)
        break
      default:
        break
    }
  }

  private timing(): ClockTiming {
    return { bpm: this.global.bpm, rate: this.global.rate, swing: this.global.swing }
  }

  private switchClock(): void {
    const next = this.global.sync === 'clock' ? this.midiClock : this.internalClock
    next.configure(this.timing())
    next.activate()
    this.clock = next
    this.logger.debug(`${LOG_PREFIX} sync mode ${next.mode}`)
  }

  // ===========================================================================
  // MidiEffect
  // ===========================================================================

  processMidi(message: MidiMessage, maxOut: number = DEFAULT_MAX_OUTPUT): MidiMessage[] {
    if (this.disposed || message.length < 1) return []
    const out = new OutputBuffer(maxOut)
    const status = message[0]
    const type = status & 0xf0

    switch (status) {
      case MIDI.START:
      case MIDI.CONTINUE:
        this.handleStart(status === MIDI.START)
        return out.messages
      case MIDI.STOP:
        this.handleStop(out)
        return out.messages
      case MIDI.CLOCK:
        if (this.clock.mode === 'clock') {
          this.handlePulse(out)
          return out.messages
        }
        break
      default:
        break
    }

    if ((type === MIDI.NOTE_ON || type === MIDI.NOTE_OFF) && message.length >= 3) {
      this.handleNote(type === MIDI.NOTE_ON && message[2] > 0, message[1], out)
      return out.messages
    }

    out.push(message.slice(0, 3))
    return out.messages
  }

  tick(frames: number, sampleRate: number, maxOut: number = DEFAULT_MAX_OUTPUT): MidiMessage[] {
    if (this.disposed || frames < 0 || !Number.isFinite(maxOut) || maxOut < 1) return []
    const out = new OutputBuffer(maxOut)

    if (this.flushPending) {
      this.voices.flush(out)
      this.flushPending = this.voices.count > 0
    }
    this.internalClock.prepare(sampleRate)
    if (this.clock.gateUnit === 'frames') {
      this.voices.advance('frames', frames, out)
    }
    this.clock.advance(frames)

    while (this.clock.hasDueStep() && !out.full) {
      this.runAnchorStep(out)
      this.clock.completeStep()
    }
    if (this.clock.hasDueStep()) {
      this.logger.warn(`${LOG_PREFIX} output full, step deferred at anchor ${this.transport.anchorStep}`)
    }
    return out.messages
  }

  dispose(): void {
    this.voices.clear()
    this.notes.clear()
    this.disposed = true
  }

  /**
   * Read-only view of transport, note and voice state.
   */
  inspect(): SequencerInspection {
    return {
      clock: this.clock.inspect(),
      transport: { ...this.transport },
      notes: {
        physical: [...this.notes.physical],
        physicalAsPlayed: [...this.notes.physicalAsPlayed],
        active: [...this.notes.active],
        activeAsPlayed: [...this.notes.activeAsPlayed],
        latchReadyToReplace: this.notes.latchReadyToReplace
      },
      voices: this.voices.list()
    }
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private handleStart(isStart: boolean): void {
    let restarted = true
    if (isStart) {
      this.clock.start()
    } else {
      restarted = this.clock.resume()
    }
    if (!restarted) return
    resetTransport(this.transport, this.global.retriggerMode === 'restart')
    this.logger.debug(`${LOG_PREFIX} ${isStart ? 'start' : 'continue'} (${this.clock.mode})`)
  }

  private handleStop(out: OutputBuffer): void {
    out.push(controlChange(MIDI.ALL_NOTES_OFF, 0))
    this.voices.flush(out)
    this.voices.clear()
    this.flushPending = false
    this.clock.stop()
    resetTransport(this.transport, false)
    this.notes.clear()
    this.logger.debug(`${LOG_PREFIX} stop (${this.clock.mode})`)
  }

  private handlePulse(out: OutputBuffer): void {
    if (!this.clock.running) return
    this.voices.advance('ticks', 1, out)
    this.clock.pulse()
  }

  private handleNote(isOn: boolean, note: number, out: OutputBuffer): void {
    const before = this.notes.activeCount
    const restartMode = this.global.retriggerMode === 'restart'

    if (isOn) {
      const replaced = this.notes.noteOn(note)
      const started = before === 0 && this.notes.activeCount > 0
      if (restartMode && (replaced || started)) {
        this.transport.phraseRestartPending = true
        this.logger.debug(`${LOG_PREFIX} phrase restart armed at anchor ${this.transport.anchorStep}`)
      }
      return
    }

    this.notes.noteOff(note)
    if (before > 0 && this.notes.activeCount === 0 && this.releasesOnEmpty()) {
      this.voices.flush(out)
    }
  }

  /** Internal restart mode silences every voice when the active set empties. */
  private releasesOnEmpty(): boolean {
    return this.global.retriggerMode === 'restart' && this.clock.mode === 'internal'
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private runAnchorStep(out: OutputBuffer): void {
    const hasNotes = this.notes.activeCount > 0
    if (snapPhraseAnchor(this.transport, hasNotes)) {
      this.logger.debug(`${LOG_PREFIX} phrase restart at anchor ${this.transport.anchorStep}`)
    }

    if (hasNotes) {
      const context: LaneContext = {
        settings: this.global,
        register: buildRegister(this.notes, this.global),
        rhythmStep: getRhythmStep(this.transport, this.global.retriggerMode)
      }
      for (let i = 0; i < LANE_COUNT && !out.full; i++) {
        const outcome = evaluateLane(this.lanes[i], i, context)
        if (outcome.kind === 'note') this.voices.schedule(outcome, this.clock, out)
      }
    }

    this.transport.anchorStep++
  }
}

export function createSequencer(host?: HostCapabilities): Sequencer {
  return new Sequencer(host)
}
