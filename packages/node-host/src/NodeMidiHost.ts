/**
 * @stepweave/node-host
 *
 * Runs a Stepweave sequencer against real MIDI ports using the jzz library.
 * Incoming MIDI is fed to the sequencer as it arrives; a block timer stands in
 * for the audio callback and drives `tick()`.
 *
 * Requirements:
 * - Node.js 20+
 * - jzz package installed
 */

import {
  DEFAULT_MAX_OUTPUT,
  DEFAULT_SAMPLE_RATE,
  MIDI,
  createSequencer,
  type EngineLogger,
  type MidiMessage,
  type Sequencer
} from '@stepweave/core'

// jzz types are untyped, using any for internal jzz state
import JZZ from 'jzz'

import { NodeHostConfigError } from './errors'

// =============================================================================
// Types
// =============================================================================

/**
 * MIDI port information.
 */
export interface MidiPort {
  id: string
  name: string
  manufacturer?: string
}

/**
 * Options for creating a NodeMidiHost.
 */
export interface NodeMidiHostOptions {
  /** Rate the block timer simulates (default: 44100) */
  sampleRate?: number
  /** Frames per tick (default: 128) */
  blockSize?: number
  /** Channel for outgoing channel messages (1-16, default: 1) */
  outputChannel?: number
  /** Trace transport events to the console (default: false) */
  debug?: boolean
  /** Output capacity per engine call (default: 64) */
  maxOutput?: number
  /** Engine to drive; a fresh one is created when omitted */
  sequencer?: Sequencer
}

/** Port entry as listed by jzz `info()` */
interface PortInfo {
  name?: string
  manufacturer?: string
}

// =============================================================================
// Constants
// =============================================================================

/** Default frames per block */
export const DEFAULT_BLOCK_SIZE = 128

const LOG_PREFIX = '[NodeMidiHost]'

/** Sequencer logger used when debug output is off */
const WARN_ONLY_LOGGER: EngineLogger = {
  debug: () => undefined,
  warn: (message, ...args) => console.warn(message, ...args)
}

// =============================================================================
// Option Validation
// =============================================================================

function requirePositive(option: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new NodeHostConfigError(option, `must be a positive number, got ${value}`)
  }
  return value
}

function requireChannel(value: number): number {
  if (!Number.isInteger(value) || value < 1 || value > 16) {
    throw new NodeHostConfigError('outputChannel', `must be an integer from 1 to 16, got ${value}`)
  }
  return value - 1
}

// =============================================================================
// NodeMidiHost
// =============================================================================

/**
 * Node.js MIDI host for a Stepweave sequencer.
 *
 * Port failures never throw; the affected call returns false and logs a
 * warning. After `dispose()` every method is a no-op.
 */
export class NodeMidiHost {
  // jzz state
  private midi: any = null
  private midiInput: any = null
  private midiOutput: any = null

  // Configuration
  private readonly sampleRate: number
  private readonly blockSize: number
  private readonly outputChannel: number
  private readonly maxOutput: number

  private readonly sequencer: Sequencer

  // State
  private timer: ReturnType<typeof setInterval> | null = null
  private selectedInput: MidiPort | null = null
  private selectedOutput: MidiPort | null = null
  private initialized: boolean = false
  private disposed: boolean = false

  constructor(options: NodeMidiHostOptions = {}) {
    this.sampleRate = requirePositive('sampleRate', options.sampleRate ?? DEFAULT_SAMPLE_RATE)
    this.blockSize = Math.floor(requirePositive('blockSize', options.blockSize ?? DEFAULT_BLOCK_SIZE))
    this.outputChannel = requireChannel(options.outputChannel ?? 1)
    this.maxOutput = Math.floor(requirePositive('maxOutput', options.maxOutput ?? DEFAULT_MAX_OUTPUT))
    this.sequencer = options.sequencer ?? createSequencer({
      logger: options.debug ? console : WARN_ONLY_LOGGER
    })
  }

  // ===========================================================================
  // Static Methods
  // ===========================================================================

  /**
   * Check if Node.js MIDI is supported (always true in Node.js environment).
   */
  static async isSupported(): Promise<boolean> {
    return typeof process !== 'undefined' && process.versions?.node !== undefined
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Open jzz and select the first input and output, when there are any.
   *
   * @returns True if an output port is open
   */
  async init(): Promise<boolean> {
    if (this.disposed) return false
    if (this.initialized) return this.midiOutput !== null

    try {
      this.midi = await JZZ()

      const inputs = await this.listInputs()
      if (inputs.length > 0) {
        await this.selectInput(inputs[0].id)
        console.log(`${LOG_PREFIX} Using input "${inputs[0].name}"`)
      } else {
        console.warn(`${LOG_PREFIX} No MIDI inputs available`)
      }

      const outputs = await this.listOutputs()
      if (outputs.length > 0) {
        await this.selectOutput(outputs[0].id)
        console.log(`${LOG_PREFIX} Using output "${outputs[0].name}"`)
      } else {
        console.warn(`${LOG_PREFIX} No MIDI outputs available`)
      }

      this.initialized = true
      return this.midiOutput !== null
    } catch (err) {
      console.warn(`${LOG_PREFIX} JZZ initialization failed:`, err)
      this.initialized = true
      return false
    }
  }

  /**
   * Start the block timer. Each firing runs one block of `blockSize` frames.
   *
   * @returns False if already running or disposed
   */
  start(): boolean {
    if (this.disposed || this.timer !== null) return false
    this.timer = setInterval(() => this.processBlock(), this.blockIntervalMs)
    return true
  }

  /**
   * Stop the block timer and send the sequencer a transport Stop so that
   * every sounding note is released.
   */
  stop(): void {
    if (this.disposed) return
    if (this.timer !== null) {
      clearInterval(this.timer)
      this.timer = null
    }
    this.send(this.sequencer.processMidi([MIDI.STOP], this.maxOutput))
  }

  /**
   * Stop, close ports and release the engine.
   */
  dispose(): void {
    if (this.disposed) return
    this.stop()
    this.closeInput()
    if (this.midiOutput) {
      try {
        this.midiOutput.close()
      } catch (err) {
        console.warn(`${LOG_PREFIX} Failed to close MIDI output:`, err)
      }
    }
    this.sequencer.dispose()
    this.midiOutput = null
    this.midi = null
    this.selectedInput = null
    this.selectedOutput = null
    this.disposed = true
  }

  isRunning(): boolean {
    return this.timer !== null
  }

  /** The engine this host drives */
  get engine(): Sequencer {
    return this.sequencer
  }

  /** Timer period for one block, at least 1 ms */
  get blockIntervalMs(): number {
    return Math.max(1, Math.round((this.blockSize / this.sampleRate) * 1000))
  }

  // ===========================================================================
  // MIDI Flow
  // ===========================================================================

  /**
   * Feed one MIDI message to the sequencer and send whatever it emits.
   *
   * @returns The messages sent, after re-channelling
   */
  receive(message: ArrayLike<number>): MidiMessage[] {
    if (this.disposed || message.length < 1) return []
    const bytes = Array.from(message).slice(0, 3)
    return this.send(this.sequencer.processMidi(bytes, this.maxOutput))
  }

  /**
   * Run one block of `blockSize` frames.
   *
   * @returns The messages sent
   */
  processBlock(): MidiMessage[] {
    if (this.disposed) return []
    return this.send(this.sequencer.tick(this.blockSize, this.sampleRate, this.maxOutput))
  }

  // ===========================================================================
  // Port Selection
  // ===========================================================================

  /**
   * List available MIDI inputs.
   */
  async listInputs(): Promise<MidiPort[]> {
    if (!(await this.ensureEngine())) return []
    const info = this.midi.info()
    if (!info || !info.inputs) return []
    return info.inputs.map((input: PortInfo, index: number) => toPort(input, index, 'Input'))
  }

  /**
   * List available MIDI outputs.
   */
  async listOutputs(): Promise<MidiPort[]> {
    if (!(await this.ensureEngine())) return []
    const info = this.midi.info()
    if (!info || !info.outputs) return []
    return info.outputs.map((output: PortInfo, index: number) => toPort(output, index, 'Output'))
  }

  /**
   * Select a MIDI input by port ID. Messages from it go straight to the
   * sequencer.
   */
  async selectInput(portId: string): Promise<boolean> {
    if (this.disposed) return false
    const inputs = await this.listInputs()
    const port = inputs.find(i => i.id === portId)
    if (!port) return false

    try {
      this.closeInput()
      this.midiInput = this.midi.openMidiIn(parseInt(portId, 10))
      this.midiInput.connect((message: ArrayLike<number>) => {
        this.receive(message)
      })
      this.selectedInput = port
      return true
    } catch (err) {
      console.warn(`${LOG_PREFIX} Failed to open MIDI input:`, err)
      return false
    }
  }

  /**
   * Select a MIDI output by port ID.
   */
  async selectOutput(portId: string): Promise<boolean> {
    if (this.disposed) return false
    const outputs = await this.listOutputs()
    const port = outputs.find(o => o.id === portId)
    if (!port) return false

    try {
      this.midiOutput = this.midi.openMidiOut(parseInt(portId, 10))
      this.selectedOutput = port
      return true
    } catch (err) {
      console.warn(`${LOG_PREFIX} Failed to open MIDI output:`, err)
      return false
    }
  }

  getSelectedInput(): MidiPort | null {
    return this.selectedInput
  }

  getSelectedOutput(): MidiPort | null {
    return this.selectedOutput
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async ensureEngine(): Promise<boolean> {
    if (this.midi) return true
    try {
      this.midi = await JZZ()
      return true
    } catch (err) {
      console.warn(`${LOG_PREFIX} JZZ initialization failed:`, err)
      return false
    }
  }

  private closeInput(): void {
    if (!this.midiInput) return
    try {
      this.midiInput.close()
    } catch (err) {
      console.warn(`${LOG_PREFIX} Failed to close MIDI input:`, err)
    }
    this.midiInput = null
    this.selectedInput = null
  }

  /**
   * Move channel messages onto the configured output channel.
   */
  private rechannel(message: MidiMessage): MidiMessage {
    const status = message[0]
    if (status >= 0xf0 || status < 0x80) return message
    return [(status & 0xf0) | this.outputChannel, ...message.slice(1)]
  }

  private send(messages: MidiMessage[]): MidiMessage[] {
    const sent = messages.map(message => this.rechannel(message))
    if (!this.midiOutput) return sent
    for (const message of sent) {
      try {
        this.midiOutput.send([...message])
      } catch (err) {
        console.warn(`${LOG_PREFIX} Failed to send MIDI message:`, err)
        break
      }
    }
    return sent
  }
}

function toPort(info: PortInfo, index: number, label: string): MidiPort {
  return {
    id: String(index),
    name: info.name || `${label} ${index}`,
    manufacturer: info.manufacturer || undefined
  }
}
