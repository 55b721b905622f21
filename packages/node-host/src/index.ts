/**
 * @stepweave/node-host
 *
 * Node.js MIDI host for the Stepweave sequencer, using the jzz library.
 */

export { NodeMidiHost, DEFAULT_BLOCK_SIZE } from './NodeMidiHost'
export type { MidiPort, NodeMidiHostOptions } from './NodeMidiHost'
export { NodeHostConfigError } from './errors'
