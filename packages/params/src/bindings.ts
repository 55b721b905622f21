/**
 * Field codecs and key bindings for the flat parameter surface.
 *
 * A binding ties one string key (`bpm`, `lane2_steps`) to one typed field on
 * the sequencer and knows how to parse, format and JSON-encode its value.
 */

import {
  isOneOf,
  type ConfigSurface,
  type GlobalConfig,
  type LaneConfig,
  type LaneNumber
} from '@stepweave/core'

// =============================================================================
// Codecs
// =============================================================================

export interface FieldCodec<T> {
  /** Parse a raw string; undefined rejects it. */
  parse(raw: string): T | undefined
  format(value: T): string
  /** Value as written into the state JSON */
  encode(value: T): string | number
}

/**
 * Integer field. Parsing takes the leading integer, so `"12bpm"` reads as 12.
 */
export const intCodec: FieldCodec<number> = {
  parse(raw) {
    const value = parseInt(raw.trim(), 10)
    return Number.isNaN(value) ? undefined : value
  },
  format: value => String(value),
  encode: value => value
}

export function enumCodec<T extends string>(values: readonly T[]): FieldCodec<T> {
  return {
    parse: raw => (isOneOf(values, raw) ? raw : undefined),
    format: value => value,
    encode: value => value
  }
}

export const onOffCodec: FieldCodec<boolean> = {
  parse(raw) {
    if (raw === 'on') return true
    if (raw === 'off') return false
    return undefined
  },
  format: value => (value ? 'on' : 'off'),
  encode: value => (value ? 'on' : 'off')
}

// =============================================================================
// Bindings
// =============================================================================

export interface ParamBinding {
  readonly key: string
  get(target: ConfigSurface): string
  /** @returns False when the raw value was rejected */
  set(target: ConfigSurface, raw: string): boolean
  encode(target: ConfigSurface): string | number
}

export function globalBinding<K extends keyof GlobalConfig>(
  key: string,
  field: K,
  codec: FieldCodec<GlobalConfig[K]>
): ParamBinding {
  return {
    key,
    get: target => codec.format(target.getGlobal(field)),
    set(target, raw) {
      const value = codec.parse(raw)
      if (value === undefined) return false
      target.setGlobal(field, value)
      return true
    },
    encode: target => codec.encode(target.getGlobal(field))
  }
}

export function laneBinding<K extends keyof LaneConfig>(
  lane: LaneNumber,
  suffix: string,
  field: K,
  codec: FieldCodec<LaneConfig[K]>
): ParamBinding {
  return {
    key: `lane${lane}_${suffix}`,
    get: target => codec.format(target.getLane(lane, field)),
    set(target, raw) {
      const value = codec.parse(raw)
      if (value === undefined) return false
      target.setLane(lane, field, value)
      return true
    },
    encode: target => codec.encode(target.getLane(lane, field))
  }
}
