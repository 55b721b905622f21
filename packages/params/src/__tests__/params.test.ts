import { createSequencer } from '@stepweave/core'
import {
  applyState,
  getParam,
  getState,
  isParamKey,
  PARAM_BINDINGS,
  setParam
} from '../index'

describe('setParam / getParam', () => {
  it('parses integers and reports the clamped value', () => {
    const seq = createSequencer()
    expect(setParam(seq, 'bpm', '90')).toBe(true)
    expect(getParam(seq, 'bpm')).toBe('90')
    expect(setParam(seq, 'bpm', '500')).toBe(true)
    expect(getParam(seq, 'bpm')).toBe('240')
    expect(setParam(seq, 'bpm', ' 12bpm')).toBe(true)
    expect(getParam(seq, 'bpm')).toBe('40')
  })

  it('rejects values that do not parse', () => {
    const seq = createSequencer()
    expect(setParam(seq, 'bpm', 'fast')).toBe(false)
    expect(setParam(seq, 'rate', '1/3')).toBe(false)
    expect(setParam(seq, 'lane2_enabled', 'yes')).toBe(false)
    expect(getParam(seq, 'bpm')).toBe('120')
    expect(getParam(seq, 'rate')).toBe('1/16')
  })

  it('reads and writes enumerated and lane fields', () => {
    const seq = createSequencer()
    expect(setParam(seq, 'held_order', 'played')).toBe(true)
    expect(setParam(seq, 'lane2_enabled', 'on')).toBe(true)
    expect(setParam(seq, 'lane2_oct_rng', '+2')).toBe(true)
    expect(getParam(seq, 'held_order')).toBe('played')
    expect(getParam(seq, 'lane2_enabled')).toBe('on')
    expect(getParam(seq, 'lane3_enabled')).toBe('off')
    expect(seq.getLane(2, 'octaveRange')).toBe('+2')
  })

  it('answers read-only keys and refuses to set them', () => {
    const seq = createSequencer()
    expect(getParam(seq, 'name')).toBe('Stepweave')
    expect(getParam(seq, 'bank_name')).toBe('Factory')
    expect(setParam(seq, 'name', 'other')).toBe(false)
  })

  it('ignores unknown keys', () => {
    const seq = createSequencer()
    expect(getParam(seq, 'lane5_steps')).toBeUndefined()
    expect(getParam(seq, 'toString')).toBeUndefined()
    expect(setParam(seq, 'volume', '3')).toBe(false)
    expect(isParamKey('lane4_gate')).toBe(true)
    expect(isParamKey('state')).toBe(true)
    expect(isParamKey('lane0_gate')).toBe(false)
  })
})

describe('getState', () => {
  it('lists every key in canonical order', () => {
    const state = getState(createSequencer())
    const keys = Object.keys(state)
    expect(keys).toHaveLength(22 + 4 * 15)
    expect(keys).toEqual(PARAM_BINDINGS.map(binding => binding.key))
    expect(keys[0]).toBe('play_mode')
    expect(keys[22]).toBe('lane1_enabled')
    expect(keys[keys.length - 1]).toBe('lane4_gate')
  })

  it('writes enums as strings and numbers as numbers', () => {
    const state = getState(createSequencer())
    expect(state.rate).toBe('1/16')
    expect(state.bpm).toBe(120)
    expect(state.lane1_enabled).toBe('on')
    expect(state.lane2_note).toBe(2)
    expect(state.lane1_oct_rng).toBe('+-1')
  })
})

describe('applyState', () => {
  it('applies known keys in canonical order and skips bad values', () => {
    const seq = createSequencer()
    const json = JSON.stringify({
      lane1_pulses: 12,
      lane1_steps: '8',
      bpm: 100.7,
      rate: 'bad',
      lane1_enabled: true,
      volume: 3
    })
    expect(applyState(seq, json)).toEqual({
      applied: ['bpm', 'lane1_steps', 'lane1_pulses'],
      skipped: ['rate', 'lane1_enabled']
    })
    expect(getParam(seq, 'bpm')).toBe('100')
    expect(getParam(seq, 'lane1_pulses')).toBe('8')
    expect(getParam(seq, 'rate')).toBe('1/16')
  })

  it('reports payloads that are not JSON objects', () => {
    const seq = createSequencer()
    expect(applyState(seq, '[1, 2]')).toEqual({
      applied: [],
      skipped: [],
      error: 'state must be a JSON object'
    })
    expect(applyState(seq, '{bpm').error).toBeDefined()
  })

  it('succeeds through setParam only when every value applied', () => {
    const seq = createSequencer()
    expect(setParam(seq, 'state', '{"swing": 30}')).toBe(true)
    expect(setParam(seq, 'state', '{"swing": 40, "sync": "midi"}')).toBe(false)
    expect(seq.getGlobal('swing')).toBe(40)
    expect(setParam(seq, 'state', 'nope')).toBe(false)
  })

  it('round-trips through the state key', () => {
    const source = createSequencer()
    setParam(source, 'play_mode', 'latch')
    setParam(source, 'scale_mode', 'dorian')
    setParam(source, 'lane3_enabled', 'on')
    setParam(source, 'lane3_steps', '12')
    setParam(source, 'lane3_rotation', '5')
    setParam(source, 'global_g_rnd', '40')

    const copy = createSequencer()
    const state = getParam(source, 'state')
    expect(state).toBeDefined()
    expect(setParam(copy, 'state', state ?? '')).toBe(true)
    expect(getState(copy)).toEqual(getState(source))
  })
})
