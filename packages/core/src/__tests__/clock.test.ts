import { InternalStepClock } from '../clock/InternalStepClock'
import { MidiStepClock } from '../clock/MidiStepClock'
import { clocksPerStep, framesPerStep, isTripletRate } from '../clock/rate'
import { createTransport, getRhythmStep, resetTransport, snapPhraseAnchor } from '../clock/transport'
import { MAX_PENDING_STEP_TRIGGERS } from '../constants'

describe('rate', () => {
  it('converts rates to clock pulses per step', () => {
    expect(clocksPerStep('1/32')).toBe(3)
    expect(clocksPerStep('1/16T')).toBe(4)
    expect(clocksPerStep('1/16')).toBe(6)
    expect(clocksPerStep('1/8T')).toBe(8)
    expect(clocksPerStep('1/8')).toBe(12)
    expect(clocksPerStep('1/4T')).toBe(16)
    expect(clocksPerStep('1/4')).toBe(24)
    expect(clocksPerStep('1/2')).toBe(48)
    expect(clocksPerStep('1')).toBe(96)
  })

  it('converts tempo to frames per step', () => {
    expect(framesPerStep(44100, 120, '1/16')).toBe(5512.5)
    expect(framesPerStep(44100, 120, '1/16T')).toBe(3675)
    expect(framesPerStep(48000, 60, '1/4')).toBe(48000)
    expect(framesPerStep(10, 240, '1/32')).toBe(1)
  })

  it('knows the triplet rates', () => {
    expect(isTripletRate('1/8T')).toBe(true)
    expect(isTripletRate('1/8')).toBe(false)
  })
})

describe('InternalStepClock', () => {
  function prepared(swing = 0): InternalStepClock {
    const clock = new InternalStepClock({ bpm: 120, rate: '1/16', swing })
    clock.prepare(44100)
    return clock
  }

  it('computes the step interval from the sample rate', () => {
    const clock = prepared()
    expect(clock.inspect().stepInterval).toBe(5512.5)
    expect(clock.gateUnit).toBe('frames')
  })

  it('times gates against the rounded interval', () => {
    const clock = prepared()
    expect(clock.gateLength(100)).toBe(5513)
    expect(clock.gateLength(50)).toBe(2756)
    expect(clock.gateLength(0)).toBe(1)
    expect(clock.gateLength(5000)).toBe(5513 * 16)
  })

  it('fires its first step on the first block', () => {
    const clock = prepared()
    clock.advance(128)
    expect(clock.hasDueStep()).toBe(true)
    clock.completeStep()
    expect(clock.hasDueStep()).toBe(false)
    expect(clock.inspect().framesUntilStep).toBe(5384.5)
  })

  it('fires every crossing in a large block', () => {
    const clock = prepared()
    clock.advance(5512.5 * 2)
    let fired = 0
    while (clock.hasDueStep()) {
      clock.completeStep()
      fired++
    }
    expect(fired).toBe(3)
  })

  it('alternates long and short steps with swing', () => {
    const clock = prepared(50)
    clock.start()
    clock.advance(1)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(6889.625)

    clock.advance(6890)
    expect(clock.hasDueStep()).toBe(true)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(4134)

    clock.advance(4134)
    expect(clock.hasDueStep()).toBe(true)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(6890.625)
  })

  it('does not swing triplet rates', () => {
    const clock = new InternalStepClock({ bpm: 120, rate: '1/16T', swing: 50 })
    clock.prepare(44100)
    clock.advance(1)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(3674)
    clock.advance(3674)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(3675)
  })

  it('realigns to the tempo grid when the tempo changes', () => {
    const clock = prepared()
    clock.start()
    clock.advance(1000)
    clock.completeStep()
    expect(clock.inspect().framesUntilStep).toBe(4512.5)

    clock.configure({ bpm: 60, rate: '1/16', swing: 0 })
    expect(clock.inspect().stepInterval).toBe(11025)
    expect(clock.inspect().framesUntilStep).toBe(10025)
  })

  it('waits a full interval when realigned on a boundary', () => {
    const clock = prepared()
    clock.start()
    clock.configure({ bpm: 120, rate: '1/8', swing: 0 })
    expect(clock.inspect().framesUntilStep).toBe(11025)
  })

  it('ignores swing-only changes', () => {
    const clock = prepared()
    clock.start()
    clock.configure({ bpm: 120, rate: '1/16', swing: 30 })
    expect(clock.inspect().framesUntilStep).toBe(0)
  })

  it('restarts on start and continue', () => {
    const clock = prepared()
    clock.advance(3000)
    clock.completeStep()
    expect(clock.resume()).toBe(true)
    expect(clock.inspect().frameTotal).toBe(0)
    expect(clock.inspect().framesUntilStep).toBe(0)
  })

  it('starts on the default sample rate before any block', () => {
    const clock = new InternalStepClock()
    clock.start()
    expect(clock.inspect().stepInterval).toBe(5512.5)
    expect(clock.gateLength(100)).toBe(5513)
  })

  it('waits a full interval after stop and keeps running', () => {
    const clock = prepared()
    clock.advance(200)
    clock.stop()
    expect(clock.running).toBe(true)
    expect(clock.inspect().framesUntilStep).toBe(5512.5)
    expect(clock.inspect().frameTotal).toBe(0)
  })
})

describe('MidiStepClock', () => {
  function pulse(clock: MidiStepClock, count: number): void {
    for (let i = 0; i < count; i++) clock.pulse()
  }

  it('runs from creation', () => {
    const clock = new MidiStepClock('1/16')
    expect(clock.running).toBe(true)
    expect(clock.gateUnit).toBe('ticks')
    pulse(clock, 5)
    expect(clock.hasDueStep()).toBe(false)
    pulse(clock, 1)
    expect(clock.hasDueStep()).toBe(true)
    expect(clock.inspect()).toMatchObject({ tickTotal: 6, tickPhase: 0, pendingSteps: 1 })
  })

  it('tracks the phase inside a step', () => {
    const clock = new MidiStepClock('1/8')
    pulse(clock, 15)
    expect(clock.inspect()).toMatchObject({ clocksPerStep: 12, tickTotal: 15, tickPhase: 3, pendingSteps: 1 })
  })

  it('caps queued steps', () => {
    const clock = new MidiStepClock('1/16')
    pulse(clock, 6 * 20)
    expect(clock.inspect().pendingSteps).toBe(MAX_PENDING_STEP_TRIGGERS)
  })

  it('arms one step on start', () => {
    const clock = new MidiStepClock('1/16')
    pulse(clock, 4)
    clock.start()
    expect(clock.inspect()).toMatchObject({ tickTotal: 0, tickPhase: 0, pendingSteps: 1 })
    clock.completeStep()
    expect(clock.hasDueStep()).toBe(false)
  })

  it('ignores pulses while stopped', () => {
    const clock = new MidiStepClock('1/16')
    clock.stop()
    pulse(clock, 12)
    expect(clock.running).toBe(false)
    expect(clock.inspect()).toMatchObject({ tickTotal: 0, pendingSteps: 0 })
  })

  it('continues only from a stop', () => {
    const clock = new MidiStepClock('1/16')
    pulse(clock, 3)
    expect(clock.resume()).toBe(false)
    expect(clock.inspect().tickTotal).toBe(3)

    clock.stop()
    expect(clock.resume()).toBe(true)
    expect(clock.inspect()).toMatchObject({ tickTotal: 0, pendingSteps: 1 })
  })

  it('drops queued steps on a rate change', () => {
    const clock = new MidiStepClock('1/16')
    pulse(clock, 12)
    clock.configure({ bpm: 120, rate: '1/16', swing: 0 })
    expect(clock.inspect().pendingSteps).toBe(2)
    clock.configure({ bpm: 120, rate: '1/4', swing: 0 })
    expect(clock.inspect()).toMatchObject({ clocksPerStep: 24, pendingSteps: 0 })
  })

  it('times gates in pulses', () => {
    const clock = new MidiStepClock('1/16')
    expect(clock.gateLength(100)).toBe(6)
    expect(clock.gateLength(50)).toBe(3)
    expect(clock.gateLength(10)).toBe(1)
    expect(clock.gateLength(1600)).toBe(96)
  })
})

describe('transport', () => {
  it('counts rhythm steps from the phrase anchor in restart mode', () => {
    const transport = createTransport()
    transport.anchorStep = 10
    transport.phraseAnchorStep = 4
    expect(getRhythmStep(transport, 'restart')).toBe(6)
    expect(getRhythmStep(transport, 'cont')).toBe(10)
  })

  it('snaps the phrase anchor only with notes to play', () => {
    const transport = createTransport()
    resetTransport(transport, true)
    transport.anchorStep = 7
    expect(snapPhraseAnchor(transport, false)).toBe(false)
    expect(transport.phraseRestartPending).toBe(true)
    expect(snapPhraseAnchor(transport, true)).toBe(true)
    expect(transport).toEqual({ anchorStep: 7, phraseAnchorStep: 7, phraseRestartPending: false })
  })
})
