// =============================================================================
// Stepweave - Deterministic Random Draws
// =============================================================================
//
// Every random decision in the engine is a pure function of (seed, step, salt).
// Nothing here keeps state between calls, so a pattern replays identically no
// matter when or how often it is evaluated.

const TWO_POW_32 = 4294967296

/**
 * 32-bit avalanche mix (lowbias32).
 */
export function mixU32(value: number): number {
  let x = value >>> 0
  x ^= x >>> 16
  x = Math.imul(x, 0x7feb352d)
  x ^= x >>> 15
  x = Math.imul(x, 0x846ca68b)
  x ^= x >>> 16
  return x >>> 0
}

/**
 * Advance a weyl-sequence state and return the next draw (also the new state).
 */
export function nextU32(state: number): number {
  return mixU32((state + 0x9e3779b9) >>> 0)
}

/**
 * Draw a 32-bit value keyed by seed, step and salt.
 *
 * The step is split into its low and high 32-bit halves so steps beyond
 * 2^32 still produce distinct draws. A zero seed is treated as 1.
 */
export function stepRand(seed: number, step: number, salt: number): number {
  const lo = (step % TWO_POW_32) >>> 0
  const hi = Math.floor(step / TWO_POW_32) >>> 0
  const s = (seed >>> 0) || 1
  return mixU32(s ^ lo ^ mixU32(hi ^ salt) ^ salt)
}

/**
 * Percent chance test against a draw.
 */
export function chanceHit(draw: number, pct: number): boolean {
  if (pct <= 0) return false
  if (pct >= 100) return true
  return draw % 100 < pct
}

/**
 * Signed offset in [-amount, amount] from a draw.
 */
export function signedOffset(draw: number, amount: number): number {
  if (amount <= 0) return 0
  return (draw % (amount * 2 + 1)) - amount
}

/**
 * FNV-1a over a list of small integers (MIDI notes).
 */
export function fnv1a(values: readonly number[]): number {
  let h = 2166136261
  for (const value of values) {
    h ^= value
    h = Math.imul(h, 16777619) >>> 0
  }
  return h >>> 0
}

/**
 * Seeded Fisher–Yates shuffle, in place.
 */
export function shuffleInPlace<T>(items: T[], seed: number): T[] {
  let state = (seed >>> 0) || 1
  for (let i = items.length - 1; i > 0; i--) {
    state = nextU32(state)
    const j = state % (i + 1)
    const tmp = items[i]
    items[i] = items[j]
    items[j] = tmp
  }
  return items
}
