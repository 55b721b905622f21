/**
 * Euclidean rhythm test.
 *
 * Slot `i` of a `steps`-long pattern with `pulses` hits sounds when
 * `(i * pulses) % steps < pulses`, which spreads the hits as evenly as the
 * grid allows. Rotation shifts the pattern start.
 */
export function euclideanHit(step: number, steps: number, pulses: number, rotation: number): boolean {
  if (steps <= 0 || pulses <= 0) return false
  if (pulses >= steps) return true
  const rot = ((rotation % steps) + steps) % steps
  const pos = ((step % steps) + rot) % steps
  return (pos * pulses) % steps < pulses
}

/**
 * Indices of the sounding slots over one pattern cycle.
 */
export function euclideanPattern(steps: number, pulses: number, rotation = 0): number[] {
  const hits: number[] = []
  for (let i = 0; i < steps; i++) {
    if (euclideanHit(i, steps, pulses, rotation)) hits.push(i)
  }
  return hits
}
