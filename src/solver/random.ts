export type Rng = () => number // uniform in [0, 1)

// Deterministic lightweight RNG (Mulberry32)
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

export function pickIndex(length: number, rng: Rng): number {
  if (length <= 0) throw new RangeError('cannot pick from an empty list')
  return Math.min(length - 1, Math.floor(rng() * length))
}
