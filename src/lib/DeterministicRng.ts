export type RandomSource = () => number;

/**
 * Seedable mulberry32 generator, so a shuffle can be replayed from its seed.
 */
export class DeterministicRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    // mulberry32 has a degenerate state at 0
    if (this.state === 0) this.state = 0x12345678;
  }

  /** Returns a uint32 in [0, 2^32). */
  nextUint32(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Returns a float in [0, 1). */
  nextFloat(): number {
    return this.nextUint32() / 4294967296;
  }
}

export const createRandom = (seed?: number): RandomSource => {
  if (seed === undefined) return Math.random;
  const rng = new DeterministicRng(seed);
  return () => rng.nextFloat();
};
