/**
 * QKD Telemetry - Kernel: Seeded Random
 *
 * Reproducible random source for photon statistics and key bits.
 */

/**
 * Simple seeded PRNG (Mulberry32)
 * Provides reproducible random sequences from a seed
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Restart the sequence from a new seed */
  reseed(seed: number): void {
    this.state = seed >>> 0;
  }

  /** Generate next random number in [0, 1) */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Generate random float in [min, max] */
  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  /** Pick with probability */
  chance(probability: number): boolean {
    return this.next() < probability;
  }

  /** Standard normal sample (Box-Muller) */
  gaussian(): number {
    const u1 = 1 - this.next(); // (0, 1]
    const u2 = this.next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  /**
   * Number of successes in `trials` Bernoulli draws.
   * Exact below 64 trials, normal approximation above.
   */
  binomial(trials: number, probability: number): number {
    if (trials <= 0 || probability <= 0) return 0;
    if (probability >= 1) return trials;

    if (trials < 64) {
      let successes = 0;
      for (let i = 0; i < trials; i++) {
        if (this.chance(probability)) successes++;
      }
      return successes;
    }

    const mean = trials * probability;
    const std = Math.sqrt(mean * (1 - probability));
    const sample = Math.round(mean + std * this.gaussian());
    return Math.min(trials, Math.max(0, sample));
  }
}
