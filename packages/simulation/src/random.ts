/**
 * Source of randomness threaded through every stochastic step.
 * Implementations must be deterministic for a given seed.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  uniform(min: number, max: number): number;
  gaussian(mean: number, stdDev: number): number;
  chance(probability: number): boolean;
  choice<T>(items: readonly T[]): T;
  sample<T>(items: readonly T[], count: number): T[];
  fork(tag: number | string): RandomSource;
}

/** Mulberry32 PRNG. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.seedToUint32(seed);
  }

  static seedToUint32(seed: number | string): number {
    if (typeof seed === "number") {
      return seed >>> 0;
    }

    // FNV-1a
    let h = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      h ^= seed.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    return h >>> 0;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Box-Muller. */
  gaussian(mean: number, stdDev: number): number {
    const u1 = Math.max(1e-12, this.next());
    const u2 = this.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * stdDev;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("Cannot choose from an empty list");
    return items[Math.floor(this.next() * items.length)];
  }

  /** Partial Fisher-Yates; result order is the draw order. */
  sample<T>(items: readonly T[], count: number): T[] {
    if (count > items.length) {
      throw new Error(`Cannot sample ${count} items from a list of ${items.length}`);
    }
    const pool = [...items];
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.next() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }

  /** Deterministic sub-stream; does not advance this generator. */
  fork(tag: number | string): SeededRandom {
    const mixed = (this.state ^ SeededRandom.seedToUint32(`fork:${tag}`) ^ 0x9e3779b9) >>> 0;
    return new SeededRandom(mixed);
  }
}
