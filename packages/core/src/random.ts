// Seeded RNG: xmur3 string hash feeding mulberry32.
const xmur3 = (input: string): (() => number) => {
  let h = 1779033703 ^ input.length;
  for (let i = 0; i < input.length; i++) {
    h = Math.imul(h ^ input.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return () => {
    h = Math.imul(h ^ (h >>> 16), 2246822507);
    h = Math.imul(h ^ (h >>> 13), 3266489909);
    h ^= h >>> 16;
    return h >>> 0;
  };
};

const mulberry32 = (seed: number): (() => number) => {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export class SeededRandom {
  private readonly next: () => number;
  private spare: number | null = null;

  constructor(seed: number | string) {
    const seedGen = xmur3(typeof seed === "number" ? String(seed) : seed);
    this.next = mulberry32(seedGen());
  }

  /** Uniform in [0, 1). */
  random(): number {
    return this.next();
  }

  /** Standard normal via Box-Muller; the second variate is kept for the next call. */
  standardNormal(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }
    let u = 0;
    let v = 0;
    while (u === 0) u = this.random();
    while (v === 0) v = this.random();
    const r = Math.sqrt(-2 * Math.log(u));
    const theta = 2 * Math.PI * v;
    this.spare = r * Math.sin(theta);
    return r * Math.cos(theta);
  }

  normal(mean: number, std: number): number {
    return std === 0 ? mean : mean + std * this.standardNormal();
  }
}

/**
 * Each trial draws from its own stream keyed by (seed, trial index), so a
 * trial's samples do not depend on how many trials ran before it.
 */
export const createTrialRandom = (seed: number, trialIndex: number): SeededRandom =>
  new SeededRandom(`${seed}:${trialIndex}`);
