export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
}

export type StreamKind = 'clock' | 'decision';

/**
 * Mixes a base seed with string/number salts (FNV-1a over the salts, then a
 * murmur-style finalizer) so that every agent gets its own uncorrelated stream.
 */
export function deriveSeed(baseSeed: number, ...salts: readonly (string | number)[]): number {
  let hash = 0x811c9dc5 ^ (baseSeed >>> 0);
  const update = (value: number) => {
    hash ^= value & 0xff;
    hash = Math.imul(hash, 0x01000193);
  };
  for (const salt of salts) {
    const text = typeof salt === 'number' ? `#${salt}` : salt;
    for (const char of text) {
      update(char.charCodeAt(0));
    }
    update(0x2f);
  }
  hash ^= hash >>> 16;
  hash = Math.imul(hash, 0x85ebca6b);
  hash ^= hash >>> 13;
  hash = Math.imul(hash, 0xc2b2ae35);
  hash ^= hash >>> 16;
  return hash >>> 0;
}

export class DeterministicRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isFinite(seed)) {
      throw new Error('Seed must be a finite number');
    }
    this.state = seed >>> 0;
  }

  static forAgent(baseSeed: number, agentId: number, kind: StreamKind): DeterministicRandom {
    return new DeterministicRandom(deriveSeed(baseSeed, kind, agentId));
  }

  public next(): number {
    // mulberry32
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Exponential variate with the given rate; always finite and non-negative. */
  public exponential(rate: number): number {
    if (!(rate > 0) || !Number.isFinite(rate)) {
      throw new Error(`Exponential rate must be a positive finite number (received ${rate})`);
    }
    // 1 - next() lies in (0, 1], so the logarithm never diverges
    return -Math.log(1 - this.next()) / rate;
  }
}
