import { randomInt as cryptoRandomInt } from 'node:crypto';

/** Returns an integer in `[0, maxExclusive)`. */
export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new RangeError('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

// Deterministic PRNG for seeded sessions and tests
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    const unit = ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 0..1
    return Math.floor(unit * maxExclusive);
  };
}

export function seededRNG(seed: number): RNG {
  return mulberry32(seed);
}

export function rngFor(seed: number | undefined): RNG {
  return seed === undefined ? cryptoRNG : seededRNG(seed);
}
