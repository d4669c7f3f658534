export interface RandomSource {
  /** Uniform integer in `[min, max]`, both inclusive. */
  nextInt(min: number, max: number): number;
}

const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

const u64 = (value: bigint) => BigInt.asUintN(64, value);

// SplitMix64 stream; a zero seed is replaced so the sequence never starts flat.
export class PRNG implements RandomSource {
  private state: bigint;

  constructor(seed: number | bigint) {
    this.state = u64(BigInt(seed)) || GOLDEN_GAMMA;
  }

  private mix(): bigint {
    this.state = u64(this.state + GOLDEN_GAMMA);
    const a = u64((this.state ^ (this.state >> 30n)) * 0xbf58476d1ce4e5b9n);
    const b = u64((a ^ (a >> 27n)) * 0x94d049bb133111ebn);
    return b ^ (b >> 31n);
  }

  /** 53 random bits scaled into `[0, 1)`. */
  nextFloat01(): number {
    return Number(this.mix() >> 11n) / 2 ** 53;
  }

  nextInt(min: number, max: number): number {
    if (max <= min) {
      return min;
    }
    return min + Math.floor(this.nextFloat01() * (max - min + 1));
  }
}

export function rollPercent(rng: RandomSource, percent: number): boolean {
  return rng.nextInt(0, 99) < percent;
}

export function coinFlip(rng: RandomSource): boolean {
  return rng.nextInt(0, 1) === 0;
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('cannot pick from an empty list');
  }
  return items[rng.nextInt(0, items.length - 1)];
}
