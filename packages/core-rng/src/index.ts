import { randomInt } from "crypto";

/**
 * Supplies independent uniform draws. Resolvers take one of these instead of
 * calling Math.random so that a fixed sequence replays a round exactly.
 */
export interface IRandomSource {
  /** Uniform in [0, 1). */
  nextFloat(): number;
  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

export const RANDOM_SOURCE = Symbol("RANDOM_SOURCE");

const FLOAT_RESOLUTION = 2 ** 47;

function assertRange(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
    throw new Error(`RNG: invalid integer range [${min}, ${max}]`);
  }
}

abstract class FloatRandomSource implements IRandomSource {
  abstract nextFloat(): number;

  nextInt(min: number, max: number): number {
    assertRange(min, max);
    const span = max - min + 1;
    return min + Math.min(span - 1, Math.floor(this.nextFloat() * span));
  }
}

export class CryptoRandomSource implements IRandomSource {
  nextFloat(): number {
    return randomInt(0, FLOAT_RESOLUTION) / FLOAT_RESOLUTION;
  }

  nextInt(min: number, max: number): number {
    assertRange(min, max);
    return randomInt(min, max + 1);
  }
}

const LCG_MODULUS = 2147483647;
const LCG_MULTIPLIER = 48271;

/** Park-Miller minimal standard generator; reproducible, not for production draws. */
export class SeededRandomSource extends FloatRandomSource {
  private state: number;

  constructor(seed: number) {
    super();
    const normalized = Math.abs(Math.trunc(seed)) % LCG_MODULUS;
    this.state = normalized === 0 ? 1 : normalized;
  }

  nextFloat(): number {
    this.state = (this.state * LCG_MULTIPLIER) % LCG_MODULUS;
    return (this.state - 1) / (LCG_MODULUS - 1);
  }
}

/** Replays a fixed list of draws, cycling when exhausted. */
export class FixedRandomSource extends FloatRandomSource {
  private cursor = 0;

  constructor(private readonly values: readonly number[]) {
    super();
    if (values.length === 0) {
      throw new Error("RNG: fixed source needs at least one value");
    }
    values.forEach((value, idx) => {
      if (!Number.isFinite(value) || value < 0 || value >= 1) {
        throw new Error(`RNG: fixed value at index ${idx} must be in [0, 1)`);
      }
    });
  }

  nextFloat(): number {
    const value = this.values[this.cursor % this.values.length];
    this.cursor += 1;
    return value;
  }

  get consumed(): number {
    return this.cursor;
  }
}

/** Lazily yields draws from a source; never ends. */
export function* draws(source: IRandomSource): Generator<number, never, undefined> {
  for (;;) {
    yield source.nextFloat();
  }
}

/**
 * Partial Fisher-Yates: the first `count` slots of the returned copy are a
 * uniform sample without replacement, in draw order.
 */
export function shuffle<T>(items: readonly T[], source: IRandomSource, count = items.length): T[] {
  const copy = [...items];
  const limit = Math.min(count, copy.length);
  for (let i = 0; i < limit; i++) {
    const j = source.nextInt(i, copy.length - 1);
    const tmp = copy[i];
    copy[i] = copy[j];
    copy[j] = tmp;
  }
  return copy;
}
