import { Inject, Injectable } from '@nestjs/common';

/** Source of uniformly distributed numbers in [0, 1). */
export interface RandomSource {
  next(): number;
}

/** Injection token for the RandomSource backing every draw. */
export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/** Inclusive integer range. */
export interface IntRange {
  min: number;
  max: number;
}

/** Half-open float range [min, max). */
export interface FloatRange {
  min: number;
  max: number;
}

/**
 * Uniform random draws for simulated activity.
 * Every helper reads one value from the injected RandomSource, so tests can
 * substitute a seeded sequence.
 */
@Injectable()
export class RandomService {
  constructor(@Inject(RANDOM_SOURCE) private readonly source: RandomSource) {}

  /** Integer in [range.min, range.max] inclusive */
  int(range: IntRange): number {
    const span = range.max - range.min + 1;
    return range.min + Math.floor(this.source.next() * span);
  }

  /** Float in [range.min, range.max) */
  float(range: FloatRange): number {
    return range.min + this.source.next() * (range.max - range.min);
  }

  /** Monetary amount in [range.min, range.max), rounded down to cents */
  amount(range: FloatRange): number {
    return Math.floor(this.float(range) * 100) / 100;
  }

  /**
   * Picks one element uniformly
   * @throws Error when values is empty
   */
  pick<T>(values: readonly T[]): T {
    if (values.length === 0) {
      throw new Error('Cannot pick from an empty set of values');
    }
    const index = Math.min(values.length - 1, Math.floor(this.source.next() * values.length));
    return values[index];
  }

  /** Builds a list whose length is drawn from count */
  repeat<T>(count: IntRange, build: () => T): T[] {
    return Array.from({ length: this.int(count) }, () => build());
  }

  /** True with the given probability */
  chance(probability: number): boolean {
    return this.source.next() < probability;
  }
}
