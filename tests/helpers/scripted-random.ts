import type { RandomSource } from '../../src/server/services/prng.service';

/**
 * Deterministic RandomSource for tests: choice() takes the index the picker
 * names (the first item by default) and shuffle() keeps the order.
 */
export class ScriptedRandom implements RandomSource {
  readonly choices: unknown[][] = [];

  constructor(
    private readonly pick: (length: number) => number = () => 0
  ) {}

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    this.choices.push([...items]);
    return items[this.pick(items.length)];
  }

  shuffle<T>(items: readonly T[]): T[] {
    return [...items];
  }
}
