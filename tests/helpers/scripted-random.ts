import type { RandomSource } from '../../src/generator/random-source';

export interface ScriptedRandomSource extends RandomSource {
  /** Every [min, max] passed to int(), in call order. */
  readonly calls: Array<[number, number]>;
  readonly remaining: number;
}

/**
 * Random source that replays a fixed list of integers. pick() consumes one
 * value as an index; shuffle() keeps the input order.
 */
export function createScriptedRandom(values: number[]): ScriptedRandomSource {
  const queue = [...values];
  const calls: Array<[number, number]> = [];

  const int = (min: number, max: number): number => {
    calls.push([min, max]);
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`Random script exhausted at int(${min}, ${max})`);
    }
    if (next < min || next > max) {
      throw new RangeError(`Scripted value ${next} outside [${min}, ${max}]`);
    }
    return next;
  };

  return {
    calls,
    get remaining() {
      return queue.length;
    },
    int,
    pick<T>(items: readonly T[]): T {
      return items[int(0, items.length - 1)];
    },
    shuffle<T>(items: readonly T[]): T[] {
      return [...items];
    },
  };
}
