/**
 * Seeded random stream for mission generation.
 *
 * Every draw made while building a mission goes through one MissionRandom,
 * so a seed reproduces the same mission. Each instance owns a private clone
 * of the ROT.js generator; the global ROT.RNG is never reseeded.
 */
import * as ROT from "rot-js";
import type { Color, ItemKind } from "../shared/types.js";
import { COLOR_NAMES, ITEM_KINDS } from "../shared/constants.js";

/**
 * Seeds that give distinct streams. ROT folds seeds below 1 through 1/seed
 * and keeps only the low 32 bits of larger ones.
 */
export const MIN_SEED = 1;
export const MAX_SEED = 2 ** 32 - 1;

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= MIN_SEED && seed <= MAX_SEED;
}

export class MissionRandom {
  private readonly rng: typeof ROT.RNG;

  constructor(seed: number) {
    this.rng = ROT.RNG.clone();
    this.rng.setSeed(seed);
  }

  /** Integer in [lo, hi). */
  int(lo: number, hi: number): number {
    if (hi <= lo) {
      throw new RangeError(`empty integer range [${lo}, ${hi})`);
    }
    return this.rng.getUniformInt(lo, hi - 1);
  }

  bool(): boolean {
    return this.rng.getUniform() < 0.5;
  }

  elem<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("cannot draw from an empty list");
    }
    return items[this.int(0, items.length)];
  }

  /**
   * Draw `count` distinct elements without replacement, in draw order.
   */
  subset<T>(items: readonly T[], count: number): T[] {
    if (count > items.length) {
      throw new RangeError(`cannot draw ${count} of ${items.length} elements`);
    }
    const pool = [...items];
    const picked: T[] = [];
    while (picked.length < count) {
      const idx = this.int(0, pool.length);
      picked.push(pool[idx]);
      pool.splice(idx, 1);
    }
    return picked;
  }

  color(): Color {
    return this.elem(COLOR_NAMES);
  }

  itemKind(): ItemKind {
    return this.elem(ITEM_KINDS);
  }
}
