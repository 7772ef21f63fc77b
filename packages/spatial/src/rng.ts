/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Seeded PRNG (xmur3 seed hash + mulberry32) for reproducible candidate sampling
 */

export interface RNG {
  /** [0, 1) */
  next(): number;
  int(minInclusive: number, maxInclusive: number): number;
  /** Up to `count` distinct items, kept in their original order */
  sample<T>(items: readonly T[], count: number): T[];
}

function xmur3(str: string): () => number {
  let h = 1779033703 ^ str.length;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return function () {
    h = Math.imul(h ^ (h >>> 16), 2246822507);
    h = Math.imul(h ^ (h >>> 13), 3266489909);
    h ^= h >>> 16;
    return h >>> 0;
  };
}

function mulberry32(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeRng(seedString: string): RNG {
  const seedGen = xmur3(seedString);
  const rand = mulberry32(seedGen());

  const int = (minInclusive: number, maxInclusive: number): number => {
    const span = maxInclusive - minInclusive + 1;
    return minInclusive + Math.floor(rand() * span);
  };

  return {
    next: () => rand(),
    int,
    sample: <T>(items: readonly T[], count: number): T[] => {
      if (count >= items.length) return items.slice();
      // Partial Fisher-Yates over positions
      const positions = items.map((_, i) => i);
      for (let i = 0; i < count; i++) {
        const j = int(i, positions.length - 1);
        [positions[i], positions[j]] = [positions[j], positions[i]];
      }
      return positions
        .slice(0, count)
        .sort((a, b) => a - b)
        .map((i) => items[i]);
    },
  };
}
