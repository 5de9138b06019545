import type { RandomSource } from "./types";
import { InvalidArgumentError } from "./errors";

export const defaultRandom: RandomSource = () => Math.random();

export function fnv1a32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function mulberry32(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    let t = (s = (s + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Deterministic source; string seeds are hashed first. */
export function seededRandom(seed: number | string): RandomSource {
  if (typeof seed === "number" && !(Number.isInteger(seed) && seed >= 0 && seed <= 0xffffffff)) {
    throw new InvalidArgumentError("seed", seed, "must be an integer in [0, 2^32)");
  }
  return mulberry32(typeof seed === "string" ? fnv1a32(seed) : seed);
}

/**
 * Replays `values` in order and throws once they run out.
 */
export function fixedRandom(values: readonly number[]): RandomSource {
  for (const v of values) {
    if (!(v >= 0 && v < 1)) {
      throw new InvalidArgumentError("draw", v, "must be in [0, 1)");
    }
  }
  let next = 0;
  return () => {
    if (next >= values.length) {
      throw new InvalidArgumentError("draw", next, `only ${values.length} draws were supplied`);
    }
    return values[next++];
  };
}
