import { checkCount } from "./options";
import type { Point } from "./types";
import type { Rng } from "../utils/prng";

/**
 * Samples `n` points uniformly from the unit square, drawing x1 then x2 for
 * each point.
 */
export function makePoints(n: number, rng: Rng = Math.random): Point[] {
  const count = checkCount(n);
  const X: Point[] = [];
  for (let i = 0; i < count; i++) {
    const x1 = rng();
    const x2 = rng();
    X.push([x1, x2]);
  }
  return X;
}
