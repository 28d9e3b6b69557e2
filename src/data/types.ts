import type { Rng } from "../utils/prng";

export type Point = readonly [number, number];
export type Label = 0 | 1;

/**
 * A labeled point set. `labels[i]` is the class of `points[i]`, and both
 * arrays are `count` long, except for spiral with an odd `count`, which holds
 * `2 * floor(count / 2)` points. Instances are deeply frozen, point tuples
 * included.
 */
export type Dataset = {
  readonly count: number;
  readonly points: readonly Point[];
  readonly labels: readonly Label[];
};

export type GeneratorOptions = {
  /** Uniform source on [0, 1). Takes precedence over `seed`. */
  rng?: Rng;
  /** Seeds a mulberry32 source when no `rng` is given. */
  seed?: number;
};

export type Generator = (n: number, options?: GeneratorOptions) => Dataset;

function freezePoint([x1, x2]: Point): Point {
  const p: Point = [x1, x2];
  return Object.freeze(p);
}

export function toDataset(
  points: readonly Point[],
  labels: readonly Label[],
  count = points.length,
): Dataset {
  return Object.freeze({
    count,
    points: Object.freeze(points.map(freezePoint)),
    labels: Object.freeze(labels.slice()),
  });
}
