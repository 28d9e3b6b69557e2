import { DatasetLookupError } from "./errors";
import { checkCount, resolveRng } from "./options";
import { makePoints } from "./points";
import { labelPoints, rules, type Rule } from "./rules";
import {
  toDataset,
  type Dataset,
  type Generator,
  type GeneratorOptions,
  type Label,
  type Point,
} from "./types";
import { mulberry32 } from "../utils/prng";

function sampled(rule: Rule): Generator {
  return (n, options) => labelPoints(makePoints(n, resolveRng(options)), rule);
}

export const simple = sampled(rules.Simple);
export const diag = sampled(rules.Diag);
export const split = sampled(rules.Split);
export const xor = sampled(rules.Xor);
export const circle = sampled(rules.Circle);

/**
 * Two interleaved spiral arms, `floor(n / 2)` points each. Arm A (label 0)
 * comes first; arm B (label 1) is the same curve with the parameter negated
 * and the axes swapped. Indices start at 5 so neither arm begins on the
 * shared origin. An odd `n` still reports `count` as `n`, one more than the
 * points emitted. Draws no randomness, so `options` is only validated.
 */
export function spiral(n: number, options?: GeneratorOptions): Dataset {
  const count = checkCount(n);
  const half = Math.floor(count / 2);
  resolveRng(options);
  const x = (t: number) => (t * Math.cos(t)) / 20;
  const y = (t: number) => (t * Math.sin(t)) / 20;
  const X: Point[] = [];
  const labels: Label[] = [];
  for (let i = 5; i < 5 + half; i++) {
    const t = 10 * (i / half);
    X.push([x(t) + 0.5, y(t) + 0.5]);
    labels.push(0);
  }
  for (let i = 5; i < 5 + half; i++) {
    const t = -10 * (i / half);
    X.push([y(t) + 0.5, x(t) + 0.5]);
    labels.push(1);
  }
  return toDataset(X, labels, count);
}

const table = {
  Simple: simple,
  Diag: diag,
  Split: split,
  Xor: xor,
  Circle: circle,
  Spiral: spiral,
} as const;

export type DatasetName = keyof typeof table;

export const datasets: Readonly<Record<DatasetName, Generator>> = Object.freeze(table);

const names = Object.freeze(Object.keys(table).filter(isDatasetName));

export function isDatasetName(value: unknown): value is DatasetName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(table, value);
}

export function listNames(): readonly DatasetName[] {
  return names;
}

export function getDataset(name: string): Generator {
  if (!isDatasetName(name)) throw new DatasetLookupError(name, names);
  return datasets[name];
}

export const registry = Object.freeze({ listNames, get: getDataset });

/** Runs the named generator on a mulberry32 source seeded with `seed`. */
export function makeDataset(name: string, seed: number, n = 200): Dataset {
  return getDataset(name)(n, { rng: mulberry32(seed) });
}
