import { toDataset, type Dataset, type Label, type Point } from "./types";

export type Rule = (x1: number, x2: number) => Label;

export type RuleName = "Simple" | "Diag" | "Split" | "Xor" | "Circle";

// Comparisons are strict: a point on a boundary is always labeled 0.
const table: Record<RuleName, Rule> = {
  Simple: (x1: number) => (x1 < 0.5 ? 1 : 0),
  Diag: (x1: number, x2: number) => (x1 + x2 < 0.5 ? 1 : 0),
  Split: (x1: number) => (x1 < 0.2 || x1 > 0.8 ? 1 : 0),
  Xor: (x1: number, x2: number) => ((x1 < 0.5 && x2 > 0.5) || (x1 > 0.5 && x2 < 0.5) ? 1 : 0),
  Circle: (x1: number, x2: number) => {
    const d1 = x1 - 0.5,
      d2 = x2 - 0.5;
    return d1 * d1 + d2 * d2 > 0.1 ? 1 : 0;
  },
};

export const rules: Readonly<Record<RuleName, Rule>> = Object.freeze(table);

export function labelPoints(points: readonly Point[], rule: Rule): Dataset {
  return toDataset(
    points,
    points.map(([x1, x2]) => rule(x1, x2)),
  );
}
