import { checkRatio } from "./options";
import { toDataset, type Dataset } from "./types";
import { shuffled, type Rng } from "../utils/prng";

export function trainValSplit(
  data: Dataset,
  valRatio = 0.2,
  rng: Rng = Math.random,
): { train: Dataset; val: Dataset } {
  const ratio = checkRatio(valRatio);
  const total = data.points.length;
  const idx = shuffled(total, rng);
  const cut = Math.floor(total * (1 - ratio));
  const pick = (ids: number[]) =>
    toDataset(
      ids.map((i) => data.points[i]),
      ids.map((i) => data.labels[i]),
    );
  return { train: pick(idx.slice(0, cut)), val: pick(idx.slice(cut)) };
}
