export {
  simple,
  diag,
  split,
  xor,
  circle,
  spiral,
  datasets,
  registry,
  listNames,
  getDataset,
  isDatasetName,
  makeDataset,
} from "./data/datasets";
export type { DatasetName } from "./data/datasets";
export { DatasetError, InvalidArgumentError, DatasetLookupError } from "./data/errors";
export { makePoints } from "./data/points";
export { rules, labelPoints } from "./data/rules";
export type { Rule, RuleName } from "./data/rules";
export { trainValSplit } from "./data/split";
export { toDataset } from "./data/types";
export type { Dataset, Point, Label, Generator, GeneratorOptions } from "./data/types";
export { mulberry32, shuffled } from "./utils/prng";
export type { Rng } from "./utils/prng";
