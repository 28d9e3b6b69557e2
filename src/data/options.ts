import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import type { GeneratorOptions } from "./types";
import { mulberry32, type Rng } from "../utils/prng";

const countSchema = z.number().int().nonnegative();
const ratioSchema = z.number().min(0).max(1);

const optionsSchema = z
  .object({
    rng: z.custom<Rng>((v) => typeof v === "function", "rng must be a function").optional(),
    seed: z.number().int().optional(),
  })
  .strict();

function reject(field: string, value: unknown, error: z.ZodError): never {
  const reason = error.issues.map((i) => i.message).join("; ");
  throw new InvalidArgumentError(`Invalid ${field}: ${reason}`, { field, value });
}

export function checkCount(n: unknown, field = "n"): number {
  const r = countSchema.safeParse(n);
  if (!r.success) reject(field, n, r.error);
  return r.data;
}

export function checkRatio(ratio: unknown, field = "valRatio"): number {
  const r = ratioSchema.safeParse(ratio);
  if (!r.success) reject(field, ratio, r.error);
  return r.data;
}

export function resolveRng(options: GeneratorOptions = {}): Rng {
  const r = optionsSchema.safeParse(options);
  if (!r.success) reject("options", options, r.error);
  const { rng, seed } = r.data;
  if (rng) return rng;
  if (seed !== undefined) return mulberry32(seed);
  return Math.random;
}
