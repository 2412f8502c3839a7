import type { ParameterConfig } from "../config/functions.js";
import type { Env } from "../env.js";
import { typeOf } from "../env.js";
import type { ParameterDescriptor, TypeId } from "../library/types.js";
import { mangleKeywords } from "../naming/keywords.js";
import { rustType } from "./rust-type.js";
import type { TransformationStep } from "./transformation.js";

export type ArrayLengths = ReadonlyMap<number, string>;

/** Maps each length parameter position to the name of the array declaring it. */
export function collectArrayLengths(parameters: readonly ParameterDescriptor[]): ArrayLengths {
  const out = new Map<number, string>();
  for (const p of parameters) {
    if (p.arrayLength !== undefined) out.set(p.arrayLength, p.name);
  }
  return out;
}

// Heuristic and known to misfire; an explicit `lengthOf` in the configuration takes precedence.
export function isLengthCandidate(par: ParameterDescriptor): boolean {
  if (par.direction !== "in") return false;
  return par.name.endsWith("len") || par.name.includes("length");
}

export function hasLength(env: Env, typ: TypeId): boolean {
  const seen = new Set<TypeId>();
  let cur = typ;
  while (true) {
    const t = typeOf(env, cur);
    if (!t) return false;
    switch (t.kind) {
      case "fundamental":
        return t.fundamental === "utf8" || t.fundamental === "filename" || t.fundamental === "os_string";
      case "c_array":
      case "fixed_array":
      case "array":
      case "ptr_array":
      case "list":
      case "slist":
      case "hash_table":
        return true;
      case "alias":
        if (seen.has(cur)) return false;
        seen.add(cur);
        cur = t.target;
        continue;
      default:
        return false;
    }
  }
}

/** Name of the parameter right before `pos` when `par` looks like its length. */
export function detectLength(
  env: Env,
  pos: number,
  par: ParameterDescriptor,
  parameters: readonly ParameterDescriptor[]
): string | undefined {
  if (!isLengthCandidate(par)) return undefined;
  const prev = pos > 0 ? parameters[pos - 1] : undefined;
  if (!prev || !hasLength(env, prev.typ)) return undefined;
  return prev.name;
}

/**
 * Resolves the array whose length `par` holds: configured `lengthOf` first, then an array's
 * `arrayLength` link to this position, then (unless disabled) the naming heuristic.
 * The returned name is keyword-mangled.
 */
export function resolveArrayName(
  env: Env,
  pos: number,
  par: ParameterDescriptor,
  parameters: readonly ParameterDescriptor[],
  configured: readonly ParameterConfig[],
  arrayLengths: ArrayLengths,
  disableLengthDetect: boolean
): string | undefined {
  const arrayName =
    configured.find((p) => p.lengthOf !== undefined)?.lengthOf ??
    arrayLengths.get(pos) ??
    (disableLengthDetect ? undefined : detectLength(env, pos, par, parameters));
  return arrayName === undefined ? undefined : mangleKeywords(arrayName);
}

export function lengthStep(env: Env, arrayName: string, lengthName: string, lengthTyp: TypeId): TransformationStep {
  return {
    kind: "length",
    arrayName,
    lengthName,
    lengthType: rustType(env, lengthTyp),
  };
}
