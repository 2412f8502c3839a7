import { configuredFunctions } from "../config/functions.js";
import type { Env } from "../env.js";
import { typeOf } from "../env.js";
import type { FunctionDescriptor, ParameterDescriptor } from "../library/types.js";
import type { ParameterSet } from "../lowering/function-parameters.js";
import { analyzeParameters, withReturnLength } from "../lowering/function-parameters.js";
import type { SpecialFunctionType } from "../lowering/special-functions.js";
import { specialFunctionType } from "../lowering/special-functions.js";

export const ASYNC_READY_CALLBACK = "AsyncReadyCallback";

export type FunctionInfo = {
  readonly name: string;
  readonly cIdentifier: string;
  readonly owner?: string;
  readonly isAsync: boolean;
  readonly inTrait: boolean;
  readonly finishFunction?: string;
  readonly special?: SpecialFunctionType;
  readonly parameters: ParameterSet;
};

export function finishFunctionName(name: string): string {
  const base = name.endsWith("_async") ? name.slice(0, -"_async".length) : name;
  return `${base}_finish`;
}

function isAsyncReadyCallback(env: Env, par: ParameterDescriptor): boolean {
  let cur = typeOf(env, par.typ);
  for (let depth = 0; cur && depth < 32; depth++) {
    if (cur.kind === "callback") return cur.name === ASYNC_READY_CALLBACK;
    if (cur.kind !== "alias") return false;
    if (cur.name === ASYNC_READY_CALLBACK) return true;
    cur = typeOf(env, cur.target);
  }
  return false;
}

/** The `_finish` sibling of an async function, when the library declares one. */
export function findFinishFunction(env: Env, fn: FunctionDescriptor): FunctionDescriptor | undefined {
  if (!fn.parameters.some((p) => isAsyncReadyCallback(env, p))) return undefined;
  const finishName = finishFunctionName(fn.name);
  return env.library.functions.find((f) => f.name === finishName && f.owner === fn.owner);
}

/** Methods of interfaces and non-final classes are generated inside an extension trait. */
export function isInTraitContext(env: Env, fn: FunctionDescriptor): boolean {
  if (fn.owner === undefined) return false;
  const ownerId = env.library.find(fn.owner);
  if (ownerId === undefined) return false;
  const owner = typeOf(env, ownerId);
  if (owner?.kind === "interface") return true;
  return owner?.kind === "class" && !owner.final;
}

/** Analyzes one function; undefined when the configuration ignores it. */
export function analyzeFunction(env: Env, fn: FunctionDescriptor): FunctionInfo | undefined {
  const configured = configuredFunctions(env.config, fn.name);
  if (configured.some((f) => f.ignore)) return undefined;

  const finish = findFinishFunction(env, fn);
  const isAsync = finish !== undefined;
  const inTrait = isInTraitContext(env, fn);
  const parameters = withReturnLength(
    env,
    analyzeParameters(env, fn.parameters, configured, {
      disableLengthDetect: configured.some((f) => f.disableLengthDetect),
      isAsync,
      inTrait,
    }),
    fn.returnValue
  );

  return {
    name: fn.name,
    cIdentifier: fn.cIdentifier,
    owner: fn.owner,
    isAsync,
    inTrait,
    finishFunction: finish?.name,
    special: specialFunctionType(env, fn),
    parameters,
  };
}

export function analyzeFunctions(env: Env): readonly FunctionInfo[] {
  const out: FunctionInfo[] = [];
  for (const fn of env.library.functions) {
    const info = analyzeFunction(env, fn);
    if (info) out.push(info);
  }
  return out;
}
