import type { FunctionConfig } from "../config/functions.js";
import { matchedParameters } from "../config/functions.js";
import type { Env } from "../env.js";
import { isClass, isFinalType, isInterface } from "../env.js";
import type {
  ParameterDescriptor,
  ParameterDirection,
  ParameterScope,
  Transfer,
  TypeId,
} from "../library/types.js";
import { mangleKeywords } from "../naming/keywords.js";
import { collectArrayLengths, lengthStep, resolveArrayName } from "./array-length.js";
import { isAsyncDataParameter, restructureAsync } from "./async-params.js";
import { conversionType } from "./conversion-type.js";
import { canAsReturn } from "./out-parameters.js";
import { resolveOwnership } from "./ownership.js";
import type { RefMode } from "./ref-mode.js";
import { overrideStringTypeParameter } from "./string-type.js";
import type { Transformation, TransformationStep } from "./transformation.js";

/** A parameter of the generated binding's signature. */
export type SurfaceParameter = {
  readonly name: string;
  readonly typ: TypeId;
  readonly nativeIndex: number;
  readonly allowNone: boolean;
};

/** A parameter of the foreign call, with ownership and mutability resolved. */
export type NativeParameter = {
  readonly name: string;
  readonly typ: TypeId;
  readonly cType: string;
  readonly instanceParameter: boolean;
  readonly direction: ParameterDirection;
  readonly nullable: boolean;
  readonly transfer: Transfer;
  readonly callerAllocates: boolean;
  readonly isError: boolean;
  readonly scope: ParameterScope;
  readonly userDataIndex?: number;
  readonly destroyIndex?: number;
  readonly refMode: RefMode;
};

export type ParameterSet = {
  readonly surface: readonly SurfaceParameter[];
  readonly native: readonly NativeParameter[];
  readonly transformations: readonly Transformation[];
};

export type AnalyzeParametersOptions = {
  readonly disableLengthDetect: boolean;
  readonly isAsync: boolean;
  readonly inTrait: boolean;
  /** Decides whether an out parameter becomes part of the return value. */
  readonly canAsReturn?: (env: Env, par: ParameterDescriptor) => boolean;
};

function includedByDirection(
  env: Env,
  par: ParameterDescriptor,
  options: AnalyzeParametersOptions
): boolean {
  switch (par.direction) {
    case "in":
    case "inout":
      return true;
    case "return":
      return false;
    case "out":
      return !(options.canAsReturn ?? canAsReturn)(env, par) && !options.isAsync;
  }
}

// Nullable non-final objects are upcast with `.as_ref()` before the glue conversion.
function toNativeExtra(
  env: Env,
  par: ParameterDescriptor,
  nullable: boolean
): { readonly extra: string; readonly nullable: boolean } {
  if (par.instanceParameter || !nullable || (!isInterface(env, par.typ) && !isClass(env, par.typ))) {
    return { extra: "", nullable: false };
  }
  return { extra: isFinalType(env, par.typ) ? "" : ".as_ref()", nullable };
}

function primaryStep(
  env: Env,
  name: string,
  par: ParameterDescriptor,
  typ: TypeId,
  resolved: { readonly transfer: Transfer; readonly refMode: RefMode; readonly nullable: boolean },
  inTrait: boolean
): TransformationStep {
  switch (conversionType(env, typ)) {
    case "direct":
      return { kind: "direct", name };
    case "scalar":
      return { kind: "scalar", name, nullable: resolved.nullable };
    case "pointer": {
      const { extra, nullable } = toNativeExtra(env, par, resolved.nullable);
      return {
        kind: "pointer",
        name,
        instanceParameter: par.instanceParameter,
        transfer: resolved.transfer,
        refMode: resolved.refMode,
        extra,
        explicitTargetType: "",
        pointerCast: "",
        inTrait,
        nullable,
      };
    }
    case "borrow":
      return { kind: "borrow" };
    case "unknown":
      return { kind: "unknown", name };
  }
}

/**
 * Lowers a native parameter list into the binding's surface parameters, the exact native
 * parameters of the foreign call, and the per-parameter transformations between them.
 *
 * Never fails: missing length targets, unmatched configuration and unclassifiable types
 * fall back to the conservative model.
 */
export function analyzeParameters(
  env: Env,
  parameters: readonly ParameterDescriptor[],
  configuredFunctions: readonly FunctionConfig[],
  options: AnalyzeParametersOptions
): ParameterSet {
  const surface: SurfaceParameter[] = [];
  const native: NativeParameter[] = [];
  const transformations: Transformation[] = [];

  const arrayLengths = collectArrayLengths(parameters);

  parameters.forEach((par, pos) => {
    const name = par.instanceParameter ? par.name : mangleKeywords(par.name);
    const configured = matchedParameters(configuredFunctions, name);
    const typ = overrideStringTypeParameter(env, par.typ, configured);

    const nativeIndex = native.length;
    let include = includedByDirection(env, par, options);
    if (options.isAsync && isAsyncDataParameter(par.name)) {
      include = false;
    }

    const arrayName = resolveArrayName(
      env,
      pos,
      par,
      parameters,
      configured,
      arrayLengths,
      options.disableLengthDetect
    );
    if (arrayName !== undefined) {
      include = false;
      transformations.push({
        nativeIndex,
        surfaceIndex: undefined,
        step: lengthStep(env, arrayName, par.name, typ),
      });
    }

    const resolved = resolveOwnership(env, par, typ, configured, options.inTrait);

    native.push({
      name,
      typ,
      cType: par.cType,
      instanceParameter: par.instanceParameter,
      direction: par.direction,
      nullable: resolved.nullable,
      transfer: resolved.transfer,
      callerAllocates: resolved.callerAllocates,
      isError: par.isError,
      scope: par.scope,
      userDataIndex: par.closure,
      destroyIndex: par.destroy,
      refMode: resolved.refMode,
    });

    let surfaceIndex: number | undefined;
    if (include) {
      surfaceIndex = surface.length;
      surface.push({ name, typ, nativeIndex, allowNone: par.allowNone });
    }

    // A folded length parameter is fully described by its length step.
    if (arrayName !== undefined) return;

    const step = primaryStep(env, name, par, typ, resolved, options.inTrait);
    transformations.push({
      nativeIndex,
      surfaceIndex,
      step: options.isAsync ? restructureAsync(step) : step,
    });
  });

  return { surface, native, transformations };
}

/**
 * Appends the length transformation for a returned array whose length comes back through
 * one of the native parameters. Returns `params` unchanged when there is no such link or the
 * parameter already carries a length step.
 */
export function withReturnLength(
  env: Env,
  params: ParameterSet,
  returnValue: ParameterDescriptor | undefined
): ParameterSet {
  const nativeIndex = returnValue?.arrayLength;
  if (nativeIndex === undefined) return params;
  const par = params.native[nativeIndex];
  if (!par) return params;
  if (params.transformations.some((t) => t.nativeIndex === nativeIndex && t.step.kind === "length")) {
    return params;
  }
  return {
    ...params,
    transformations: [
      ...params.transformations,
      { nativeIndex, surfaceIndex: undefined, step: lengthStep(env, "", par.name, par.typ) },
    ],
  };
}

export function transformationsAt(params: ParameterSet, nativeIndex: number): readonly Transformation[] {
  return params.transformations.filter((t) => t.nativeIndex === nativeIndex);
}
