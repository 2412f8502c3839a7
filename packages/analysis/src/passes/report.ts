import type { Env } from "../env.js";
import { typeName } from "../env.js";
import type { LoadIssue } from "../diagnostics.js";
import type { NativeParameter, SurfaceParameter } from "../lowering/function-parameters.js";
import type { Transformation } from "../lowering/transformation.js";

/** `surfaceIndex` is null, not absent, when the native parameter has no surface counterpart. */
export type TransformationReport = Omit<Transformation, "surfaceIndex"> & { readonly surfaceIndex: number | null };
import type { FunctionInfo } from "./functions.js";

export type SurfaceParameterReport = Omit<SurfaceParameter, "typ"> & { readonly type: string };
export type NativeParameterReport = Omit<NativeParameter, "typ"> & { readonly type: string };

export type FunctionReport = Omit<FunctionInfo, "parameters"> & {
  readonly surface: readonly SurfaceParameterReport[];
  readonly native: readonly NativeParameterReport[];
  readonly transformations: readonly TransformationReport[];
};

export type LibraryReport = {
  readonly namespace: string;
  readonly functions: readonly FunctionReport[];
  readonly issues: readonly LoadIssue[];
};

/** Replaces type ids with type names so the model can be printed. */
export function functionReport(env: Env, info: FunctionInfo): FunctionReport {
  const { parameters, ...rest } = info;
  return {
    ...rest,
    surface: parameters.surface.map(({ typ, ...p }) => ({ ...p, type: typeName(env, typ) })),
    native: parameters.native.map(({ typ, ...p }) => ({ ...p, type: typeName(env, typ) })),
    transformations: parameters.transformations.map((t) => ({ ...t, surfaceIndex: t.surfaceIndex ?? null })),
  };
}

export function libraryReport(
  env: Env,
  functions: readonly FunctionInfo[],
  issues: readonly LoadIssue[]
): LibraryReport {
  return {
    namespace: env.library.namespace,
    functions: functions.map((f) => functionReport(env, f)),
    issues,
  };
}
