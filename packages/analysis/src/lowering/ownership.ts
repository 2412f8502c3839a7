import type { ParameterConfig } from "../config/functions.js";
import type { Env } from "../env.js";
import type { ParameterDescriptor, Transfer, TypeId } from "../library/types.js";
import { conversionType, isValueConversion } from "./conversion-type.js";
import type { RefMode } from "./ref-mode.js";
import { refModeWithoutUnneededMut } from "./ref-mode.js";

export type Ownership = {
  readonly transfer: Transfer;
  readonly callerAllocates: boolean;
  readonly nullable: boolean;
  readonly refMode: RefMode;
};

export function resolveOwnership(
  env: Env,
  par: ParameterDescriptor,
  typ: TypeId,
  configured: readonly ParameterConfig[],
  inTrait: boolean
): Ownership {
  // Value types carry no ownership across the boundary.
  const valueType = isValueConversion(conversionType(env, typ));
  const immutable = configured.some((p) => p.constant);
  const nullableOverride = configured.find((p) => p.nullable !== undefined)?.nullable;

  return {
    transfer: valueType ? "none" : par.transfer,
    callerAllocates: valueType ? false : par.callerAllocates,
    nullable: nullableOverride ?? par.nullable,
    refMode: refModeWithoutUnneededMut(env, par, immutable, inTrait && par.instanceParameter),
  };
}
