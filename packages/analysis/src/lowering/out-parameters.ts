import type { Env } from "../env.js";
import { resolveAlias } from "../env.js";
import type { ParameterDescriptor } from "../library/types.js";
import { conversionType } from "./conversion-type.js";

function isCArrayWithDirectElements(env: Env, par: ParameterDescriptor): boolean {
  const t = resolveAlias(env, par.typ);
  return t?.kind === "c_array" && conversionType(env, t.element) === "direct";
}

/** Whether an out parameter can be returned from the binding instead of being taken as an argument. */
export function canAsReturn(env: Env, par: ParameterDescriptor): boolean {
  switch (conversionType(env, par.typ)) {
    case "direct":
    case "scalar":
      return true;
    case "pointer":
      // A plain C array can only be returned when its length is known.
      return !(isCArrayWithDirectElements(env, par) && par.arrayLength === undefined);
    case "borrow":
    case "unknown":
      return false;
  }
}
