import type { ParameterConfig } from "../config/functions.js";
import type { Env } from "../env.js";
import { typeOf } from "../env.js";
import type { TypeId } from "../library/types.js";

function isStringFundamental(env: Env, typ: TypeId): boolean {
  const t = typeOf(env, typ);
  return (
    t?.kind === "fundamental" &&
    (t.fundamental === "utf8" || t.fundamental === "filename" || t.fundamental === "os_string")
  );
}

/**
 * Applies a configured `stringType` to a string parameter, or to the elements of a C array
 * of strings. Any other type is returned unchanged.
 */
export function overrideStringTypeParameter(
  env: Env,
  typ: TypeId,
  configured: readonly ParameterConfig[]
): TypeId {
  const stringType = configured.find((p) => p.stringType !== undefined)?.stringType;
  if (stringType === undefined) return typ;
  const replacement = env.library.fundamental(stringType);
  if (isStringFundamental(env, typ)) return replacement;
  const t = typeOf(env, typ);
  if (t?.kind === "c_array" && isStringFundamental(env, t.element)) {
    return env.library.lookup({ kind: "c_array", element: replacement }) ?? typ;
  }
  return typ;
}
