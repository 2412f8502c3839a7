import type { Env } from "../env.js";
import { resolveAlias, typeOf } from "../env.js";
import type { FunctionDescriptor } from "../library/types.js";

export type SpecialFunctionType =
  | "compare"
  | "copy"
  | "equal"
  | "free"
  | "ref"
  | "unref"
  | "hash"
  | "display"
  | "static_stringify";

const byName = new Map<string, SpecialFunctionType>([
  ["compare", "compare"],
  ["copy", "copy"],
  ["equal", "equal"],
  ["free", "free"],
  ["destroy", "free"],
  ["ref", "ref"],
  ["unref", "unref"],
  ["hash", "hash"],
]);

function returnsStaticString(env: Env, fn: FunctionDescriptor): boolean {
  const ret = fn.returnValue;
  if (!ret) return false;
  const t = resolveAlias(env, ret.typ);
  return t?.kind === "fundamental" && t.fundamental === "utf8" && ret.transfer === "none";
}

function returnsString(env: Env, fn: FunctionDescriptor): boolean {
  const ret = fn.returnValue;
  if (!ret) return false;
  const t = resolveAlias(env, ret.typ);
  return t?.kind === "fundamental" && t.fundamental === "utf8";
}

/**
 * Methods that map onto Rust traits or inherent helpers instead of ordinary wrappers.
 * `to_string` on an enumeration or bitfield returning a borrowed string becomes a
 * static stringifier; elsewhere it backs `Display`.
 */
export function specialFunctionType(env: Env, fn: FunctionDescriptor): SpecialFunctionType | undefined {
  if (fn.owner === undefined) return undefined;
  const ownerId = env.library.find(fn.owner);
  if (ownerId === undefined) return undefined;

  if (fn.name === "to_string") {
    const owner = typeOf(env, ownerId);
    const isEnumLike = owner?.kind === "enumeration" || owner?.kind === "bitfield";
    const inputs = fn.parameters.filter((p) => p.direction === "in");
    if (isEnumLike && inputs.length === 1 && inputs[0]?.typ === ownerId && returnsStaticString(env, fn)) {
      return "static_stringify";
    }
    return returnsString(env, fn) ? "display" : undefined;
  }
  return byName.get(fn.name);
}
