import type { Env } from "../env.js";
import { typeOf } from "../env.js";
import type { ParameterDescriptor, ParameterDirection, TypeId } from "../library/types.js";

export type RefMode =
  | "none"
  | "by_ref"
  | "by_ref_mut"
  // `&mut` on the native side but only `&` exposed: the parameter is configured as immutable.
  | "by_ref_immut"
  // Receiver of a trait method taking a const pointer.
  | "by_ref_const"
  | "by_ref_fake";

export function isRef(mode: RefMode): boolean {
  return mode !== "none";
}

export function isMutPtr(cType: string): boolean {
  const t = cType.trim();
  if (t === "gpointer") return true;
  return t.endsWith("*") && !/^const\b/.test(t);
}

function refModeOf(env: Env, typ: TypeId, direction: ParameterDirection, seen: ReadonlySet<TypeId>): RefMode {
  const t = typeOf(env, typ);
  if (!t || direction !== "in") return "none";
  switch (t.kind) {
    case "fundamental":
      return t.fundamental === "utf8" || t.fundamental === "filename" || t.fundamental === "os_string"
        ? "by_ref"
        : "none";
    case "class":
    case "interface":
    case "c_array":
    case "fixed_array":
    case "array":
    case "ptr_array":
    case "list":
    case "slist":
    case "hash_table":
      return "by_ref";
    case "record":
    case "union":
      return "by_ref_mut";
    case "alias":
      if (seen.has(typ)) return "none";
      return refModeOf(env, t.target, direction, new Set([...seen, typ]));
    default:
      return "none";
  }
}

export function refModeFor(env: Env, typ: TypeId, direction: ParameterDirection): RefMode {
  return refModeOf(env, typ, direction, new Set());
}

/**
 * Reference mode of a native parameter, dropping `mut` where the C signature or the
 * configuration does not need it. Receivers in trait context with a const pointer get
 * `by_ref_const` so trait methods do not demand exclusive access.
 */
export function refModeWithoutUnneededMut(
  env: Env,
  par: ParameterDescriptor,
  immutable: boolean,
  selfInTrait: boolean
): RefMode {
  const mode = refModeFor(env, par.typ, par.direction);
  if (mode === "by_ref_mut" && !isMutPtr(par.cType)) return "by_ref";
  if (mode === "by_ref_mut" && immutable) return "by_ref_immut";
  if (mode === "by_ref" && selfInTrait && !isMutPtr(par.cType)) return "by_ref_const";
  return mode;
}
