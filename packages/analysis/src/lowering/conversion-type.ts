import type { Env } from "../env.js";
import { typeOf } from "../env.js";
import type { Fundamental, TypeId } from "../library/types.js";

export type ConversionType = "direct" | "scalar" | "pointer" | "borrow" | "unknown";

function fundamentalConversion(fundamental: Fundamental): ConversionType {
  switch (fundamental) {
    case "boolean":
    case "gtype":
      return "scalar";
    case "int8":
    case "uint8":
    case "int16":
    case "uint16":
    case "int32":
    case "uint32":
    case "int64":
    case "uint64":
    case "char":
    case "uchar":
    case "short":
    case "ushort":
    case "int":
    case "uint":
    case "long":
    case "ulong":
    case "size":
    case "ssize":
    case "float":
    case "double":
    case "unichar":
    case "intptr":
    case "uintptr":
      return "direct";
    case "utf8":
    case "filename":
    case "os_string":
    case "pointer":
      return "pointer";
    case "none":
    case "varargs":
    case "unsupported":
      return "unknown";
  }
}

function classify(env: Env, typ: TypeId, seen: ReadonlySet<TypeId>): ConversionType {
  const t = typeOf(env, typ);
  if (!t) return "unknown";
  switch (t.kind) {
    case "fundamental":
      return fundamentalConversion(t.fundamental);
    case "alias":
      if (t.cIdentifier === "GQuark") return "scalar";
      if (seen.has(typ)) return "unknown";
      return classify(env, t.target, new Set([...seen, typ]));
    case "enumeration":
    case "bitfield":
      return "scalar";
    case "callback":
    case "union":
      return "direct";
    case "record":
      return t.inline ? "borrow" : "pointer";
    case "class":
    case "interface":
    case "c_array":
    case "fixed_array":
    case "array":
    case "ptr_array":
    case "list":
    case "slist":
    case "hash_table":
      return "pointer";
    case "custom":
      return "unknown";
  }
}

/** Classifies how a value of `typ` crosses the native boundary. Total: unresolvable shapes are "unknown". */
export function conversionType(env: Env, typ: TypeId): ConversionType {
  return classify(env, typ, new Set());
}

export function isValueConversion(conversion: ConversionType): boolean {
  return conversion === "direct" || conversion === "scalar";
}
