import type { Env } from "../env.js";
import { typeName, typeOf } from "../env.js";
import type { Fundamental, TypeId } from "../library/types.js";

const fundamentalRustTypes: Partial<Record<Fundamental, string>> = {
  none: "()",
  boolean: "bool",
  int8: "i8",
  uint8: "u8",
  int16: "i16",
  uint16: "u16",
  int32: "i32",
  uint32: "u32",
  int64: "i64",
  uint64: "u64",
  char: "i8",
  uchar: "u8",
  short: "i16",
  ushort: "u16",
  int: "i32",
  uint: "u32",
  long: "libc::c_long",
  ulong: "libc::c_ulong",
  size: "usize",
  ssize: "isize",
  float: "f32",
  double: "f64",
  unichar: "char",
  intptr: "isize",
  uintptr: "usize",
  utf8: "GString",
  filename: "std::path::PathBuf",
  os_string: "std::ffi::OsString",
  gtype: "glib::types::Type",
  pointer: "glib::ffi::gpointer",
};

function unimplemented(env: Env, typ: TypeId): string {
  return `/*Unimplemented*/${typeName(env, typ)}`;
}

function render(env: Env, typ: TypeId, depth: number): string {
  const t = typeOf(env, typ);
  if (!t || depth > 32) return unimplemented(env, typ);
  switch (t.kind) {
    case "fundamental":
      return fundamentalRustTypes[t.fundamental] ?? unimplemented(env, typ);
    case "alias":
    case "enumeration":
    case "bitfield":
    case "record":
    case "union":
    case "class":
    case "interface":
    case "callback":
      return t.name;
    case "c_array":
    case "fixed_array":
    case "array":
    case "ptr_array":
    case "list":
    case "slist":
      return `Vec<${render(env, t.element, depth + 1)}>`;
    case "hash_table":
      return `HashMap<${render(env, t.key, depth + 1)}, ${render(env, t.value, depth + 1)}>`;
    case "custom":
      return unimplemented(env, typ);
  }
}

/** Renders `typ` as Rust source text. */
export function rustType(env: Env, typ: TypeId): string {
  return render(env, typ, 0);
}
