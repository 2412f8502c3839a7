// Language-neutral model of a native library, as consumed by the lowering passes.

export type TypeId = number;

export const FUNDAMENTALS = [
  "none",
  "boolean",
  "int8",
  "uint8",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "int64",
  "uint64",
  "char",
  "uchar",
  "short",
  "ushort",
  "int",
  "uint",
  "long",
  "ulong",
  "size",
  "ssize",
  "float",
  "double",
  "pointer",
  "varargs",
  "unichar",
  "utf8",
  "filename",
  "os_string",
  "gtype",
  "intptr",
  "uintptr",
  "unsupported",
] as const;

export type Fundamental = (typeof FUNDAMENTALS)[number];

export function isFundamental(name: string): name is Fundamental {
  return (FUNDAMENTALS as readonly string[]).includes(name);
}

export type ContainerKind = "c_array" | "array" | "ptr_array" | "list" | "slist";

export type LibraryType =
  | { readonly kind: "fundamental"; readonly fundamental: Fundamental }
  | { readonly kind: "alias"; readonly name: string; readonly cIdentifier: string; readonly target: TypeId }
  | { readonly kind: "enumeration"; readonly name: string }
  | { readonly kind: "bitfield"; readonly name: string }
  | { readonly kind: "record"; readonly name: string; readonly inline: boolean }
  | { readonly kind: "union"; readonly name: string }
  | { readonly kind: "class"; readonly name: string; readonly final: boolean }
  | { readonly kind: "interface"; readonly name: string }
  | { readonly kind: "callback"; readonly name: string }
  | { readonly kind: "custom"; readonly name: string }
  | { readonly kind: ContainerKind; readonly element: TypeId }
  | { readonly kind: "fixed_array"; readonly element: TypeId; readonly size: number }
  | { readonly kind: "hash_table"; readonly key: TypeId; readonly value: TypeId };

export type NamedLibraryType = Extract<LibraryType, { readonly name: string }>;

export type ParameterDirection = "in" | "out" | "inout" | "return";

export type Transfer = "none" | "container" | "full";

// "call": valid for the duration of the call; "forever": never released;
// "notified": released through the paired destroy notification.
export type ParameterScope = "call" | "forever" | "notified";

export type ParameterDescriptor = {
  readonly name: string;
  readonly typ: TypeId;
  readonly cType: string;
  readonly instanceParameter: boolean;
  readonly direction: ParameterDirection;
  readonly nullable: boolean;
  readonly allowNone: boolean;
  readonly transfer: Transfer;
  readonly callerAllocates: boolean;
  readonly scope: ParameterScope;
  /** Position of the parameter holding this array's length. */
  readonly arrayLength?: number;
  /** Position of the user data parameter of a callback. */
  readonly closure?: number;
  /** Position of the destroy notification of a callback. */
  readonly destroy?: number;
  readonly isError: boolean;
};

export type FunctionDescriptor = {
  readonly name: string;
  readonly cIdentifier: string;
  /** Class, interface or record the function is a method of. */
  readonly owner?: string;
  readonly throws: boolean;
  readonly parameters: readonly ParameterDescriptor[];
  readonly returnValue?: ParameterDescriptor;
};
