import type { Fundamental, FunctionDescriptor, LibraryType, NamedLibraryType, TypeId } from "./types.js";
import { FUNDAMENTALS } from "./types.js";

function structuralKey(type: LibraryType): string | undefined {
  switch (type.kind) {
    case "fundamental":
      return `fundamental:${type.fundamental}`;
    case "c_array":
    case "array":
    case "ptr_array":
    case "list":
    case "slist":
      return `${type.kind}:${type.element}`;
    case "fixed_array":
      return `fixed_array:${type.element}:${type.size}`;
    case "hash_table":
      return `hash_table:${type.key}:${type.value}`;
    default:
      return undefined;
  }
}

export class Library {
  readonly namespace: string;
  readonly #types: LibraryType[] = [];
  readonly #byName = new Map<string, TypeId>();
  readonly #structural = new Map<string, TypeId>();
  readonly #functions: FunctionDescriptor[] = [];

  constructor(namespace: string) {
    this.namespace = namespace;
    for (const fundamental of FUNDAMENTALS) {
      this.add({ kind: "fundamental", fundamental });
    }
    // Interned up front for string-type overrides.
    for (const fundamental of ["utf8", "filename", "os_string"] as const) {
      this.add({ kind: "c_array", element: this.fundamental(fundamental) });
    }
  }

  /** Adds a type, returning the id of an existing identical structural type when there is one. */
  add(type: LibraryType): TypeId {
    const key = structuralKey(type);
    if (key !== undefined) {
      const existing = this.#structural.get(key);
      if (existing !== undefined) return existing;
    }
    const id = this.#types.length;
    this.#types.push(type);
    if (key !== undefined) this.#structural.set(key, id);
    if ("name" in type && !this.#byName.has(type.name)) this.#byName.set(type.name, id);
    return id;
  }

  /** Replaces the declaration at `id`; alias targets are patched this way once every name is known. */
  define(id: TypeId, type: NamedLibraryType): void {
    const current = this.#types[id];
    if (current === undefined) return;
    this.#types[id] = type;
    if (!this.#byName.has(type.name)) this.#byName.set(type.name, id);
  }

  /** Id of an already interned structural type (fundamental or container). */
  lookup(type: LibraryType): TypeId | undefined {
    const key = structuralKey(type);
    return key === undefined ? undefined : this.#structural.get(key);
  }

  fundamental(fundamental: Fundamental): TypeId {
    return FUNDAMENTALS.indexOf(fundamental);
  }

  find(name: string): TypeId | undefined {
    return this.#byName.get(name);
  }

  type(id: TypeId): LibraryType | undefined {
    return this.#types[id];
  }

  addFunction(fn: FunctionDescriptor): void {
    this.#functions.push(fn);
  }

  get functions(): readonly FunctionDescriptor[] {
    return this.#functions;
  }
}
