import type { BindgenConfig } from "./config/functions.js";
import { emptyConfig } from "./config/functions.js";
import type { Library } from "./library/library.js";
import type { LibraryType, TypeId } from "./library/types.js";

/** Read-only context threaded through every analysis step. */
export type Env = {
  readonly library: Library;
  readonly config: BindgenConfig;
};

export function createEnv(library: Library, config: BindgenConfig = emptyConfig): Env {
  return { library, config };
}

export function typeOf(env: Env, typ: TypeId): LibraryType | undefined {
  return env.library.type(typ);
}

/** Follows alias chains; a cyclic chain resolves to undefined. */
export function resolveAlias(env: Env, typ: TypeId): LibraryType | undefined {
  const seen = new Set<TypeId>();
  let cur = typ;
  while (true) {
    const t = typeOf(env, cur);
    if (!t || t.kind !== "alias") return t;
    if (seen.has(cur)) return undefined;
    seen.add(cur);
    cur = t.target;
  }
}

export function isClass(env: Env, typ: TypeId): boolean {
  return typeOf(env, typ)?.kind === "class";
}

export function isInterface(env: Env, typ: TypeId): boolean {
  return typeOf(env, typ)?.kind === "interface";
}

/** Interfaces are never final; types that are neither classes nor interfaces always are. */
export function isFinalType(env: Env, typ: TypeId): boolean {
  const t = typeOf(env, typ);
  if (!t) return true;
  if (t.kind === "class") return t.final;
  return t.kind !== "interface";
}

export function typeName(env: Env, typ: TypeId): string {
  const t = typeOf(env, typ);
  if (!t) return `#${typ}`;
  if (t.kind === "fundamental") return t.fundamental;
  if ("name" in t) return t.name;
  return t.kind;
}
