import type { LoadIssue } from "../diagnostics.js";
import type { JsonReader } from "../json.js";
import { createJsonReader, readJsonFile } from "../json.js";
import { Library } from "./library.js";
import type {
  ContainerKind,
  FunctionDescriptor,
  ParameterDescriptor,
  ParameterDirection,
  ParameterScope,
  Transfer,
  TypeId,
} from "./types.js";
import { isFundamental } from "./types.js";

export type LoadedLibrary = {
  readonly library: Library;
  readonly issues: readonly LoadIssue[];
};

const libraryCodes = { read: "BFG1001", unknownKey: "BFG1003", invalidValue: "BFG1004" } as const;

const namedKinds = [
  "alias",
  "enumeration",
  "bitfield",
  "record",
  "union",
  "class",
  "interface",
  "callback",
  "custom",
] as const;

const containerKinds: readonly ContainerKind[] = ["c_array", "array", "ptr_array", "list", "slist"];

const directions: readonly ParameterDirection[] = ["in", "out", "inout", "return"];
const transfers: readonly Transfer[] = ["none", "container", "full"];
const scopes: readonly ParameterScope[] = ["call", "forever", "notified"];

type LoadCtx = {
  readonly reader: JsonReader;
  readonly library: Library;
  readonly issues: LoadIssue[];
};

function resolveTypeExpr(ctx: LoadCtx, raw: unknown, label: string): TypeId {
  const { reader, library } = ctx;
  if (typeof raw === "string") {
    if (isFundamental(raw)) return library.fundamental(raw);
    const found = library.find(raw);
    if (found !== undefined) return found;
    ctx.issues.push({
      file: reader.file,
      kind: "type",
      snippet: raw,
      reason: `${label}: unknown type name; treated as unsupported.`,
    });
    return library.fundamental("unsupported");
  }

  const expr = reader.record(raw, label);
  const kind = reader.string(expr.kind, `${label}: 'kind'`);
  if (kind === "fixed_array") {
    reader.knownKeys(expr, ["kind", "element", "size"], label);
    const element = resolveTypeExpr(ctx, expr.element, `${label}.element`);
    const size = reader.optionalIndex(expr.size, `${label}: 'size'`) ?? 0;
    return library.add({ kind: "fixed_array", element, size });
  }
  if (kind === "hash_table") {
    reader.knownKeys(expr, ["kind", "key", "value"], label);
    const key = resolveTypeExpr(ctx, expr.key, `${label}.key`);
    const value = resolveTypeExpr(ctx, expr.value, `${label}.value`);
    return library.add({ kind: "hash_table", key, value });
  }
  const container = containerKinds.find((k) => k === kind);
  if (container === undefined) {
    return reader.fail("BFG1005", `${label}: unknown type expression kind '${kind}'.`);
  }
  reader.knownKeys(expr, ["kind", "element"], label);
  const element = resolveTypeExpr(ctx, expr.element, `${label}.element`);
  return library.add({ kind: container, element });
}

function declareTypes(ctx: LoadCtx, rawTypes: readonly unknown[]): void {
  const { reader, library } = ctx;
  const pendingAliases: { readonly id: TypeId; readonly name: string; readonly cIdentifier: string; readonly target: unknown }[] = [];

  rawTypes.forEach((raw, index) => {
    const label = `types[${index}]`;
    const decl = reader.record(raw, label);
    const kind = reader.oneOf(decl.kind, namedKinds, `${label}: 'kind'`);
    const name = reader.string(decl.name, `${label}: 'name'`);
    if (isFundamental(name) || library.find(name) !== undefined) {
      reader.fail("BFG1006", `${label}: duplicate type name '${name}'.`);
    }
    switch (kind) {
      case "alias": {
        reader.knownKeys(decl, ["kind", "name", "cIdentifier", "target"], label);
        const cIdentifier = reader.optionalString(decl.cIdentifier, `${label}: 'cIdentifier'`) ?? name;
        const id = library.add({ kind: "alias", name, cIdentifier, target: library.fundamental("unsupported") });
        pendingAliases.push({ id, name, cIdentifier, target: decl.target });
        return;
      }
      case "record":
        reader.knownKeys(decl, ["kind", "name", "inline"], label);
        library.add({ kind, name, inline: reader.optionalBoolean(decl.inline, `${label}: 'inline'`) ?? false });
        return;
      case "class":
        reader.knownKeys(decl, ["kind", "name", "final"], label);
        library.add({ kind, name, final: reader.optionalBoolean(decl.final, `${label}: 'final'`) ?? false });
        return;
      default:
        reader.knownKeys(decl, ["kind", "name"], label);
        library.add({ kind, name });
    }
  });

  // Aliases may point at types declared after them.
  for (const alias of pendingAliases) {
    const target = resolveTypeExpr(ctx, alias.target, `alias ${alias.name}.target`);
    library.define(alias.id, { kind: "alias", name: alias.name, cIdentifier: alias.cIdentifier, target });
  }
}

function parseParameter(
  ctx: LoadCtx,
  raw: unknown,
  label: string,
  defaults: { readonly direction: ParameterDirection }
): ParameterDescriptor {
  const { reader } = ctx;
  const par = reader.record(raw, label);
  reader.knownKeys(
    par,
    [
      "name",
      "type",
      "cType",
      "instance",
      "direction",
      "nullable",
      "allowNone",
      "transfer",
      "callerAllocates",
      "scope",
      "arrayLength",
      "closure",
      "destroy",
      "isError",
    ],
    label
  );
  const name = defaults.direction === "return"
    ? reader.optionalString(par.name, `${label}: 'name'`) ?? "return"
    : reader.string(par.name, `${label}: 'name'`);
  const typ = resolveTypeExpr(ctx, par.type, `${label}.type`);
  const direction =
    par.direction === undefined ? defaults.direction : reader.oneOf(par.direction, directions, `${label}: 'direction'`);
  const transfer = par.transfer === undefined ? "none" : reader.oneOf(par.transfer, transfers, `${label}: 'transfer'`);
  const scope = par.scope === undefined ? "call" : reader.oneOf(par.scope, scopes, `${label}: 'scope'`);
  const nullable = reader.optionalBoolean(par.nullable, `${label}: 'nullable'`) ?? false;

  return {
    name,
    typ,
    cType: reader.optionalText(par.cType, `${label}: 'cType'`) ?? "",
    instanceParameter: reader.optionalBoolean(par.instance, `${label}: 'instance'`) ?? false,
    direction,
    nullable,
    allowNone: reader.optionalBoolean(par.allowNone, `${label}: 'allowNone'`) ?? nullable,
    transfer,
    callerAllocates: reader.optionalBoolean(par.callerAllocates, `${label}: 'callerAllocates'`) ?? false,
    scope,
    arrayLength: reader.optionalIndex(par.arrayLength, `${label}: 'arrayLength'`),
    closure: reader.optionalIndex(par.closure, `${label}: 'closure'`),
    destroy: reader.optionalIndex(par.destroy, `${label}: 'destroy'`),
    isError: reader.optionalBoolean(par.isError, `${label}: 'isError'`) ?? false,
  };
}

function checkIndexes(ctx: LoadCtx, fn: FunctionDescriptor, label: string): void {
  const count = fn.parameters.length;
  const check = (value: number | undefined, what: string): void => {
    if (value !== undefined && value >= count) {
      ctx.reader.fail("BFG1008", `${label}: ${what} ${value} is out of range (${count} parameters).`);
    }
  };
  fn.parameters.forEach((p, i) => {
    check(p.arrayLength, `parameters[${i}].arrayLength`);
    check(p.closure, `parameters[${i}].closure`);
    check(p.destroy, `parameters[${i}].destroy`);
  });
  check(fn.returnValue?.arrayLength, "returnValue.arrayLength");
}

function parseFunction(ctx: LoadCtx, raw: unknown, index: number): FunctionDescriptor {
  const { reader, library } = ctx;
  const label = `functions[${index}]`;
  const decl = reader.record(raw, label);
  reader.knownKeys(decl, ["name", "cIdentifier", "owner", "throws", "parameters", "returnValue"], label);
  const name = reader.string(decl.name, `${label}: 'name'`);
  const owner = reader.optionalString(decl.owner, `${label}: 'owner'`);
  if (owner !== undefined && library.find(owner) === undefined) {
    ctx.issues.push({
      file: reader.file,
      kind: "function",
      snippet: `${owner}.${name}`,
      reason: "Owner type is not declared; the function is analyzed as a free function.",
    });
  }
  const rawParams = decl.parameters === undefined ? [] : reader.array(decl.parameters, `${label}: 'parameters'`);
  const parameters = rawParams.map((p, i) =>
    parseParameter(ctx, p, `${label}.parameters[${i}]`, { direction: "in" })
  );
  const returnValue =
    decl.returnValue === undefined
      ? undefined
      : parseParameter(ctx, decl.returnValue, `${label}.returnValue`, { direction: "return" });

  const fn: FunctionDescriptor = {
    name,
    cIdentifier: reader.optionalString(decl.cIdentifier, `${label}: 'cIdentifier'`) ?? name,
    owner: owner !== undefined && library.find(owner) !== undefined ? owner : undefined,
    throws: reader.optionalBoolean(decl.throws, `${label}: 'throws'`) ?? false,
    parameters,
    returnValue,
  };
  checkIndexes(ctx, fn, label);
  return fn;
}

export function parseLibrary(value: unknown, file: string): LoadedLibrary {
  const reader = createJsonReader(file, libraryCodes);
  const root = reader.record(value, file);
  reader.knownKeys(root, ["schema", "namespace", "types", "functions"], file);
  if (root.schema !== 1) {
    reader.fail("BFG1002", `${file}: unsupported schema (expected 1).`);
  }
  const library = new Library(reader.string(root.namespace, `${file}: 'namespace'`));
  const ctx: LoadCtx = { reader, library, issues: [] };

  declareTypes(ctx, root.types === undefined ? [] : reader.array(root.types, `${file}: 'types'`));
  const functions = root.functions === undefined ? [] : reader.array(root.functions, `${file}: 'functions'`);
  const cIdentifiers = new Set<string>();
  functions.forEach((raw, i) => {
    const fn = parseFunction(ctx, raw, i);
    if (cIdentifiers.has(fn.cIdentifier)) {
      reader.fail("BFG1007", `functions[${i}]: duplicate C identifier '${fn.cIdentifier}'.`);
    }
    cIdentifiers.add(fn.cIdentifier);
    library.addFunction(fn);
  });

  return { library, issues: ctx.issues };
}

export function loadLibrary(path: string): LoadedLibrary {
  const reader = createJsonReader(path, libraryCodes);
  return parseLibrary(readJsonFile(reader), path);
}
