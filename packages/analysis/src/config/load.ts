import type { JsonReader } from "../json.js";
import { createJsonReader, readJsonFile } from "../json.js";
import type { BindgenConfig, FunctionConfig, Ident, ParameterConfig, StringType } from "./functions.js";

const configCodes = { read: "BFG2001", unknownKey: "BFG2003", invalidValue: "BFG2004" } as const;

const stringTypes: readonly StringType[] = ["utf8", "filename", "os_string"];

function parseIdent(reader: JsonReader, entry: Record<string, unknown>, label: string): Ident {
  const name = reader.optionalString(entry.name, `${label}: 'name'`);
  const pattern = reader.optionalString(entry.pattern, `${label}: 'pattern'`);
  if ((name === undefined) === (pattern === undefined)) {
    return reader.fail("BFG2005", `${label} must provide exactly one of 'name' or 'pattern'.`);
  }
  if (name !== undefined) return { kind: "name", name };
  try {
    return { kind: "pattern", pattern: new RegExp(`^(?:${pattern})$`) };
  } catch (e) {
    return reader.fail("BFG2006", `${label}: invalid pattern: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function parseParameterConfig(reader: JsonReader, raw: unknown, label: string): ParameterConfig {
  const entry = reader.record(raw, label);
  reader.knownKeys(entry, ["name", "pattern", "nullable", "const", "lengthOf", "stringType"], label);
  return {
    ident: parseIdent(reader, entry, label),
    nullable: reader.optionalBoolean(entry.nullable, `${label}: 'nullable'`),
    constant: reader.optionalBoolean(entry.const, `${label}: 'const'`) ?? false,
    lengthOf: reader.optionalString(entry.lengthOf, `${label}: 'lengthOf'`),
    stringType:
      entry.stringType === undefined ? undefined : reader.oneOf(entry.stringType, stringTypes, `${label}: 'stringType'`),
  };
}

function parseFunctionConfig(reader: JsonReader, raw: unknown, index: number): FunctionConfig {
  const label = `bindforge.json: 'functions[${index}]'`;
  const entry = reader.record(raw, label);
  reader.knownKeys(entry, ["name", "pattern", "ignore", "disableLengthDetect", "parameters"], label);
  const rawParams = entry.parameters === undefined ? [] : reader.array(entry.parameters, `${label}.parameters`);
  return {
    ident: parseIdent(reader, entry, label),
    ignore: reader.optionalBoolean(entry.ignore, `${label}: 'ignore'`) ?? false,
    disableLengthDetect: reader.optionalBoolean(entry.disableLengthDetect, `${label}: 'disableLengthDetect'`) ?? false,
    parameters: rawParams.map((p, i) => parseParameterConfig(reader, p, `${label}.parameters[${i}]`)),
  };
}

export function parseConfig(value: unknown, file: string): BindgenConfig {
  const reader = createJsonReader(file, configCodes);
  const root = reader.record(value, "bindforge.json");
  reader.knownKeys(root, ["schema", "functions"], "bindforge.json");
  if (root.schema !== 1) {
    reader.fail("BFG2002", "Unsupported bindforge.json schema.");
  }
  const functions = root.functions === undefined ? [] : reader.array(root.functions, "bindforge.json: 'functions'");
  return {
    schema: 1,
    functions: functions.map((f, i) => parseFunctionConfig(reader, f, i)),
  };
}

export function loadConfig(path: string): BindgenConfig {
  return parseConfig(readJsonFile(createJsonReader(path, configCodes)), path);
}
