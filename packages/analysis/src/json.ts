import { readFileSync } from "node:fs";

import { BindgenError } from "./diagnostics.js";

export type JsonCodes = {
  readonly read: string;
  readonly unknownKey: string;
  readonly invalidValue: string;
};

export type JsonReader = {
  readonly file: string;
  readonly codes: JsonCodes;
  readonly fail: (code: string, message: string) => never;
  readonly record: (value: unknown, label: string) => Record<string, unknown>;
  readonly knownKeys: (value: Record<string, unknown>, allowed: readonly string[], label: string) => void;
  readonly string: (value: unknown, label: string) => string;
  readonly optionalString: (value: unknown, label: string) => string | undefined;
  readonly optionalText: (value: unknown, label: string) => string | undefined;
  readonly optionalBoolean: (value: unknown, label: string) => boolean | undefined;
  readonly optionalIndex: (value: unknown, label: string) => number | undefined;
  readonly array: (value: unknown, label: string) => readonly unknown[];
  readonly oneOf: <T extends string>(value: unknown, allowed: readonly T[], label: string) => T;
};

export function createJsonReader(file: string, codes: JsonCodes): JsonReader {
  const fail = (code: string, message: string): never => {
    throw new BindgenError(code, message, file);
  };

  const record = (value: unknown, label: string): Record<string, unknown> => {
    if (!value || typeof value !== "object" || Array.isArray(value)) {
      return fail(codes.invalidValue, `${label} must be a JSON object.`);
    }
    return value as Record<string, unknown>;
  };

  const knownKeys = (value: Record<string, unknown>, allowed: readonly string[], label: string): void => {
    for (const key of Object.keys(value)) {
      if (!allowed.includes(key)) {
        fail(codes.unknownKey, `${label}: unknown key '${key}'.`);
      }
    }
  };

  const string = (value: unknown, label: string): string => {
    if (typeof value !== "string" || value.length === 0) {
      return fail(codes.invalidValue, `${label} must be a non-empty string.`);
    }
    return value;
  };

  const optionalString = (value: unknown, label: string): string | undefined =>
    value === undefined ? undefined : string(value, label);

  // Like optionalString, but an empty string is a value.
  const optionalText = (value: unknown, label: string): string | undefined => {
    if (value === undefined) return undefined;
    if (typeof value !== "string") {
      return fail(codes.invalidValue, `${label} must be a string.`);
    }
    return value;
  };

  const optionalBoolean = (value: unknown, label: string): boolean | undefined => {
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") {
      return fail(codes.invalidValue, `${label} must be a boolean.`);
    }
    return value;
  };

  const optionalIndex = (value: unknown, label: string): number | undefined => {
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      return fail(codes.invalidValue, `${label} must be a non-negative integer.`);
    }
    return value;
  };

  const array = (value: unknown, label: string): readonly unknown[] => {
    if (!Array.isArray(value)) {
      return fail(codes.invalidValue, `${label} must be an array.`);
    }
    return value;
  };

  const oneOf = <T extends string>(value: unknown, allowed: readonly T[], label: string): T => {
    const found = allowed.find((a) => a === value);
    if (found === undefined) {
      return fail(codes.invalidValue, `${label} must be one of ${allowed.map((a) => `'${a}'`).join(", ")}.`);
    }
    return found;
  };

  return { file, codes, fail, record, knownKeys, string, optionalString, optionalText, optionalBoolean, optionalIndex, array, oneOf };
}

export function readJsonFile(reader: JsonReader): unknown {
  try {
    return JSON.parse(readFileSync(reader.file, "utf-8")) as unknown;
  } catch (e) {
    return reader.fail(reader.codes.read, `Failed to read ${reader.file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}
