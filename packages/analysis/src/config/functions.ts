export type StringType = "utf8" | "filename" | "os_string";

/** Matches either an exact identifier or an anchored regular expression. */
export type Ident =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "pattern"; readonly pattern: RegExp };

export type ParameterConfig = {
  readonly ident: Ident;
  readonly nullable?: boolean;
  /** Treat the parameter as immutable whatever its declared direction. */
  readonly constant: boolean;
  /** Name of the array parameter this parameter holds the length of. */
  readonly lengthOf?: string;
  readonly stringType?: StringType;
};

export type FunctionConfig = {
  readonly ident: Ident;
  readonly ignore: boolean;
  readonly disableLengthDetect: boolean;
  readonly parameters: readonly ParameterConfig[];
};

export type BindgenConfig = {
  readonly schema: 1;
  readonly functions: readonly FunctionConfig[];
};

export const emptyConfig: BindgenConfig = { schema: 1, functions: [] };

export function identMatches(ident: Ident, name: string): boolean {
  return ident.kind === "name" ? ident.name === name : ident.pattern.test(name);
}

export function configuredFunctions(config: BindgenConfig, name: string): readonly FunctionConfig[] {
  return config.functions.filter((f) => identMatches(f.ident, name));
}

export function matchedParameters(
  functions: readonly FunctionConfig[],
  name: string
): readonly ParameterConfig[] {
  return functions.flatMap((f) => f.parameters.filter((p) => identMatches(p.ident, name)));
}
