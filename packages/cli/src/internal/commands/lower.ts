import { resolve } from "node:path";

import type { BindgenConfig, LibraryReport, LoadedLibrary } from "@bindforge/analysis";
import {
  BindgenError,
  analyzeFunctions,
  createEnv,
  emptyConfig,
  libraryReport,
  loadConfig,
  loadLibrary,
} from "@bindforge/analysis";

export type LowerArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type LowerParsed = {
  readonly libraryPath: string;
  readonly configPath?: string;
  readonly functionName?: string;
};

export type LowerDeps = {
  readonly loadLibrary?: (path: string) => LoadedLibrary;
  readonly loadConfig?: (path: string) => BindgenConfig;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
};

export const LOWER_USAGE =
  "Usage: bindforge lower --library <library.json> [--config <bindforge.json>] [--function <name>]";

export function parseLowerArgs(args: LowerArgs): LowerParsed {
  let libraryPath: string | undefined;
  let configPath: string | undefined;
  let functionName: string | undefined;

  const it = args.argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--library": {
        const v = it.next();
        if (v.done) throw new BindgenError("BFG3002", "lower: --library requires a value");
        libraryPath = resolve(args.dir, v.value);
        break;
      }
      case "--config": {
        const v = it.next();
        if (v.done) throw new BindgenError("BFG3002", "lower: --config requires a value");
        configPath = resolve(args.dir, v.value);
        break;
      }
      case "--function": {
        const v = it.next();
        if (v.done) throw new BindgenError("BFG3002", "lower: --function requires a value");
        functionName = v.value;
        break;
      }
      case "--help":
      case "-h":
        throw new BindgenError("BFG3001", LOWER_USAGE);
      default:
        throw new BindgenError("BFG3001", `lower: unknown arg: ${a}`);
    }
  }

  if (!libraryPath) {
    throw new BindgenError("BFG3003", "lower: missing required --library <library.json>");
  }

  return { libraryPath, configPath, functionName };
}

export function runLower(args: LowerArgs, deps?: LowerDeps): LibraryReport {
  const parsed = parseLowerArgs(args);
  const stdout = deps?.stdout ?? ((text: string) => console.log(text));
  const stderr = deps?.stderr ?? ((text: string) => console.error(text));

  const loaded = (deps?.loadLibrary ?? loadLibrary)(parsed.libraryPath);
  const config = parsed.configPath ? (deps?.loadConfig ?? loadConfig)(parsed.configPath) : emptyConfig;
  for (const issue of loaded.issues) {
    stderr(`${issue.file}: ${issue.kind}: ${issue.snippet}: ${issue.reason}`);
  }

  const env = createEnv(loaded.library, config);
  const functions = analyzeFunctions(env).filter(
    (f) => parsed.functionName === undefined || f.name === parsed.functionName || f.cIdentifier === parsed.functionName
  );
  if (parsed.functionName !== undefined && functions.length === 0) {
    throw new BindgenError("BFG3004", `lower: no function named '${parsed.functionName}'`);
  }

  const report = libraryReport(env, functions, loaded.issues);
  stdout(JSON.stringify(report, null, 2));
  return report;
}
