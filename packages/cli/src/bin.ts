import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { BindgenError } from "@bindforge/analysis";

import { LOWER_USAGE, runLower } from "./internal/commands/lower.js";

export type Cmd = "lower" | "help";

function usage(): void {
  console.log(["bindforge", "", "Usage:", `  ${LOWER_USAGE.replace("Usage: ", "")}`, "  bindforge help", ""].join("\n"));
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (cmd === "lower") return cmd;
  return "help";
}

function main(): void {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "lower":
        runLower({ dir: cwd(), argv: argv.slice(3) });
        return;
      default:
        usage();
        exit(argv[2] === "help" ? 0 : 1);
    }
  } catch (err: unknown) {
    if (err instanceof BindgenError) {
      console.error(err.file ? `${err.file}: ${err.code}: ${err.message}` : `${err.code}: ${err.message}`);
      exit(1);
    }
    console.error(err);
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
