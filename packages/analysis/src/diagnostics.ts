export const BINDGEN_DIAGNOSTIC_CODES = [
  // Library description
  "BFG1001",
  "BFG1002",
  "BFG1003",
  "BFG1004",
  "BFG1005",
  "BFG1006",
  "BFG1007",
  "BFG1008",
  // Override configuration
  "BFG2001",
  "BFG2002",
  "BFG2003",
  "BFG2004",
  "BFG2005",
  "BFG2006",
  // Command line
  "BFG3001",
  "BFG3002",
  "BFG3003",
  "BFG3004",
] as const;

export type BindgenDiagnosticCode = (typeof BINDGEN_DIAGNOSTIC_CODES)[number];

export type DiagnosticDomain = "library" | "config" | "cli" | "other";

const knownCodes = new Set<string>(BINDGEN_DIAGNOSTIC_CODES);

export function isDiagnosticCode(code: string): code is BindgenDiagnosticCode {
  return knownCodes.has(code);
}

export function assertDiagnosticCode(code: string): asserts code is BindgenDiagnosticCode {
  if (!isDiagnosticCode(code)) {
    throw new Error(`Unknown bindgen diagnostic code: ${code}`);
  }
}

export function diagnosticDomain(code: string): DiagnosticDomain {
  if (!isDiagnosticCode(code)) return "other";
  if (code.startsWith("BFG1")) return "library";
  if (code.startsWith("BFG2")) return "config";
  if (code.startsWith("BFG3")) return "cli";
  return "other";
}

export class BindgenError extends Error {
  readonly code: BindgenDiagnosticCode;
  readonly file?: string;

  constructor(code: string, message: string, file?: string) {
    assertDiagnosticCode(code);
    super(message);
    this.code = code;
    this.file = file;
    this.name = "BindgenError";
  }
}

/** A recoverable problem found while loading input; the affected item degrades instead of failing. */
export type LoadIssue = {
  readonly file: string;
  readonly kind: "type" | "function";
  readonly snippet: string;
  readonly reason: string;
};
