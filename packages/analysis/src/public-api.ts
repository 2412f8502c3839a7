export type { BindgenConfig, FunctionConfig, Ident, ParameterConfig, StringType } from "./config/functions.js";
export { configuredFunctions, emptyConfig, matchedParameters } from "./config/functions.js";
export { loadConfig, parseConfig } from "./config/load.js";
export type { BindgenDiagnosticCode, DiagnosticDomain, LoadIssue } from "./diagnostics.js";
export { BINDGEN_DIAGNOSTIC_CODES, BindgenError, diagnosticDomain } from "./diagnostics.js";
export type { Env } from "./env.js";
export { createEnv } from "./env.js";
export { Library } from "./library/library.js";
export type { LoadedLibrary } from "./library/load.js";
export { loadLibrary, parseLibrary } from "./library/load.js";
export type {
  Fundamental,
  FunctionDescriptor,
  LibraryType,
  ParameterDescriptor,
  ParameterDirection,
  ParameterScope,
  Transfer,
  TypeId,
} from "./library/types.js";
export type { ConversionType } from "./lowering/conversion-type.js";
export { conversionType } from "./lowering/conversion-type.js";
export type {
  AnalyzeParametersOptions,
  NativeParameter,
  ParameterSet,
  SurfaceParameter,
} from "./lowering/function-parameters.js";
export { analyzeParameters, withReturnLength } from "./lowering/function-parameters.js";
export type { RefMode } from "./lowering/ref-mode.js";
export type { SpecialFunctionType } from "./lowering/special-functions.js";
export type { Transformation, TransformationStep } from "./lowering/transformation.js";
export { mangleKeywords } from "./naming/keywords.js";
export type { FunctionInfo } from "./passes/functions.js";
export { analyzeFunction, analyzeFunctions } from "./passes/functions.js";
export type { FunctionReport, LibraryReport, TransformationReport } from "./passes/report.js";
export { functionReport, libraryReport } from "./passes/report.js";
