import type { TransformationStep } from "./transformation.js";

export const ASYNC_CALLBACK_PARAM = "callback";
export const ASYNC_USER_DATA_PARAM = "user_data";

// TODO: match on the callback's closure index instead of the parameter name.
export function isAsyncDataParameter(name: string): boolean {
  return name === ASYNC_USER_DATA_PARAM || name.endsWith("data");
}

/**
 * Late substitution for async functions: the callback slot is always filled by the generated
 * future, and the user data slot carries its boxed state.
 */
export function restructureAsync(step: TransformationStep): TransformationStep {
  switch (step.kind) {
    case "direct":
    case "unknown":
      return step.name === ASYNC_CALLBACK_PARAM ? { kind: "to_some", name: step.name } : step;
    case "pointer":
      return step.name === ASYNC_USER_DATA_PARAM ? { kind: "into_raw", name: step.name } : step;
    default:
      return step;
  }
}
