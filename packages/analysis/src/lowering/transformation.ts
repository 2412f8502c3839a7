import type { Transfer } from "../library/types.js";
import type { RefMode } from "./ref-mode.js";

export type TransformationStep =
  | { readonly kind: "direct"; readonly name: string }
  | { readonly kind: "scalar"; readonly name: string; readonly nullable: boolean }
  | {
      readonly kind: "pointer";
      readonly name: string;
      readonly instanceParameter: boolean;
      readonly transfer: Transfer;
      readonly refMode: RefMode;
      /** Suffix applied before the glue conversion, e.g. `.as_ref()`. */
      readonly extra: string;
      readonly explicitTargetType: string;
      readonly pointerCast: string;
      readonly inTrait: boolean;
      readonly nullable: boolean;
    }
  | { readonly kind: "borrow" }
  | { readonly kind: "unknown"; readonly name: string }
  | {
      readonly kind: "length";
      readonly arrayName: string;
      readonly lengthName: string;
      readonly lengthType: string;
    }
  // Async callback slot: the generated code always passes `Some(callback)`.
  | { readonly kind: "to_some"; readonly name: string }
  // Async user data slot: carries the boxed completion state as a raw owned pointer.
  | { readonly kind: "into_raw"; readonly name: string };

export type Transformation = {
  /** Index into the native parameter list. */
  readonly nativeIndex: number;
  /** Index into the surface parameter list; undefined when the native parameter is not exposed. */
  readonly surfaceIndex: number | undefined;
  readonly step: TransformationStep;
};
