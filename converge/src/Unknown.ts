import type { Value } from "./Resource.ts";

/**
 * Placeholder for a value that is only known once an upstream resource has
 * been applied. Never equal to anything, including another `Unknown`.
 */
export interface Unknown {
  /** @internal */
  readonly __converge_unknown: true;
}

export const unknown: Unknown = { __converge_unknown: true };

export const isUnknown = (value: unknown): value is Unknown =>
  typeof value === "object" && value !== null && "__converge_unknown" in value;

export type MaybeUnknown =
  | Value
  | Unknown
  | readonly MaybeUnknown[]
  | { readonly [key: string]: MaybeUnknown };
