import * as Data from "effect/Data";

export class DuplicateIdentity extends Data.TaggedError("DuplicateIdentity")<{
  message: string;
  key: string;
}> {}

export class UnresolvedReference extends Data.TaggedError(
  "UnresolvedReference",
)<{
  message: string;
  /** key of the resource holding the reference or hint */
  from: string;
  /** key of the resource that could not be found */
  to: string;
  /** dotted path of the attribute, or `hints` / `dependsOn` */
  path: string;
}> {}

export class AmbiguousOrdering extends Data.TaggedError("AmbiguousOrdering")<{
  message: string;
  /** the pair of resource keys whose order the hint and the reference disagree on */
  pair: readonly [string, string];
}> {}

export class InvalidDocument extends Data.TaggedError("InvalidDocument")<{
  message: string;
}> {}

export class MissingProvider extends Data.TaggedError("MissingProvider")<{
  message: string;
  kind: string;
}> {}

/** A `CONVERGE_*` setting that cannot be read. */
export class InvalidSetting extends Data.TaggedError("InvalidSetting")<{
  message: string;
}> {}

export type ConfigurationError =
  | DuplicateIdentity
  | UnresolvedReference
  | AmbiguousOrdering
  | InvalidDocument
  | MissingProvider
  | InvalidSetting;

export class CyclicDependency extends Data.TaggedError("CyclicDependency")<{
  message: string;
  /** resource keys along the cycle, the first key repeated at the end */
  cycle: readonly string[];
}> {}

export class InternalInvariantViolation extends Data.TaggedError(
  "InternalInvariantViolation",
)<{
  message: string;
  diagnostics: Record<string, unknown>;
}> {}

export class StateStoreError extends Data.TaggedError("StateStoreError")<{
  message: string;
}> {}

/**
 * Ends a run before any provider call. A `StateStoreError` is fatal when the
 * recorded state cannot be loaded or refreshed; during a step it only fails
 * that step.
 */
export type FatalError =
  | ConfigurationError
  | CyclicDependency
  | InternalInvariantViolation
  | StateStoreError;

export class ProviderError extends Data.TaggedError("ProviderError")<{
  message: string;
  /** transient failures are retried with backoff, rejections are not */
  retryable: boolean;
  cause?: unknown;
}> {}

export class OperationTimeout extends Data.TaggedError("OperationTimeout")<{
  message: string;
  key: string;
}> {}

export class MissingOutput extends Data.TaggedError("MissingOutput")<{
  message: string;
  key: string;
  output: string;
}> {}

export type OperationError =
  | ProviderError
  | OperationTimeout
  | MissingOutput
  | StateStoreError;
