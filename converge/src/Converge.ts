import * as Effect from "effect/Effect";
import { applyPlan, type ApplyOptions } from "./Apply.ts";
import * as Document from "./Document.ts";
import type { FatalError } from "./Errors.ts";
import { plan } from "./Plan.ts";
import { Reporter } from "./Reporter.ts";
import type { RunResult } from "./Report.ts";

export interface ConvergeOptions extends ApplyOptions {}

/**
 * Drive the recorded state towards `document`: plan, display the plan, then
 * apply it. Errors found before any provider is called end the run with exit
 * code 2: planning errors, an unreadable `CONVERGE_*` setting, and a state
 * store that cannot be loaded or refreshed.
 */
export const converge = (
  document: Document.Document,
  options: ConvergeOptions = {},
) =>
  Effect.gen(function* () {
    const reporter = yield* Reporter;
    const planned = yield* plan(document);
    yield* reporter.displayPlan(planned);
    const report = yield* applyPlan(planned, options);
    yield* Effect.logInfo(
      `Converged: ${report.completed.length} applied, ${report.failed.length} failed, ${report.blocked.length} blocked, ${report.notAttempted.length} not attempted`,
    );
    const result: RunResult = { exitCode: report.exitCode, report };
    return result;
  }).pipe(
    Effect.catchTags({
      DuplicateIdentity: fatal,
      UnresolvedReference: fatal,
      AmbiguousOrdering: fatal,
      MissingProvider: fatal,
      CyclicDependency: fatal,
      InternalInvariantViolation: fatal,
      InvalidSetting: fatal,
      StateStoreError: fatal,
    }),
    Effect.annotateLogs({ run: "converge" }),
  );

/**
 * Delete every recorded resource that is not external, dependents first.
 */
export const destroy = (options: ConvergeOptions = {}) =>
  converge(Document.empty, options);

/**
 * Decode an untyped document before converging it. A malformed document ends
 * the run like any other planning error.
 */
export const convergeUnknown = (input: unknown, options: ConvergeOptions = {}) =>
  Document.decode(input).pipe(
    Effect.flatMap((document) => converge(document, options)),
    Effect.catchTag("InvalidDocument", fatal),
  );

function fatal(error: FatalError): Effect.Effect<RunResult> {
  return Effect.logError(`${error._tag}: ${error.message}`).pipe(
    Effect.as({ exitCode: 2 as const, error }),
  );
}
