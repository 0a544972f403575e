import * as Deferred from "effect/Deferred";
import * as Duration from "effect/Duration";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Schedule from "effect/Schedule";
import * as Config from "./Config.ts";
import {
  InvalidSetting,
  MissingOutput,
  OperationTimeout,
  type MissingProvider,
  type OperationError,
  type ProviderError,
  type StateStoreError,
} from "./Errors.ts";
import type { ApplyStatus } from "./Event.ts";
import { isRecord } from "./internal/util/data.ts";
import type { Plan, Step } from "./Plan.ts";
import {
  Providers,
  type Outputs,
  type ProviderService,
} from "./Provider.ts";
import { summarize, type Outcome, type RunReport } from "./Report.ts";
import { Reporter } from "./Reporter.ts";
import {
  categoryOf,
  isRef,
  key,
  type Attributes,
  type Value,
} from "./Resource.ts";
import type { ResourceState } from "./State/ResourceState.ts";
import { State } from "./State/State.ts";

export interface ApplyOptions {
  /**
   * Maximum number of steps running at once.
   *
   * @default CONVERGE_CONCURRENCY or 8
   */
  concurrency?: number;
  /**
   * Limit on each provider call, retries included. A call that runs out of
   * time fails its step.
   *
   * @default CONVERGE_OPERATION_TIMEOUT or 10 minutes
   */
  operationTimeout?: Duration.DurationInput;
  /**
   * Retries after the first attempt for provider errors marked retryable.
   *
   * @default CONVERGE_RETRY_ATTEMPTS or 3
   */
  retryAttempts?: number;
  /**
   * @default CONVERGE_RETRY_DELAY or 200 millis
   */
  retryDelay?: Duration.DurationInput;
  /**
   * Once completed, no further step starts. Steps already running finish.
   */
  cancel?: Deferred.Deferred<void>;
}

export type ApplyError = InvalidSetting | MissingProvider | StateStoreError;

/**
 * The outcome a step takes from the steps it waits on, or `undefined` when
 * every one of them was applied. A failure anywhere upstream blocks the step,
 * even when another upstream step was skipped.
 */
export const upstreamOutcome = (
  upstream: ReadonlyArray<{ key: string; outcome: Outcome }>,
): Outcome | undefined => {
  let skipped: Outcome | undefined;
  for (const { key, outcome } of upstream) {
    if (outcome.status === "Failed") {
      return { status: "Blocked", blockedBy: key };
    } else if (outcome.status === "Blocked") {
      return outcome;
    } else if (outcome.status === "Skipped") {
      skipped ??= outcome;
    }
  }
  return skipped;
};

/**
 * Execute a plan. Every step waits only for the steps it depends on. A failed
 * step blocks everything downstream of it while the rest of the plan carries
 * on. State is written after every successful provider call. Nothing is rolled
 * back: a partially applied plan is picked up by the next run.
 */
export const applyPlan = (
  plan: Plan,
  options: ApplyOptions = {},
): Effect.Effect<RunReport, ApplyError, State | Providers | Reporter> =>
  Effect.gen(function* () {
    const state = yield* State;
    const reporter = yield* Reporter;
    const providers = yield* Providers;

    const settings = yield* Effect.all({
      concurrency: Config.concurrency,
      operationTimeout: Config.operationTimeout,
      retryAttempts: Config.retryAttempts,
      retryDelay: Config.retryDelay,
    }).pipe(
      Effect.mapError(
        (error) => new InvalidSetting({ message: String(error) }),
      ),
    );
    const concurrency = options.concurrency ?? settings.concurrency;
    const timeout = options.operationTimeout ?? settings.operationTimeout;
    const retryAttempts = options.retryAttempts ?? settings.retryAttempts;
    const retryDelay = options.retryDelay ?? settings.retryDelay;

    const steps = plan.batches.flat().flatMap((id) => {
      const step = plan.steps[id];
      return step ? [step] : [];
    });

    // resolve every provider up front so a missing one aborts before any call
    const providerOf = new Map<string, ProviderService>();
    for (const step of steps) {
      const { kind } = plan.changes[step.key].address;
      if (!providerOf.has(kind)) {
        providerOf.set(kind, yield* providers.get(kind));
      }
    }
    const provider = (step: Step) => {
      const { kind } = plan.changes[step.key].address;
      const found = providerOf.get(kind);
      return found ? Effect.succeed(found) : Effect.orDie(providers.get(kind));
    };

    const permits = yield* Effect.makeSemaphore(Math.max(1, concurrency));
    const signals = new Map<string, Deferred.Deferred<Outcome>>();
    for (const step of steps) {
      signals.set(step.id, yield* Deferred.make<Outcome>());
    }
    const outcomes = new Map<string, Outcome>();

    // latest known state per resource, seeded from what the plan was built on
    const entries = new Map(plan.state);
    const live = new Map<string, Outputs>(
      [...plan.state].map(([id, entry]) => [id, entry.outputs]),
    );

    const isCancelled = options.cancel
      ? Deferred.isDone(options.cancel)
      : Effect.succeed(false);

    const report = (step: Step, status: ApplyStatus, message?: string) =>
      reporter.emit({
        kind: "status-change",
        id: step.id,
        key: step.key,
        status,
        message,
      });

    const call = <A>(step: Step, effect: Effect.Effect<A, ProviderError>) => {
      let attempt = 0;
      return effect.pipe(
        Effect.tapError((error) =>
          Effect.gen(function* () {
            attempt++;
            yield* Effect.logDebug(
              `${step.id} failed (${error.retryable ? "retryable" : "rejected"}): ${error.message}`,
            );
            if (error.retryable) {
              yield* reporter.emit({
                kind: "annotate",
                id: step.id,
                message: `attempt ${attempt} failed: ${error.message}`,
              });
            }
          }),
        ),
        Effect.retry({
          while: (error) => error.retryable,
          schedule: Schedule.exponential(retryDelay).pipe(
            Schedule.intersect(Schedule.recurs(retryAttempts)),
          ),
        }),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new OperationTimeout({
              message: `${step.id} did not finish within ${Duration.format(timeout)}`,
              key: step.key,
            }),
        }),
      );
    };

    const resolveLive = (
      value: Value,
    ): Effect.Effect<Value, MissingOutput> =>
      Effect.gen(function* () {
        if (isRef(value)) {
          const producer = key(value);
          const output = live.get(producer)?.[value.output];
          if (output === undefined) {
            return yield* new MissingOutput({
              message: `${producer} has no output '${value.output}'`,
              key: producer,
              output: value.output,
            });
          }
          return output;
        } else if (Array.isArray(value)) {
          const items: Value[] = [];
          for (const item of value) {
            items.push(yield* resolveLive(item));
          }
          return items;
        } else if (isRecord(value)) {
          return yield* resolveAttributes(value);
        }
        return value;
      });

    const resolveAttributes = (
      attributes: Attributes,
    ): Effect.Effect<Attributes, MissingOutput> =>
      Effect.gen(function* () {
        const resolved: Record<string, Value> = {};
        for (const [name, value] of Object.entries(attributes)) {
          resolved[name] = yield* resolveLive(value);
        }
        return resolved;
      });

    const commit = (id: string, entry: ResourceState) =>
      state.upsert(id, entry).pipe(
        Effect.tap(() =>
          Effect.sync(() => {
            entries.set(id, entry);
            live.set(id, entry.outputs);
          }),
        ),
      );

    const retireAll = (step: Step, entry: ResourceState) =>
      Effect.gen(function* () {
        let current = entry;
        for (const instance of entry.retiring ?? []) {
          const handler = yield* provider(step);
          yield* call(
            step,
            handler.delete({
              address: entry.address,
              handle: instance.handle,
              outputs: instance.outputs,
            }),
          );
          const { retiring = [], ...rest } = current;
          const left = retiring.filter((i) => i.handle !== instance.handle);
          current = left.length > 0 ? { ...rest, retiring: left } : rest;
          yield* commit(step.key, current);
          yield* reporter.emit({
            kind: "annotate",
            id: step.id,
            message: `retired ${instance.handle}`,
          });
        }
        return current;
      });

    const execute = (step: Step): Effect.Effect<void, OperationError> =>
      Effect.gen(function* () {
        const change = plan.changes[step.key];
        const previous = entries.get(step.key);

        if (step.phase === "apply") {
          if (change.action === "delete" || change.action === "noop") {
            return;
          }
          const { resource, address } = change;
          const news = yield* resolveAttributes(resource.attributes);
          const dependencies = [...plan.graph.dependencies(step.key)];
          const category = categoryOf(resource);

          const handler = yield* provider(step);
          if (change.action === "update" && previous) {
            const outputs = yield* call(
              step,
              handler.update({
                address,
                handle: previous.handle,
                news,
                olds: previous.attributes,
                outputs: previous.outputs,
              }),
            );
            yield* commit(step.key, {
              ...previous,
              category,
              attributes: news,
              outputs,
              dependencies,
            });
            return;
          }

          const { handle, outputs } = yield* call(
            step,
            handler.create({ address, news }),
          );
          yield* commit(step.key, {
            address,
            category,
            attributes: news,
            outputs,
            handle,
            dependencies,
            external: previous?.external,
            // the old instance stays recorded until the retire step deletes it
            retiring: previous
              ? [
                  ...(previous.retiring ?? []),
                  { handle: previous.handle, outputs: previous.outputs },
                ]
              : undefined,
          });
        } else if (previous) {
          const remaining = yield* retireAll(step, previous);
          if (step.phase === "delete") {
            const handler = yield* provider(step);
            yield* call(
              step,
              handler.delete({
                address: remaining.address,
                handle: remaining.handle,
                outputs: remaining.outputs,
              }),
            );
            yield* state.remove(step.key);
            entries.delete(step.key);
          }
        }
      });

    const awaitStep = (id: string): Effect.Effect<Outcome> => {
      const signal = signals.get(id);
      return signal ? Deferred.await(signal) : Effect.succeed({ status: "Applied" });
    };

    const run = (step: Step) =>
      Effect.gen(function* () {
        const signal = signals.get(step.id);
        if (!signal) {
          return;
        }
        const upstream = yield* Effect.forEach(step.after, (id) =>
          awaitStep(id).pipe(
            Effect.map((outcome) => ({
              key: plan.steps[id]?.key ?? id,
              outcome,
            })),
          ),
        );

        let outcome = upstreamOutcome(upstream);

        if (!outcome) {
          outcome = yield* permits.withPermits(1)(
            Effect.gen(function* () {
              if (yield* isCancelled) {
                return { status: "Skipped" } satisfies Outcome;
              }
              yield* report(step, "applying");
              const result = yield* Effect.either(execute(step));
              return Either.match(result, {
                onLeft: (cause): Outcome => ({ status: "Failed", cause }),
                onRight: (): Outcome => ({ status: "Applied" }),
              });
            }),
          );
        }

        outcomes.set(step.id, outcome);
        if (outcome.status === "Failed") {
          yield* Effect.logWarning(`${step.id} failed: ${outcome.cause.message}`);
          yield* report(step, "failed", outcome.cause.message);
        } else if (outcome.status === "Blocked") {
          yield* report(step, "blocked", `blocked by ${outcome.blockedBy}`);
        } else if (outcome.status === "Skipped") {
          yield* report(step, "skipped");
        } else {
          yield* report(step, "applied");
        }
        yield* Deferred.succeed(signal, outcome);
      }).pipe(Effect.annotateLogs({ step: step.id }));

    // unchanged resources whose dependencies or category moved
    for (const change of Object.values(plan.changes)) {
      if (change.action === "noop" && change.refresh) {
        yield* commit(change.key, { ...change.state, ...change.refresh });
      }
    }

    yield* Effect.forEach(steps, (step) => report(step, "pending"), {
      discard: true,
    });
    yield* Effect.forEach(steps, run, {
      concurrency: "unbounded",
      discard: true,
    });

    return summarize(plan.changes, plan.steps, outcomes);
  }).pipe(Effect.withLogSpan("apply"));
