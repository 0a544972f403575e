import { it } from "@effect/vitest";
import * as ConfigProvider from "effect/ConfigProvider";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Logger from "effect/Logger";
import * as LogLevel from "effect/LogLevel";
import { logReporter, type Reporter } from "./Reporter.ts";
import { InMemory } from "./State/InMemoryState.ts";
import type { ResourceState } from "./State/ResourceState.ts";
import type { State } from "./State/State.ts";

type Provided = State | Reporter;

export interface TestOptions {
  timeout?: number;
  /** recorded state the in-memory store starts with */
  state?: Record<string, ResourceState>;
}

export function test<E>(
  name: string,
  options: TestOptions,
  testCase: Effect.Effect<void, E, Provided>,
): void;

export function test<E>(
  name: string,
  testCase: Effect.Effect<void, E, Provided>,
): void;

export function test<E>(
  name: string,
  ...args:
    | [TestOptions, Effect.Effect<void, E, Provided>]
    | [Effect.Effect<void, E, Provided>]
) {
  const [options, testCase]: [TestOptions, Effect.Effect<void, E, Provided>] =
    args.length === 1 ? [{}, args[0]] : args;

  // retries and timeouts run on the real clock, keep them short
  const configProvider = ConfigProvider.orElse(
    ConfigProvider.fromMap(
      new Map([
        ["CONVERGE_RETRY_DELAY", "1 millis"],
        ["CONVERGE_OPERATION_TIMEOUT", "5 seconds"],
      ]),
    ),
    ConfigProvider.fromEnv,
  );

  return it.live(
    name,
    () =>
      testCase.pipe(
        Effect.provide(Layer.mergeAll(InMemory(options.state), logReporter)),
        Effect.withConfigProvider(configProvider),
        Logger.withMinimumLogLevel(
          process.env.DEBUG ? LogLevel.Debug : LogLevel.Warning,
        ),
      ),
    options.timeout,
  );
}
