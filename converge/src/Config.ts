import * as Config from "effect/Config";
import * as Duration from "effect/Duration";

/** Maximum number of provider calls in flight at once. */
export const concurrency = Config.integer("CONVERGE_CONCURRENCY").pipe(
  Config.withDefault(8),
);

/** Upper bound on a single operation, retries included. */
export const operationTimeout = Config.duration(
  "CONVERGE_OPERATION_TIMEOUT",
).pipe(Config.withDefault(Duration.minutes(10)));

/** Retries after the first attempt for errors marked retryable. */
export const retryAttempts = Config.integer("CONVERGE_RETRY_ATTEMPTS").pipe(
  Config.withDefault(3),
);

/** Delay before the first retry, doubled on every attempt. */
export const retryDelay = Config.duration("CONVERGE_RETRY_DELAY").pipe(
  Config.withDefault(Duration.millis(200)),
);

export const stateDir = Config.string("CONVERGE_STATE_DIR").pipe(
  Config.withDefault(".converge/state"),
);
