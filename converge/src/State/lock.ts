import * as Effect from "effect/Effect";

/**
 * One permit per key: writes for the same resource run one at a time, writes
 * for different resources never wait on each other.
 */
export const keyedLock = () => {
  const locks = new Map<string, Effect.Semaphore>();
  return <A, E, R>(
    key: string,
    effect: Effect.Effect<A, E, R>,
  ): Effect.Effect<A, E, R> =>
    Effect.suspend(() => {
      let lock = locks.get(key);
      if (!lock) {
        lock = Effect.unsafeMakeSemaphore(1);
        locks.set(key, lock);
      }
      return lock.withPermits(1)(effect);
    });
};
