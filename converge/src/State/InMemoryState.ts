import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { keyedLock } from "./lock.ts";
import type { ResourceState } from "./ResourceState.ts";
import { State, type StateService } from "./State.ts";

export const InMemory = (initialState: Record<string, ResourceState> = {}) =>
  Layer.sync(State, () => InMemoryService(initialState));

export const InMemoryService = (
  initialState: Record<string, ResourceState> = {},
) => {
  const state = new Map(Object.entries(initialState));
  const locked = keyedLock();
  return {
    load: () => Effect.sync(() => new Map(state)),
    upsert: (key: string, entry: ResourceState) =>
      locked(
        key,
        Effect.sync(() => {
          state.set(key, entry);
          return entry;
        }),
      ),
    remove: (key: string) =>
      locked(
        key,
        Effect.sync(() => {
          state.delete(key);
        }),
      ),
  } satisfies StateService;
};
