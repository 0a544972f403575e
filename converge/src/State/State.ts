import * as Context from "effect/Context";
import type * as Effect from "effect/Effect";
import type { StateStoreError } from "../Errors.ts";
import type { ResourceState } from "./ResourceState.ts";

export interface StateService {
  /** Every recorded entry keyed by resource key (`kind.name`). */
  load(): Effect.Effect<ReadonlyMap<string, ResourceState>, StateStoreError>;
  upsert(
    key: string,
    entry: ResourceState,
  ): Effect.Effect<ResourceState, StateStoreError>;
  remove(key: string): Effect.Effect<void, StateStoreError>;
}

export class State extends Context.Tag("State")<State, StateService>() {}
