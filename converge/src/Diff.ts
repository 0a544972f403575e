import * as Effect from "effect/Effect";
import type { MissingProvider } from "./Errors.ts";
import type { Graph } from "./Graph.ts";
import { deepEqual, isRecord } from "./internal/util/data.ts";
import { Providers, type Handle } from "./Provider.ts";
import {
  categoryOf,
  isRef,
  key,
  type Address,
  type Attributes,
  type ResourceDecl,
  type Value,
} from "./Resource.ts";
import type { ResourceState } from "./State/ResourceState.ts";
import { unknown, type MaybeUnknown } from "./Unknown.ts";

/**
 * A provider's decision on how to apply a change.
 */
export type Verdict = NoopVerdict | UpdateVerdict | ReplaceVerdict;

export interface NoopVerdict {
  action: "noop";
}

export interface UpdateVerdict {
  action: "update";
}

export interface ReplaceVerdict {
  action: "replace";
}

export type Resolved = { readonly [key: string]: MaybeUnknown };

export type ChangeOperation = Create | Update | Replace | Delete | Noop;

export interface Create {
  action: "create";
  key: string;
  address: Address;
  resource: ResourceDecl;
  /** desired attributes as far as they are known before apply */
  news: Resolved;
}

export interface Update {
  action: "update";
  key: string;
  address: Address;
  resource: ResourceDecl;
  news: Resolved;
  state: ResourceState;
  changed: string[];
}

export interface Replace {
  action: "replace";
  key: string;
  address: Address;
  resource: ResourceDecl;
  news: Resolved;
  state: ResourceState;
  changed: string[];
  /** the instance deleted once the replacement and its dependents are applied */
  oldHandle: Handle;
}

export interface Delete {
  action: "delete";
  key: string;
  address: Address;
  state: ResourceState;
}

export interface Noop {
  action: "noop";
  key: string;
  address: Address;
  resource: ResourceDecl;
  state: ResourceState;
  /**
   * Set when the recorded dependencies or category no longer match the
   * document. Written to state without a provider call.
   */
  refresh?: Pick<ResourceState, "dependencies" | "category">;
}

export type ChangeSet = Record<string, ChangeOperation>;

/**
 * Compare the desired graph with recorded state. Resources are visited
 * dependencies first so a reference can be resolved from the recorded output
 * of a producer that is known not to change.
 */
export const diff = (
  graph: Graph,
  state: ReadonlyMap<string, ResourceState>,
): Effect.Effect<ChangeSet, MissingProvider, Providers> =>
  Effect.gen(function* () {
    const providers = yield* Providers;
    const changes: ChangeSet = {};

    const knownOutput = (ref: {
      kind: string;
      name: string;
      output: string;
    }): Effect.Effect<MaybeUnknown, MissingProvider> =>
      Effect.gen(function* () {
        const producer = key(ref);
        const recorded = state.get(producer);
        const change = changes[producer];
        if (!recorded) {
          return unknown;
        }
        const output = recorded.outputs[ref.output];
        if (output === undefined) {
          return unknown;
        }
        if (change === undefined || change.action === "noop") {
          // external resources are not part of the change set
          return output;
        }
        if (change.action === "update") {
          const provider = yield* providers.get(ref.kind);
          return provider.stables?.includes(ref.output) ? output : unknown;
        }
        return unknown;
      });

    const resolve = (value: Value): Effect.Effect<MaybeUnknown, MissingProvider> =>
      Effect.gen(function* () {
        if (isRef(value)) {
          return yield* knownOutput(value);
        } else if (Array.isArray(value)) {
          const items: MaybeUnknown[] = [];
          for (const item of value) {
            items.push(yield* resolve(item));
          }
          return items;
        } else if (isRecord(value)) {
          return yield* resolveAttributes(value);
        }
        return value;
      });

    const resolveAttributes = (
      attributes: Attributes,
    ): Effect.Effect<Resolved, MissingProvider> =>
      Effect.gen(function* () {
        const resolved: Record<string, MaybeUnknown> = {};
        for (const [name, value] of Object.entries(attributes)) {
          resolved[name] = yield* resolve(value);
        }
        return resolved;
      });

    for (const id of graph.topologicalOrder) {
      const resource = graph.nodes.get(id);
      if (!resource) {
        continue;
      }
      const provider = yield* providers.get(resource.kind);
      const news = yield* resolveAttributes(resource.attributes);
      const recorded = state.get(id);
      const address = { kind: resource.kind, name: resource.name };

      if (!recorded) {
        changes[id] = { action: "create", key: id, address, resource, news };
        continue;
      }

      const noop: Noop = {
        action: "noop",
        key: id,
        address,
        resource,
        state: recorded,
        refresh: refresh(recorded, resource, graph.dependencies(id)),
      };

      const changed = changedAttributes(recorded.attributes, news);
      if (changed.length === 0) {
        changes[id] = noop;
        continue;
      }

      const verdict = provider.diff
        ? yield* provider.diff({
            address,
            olds: recorded.attributes,
            news,
            outputs: recorded.outputs,
          })
        : undefined;

      const action =
        verdict?.action ??
        (changed.some((name) => provider.immutable?.includes(name))
          ? "replace"
          : "update");

      if (action === "noop") {
        changes[id] = noop;
      } else if (action === "replace") {
        changes[id] = {
          action: "replace",
          key: id,
          address,
          resource,
          news,
          state: recorded,
          changed,
          oldHandle: recorded.handle,
        };
      } else {
        changes[id] = {
          action: "update",
          key: id,
          address,
          resource,
          news,
          state: recorded,
          changed,
        };
      }
    }

    for (const [id, recorded] of state) {
      if (!graph.nodes.has(id) && !recorded.external) {
        // deletes need a provider too
        yield* providers.get(recorded.address.kind);
        changes[id] = {
          action: "delete",
          key: id,
          address: recorded.address,
          state: recorded,
        };
      }
    }

    return changes;
  });

const changedAttributes = (olds: Attributes, news: Resolved): string[] =>
  [...new Set([...Object.keys(olds), ...Object.keys(news)])].filter(
    (name) => !deepEqual(olds[name], news[name]),
  );

const refresh = (
  recorded: ResourceState,
  resource: ResourceDecl,
  dependencies: readonly string[],
): Noop["refresh"] => {
  const category = categoryOf(resource);
  const same =
    recorded.category === category &&
    recorded.dependencies.length === dependencies.length &&
    dependencies.every((dependency) =>
      recorded.dependencies.includes(dependency),
    );
  return same ? undefined : { dependencies: [...dependencies], category };
};
