import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import type { Verdict } from "./Diff.ts";
import { MissingProvider, type ProviderError } from "./Errors.ts";
import type { Address, Attributes } from "./Resource.ts";
import type { MaybeUnknown } from "./Unknown.ts";

/** Opaque identifier the provider assigns to a live resource. */
export type Handle = string;

export type Outputs = Attributes;

/**
 * Capability that manages every resource of one kind on a remote control
 * plane. The engine never looks past this interface.
 */
export interface ProviderService {
  readonly kind: string;
  /**
   * Attributes that cannot change in place. A change to any of them replaces
   * the resource.
   */
  readonly immutable?: readonly string[];
  /**
   * Outputs that keep their value across an in-place update, so dependents
   * referencing them do not change when this resource is updated.
   */
  readonly stables?: readonly string[];
  /**
   * Decide how a change is applied. `undefined` falls back to the
   * `immutable` attributes.
   */
  diff?(input: {
    address: Address;
    olds: Attributes;
    news: { readonly [key: string]: MaybeUnknown };
    outputs: Outputs;
  }): Effect.Effect<Verdict | undefined>;
  create(input: {
    address: Address;
    news: Attributes;
  }): Effect.Effect<{ handle: Handle; outputs: Outputs }, ProviderError>;
  update(input: {
    address: Address;
    handle: Handle;
    news: Attributes;
    olds: Attributes;
    outputs: Outputs;
  }): Effect.Effect<Outputs, ProviderError>;
  delete(input: {
    address: Address;
    handle: Handle;
    outputs: Outputs;
  }): Effect.Effect<void, ProviderError>;
}

export interface ProvidersService {
  get(kind: string): Effect.Effect<ProviderService, MissingProvider>;
}

export class Providers extends Context.Tag("Providers")<
  Providers,
  ProvidersService
>() {}

export const make = (
  providers: readonly ProviderService[],
): ProvidersService => {
  const byKind = new Map(providers.map((p) => [p.kind, p]));
  return {
    get: (kind) => {
      const provider = byKind.get(kind);
      return provider
        ? Effect.succeed(provider)
        : Effect.fail(
            new MissingProvider({
              message: `No provider registered for kind '${kind}'`,
              kind,
            }),
          );
    },
  };
};

export const layer = (...providers: ProviderService[]) =>
  Layer.succeed(Providers, make(providers));
