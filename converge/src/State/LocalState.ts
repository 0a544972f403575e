import type { PlatformError } from "@effect/platform/Error";
import * as FileSystem from "@effect/platform/FileSystem";
import * as Path from "@effect/platform/Path";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as ParseResult from "effect/ParseResult";
import * as Schema from "effect/Schema";
import { App } from "../App.ts";
import * as Config from "../Config.ts";
import { AddressSchema, AttributesSchema } from "../Document.ts";
import { StateStoreError } from "../Errors.ts";
import { keyedLock } from "./lock.ts";
import type { ResourceState } from "./ResourceState.ts";
import { State, type StateService } from "./State.ts";

const RetiringSchema = Schema.Struct({
  handle: Schema.String,
  outputs: AttributesSchema,
});

export const ResourceStateSchema = Schema.Struct({
  address: AddressSchema,
  category: Schema.String,
  attributes: AttributesSchema,
  outputs: AttributesSchema,
  handle: Schema.String,
  dependencies: Schema.mutable(Schema.Array(Schema.String)),
  external: Schema.optional(Schema.Boolean),
  retiring: Schema.optional(Schema.mutable(Schema.Array(RetiringSchema))),
});

const decodeEntry = Schema.decodeUnknown(Schema.parseJson(ResourceStateSchema));

/**
 * One JSON file per resource under `<stateDir>/<app>/<stage>/`. A write goes
 * to a temporary file that is renamed over the entry.
 */
export const LocalState = Layer.effect(
  State,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const app = yield* App;
    const dir = path.resolve(yield* Config.stateDir, app.name, app.stage);
    const locked = keyedLock();

    const fail = (err: PlatformError) =>
      Effect.fail(
        new StateStoreError({
          message: err.message,
        }),
      );

    const recover = <T>(effect: Effect.Effect<T, PlatformError>) =>
      effect.pipe(
        Effect.catchTag("SystemError", (e) =>
          e.reason === "NotFound" ? Effect.succeed(undefined) : fail(e),
        ),
        Effect.catchTag("BadArgument", fail),
      );

    const file = (key: string) =>
      path.join(dir, `${encodeURIComponent(key)}.json`);

    const ensure = yield* Effect.cachedFunction((dir: string) =>
      fs.makeDirectory(dir, { recursive: true }).pipe(recover),
    );

    const read = (key: string) =>
      fs.readFileString(file(key)).pipe(
        recover,
        Effect.flatMap((text) =>
          text === undefined
            ? Effect.succeed(undefined)
            : decodeEntry(text).pipe(
                Effect.mapError(
                  (error) =>
                    new StateStoreError({
                      message: `Corrupt state entry ${key}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
                    }),
                ),
              ),
        ),
      );

    const state: StateService = {
      load: () =>
        Effect.gen(function* () {
          const files = (yield* fs.readDirectory(dir).pipe(recover)) ?? [];
          const keys = files
            .filter((name) => name.endsWith(".json"))
            .map((name) => decodeURIComponent(name.slice(0, -".json".length)));
          const entries = new Map<string, ResourceState>();
          for (const key of keys) {
            const entry = yield* read(key);
            if (entry) {
              entries.set(key, entry);
            }
          }
          return entries;
        }),
      upsert: (key, entry) =>
        locked(
          key,
          Effect.gen(function* () {
            yield* ensure(dir);
            const target = file(key);
            const tmp = `${target}.tmp`;
            yield* fs
              .writeFileString(tmp, JSON.stringify(entry, null, 2))
              .pipe(Effect.zipRight(fs.rename(tmp, target)), recover);
            return entry;
          }),
        ),
      remove: (key) => locked(key, fs.remove(file(key)).pipe(recover, Effect.asVoid)),
    };
    return state;
  }),
);
