import * as Effect from "effect/Effect";
import { UnresolvedReference } from "./Errors.ts";
import { isRecord } from "./internal/util/data.ts";
import {
  isRef,
  key,
  type Ref,
  type ResourceDecl,
  type Value,
} from "./Resource.ts";

export interface FoundRef {
  ref: Ref;
  /** dotted attribute path, e.g. `subnets.0.vpcId` */
  path: string;
}

/**
 * Every reference inside an attribute tree, in document order.
 */
export const collect = (value: Value, path = ""): FoundRef[] => {
  if (isRef(value)) {
    return [{ ref: value, path }];
  } else if (Array.isArray(value)) {
    return value.flatMap((item, i) => collect(item, join(path, String(i))));
  } else if (isRecord(value)) {
    return Object.entries(value).flatMap(([k, v]) => collect(v, join(path, k)));
  }
  return [];
};

const join = (path: string, segment: string) =>
  path ? `${path}.${segment}` : segment;

/** `from` depends on `to` because of the attribute at `path` */
export interface ReferenceEdge {
  from: string;
  to: string;
  path: string;
}

/**
 * Turn the references of every resource into edges. A target must be declared
 * in the document or be one of the `externals` known to the state store.
 */
export const resolve = (
  resources: readonly ResourceDecl[],
  externals: ReadonlySet<string> = new Set(),
): Effect.Effect<ReferenceEdge[], UnresolvedReference> =>
  Effect.gen(function* () {
    const declared = new Set(resources.map(key));
    const edges: ReferenceEdge[] = [];
    for (const resource of resources) {
      const from = key(resource);
      for (const { ref, path } of collect(resource.attributes)) {
        const to = key(ref);
        if (declared.has(to)) {
          edges.push({ from, to, path });
        } else if (!externals.has(to)) {
          return yield* new UnresolvedReference({
            message: `${from} references ${to}.${ref.output} at '${path}' but ${to} is not declared`,
            from,
            to,
            path,
          });
        }
      }
    }
    return edges;
  });
