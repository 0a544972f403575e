import * as Effect from "effect/Effect";
import type { Document } from "./Document.ts";
import {
  AmbiguousOrdering,
  CyclicDependency,
  DuplicateIdentity,
  UnresolvedReference,
} from "./Errors.ts";
import * as Reference from "./Reference.ts";
import {
  categoryOf,
  isCategoryTarget,
  key,
  type ResourceDecl,
} from "./Resource.ts";

export type EdgeOrigin = "reference" | "hint";

/**
 * `from` depends on `to`: `to` must be applied before `from`.
 */
export interface Edge {
  from: string;
  to: string;
  origin: EdgeOrigin;
}

/**
 * Acyclic dependency graph over the resources of a document.
 */
export interface Graph {
  readonly nodes: ReadonlyMap<string, ResourceDecl>;
  readonly edges: readonly Edge[];
  /** dependencies first, ties broken by document order */
  readonly topologicalOrder: readonly string[];
  dependencies(key: string): readonly string[];
  dependents(key: string): readonly string[];
  transitiveDependents(key: string): ReadonlySet<string>;
}

export type GraphError =
  | DuplicateIdentity
  | UnresolvedReference
  | AmbiguousOrdering
  | CyclicDependency;

export const build = (
  document: Document,
  externals: ReadonlySet<string> = new Set(),
): Effect.Effect<Graph, GraphError> =>
  Effect.gen(function* () {
    const nodes = new Map<string, ResourceDecl>();
    for (const resource of document.resources) {
      const id = key(resource);
      if (nodes.has(id)) {
        return yield* new DuplicateIdentity({
          message: `Resource ${id} is declared more than once`,
          key: id,
        });
      }
      nodes.set(id, resource);
    }

    const references = yield* Reference.resolve(document.resources, externals);
    const hints = yield* hintEdges(document.resources, nodes);

    const edges: Edge[] = [];
    const seen = new Set<string>();
    const add = (edge: Edge) => {
      const id = `${edge.from}->${edge.to}`;
      if (edge.from !== edge.to && !seen.has(id)) {
        seen.add(id);
        edges.push(edge);
      }
    };
    const referenced = new Set<string>();
    for (const { from, to } of references) {
      referenced.add(`${from}->${to}`);
      add({ from, to, origin: "reference" });
    }
    for (const edge of hints) {
      if (referenced.has(`${edge.to}->${edge.from}`)) {
        return yield* new AmbiguousOrdering({
          message: `An ordering hint requires ${edge.to} before ${edge.from}, but ${edge.to} references ${edge.from}`,
          pair: [edge.to, edge.from],
        });
      }
      add(edge);
    }

    const dependencies = adjacency(nodes, edges, (e) => [e.from, e.to]);
    const dependents = adjacency(nodes, edges, (e) => [e.to, e.from]);

    yield* detectCycle(nodes, dependencies);

    return makeGraph(nodes, edges, dependencies, dependents);
  });

const hintEdges = (
  resources: readonly ResourceDecl[],
  nodes: ReadonlyMap<string, ResourceDecl>,
): Effect.Effect<Edge[], UnresolvedReference> =>
  Effect.gen(function* () {
    const edges: Edge[] = [];
    for (const resource of resources) {
      const id = key(resource);
      for (const hint of resource.hints ?? []) {
        const target = hint.before;
        if (isCategoryTarget(target)) {
          for (const [other, decl] of nodes) {
            if (other !== id && categoryOf(decl) === target.category) {
              edges.push({ from: other, to: id, origin: "hint" });
            }
          }
        } else {
          const other = key(target);
          if (!nodes.has(other)) {
            return yield* new UnresolvedReference({
              message: `${id} must be applied before ${other} but ${other} is not declared`,
              from: id,
              to: other,
              path: "hints",
            });
          }
          edges.push({ from: other, to: id, origin: "hint" });
        }
      }
      for (const dependency of resource.dependsOn ?? []) {
        const other = key(dependency);
        if (!nodes.has(other)) {
          return yield* new UnresolvedReference({
            message: `${id} depends on ${other} but ${other} is not declared`,
            from: id,
            to: other,
            path: "dependsOn",
          });
        }
        edges.push({ from: id, to: other, origin: "hint" });
      }
    }
    return edges;
  });

const adjacency = (
  nodes: ReadonlyMap<string, ResourceDecl>,
  edges: readonly Edge[],
  direction: (edge: Edge) => [string, string],
) => {
  const map = new Map<string, string[]>();
  for (const id of nodes.keys()) {
    map.set(id, []);
  }
  for (const edge of edges) {
    const [from, to] = direction(edge);
    map.get(from)?.push(to);
  }
  return map;
};

type Color = "white" | "grey" | "black";

interface Frame {
  id: string;
  /** index of the next dependency to visit */
  next: number;
}

/**
 * Depth-first search with a three-color marker. A grey node is still on the
 * stack, so reaching one again closes a cycle. Iterative, over an explicit
 * stack of frames.
 */
export const detectCycle = (
  nodes: ReadonlyMap<string, unknown>,
  dependencies: ReadonlyMap<string, readonly string[]>,
): Effect.Effect<void, CyclicDependency> =>
  Effect.suspend(() => {
    const color = new Map<string, Color>();

    const visit = (root: string): string[] | undefined => {
      const stack: Frame[] = [{ id: root, next: 0 }];
      color.set(root, "grey");
      for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
        const outgoing = dependencies.get(frame.id) ?? [];
        if (frame.next >= outgoing.length) {
          stack.pop();
          color.set(frame.id, "black");
          continue;
        }
        const next = outgoing[frame.next++];
        const c = color.get(next) ?? "white";
        if (c === "grey") {
          const path = stack.map(({ id }) => id);
          return [...path.slice(path.indexOf(next)), next];
        } else if (c === "white") {
          color.set(next, "grey");
          stack.push({ id: next, next: 0 });
        }
      }
      return undefined;
    };

    for (const id of nodes.keys()) {
      if ((color.get(id) ?? "white") === "white") {
        const cycle = visit(id);
        if (cycle) {
          return Effect.fail(
            new CyclicDependency({
              message: `Dependency cycle: ${cycle.join(" -> ")}`,
              cycle,
            }),
          );
        }
      }
    }
    return Effect.void;
  });

const makeGraph = (
  nodes: ReadonlyMap<string, ResourceDecl>,
  edges: readonly Edge[],
  dependencies: ReadonlyMap<string, readonly string[]>,
  dependents: ReadonlyMap<string, readonly string[]>,
): Graph => {
  // depth-first post-order over dependencies yields dependencies first
  const topologicalOrder: string[] = [];
  const done = new Set<string>();
  for (const root of nodes.keys()) {
    if (done.has(root)) continue;
    done.add(root);
    const stack: Frame[] = [{ id: root, next: 0 }];
    for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
      const outgoing = dependencies.get(frame.id) ?? [];
      if (frame.next >= outgoing.length) {
        stack.pop();
        topologicalOrder.push(frame.id);
        continue;
      }
      const dependency = outgoing[frame.next++];
      if (!done.has(dependency)) {
        done.add(dependency);
        stack.push({ id: dependency, next: 0 });
      }
    }
  }

  return {
    nodes,
    edges,
    topologicalOrder,
    dependencies: (id) => dependencies.get(id) ?? [],
    dependents: (id) => dependents.get(id) ?? [],
    transitiveDependents: (id) => {
      const found = new Set<string>();
      const queue = [...(dependents.get(id) ?? [])];
      while (queue.length > 0) {
        const next = queue.shift();
        if (next !== undefined && !found.has(next)) {
          found.add(next);
          queue.push(...(dependents.get(next) ?? []));
        }
      }
      return found;
    },
  };
};
