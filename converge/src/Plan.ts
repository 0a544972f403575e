import * as Effect from "effect/Effect";
import { diff, type ChangeOperation, type ChangeSet } from "./Diff.ts";
import type { Document } from "./Document.ts";
import {
  InternalInvariantViolation,
  type MissingProvider,
  type StateStoreError,
} from "./Errors.ts";
import * as Graph from "./Graph.ts";
import type { Providers } from "./Provider.ts";
import type { ResourceState } from "./State/ResourceState.ts";
import { State } from "./State/State.ts";

/**
 * - `apply` creates, updates, or creates the replacement of a resource
 * - `delete` deletes a resource that is no longer declared
 * - `retire` deletes the old instance of a replaced resource
 */
export type Phase = "apply" | "delete" | "retire";

export interface Step {
  id: string;
  key: string;
  phase: Phase;
  /** ids of the steps that must complete before this one starts */
  after: string[];
}

export interface Plan {
  graph: Graph.Graph;
  /** recorded state the plan was computed against */
  state: ReadonlyMap<string, ResourceState>;
  changes: ChangeSet;
  steps: Record<string, Step>;
  /** steps grouped into rounds; steps of one round never depend on each other */
  batches: string[][];
}

export type PlanError =
  | Graph.GraphError
  | MissingProvider
  | StateStoreError
  | InternalInvariantViolation;

export const stepId = (phase: Phase, key: string) => `${phase}:${key}`;

/**
 * Load recorded state, build the dependency graph, diff and schedule.
 */
export const plan = (
  document: Document,
): Effect.Effect<Plan, PlanError, State | Providers> =>
  Effect.gen(function* () {
    const state = yield* State;
    const recorded = yield* state.load();
    const externals = new Set(
      [...recorded].filter(([, entry]) => entry.external).map(([id]) => id),
    );
    const graph = yield* Graph.build(document, externals);
    const changes = yield* diff(graph, recorded);
    const { steps, batches } = yield* schedule(graph, changes);
    yield* Effect.logDebug(
      `planned ${Object.keys(steps).length} steps in ${batches.length} batches`,
    );
    return { graph, state: recorded, changes, steps, batches };
  }).pipe(Effect.withLogSpan("plan"));

/**
 * Order the change set into steps and group them into concurrent batches.
 *
 * Creates and updates follow the dependency graph. Deletes follow it in
 * reverse, using the dependencies recorded when each resource was last
 * applied. The old instance of a replaced resource is retired only after the
 * replacement and every dependent have been applied. A retire or delete also
 * waits for the retire and delete steps of every recorded dependent, so an
 * instance is never removed while an old instance that referenced it remains.
 */
export const schedule = (
  graph: Graph.Graph,
  changes: ChangeSet,
): Effect.Effect<
  { steps: Record<string, Step>; batches: string[][] },
  InternalInvariantViolation
> =>
  Effect.suspend(() => {
    const steps: Record<string, Step> = {};
    const add = (phase: Phase, key: string) => {
      const id = stepId(phase, key);
      steps[id] = { id, key, phase, after: [] };
    };

    const operations = Object.values(changes);
    for (const change of operations) {
      if (
        change.action === "create" ||
        change.action === "update" ||
        change.action === "replace"
      ) {
        add("apply", change.key);
      }
      if (change.action === "delete") {
        add("delete", change.key);
      } else if (change.action === "replace" || hasRetiring(change)) {
        add("retire", change.key);
      }
    }

    const link = (id: string, after: string) => {
      const step = steps[id];
      if (step && after in steps && after !== id && !step.after.includes(after)) {
        step.after.push(after);
      }
    };

    // keys of recorded resources that depended on each key when last applied
    const recordedDependents = new Map<string, string[]>();
    for (const change of operations) {
      if (change.action !== "create") {
        for (const dependency of change.state.dependencies) {
          recordedDependents.set(dependency, [
            ...(recordedDependents.get(dependency) ?? []),
            change.key,
          ]);
        }
      }
    }

    for (const step of Object.values(steps)) {
      const { key } = step;
      if (step.phase === "apply") {
        for (const dependency of graph.dependencies(key)) {
          link(step.id, stepId("apply", dependency));
        }
      } else {
        if (step.phase === "retire") {
          link(step.id, stepId("apply", key));
          for (const dependent of graph.dependents(key)) {
            link(step.id, stepId("apply", dependent));
          }
        }
        // old instances that referenced this one go first
        for (const dependent of recordedDependents.get(key) ?? []) {
          link(step.id, stepId("apply", dependent));
          link(step.id, stepId("delete", dependent));
          link(step.id, stepId("retire", dependent));
        }
      }
    }

    return kahn(steps).pipe(Effect.map((batches) => ({ steps, batches })));
  });

const hasRetiring = (change: ChangeOperation) =>
  change.action !== "create" && (change.state.retiring?.length ?? 0) > 0;

/**
 * Kahn's algorithm: every round emits the whole zero in-degree frontier as one
 * batch, then releases the steps waiting on it.
 */
const kahn = (
  steps: Record<string, Step>,
): Effect.Effect<string[][], InternalInvariantViolation> => {
  const inDegree = new Map<string, number>();
  const waiting = new Map<string, string[]>();
  for (const step of Object.values(steps)) {
    inDegree.set(step.id, step.after.length);
    for (const before of step.after) {
      waiting.set(before, [...(waiting.get(before) ?? []), step.id]);
    }
  }

  const batches: string[][] = [];
  let frontier = [...inDegree].filter(([, n]) => n === 0).map(([id]) => id);
  while (frontier.length > 0) {
    batches.push(frontier);
    const next: string[] = [];
    for (const id of frontier) {
      inDegree.delete(id);
      for (const successor of waiting.get(id) ?? []) {
        const n = (inDegree.get(successor) ?? 0) - 1;
        inDegree.set(successor, n);
        if (n === 0) {
          next.push(successor);
        }
      }
    }
    frontier = next;
  }

  if (inDegree.size > 0) {
    return Effect.fail(
      new InternalInvariantViolation({
        message: `Scheduler found a residual cycle among ${inDegree.size} steps of an acyclic graph`,
        diagnostics: {
          remaining: Object.fromEntries(inDegree),
          steps: Object.fromEntries(
            [...inDegree.keys()].map((id) => [id, steps[id]?.after]),
          ),
          scheduled: batches,
        },
      }),
    );
  }
  return Effect.succeed(batches);
};

const symbols = {
  create: "+",
  update: "~",
  replace: "±",
  delete: "-",
} as const;

/**
 * Human readable summary, one line per change, unchanged resources omitted.
 */
export const format = (plan: Plan): string => {
  const lines: string[] = [];
  const counts = { create: 0, update: 0, replace: 0, delete: 0 };
  for (const change of Object.values(plan.changes)) {
    if (change.action === "noop") {
      continue;
    }
    counts[change.action]++;
    const detail =
      change.action === "update" || change.action === "replace"
        ? ` (${change.changed.join(", ")})`
        : "";
    lines.push(`${symbols[change.action]} ${change.action} ${change.key}${detail}`);
  }
  lines.push(
    `Plan: ${counts.create} to create, ${counts.update} to update, ${counts.replace} to replace, ${counts.delete} to delete.`,
  );
  return lines.join("\n");
};
