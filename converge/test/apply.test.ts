import { applyPlan, upstreamOutcome } from "@/Apply";
import { converge, convergeUnknown, destroy } from "@/Converge";
import { ProviderError, StateStoreError } from "@/Errors";
import type { ApplyEvent } from "@/Event";
import { plan } from "@/Plan";
import { Reporter } from "@/Reporter";
import { ref } from "@/Resource";
import { State } from "@/State/State";
import { test } from "@/test";
import { describe, expect, it } from "@effect/vitest";
import * as ConfigProvider from "effect/ConfigProvider";
import * as Deferred from "effect/Deferred";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { bucket, Cloud, scenario, TestLayers } from "./test.providers.ts";

const recorded = Effect.gen(function* () {
  const state = yield* State;
  return yield* state.load();
});

test(
  "converge the scenario and record every resource",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const result = yield* converge(scenario());
    expect(result).toMatchObject({
      exitCode: 0,
      report: {
        completed: ["VirtualNetwork.V", "Cluster.C", "Role.R", "NodePool.N"],
        failed: [],
        blocked: [],
        notAttempted: [],
        exitCode: 0,
      },
    });
    expect(cloud.log).toEqual([
      "create VirtualNetwork.V",
      "create Cluster.C",
      "create Role.R",
      "create NodePool.N",
    ]);

    const state = yield* recorded;
    expect(state.get("Cluster.C")).toEqual({
      address: { kind: "Cluster", name: "C" },
      category: "Cluster",
      attributes: { version: "1.29", network: "VirtualNetwork.V#1" },
      outputs: {
        id: "Cluster.C#1",
        name: "C",
        version: "1.29",
        oidc_provider: "oidc.example.com/C",
      },
      handle: "Cluster.C#1",
      dependencies: ["VirtualNetwork.V"],
      external: undefined,
      retiring: undefined,
    });
    expect(state.get("NodePool.N")).toMatchObject({
      category: "compute",
      attributes: { cluster: "C", instanceType: "m5.large" },
      dependencies: ["Cluster.C", "Role.R"],
    });
    expect(state.get("Role.R")?.attributes).toEqual({
      path: "/",
      issuer: "oidc.example.com/C",
    });
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a second run against the same document changes nothing",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge(scenario());
    const result = yield* converge(scenario());
    expect(result).toMatchObject({
      exitCode: 0,
      report: {
        completed: [],
        resources: {
          "VirtualNetwork.V": { status: "Unchanged" },
          "Cluster.C": { status: "Unchanged" },
          "Role.R": { status: "Unchanged" },
          "NodePool.N": { status: "Unchanged" },
        },
      },
    });
    expect(cloud.log).toHaveLength(4);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "changing the node pool instance type updates only the node pool",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge(scenario("m5.large"));
    const result = yield* converge(scenario("m5.xlarge"));
    expect(result).toMatchObject({
      exitCode: 0,
      report: { completed: ["NodePool.N"] },
    });
    expect(cloud.log.slice(4)).toEqual(["update NodePool.N"]);
    expect((yield* recorded).get("NodePool.N")).toMatchObject({
      handle: "NodePool.N#1",
      attributes: { cluster: "C", instanceType: "m5.xlarge" },
    });
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a failure blocks its dependents and leaves independent resources alone",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    cloud.fail("create", "Cluster.C");
    const document = {
      resources: [...scenario().resources, bucket("logs")],
    };
    const result = yield* converge(document);
    expect(result).toMatchObject({
      exitCode: 1,
      report: {
        completed: ["VirtualNetwork.V", "Bucket.logs"],
        failed: ["Cluster.C"],
        blocked: ["Role.R", "NodePool.N"],
        notAttempted: [],
        resources: {
          "Cluster.C": {
            status: "Failed",
            cause: { _tag: "ProviderError", retryable: false },
          },
          "Role.R": { status: "Blocked", blockedBy: "Cluster.C" },
          "NodePool.N": { status: "Blocked", blockedBy: "Cluster.C" },
        },
      },
    });
    expect(cloud.attempts.get("create Cluster.C")).toBe(1);
    expect(cloud.attempts.has("create Role.R")).toBe(false);
    expect([...(yield* recorded).keys()].sort()).toEqual([
      "Bucket.logs",
      "VirtualNetwork.V",
    ]);

    // the next run picks up where the failed one stopped
    cloud.faults.clear();
    const retry = yield* converge(document);
    expect(retry).toMatchObject({
      exitCode: 0,
      report: { completed: ["Cluster.C", "Role.R", "NodePool.N"] },
    });
    expect(cloud.attempts.get("create VirtualNetwork.V")).toBe(1);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "retry errors marked retryable",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    cloud.fail("create", "Bucket.a", { retryable: true, times: 2 });
    const result = yield* converge({ resources: [bucket("a")] });
    expect(result.exitCode).toBe(0);
    expect(cloud.attempts.get("create Bucket.a")).toBe(3);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "give up once the retry attempts are spent",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    cloud.fail("create", "Bucket.a", { retryable: true, times: 5 });
    const result = yield* converge(
      { resources: [bucket("a")] },
      { retryAttempts: 1 },
    );
    expect(result).toMatchObject({
      exitCode: 1,
      report: { failed: ["Bucket.a"] },
    });
    expect(cloud.attempts.get("create Bucket.a")).toBe(2);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "fail an operation that runs past its timeout",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    cloud.delay("Bucket.slow", "2 seconds");
    const result = yield* converge(
      { resources: [bucket("slow"), bucket("fast")] },
      { operationTimeout: "20 millis" },
    );
    expect(result).toMatchObject({
      exitCode: 1,
      report: {
        completed: ["Bucket.fast"],
        failed: ["Bucket.slow"],
        resources: {
          "Bucket.slow": {
            status: "Failed",
            cause: { _tag: "OperationTimeout", key: "Bucket.slow" },
          },
        },
      },
    });
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "never run more operations at once than the concurrency ceiling",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const names = ["a", "b", "c", "d", "e"];
    for (const name of names) {
      cloud.delay(`Bucket.${name}`, "20 millis");
    }
    const result = yield* converge(
      { resources: names.map((name) => bucket(name)) },
      { concurrency: 2 },
    );
    expect(result.exitCode).toBe(0);
    expect(cloud.peakInFlight).toBe(2);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a cancelled run starts nothing new and lets running calls finish",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const cancel = yield* Deferred.make<void>();
    // cancel as soon as the first operation starts
    const reporter = Layer.succeed(
      Reporter,
      Reporter.of({
        displayPlan: () => Effect.void,
        emit: (event) =>
          event.kind === "status-change" && event.status === "applying"
            ? Deferred.succeed(cancel, undefined).pipe(Effect.asVoid)
            : Effect.void,
      }),
    );
    const result = yield* converge(
      {
        resources: [
          bucket("a"),
          bucket("b", { source: ref("Bucket", "a", "name") }),
        ],
      },
      { cancel },
    ).pipe(Effect.provide(reporter));
    expect(result).toMatchObject({
      exitCode: 1,
      report: {
        completed: ["Bucket.a"],
        notAttempted: ["Bucket.b"],
      },
    });
    expect(cloud.log).toEqual(["create Bucket.a"]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "replace creates the new instance before deleting the old one",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge(scenario());
    const result = yield* converge({
      resources: scenario().resources.map((resource) =>
        resource.kind === "VirtualNetwork"
          ? { ...resource, attributes: { cidr: "10.2.0.0/16" } }
          : resource,
      ),
    });
    expect(result.exitCode).toBe(0);

    const log = cloud.log.slice(4);
    const at = (entry: string) => log.indexOf(entry);
    expect(log).toHaveLength(6);
    expect(at("create VirtualNetwork.V")).toBeLessThan(at("create Cluster.C"));
    expect(at("create Cluster.C")).toBeLessThan(at("delete VirtualNetwork.V"));
    expect(at("update Role.R")).toBeLessThan(at("delete Cluster.C"));
    expect(at("update NodePool.N")).toBeLessThan(at("delete Cluster.C"));
    expect(at("delete Cluster.C")).toBeLessThan(at("delete VirtualNetwork.V"));

    expect([...cloud.live.keys()].sort()).toEqual([
      "Cluster.C#2",
      "NodePool.N#1",
      "Role.R#1",
      "VirtualNetwork.V#2",
    ]);
    const state = yield* recorded;
    expect(state.get("VirtualNetwork.V")).toMatchObject({
      handle: "VirtualNetwork.V#2",
      attributes: { cidr: "10.2.0.0/16" },
    });
    expect(state.get("VirtualNetwork.V")?.retiring).toBeUndefined();
    expect(state.get("Cluster.C")?.attributes.network).toEqual(
      "VirtualNetwork.V#2",
    );
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "keep the old instance recorded when a replacement's dependent fails",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({
      resources: [
        bucket("a", { region: "eu" }),
        bucket("b", { source: ref("Bucket", "a", "id") }),
      ],
    });
    cloud.fail("update", "Bucket.b");
    const result = yield* converge({
      resources: [
        bucket("a", { region: "us" }),
        bucket("b", { source: ref("Bucket", "a", "id") }),
      ],
    });
    expect(result).toMatchObject({
      exitCode: 1,
      report: {
        failed: ["Bucket.b"],
        blocked: ["Bucket.a"],
      },
    });
    expect((yield* recorded).get("Bucket.a")).toMatchObject({
      handle: "Bucket.a#2",
      retiring: [{ handle: "Bucket.a#1" }],
    });
    expect(cloud.live.has("Bucket.a#1")).toBe(true);

    cloud.faults.clear();
    const next = yield* converge({
      resources: [
        bucket("a", { region: "us" }),
        bucket("b", { source: ref("Bucket", "a", "id") }),
      ],
    });
    expect(next.exitCode).toBe(0);
    expect(cloud.live.has("Bucket.a#1")).toBe(false);
    expect((yield* recorded).get("Bucket.a")?.retiring).toBeUndefined();
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "fail an operation whose reference names a missing output",
  Effect.gen(function* () {
    const result = yield* converge({
      resources: [
        bucket("a"),
        bucket("b", { source: ref("Bucket", "a", "arn") }),
      ],
    });
    expect(result).toMatchObject({
      exitCode: 1,
      report: {
        resources: {
          "Bucket.b": {
            status: "Failed",
            cause: { _tag: "MissingOutput", key: "Bucket.a", output: "arn" },
          },
        },
      },
    });
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "destroy deletes dependents before their dependencies",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge(scenario());
    const result = yield* destroy();
    expect(result).toMatchObject({
      exitCode: 0,
      report: {
        completed: ["VirtualNetwork.V", "Cluster.C", "Role.R", "NodePool.N"],
      },
    });
    expect(cloud.log.slice(4)).toEqual([
      "delete NodePool.N",
      "delete Role.R",
      "delete Cluster.C",
      "delete VirtualNetwork.V",
    ]);
    expect(cloud.live.size).toBe(0);
    expect((yield* recorded).size).toBe(0);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "destroy keeps external resources",
  {
    state: {
      "VirtualNetwork.shared": {
        address: { kind: "VirtualNetwork", name: "shared" },
        category: "VirtualNetwork",
        attributes: {},
        outputs: { id: "vpc-shared" },
        handle: "vpc-shared",
        dependencies: [],
        external: true,
      },
    },
  },
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({
      resources: [
        {
          kind: "Cluster",
          name: "C",
          attributes: { network: ref("VirtualNetwork", "shared", "id") },
        },
      ],
    });
    expect((yield* recorded).get("Cluster.C")?.attributes).toEqual({
      network: "vpc-shared",
    });
    yield* destroy();
    expect(cloud.log).toEqual(["create Cluster.C", "delete Cluster.C"]);
    expect([...(yield* recorded).keys()]).toEqual(["VirtualNetwork.shared"]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a cycle ends the run before any provider call",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const result = yield* converge({
      resources: [
        bucket("a", { peer: ref("Bucket", "b", "id") }),
        bucket("b", { peer: ref("Bucket", "a", "id") }),
      ],
    });
    expect(result).toMatchObject({
      exitCode: 2,
      error: { _tag: "CyclicDependency" },
    });
    expect(cloud.attempts.size).toBe(0);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a malformed document ends the run as a planning error",
  Effect.gen(function* () {
    const result = yield* convergeUnknown({
      resources: [{ kind: "Bucket", name: 7, attributes: {} }],
    });
    expect(result).toMatchObject({
      exitCode: 2,
      error: { _tag: "InvalidDocument" },
    });
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "report every status change of a step",
  Effect.gen(function* () {
    const events: ApplyEvent[] = [];
    const reporter = Layer.succeed(
      Reporter,
      Reporter.of({
        displayPlan: () => Effect.void,
        emit: (event) =>
          Effect.sync(() => {
            events.push(event);
          }),
      }),
    );
    const planned = yield* plan({ resources: [bucket("a")] });
    yield* applyPlan(planned).pipe(Effect.provide(reporter));
    expect(events).toEqual([
      { kind: "status-change", id: "apply:Bucket.a", key: "Bucket.a", status: "pending", message: undefined },
      { kind: "status-change", id: "apply:Bucket.a", key: "Bucket.a", status: "applying", message: undefined },
      { kind: "status-change", id: "apply:Bucket.a", key: "Bucket.a", status: "applied", message: undefined },
    ]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "retire a replaced dependent before the replaced instance it referenced",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({
      resources: [
        bucket("a", { region: "eu" }),
        bucket("b", { region: "eu", source: ref("Bucket", "a", "id") }),
      ],
    });
    cloud.delay("Bucket.b", "20 millis");
    const moved = {
      resources: [
        bucket("a", { region: "us" }),
        bucket("b", { region: "us", source: ref("Bucket", "a", "id") }),
      ],
    };
    const planned = yield* plan(moved);
    expect(planned.batches).toEqual([
      ["apply:Bucket.a"],
      ["apply:Bucket.b"],
      ["retire:Bucket.b"],
      ["retire:Bucket.a"],
    ]);

    const result = yield* converge(moved);
    expect(result.exitCode).toBe(0);
    expect(cloud.log.slice(2)).toEqual([
      "create Bucket.a",
      "create Bucket.b",
      "delete Bucket.b",
      "delete Bucket.a",
    ]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "delete a dependency only after the replaced instance that referenced it",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({
      resources: [bucket("a", { source: ref("Bucket", "b", "id") }), bucket("b")],
    });
    const document = { resources: [bucket("a", { region: "us" })] };
    const planned = yield* plan(document);
    expect(planned.batches).toEqual([
      ["apply:Bucket.a"],
      ["retire:Bucket.a"],
      ["delete:Bucket.b"],
    ]);

    const result = yield* converge(document);
    expect(result.exitCode).toBe(0);
    expect(cloud.log.slice(2)).toEqual([
      "create Bucket.a",
      "delete Bucket.a",
      "delete Bucket.b",
    ]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "record a new dependency of an unchanged resource without calling its provider",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({ resources: [bucket("b"), bucket("a")] });
    const document = {
      resources: [
        bucket("b"),
        { ...bucket("a"), dependsOn: [{ kind: "Bucket", name: "b" }] },
      ],
    };
    const planned = yield* plan(document);
    expect(planned.changes["Bucket.a"]).toMatchObject({
      action: "noop",
      refresh: { dependencies: ["Bucket.b"], category: "Bucket" },
    });
    const unchanged = planned.changes["Bucket.b"];
    expect(unchanged.action === "noop" && unchanged.refresh).toBeUndefined();

    const result = yield* converge(document);
    expect(result).toMatchObject({ exitCode: 0, report: { completed: [] } });
    expect(cloud.log).toHaveLength(2);
    expect((yield* recorded).get("Bucket.a")?.dependencies).toEqual([
      "Bucket.b",
    ]);

    const teardown = yield* plan({ resources: [] });
    expect(teardown.batches).toEqual([
      ["delete:Bucket.a"],
      ["delete:Bucket.b"],
    ]);
    yield* destroy();
    expect(cloud.log.slice(2)).toEqual(["delete Bucket.a", "delete Bucket.b"]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "annotate retried attempts and retired instances",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    yield* converge({ resources: [bucket("a", { region: "eu" })] });
    cloud.fail("create", "Bucket.a", { retryable: true, times: 1 });

    const events: ApplyEvent[] = [];
    const reporter = Layer.succeed(
      Reporter,
      Reporter.of({
        displayPlan: () => Effect.void,
        emit: (event) =>
          Effect.sync(() => {
            events.push(event);
          }),
      }),
    );
    const result = yield* converge({
      resources: [bucket("a", { region: "us" })],
    }).pipe(Effect.provide(reporter));
    expect(result.exitCode).toBe(0);
    expect(events.filter((event) => event.kind === "annotate")).toEqual([
      {
        kind: "annotate",
        id: "apply:Bucket.a",
        message: "attempt 1 failed: create Bucket.a rejected",
      },
      {
        kind: "annotate",
        id: "retire:Bucket.a",
        message: "retired Bucket.a#1",
      },
    ]);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "a state store that cannot be loaded ends the run as a planning error",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const broken = Layer.succeed(
      State,
      State.of({
        load: () =>
          Effect.fail(new StateStoreError({ message: "state unavailable" })),
        upsert: (_, entry) => Effect.succeed(entry),
        remove: () => Effect.void,
      }),
    );
    const result = yield* converge({ resources: [bucket("a")] }).pipe(
      Effect.provide(broken),
    );
    expect(result).toMatchObject({
      exitCode: 2,
      error: { _tag: "StateStoreError", message: "state unavailable" },
    });
    expect(cloud.attempts.size).toBe(0);
  }).pipe(Effect.provide(TestLayers)),
);

test(
  "an unreadable setting ends the run as a planning error",
  Effect.gen(function* () {
    const cloud = yield* Cloud;
    const result = yield* converge({ resources: [bucket("a")] }).pipe(
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map([["CONVERGE_CONCURRENCY", "many"]])),
      ),
    );
    expect(result).toMatchObject({
      exitCode: 2,
      error: { _tag: "InvalidSetting" },
    });
    expect(cloud.attempts.size).toBe(0);
  }).pipe(Effect.provide(TestLayers)),
);

describe("upstreamOutcome", () => {
  const rejected = new ProviderError({ message: "rejected", retryable: false });

  it("blocks on a failure even when an earlier upstream step was skipped", () => {
    expect(
      upstreamOutcome([
        { key: "Bucket.a", outcome: { status: "Skipped" } },
        { key: "Bucket.b", outcome: { status: "Failed", cause: rejected } },
      ]),
    ).toEqual({ status: "Blocked", blockedBy: "Bucket.b" });
  });

  it("keeps the root of an upstream block", () => {
    expect(
      upstreamOutcome([
        { key: "Bucket.a", outcome: { status: "Skipped" } },
        {
          key: "Bucket.b",
          outcome: { status: "Blocked", blockedBy: "Bucket.c" },
        },
      ]),
    ).toEqual({ status: "Blocked", blockedBy: "Bucket.c" });
  });

  it("skips when nothing upstream failed", () => {
    expect(
      upstreamOutcome([
        { key: "Bucket.a", outcome: { status: "Applied" } },
        { key: "Bucket.b", outcome: { status: "Skipped" } },
      ]),
    ).toEqual({ status: "Skipped" });
    expect(
      upstreamOutcome([{ key: "Bucket.a", outcome: { status: "Applied" } }]),
    ).toBeUndefined();
  });
});
