import assert from "node:assert/strict";
import test from "node:test";
import { createReconcilerContext, type ReconcileOptions, type ReconcilerContext } from "../rbac/context";
import { applyPlan, RemoteIdRegistry, type OperationResult } from "../rbac/executor";
import { defaultRoleDescription, type DesiredState } from "../rbac/model";
import type { ExecutionPlan } from "../rbac/plan";
import { planReconcile } from "../rbac/reconcile";
import type { ApplicationInput, ResourceInput } from "../lib/idp-client";
import type { RemoteApplication, RemoteResource } from "../types/provider-schema";
import { FakeIdentityProvider, providerError } from "./fake-idp";
import { application, desiredState, FAST_SETTINGS, resource, role } from "./helpers";

const systemsWithViewer = desiredState({
  resources: [resource("systems", ["read", "manage"])],
  userRoles: [role("user", "viewer", ["systems:read"])]
});

async function planned(
  fake: FakeIdentityProvider,
  desired: DesiredState,
  options: Partial<ReconcileOptions> = {},
  signal?: AbortSignal
): Promise<{ ctx: ReconcilerContext; plan: ExecutionPlan }> {
  const ctx = createReconcilerContext({ client: fake, options, settings: FAST_SETTINGS, ...(signal ? { signal } : {}) });
  const { plan } = await planReconcile(ctx, desired);
  return { ctx, plan };
}

function byRef(results: OperationResult[], ref: string): OperationResult | undefined {
  return results.find((r) => r.ref === ref);
}

test("applyPlan: converges an empty tenant", async () => {
  const fake = new FakeIdentityProvider();
  const { ctx, plan } = await planned(fake, systemsWithViewer);

  const outcome = await applyPlan(ctx, plan);

  assert.equal(outcome.cancelled, false);
  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status, r.attempts]),
    [
      ["resource:create:systems", "succeeded", 1],
      ["scope:create:systems:read", "succeeded", 1],
      ["scope:create:systems:manage", "succeeded", 1],
      ["userRole:create:viewer", "succeeded", 1],
      ["rolePermission:create:user:viewer", "succeeded", 1]
    ]
  );
  assert.deepEqual(fake.writes, ["createResource", "createScope", "createScope", "createUserRole", "assignUserRoleScopes"]);
  assert.deepEqual(fake.scopeNames("systems"), ["systems:read", "systems:manage"]);
  assert.deepEqual(fake.boundScopeNames("user", "viewer"), ["systems:read"]);
  assert.equal(byRef(outcome.results, "resource:create:systems")?.message, 'created resource "systems"');
});

test("applyPlan: transient failures are retried within the write budget", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("createResource", providerError("ServerError"), 2);
  const { ctx, plan } = await planned(fake, systemsWithViewer);

  const outcome = await applyPlan(ctx, plan);

  const created = byRef(outcome.results, "resource:create:systems");
  assert.equal(created?.status, "succeeded");
  assert.equal(created?.attempts, 3);
  assert.equal(fake.resources.size, 1);
});

test("applyPlan: exhausted retries fail the operation and skip its dependents", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("createResource", providerError("ServerError"), 3);
  const { ctx, plan } = await planned(fake, systemsWithViewer);

  const outcome = await applyPlan(ctx, plan);

  const failed = byRef(outcome.results, "resource:create:systems");
  assert.equal(failed?.status, "failed");
  assert.equal(failed?.attempts, 3);
  assert.equal(failed?.error?.kind, "ServerError");
  assert.equal(failed?.error?.transient, true);

  const scope = byRef(outcome.results, "scope:create:systems:read");
  assert.equal(scope?.status, "skipped");
  assert.equal(scope?.message, "prerequisite resource:create:systems did not succeed");

  assert.equal(byRef(outcome.results, "userRole:create:viewer")?.status, "succeeded");
  const binding = byRef(outcome.results, "rolePermission:create:user:viewer");
  assert.equal(binding?.status, "skipped");
  assert.equal(binding?.message, "prerequisite scope:create:systems:read did not succeed");

  assert.deepEqual(fake.writes, ["createResource", "createResource", "createResource", "createUserRole"]);
});

test("applyPlan: non-transient failures are not retried", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("createResource", providerError("Invalid"));
  const { ctx, plan } = await planned(fake, systemsWithViewer);

  const outcome = await applyPlan(ctx, plan);

  const failed = byRef(outcome.results, "resource:create:systems");
  assert.equal(failed?.status, "failed");
  assert.equal(failed?.attempts, 1);
  assert.equal(failed?.error?.transient, false);
  assert.equal(failed?.message, "fake failed: Invalid");
});

test("applyPlan: an authorization failure only blocks its dependents", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("createScope", providerError("Unauthorized"));
  const desired = desiredState({ ...systemsWithViewer, applications: [application("partner")] });
  const { ctx, plan } = await planned(fake, desired);

  const outcome = await applyPlan(ctx, plan);

  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status]),
    [
      ["resource:create:systems", "succeeded"],
      ["scope:create:systems:read", "failed"],
      ["scope:create:systems:manage", "succeeded"],
      ["userRole:create:viewer", "succeeded"],
      ["rolePermission:create:user:viewer", "skipped"],
      ["application:create:partner", "succeeded"]
    ]
  );
  assert.equal(byRef(outcome.results, "scope:create:systems:read")?.attempts, 1);
  assert.deepEqual(fake.writes, ["createResource", "createScope", "createScope", "createUserRole", "createThirdPartyApplication"]);
});

class FlakyBrandingProvider extends FakeIdentityProvider {
  private brandingFailures = 1;

  override async createThirdPartyApplication(input: ApplicationInput, onCreated?: (applicationId: string) => void): Promise<RemoteApplication> {
    const created = await super.createThirdPartyApplication(input, onCreated);
    if (this.brandingFailures > 0) {
      this.brandingFailures -= 1;
      throw providerError("ServerError", "applications.signInExperience.put");
    }
    return created;
  }
}

test("applyPlan: a retried application create updates the partial application", async () => {
  const fake = new FlakyBrandingProvider();
  const { ctx, plan } = await planned(fake, desiredState({ applications: [application("partner")] }));

  const outcome = await applyPlan(ctx, plan);

  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status, r.attempts]),
    [["application:create:partner", "succeeded", 2]]
  );
  assert.deepEqual(fake.writes, ["createThirdPartyApplication", "updateThirdPartyApplication"]);
  const apps = await fake.listThirdPartyApplications();
  assert.deepEqual(
    apps.map((a) => [a.id, a.name]),
    [[outcome.results[0]?.remoteId, "partner"]]
  );
});

test("applyPlan: a failed permission rewrite restores the role's bindings", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedResource({ name: "systems", scopes: ["systems:manage", "systems:read"] });
  fake.seedRole("user", {
    name: "editor",
    description: defaultRoleDescription("user", "editor", 0),
    scopes: ["systems:manage", "systems:read"]
  });
  fake.failNext("assignUserRoleScopes", providerError("Invalid"));
  const desired = desiredState({
    resources: [resource("systems", ["manage", "read"])],
    userRoles: [role("user", "editor", ["systems:read", "systems:manage"])]
  });
  const { ctx, plan } = await planned(fake, desired);

  const outcome = await applyPlan(ctx, plan);

  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status, r.attempts]),
    [["rolePermission:update:user:editor", "failed", 1]]
  );
  assert.deepEqual(fake.writes, ["removeUserRoleScope", "removeUserRoleScope", "assignUserRoleScopes", "assignUserRoleScopes"]);
  assert.deepEqual(fake.boundScopeNames("user", "editor"), ["systems:manage", "systems:read"]);
});

test("applyPlan: dry run simulates every operation without writing", async () => {
  const fake = new FakeIdentityProvider();
  const { ctx, plan } = await planned(fake, systemsWithViewer, { dryRun: true });

  const outcome = await applyPlan(ctx, plan);

  assert.equal(fake.mutationCount, 0);
  assert.equal(outcome.results.length, 5);
  assert.ok(outcome.results.every((r) => r.status === "succeeded" && r.simulated && r.attempts === 0));
  assert.equal(outcome.results[0]?.message, 'would create resource "systems"');
});

test("applyPlan: cancellation before the run starts nothing", async () => {
  const fake = new FakeIdentityProvider();
  const controller = new AbortController();
  const { ctx, plan } = await planned(fake, systemsWithViewer, {}, controller.signal);
  controller.abort();

  const outcome = await applyPlan(ctx, plan);

  assert.equal(outcome.cancelled, true);
  assert.deepEqual(outcome.results, []);
  assert.equal(fake.mutationCount, 0);
});

class CancellingProvider extends FakeIdentityProvider {
  constructor(private readonly controller: AbortController) {
    super();
  }

  override async createResource(input: ResourceInput): Promise<RemoteResource> {
    const created = await super.createResource(input);
    this.controller.abort();
    return created;
  }
}

test("applyPlan: cancellation mid-run lets in-flight work finish and starts nothing new", async () => {
  const controller = new AbortController();
  const fake = new CancellingProvider(controller);
  const { ctx, plan } = await planned(fake, systemsWithViewer, {}, controller.signal);

  const outcome = await applyPlan(ctx, plan);

  assert.equal(outcome.cancelled, true);
  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status]),
    [["resource:create:systems", "succeeded"]]
  );
  assert.deepEqual(fake.writes, ["createResource"]);
});

test("applyPlan: deleting an entity that is already gone succeeds", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedRole("user", { name: "legacy-role" });
  const { ctx, plan } = await planned(fake, desiredState(), { cleanup: true });
  fake.userRoles.clear();

  const outcome = await applyPlan(ctx, plan);

  assert.deepEqual(
    outcome.results.map((r) => [r.ref, r.status]),
    [["userRole:delete:legacy-role", "succeeded"]]
  );
  assert.deepEqual(fake.writes, ["deleteUserRole"]);
});

test("RemoteIdRegistry: lookups ignore key case and unknown ids throw", () => {
  const registry = new RemoteIdRegistry();
  registry.set("scope", "Systems:Read", "scope_9");

  assert.equal(registry.get("scope", "systems:read"), "scope_9");
  assert.equal(registry.get("organizationScope", "systems:read"), undefined);
  assert.throws(() => registry.require("resource", "systems"), /Remote id of resource "systems" is unknown/);
});
