import assert from "node:assert/strict";
import test from "node:test";
import { StateLoadError, ValidationError } from "../lib/errors";
import { fingerprintDesiredState } from "../rbac/hash";
import { defaultRoleDescription, type DesiredState } from "../rbac/model";
import { reconcile, type ReconcileDeps, type RunState } from "../rbac/reconcile";
import { FakeIdentityProvider, providerError } from "./fake-idp";
import { application, desiredState, FAST_SETTINGS, resource, role } from "./helpers";

const systemsWithViewer = desiredState({
  resources: [resource("systems", ["read", "manage"])],
  userRoles: [role("user", "viewer", ["systems:read"])]
});

function deps(fake: FakeIdentityProvider, extra: Partial<ReconcileDeps> = {}): ReconcileDeps {
  return { client: fake, settings: FAST_SETTINGS, ...extra };
}

test("reconcile: converges an empty tenant and a second run writes nothing", async () => {
  const fake = new FakeIdentityProvider();

  const first = await reconcile(systemsWithViewer, {}, deps(fake));
  assert.equal(first.success, true);
  assert.equal(first.status, "reported");
  assert.equal(first.counts.resource.create, 1);
  assert.equal(first.counts.scope.create, 2);
  assert.equal(first.counts.userRole.create, 1);
  assert.equal(first.counts.rolePermission.create, 1);
  assert.equal(fake.mutationCount, 5);

  const second = await reconcile(systemsWithViewer, {}, deps(fake));
  assert.equal(second.success, true);
  assert.deepEqual(second.operations, []);
  assert.equal(second.counts.scope.unchanged, 2);
  assert.equal(second.counts.rolePermission.unchanged, 1);
  assert.equal(fake.mutationCount, 5);
});

test("reconcile: a new action on an existing resource adds one scope", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedResource({ name: "systems", scopes: ["systems:read"] });

  const report = await reconcile(desiredState({ resources: [resource("systems", ["read", "manage"])] }), {}, deps(fake));

  assert.deepEqual(fake.writes, ["createScope"]);
  assert.deepEqual(fake.scopeNames("systems"), ["systems:read", "systems:manage"]);
  assert.equal(report.counts.resource.unchanged, 1);
  assert.equal(report.counts.scope.create, 1);
});

test("reconcile: extra remote roles are only reported while cleanup is disabled", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedRole("user", { name: "legacy-role" });

  const report = await reconcile(desiredState(), {}, deps(fake));

  assert.deepEqual(report.wouldRemove, [
    { entityType: "userRole", key: "legacy-role", reason: "would be removed if cleanup were enabled" }
  ]);
  assert.equal(fake.mutationCount, 0);
  assert.ok(fake.roleByName("user", "legacy-role"));
});

test("reconcile: cleanup deletes extra remote roles", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedRole("user", { name: "legacy-role" });

  const report = await reconcile(desiredState(), { cleanup: true }, deps(fake));

  assert.deepEqual(fake.writes, ["deleteUserRole"]);
  assert.equal(report.counts.userRole.delete, 1);
  assert.equal(fake.roleByName("user", "legacy-role"), undefined);
});

test("reconcile: cleanup never touches the management API resource", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedResource({ name: "Logto Management API", scopes: ["all"] });

  const report = await reconcile(desiredState(), { cleanup: true }, deps(fake));

  assert.equal(fake.mutationCount, 0);
  assert.deepEqual(report.protected, [
    { entityType: "resource", key: "Logto Management API", reason: "reserved management API resource" },
    { entityType: "scope", key: "Logto Management API:all", reason: "belongs to a protected resource" }
  ]);
  assert.equal(report.counts.resource.protected, 1);
  assert.equal(report.counts.scope.protected, 1);
  assert.equal(report.success, true);
});

test("reconcile: protected names from the desired state are honored", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedRole("user", { name: "Billing" });
  const desired = desiredState({
    protectedNames: { resources: [], scopes: [], organizationScopes: [], organizationRoles: [], userRoles: ["billing"], applications: [] }
  });

  const report = await reconcile(desired, { cleanup: true }, deps(fake));

  assert.equal(fake.mutationCount, 0);
  assert.deepEqual(report.protected, [{ entityType: "userRole", key: "Billing", reason: "listed in policy.protected_names" }]);
});

test("reconcile: bindings are rewritten to restore declaration order", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedResource({ name: "systems", scopes: ["systems:read", "systems:manage"] });
  fake.seedRole("user", {
    name: "editor",
    description: defaultRoleDescription("user", "editor", 0),
    scopes: ["systems:manage", "systems:read"]
  });
  const desired = desiredState({
    resources: [resource("systems", ["read", "manage"])],
    userRoles: [role("user", "editor", ["systems:read", "systems:manage"])]
  });

  await reconcile(desired, {}, deps(fake));

  assert.deepEqual(fake.writes, ["removeUserRoleScope", "removeUserRoleScope", "assignUserRoleScopes"]);
  assert.deepEqual(fake.boundScopeNames("user", "editor"), ["systems:read", "systems:manage"]);
});

test("reconcile: order-insensitive comparison leaves reordered bindings alone", async () => {
  const fake = new FakeIdentityProvider();
  fake.seedResource({ name: "systems", scopes: ["systems:read", "systems:manage"] });
  fake.seedRole("user", {
    name: "editor",
    description: defaultRoleDescription("user", "editor", 0),
    scopes: ["systems:manage", "systems:read"]
  });
  const desired = desiredState({
    resources: [resource("systems", ["read", "manage"])],
    userRoles: [role("user", "editor", ["systems:read", "systems:manage"])]
  });

  const report = await reconcile(desired, {}, deps(fake, { settings: { ...FAST_SETTINGS, permissionOrder: "set" } }));

  assert.equal(fake.mutationCount, 0);
  assert.equal(report.counts.rolePermission.unchanged, 1);
});

test("reconcile: applications and their access control converge", async () => {
  const fake = new FakeIdentityProvider();
  const desired = desiredState({
    userRoles: [role("user", "viewer", [])],
    applications: [application("partner", { accessControl: { organizationRoles: [], userRoles: ["viewer"] } })]
  });

  await reconcile(desired, {}, deps(fake));
  assert.deepEqual(fake.writes, ["createUserRole", "createThirdPartyApplication", "setApplicationAccessControl"]);
  assert.deepEqual([...fake.applications.values()][0]?.accessControl, { organizationRoles: [], userRoles: ["viewer"] });

  const second = await reconcile(desired, {}, deps(fake));
  assert.equal(fake.mutationCount, 3);
  assert.equal(second.counts.application.unchanged, 1);
  assert.equal(second.counts.applicationAccess.unchanged, 1);
});

const invalid: DesiredState = desiredState({ userRoles: [role("user", "viewer", ["missing:read"])] });

test("reconcile: invalid desired state fails before any remote call", async () => {
  const fake = new FakeIdentityProvider();
  const states: RunState[] = [];

  await assert.rejects(
    reconcile(invalid, {}, deps(fake, { onStateChange: (s) => states.push(s) })),
    (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.issues, [
        {
          path: "userRoles.viewer.permissions",
          message: 'permission "missing:read" does not match any resource action (expected "<resource>:<action>")'
        }
      ]);
      return true;
    }
  );
  assert.deepEqual(states, ["aborted"]);
  assert.deepEqual(fake.reads, []);
});

test("reconcile: force turns validation issues into warnings", async () => {
  const fake = new FakeIdentityProvider();

  const report = await reconcile(invalid, { force: true }, deps(fake));

  assert.deepEqual(report.warnings, [
    'validation ignored (force): userRoles.viewer.permissions: permission "missing:read" does not match any resource action (expected "<resource>:<action>")'
  ]);
  assert.deepEqual(report.skipped, [
    { entityType: "rolePermission", key: "user:viewer->missing:read", reason: 'scope "missing:read" does not exist and is not planned' }
  ]);
  assert.deepEqual(fake.writes, ["createUserRole"]);
  assert.equal(report.success, true);
});

test("reconcile: unreadable remote state aborts without writing", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("listResources", providerError("Unauthorized"));
  const states: RunState[] = [];

  await assert.rejects(reconcile(systemsWithViewer, {}, deps(fake, { onStateChange: (s) => states.push(s) })), (err: unknown) => {
    assert.ok(err instanceof StateLoadError);
    assert.equal(err.category, "resources");
    assert.equal(err.message, "Failed to load remote resources: fake failed: Unauthorized");
    return true;
  });
  assert.deepEqual(states, ["validated", "aborted"]);
  assert.equal(fake.mutationCount, 0);
});

test("reconcile: transient read failures are retried", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("listResources", providerError("RateLimited"), 4);

  const report = await reconcile(systemsWithViewer, {}, deps(fake));

  assert.equal(report.success, true);
  assert.equal(fake.reads.filter((r) => r === "listResources").length, 5);
});

test("reconcile: walks every run state and stamps the report", async () => {
  const fake = new FakeIdentityProvider();
  const states: RunState[] = [];
  const at = new Date("2026-01-02T03:04:05.000Z");

  const report = await reconcile(
    systemsWithViewer,
    { dryRun: true },
    deps(fake, { runId: "run-1", now: () => at, onStateChange: (s) => states.push(s) })
  );

  assert.deepEqual(states, ["validated", "stateLoaded", "diffed", "guarded", "ordered", "applying", "reported"]);
  assert.equal(report.runId, "run-1");
  assert.equal(report.startedAt, "2026-01-02T03:04:05.000Z");
  assert.equal(report.durationMs, 0);
  assert.equal(report.dryRun, true);
  assert.equal(report.desiredHash, fingerprintDesiredState(systemsWithViewer));
  assert.equal(fake.mutationCount, 0);
});

test("reconcile: a failed write makes the run unsuccessful", async () => {
  const fake = new FakeIdentityProvider();
  fake.failNext("createUserRole", providerError("Conflict"));

  const report = await reconcile(desiredState({ userRoles: [role("user", "viewer", [])] }), {}, deps(fake));

  assert.equal(report.success, false);
  assert.equal(report.counts.userRole.failed, 1);
  assert.deepEqual(report.errors, [
    { ref: "userRole:create:viewer", kind: "Conflict", message: "userRole:create:viewer: fake failed: Conflict", transient: false, attempts: 1 }
  ]);
});

test("reconcile: dry run reports the same counts and operations as a live run", async () => {
  const seeded = (): FakeIdentityProvider => {
    const fake = new FakeIdentityProvider();
    fake.seedResource({ name: "systems", scopes: ["systems:read"] });
    fake.seedRole("user", { name: "viewer", description: defaultRoleDescription("user", "viewer", 0), scopes: ["systems:read"] });
    fake.seedRole("user", { name: "legacy-role" });
    return fake;
  };
  const desired = desiredState({
    resources: [resource("systems", ["read", "manage"])],
    organizationRoles: [role("org", "auditor", ["reports:read"])],
    userRoles: [role("user", "viewer", ["systems:read", "systems:manage"])]
  });
  const dryFake = seeded();
  const liveFake = seeded();

  const dry = await reconcile(desired, { dryRun: true, cleanup: true }, deps(dryFake));
  const live = await reconcile(desired, { cleanup: true }, deps(liveFake));

  assert.equal(dryFake.mutationCount, 0);
  assert.equal(live.success, true);
  assert.ok(live.operations.length > 0);
  assert.deepEqual(dry.counts, live.counts);
  assert.deepEqual(
    dry.operations.map((o) => o.ref),
    live.operations.map((o) => o.ref)
  );
});
