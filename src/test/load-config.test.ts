import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { ValidationError } from "../lib/errors";
import { loadDesiredState, loadRbacConfig, mergeConfigParts } from "../rbac/load-config";
import { fixturePath, TEST_API_BASE } from "./helpers";

async function withTmpDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const tmpDir = await fs.mkdtemp(path.join(process.cwd(), ".tmp-rbac-config-"));
  try {
    await fn(tmpDir);
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

test("loadRbacConfig: supports YAML + JSON overlays (merge by natural key)", async () => {
  await withTmpDir(async (tmpDir) => {
    const basePath = path.join(tmpDir, "base.yml");
    const overlayPath = path.join(tmpDir, "overlay.json");

    await fs.writeFile(
      basePath,
      [
        "metadata:",
        "  name: platform",
        "policy:",
        "  protected_names:",
        "    user_roles: [billing]",
        "hierarchy:",
        "  resources:",
        "    - name: systems",
        "      actions: [read]",
        "  user_roles:",
        "    - id: viewer",
        "      name: Viewer",
        "      priority: 1",
        "      permissions:",
        "        - id: systems:read"
      ].join("\n"),
      "utf-8"
    );

    await fs.writeFile(
      overlayPath,
      JSON.stringify(
        {
          policy: { protected_names: { user_roles: ["Support"] } },
          hierarchy: {
            resources: [
              { name: "Systems", actions: ["read", "manage"] },
              { name: "reports", actions: ["read"] }
            ]
          }
        },
        null,
        2
      ),
      "utf-8"
    );

    const config = await loadRbacConfig(`${basePath},${overlayPath}`);

    assert.equal(config.metadata.name, "platform");
    assert.deepEqual(
      config.hierarchy.resources.map((r) => [r.name, r.actions]),
      [
        ["Systems", ["read", "manage"]],
        ["reports", ["read"]]
      ]
    );
    assert.deepEqual(
      config.hierarchy.user_roles.map((r) => r.id),
      ["viewer"]
    );
    assert.deepEqual(config.policy.protected_names.user_roles, ["billing", "Support"]);
    assert.equal(config.third_party_apps, undefined);
  });
});

test("loadRbacConfig: rejects config paths outside the root", async () => {
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "rbac-outside-config-"));
  const outsidePath = path.join(tmpDir, "outside.json");
  try {
    await fs.writeFile(outsidePath, JSON.stringify({ metadata: { name: "outside" } }), "utf-8");
    await assert.rejects(loadRbacConfig(outsidePath), /Config path must be within/);
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
});

test("loadRbacConfig: rejects duplicate YAML keys", async () => {
  await withTmpDir(async (tmpDir) => {
    const p = path.join(tmpDir, "dupes.yml");
    await fs.writeFile(p, ["metadata:", "  name: one", "metadata:", "  name: two"].join("\n"), "utf-8");

    await assert.rejects(loadRbacConfig(p), /Invalid YAML in/);
  });
});

test("loadRbacConfig: schema errors carry the file and field path", async () => {
  await withTmpDir(async (tmpDir) => {
    const p = path.join(tmpDir, "bad.yml");
    await fs.writeFile(p, ["metadata:", "  name: platform", "hierarchy:", "  resources:", '    - name: ""'].join("\n"), "utf-8");

    await assert.rejects(loadRbacConfig(p), (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(
        err.issues.map((i) => i.path),
        ["bad.yml:hierarchy.resources.0.name"]
      );
      return true;
    });
  });
});

test("loadRbacConfig: the merged config needs a name", async () => {
  await withTmpDir(async (tmpDir) => {
    const p = path.join(tmpDir, "nameless.json");
    await fs.writeFile(p, JSON.stringify({ hierarchy: { resources: [] } }), "utf-8");

    await assert.rejects(loadRbacConfig(p), (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(
        err.issues.map((i) => i.path),
        ["metadata.name"]
      );
      return true;
    });
  });
});

test("mergeConfigParts: later parts replace roles by id and keep application management opt-in", () => {
  const merged = mergeConfigParts([
    {
      metadata: { name: "base" },
      hierarchy: { user_roles: [{ id: "viewer", name: "Viewer", priority: 1, permissions: [] }] }
    },
    {
      hierarchy: { user_roles: [{ id: "viewer", name: "Reader", priority: 2, permissions: [] }] },
      third_party_apps: []
    }
  ]);

  assert.deepEqual(merged.hierarchy?.user_roles, [{ id: "viewer", name: "Reader", priority: 2, permissions: [] }]);
  assert.deepEqual(merged.third_party_apps, []);
});

test("loadDesiredState: fills indicators, TTLs, descriptions and application defaults", async () => {
  const desired = await loadDesiredState(fixturePath("rbac.yml"), { apiBaseUrl: `${TEST_API_BASE}/` });

  assert.equal(desired.metadata.name, "platform-rbac");
  assert.equal(desired.metadata.version, "1");
  assert.deepEqual(
    desired.resources.map((r) => [r.name, r.indicator, r.accessTokenTtl]),
    [
      ["systems", "https://api.example.test/api/systems", 3600],
      ["reports", "https://reports.example.test/api", 600]
    ]
  );
  assert.deepEqual(
    desired.userRoles.map((r) => [r.id, r.type, r.description]),
    [
      ["viewer", "user", "User role: Viewer (Priority: 2)"],
      ["operator", "user", "Runs the systems (Priority: 3)"]
    ]
  );
  assert.deepEqual(
    desired.organizationRoles.map((r) => [r.id, r.type, r.description]),
    [["org-member", "org", "Organization role: Member (Priority: 1)"]]
  );
  assert.deepEqual(desired.protectedNames.userRoles, ["billing-admin"]);

  const app = desired.applications?.[0];
  assert.equal(app?.displayName, "Partner Portal");
  assert.equal(app?.loginUrl, undefined);
  assert.deepEqual(app?.accessControl, { organizationRoles: [], userRoles: ["viewer"] });
  assert.deepEqual(app?.scopes, [
    "profile",
    "email",
    "roles",
    "urn:logto:scope:organizations",
    "urn:logto:scope:organization_roles"
  ]);
});
