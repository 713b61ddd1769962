import path from "node:path";
import type { ExecutionSettings } from "../rbac/context";
import {
  defaultRoleDescription,
  emptyProtectedNames,
  type ActualResource,
  type ActualRole,
  type ActualState,
  type DesiredState,
  type Resource,
  type Role,
  type RoleType,
  type ThirdPartyApplication
} from "../rbac/model";

export const TEST_API_BASE = "https://api.example.test";

/**
 * No backoff delays, same retry counts as production.
 */
export const FAST_SETTINGS: Partial<ExecutionSettings> = {
  concurrency: 2,
  readRetry: { retries: 4, baseDelayMs: 0, maxDelayMs: 0, jitter: false },
  writeRetry: { retries: 2, baseDelayMs: 0, maxDelayMs: 0, jitter: false }
};

export function fixturePath(fileName: string): string {
  return path.resolve(process.cwd(), "src", "test", "fixtures", fileName);
}

export function resource(name: string, actions: string[], overrides: Partial<Resource> = {}): Resource {
  return {
    name,
    actions,
    indicator: `${TEST_API_BASE}/api/${name}`,
    accessTokenTtl: 3600,
    isDefault: false,
    ...overrides
  };
}

export function role(type: RoleType, id: string, permissions: string[], overrides: Partial<Role> = {}): Role {
  const name = overrides.name ?? id;
  const priority = overrides.priority ?? 0;
  return {
    id,
    name,
    type,
    priority,
    description: defaultRoleDescription(type, name, priority),
    permissions: permissions.map((p) => ({ id: p })),
    isDefault: false,
    ...overrides
  };
}

export function application(name: string, overrides: Partial<ThirdPartyApplication> = {}): ThirdPartyApplication {
  return {
    name,
    displayName: `${name} display`,
    description: `${name} description`,
    redirectUris: [`https://${name}.example.test/callback`],
    postLogoutRedirectUris: [],
    loginUrl: undefined,
    accessControl: { organizationRoles: [], userRoles: [] },
    scopes: ["profile", "email"],
    ...overrides
  };
}

export function desiredState(overrides: Partial<DesiredState> = {}): DesiredState {
  return {
    metadata: { name: "test-rbac" },
    resources: [],
    organizationRoles: [],
    userRoles: [],
    applications: undefined,
    protectedNames: emptyProtectedNames(),
    ...overrides
  };
}

export function emptyActual(overrides: Partial<ActualState> = {}): ActualState {
  return { resources: [], organizationScopes: [], organizationRoles: [], userRoles: [], applications: [], ...overrides };
}

/**
 * Remote resource whose scopes are named `<name>:<action>` with ids `scope_<name>:<action>`.
 */
export function actualResource(name: string, actions: string[], overrides: Partial<ActualResource> = {}): ActualResource {
  const remoteId = overrides.remoteId ?? `res_${name}`;
  return {
    name,
    actions,
    indicator: `${TEST_API_BASE}/api/${name}`,
    accessTokenTtl: 3600,
    isDefault: false,
    remoteId,
    scopes: actions.map((action) => ({
      resourceName: name,
      action,
      remoteId: `scope_${name}:${action}`,
      resourceRemoteId: remoteId,
      remoteName: `${name}:${action}`
    })),
    ...overrides
  };
}

/**
 * Remote user role bound to `scope_<permission id>` for each permission.
 */
export function actualUserRole(name: string, permissionIds: string[], overrides: Partial<ActualRole> = {}): ActualRole {
  return {
    id: name,
    name,
    type: "user",
    priority: 0,
    description: defaultRoleDescription("user", name, 0),
    permissions: permissionIds.map((id) => ({ id })),
    isDefault: false,
    remoteId: `role_${name}`,
    bindings: permissionIds.map((id) => ({ permissionId: id, scopeRemoteId: `scope_${id}` })),
    ...overrides
  };
}
