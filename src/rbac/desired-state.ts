import type { ValidationIssue } from "../lib/errors";
import type { RbacConfig, RoleConfig, ThirdPartyAppConfig } from "./config-schema";
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_APPLICATION_SCOPES,
  defaultRoleDescription,
  lower,
  scopeKey,
  withPriorityMarker,
  type DesiredState,
  type Role,
  type RoleType,
  type ThirdPartyApplication
} from "./model";

export interface BuildDesiredStateOptions {
  /**
   * Base URL for default resource indicators: `<apiBaseUrl>/api/<resource name>`.
   */
  apiBaseUrl: string;
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const v of values) {
    const k = lower(v);
    if (seen.has(k)) dupes.add(v);
    seen.add(k);
  }
  return [...dupes];
}

function validateRoles(roles: Role[], section: "organizationRoles" | "userRoles", scopeKeys: Set<string>, issues: ValidationIssue[]): void {
  for (const id of findDuplicates(roles.map((r) => r.id))) {
    issues.push({ path: section, message: `duplicate role id "${id}"` });
  }
  for (const name of findDuplicates(roles.map((r) => r.name))) {
    issues.push({ path: section, message: `duplicate role name "${name}"` });
  }

  for (const role of roles) {
    const path = `${section}.${role.id}`;
    if (!Number.isInteger(role.priority) || role.priority < 0) {
      issues.push({ path: `${path}.priority`, message: `priority must be a non-negative integer (got ${role.priority})` });
    }
    for (const id of findDuplicates(role.permissions.map((p) => p.id))) {
      issues.push({ path: `${path}.permissions`, message: `duplicate permission "${id}"` });
    }
    for (const p of role.permissions) {
      if (!scopeKeys.has(p.id)) {
        issues.push({
          path: `${path}.permissions`,
          message: `permission "${p.id}" does not match any resource action (expected "<resource>:<action>")`
        });
      }
    }
  }
}

function validateApplications(desired: DesiredState, apps: ThirdPartyApplication[], issues: ValidationIssue[]): void {
  for (const name of findDuplicates(apps.map((a) => a.name))) {
    issues.push({ path: "applications", message: `duplicate application name "${name}"` });
  }

  const orgRoleIds = new Set(desired.organizationRoles.map((r) => r.id));
  const userRoleIds = new Set(desired.userRoles.map((r) => r.id));

  for (const app of apps) {
    const path = `applications.${app.name}`;
    if (!app.description.trim()) {
      issues.push({ path: `${path}.description`, message: "description is required" });
    }
    if (!app.displayName.trim()) {
      issues.push({ path: `${path}.displayName`, message: "display name is required" });
    }
    for (const id of app.accessControl.organizationRoles) {
      if (!orgRoleIds.has(id)) {
        issues.push({ path: `${path}.accessControl`, message: `unknown organization role "${id}"` });
      }
    }
    for (const id of app.accessControl.userRoles) {
      if (!userRoleIds.has(id)) {
        issues.push({ path: `${path}.accessControl`, message: `unknown user role "${id}"` });
      }
    }
  }
}

/**
 * Reference and uniqueness checks over the desired model. Returns every issue found;
 * an empty list means the model is safe to diff.
 */
export function validateDesiredState(desired: DesiredState): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!desired.metadata.name.trim()) {
    issues.push({ path: "metadata.name", message: "name is required" });
  }

  for (const name of findDuplicates(desired.resources.map((r) => r.name))) {
    issues.push({ path: "resources", message: `duplicate resource name "${name}"` });
  }

  const scopeKeys = new Set<string>();
  for (const resource of desired.resources) {
    const path = `resources.${resource.name}`;
    if (resource.actions.length === 0) {
      issues.push({ path: `${path}.actions`, message: "at least one action is required" });
    }
    for (const action of findDuplicates(resource.actions)) {
      issues.push({ path: `${path}.actions`, message: `duplicate action "${action}"` });
    }
    for (const action of resource.actions) {
      if (action.includes(":")) {
        issues.push({ path: `${path}.actions`, message: `action "${action}" must not contain ":"` });
      }
      scopeKeys.add(scopeKey(resource.name, action));
    }
  }

  validateRoles(desired.organizationRoles, "organizationRoles", scopeKeys, issues);
  validateRoles(desired.userRoles, "userRoles", scopeKeys, issues);

  if (desired.applications) {
    validateApplications(desired, desired.applications, issues);
  }

  return issues;
}

function toRole(config: RoleConfig, type: RoleType): Role {
  return {
    id: config.id,
    name: config.name,
    type,
    priority: config.priority,
    description:
      config.description !== undefined
        ? withPriorityMarker(config.description, config.priority)
        : defaultRoleDescription(type, config.name, config.priority),
    permissions: config.permissions.map((p) => (p.name !== undefined ? { id: p.id, name: p.name } : { id: p.id })),
    isDefault: false
  };
}

function toApplication(config: ThirdPartyAppConfig): ThirdPartyApplication {
  return {
    name: config.name,
    displayName: config.display_name,
    description: config.description,
    redirectUris: config.redirect_uris,
    postLogoutRedirectUris: config.post_logout_redirect_uris,
    loginUrl: config.login_url,
    accessControl: {
      organizationRoles: config.access_control.organization_roles,
      userRoles: config.access_control.user_roles
    },
    scopes: config.scopes ?? [...DEFAULT_APPLICATION_SCOPES]
  };
}

/**
 * Maps a parsed config file onto the desired-state model. No semantic validation here;
 * see {@link validateDesiredState}.
 */
export function buildDesiredState(config: RbacConfig, options: BuildDesiredStateOptions): DesiredState {
  const apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, "");
  const protectedNames = config.policy.protected_names;

  const metadata: DesiredState["metadata"] = { name: config.metadata.name };
  if (config.metadata.version !== undefined) metadata.version = config.metadata.version;
  if (config.metadata.description !== undefined) metadata.description = config.metadata.description;

  return {
    metadata,
    resources: config.hierarchy.resources.map((r) => ({
      name: r.name,
      actions: r.actions,
      indicator: r.indicator ?? `${apiBaseUrl}/api/${r.name}`,
      accessTokenTtl: r.access_token_ttl ?? DEFAULT_ACCESS_TOKEN_TTL,
      isDefault: false
    })),
    organizationRoles: config.hierarchy.organization_roles.map((r) => toRole(r, "org")),
    userRoles: config.hierarchy.user_roles.map((r) => toRole(r, "user")),
    applications: config.third_party_apps?.map(toApplication),
    protectedNames: {
      resources: protectedNames.resources,
      scopes: protectedNames.scopes,
      organizationScopes: protectedNames.organization_scopes,
      organizationRoles: protectedNames.organization_roles,
      userRoles: protectedNames.user_roles,
      applications: protectedNames.applications
    }
  };
}
