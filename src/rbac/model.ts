export type RoleType = "org" | "user";

export type EntityType =
  | "resource"
  | "scope"
  | "organizationScope"
  | "organizationRole"
  | "userRole"
  | "rolePermission"
  | "application"
  | "applicationAccess";

export const ENTITY_TYPES: readonly EntityType[] = [
  "resource",
  "scope",
  "organizationScope",
  "organizationRole",
  "userRole",
  "rolePermission",
  "application",
  "applicationAccess"
];

export const DEFAULT_ACCESS_TOKEN_TTL = 3600;

export const DEFAULT_APPLICATION_SCOPES: readonly string[] = [
  "profile",
  "email",
  "roles",
  "urn:logto:scope:organizations",
  "urn:logto:scope:organization_roles"
];

export interface Resource {
  name: string;
  /**
   * Declaration order is kept; comparison treats it as a set.
   */
  actions: string[];
  indicator: string;
  accessTokenTtl: number;
  isDefault: boolean;
  remoteId?: string;
}

export interface Scope {
  resourceName: string;
  action: string;
  remoteId?: string;
  resourceRemoteId?: string;
}

export interface OrganizationScope {
  name: string;
  description: string;
  remoteId?: string;
}

export interface PermissionRef {
  id: string;
  name?: string;
}

export interface Role {
  id: string;
  name: string;
  type: RoleType;
  priority: number;
  description: string;
  permissions: PermissionRef[];
  isDefault: boolean;
  remoteId?: string;
}

export interface AccessControl {
  organizationRoles: string[];
  userRoles: string[];
}

export interface ThirdPartyApplication {
  name: string;
  displayName: string;
  description: string;
  redirectUris: string[];
  postLogoutRedirectUris: string[];
  loginUrl: string | undefined;
  accessControl: AccessControl;
  scopes: string[];
  remoteId?: string;
}

export interface ProtectedNames {
  resources: string[];
  scopes: string[];
  organizationScopes: string[];
  organizationRoles: string[];
  userRoles: string[];
  applications: string[];
}

export interface DesiredStateMetadata {
  name: string;
  version?: string;
  description?: string;
}

/**
 * Validated in-memory form of the config file.
 */
export interface DesiredState {
  metadata: DesiredStateMetadata;
  resources: Resource[];
  organizationRoles: Role[];
  userRoles: Role[];
  /**
   * `undefined` when the config does not manage third-party applications at all.
   */
  applications: ThirdPartyApplication[] | undefined;
  protectedNames: ProtectedNames;
}

/**
 * A binding of a role to a remote scope (resource scope for user roles, organization scope for org roles).
 */
export interface ActualBinding {
  permissionId: string;
  scopeRemoteId: string;
}

export interface ActualRole extends Role {
  remoteId: string;
  bindings: ActualBinding[];
}

export interface ActualResource extends Resource {
  remoteId: string;
  scopes: Array<Scope & { remoteId: string; resourceRemoteId: string; remoteName: string }>;
}

/**
 * Remote state re-read at the start of every run, in the shapes of {@link DesiredState}.
 */
export interface ActualState {
  resources: ActualResource[];
  organizationScopes: Array<OrganizationScope & { remoteId: string }>;
  organizationRoles: ActualRole[];
  userRoles: ActualRole[];
  applications: Array<ThirdPartyApplication & { remoteId: string }>;
}

export function scopeKey(resourceName: string, action: string): string {
  return `${resourceName}:${action}`;
}

/**
 * Splits `resource:action`. The action is everything after the last colon.
 */
export function parseScopeKey(id: string): { resourceName: string; action: string } | undefined {
  const idx = id.lastIndexOf(":");
  if (idx <= 0 || idx === id.length - 1) {
    return undefined;
  }
  return { resourceName: id.slice(0, idx), action: id.slice(idx + 1) };
}

export function lower(s: string): string {
  return s.trim().toLowerCase();
}

export function roleEntityType(type: RoleType): "organizationRole" | "userRole" {
  return type === "org" ? "organizationRole" : "userRole";
}

export function defaultRoleDescription(type: RoleType, name: string, priority: number): string {
  return `${type === "org" ? "Organization" : "User"} role: ${name} (Priority: ${priority})`;
}

const PRIORITY_PATTERN = /\(Priority:\s*(\d+)\)/;

export function priorityFromDescription(description: string): number {
  const m = description.match(PRIORITY_PATTERN);
  return m?.[1] !== undefined ? Number(m[1]) : 0;
}

/**
 * The remote side only keeps the priority inside the description, so custom
 * descriptions carry the marker too.
 */
export function withPriorityMarker(description: string, priority: number): string {
  const marker = `(Priority: ${priority})`;
  return PRIORITY_PATTERN.test(description) ? description.replace(PRIORITY_PATTERN, marker) : `${description} ${marker}`;
}

export function scopeDescription(resourceName: string, action: string): string {
  return `Permission to ${action} ${resourceName}`;
}

export const ORGANIZATION_SCOPE_DESCRIPTION_PREFIX = "Organization scope:";

export function organizationScopeDescription(name: string): string {
  return `${ORGANIZATION_SCOPE_DESCRIPTION_PREFIX} ${name}`;
}

export function emptyProtectedNames(): ProtectedNames {
  return {
    resources: [],
    scopes: [],
    organizationScopes: [],
    organizationRoles: [],
    userRoles: [],
    applications: []
  };
}
