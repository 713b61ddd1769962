import type {
  RemoteApplication,
  RemoteOrganizationScope,
  RemoteResource,
  RemoteRole,
  RemoteScope
} from "../types/provider-schema";

export interface ResourceInput {
  name: string;
  indicator: string;
  accessTokenTtl: number;
}

export interface ScopeInput {
  name: string;
  description: string;
}

export interface RoleInput {
  name: string;
  description: string;
}

export interface ApplicationInput {
  name: string;
  description: string;
  displayName: string;
  redirectUris: string[];
  postLogoutRedirectUris: string[];
  loginUrl: string | undefined;
  scopes: string[];
}

export interface AccessControlInput {
  organizationRoles: string[];
  userRoles: string[];
}

/**
 * Typed CRUD surface of the identity provider's management API.
 *
 * Every method either resolves or rejects with a `ProviderError`. List methods
 * return every page.
 */
export interface IdentityProviderClient {
  listResources(): Promise<RemoteResource[]>;
  createResource(input: ResourceInput): Promise<RemoteResource>;
  updateResource(resourceId: string, patch: { accessTokenTtl: number }): Promise<void>;
  deleteResource(resourceId: string): Promise<void>;

  listScopes(resourceId: string): Promise<RemoteScope[]>;
  createScope(resourceId: string, input: ScopeInput): Promise<RemoteScope>;
  deleteScope(resourceId: string, scopeId: string): Promise<void>;

  listOrganizationScopes(): Promise<RemoteOrganizationScope[]>;
  createOrganizationScope(input: ScopeInput): Promise<RemoteOrganizationScope>;
  deleteOrganizationScope(scopeId: string): Promise<void>;

  listOrganizationRoles(): Promise<RemoteRole[]>;
  createOrganizationRole(input: RoleInput): Promise<RemoteRole>;
  updateOrganizationRole(roleId: string, input: RoleInput): Promise<void>;
  deleteOrganizationRole(roleId: string): Promise<void>;
  listOrganizationRoleScopes(roleId: string): Promise<RemoteOrganizationScope[]>;
  assignOrganizationRoleScopes(roleId: string, scopeIds: string[]): Promise<void>;
  removeOrganizationRoleScope(roleId: string, scopeId: string): Promise<void>;

  listUserRoles(): Promise<RemoteRole[]>;
  createUserRole(input: RoleInput): Promise<RemoteRole>;
  updateUserRole(roleId: string, input: RoleInput): Promise<void>;
  deleteUserRole(roleId: string): Promise<void>;
  listUserRoleScopes(roleId: string): Promise<RemoteScope[]>;
  assignUserRoleScopes(roleId: string, scopeIds: string[]): Promise<void>;
  removeUserRoleScope(roleId: string, scopeId: string): Promise<void>;

  listThirdPartyApplications(): Promise<RemoteApplication[]>;
  /**
   * `onCreated` receives the new id as soon as the application exists, before branding and consent scopes are written.
   */
  createThirdPartyApplication(input: ApplicationInput, onCreated?: (applicationId: string) => void): Promise<RemoteApplication>;
  updateThirdPartyApplication(applicationId: string, input: ApplicationInput): Promise<void>;
  deleteThirdPartyApplication(applicationId: string): Promise<void>;
  setApplicationAccessControl(applicationId: string, accessControl: AccessControlInput): Promise<void>;
}
