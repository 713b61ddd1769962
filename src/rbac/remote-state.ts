import pLimit from "p-limit";
import { StateLoadError, describeError, isTransientError } from "../lib/errors";
import { withRetry } from "../lib/retry";
import type {
  RemoteApplication,
  RemoteOrganizationScope,
  RemoteResource,
  RemoteRole,
  RemoteScope
} from "../types/provider-schema";
import type { ReconcilerContext } from "./context";
import {
  priorityFromDescription,
  scopeKey,
  type ActualBinding,
  type ActualResource,
  type ActualRole,
  type ActualState,
  type RoleType
} from "./model";

export interface FetchActualStateOptions {
  /**
   * Third-party applications are only read when the desired state manages them.
   */
  includeApplications: boolean;
}

/**
 * Recovers the action from a remote scope name. Accepts `resource:action` and the
 * older `action:resource` form; anything else is taken as the action itself.
 */
export function actionFromScopeName(resourceName: string, scopeName: string): string {
  const prefix = `${resourceName}:`;
  if (scopeName.startsWith(prefix) && scopeName.length > prefix.length) {
    return scopeName.slice(prefix.length);
  }
  const suffix = `:${resourceName}`;
  if (scopeName.endsWith(suffix) && scopeName.length > suffix.length) {
    return scopeName.slice(0, -suffix.length);
  }
  return scopeName;
}

async function readCategory<T>(ctx: ReconcilerContext, category: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await withRetry(fn, {
      ...ctx.settings.readRetry,
      shouldRetry: isTransientError,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
      onRetry: ({ attempt, delayMs, err }) => {
        ctx.logger.warn(`reading ${category}: retrying`, { attempt, delayMs, error: describeError(err) });
      }
    });
  } catch (err: unknown) {
    throw new StateLoadError(category, err);
  }
}

function toActualRole(role: RemoteRole, type: RoleType, bindings: ActualBinding[]): ActualRole {
  const description = role.description ?? "";
  return {
    id: role.name,
    name: role.name,
    type,
    priority: priorityFromDescription(description),
    description,
    permissions: bindings.map((b) => ({ id: b.permissionId })),
    isDefault: role.isDefault,
    remoteId: role.id,
    bindings
  };
}

function toActualResource(resource: RemoteResource, scopes: RemoteScope[]): ActualResource {
  const mapped = scopes.map((s) => {
    const action = actionFromScopeName(resource.name, s.name);
    return {
      resourceName: resource.name,
      action,
      remoteId: s.id,
      resourceRemoteId: resource.id,
      remoteName: s.name
    };
  });
  return {
    name: resource.name,
    actions: mapped.map((s) => s.action),
    indicator: resource.indicator,
    accessTokenTtl: resource.accessTokenTtl,
    isDefault: resource.isDefault,
    remoteId: resource.id,
    scopes: mapped
  };
}

/**
 * Reads the complete remote RBAC state. Any category that cannot be read (after
 * retries) aborts with {@link StateLoadError}; a partial state is never returned.
 */
export async function fetchActualState(ctx: ReconcilerContext, options: FetchActualStateOptions): Promise<ActualState> {
  const { client } = ctx;
  const limit = pLimit(ctx.settings.concurrency);

  const loadResources = async (): Promise<ActualResource[]> => {
    const resources = await readCategory(ctx, "resources", () => client.listResources());
    return await Promise.all(
      resources.map((r) =>
        limit(async () => toActualResource(r, await readCategory(ctx, `scopes of resource "${r.name}"`, () => client.listScopes(r.id))))
      )
    );
  };

  const loadOrganizationRoles = async (): Promise<Array<{ role: RemoteRole; scopes: RemoteOrganizationScope[] }>> => {
    const roles = await readCategory(ctx, "organization roles", () => client.listOrganizationRoles());
    return await Promise.all(
      roles.map((role) =>
        limit(async () => ({
          role,
          scopes: await readCategory(ctx, `scopes of organization role "${role.name}"`, () => client.listOrganizationRoleScopes(role.id))
        }))
      )
    );
  };

  const loadUserRoles = async (): Promise<Array<{ role: RemoteRole; scopes: RemoteScope[] }>> => {
    const roles = await readCategory(ctx, "user roles", () => client.listUserRoles());
    return await Promise.all(
      roles.map((role) =>
        limit(async () => ({
          role,
          scopes: await readCategory(ctx, `scopes of user role "${role.name}"`, () => client.listUserRoleScopes(role.id))
        }))
      )
    );
  };

  const [resources, organizationScopes, organizationRoles, userRoles, applications] = await Promise.all([
    loadResources(),
    readCategory(ctx, "organization scopes", () => client.listOrganizationScopes()),
    loadOrganizationRoles(),
    loadUserRoles(),
    options.includeApplications
      ? readCategory(ctx, "third-party applications", () => client.listThirdPartyApplications())
      : Promise.resolve<RemoteApplication[]>([])
  ]);

  const resourceNameById = new Map(resources.map((r) => [r.remoteId, r.name]));

  const state: ActualState = {
    resources,
    organizationScopes: organizationScopes.map((s) => ({ name: s.name, description: s.description ?? "", remoteId: s.id })),
    organizationRoles: organizationRoles.map(({ role, scopes }) =>
      toActualRole(
        role,
        "org",
        scopes.map((s) => ({ permissionId: s.name, scopeRemoteId: s.id }))
      )
    ),
    userRoles: userRoles.map(({ role, scopes }) =>
      toActualRole(
        role,
        "user",
        scopes.map((s) => {
          const resourceName = resourceNameById.get(s.resourceId);
          const permissionId = resourceName ? scopeKey(resourceName, actionFromScopeName(resourceName, s.name)) : s.name;
          return { permissionId, scopeRemoteId: s.id };
        })
      )
    ),
    applications: applications.map((a) => ({
      name: a.name,
      displayName: a.displayName ?? "",
      description: a.description,
      redirectUris: a.redirectUris,
      postLogoutRedirectUris: a.postLogoutRedirectUris,
      loginUrl: a.loginUrl,
      accessControl: a.accessControl,
      scopes: a.scopes,
      remoteId: a.id
    }))
  };

  ctx.logger.debug("remote state loaded", {
    resources: state.resources.length,
    organizationScopes: state.organizationScopes.length,
    organizationRoles: state.organizationRoles.length,
    userRoles: state.userRoles.length,
    applications: state.applications.length
  });

  return state;
}
