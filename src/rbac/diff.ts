import {
  lower,
  organizationScopeDescription,
  scopeKey,
  type AccessControl,
  type ActualBinding,
  type ActualResource,
  type ActualRole,
  type ActualState,
  type DesiredState,
  type OrganizationScope,
  type PermissionRef,
  type Resource,
  type Role,
  type RoleType,
  type ThirdPartyApplication
} from "./model";
import { sameContent } from "./normalize";

export interface Keyed<T> {
  key: string;
  value: T;
}

export interface EntityChange<D, A> {
  key: string;
  desired: D;
  actual: A;
}

/**
 * Per-entity-type comparison result. Keys are natural keys in their desired spelling
 * (or remote spelling for actual-only entities).
 */
export interface EntityDiff<D, A> {
  create: Array<Keyed<D>>;
  update: Array<EntityChange<D, A>>;
  delete: Array<Keyed<A>>;
  unchanged: Array<EntityChange<D, A>>;
}

export interface DesiredScope {
  resourceName: string;
  action: string;
}

export type ActualScope = ActualResource["scopes"][number] & { resourceIsDefault: boolean };

export type ActualOrganizationScope = OrganizationScope & { remoteId: string };

export type ActualApplication = ThirdPartyApplication & { remoteId: string };

/**
 * Binding changes for one desired role.
 */
export interface RoleBindingDiff {
  roleType: RoleType;
  roleKey: string;
  roleName: string;
  /**
   * `undefined` when the role does not exist remotely yet.
   */
  roleRemoteId: string | undefined;
  add: PermissionRef[];
  remove: ActualBinding[];
  kept: string[];
  /**
   * Set when incremental changes cannot restore declaration order; the role's
   * bindings are then removed (see `remove`) and reassigned in this order.
   */
  replace: PermissionRef[] | undefined;
  /**
   * Provider-owned bindings that are left alone.
   */
  preserved: ActualBinding[];
}

export interface StateDiff {
  resources: EntityDiff<Resource, ActualResource>;
  scopes: EntityDiff<DesiredScope, ActualScope>;
  organizationScopes: EntityDiff<OrganizationScope, ActualOrganizationScope>;
  organizationRoles: EntityDiff<Role, ActualRole>;
  userRoles: EntityDiff<Role, ActualRole>;
  bindings: RoleBindingDiff[];
  /**
   * `undefined` when applications are not managed.
   */
  applications: EntityDiff<ThirdPartyApplication, ActualApplication> | undefined;
  applicationAccess: EntityDiff<AccessControl, AccessControl> | undefined;
  warnings: string[];
}

export interface DiffOptions {
  permissionOrder: "strict" | "set";
  /**
   * Bindings for which this returns true are never removed.
   */
  isSystemPermission: (permissionId: string) => boolean;
}

function emptyDiff<D, A>(): EntityDiff<D, A> {
  return { create: [], update: [], delete: [], unchanged: [] };
}

/**
 * Last declaration wins for duplicate keys; order of first appearance is kept.
 */
function indexByKey<T>(items: T[], keyOf: (item: T) => string): Map<string, T> {
  const out = new Map<string, T>();
  for (const item of items) {
    out.set(keyOf(item), item);
  }
  return out;
}

/**
 * Generic keyed diff: `changed` decides update vs unchanged for matched pairs.
 */
function diffKeyed<D, A>(
  desired: Map<string, { key: string; value: D }>,
  actual: Map<string, { key: string; value: A }>,
  changed: (d: D, a: A) => boolean
): EntityDiff<D, A> {
  const out = emptyDiff<D, A>();
  for (const [match, d] of desired) {
    const a = actual.get(match);
    if (!a) {
      out.create.push({ key: d.key, value: d.value });
    } else if (changed(d.value, a.value)) {
      out.update.push({ key: d.key, desired: d.value, actual: a.value });
    } else {
      out.unchanged.push({ key: d.key, desired: d.value, actual: a.value });
    }
  }
  for (const [match, a] of actual) {
    if (!desired.has(match)) {
      out.delete.push({ key: a.key, value: a.value });
    }
  }
  return out;
}

function keyedIndex<T>(items: T[], displayKey: (item: T) => string): Map<string, { key: string; value: T }> {
  return indexByKey(
    items.map((value) => ({ key: displayKey(value), value })),
    (e) => lower(e.key)
  );
}

function diffResources(desired: Resource[], actual: ActualResource[], warnings: string[]): EntityDiff<Resource, ActualResource> {
  const out = diffKeyed(
    keyedIndex(desired, (r) => r.name),
    keyedIndex(actual, (r) => r.name),
    (d, a) => d.accessTokenTtl !== a.accessTokenTtl
  );
  for (const pair of [...out.update, ...out.unchanged]) {
    if (pair.desired.indicator !== pair.actual.indicator) {
      warnings.push(
        `Resource "${pair.key}" indicator differs (remote "${pair.actual.indicator}", desired "${pair.desired.indicator}"); indicators cannot be changed in place`
      );
    }
  }
  return out;
}

function diffScopes(desired: Resource[], actual: ActualResource[]): EntityDiff<DesiredScope, ActualScope> {
  const desiredScopes: DesiredScope[] = [];
  for (const r of indexByKey(desired, (x) => lower(x.name)).values()) {
    for (const action of new Set(r.actions)) {
      desiredScopes.push({ resourceName: r.name, action });
    }
  }
  const actualScopes: ActualScope[] = actual.flatMap((r) => r.scopes.map((s) => ({ ...s, resourceIsDefault: r.isDefault })));

  return diffKeyed(
    keyedIndex(desiredScopes, (s) => scopeKey(s.resourceName, s.action)),
    keyedIndex(actualScopes, (s) => scopeKey(s.resourceName, s.action)),
    () => false
  );
}

/**
 * Organization scopes mirror every permission id referenced by an organization role.
 */
export function desiredOrganizationScopes(roles: Role[]): OrganizationScope[] {
  const seen = new Set<string>();
  const out: OrganizationScope[] = [];
  for (const role of roles) {
    for (const p of role.permissions) {
      if (seen.has(lower(p.id))) continue;
      seen.add(lower(p.id));
      out.push({ name: p.id, description: organizationScopeDescription(p.id) });
    }
  }
  return out;
}

/**
 * Pairs desired roles with remote roles. A remote role matches when its name equals
 * the desired role's name or id, case-insensitively.
 */
export function matchRoles(desired: Role[], actual: ActualRole[]): { pairs: Array<{ desired: Role; actual: ActualRole | undefined }>; unmatched: ActualRole[] } {
  const actualByName = new Map<string, ActualRole>();
  for (const a of actual) {
    if (!actualByName.has(lower(a.name))) actualByName.set(lower(a.name), a);
  }

  const claimed = new Set<ActualRole>();
  const pairs: Array<{ desired: Role; actual: ActualRole | undefined }> = [];
  for (const d of indexByKey(desired, (r) => r.id).values()) {
    const candidates = [actualByName.get(lower(d.name)), actualByName.get(lower(d.id))];
    const match = candidates.find((c): c is ActualRole => c !== undefined && !claimed.has(c));
    if (match) claimed.add(match);
    pairs.push({ desired: d, actual: match });
  }

  return { pairs, unmatched: actual.filter((a) => !claimed.has(a)) };
}

function diffRoles(desired: Role[], actual: ActualRole[]): { diff: EntityDiff<Role, ActualRole>; pairs: Array<{ desired: Role; actual: ActualRole | undefined }> } {
  const diff = emptyDiff<Role, ActualRole>();
  const { pairs, unmatched } = matchRoles(desired, actual);
  for (const { desired: d, actual: a } of pairs) {
    if (!a) {
      diff.create.push({ key: d.id, value: d });
    } else if (d.name !== a.name || d.description !== a.description || d.priority !== a.priority) {
      diff.update.push({ key: d.id, desired: d, actual: a });
    } else {
      diff.unchanged.push({ key: d.id, desired: d, actual: a });
    }
  }
  for (const a of unmatched) {
    diff.delete.push({ key: a.id, value: a });
  }
  return { diff, pairs };
}

function sameOrder(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((v, i) => lower(v) === lower(b[i] ?? ""));
}

/**
 * Set difference over permission ids. In "strict" mode, when keeping the surviving
 * bindings and appending the new ones would not reproduce declaration order, the
 * role's bindings are rewritten instead.
 */
export function diffRoleBindings(desired: Role, actual: ActualRole | undefined, options: DiffOptions): RoleBindingDiff {
  const current = actual?.bindings ?? [];
  const preserved = current.filter((b) => options.isSystemPermission(b.permissionId));
  const managed = current.filter((b) => !options.isSystemPermission(b.permissionId));

  const desiredRefs = [...indexByKey(desired.permissions, (p) => lower(p.id)).values()];
  const desiredIds = new Set(desiredRefs.map((p) => lower(p.id)));
  const currentIds = new Set(current.map((b) => lower(b.permissionId)));

  const remove = managed.filter((b) => !desiredIds.has(lower(b.permissionId)));
  const kept = managed.filter((b) => desiredIds.has(lower(b.permissionId))).map((b) => b.permissionId);
  const add = desiredRefs.filter((p) => !currentIds.has(lower(p.id)));

  const base: RoleBindingDiff = {
    roleType: desired.type,
    roleKey: desired.id,
    roleName: desired.name,
    roleRemoteId: actual?.remoteId,
    add,
    remove,
    kept,
    replace: undefined,
    preserved
  };

  if (options.permissionOrder === "set") {
    return base;
  }

  const projected = [...kept, ...add.map((p) => p.id)];
  const wanted = desiredRefs.filter((p) => !options.isSystemPermission(p.id)).map((p) => p.id);
  if (sameOrder(projected, wanted)) {
    return base;
  }

  return { ...base, add: [], remove: managed, kept: [], replace: desiredRefs };
}

export function hasBindingChanges(b: RoleBindingDiff): boolean {
  return b.add.length > 0 || b.remove.length > 0 || b.replace !== undefined;
}

function applicationChanged(d: ThirdPartyApplication, a: ActualApplication): boolean {
  const comparable = (x: ThirdPartyApplication): Record<string, unknown> => ({
    displayName: x.displayName,
    description: x.description,
    redirectUris: x.redirectUris,
    postLogoutRedirectUris: x.postLogoutRedirectUris,
    loginUrl: x.loginUrl,
    scopes: x.scopes
  });
  return !sameContent(comparable(d), comparable(a));
}

function diffApplicationAccess(apps: EntityDiff<ThirdPartyApplication, ActualApplication>): EntityDiff<AccessControl, AccessControl> {
  const out = emptyDiff<AccessControl, AccessControl>();
  const isEmpty = (ac: AccessControl): boolean => ac.organizationRoles.length === 0 && ac.userRoles.length === 0;

  for (const c of apps.create) {
    if (!isEmpty(c.value.accessControl)) {
      out.create.push({ key: c.key, value: c.value.accessControl });
    }
  }
  for (const pair of [...apps.update, ...apps.unchanged]) {
    const change = { key: pair.key, desired: pair.desired.accessControl, actual: pair.actual.accessControl };
    if (sameContent(change.desired, change.actual)) {
      out.unchanged.push(change);
    } else {
      out.update.push(change);
    }
  }
  return out;
}

/**
 * Compares desired against actual state for every entity type. Pure and synchronous.
 */
export function diffState(desired: DesiredState, actual: ActualState, options: DiffOptions): StateDiff {
  const warnings: string[] = [];

  const organizationScopes = diffKeyed(
    keyedIndex(desiredOrganizationScopes(desired.organizationRoles), (s) => s.name),
    keyedIndex(actual.organizationScopes, (s) => s.name),
    () => false
  );

  const org = diffRoles(desired.organizationRoles, actual.organizationRoles);
  const user = diffRoles(desired.userRoles, actual.userRoles);

  const bindings = [...org.pairs, ...user.pairs].map(({ desired: d, actual: a }) => diffRoleBindings(d, a, options));

  let applications: StateDiff["applications"];
  let applicationAccess: StateDiff["applicationAccess"];
  if (desired.applications) {
    applications = diffKeyed(
      keyedIndex(desired.applications, (a) => a.name),
      keyedIndex(actual.applications, (a) => a.name),
      applicationChanged
    );
    applicationAccess = diffApplicationAccess(applications);
  }

  return {
    resources: diffResources(desired.resources, actual.resources, warnings),
    scopes: diffScopes(desired.resources, actual.resources),
    organizationScopes,
    organizationRoles: org.diff,
    userRoles: user.diff,
    bindings,
    applications,
    applicationAccess,
    warnings
  };
}

function isEntityDiffEmpty<D, A>(d: EntityDiff<D, A> | undefined): boolean {
  return !d || (d.create.length === 0 && d.update.length === 0 && d.delete.length === 0);
}

/**
 * True when nothing would be created, updated, deleted or rebound.
 */
export function isEmptyDiff(diff: StateDiff): boolean {
  return (
    isEntityDiffEmpty(diff.resources) &&
    isEntityDiffEmpty(diff.scopes) &&
    isEntityDiffEmpty(diff.organizationScopes) &&
    isEntityDiffEmpty(diff.organizationRoles) &&
    isEntityDiffEmpty(diff.userRoles) &&
    isEntityDiffEmpty(diff.applications) &&
    isEntityDiffEmpty(diff.applicationAccess) &&
    !diff.bindings.some(hasBindingChanges)
  );
}
