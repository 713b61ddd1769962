import { SafetyViolation } from "../lib/errors";
import { emptyProtectedNames, lower, ORGANIZATION_SCOPE_DESCRIPTION_PREFIX, type EntityType, type ProtectedNames } from "./model";

/**
 * Name lists and patterns that mark entities as owned by the identity provider.
 * Fragments match case-insensitively anywhere in the name (or description).
 */
export interface ProtectionRules {
  reservedResourceNames: string[];
  reservedIndicators: string[];
  userRoleNameFragments: string[];
  organizationRoleNameFragments: string[];
  organizationScopeNameFragments: string[];
  organizationScopeDescriptionFragments: string[];
  roleDescriptionFragments: string[];
  systemPermissionPatterns: string[];
  /**
   * Exact names (case-insensitive) from the config's `policy.protected_names`.
   */
  protectedNames: ProtectedNames;
}

export const DEFAULT_PROTECTION_RULES: ProtectionRules = {
  reservedResourceNames: ["Logto Management API"],
  reservedIndicators: ["https://default.logto.app/api"],
  userRoleNameFragments: ["logto", "admin", "machine-to-machine", "system", "default"],
  organizationRoleNameFragments: ["logto", "admin", "system", "default", "owner", "member"],
  organizationScopeNameFragments: ["logto", "system", "default", "management", "api"],
  organizationScopeDescriptionFragments: ["logto", "management"],
  roleDescriptionFragments: ["system", "default", "logto"],
  systemPermissionPatterns: ["logto:", "urn:logto:", "management api", "machine to machine"],
  protectedNames: emptyProtectedNames()
};

export interface ProtectionOverrides {
  protectedNames?: ProtectedNames;
  /**
   * Extra indicators to treat as reserved, e.g. the tenant's own management API.
   */
  reservedIndicators?: string[];
}

export function createProtectionRules(overrides: ProtectionOverrides = {}): ProtectionRules {
  return {
    ...DEFAULT_PROTECTION_RULES,
    reservedIndicators: [...DEFAULT_PROTECTION_RULES.reservedIndicators, ...(overrides.reservedIndicators ?? [])],
    protectedNames: overrides.protectedNames ?? emptyProtectedNames()
  };
}

/**
 * Remote entity proposed for deletion.
 */
export interface DeletionCandidate {
  entityType: EntityType;
  key: string;
  name: string;
  description?: string;
  isDefault: boolean;
  indicator?: string;
  /**
   * Set on scopes whose resource is itself protected.
   */
  parentProtected?: boolean;
}

export interface GuardedCandidate<T extends DeletionCandidate> {
  candidate: T;
  violation: SafetyViolation;
}

export interface GuardResult<T extends DeletionCandidate> {
  allowed: T[];
  /**
   * Would be removed if cleanup were enabled.
   */
  blocked: Array<GuardedCandidate<T>>;
  protected: Array<GuardedCandidate<T>>;
}

function containsAny(value: string | undefined, fragments: string[]): string | undefined {
  if (!value) return undefined;
  const v = value.toLowerCase();
  return fragments.find((f) => v.includes(f.toLowerCase()));
}

/**
 * "system" in an organization scope description marks a provider scope unless the
 * description is the one this tool writes for the scopes it owns.
 */
function systemOrganizationScopeDescription(description: string | undefined, rules: ProtectionRules): string | undefined {
  const hit = containsAny(description, rules.organizationScopeDescriptionFragments);
  if (hit || !description) return hit;
  const d = description.toLowerCase();
  return d.includes("system") && !d.startsWith(lower(ORGANIZATION_SCOPE_DESCRIPTION_PREFIX)) ? "system" : undefined;
}

function inList(name: string, list: string[]): boolean {
  const n = lower(name);
  return list.some((p) => lower(p) === n);
}

function protectedNamesFor(entityType: EntityType, names: ProtectedNames): string[] {
  switch (entityType) {
    case "resource":
      return names.resources;
    case "scope":
      return names.scopes;
    case "organizationScope":
      return names.organizationScopes;
    case "organizationRole":
      return names.organizationRoles;
    case "userRole":
      return names.userRoles;
    case "application":
      return names.applications;
    case "rolePermission":
    case "applicationAccess":
      return [];
  }
}

/**
 * Returns why `candidate` must never be deleted, or `undefined` when it may be.
 */
export function protectionReason(candidate: DeletionCandidate, rules: ProtectionRules): string | undefined {
  if (candidate.isDefault) {
    return "provider default entity";
  }
  if (candidate.parentProtected) {
    return "belongs to a protected resource";
  }
  if (inList(candidate.name, protectedNamesFor(candidate.entityType, rules.protectedNames))) {
    return "listed in policy.protected_names";
  }

  switch (candidate.entityType) {
    case "resource": {
      if (inList(candidate.name, rules.reservedResourceNames)) {
        return "reserved management API resource";
      }
      if (candidate.indicator && rules.reservedIndicators.some((i) => lower(i) === lower(candidate.indicator ?? ""))) {
        return "reserved management API indicator";
      }
      return undefined;
    }
    case "scope": {
      const hit = containsAny(candidate.name, rules.systemPermissionPatterns);
      return hit ? `system scope (matches "${hit}")` : undefined;
    }
    case "organizationScope": {
      const hit =
        containsAny(candidate.name, rules.organizationScopeNameFragments) ?? systemOrganizationScopeDescription(candidate.description, rules);
      return hit ? `system organization scope (matches "${hit}")` : undefined;
    }
    case "userRole":
    case "organizationRole": {
      const fragments = candidate.entityType === "userRole" ? rules.userRoleNameFragments : rules.organizationRoleNameFragments;
      const hit = containsAny(candidate.name, fragments) ?? containsAny(candidate.description, rules.roleDescriptionFragments);
      return hit ? `system role (matches "${hit}")` : undefined;
    }
    case "application":
    case "rolePermission":
    case "applicationAccess":
      return undefined;
  }
}

/**
 * True for bindings to provider-owned scopes, which are never unassigned.
 */
export function isSystemPermission(permissionId: string, rules: ProtectionRules): boolean {
  return containsAny(permissionId, rules.systemPermissionPatterns) !== undefined;
}

/**
 * Two-key deletion gate. Protected entities are never allowed; everything else is
 * allowed only when `cleanup` is true and otherwise reported as blocked.
 *
 * Pure: no I/O, deterministic for a given input.
 */
export function filterDeletions<T extends DeletionCandidate>(candidates: T[], cleanup: boolean, rules: ProtectionRules): GuardResult<T> {
  const result: GuardResult<T> = { allowed: [], blocked: [], protected: [] };

  for (const candidate of candidates) {
    const reason = protectionReason(candidate, rules);
    if (reason) {
      result.protected.push({ candidate, violation: new SafetyViolation(candidate.entityType, candidate.key, reason) });
      continue;
    }
    if (!cleanup) {
      result.blocked.push({
        candidate,
        violation: new SafetyViolation(candidate.entityType, candidate.key, "would be removed if cleanup were enabled")
      });
      continue;
    }
    result.allowed.push(candidate);
  }

  return result;
}
