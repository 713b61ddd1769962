import { SafetyViolation } from "../lib/errors";
import type { ReconcileOptions } from "./context";
import { hasBindingChanges, type ActualScope, type RoleBindingDiff, type StateDiff } from "./diff";
import {
  filterDeletions,
  protectionReason,
  type DeletionCandidate,
  type GuardedCandidate,
  type GuardResult,
  type ProtectionRules
} from "./guard";
import {
  lower,
  roleEntityType,
  scopeKey,
  type AccessControl,
  type ActualBinding,
  type EntityType,
  type Resource,
  type Role,
  type RoleType,
  type ThirdPartyApplication
} from "./model";

export type OperationKind = "create" | "update" | "delete";

export type PhaseName =
  | "resources"
  | "scopes"
  | "organizationRoles"
  | "userRoles"
  | "rolePermissions"
  | "applications"
  | "applicationAccess";

/**
 * Creation/update order. Deletion phases run the same list reversed.
 */
export const PHASE_ORDER: readonly PhaseName[] = [
  "resources",
  "scopes",
  "organizationRoles",
  "userRoles",
  "rolePermissions",
  "applications",
  "applicationAccess"
];

/**
 * A scope a role should be bound to. `scopeRemoteId` is unknown when the scope
 * is created earlier in the same run.
 */
export interface BindingTarget {
  permissionId: string;
  scopeRemoteId: string | undefined;
}

export type OperationPayload =
  | { type: "createResource"; resource: Resource }
  | { type: "updateResource"; name: string; remoteId: string; accessTokenTtl: number }
  | { type: "deleteResource"; name: string; remoteId: string }
  | { type: "createScope"; resourceName: string; action: string; resourceRemoteId: string | undefined }
  | { type: "deleteScope"; resourceName: string; action: string; resourceRemoteId: string; remoteId: string }
  | { type: "createOrganizationScope"; name: string; description: string }
  | { type: "deleteOrganizationScope"; name: string; remoteId: string }
  | { type: "createRole"; role: Role }
  | { type: "updateRole"; role: Role; remoteId: string }
  | { type: "deleteRole"; roleType: RoleType; name: string; remoteId: string }
  | {
      type: "bindPermissions";
      roleType: RoleType;
      roleKey: string;
      roleRemoteId: string | undefined;
      add: BindingTarget[];
      remove: ActualBinding[];
      replace: BindingTarget[] | undefined;
    }
  | { type: "createApplication"; application: ThirdPartyApplication }
  | { type: "updateApplication"; application: ThirdPartyApplication; remoteId: string }
  | { type: "deleteApplication"; name: string; remoteId: string }
  | { type: "setAccessControl"; applicationName: string; remoteId: string | undefined; accessControl: AccessControl };

export interface Operation {
  /**
   * Unique within a plan: `<entityType>:<kind>:<key>`.
   */
  ref: string;
  kind: OperationKind;
  entityType: EntityType;
  key: string;
  phase: PhaseName;
  /**
   * Refs of operations that must succeed first. Always in earlier phases.
   */
  dependsOn: string[];
  payload: OperationPayload;
}

export interface Phase {
  name: PhaseName;
  stage: "apply" | "delete";
  operations: Operation[];
}

export interface SkippedItem {
  entityType: EntityType;
  key: string;
  reason: string;
}

export interface ExecutionPlan {
  phases: Phase[];
  /**
   * Deletions withheld because cleanup is disabled.
   */
  blocked: Array<GuardedCandidate<DeletionCandidate>>;
  protected: Array<GuardedCandidate<DeletionCandidate>>;
  skipped: SkippedItem[];
}

export type PlanOptions = Pick<ReconcileOptions, "cleanup" | "skipResources" | "skipRoles" | "skipPermissions"> & {
  protection: ProtectionRules;
};

export function operationRef(entityType: EntityType, kind: OperationKind, key: string): string {
  return `${entityType}:${kind}:${key}`;
}

export function bindingKey(roleType: RoleType, roleKey: string): string {
  return `${roleType}:${roleKey}`;
}

export function describeOperation(op: Operation): string {
  return `${op.kind} ${op.entityType} "${op.key}"`;
}

function phaseOfEntity(entityType: EntityType): PhaseName {
  switch (entityType) {
    case "resource":
      return "resources";
    case "scope":
    case "organizationScope":
      return "scopes";
    case "organizationRole":
      return "organizationRoles";
    case "userRole":
      return "userRoles";
    case "rolePermission":
      return "rolePermissions";
    case "application":
      return "applications";
    case "applicationAccess":
      return "applicationAccess";
  }
}

function op(entityType: EntityType, kind: OperationKind, key: string, payload: OperationPayload, dependsOn: string[] = []): Operation {
  return {
    ref: operationRef(entityType, kind, key),
    kind,
    entityType,
    key,
    phase: phaseOfEntity(entityType),
    dependsOn,
    payload
  };
}

interface PendingDeletion extends DeletionCandidate {
  build: () => Operation;
}

const SKIP_FLAGS: Array<{ flag: "skipResources" | "skipRoles" | "skipPermissions"; types: EntityType[] }> = [
  { flag: "skipResources", types: ["resource", "scope"] },
  { flag: "skipRoles", types: ["organizationRole", "userRole"] },
  { flag: "skipPermissions", types: ["organizationScope", "rolePermission"] }
];

class PlanBuilder {
  readonly operations: Operation[] = [];
  readonly protectedUpdates: Array<GuardedCandidate<DeletionCandidate>> = [];
  readonly deletions: PendingDeletion[] = [];

  /**
   * lower(scope key) -> remote id, for resource scopes that exist remotely.
   */
  readonly scopeIds = new Map<string, string>();
  readonly organizationScopeIds = new Map<string, string>();
  readonly resourceIds = new Map<string, string>();

  /**
   * `<roleType>:<lower(permission id)>` -> refs of binding operations that unbind it.
   */
  readonly unbindRefs = new Map<string, string[]>();

  constructor(
    private readonly diff: StateDiff,
    private readonly protection: ProtectionRules
  ) {
    for (const r of [...diff.resources.update, ...diff.resources.unchanged]) {
      this.resourceIds.set(lower(r.key), r.actual.remoteId);
    }
    for (const r of diff.resources.delete) {
      this.resourceIds.set(lower(r.key), r.value.remoteId);
    }
    for (const s of [...diff.scopes.unchanged.map((c) => c.actual), ...diff.scopes.delete.map((d) => d.value)]) {
      this.scopeIds.set(lower(scopeKey(s.resourceName, s.action)), s.remoteId);
    }
    for (const s of [...diff.organizationScopes.unchanged.map((c) => c.actual), ...diff.organizationScopes.delete.map((d) => d.value)]) {
      this.organizationScopeIds.set(lower(s.name), s.remoteId);
    }
  }

  add(operation: Operation): Operation {
    this.operations.push(operation);
    return operation;
  }

  has(ref: string): boolean {
    return this.operations.some((o) => o.ref === ref);
  }

  planResources(): void {
    const d = this.diff.resources;
    for (const c of d.create) {
      this.add(op("resource", "create", c.key, { type: "createResource", resource: c.value }));
    }
    for (const u of d.update) {
      if (u.actual.isDefault) {
        this.protectUpdate({ entityType: "resource", key: u.key, name: u.actual.name, isDefault: true });
        continue;
      }
      this.add(
        op("resource", "update", u.key, {
          type: "updateResource",
          name: u.actual.name,
          remoteId: u.actual.remoteId,
          accessTokenTtl: u.desired.accessTokenTtl
        })
      );
    }
    for (const del of d.delete) {
      const r = del.value;
      this.deletions.push({
        entityType: "resource",
        key: del.key,
        name: r.name,
        isDefault: r.isDefault,
        indicator: r.indicator,
        build: () => {
          const scopeRefs = r.scopes.map((s) => operationRef("scope", "delete", scopeKey(s.resourceName, s.action)));
          return op("resource", "delete", del.key, { type: "deleteResource", name: r.name, remoteId: r.remoteId }, scopeRefs);
        }
      });
    }
  }

  planScopes(): void {
    const d = this.diff.scopes;
    for (const c of d.create) {
      const resourceRef = operationRef("resource", "create", c.value.resourceName);
      this.add(
        op(
          "scope",
          "create",
          c.key,
          {
            type: "createScope",
            resourceName: c.value.resourceName,
            action: c.value.action,
            resourceRemoteId: this.resourceIds.get(lower(c.value.resourceName))
          },
          this.has(resourceRef) ? [resourceRef] : []
        )
      );
    }

    const resourceProtected = new Map<string, boolean>();
    for (const del of this.diff.resources.delete) {
      const r = del.value;
      const reason = protectionReason({ entityType: "resource", key: del.key, name: r.name, isDefault: r.isDefault, indicator: r.indicator }, this.protection);
      resourceProtected.set(lower(r.name), reason !== undefined);
    }

    for (const del of d.delete) {
      const s: ActualScope = del.value;
      this.deletions.push({
        entityType: "scope",
        key: del.key,
        name: s.remoteName,
        isDefault: s.resourceIsDefault,
        parentProtected: resourceProtected.get(lower(s.resourceName)) ?? false,
        build: () =>
          op(
            "scope",
            "delete",
            del.key,
            { type: "deleteScope", resourceName: s.resourceName, action: s.action, resourceRemoteId: s.resourceRemoteId, remoteId: s.remoteId },
            this.unbindRefs.get(`user:${lower(del.key)}`) ?? []
          )
      });
    }

    const o = this.diff.organizationScopes;
    for (const c of o.create) {
      this.add(op("organizationScope", "create", c.key, { type: "createOrganizationScope", name: c.value.name, description: c.value.description }));
    }
    for (const del of o.delete) {
      const s = del.value;
      this.deletions.push({
        entityType: "organizationScope",
        key: del.key,
        name: s.name,
        description: s.description,
        isDefault: false,
        build: () =>
          op(
            "organizationScope",
            "delete",
            del.key,
            { type: "deleteOrganizationScope", name: s.name, remoteId: s.remoteId },
            this.unbindRefs.get(`org:${lower(del.key)}`) ?? []
          )
      });
    }
  }

  planRoles(type: RoleType): void {
    const entityType = roleEntityType(type);
    const d = type === "org" ? this.diff.organizationRoles : this.diff.userRoles;
    for (const c of d.create) {
      this.add(op(entityType, "create", c.key, { type: "createRole", role: c.value }));
    }
    for (const u of d.update) {
      if (u.actual.isDefault) {
        this.protectUpdate({ entityType, key: u.key, name: u.actual.name, isDefault: true });
        continue;
      }
      this.add(op(entityType, "update", u.key, { type: "updateRole", role: u.desired, remoteId: u.actual.remoteId }));
    }
    for (const del of d.delete) {
      const r = del.value;
      this.deletions.push({
        entityType,
        key: del.key,
        name: r.name,
        description: r.description,
        isDefault: r.isDefault,
        build: () => op(entityType, "delete", del.key, { type: "deleteRole", roleType: type, name: r.name, remoteId: r.remoteId })
      });
    }
  }

  private target(roleType: RoleType, permissionId: string): BindingTarget {
    const ids = roleType === "org" ? this.organizationScopeIds : this.scopeIds;
    return { permissionId, scopeRemoteId: ids.get(lower(permissionId)) };
  }

  private targetDependency(roleType: RoleType, t: BindingTarget): string | undefined {
    if (t.scopeRemoteId !== undefined) return undefined;
    return this.findRef(roleType === "org" ? "organizationScope" : "scope", "create", t.permissionId);
  }

  /**
   * Ref of a planned operation, matching the key case-insensitively.
   */
  private findRef(entityType: EntityType, kind: OperationKind, key: string): string | undefined {
    const k = lower(key);
    return this.operations.find((o) => o.entityType === entityType && o.kind === kind && lower(o.key) === k)?.ref;
  }

  planBindings(): void {
    for (const b of this.diff.bindings.filter(hasBindingChanges)) {
      this.add(this.bindingOperation(b));
    }
  }

  private bindingOperation(b: RoleBindingDiff): Operation {
    const key = bindingKey(b.roleType, b.roleKey);
    const kind: OperationKind = b.roleRemoteId === undefined ? "create" : "update";
    const ref = operationRef("rolePermission", kind, key);

    const add = b.add.map((p) => this.target(b.roleType, p.id));
    const replace = b.replace?.map((p) => this.target(b.roleType, p.id));

    const deps = new Set<string>();
    if (b.roleRemoteId === undefined) {
      deps.add(operationRef(roleEntityType(b.roleType), "create", b.roleKey));
    }
    for (const t of [...add, ...(replace ?? [])]) {
      const dep = this.targetDependency(b.roleType, t);
      if (dep) deps.add(dep);
    }
    for (const r of b.remove) {
      const k = `${b.roleType}:${lower(r.permissionId)}`;
      this.unbindRefs.set(k, [...(this.unbindRefs.get(k) ?? []), ref]);
    }

    return op(
      "rolePermission",
      kind,
      key,
      { type: "bindPermissions", roleType: b.roleType, roleKey: b.roleKey, roleRemoteId: b.roleRemoteId, add, remove: b.remove, replace },
      [...deps]
    );
  }

  planApplications(): void {
    const apps = this.diff.applications;
    if (apps) {
      for (const c of apps.create) {
        this.add(op("application", "create", c.key, { type: "createApplication", application: c.value }));
      }
      for (const u of apps.update) {
        this.add(op("application", "update", u.key, { type: "updateApplication", application: u.desired, remoteId: u.actual.remoteId }));
      }
      for (const del of apps.delete) {
        const a = del.value;
        this.deletions.push({
          entityType: "application",
          key: del.key,
          name: a.name,
          description: a.description,
          isDefault: false,
          build: () => op("application", "delete", del.key, { type: "deleteApplication", name: a.name, remoteId: a.remoteId })
        });
      }
    }

    const access = this.diff.applicationAccess;
    if (access) {
      const remoteIds = new Map((apps ? [...apps.update, ...apps.unchanged] : []).map((p) => [lower(p.key), p.actual.remoteId]));
      for (const c of access.create) {
        this.add(
          op(
            "applicationAccess",
            "create",
            c.key,
            { type: "setAccessControl", applicationName: c.key, remoteId: undefined, accessControl: c.value },
            [operationRef("application", "create", c.key)]
          )
        );
      }
      for (const u of access.update) {
        this.add(
          op("applicationAccess", "update", u.key, {
            type: "setAccessControl",
            applicationName: u.key,
            remoteId: remoteIds.get(lower(u.key)),
            accessControl: u.desired
          })
        );
      }
    }
  }

  private protectUpdate(candidate: DeletionCandidate): void {
    this.protectedUpdates.push({
      candidate,
      violation: new SafetyViolation(candidate.entityType, candidate.key, "provider default entity", "update")
    });
  }
}

function toCandidate(p: PendingDeletion): DeletionCandidate {
  return {
    entityType: p.entityType,
    key: p.key,
    name: p.name,
    description: p.description,
    isDefault: p.isDefault,
    indicator: p.indicator,
    parentProtected: p.parentProtected
  };
}

function stripCandidate(g: GuardedCandidate<PendingDeletion>): GuardedCandidate<DeletionCandidate> {
  return { candidate: toCandidate(g.candidate), violation: g.violation };
}

/**
 * Drops binding targets whose scope neither exists remotely nor is created by a
 * remaining operation, and bindings of roles that will not exist.
 */
function prunePrerequisites(operations: Operation[], skipped: SkippedItem[]): Operation[] {
  const planned = new Set(operations.map((o) => lower(o.ref)));
  const has = (entityType: EntityType, key: string): boolean => planned.has(lower(operationRef(entityType, "create", key)));
  const out: Operation[] = [];

  for (const operation of operations) {
    const payload = operation.payload;
    if (payload.type !== "bindPermissions") {
      out.push(operation);
      continue;
    }

    if (payload.roleRemoteId === undefined && !has(roleEntityType(payload.roleType), payload.roleKey)) {
      skipped.push({
        entityType: "rolePermission",
        key: operation.key,
        reason: `role "${payload.roleKey}" does not exist and is not planned`
      });
      continue;
    }

    const reachable = (t: BindingTarget): boolean => {
      if (t.scopeRemoteId !== undefined) return true;
      return has(payload.roleType === "org" ? "organizationScope" : "scope", t.permissionId);
    };

    const missing = new Map<string, BindingTarget>();
    for (const t of [...payload.add, ...(payload.replace ?? [])]) {
      if (!reachable(t)) missing.set(lower(t.permissionId), t);
    }
    for (const t of missing.values()) {
      skipped.push({
        entityType: "rolePermission",
        key: `${operation.key}->${t.permissionId}`,
        reason: `scope "${t.permissionId}" does not exist and is not planned`
      });
    }

    const add = payload.add.filter(reachable);
    const replace = payload.replace?.filter(reachable);
    if (add.length === 0 && payload.remove.length === 0 && replace === undefined) {
      continue;
    }
    out.push({ ...operation, payload: { ...payload, add, replace } });
  }

  return out;
}

function applySkipFlags(operations: Operation[], options: PlanOptions, skipped: SkippedItem[]): Operation[] {
  const reasons = new Map<EntityType, string>();
  for (const { flag, types } of SKIP_FLAGS) {
    if (!options[flag]) continue;
    for (const t of types) reasons.set(t, `phase skipped (${flag})`);
  }
  if (reasons.size === 0) return operations;

  return operations.filter((o) => {
    const reason = reasons.get(o.entityType);
    if (reason === undefined) return true;
    skipped.push({ entityType: o.entityType, key: o.key, reason });
    return false;
  });
}

/**
 * Turns a diff into phased operations.
 *
 * Creation/update phases follow {@link PHASE_ORDER}; deletion phases follow it in
 * reverse. Deletions pass through {@link filterDeletions} first and `onGuarded` sees
 * the outcome before ordering. Synchronous.
 */
export function orderOperations(
  diff: StateDiff,
  options: PlanOptions,
  onGuarded: (guard: GuardResult<DeletionCandidate>) => void = () => undefined
): ExecutionPlan {
  const builder = new PlanBuilder(diff, options.protection);
  builder.planResources();
  builder.planScopes();
  builder.planRoles("org");
  builder.planRoles("user");
  builder.planBindings();
  builder.planApplications();

  const guard = filterDeletions(builder.deletions, options.cleanup, options.protection);
  onGuarded(guard);
  for (const candidate of guard.allowed) {
    builder.add(candidate.build());
  }

  const skipped: SkippedItem[] = [];
  let operations = applySkipFlags(builder.operations, options, skipped);
  operations = prunePrerequisites(operations, skipped);

  const refs = new Set(operations.map((o) => o.ref));
  operations = operations.map((o) => ({ ...o, dependsOn: o.dependsOn.filter((d) => refs.has(d)) }));

  const phases: Phase[] = [];
  for (const name of PHASE_ORDER) {
    const ops = operations.filter((o) => o.phase === name && o.kind !== "delete");
    if (ops.length) phases.push({ name, stage: "apply", operations: ops });
  }
  for (const name of [...PHASE_ORDER].reverse()) {
    const ops = operations.filter((o) => o.phase === name && o.kind === "delete");
    if (ops.length) phases.push({ name, stage: "delete", operations: ops });
  }

  return {
    phases,
    blocked: guard.blocked.map(stripCandidate),
    protected: [...builder.protectedUpdates, ...guard.protected.map(stripCandidate)],
    skipped
  };
}

export function planOperations(plan: ExecutionPlan): Operation[] {
  return plan.phases.flatMap((p) => p.operations);
}
