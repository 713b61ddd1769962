import pLimit from "p-limit";
import { OperationError, describeError, isProviderErrorKind, isTransientError } from "../lib/errors";
import type { ApplicationInput, IdentityProviderClient } from "../lib/idp-client";
import type { Logger } from "../lib/logger";
import { RetryExhaustedError, withCountedRetry } from "../lib/retry";
import { isCancelled, type ReconcilerContext } from "./context";
import { lower, roleEntityType, scopeDescription, scopeKey, type EntityType, type ThirdPartyApplication } from "./model";
import { describeOperation, type BindingTarget, type ExecutionPlan, type Operation, type OperationPayload, type PhaseName } from "./plan";

export type OperationStatus = "succeeded" | "failed" | "skipped";

export interface OperationResult {
  ref: string;
  kind: Operation["kind"];
  entityType: EntityType;
  key: string;
  phase: PhaseName;
  status: OperationStatus;
  /**
   * True in dry-run: nothing was sent.
   */
  simulated: boolean;
  attempts: number;
  durationMs: number;
  message: string;
  remoteId?: string;
  error?: OperationError;
}

export interface ExecutionOutcome {
  /**
   * In plan order. Operations never started after cancellation are absent.
   */
  results: OperationResult[];
  cancelled: boolean;
}

/**
 * Remote ids learned during one run, keyed by entity type and natural key.
 */
export class RemoteIdRegistry {
  private readonly ids = new Map<string, string>();

  private static slot(entityType: EntityType, key: string): string {
    return `${entityType}:${lower(key)}`;
  }

  set(entityType: EntityType, key: string, remoteId: string): void {
    this.ids.set(RemoteIdRegistry.slot(entityType, key), remoteId);
  }

  get(entityType: EntityType, key: string): string | undefined {
    return this.ids.get(RemoteIdRegistry.slot(entityType, key));
  }

  require(entityType: EntityType, key: string): string {
    const id = this.get(entityType, key);
    if (id === undefined) {
      throw new Error(`Remote id of ${entityType} "${key}" is unknown`);
    }
    return id;
  }
}

async function ignoreNotFound(call: Promise<void>): Promise<void> {
  try {
    await call;
  } catch (err: unknown) {
    if (!isProviderErrorKind(err, "NotFound")) {
      throw err;
    }
  }
}

function applicationInput(app: ThirdPartyApplication): ApplicationInput {
  return {
    name: app.name,
    description: app.description,
    displayName: app.displayName,
    redirectUris: app.redirectUris,
    postLogoutRedirectUris: app.postLogoutRedirectUris,
    loginUrl: app.loginUrl,
    scopes: app.scopes
  };
}

async function bindPermissions(
  client: IdentityProviderClient,
  payload: Extract<OperationPayload, { type: "bindPermissions" }>,
  registry: RemoteIdRegistry,
  logger: Logger
): Promise<string> {
  const roleId = payload.roleRemoteId ?? registry.require(roleEntityType(payload.roleType), payload.roleKey);
  const scopeType: EntityType = payload.roleType === "org" ? "organizationScope" : "scope";
  const resolve = (t: BindingTarget): string => t.scopeRemoteId ?? registry.require(scopeType, t.permissionId);
  const bind = (scopeIds: string[]): Promise<void> =>
    payload.roleType === "org" ? client.assignOrganizationRoleScopes(roleId, scopeIds) : client.assignUserRoleScopes(roleId, scopeIds);
  const unbind = (scopeId: string): Promise<void> =>
    payload.roleType === "org" ? client.removeOrganizationRoleScope(roleId, scopeId) : client.removeUserRoleScope(roleId, scopeId);

  // Resolve everything before the first mutation.
  const assign = (payload.replace ?? payload.add).map(resolve);

  const removed: string[] = [];
  try {
    for (const b of payload.remove) {
      await ignoreNotFound(unbind(b.scopeRemoteId));
      removed.push(b.scopeRemoteId);
    }
    if (assign.length) {
      await bind(assign);
    }
  } catch (err: unknown) {
    // A rewrite removes bindings the role still needs; put them back before failing.
    if (payload.replace !== undefined && removed.length) {
      await restoreBindings(bind, removed, payload.roleKey, logger);
    }
    throw err;
  }
  return roleId;
}

async function restoreBindings(bind: (scopeIds: string[]) => Promise<void>, scopeIds: string[], roleKey: string, logger: Logger): Promise<void> {
  try {
    await bind(scopeIds);
    logger.warn(`restored ${scopeIds.length} binding(s) of role "${roleKey}" after a failed rewrite`);
  } catch (err: unknown) {
    logger.error(`could not restore bindings of role "${roleKey}"`, { scopeIds, error: describeError(err) });
  }
}

/**
 * Performs one operation against the provider. Returns the affected remote id.
 */
async function perform(
  client: IdentityProviderClient,
  operation: Operation,
  registry: RemoteIdRegistry,
  logger: Logger
): Promise<string | undefined> {
  const p = operation.payload;
  switch (p.type) {
    case "createResource": {
      const created = await client.createResource({
        name: p.resource.name,
        indicator: p.resource.indicator,
        accessTokenTtl: p.resource.accessTokenTtl
      });
      registry.set("resource", p.resource.name, created.id);
      return created.id;
    }
    case "updateResource":
      await client.updateResource(p.remoteId, { accessTokenTtl: p.accessTokenTtl });
      return p.remoteId;
    case "deleteResource":
      await ignoreNotFound(client.deleteResource(p.remoteId));
      return p.remoteId;

    case "createScope": {
      const resourceId = p.resourceRemoteId ?? registry.require("resource", p.resourceName);
      const created = await client.createScope(resourceId, {
        name: scopeKey(p.resourceName, p.action),
        description: scopeDescription(p.resourceName, p.action)
      });
      registry.set("scope", operation.key, created.id);
      return created.id;
    }
    case "deleteScope":
      await ignoreNotFound(client.deleteScope(p.resourceRemoteId, p.remoteId));
      return p.remoteId;

    case "createOrganizationScope": {
      const created = await client.createOrganizationScope({ name: p.name, description: p.description });
      registry.set("organizationScope", p.name, created.id);
      return created.id;
    }
    case "deleteOrganizationScope":
      await ignoreNotFound(client.deleteOrganizationScope(p.remoteId));
      return p.remoteId;

    case "createRole": {
      const input = { name: p.role.name, description: p.role.description };
      const created = p.role.type === "org" ? await client.createOrganizationRole(input) : await client.createUserRole(input);
      registry.set(roleEntityType(p.role.type), p.role.id, created.id);
      return created.id;
    }
    case "updateRole": {
      const input = { name: p.role.name, description: p.role.description };
      if (p.role.type === "org") {
        await client.updateOrganizationRole(p.remoteId, input);
      } else {
        await client.updateUserRole(p.remoteId, input);
      }
      return p.remoteId;
    }
    case "deleteRole":
      await ignoreNotFound(p.roleType === "org" ? client.deleteOrganizationRole(p.remoteId) : client.deleteUserRole(p.remoteId));
      return p.remoteId;

    case "bindPermissions":
      return await bindPermissions(client, p, registry, logger);

    case "createApplication": {
      // A retry after a partial create finishes the existing application.
      const existing = registry.get("application", p.application.name);
      if (existing !== undefined) {
        await client.updateThirdPartyApplication(existing, applicationInput(p.application));
        return existing;
      }
      const created = await client.createThirdPartyApplication(applicationInput(p.application), (id) =>
        registry.set("application", p.application.name, id)
      );
      return created.id;
    }
    case "updateApplication":
      await client.updateThirdPartyApplication(p.remoteId, applicationInput(p.application));
      return p.remoteId;
    case "deleteApplication":
      await ignoreNotFound(client.deleteThirdPartyApplication(p.remoteId));
      return p.remoteId;

    case "setAccessControl": {
      const id = p.remoteId ?? registry.require("application", p.applicationName);
      await client.setApplicationAccessControl(id, p.accessControl);
      return id;
    }
  }
}

const PAST_TENSE: Record<Operation["kind"], string> = {
  create: "created",
  update: "updated",
  delete: "deleted"
};

function baseResult(operation: Operation): Pick<OperationResult, "ref" | "kind" | "entityType" | "key" | "phase"> {
  return {
    ref: operation.ref,
    kind: operation.kind,
    entityType: operation.entityType,
    key: operation.key,
    phase: operation.phase
  };
}

async function runOperation(
  ctx: ReconcilerContext,
  operation: Operation,
  registry: RemoteIdRegistry,
  statusByRef: ReadonlyMap<string, OperationStatus>
): Promise<OperationResult> {
  const failedDependency = operation.dependsOn.find((ref) => statusByRef.get(ref) !== "succeeded");
  if (failedDependency !== undefined) {
    ctx.logger.warn(`skipping ${describeOperation(operation)}`, { prerequisite: failedDependency });
    return {
      ...baseResult(operation),
      status: "skipped",
      simulated: ctx.options.dryRun,
      attempts: 0,
      durationMs: 0,
      message: `prerequisite ${failedDependency} did not succeed`
    };
  }

  if (ctx.options.dryRun) {
    return {
      ...baseResult(operation),
      status: "succeeded",
      simulated: true,
      attempts: 0,
      durationMs: 0,
      message: `would ${describeOperation(operation)}`
    };
  }

  const started = Date.now();
  try {
    const { value, attempts } = await withCountedRetry(() => perform(ctx.client, operation, registry, ctx.logger), {
      ...ctx.settings.writeRetry,
      shouldRetry: isTransientError,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
      onRetry: ({ attempt, delayMs, err }) => {
        ctx.logger.warn(`retrying ${describeOperation(operation)}`, { attempt, delayMs, error: describeError(err) });
      }
    });
    ctx.logger.info(`${PAST_TENSE[operation.kind]} ${operation.entityType} "${operation.key}"`, { remoteId: value });
    return {
      ...baseResult(operation),
      status: "succeeded",
      simulated: false,
      attempts,
      durationMs: Date.now() - started,
      message: `${PAST_TENSE[operation.kind]} ${operation.entityType} "${operation.key}"`,
      ...(value !== undefined ? { remoteId: value } : {})
    };
  } catch (err: unknown) {
    const cause = err instanceof RetryExhaustedError ? err.cause : err;
    const attempts = err instanceof RetryExhaustedError ? err.attempts : 1;
    const error = new OperationError(operation.ref, cause, attempts);
    ctx.logger.error(`failed to ${describeOperation(operation)}`, { error: describeError(cause), attempts });
    return {
      ...baseResult(operation),
      status: "failed",
      simulated: false,
      attempts,
      durationMs: Date.now() - started,
      message: describeError(cause),
      error
    };
  }
}

/**
 * Runs the plan phase by phase.
 *
 * Operations of a phase go through a bounded pool; a phase finishes before the next
 * starts. A failure, authorization failures included, is terminal for that operation
 * only: its dependents are skipped and independent work carries on. Cancellation
 * stops starting new operations; in-flight ones complete.
 */
export async function applyPlan(ctx: ReconcilerContext, plan: ExecutionPlan): Promise<ExecutionOutcome> {
  const registry = new RemoteIdRegistry();
  const statusByRef = new Map<string, OperationStatus>();
  const results: OperationResult[] = [];

  for (const phase of plan.phases) {
    if (isCancelled(ctx)) break;

    ctx.logger.info(`${phase.stage === "apply" ? "applying" : "deleting"} ${phase.name}`, {
      operations: phase.operations.length,
      dryRun: ctx.options.dryRun
    });

    const limit = pLimit(ctx.settings.concurrency);
    const slots: Array<OperationResult | undefined> = phase.operations.map(() => undefined);

    await Promise.all(
      phase.operations.map((operation, i) =>
        limit(async () => {
          if (isCancelled(ctx)) return;
          const result = await runOperation(ctx, operation, registry, statusByRef);
          statusByRef.set(operation.ref, result.status);
          slots[i] = result;
        })
      )
    );

    for (const result of slots) {
      if (result) results.push(result);
    }
  }

  const cancelled = isCancelled(ctx);
  if (cancelled) {
    ctx.logger.warn("run cancelled; remaining operations were not started");
  }

  return { results, cancelled };
}
