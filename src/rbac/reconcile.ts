import { ValidationError } from "../lib/errors";
import type { IdentityProviderClient } from "../lib/idp-client";
import type { Logger } from "../lib/logger";
import { createReconcilerContext, type ExecutionSettings, type ReconcileOptions, type ReconcilerContext } from "./context";
import { validateDesiredState } from "./desired-state";
import { diffState, type StateDiff } from "./diff";
import { applyPlan } from "./executor";
import { createProtectionRules, isSystemPermission, type ProtectionRules } from "./guard";
import { fingerprintDesiredState } from "./hash";
import type { ActualState, DesiredState } from "./model";
import { orderOperations, planOperations, type ExecutionPlan } from "./plan";
import { fetchActualState } from "./remote-state";
import { buildRunReport, type RunReport } from "./report";

/**
 * States of one run. `aborted` is terminal and reachable from every other state.
 */
export type RunState = "validated" | "stateLoaded" | "diffed" | "guarded" | "ordered" | "applying" | "reported" | "aborted";

export interface ReconcileDeps {
  client: IdentityProviderClient;
  logger?: Logger;
  settings?: Partial<ExecutionSettings>;
  /**
   * Replaces the built-in protection rules. The desired state's protected names are
   * always added.
   */
  protection?: ProtectionRules;
  signal?: AbortSignal;
  runId?: string;
  onStateChange?: (state: RunState) => void;
  now?: () => Date;
}

export interface PlanResult {
  actual: ActualState;
  diff: StateDiff;
  plan: ExecutionPlan;
  warnings: string[];
}

function protectionFor(desired: DesiredState, base: ProtectionRules | undefined): ProtectionRules {
  const defaults = createProtectionRules({ protectedNames: desired.protectedNames });
  if (!base) return defaults;
  const names = base.protectedNames;
  const d = desired.protectedNames;
  return {
    ...base,
    protectedNames: {
      resources: [...names.resources, ...d.resources],
      scopes: [...names.scopes, ...d.scopes],
      organizationScopes: [...names.organizationScopes, ...d.organizationScopes],
      organizationRoles: [...names.organizationRoles, ...d.organizationRoles],
      userRoles: [...names.userRoles, ...d.userRoles],
      applications: [...names.applications, ...d.applications]
    }
  };
}

/**
 * Validates, reads remote state, diffs and orders. Mutates nothing.
 *
 * @throws ValidationError unless `force` is set.
 * @throws StateLoadError when remote state cannot be read.
 */
export async function planReconcile(
  ctx: ReconcilerContext,
  desired: DesiredState,
  onStateChange: (state: RunState) => void = () => undefined
): Promise<PlanResult> {
  const warnings: string[] = [];
  const issues = validateDesiredState(desired);
  if (issues.length) {
    if (!ctx.options.force) {
      throw new ValidationError(issues);
    }
    for (const issue of issues) {
      const w = `validation ignored (force): ${issue.path}: ${issue.message}`;
      ctx.logger.warn(w);
      warnings.push(w);
    }
  }
  onStateChange("validated");

  const actual = await fetchActualState(ctx, { includeApplications: desired.applications !== undefined });
  onStateChange("stateLoaded");

  const diff = diffState(desired, actual, {
    permissionOrder: ctx.settings.permissionOrder,
    isSystemPermission: (permissionId) => isSystemPermission(permissionId, ctx.protection)
  });
  onStateChange("diffed");

  const plan = orderOperations(diff, { ...ctx.options, protection: ctx.protection }, (guard) => {
    ctx.logger.debug("deletions guarded", { allowed: guard.allowed.length, blocked: guard.blocked.length, protected: guard.protected.length });
    onStateChange("guarded");
  });
  onStateChange("ordered");

  ctx.logger.info("plan ready", {
    operations: planOperations(plan).length,
    wouldRemove: plan.blocked.length,
    protected: plan.protected.length,
    skipped: plan.skipped.length
  });

  return { actual, diff, plan, warnings };
}

/**
 * Converges remote RBAC state toward `desired` and reports what happened.
 *
 * Operation failures are recorded in the report; only validation and state-load
 * failures throw.
 */
export async function reconcile(desired: DesiredState, options: Partial<ReconcileOptions>, deps: ReconcileDeps): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const notify = deps.onStateChange ?? (() => undefined);
  const startedAt = now();

  const ctx = createReconcilerContext({
    client: deps.client,
    options,
    protection: protectionFor(desired, deps.protection),
    ...(deps.logger ? { logger: deps.logger } : {}),
    ...(deps.settings ? { settings: deps.settings } : {}),
    ...(deps.signal ? { signal: deps.signal } : {}),
    ...(deps.runId ? { runId: deps.runId } : {})
  });

  ctx.logger.info("reconciliation started", {
    config: desired.metadata.name,
    dryRun: ctx.options.dryRun,
    cleanup: ctx.options.cleanup
  });

  let planned: PlanResult;
  try {
    planned = await planReconcile(ctx, desired, notify);
  } catch (err: unknown) {
    notify("aborted");
    throw err;
  }

  notify("applying");
  const outcome = await applyPlan(ctx, planned.plan);

  const report = buildRunReport({
    runId: ctx.runId,
    startedAt,
    finishedAt: now(),
    options: ctx.options,
    desiredHash: fingerprintDesiredState(desired),
    diff: planned.diff,
    plan: planned.plan,
    outcome,
    warnings: planned.warnings
  });
  notify(report.status);

  ctx.logger.info("reconciliation finished", { status: report.status, success: report.success, operations: report.operations.length });
  return report;
}
