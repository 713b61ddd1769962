import { stringify } from "yaml";
import type { ProviderErrorKind } from "../lib/errors";
import type { ReconcileOptions } from "./context";
import { hasBindingChanges, type StateDiff } from "./diff";
import type { ExecutionOutcome, OperationResult, OperationStatus } from "./executor";
import type { DeletionCandidate, GuardedCandidate } from "./guard";
import { ENTITY_TYPES, type EntityType } from "./model";
import type { ExecutionPlan, OperationKind, PhaseName } from "./plan";

export type RunStatus = "reported" | "aborted";

export type ReportFormat = "text" | "json" | "yaml";

export interface EntityCounts {
  create: number;
  update: number;
  delete: number;
  unchanged: number;
  protected: number;
  skipped: number;
  failed: number;
}

export interface ReportedError {
  kind: ProviderErrorKind | "Unknown";
  message: string;
  transient: boolean;
  attempts: number;
}

export interface ReportedOperation {
  ref: string;
  kind: OperationKind;
  entityType: EntityType;
  key: string;
  phase: PhaseName;
  status: OperationStatus;
  simulated: boolean;
  attempts: number;
  durationMs: number;
  message: string;
  remoteId?: string;
  error?: ReportedError;
}

export interface ReportedEntity {
  entityType: EntityType;
  key: string;
  reason: string;
}

/**
 * The single artifact of a run. Plain data: safe to serialize as JSON or YAML.
 */
export interface RunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dryRun: boolean;
  cleanup: boolean;
  status: RunStatus;
  /**
   * False when any allowed operation failed or the run was cancelled.
   */
  success: boolean;
  cancelled: boolean;
  abortReason?: string;
  desiredHash: string;
  counts: Record<EntityType, EntityCounts>;
  operations: ReportedOperation[];
  wouldRemove: ReportedEntity[];
  protected: ReportedEntity[];
  skipped: ReportedEntity[];
  warnings: string[];
  errors: Array<ReportedError & { ref: string }>;
}

export interface BuildRunReportInput {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  options: Pick<ReconcileOptions, "dryRun" | "cleanup">;
  desiredHash: string;
  diff: StateDiff;
  plan: ExecutionPlan;
  outcome: ExecutionOutcome;
  warnings?: string[];
}

export function emptyCounts(): EntityCounts {
  return { create: 0, update: 0, delete: 0, unchanged: 0, protected: 0, skipped: 0, failed: 0 };
}

function allCounts(): Record<EntityType, EntityCounts> {
  return {
    resource: emptyCounts(),
    scope: emptyCounts(),
    organizationScope: emptyCounts(),
    organizationRole: emptyCounts(),
    userRole: emptyCounts(),
    rolePermission: emptyCounts(),
    application: emptyCounts(),
    applicationAccess: emptyCounts()
  };
}

function reportOperation(r: OperationResult): ReportedOperation {
  const out: ReportedOperation = {
    ref: r.ref,
    kind: r.kind,
    entityType: r.entityType,
    key: r.key,
    phase: r.phase,
    status: r.status,
    simulated: r.simulated,
    attempts: r.attempts,
    durationMs: r.durationMs,
    message: r.message
  };
  if (r.remoteId !== undefined) out.remoteId = r.remoteId;
  if (r.error) {
    out.error = { kind: r.error.kind, message: r.error.message, transient: r.error.transient, attempts: r.error.attempts };
  }
  return out;
}

function reportGuarded(g: GuardedCandidate<DeletionCandidate>): ReportedEntity {
  return { entityType: g.candidate.entityType, key: g.candidate.key, reason: g.violation.reason };
}

/**
 * Aggregates diff, plan and execution outcome.
 */
export function buildRunReport(input: BuildRunReportInput): RunReport {
  const { diff, plan, outcome } = input;
  const counts = allCounts();

  counts.resource.unchanged = diff.resources.unchanged.length;
  counts.scope.unchanged = diff.scopes.unchanged.length;
  counts.organizationScope.unchanged = diff.organizationScopes.unchanged.length;
  counts.organizationRole.unchanged = diff.organizationRoles.unchanged.length;
  counts.userRole.unchanged = diff.userRoles.unchanged.length;
  counts.rolePermission.unchanged = diff.bindings.filter((b) => !hasBindingChanges(b)).length;
  counts.application.unchanged = diff.applications?.unchanged.length ?? 0;
  counts.applicationAccess.unchanged = diff.applicationAccess?.unchanged.length ?? 0;

  for (const r of outcome.results) {
    const c = counts[r.entityType];
    if (r.status === "succeeded") c[r.kind] += 1;
    else if (r.status === "failed") c.failed += 1;
    else c.skipped += 1;
  }
  for (const p of plan.protected) counts[p.candidate.entityType].protected += 1;
  for (const s of plan.skipped) counts[s.entityType].skipped += 1;

  const operations = outcome.results.map(reportOperation);
  const errors = operations.flatMap((o) => (o.error ? [{ ref: o.ref, ...o.error }] : []));

  const report: RunReport = {
    runId: input.runId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    dryRun: input.options.dryRun,
    cleanup: input.options.cleanup,
    status: outcome.cancelled ? "aborted" : "reported",
    success: errors.length === 0 && !outcome.cancelled,
    cancelled: outcome.cancelled,
    desiredHash: input.desiredHash,
    counts,
    operations,
    wouldRemove: plan.blocked.map(reportGuarded),
    protected: plan.protected.map(reportGuarded),
    skipped: plan.skipped.map((s) => ({ entityType: s.entityType, key: s.key, reason: s.reason })),
    warnings: [...diff.warnings, ...(input.warnings ?? [])],
    errors
  };
  if (outcome.cancelled) report.abortReason = "cancelled before every operation ran";
  return report;
}

const STATUS_MARK: Record<OperationStatus, string> = {
  succeeded: "✓",
  failed: "✗",
  skipped: "-"
};

function hasActivity(c: EntityCounts): boolean {
  return Object.values(c).some((n) => n > 0);
}

function renderText(report: RunReport): string {
  const lines: string[] = [];
  lines.push(`RBAC reconciliation${report.dryRun ? " (dry run)" : ""} run=${report.runId}`);
  lines.push(`Status: ${report.success ? "SUCCESS" : "FAILED"}${report.status === "aborted" ? ` (aborted: ${report.abortReason ?? "unknown"})` : ""}`);
  lines.push(`Cleanup: ${report.cleanup ? "enabled" : "disabled"}`);
  lines.push("");

  lines.push("Summary:");
  for (const t of ENTITY_TYPES) {
    const c = report.counts[t];
    if (!hasActivity(c)) continue;
    lines.push(
      `  ${t}: create=${c.create} update=${c.update} delete=${c.delete} unchanged=${c.unchanged} protected=${c.protected} skipped=${c.skipped} failed=${c.failed}`
    );
  }

  if (report.operations.length) {
    lines.push("");
    lines.push("Operations:");
    for (const o of report.operations) {
      lines.push(`  ${STATUS_MARK[o.status]} ${o.kind} ${o.entityType} "${o.key}"${o.status === "succeeded" ? "" : `: ${o.message}`}`);
    }
  }

  const section = (title: string, items: ReportedEntity[]): void => {
    if (!items.length) return;
    lines.push("");
    lines.push(`${title}:`);
    for (const i of items) lines.push(`  ${i.entityType} "${i.key}": ${i.reason}`);
  };
  section("Would remove (cleanup disabled)", report.wouldRemove);
  section("Protected", report.protected);
  section("Skipped", report.skipped);

  if (report.warnings.length) {
    lines.push("");
    lines.push("Warnings:");
    for (const w of report.warnings) lines.push(`  ${w}`);
  }

  return lines.join("\n");
}

export function renderReport(report: RunReport, format: ReportFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(report, null, 2);
    case "yaml":
      return stringify(report);
    case "text":
      return renderText(report);
  }
}
