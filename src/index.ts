export { readApiBaseUrl, readLoggingEnv, readProviderEnv, type LoggingEnv, type ProviderEnv } from "./config/env";
export {
  OperationError,
  ProviderError,
  ReconcileError,
  SafetyViolation,
  StateLoadError,
  ValidationError,
  type ProviderErrorKind,
  type ValidationIssue
} from "./lib/errors";
export type { IdentityProviderClient } from "./lib/idp-client";
export { createLogger, createSilentLogger, type Logger, type LogFormat, type LogLevel } from "./lib/logger";
export { ManagementApiClient, type ManagementApiClientOptions } from "./lib/management-api-client";
export { DEFAULT_PROVIDER_ERROR_CODES, type ProviderErrorCodeTable } from "./lib/provider-error-codes";

export { createReconcilerContext, type ExecutionSettings, type ReconcileOptions, type ReconcilerContext } from "./rbac/context";
export { buildDesiredState, validateDesiredState } from "./rbac/desired-state";
export { diffState, isEmptyDiff, type StateDiff } from "./rbac/diff";
export { applyPlan, type ExecutionOutcome, type OperationResult } from "./rbac/executor";
export { createProtectionRules, DEFAULT_PROTECTION_RULES, filterDeletions, type ProtectionRules } from "./rbac/guard";
export { loadDesiredState, loadRbacConfig } from "./rbac/load-config";
export type { ActualState, DesiredState, Resource, Role, ThirdPartyApplication } from "./rbac/model";
export { orderOperations, type ExecutionPlan, type Operation } from "./rbac/plan";
export { reconcile, planReconcile, type ReconcileDeps, type RunState } from "./rbac/reconcile";
export { fetchActualState } from "./rbac/remote-state";
export { buildRunReport, renderReport, type ReportFormat, type RunReport } from "./rbac/report";
