import { randomUUID } from "node:crypto";
import type { IdentityProviderClient } from "../lib/idp-client";
import { createSilentLogger, type Logger } from "../lib/logger";
import type { RetryOptions } from "../lib/retry";
import { DEFAULT_PROTECTION_RULES, type ProtectionRules } from "./guard";

export interface ReconcileOptions {
  /**
   * Compute and report everything, call nothing that mutates.
   */
  dryRun: boolean;
  /**
   * Allow deletion of remote entities missing from the desired state.
   */
  cleanup: boolean;
  skipResources: boolean;
  skipRoles: boolean;
  skipPermissions: boolean;
  /**
   * Continue despite desired-state validation issues. Never bypasses the safety guard.
   */
  force: boolean;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  dryRun: false,
  cleanup: false,
  skipResources: false,
  skipRoles: false,
  skipPermissions: false,
  force: false
};

export type RetrySettings = Pick<RetryOptions, "retries" | "baseDelayMs" | "maxDelayMs" | "jitter">;

export interface ExecutionSettings {
  /**
   * Max concurrent remote calls within one phase (and per read category).
   */
  concurrency: number;
  readRetry: RetrySettings;
  writeRetry: RetrySettings;
  /**
   * "strict": a role's bindings must be stored in declaration order.
   * "set": only membership is compared.
   */
  permissionOrder: "strict" | "set";
}

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  concurrency: 4,
  readRetry: { retries: 4, baseDelayMs: 250, maxDelayMs: 8_000, jitter: true },
  writeRetry: { retries: 2, baseDelayMs: 250, maxDelayMs: 8_000, jitter: true },
  permissionOrder: "strict"
};

/**
 * Everything one reconciliation run needs, created per run and never shared between runs.
 */
export interface ReconcilerContext {
  readonly runId: string;
  readonly client: IdentityProviderClient;
  readonly logger: Logger;
  readonly options: ReconcileOptions;
  readonly settings: ExecutionSettings;
  readonly protection: ProtectionRules;
  readonly signal: AbortSignal | undefined;
}

export interface CreateReconcilerContextInput {
  client: IdentityProviderClient;
  logger?: Logger;
  options?: Partial<ReconcileOptions>;
  settings?: Partial<ExecutionSettings>;
  protection?: ProtectionRules;
  signal?: AbortSignal;
  runId?: string;
}

export function createReconcilerContext(input: CreateReconcilerContextInput): ReconcilerContext {
  const runId = input.runId ?? randomUUID();
  const settings: ExecutionSettings = { ...DEFAULT_EXECUTION_SETTINGS, ...(input.settings ?? {}) };
  if (!Number.isInteger(settings.concurrency) || settings.concurrency < 1) {
    throw new Error(`concurrency must be a positive integer (got ${settings.concurrency})`);
  }

  return {
    runId,
    client: input.client,
    logger: (input.logger ?? createSilentLogger()).child({ runId }),
    options: { ...DEFAULT_RECONCILE_OPTIONS, ...(input.options ?? {}) },
    settings,
    protection: input.protection ?? DEFAULT_PROTECTION_RULES,
    signal: input.signal
  };
}

export function isCancelled(ctx: ReconcilerContext): boolean {
  return ctx.signal?.aborted ?? false;
}
