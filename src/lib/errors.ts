import { isRetryableHttpError } from "./retry";

export type ProviderErrorKind =
  | "NotFound"
  | "Conflict"
  | "RateLimited"
  | "Unauthorized"
  | "ServerError"
  | "NetworkError"
  | "Invalid";

const TRANSIENT_KINDS: ReadonlySet<ProviderErrorKind> = new Set(["RateLimited", "ServerError", "NetworkError"]);

export interface ProviderErrorDetails {
  kind: ProviderErrorKind;
  context: string;
  status?: number;
  code?: string;
  cause?: unknown;
}

/**
 * Typed failure of a single identity-provider call.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly context: string;
  readonly status: number | undefined;
  readonly code: string | undefined;

  constructor(message: string, details: ProviderErrorDetails) {
    super(`${details.context} failed: ${message}`, { cause: details.cause });
    this.name = "ProviderError";
    this.kind = details.kind;
    this.context = details.context;
    this.status = details.status;
    this.code = details.code;
  }

  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

/**
 * Base class of the errors the reconciler itself raises.
 */
export abstract class ReconcileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Desired state is unusable. Raised before any network access.
 */
export class ValidationError extends ReconcileError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    super(`Invalid desired state (${issues.length} issue${issues.length === 1 ? "" : "s"}): ${summary}`);
    this.issues = issues;
  }
}

/**
 * Reading a category of remote state failed; nothing was mutated.
 */
export class StateLoadError extends ReconcileError {
  readonly category: string;

  constructor(category: string, cause: unknown) {
    super(`Failed to load remote ${category}: ${describeError(cause)}`, { cause });
    this.category = category;
  }
}

/**
 * A single create/update/delete failed after any retries.
 */
export class OperationError extends ReconcileError {
  readonly operationRef: string;
  readonly kind: ProviderErrorKind | "Unknown";
  readonly transient: boolean;
  readonly attempts: number;

  constructor(operationRef: string, cause: unknown, attempts: number) {
    super(`${operationRef}: ${describeError(cause)}`, { cause });
    this.operationRef = operationRef;
    this.kind = cause instanceof ProviderError ? cause.kind : "Unknown";
    this.transient = isTransientError(cause);
    this.attempts = attempts;
  }
}

/**
 * A destructive operation that was withheld (cleanup disabled or protected entity).
 * Also used for updates refused on provider-default entities.
 */
export class SafetyViolation extends ReconcileError {
  readonly entityType: string;
  readonly key: string;
  readonly reason: string;

  constructor(entityType: string, key: string, reason: string, action: "delete" | "update" = "delete") {
    super(`Refusing to ${action} ${entityType} "${key}": ${reason}`);
    this.entityType = entityType;
    this.key = key;
    this.reason = reason;
  }
}

/**
 * True for 429/5xx/network failures, whether already classified or raw transport errors.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof ProviderError) {
    return err.transient;
  }
  return isRetryableHttpError(err);
}

export function isProviderErrorKind(err: unknown, kind: ProviderErrorKind): boolean {
  return err instanceof ProviderError && err.kind === kind;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
