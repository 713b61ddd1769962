import { z } from "zod";
import type { LogFormat, LogLevel } from "../lib/logger";

// dotenv leaves unset-but-declared keys as "".
const optionalString = z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), z.string().trim().min(1).optional());

const optionalUrl = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().url().optional()
);

const zLoggingEnv = z.object({
  LOG_LEVEL: z.preprocess((v) => (typeof v === "string" && v.trim() ? v.trim().toLowerCase() : undefined), z.enum(["debug", "info", "warn", "error"]).default("info")),
  LOG_FORMAT: z.preprocess((v) => (typeof v === "string" && v.trim() ? v.trim().toLowerCase() : undefined), z.enum(["pretty", "json"]).default("pretty"))
});

const zProviderEnv = z
  .object({
    TENANT_ID: optionalString,
    // Full endpoint, e.g. a self-hosted instance. Wins over TENANT_ID.
    TENANT_DOMAIN: optionalUrl,
    BACKEND_CLIENT_ID: z.string().trim().min(1, "BACKEND_CLIENT_ID is required"),
    BACKEND_CLIENT_SECRET: z.string().trim().min(1, "BACKEND_CLIENT_SECRET is required"),
    // Base for default resource indicators.
    API_BASE_URL: optionalUrl,
    SYNC_CONCURRENCY: z.preprocess(
      (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
      z.coerce.number().int().min(1).max(32).optional()
    )
  })
  .refine((e) => Boolean(e.TENANT_ID || e.TENANT_DOMAIN), {
    message: "Provide TENANT_ID or TENANT_DOMAIN."
  });

export interface LoggingEnv {
  level: LogLevel;
  format: LogFormat;
}

export interface ProviderEnv {
  /**
   * Management endpoint without trailing slash, e.g. `https://<tenant>.logto.app`.
   */
  endpoint: string;
  clientId: string;
  clientSecret: string;
  apiBaseUrl: string;
  concurrency: number | undefined;
}

export type EnvSource = Record<string, string | undefined>;

export function readLoggingEnv(env: EnvSource = process.env): LoggingEnv {
  const parsed = zLoggingEnv.parse({ LOG_LEVEL: env.LOG_LEVEL, LOG_FORMAT: env.LOG_FORMAT });
  return { level: parsed.LOG_LEVEL, format: parsed.LOG_FORMAT };
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Reads management-API credentials and endpoints.
 *
 * @throws ZodError when credentials or the tenant are missing.
 */
export function readProviderEnv(env: EnvSource = process.env): ProviderEnv {
  const parsed = zProviderEnv.parse({
    TENANT_ID: env.TENANT_ID,
    TENANT_DOMAIN: env.TENANT_DOMAIN,
    BACKEND_CLIENT_ID: env.BACKEND_CLIENT_ID,
    BACKEND_CLIENT_SECRET: env.BACKEND_CLIENT_SECRET,
    API_BASE_URL: env.API_BASE_URL,
    SYNC_CONCURRENCY: env.SYNC_CONCURRENCY
  });

  const endpoint = trimSlash(parsed.TENANT_DOMAIN ?? `https://${parsed.TENANT_ID ?? ""}.logto.app`);
  return {
    endpoint,
    clientId: parsed.BACKEND_CLIENT_ID,
    clientSecret: parsed.BACKEND_CLIENT_SECRET,
    apiBaseUrl: trimSlash(parsed.API_BASE_URL ?? endpoint),
    concurrency: parsed.SYNC_CONCURRENCY
  };
}

/**
 * Indicator base for commands that never talk to the provider (e.g. `validate`).
 */
export function readApiBaseUrl(env: EnvSource = process.env): string {
  const explicit = optionalUrl.parse(env.API_BASE_URL);
  if (explicit) return trimSlash(explicit);
  const domain = optionalUrl.parse(env.TENANT_DOMAIN);
  if (domain) return trimSlash(domain);
  const tenant = optionalString.parse(env.TENANT_ID);
  return tenant ? `https://${tenant}.logto.app` : "http://localhost:3001";
}

