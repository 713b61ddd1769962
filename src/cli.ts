#!/usr/bin/env node
import "dotenv/config";
import { stringify } from "yaml";
import { z } from "zod";
import { readApiBaseUrl, readLoggingEnv, readProviderEnv } from "./config/env";
import { ValidationError } from "./lib/errors";
import { createLogger, type Logger } from "./lib/logger";
import { ManagementApiClient } from "./lib/management-api-client";
import { buildDesiredState, validateDesiredState } from "./rbac/desired-state";
import { loadRbacConfig } from "./rbac/load-config";
import { reconcile } from "./rbac/reconcile";
import { renderReport } from "./rbac/report";

type FlagValue = string | boolean;

interface ParsedCli {
  command?: string;
  flags: Record<string, FlagValue>;
  positionals: string[];
}

const BOOLEAN_FLAGS = new Set([
  "dry-run",
  "cleanup",
  "skip-resources",
  "skip-roles",
  "skip-permissions",
  "force",
  "ignore-permission-order",
  "json",
  "help"
]);

function parseCli(argv: string[]): ParsedCli {
  const [command, ...rest] = argv;
  const flags: Record<string, FlagValue> = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (token === undefined) continue;
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const withoutPrefix = token.slice(2);
    const eqIdx = withoutPrefix.indexOf("=");
    if (eqIdx >= 0) {
      flags[withoutPrefix.slice(0, eqIdx)] = withoutPrefix.slice(eqIdx + 1);
      continue;
    }

    const key = withoutPrefix;
    const next = rest[i + 1];
    if (next && !next.startsWith("--") && !BOOLEAN_FLAGS.has(key)) {
      flags[key] = next;
      i += 1;
      continue;
    }
    flags[key] = true;
  }

  const parsed: ParsedCli = { flags, positionals };
  if (command) {
    parsed.command = command;
  }
  return parsed;
}

const DEFAULT_CONFIG_PATH = "configs/rbac.yml";

function printHelp(): void {
  console.log(`
RBAC reconciler

Usage:
  rbac-reconciler <command> [--flags]

Commands:
  sync      Converge the tenant's RBAC state to the config
  plan      Same as "sync --dry-run"
  validate  Load and validate the config; no network access

Flags:
  --config <file[,file...]>    Config file(s), merged left to right (default: ${DEFAULT_CONFIG_PATH})
  --dry-run                    Compute and print operations without applying them
  --cleanup                    Delete remote entities missing from the config (never protected ones)
  --skip-resources             Leave resources and their scopes alone
  --skip-roles                 Leave organization and user roles alone
  --skip-permissions           Leave organization scopes and role-permission bindings alone
  --force                      Continue despite config validation issues
  --ignore-permission-order    Compare role permissions as sets
  --output text|json|yaml      Report format (default: text); --json is short for --output json
  --concurrency <n>            Parallel remote calls per phase (default: SYNC_CONCURRENCY or 4)

Environment:
  TENANT_ID | TENANT_DOMAIN, BACKEND_CLIENT_ID, BACKEND_CLIENT_SECRET, API_BASE_URL,
  LOG_LEVEL, LOG_FORMAT, SYNC_CONCURRENCY

Examples:
  rbac-reconciler validate --config configs/rbac.yml
  rbac-reconciler plan --config configs/rbac.yml,configs/rbac.staging.yml --output yaml
  rbac-reconciler sync --config configs/rbac.yml --cleanup
`);
}

function getStringFlag(flags: Record<string, FlagValue>, key: string): string | undefined {
  const v = flags[key];
  return typeof v === "string" && v.length ? v : undefined;
}

function getBooleanFlag(flags: Record<string, FlagValue>, key: string): boolean {
  const v = flags[key];
  return v === true || v === "true";
}

function outputFormat(flags: Record<string, FlagValue>): string | undefined {
  return flags.json === true ? "json" : getStringFlag(flags, "output");
}

const zOutput = z.enum(["text", "json", "yaml"]).default("text");

const zSyncArgs = z
  .object({
    config: z.string().min(1),
    dryRun: z.boolean(),
    cleanup: z.boolean(),
    skipResources: z.boolean(),
    skipRoles: z.boolean(),
    skipPermissions: z.boolean(),
    force: z.boolean(),
    ignorePermissionOrder: z.boolean(),
    output: zOutput,
    concurrency: z.coerce.number().int().min(1).max(32).optional()
  })
  .strict();

type SyncArgs = z.infer<typeof zSyncArgs>;

function parseSyncArgs(flags: Record<string, FlagValue>, forceDryRun: boolean): SyncArgs {
  return zSyncArgs.parse({
    config: getStringFlag(flags, "config") ?? DEFAULT_CONFIG_PATH,
    dryRun: forceDryRun || getBooleanFlag(flags, "dry-run"),
    cleanup: getBooleanFlag(flags, "cleanup"),
    skipResources: getBooleanFlag(flags, "skip-resources"),
    skipRoles: getBooleanFlag(flags, "skip-roles"),
    skipPermissions: getBooleanFlag(flags, "skip-permissions"),
    force: getBooleanFlag(flags, "force"),
    ignorePermissionOrder: getBooleanFlag(flags, "ignore-permission-order"),
    output: outputFormat(flags),
    concurrency: getStringFlag(flags, "concurrency")
  });
}

async function runSync(args: SyncArgs, logger: Logger): Promise<void> {
  const env = readProviderEnv();
  const config = await loadRbacConfig(args.config);
  const desired = buildDesiredState(config, { apiBaseUrl: env.apiBaseUrl });

  const client = new ManagementApiClient({
    baseUrl: env.endpoint,
    clientId: env.clientId,
    clientSecret: env.clientSecret,
    logger
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("interrupt received; finishing in-flight operations");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await reconcile(
      desired,
      {
        dryRun: args.dryRun,
        cleanup: args.cleanup,
        skipResources: args.skipResources,
        skipRoles: args.skipRoles,
        skipPermissions: args.skipPermissions,
        force: args.force
      },
      {
        client,
        logger,
        signal: controller.signal,
        settings: {
          concurrency: args.concurrency ?? env.concurrency ?? 4,
          permissionOrder: args.ignorePermissionOrder ? "set" : "strict"
        }
      }
    );

    console.log(renderReport(report, args.output));
    if (!report.success) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runValidate(flags: Record<string, FlagValue>): Promise<void> {
  const args = z
    .object({ config: z.string().min(1), output: zOutput })
    .strict()
    .parse({ config: getStringFlag(flags, "config") ?? DEFAULT_CONFIG_PATH, output: outputFormat(flags) });

  const config = await loadRbacConfig(args.config);
  const desired = buildDesiredState(config, { apiBaseUrl: readApiBaseUrl() });
  const issues = validateDesiredState(desired);

  if (args.output !== "text") {
    const result = { valid: issues.length === 0, config: desired.metadata.name, issues };
    console.log(args.output === "json" ? JSON.stringify(result, null, 2) : stringify(result));
  } else if (issues.length === 0) {
    console.log(
      `valid: ${desired.metadata.name}\tresources=${desired.resources.length}\torganizationRoles=${desired.organizationRoles.length}\tuserRoles=${desired.userRoles.length}\tapplications=${desired.applications ? desired.applications.length : "unmanaged"}`
    );
  } else {
    for (const issue of issues) {
      console.log(`${issue.path}: ${issue.message}`);
    }
  }

  if (issues.length) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const parsed = parseCli(process.argv.slice(2));
  if (!parsed.command || parsed.flags.help === true) {
    printHelp();
    return;
  }

  const logger = createLogger(readLoggingEnv());

  switch (parsed.command) {
    case "sync": {
      await runSync(parseSyncArgs(parsed.flags, false), logger);
      return;
    }
    case "plan": {
      await runSync(parseSyncArgs(parsed.flags, true), logger);
      return;
    }
    case "validate": {
      await runValidate(parsed.flags);
      return;
    }
    default: {
      printHelp();
      throw new Error(`Unknown command: ${parsed.command}`);
    }
  }
}

main().catch((err: unknown) => {
  if (err instanceof ValidationError) {
    console.error("Config is invalid:");
    for (const issue of err.issues) {
      console.error(`  ${issue.path}: ${issue.message}`);
    }
  }
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`Fatal: ${msg}`);
  process.exitCode = 1;
});
