import fs from "node:fs/promises";
import path from "node:path";
import { parseDocument } from "yaml";
import { ZodError } from "zod";
import { ValidationError, type ValidationIssue } from "../lib/errors";
import {
  zRbacConfig,
  zRbacConfigPartial,
  type RbacConfig,
  type RbacConfigInput,
  type RbacConfigPartial
} from "./config-schema";
import { buildDesiredState, type BuildDesiredStateOptions } from "./desired-state";
import type { DesiredState } from "./model";

export interface LoadConfigOptions {
  /**
   * Config paths must resolve inside this directory. Defaults to the working directory.
   */
  rootDir?: string;
}

function resolvePathWithinRoot(inputPath: string, rootDir: string): string {
  const candidate = inputPath.trim();
  if (!candidate || candidate.includes("\0") || candidate.includes("\n") || candidate.includes("\r")) {
    throw new Error(`Invalid config path: "${inputPath}"`);
  }

  const root = path.resolve(rootDir);
  const rootWithSep = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  const resolved = path.normalize(path.resolve(root, candidate));
  if (resolved !== root && !resolved.startsWith(rootWithSep)) {
    throw new Error(`Config path must be within "${root}": "${inputPath}"`);
  }
  return resolved;
}

function zodIssues(err: ZodError, file?: string): ValidationIssue[] {
  return err.issues.map((i) => ({
    path: [file, i.path.join(".")].filter((p): p is string => Boolean(p)).join(":"),
    message: i.message
  }));
}

function parseRaw(raw: string, resolved: string): unknown {
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") {
    const doc = parseDocument(raw, { uniqueKeys: true });
    if (doc.errors.length > 0) {
      const details = doc.errors.map((e) => e.message).join("; ");
      throw new Error(`Invalid YAML in "${resolved}": ${details}`);
    }
    return doc.toJS();
  }

  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in "${resolved}": ${msg}`);
  }
}

async function loadConfigPart(configPath: string, rootDir: string): Promise<RbacConfigPartial> {
  const resolved = resolvePathWithinRoot(configPath, rootDir);
  const raw = await fs.readFile(resolved, "utf-8");
  const parsed = parseRaw(raw, resolved);

  const result = zRbacConfigPartial.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ValidationError(zodIssues(result.error, path.basename(resolved)));
  }
  return result.data;
}

function mergeByKey<T>(base: T[], overlay: T[], keyOf: (item: T) => string): T[] {
  const map = new Map<string, T>();
  for (const e of base) {
    map.set(keyOf(e), e);
  }
  for (const o of overlay) {
    map.set(keyOf(o), o);
  }
  return [...map.values()];
}

function mergeStringSet(base: string[] | undefined, overlay: string[] | undefined): string[] {
  return [...new Set([...(base ?? []), ...(overlay ?? [])])];
}

const byName = (e: { name: string }): string => e.name.trim().toLowerCase();
const byId = (e: { id: string }): string => e.id;

/**
 * Merges overlay parts left to right. Entities are replaced whole by natural key
 * (resources and applications by name, roles by id); protected-name lists are unioned.
 */
export function mergeConfigParts(parts: RbacConfigPartial[]): RbacConfigInput {
  if (parts.length === 0) {
    throw new Error("No config parts to merge.");
  }

  let metadata: Partial<RbacConfig["metadata"]> = {};
  const protectedNames: Record<string, string[]> = {};
  let resources: RbacConfig["hierarchy"]["resources"] = [];
  let organizationRoles: RbacConfig["hierarchy"]["organization_roles"] = [];
  let userRoles: RbacConfig["hierarchy"]["user_roles"] = [];
  let apps: RbacConfig["third_party_apps"];

  for (const p of parts) {
    if (p.metadata) metadata = { ...metadata, ...p.metadata };
    if (p.policy) {
      for (const [k, v] of Object.entries(p.policy.protected_names)) {
        protectedNames[k] = mergeStringSet(protectedNames[k], v);
      }
    }
    if (p.hierarchy?.resources) resources = mergeByKey(resources, p.hierarchy.resources, byName);
    if (p.hierarchy?.organization_roles) organizationRoles = mergeByKey(organizationRoles, p.hierarchy.organization_roles, byId);
    if (p.hierarchy?.user_roles) userRoles = mergeByKey(userRoles, p.hierarchy.user_roles, byId);
    if (p.third_party_apps) apps = mergeByKey(apps ?? [], p.third_party_apps, byName);
  }

  const merged: RbacConfigInput = {
    metadata: { ...metadata, name: metadata.name ?? "" },
    policy: { protected_names: protectedNames },
    hierarchy: {
      resources,
      organization_roles: organizationRoles,
      user_roles: userRoles
    }
  };
  if (apps) merged.third_party_apps = apps;
  return merged;
}

/**
 * Loads an RBAC config from one or more comma-separated JSON/YAML files.
 *
 * @throws ValidationError when a file or the merged result does not match the schema.
 */
export async function loadRbacConfig(configPath: string, options: LoadConfigOptions = {}): Promise<RbacConfig> {
  const rootDir = options.rootDir ?? process.cwd();
  const configPaths = configPath
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);

  if (configPaths.length === 0) {
    throw new Error("Missing config path.");
  }

  const parts: RbacConfigPartial[] = [];
  for (const p of configPaths) {
    parts.push(await loadConfigPart(p, rootDir));
  }

  try {
    return zRbacConfig.parse(mergeConfigParts(parts));
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      throw new ValidationError(zodIssues(err));
    }
    throw err;
  }
}

/**
 * Loads config files and builds the desired-state model. Semantic validation runs
 * later, inside `reconcile`, so `force` can bypass it.
 */
export async function loadDesiredState(
  configPath: string,
  options: LoadConfigOptions & BuildDesiredStateOptions
): Promise<DesiredState> {
  const config = await loadRbacConfig(configPath, options);
  return buildDesiredState(config, options);
}
