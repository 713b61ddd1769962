import { z } from "zod";

const zName = z.string().trim().min(1);

const zProtectedNames = z
  .object({
    resources: z.array(zName).default([]),
    scopes: z.array(zName).default([]),
    organization_scopes: z.array(zName).default([]),
    organization_roles: z.array(zName).default([]),
    user_roles: z.array(zName).default([]),
    applications: z.array(zName).default([])
  })
  .strict();

export const zPolicyConfig = z
  .object({
    protected_names: zProtectedNames.default({})
  })
  .strict();

export const zMetadataConfig = z
  .object({
    name: zName,
    version: z.string().trim().min(1).optional(),
    description: z.string().optional()
  })
  .strict();

export const zPermissionRefConfig = z
  .object({
    id: zName,
    name: z.string().trim().min(1).optional()
  })
  .strict();

export const zRoleConfig = z
  .object({
    id: zName,
    name: zName,
    priority: z.number().int().nonnegative(),
    // Informational only; the section a role is declared in decides its type.
    type: z.string().trim().min(1).optional(),
    description: z.string().trim().min(1).optional(),
    permissions: z.array(zPermissionRefConfig).nullish().transform((v) => v ?? [])
  })
  .strict();

export const zResourceConfig = z
  .object({
    name: zName,
    actions: z.array(zName).default([]),
    indicator: z.string().trim().url().optional(),
    access_token_ttl: z.number().int().positive().optional()
  })
  .strict();

export const zAccessControlConfig = z
  .object({
    organization_roles: z.array(zName).default([]),
    user_roles: z.array(zName).default([])
  })
  .strict();

export const zThirdPartyAppConfig = z
  .object({
    name: zName,
    display_name: z.string().trim().default(""),
    description: z.string().trim().default(""),
    redirect_uris: z.array(z.string().trim().url()).default([]),
    post_logout_redirect_uris: z.array(z.string().trim().url()).default([]),
    login_url: z.string().trim().url().optional(),
    access_control: zAccessControlConfig.default({}),
    scopes: z.array(zName).optional()
  })
  .strict();

export const zHierarchyConfig = z
  .object({
    organization_roles: z.array(zRoleConfig).nullish().transform((v) => v ?? []),
    user_roles: z.array(zRoleConfig).nullish().transform((v) => v ?? []),
    resources: z.array(zResourceConfig).nullish().transform((v) => v ?? [])
  })
  .strict();

/**
 * Full RBAC config file (after overlays are merged).
 */
export const zRbacConfig = z
  .object({
    metadata: zMetadataConfig,
    policy: zPolicyConfig.default({}),
    hierarchy: zHierarchyConfig.default({}),
    // Omitted => applications are not managed; [] => manage and expect none.
    third_party_apps: z.array(zThirdPartyAppConfig).optional()
  })
  .strict();

/**
 * One overlay file: every section optional.
 */
export const zRbacConfigPartial = z
  .object({
    metadata: zMetadataConfig.partial().optional(),
    policy: zPolicyConfig.optional(),
    hierarchy: z
      .object({
        organization_roles: z.array(zRoleConfig).optional(),
        user_roles: z.array(zRoleConfig).optional(),
        resources: z.array(zResourceConfig).optional()
      })
      .strict()
      .optional(),
    third_party_apps: z.array(zThirdPartyAppConfig).optional()
  })
  .strict();

export type RbacConfig = z.infer<typeof zRbacConfig>;
export type RbacConfigInput = z.input<typeof zRbacConfig>;
export type RbacConfigPartial = z.infer<typeof zRbacConfigPartial>;
export type RoleConfig = z.infer<typeof zRoleConfig>;
export type ResourceConfig = z.infer<typeof zResourceConfig>;
export type ThirdPartyAppConfig = z.infer<typeof zThirdPartyAppConfig>;
