import { z } from "zod";

/**
 * API resource (an audience with its own permission scopes).
 */
export const zRemoteResource = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    indicator: z.string(),
    isDefault: z.boolean().default(false),
    accessTokenTtl: z.number().int().nonnegative().default(3600)
  })
  .passthrough();

export type RemoteResource = z.infer<typeof zRemoteResource>;

/**
 * Permission scope of an API resource.
 */
export const zRemoteScope = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    resourceId: z.string().min(1)
  })
  .passthrough();

export type RemoteScope = z.infer<typeof zRemoteScope>;

export const zRemoteOrganizationScope = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().nullish()
  })
  .passthrough();

export type RemoteOrganizationScope = z.infer<typeof zRemoteOrganizationScope>;

/**
 * User role or organization role. Organization roles carry no `isDefault`.
 */
export const zRemoteRole = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    isDefault: z.boolean().default(false)
  })
  .passthrough();

export type RemoteRole = z.infer<typeof zRemoteRole>;

export const zRemoteAccessControl = z
  .object({
    organization_roles: z.array(z.string()).default([]),
    user_roles: z.array(z.string()).default([])
  })
  .passthrough();

export const zRemoteApplicationCustomData = z
  .object({
    access_control: zRemoteAccessControl.optional(),
    login_url: z.string().optional()
  })
  .passthrough();

export const zRemoteApplicationRecord = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    type: z.string().optional(),
    isThirdParty: z.boolean().default(false),
    oidcClientMetadata: z
      .object({
        redirectUris: z.array(z.string()).default([]),
        postLogoutRedirectUris: z.array(z.string()).default([])
      })
      .passthrough()
      .default({ redirectUris: [], postLogoutRedirectUris: [] }),
    customData: zRemoteApplicationCustomData.default({})
  })
  .passthrough();

export type RemoteApplicationRecord = z.infer<typeof zRemoteApplicationRecord>;

export const zRemoteApplicationBranding = z
  .object({
    displayName: z.string().nullish()
  })
  .passthrough();

export const zRemoteUserConsentScopes = z
  .object({
    userScopes: z.array(z.string()).default([])
  })
  .passthrough();

/**
 * Third-party application with its branding and consent scopes folded in.
 */
export interface RemoteApplication {
  id: string;
  name: string;
  description: string;
  displayName: string | undefined;
  redirectUris: string[];
  postLogoutRedirectUris: string[];
  loginUrl: string | undefined;
  accessControl: {
    organizationRoles: string[];
    userRoles: string[];
  };
  scopes: string[];
}

export const zTokenResponse = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().positive().default(3600),
    token_type: z.string().optional()
  })
  .passthrough();

export type TokenResponse = z.infer<typeof zTokenResponse>;

/**
 * Error body returned by the management API.
 */
export const zProviderErrorBody = z
  .object({
    code: z.string().optional(),
    message: z.string().optional()
  })
  .passthrough();
