import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { ZodError, z } from "zod";
import {
  zProviderErrorBody,
  zRemoteApplicationBranding,
  zRemoteApplicationRecord,
  zRemoteOrganizationScope,
  zRemoteResource,
  zRemoteRole,
  zRemoteScope,
  zRemoteUserConsentScopes,
  zTokenResponse,
  type RemoteApplication,
  type RemoteApplicationRecord,
  type RemoteOrganizationScope,
  type RemoteResource,
  type RemoteRole,
  type RemoteScope
} from "../types/provider-schema";
import { ProviderError, type ProviderErrorKind } from "./errors";
import type {
  AccessControlInput,
  ApplicationInput,
  IdentityProviderClient,
  ResourceInput,
  RoleInput,
  ScopeInput
} from "./idp-client";
import { createSilentLogger, type Logger } from "./logger";
import { DEFAULT_PROVIDER_ERROR_CODES, type ProviderErrorCodeTable } from "./provider-error-codes";
import { isRetryableHttpError } from "./retry";

const DEFAULT_PAGE_SIZE = 100;
const MAX_PAGES = 1_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export interface ManagementApiClientOptions {
  /**
   * Tenant endpoint, e.g. `https://<tenant>.logto.app`.
   */
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  logger?: Logger;

  /**
   * Provider error codes mapped to error kinds. Defaults to {@link DEFAULT_PROVIDER_ERROR_CODES}.
   */
  errorCodes?: ProviderErrorCodeTable;
  pageSize?: number;
  timeoutMs?: number;

  /**
   * Pre-configured axios instance (tests pass one with a custom adapter).
   */
  http?: AxiosInstance;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function statusToKind(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return "Unauthorized";
  if (status === 404) return "NotFound";
  if (status === 409) return "Conflict";
  if (status === 429) return "RateLimited";
  if (status >= 500) return "ServerError";
  return "Invalid";
}

/**
 * Maps a transport error onto a {@link ProviderError}: error code table first,
 * then HTTP status, then network heuristics.
 */
export function toProviderError(context: string, err: unknown, table: ProviderErrorCodeTable): ProviderError {
  if (err instanceof ProviderError) {
    return err;
  }

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body = zProviderErrorBody.safeParse(err.response?.data);
    const code = body.success ? body.data.code : undefined;
    const apiMessage = body.success ? body.data.message : undefined;

    const mapped = code !== undefined ? table[code] : undefined;
    const kind: ProviderErrorKind = mapped ?? (status !== undefined ? statusToKind(status) : "NetworkError");

    const parts = [
      status !== undefined ? `status=${status}` : `network=${err.code ?? "unknown"}`,
      code ? `code=${code}` : undefined,
      `message=${apiMessage ?? err.message}`
    ].filter((p): p is string => Boolean(p));

    return new ProviderError(parts.join("; "), {
      kind,
      context,
      cause: err,
      ...(status !== undefined ? { status } : {}),
      ...(code !== undefined ? { code } : {})
    });
  }

  if (err instanceof ZodError) {
    return new ProviderError(`unexpected response shape: ${err.issues.map((i) => i.message).join(", ")}`, {
      kind: "Invalid",
      context,
      cause: err
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(message, {
    kind: isRetryableHttpError(err) ? "NetworkError" : "Invalid",
    context,
    cause: err
  });
}

/**
 * Paginated list bodies come either as a bare array or wrapped in `{ data: [...] }`.
 */
function unwrapList(data: unknown): unknown[] {
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data) && Array.isArray(data.data)) {
    return data.data;
  }
  throw new ZodError([
    { code: "custom", path: [], message: "expected a list response (array or { data: [] })" }
  ]);
}

/**
 * Management API client over axios with client-credentials auth.
 *
 * Calls are not retried here; the reconciler wraps them in its own retry policy.
 */
export class ManagementApiClient implements IdentityProviderClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly logger: Logger;
  private readonly errorCodes: ProviderErrorCodeTable;
  private readonly pageSize: number;
  private token: CachedToken | undefined;
  private pendingToken: Promise<string> | undefined;

  constructor(options: ManagementApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.logger = options.logger ?? createSilentLogger();
    this.errorCodes = options.errorCodes ?? DEFAULT_PROVIDER_ERROR_CODES;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { Accept: "application/json" }
      });
  }

  get managementApiResource(): string {
    return `${this.baseUrl}/api`;
  }

  private async fetchToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.clientId,
      client_secret: this.clientSecret,
      resource: this.managementApiResource,
      scope: "all"
    });

    try {
      const res = await this.http.post<unknown>(`${this.baseUrl}/oidc/token`, form, {
        headers: { "Content-Type": "application/x-www-form-urlencoded" }
      });
      const parsed = zTokenResponse.parse(res.data);
      this.token = {
        value: parsed.access_token,
        expiresAt: Date.now() + parsed.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS
      };
      this.logger.debug("management API token acquired", { expiresIn: parsed.expires_in });
      return parsed.access_token;
    } catch (err: unknown) {
      throw toProviderError("token request", err, this.errorCodes);
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }
    // Single in-flight token request shared by concurrent callers.
    if (!this.pendingToken) {
      this.pendingToken = this.fetchToken().finally(() => {
        this.pendingToken = undefined;
      });
    }
    return await this.pendingToken;
  }

  private async send(config: AxiosRequestConfig): Promise<unknown> {
    const token = await this.accessToken();
    const res = await this.http.request<unknown>({
      ...config,
      url: `${this.baseUrl}${config.url ?? ""}`,
      headers: { Authorization: `Bearer ${token}` }
    });
    return res.data;
  }

  private async request(context: string, config: AxiosRequestConfig): Promise<unknown> {
    try {
      return await this.send(config);
    } catch (err: unknown) {
      // A rotated or revoked token gets one refresh before the call is given up.
      if (axios.isAxiosError(err) && err.response?.status === 401 && this.token) {
        this.logger.debug(`${context}: token rejected, refreshing`);
        this.token = undefined;
        try {
          return await this.send(config);
        } catch (retryErr: unknown) {
          throw toProviderError(context, retryErr, this.errorCodes);
        }
      }
      throw toProviderError(context, err, this.errorCodes);
    }
  }

  private async requestParsed<T extends z.ZodTypeAny>(context: string, config: AxiosRequestConfig, schema: T): Promise<z.output<T>> {
    const data = await this.request(context, config);
    try {
      return schema.parse(data);
    } catch (err: unknown) {
      throw toProviderError(context, err, this.errorCodes);
    }
  }

  private async listAll<T extends z.ZodTypeAny>(context: string, path: string, schema: T, params: Record<string, string> = {}): Promise<Array<z.output<T>>> {
    const out: Array<z.output<T>> = [];
    for (let page = 1; page <= MAX_PAGES; page += 1) {
      const data = await this.request(context, {
        method: "GET",
        url: path,
        params: { ...params, page, page_size: this.pageSize }
      });
      let items: Array<z.output<T>>;
      try {
        items = unwrapList(data).map((item) => schema.parse(item));
      } catch (err: unknown) {
        throw toProviderError(context, err, this.errorCodes);
      }
      out.push(...items);
      if (items.length < this.pageSize) {
        return out;
      }
    }
    this.logger.warn(`${context}: stopped after ${MAX_PAGES} pages`);
    return out;
  }

  // ----------------------------
  // Resources and scopes
  // ----------------------------

  async listResources(): Promise<RemoteResource[]> {
    return await this.listAll("resources.list", "/api/resources", zRemoteResource);
  }

  async createResource(input: ResourceInput): Promise<RemoteResource> {
    return await this.requestParsed("resources.create", { method: "POST", url: "/api/resources", data: input }, zRemoteResource);
  }

  async updateResource(resourceId: string, patch: { accessTokenTtl: number }): Promise<void> {
    await this.request("resources.update", { method: "PATCH", url: `/api/resources/${encodeURIComponent(resourceId)}`, data: patch });
  }

  async deleteResource(resourceId: string): Promise<void> {
    await this.request("resources.delete", { method: "DELETE", url: `/api/resources/${encodeURIComponent(resourceId)}` });
  }

  async listScopes(resourceId: string): Promise<RemoteScope[]> {
    return await this.listAll("scopes.list", `/api/resources/${encodeURIComponent(resourceId)}/scopes`, zRemoteScope);
  }

  async createScope(resourceId: string, input: ScopeInput): Promise<RemoteScope> {
    return await this.requestParsed(
      "scopes.create",
      { method: "POST", url: `/api/resources/${encodeURIComponent(resourceId)}/scopes`, data: input },
      zRemoteScope
    );
  }

  async deleteScope(resourceId: string, scopeId: string): Promise<void> {
    await this.request("scopes.delete", {
      method: "DELETE",
      url: `/api/resources/${encodeURIComponent(resourceId)}/scopes/${encodeURIComponent(scopeId)}`
    });
  }

  // ----------------------------
  // Organization scopes and roles
  // ----------------------------

  async listOrganizationScopes(): Promise<RemoteOrganizationScope[]> {
    return await this.listAll("organizationScopes.list", "/api/organization-scopes", zRemoteOrganizationScope);
  }

  async createOrganizationScope(input: ScopeInput): Promise<RemoteOrganizationScope> {
    return await this.requestParsed(
      "organizationScopes.create",
      { method: "POST", url: "/api/organization-scopes", data: input },
      zRemoteOrganizationScope
    );
  }

  async deleteOrganizationScope(scopeId: string): Promise<void> {
    await this.request("organizationScopes.delete", { method: "DELETE", url: `/api/organization-scopes/${encodeURIComponent(scopeId)}` });
  }

  async listOrganizationRoles(): Promise<RemoteRole[]> {
    return await this.listAll("organizationRoles.list", "/api/organization-roles", zRemoteRole);
  }

  async createOrganizationRole(input: RoleInput): Promise<RemoteRole> {
    return await this.requestParsed("organizationRoles.create", { method: "POST", url: "/api/organization-roles", data: input }, zRemoteRole);
  }

  async updateOrganizationRole(roleId: string, input: RoleInput): Promise<void> {
    await this.request("organizationRoles.update", {
      method: "PATCH",
      url: `/api/organization-roles/${encodeURIComponent(roleId)}`,
      data: input
    });
  }

  async deleteOrganizationRole(roleId: string): Promise<void> {
    await this.request("organizationRoles.delete", { method: "DELETE", url: `/api/organization-roles/${encodeURIComponent(roleId)}` });
  }

  async listOrganizationRoleScopes(roleId: string): Promise<RemoteOrganizationScope[]> {
    return await this.listAll(
      "organizationRoles.scopes.list",
      `/api/organization-roles/${encodeURIComponent(roleId)}/scopes`,
      zRemoteOrganizationScope
    );
  }

  async assignOrganizationRoleScopes(roleId: string, scopeIds: string[]): Promise<void> {
    await this.request("organizationRoles.scopes.assign", {
      method: "POST",
      url: `/api/organization-roles/${encodeURIComponent(roleId)}/scopes`,
      data: { organizationScopeIds: scopeIds }
    });
  }

  async removeOrganizationRoleScope(roleId: string, scopeId: string): Promise<void> {
    await this.request("organizationRoles.scopes.remove", {
      method: "DELETE",
      url: `/api/organization-roles/${encodeURIComponent(roleId)}/scopes/${encodeURIComponent(scopeId)}`
    });
  }

  // ----------------------------
  // User roles
  // ----------------------------

  async listUserRoles(): Promise<RemoteRole[]> {
    return await this.listAll("roles.list", "/api/roles", zRemoteRole, { type: "User" });
  }

  async createUserRole(input: RoleInput): Promise<RemoteRole> {
    return await this.requestParsed("roles.create", { method: "POST", url: "/api/roles", data: { ...input, type: "User" } }, zRemoteRole);
  }

  async updateUserRole(roleId: string, input: RoleInput): Promise<void> {
    await this.request("roles.update", { method: "PATCH", url: `/api/roles/${encodeURIComponent(roleId)}`, data: input });
  }

  async deleteUserRole(roleId: string): Promise<void> {
    await this.request("roles.delete", { method: "DELETE", url: `/api/roles/${encodeURIComponent(roleId)}` });
  }

  async listUserRoleScopes(roleId: string): Promise<RemoteScope[]> {
    return await this.listAll("roles.scopes.list", `/api/roles/${encodeURIComponent(roleId)}/scopes`, zRemoteScope);
  }

  async assignUserRoleScopes(roleId: string, scopeIds: string[]): Promise<void> {
    await this.request("roles.scopes.assign", {
      method: "POST",
      url: `/api/roles/${encodeURIComponent(roleId)}/scopes`,
      data: { scopeIds }
    });
  }

  async removeUserRoleScope(roleId: string, scopeId: string): Promise<void> {
    await this.request("roles.scopes.remove", {
      method: "DELETE",
      url: `/api/roles/${encodeURIComponent(roleId)}/scopes/${encodeURIComponent(scopeId)}`
    });
  }

  // ----------------------------
  // Third-party applications
  // ----------------------------

  private async getApplicationRecord(applicationId: string): Promise<RemoteApplicationRecord> {
    return await this.requestParsed(
      "applications.get",
      { method: "GET", url: `/api/applications/${encodeURIComponent(applicationId)}` },
      zRemoteApplicationRecord
    );
  }

  private async getApplicationDisplayName(applicationId: string): Promise<string | undefined> {
    try {
      const branding = await this.requestParsed(
        "applications.signInExperience.get",
        { method: "GET", url: `/api/applications/${encodeURIComponent(applicationId)}/sign-in-experience` },
        zRemoteApplicationBranding
      );
      return branding.displayName ?? undefined;
    } catch (err: unknown) {
      // No branding has been saved for this application yet.
      if (err instanceof ProviderError && err.kind === "NotFound") {
        return undefined;
      }
      throw err;
    }
  }

  private async getApplicationUserScopes(applicationId: string): Promise<string[]> {
    const consent = await this.requestParsed(
      "applications.userConsentScopes.get",
      { method: "GET", url: `/api/applications/${encodeURIComponent(applicationId)}/user-consent-scopes` },
      zRemoteUserConsentScopes
    );
    return consent.userScopes;
  }

  private async toRemoteApplication(record: RemoteApplicationRecord): Promise<RemoteApplication> {
    const [displayName, scopes] = await Promise.all([
      this.getApplicationDisplayName(record.id),
      this.getApplicationUserScopes(record.id)
    ]);
    const accessControl = record.customData.access_control;
    return {
      id: record.id,
      name: record.name,
      description: record.description ?? "",
      displayName,
      redirectUris: record.oidcClientMetadata.redirectUris,
      postLogoutRedirectUris: record.oidcClientMetadata.postLogoutRedirectUris,
      loginUrl: record.customData.login_url,
      accessControl: {
        organizationRoles: accessControl?.organization_roles ?? [],
        userRoles: accessControl?.user_roles ?? []
      },
      scopes
    };
  }

  async listThirdPartyApplications(): Promise<RemoteApplication[]> {
    const records = await this.listAll("applications.list", "/api/applications", zRemoteApplicationRecord, { isThirdParty: "true" });
    const thirdParty = records.filter((r) => r.isThirdParty);
    return await Promise.all(thirdParty.map((r) => this.toRemoteApplication(r)));
  }

  private async putBranding(applicationId: string, displayName: string): Promise<void> {
    await this.request("applications.signInExperience.put", {
      method: "PUT",
      url: `/api/applications/${encodeURIComponent(applicationId)}/sign-in-experience`,
      data: { displayName }
    });
  }

  private async syncUserScopes(applicationId: string, desired: string[], current: string[]): Promise<void> {
    const toAdd = desired.filter((s) => !current.includes(s));
    const toRemove = current.filter((s) => !desired.includes(s));
    if (toAdd.length) {
      await this.request("applications.userConsentScopes.assign", {
        method: "POST",
        url: `/api/applications/${encodeURIComponent(applicationId)}/user-consent-scopes`,
        data: { userScopes: toAdd }
      });
    }
    for (const scope of toRemove) {
      await this.request("applications.userConsentScopes.remove", {
        method: "DELETE",
        url: `/api/applications/${encodeURIComponent(applicationId)}/user-consent-scopes/user-scopes/${encodeURIComponent(scope)}`
      });
    }
  }

  async createThirdPartyApplication(input: ApplicationInput, onCreated?: (applicationId: string) => void): Promise<RemoteApplication> {
    const record = await this.requestParsed(
      "applications.create",
      {
        method: "POST",
        url: "/api/applications",
        data: {
          name: input.name,
          description: input.description,
          type: "Traditional",
          isThirdParty: true,
          oidcClientMetadata: {
            redirectUris: input.redirectUris,
            postLogoutRedirectUris: input.postLogoutRedirectUris
          },
          customData: input.loginUrl !== undefined ? { login_url: input.loginUrl } : {}
        }
      },
      zRemoteApplicationRecord
    );
    onCreated?.(record.id);
    await this.putBranding(record.id, input.displayName);
    await this.syncUserScopes(record.id, input.scopes, []);
    return {
      id: record.id,
      name: record.name,
      description: input.description,
      displayName: input.displayName,
      redirectUris: input.redirectUris,
      postLogoutRedirectUris: input.postLogoutRedirectUris,
      loginUrl: input.loginUrl,
      accessControl: { organizationRoles: [], userRoles: [] },
      scopes: input.scopes
    };
  }

  async updateThirdPartyApplication(applicationId: string, input: ApplicationInput): Promise<void> {
    const current = await this.getApplicationRecord(applicationId);
    const customData: Record<string, unknown> = { ...current.customData };
    if (input.loginUrl !== undefined) {
      customData.login_url = input.loginUrl;
    } else {
      delete customData.login_url;
    }

    await this.request("applications.update", {
      method: "PATCH",
      url: `/api/applications/${encodeURIComponent(applicationId)}`,
      data: {
        name: input.name,
        description: input.description,
        oidcClientMetadata: {
          ...current.oidcClientMetadata,
          redirectUris: input.redirectUris,
          postLogoutRedirectUris: input.postLogoutRedirectUris
        },
        customData
      }
    });
    await this.putBranding(applicationId, input.displayName);
    await this.syncUserScopes(applicationId, input.scopes, await this.getApplicationUserScopes(applicationId));
  }

  async deleteThirdPartyApplication(applicationId: string): Promise<void> {
    await this.request("applications.delete", { method: "DELETE", url: `/api/applications/${encodeURIComponent(applicationId)}` });
  }

  async setApplicationAccessControl(applicationId: string, accessControl: AccessControlInput): Promise<void> {
    const current = await this.getApplicationRecord(applicationId);
    await this.request("applications.accessControl.update", {
      method: "PATCH",
      url: `/api/applications/${encodeURIComponent(applicationId)}`,
      data: {
        customData: {
          ...current.customData,
          access_control: {
            organization_roles: accessControl.organizationRoles,
            user_roles: accessControl.userRoles
          }
        }
      }
    });
  }
}
