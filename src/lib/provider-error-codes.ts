import type { ProviderErrorKind } from "./errors";

export type ProviderErrorCodeTable = Readonly<Record<string, ProviderErrorKind>>;

/**
 * Management API error codes (`code` in the error body) mapped to error kinds.
 * Codes missing here fall back to the HTTP status.
 */
export const DEFAULT_PROVIDER_ERROR_CODES: ProviderErrorCodeTable = {
  "entity.not_found": "NotFound",
  "entity.not_exists": "NotFound",
  "entity.not_exists_with_id": "NotFound",
  "entity.unique_integrity_violation": "Conflict",
  "entity.create_failed": "ServerError",
  "entity.db_constraint_violated": "Conflict",
  "role.name_in_use": "Conflict",
  "role.scope_exists": "Conflict",
  "resource.resource_indicator_exists": "Conflict",
  "scope.name_exists": "Conflict",
  "organization.scope_name_in_use": "Conflict",
  "application.invalid_third_party_application_type": "Invalid",
  "guard.invalid_input": "Invalid",
  "guard.invalid_pagination": "Invalid",
  "request.invalid_input": "Invalid",
  "auth.authorization_header_missing": "Unauthorized",
  "auth.unauthorized": "Unauthorized",
  "auth.forbidden": "Unauthorized",
  "auth.jwt_sub_missing": "Unauthorized",
  "oidc.invalid_client": "Unauthorized",
  "oidc.invalid_grant": "Unauthorized",
  "request.general": "ServerError"
};
