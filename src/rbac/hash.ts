import crypto from "node:crypto";
import type { DesiredState } from "./model";
import { normalizeForDiff } from "./normalize";

/**
 * SHA-256 of the normalized desired state.
 *
 * Set-like lists are canonicalized, so reordering resources or actions keeps the
 * fingerprint; permission order inside a role is significant and is hashed as written.
 */
export function fingerprintDesiredState(desired: DesiredState): string {
  const permissionOrder = [...desired.organizationRoles, ...desired.userRoles].map((r) => [
    `${r.type}:${r.id}`,
    r.permissions.map((p) => p.id)
  ]);
  const payload = JSON.stringify({ state: normalizeForDiff(desired), permissionOrder });
  return crypto.createHash("sha256").update(payload, "utf8").digest("hex");
}
