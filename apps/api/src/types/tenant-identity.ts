/**
 * TenantIdentity - opaque, immutable identifier of the tenant a request acts for.
 * Extracted from a verified credential; consumed by RLS policies through a
 * session claim. Compared with ===.
 */
export type TenantIdentity = string & { readonly __brand: 'TenantIdentity' };

const MAX_IDENTITY_LENGTH = 256;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Validate and brand a raw subject claim. Single entry point for identities.
 * Returns null when the value cannot safely be used as a session claim.
 */
export function toTenantIdentity(raw: unknown): TenantIdentity | null {
  if (typeof raw !== 'string') return null;
  if (raw.length === 0 || raw.length > MAX_IDENTITY_LENGTH) return null;
  if (raw.trim() !== raw || CONTROL_CHARS.test(raw)) return null;
  return raw as TenantIdentity;
}
