import type { Authority, RoleRecord } from "./types.js";

export const AUTHORITY_SEPARATOR = ",";

/**
 * Collapses duplicates (exact, case-sensitive match) and sorts the rest so
 * the same set always yields the same claim value, whatever order it came in.
 *
 * The claim only reads back (via `parseAuthorities`) to the same set when no
 * authority contains `AUTHORITY_SEPARATOR` and none is empty: `["A,B"]`
 * parses as `["A", "B"]` and `[""]` as `[]`. Employee registration refuses
 * such role names; other callers must keep to the same rule.
 */
export function canonicalizeAuthorities(
  authorities: Iterable<Authority>,
): string {
  return [...new Set(authorities)].sort().join(AUTHORITY_SEPARATOR);
}

export function authoritiesFromRoles(roles: Iterable<RoleRecord>): Authority[] {
  return Array.from(roles, (r) => r.roleName);
}

/** Inverse of `canonicalizeAuthorities` for sets without empty or comma-bearing names. */
export function parseAuthorities(claim: string): Authority[] {
  if (claim === "") return [];
  return claim.split(AUTHORITY_SEPARATOR);
}
