/**
 * Helpers for the audit-log filter header
 */

export const AUDIT_FILTER_HEADER = 'TMV1-Filter';
export const LOGON_CATEGORY_FILTER = "(category eq 'Logon and Logoff')";

/**
 * Escape special characters in filter string literals
 */
export function escapeFilterValue(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Filter expression selecting one user's sign-in activity
 */
export function buildUserLoginFilter(identity: string): string {
  return `${LOGON_CATEGORY_FILTER} and (loggedUser eq '${escapeFilterValue(identity)}')`;
}
