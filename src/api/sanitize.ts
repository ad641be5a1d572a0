/**
 * PII and Secret Sanitization for Safe Logging
 *
 * Replaces contact PII and credential values with '[REDACTED]' before
 * anything reaches the logs. Request bodies for this service carry both
 * (contacts and CRM credentials), so every logged payload goes through here.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - firstName/lastName are NOT redacted (needed to identify records in logs)
 * - Depth limit of 10 prevents runaway recursion
 */

/** Contact fields whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'email',
  'email_address',
  'phone',
  'phone_number',
  'mobilePhone',
  'streetAddress',
  'streetAddress2',
  'postalCode',
]);

/** Credential fields whose values must never appear in logs */
export const SECRET_FIELDS: ReadonlySet<string> = new Set([
  'apiKey',
  'accessToken',
  'refreshToken',
  'clientSecret',
  'password',
  'securityToken',
  'token',
  'authorization',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.has(key) || SECRET_FIELDS.has(key)) {
      result[key] = REDACTED;
    } else if (key === 'credentials') {
      // Whole credential blobs are reduced to their field names
      result[key] = typeof value === 'object' && value !== null ? `[Credentials(${Object.keys(value).join(',')})]` : REDACTED;
    } else {
      result[key] = sanitizeForLog(value, depth + 1);
    }
  }

  return result;
}
