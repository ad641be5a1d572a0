import type { z } from 'zod';
import { CrmAuthError } from '../errors.js';
import type { CrmCredentials } from '../types.js';

/**
 * Narrow a decrypted credential blob with an adapter's schema.
 * Missing or malformed fields surface as CrmAuthError naming the fields,
 * never their values.
 */
export function parseCredentials<T extends z.ZodTypeAny>(
  provider: string,
  schema: T,
  credentials: CrmCredentials,
): z.output<T> {
  const parsed = schema.safeParse(credentials);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.') || 'credentials'))];
    throw new CrmAuthError(`Missing or invalid ${provider} credentials: ${fields.join(', ')}`, 400);
  }
  return parsed.data;
}
