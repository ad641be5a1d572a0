/**
 * Encryption key parsing for the credential vault.
 *
 * CRM_ENCRYPTION_KEY is accepted in two forms:
 * - a raw string that is exactly 32 bytes in UTF-8
 * - `base64:<value>` where the decoded value is exactly 32 bytes
 */

export const KEY_LENGTH_BYTES = 32;

const BASE64_PREFIX = 'base64:';

export function parseEncryptionKey(raw: string): Buffer {
  const key = raw.startsWith(BASE64_PREFIX)
    ? Buffer.from(raw.slice(BASE64_PREFIX.length), 'base64')
    : Buffer.from(raw, 'utf8');

  if (key.length !== KEY_LENGTH_BYTES) {
    throw new Error(
      `CRM_ENCRYPTION_KEY must be exactly ${KEY_LENGTH_BYTES} bytes (got ${key.length}). ` +
      `Use a 32-character ASCII string or base64:<32 random bytes>.`
    );
  }

  return key;
}
