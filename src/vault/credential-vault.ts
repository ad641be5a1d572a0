/**
 * Credential Vault
 *
 * Encrypts CRM credential blobs at rest with AES-256-GCM under one
 * process-wide key. Envelope format (base64url segments):
 *
 *   v1.<iv>.<authTag>.<ciphertext>
 *
 * Plaintext credentials exist only in memory for the duration of a single
 * operation. Nothing here logs credential values.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { CrmCredentials, CrmType } from '../crm/types.js';
import { KEY_LENGTH_BYTES } from './key.js';

const ALGORITHM = 'aes-256-gcm';
const VERSION = 'v1';
const IV_BYTES = 12;
const TAG_BYTES = 16;
const MASK = '••••';
const VISIBLE_SUFFIX = 4;

/** Credential field whose suffix is shown in list views, per CRM. */
const PRIMARY_SECRET_FIELDS: Partial<Record<CrmType, readonly string[]>> = {
  klaviyo: ['apiKey'],
  salesforce: ['accessToken', 'clientSecret', 'password'],
  creatio: ['password'],
};

const DEFAULT_SECRET_FIELDS = ['apiKey', 'accessToken', 'password', 'clientSecret', 'token'];

const CredentialsBlobSchema = z.record(z.unknown());

export class CredentialDecryptionError extends Error {
  constructor(message = 'Stored credentials could not be decrypted') {
    super(message);
    this.name = 'CredentialDecryptionError';
  }
}

export class CredentialVault {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH_BYTES) {
      throw new Error(`Credential vault key must be exactly ${KEY_LENGTH_BYTES} bytes`);
    }
    this.key = Buffer.from(key);
  }

  encrypt(credentials: CrmCredentials): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(JSON.stringify(credentials), 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [VERSION, iv, tag, ciphertext].map((part) => (typeof part === 'string' ? part : part.toString('base64url'))).join('.');
  }

  decrypt(envelope: string): CrmCredentials {
    const parts = envelope.split('.');
    if (parts.length !== 4 || parts[0] !== VERSION) {
      throw new CredentialDecryptionError('Unrecognized credential envelope');
    }

    const [, ivPart, tagPart, dataPart] = parts;
    const iv = Buffer.from(ivPart, 'base64url');
    const tag = Buffer.from(tagPart, 'base64url');
    if (iv.length !== IV_BYTES || tag.length !== TAG_BYTES) {
      throw new CredentialDecryptionError('Malformed credential envelope');
    }

    let plaintext: string;
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv);
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(Buffer.from(dataPart, 'base64url')), decipher.final()]).toString('utf8');
    } catch {
      // GCM auth failure: wrong key or tampered ciphertext
      throw new CredentialDecryptionError();
    }

    const parsed = CredentialsBlobSchema.safeParse(JSON.parse(plaintext));
    if (!parsed.success) {
      throw new CredentialDecryptionError('Decrypted credentials are not an object');
    }
    return parsed.data;
  }

  /** Masked suffix of the primary secret, e.g. '••••ab12'. Null when none is present. */
  maskCredentials(crmType: CrmType, credentials: CrmCredentials): string | null {
    const fields = PRIMARY_SECRET_FIELDS[crmType] ?? DEFAULT_SECRET_FIELDS;
    for (const field of fields) {
      const value = credentials[field];
      if (typeof value === 'string' && value.length > 0) {
        return value.length > VISIBLE_SUFFIX * 2 ? `${MASK}${value.slice(-VISIBLE_SUFFIX)}` : MASK;
      }
    }
    return null;
  }
}
