// ============================================================================
// Creatio Provider: HTTP Basic auth, OData 4
// ============================================================================
//
// Contacts are matched by Email and patched in place; events become
// Activity records linked through ContactId. Creatio requires Name on
// Contact, so it is composed from GivenName/Surname when absent.

import { z } from 'zod';
import { crmConfig } from '../config.js';
import { CrmApiError } from '../errors.js';
import { asRecord, crmFetch, isRecord, quoteLiteral, stringField } from '../http.js';
import type {
  ContactIdentifier,
  CrmCredentials,
  CrmPayload,
  CrmProvider,
  ProviderEvent,
  RemoteRecord,
  RemoteResponse,
} from '../types.js';
import { parseCredentials } from './credentials.js';

const PROVIDER = 'Creatio';

const CreatioCredentialsSchema = z.object({
  instanceUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
});

type CreatioCredentials = z.infer<typeof CreatioCredentialsSchema>;

export interface CreatioProviderOptions {
  timeoutMs?: number;
}

function composeName(payload: CrmPayload): string | null {
  if (typeof payload.Name === 'string' && payload.Name.trim()) return payload.Name;
  const parts = [payload.GivenName, payload.Surname].filter(
    (part): part is string => typeof part === 'string' && part.trim().length > 0,
  );
  if (parts.length > 0) return parts.join(' ');
  return typeof payload.Email === 'string' ? payload.Email : null;
}

// RFC 3986 strict: parentheses and quotes in an id cannot close the OData key
function contactPath(id: string): string {
  const key = encodeURIComponent(id).replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
  return `/Contact(${key})`;
}

export class CreatioProvider implements CrmProvider {
  readonly crmType = 'creatio' as const;
  readonly displayName = PROVIDER;

  private readonly timeoutMs: number;

  constructor(options: CreatioProviderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? crmConfig.requestTimeoutMs;
  }

  async validateCredentials(credentials: CrmCredentials): Promise<true> {
    await this.request(credentials, 'GET', '/SysSettings?$top=1');
    return true;
  }

  async upsertContact(credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse> {
    const name = composeName(payload);
    const body: CrmPayload = name ? { ...payload, Name: name } : payload;
    const email = typeof payload.Email === 'string' ? payload.Email : null;
    const existingId = email ? await this.findContactId(credentials, 'Email', email) : null;

    if (existingId) {
      const response = await this.request(credentials, 'PATCH', contactPath(existingId), body);
      return {
        statusCode: response.status,
        entityId: existingId,
        record: { Id: existingId, created: false, ...body },
      };
    }

    const response = await this.request(credentials, 'POST', '/Contact', body);
    const created = asRecord(response.body);
    return { statusCode: response.status, entityId: stringField(created, 'Id'), record: { created: true, ...created } };
  }

  async sendEvent(
    credentials: CrmCredentials,
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<RemoteResponse> {
    const contactId = await this.resolveContactId(credentials, identifier);
    if (!contactId) {
      throw new CrmApiError('Contact not found', 404, '');
    }

    const activity = {
      ContactId: contactId,
      Title: event.name,
      Notes: JSON.stringify({ ...event.properties, ...(event.value !== undefined ? { value: event.value } : {}) }),
      StartDate: event.timestamp,
      DueDate: event.timestamp,
    };

    const response = await this.request(credentials, 'POST', '/Activity', activity);
    const created = asRecord(response.body);
    return { statusCode: response.status, entityId: stringField(created, 'Id'), record: created };
  }

  async getContact(credentials: CrmCredentials, identifier: ContactIdentifier): Promise<RemoteRecord | null> {
    if (identifier.id) {
      const response = await this.request(credentials, 'GET', contactPath(identifier.id), undefined, true);
      return response.status === 404 ? null : asRecord(response.body);
    }

    const [field, value] = identifier.email ? ['Email', identifier.email] : ['MobilePhone', identifier.phone ?? ''];
    const matches = await this.search(credentials, `${field} eq ${quoteLiteral(value, 'odata')}`, 1);
    return matches[0] ?? null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async resolveContactId(credentials: CrmCredentials, identifier: ContactIdentifier): Promise<string | null> {
    if (identifier.id) return identifier.id;
    if (identifier.email) return this.findContactId(credentials, 'Email', identifier.email);
    if (identifier.phone) return this.findContactId(credentials, 'MobilePhone', identifier.phone);
    return null;
  }

  private async findContactId(
    credentials: CrmCredentials,
    field: 'Email' | 'MobilePhone',
    value: string,
  ): Promise<string | null> {
    const matches = await this.search(credentials, `${field} eq ${quoteLiteral(value, 'odata')}`, 1, 'Id');
    const first = matches[0];
    return first ? stringField(first, 'Id') : null;
  }

  private async search(
    credentials: CrmCredentials,
    filter: string,
    top: number,
    select?: string,
  ): Promise<RemoteRecord[]> {
    const query = [`$filter=${encodeURIComponent(filter)}`, `$top=${top}`];
    if (select) query.push(`$select=${select}`);
    const response = await this.request(credentials, 'GET', `/Contact?${query.join('&')}`);
    const value = asRecord(response.body).value;
    return Array.isArray(value) ? value.filter(isRecord) : [];
  }

  private request(
    credentials: CrmCredentials,
    method: 'GET' | 'POST' | 'PATCH',
    path: string,
    body?: unknown,
    allowNotFound = false,
  ) {
    const parsed: CreatioCredentials = parseCredentials(PROVIDER, CreatioCredentialsSchema, credentials);
    const basic = Buffer.from(`${parsed.username}:${parsed.password}`).toString('base64');
    return crmFetch({
      provider: PROVIDER,
      url: `${parsed.instanceUrl.replace(/\/$/, '')}${crmConfig.creatio.odataPath}${path}`,
      method,
      headers: { Authorization: `Basic ${basic}` },
      body,
      allowNotFound,
      timeoutMs: this.timeoutMs,
    });
  }
}
