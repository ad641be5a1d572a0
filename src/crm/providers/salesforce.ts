// ============================================================================
// Salesforce Provider: OAuth bearer auth, REST sObjects + SOQL
// ============================================================================
//
// Credentials come in one of two shapes:
// - { accessToken, instanceUrl }: used as is
// - { username, password, clientId, clientSecret, securityToken?, domain? }
//   exchanged for a session through the OAuth password grant
//
// Contacts are matched by Email; events become completed Tasks on the contact.

import { z } from 'zod';
import { crmConfig } from '../config.js';
import { CrmApiError, CrmAuthError } from '../errors.js';
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

const PROVIDER = 'Salesforce';

const SalesforceCredentialsSchema = z.union([
  z.object({
    accessToken: z.string().min(1),
    instanceUrl: z.string().url(),
  }),
  z.object({
    username: z.string().min(1),
    password: z.string().min(1),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    securityToken: z.string().default(''),
    domain: z.string().regex(/^[a-z0-9-]+$/i).default('login'),
  }),
]);

interface SalesforceSession {
  accessToken: string;
  instanceUrl: string;
}

export interface SalesforceProviderOptions {
  apiVersion?: string;
  timeoutMs?: number;
}

export class SalesforceProvider implements CrmProvider {
  readonly crmType = 'salesforce' as const;
  readonly displayName = PROVIDER;

  private readonly apiVersion: string;
  private readonly timeoutMs: number;

  constructor(options: SalesforceProviderOptions = {}) {
    this.apiVersion = options.apiVersion ?? crmConfig.salesforce.apiVersion;
    this.timeoutMs = options.timeoutMs ?? crmConfig.requestTimeoutMs;
  }

  async validateCredentials(credentials: CrmCredentials): Promise<true> {
    const session = await this.authenticate(credentials);
    await this.request(session, 'GET', '/limits');
    return true;
  }

  async upsertContact(credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse> {
    const session = await this.authenticate(credentials);
    const email = typeof payload.Email === 'string' ? payload.Email : null;
    const existingId = email ? await this.findContactId(session, 'Email', email) : null;

    if (existingId) {
      const response = await this.request(session, 'PATCH', `/sobjects/Contact/${existingId}`, payload);
      return {
        statusCode: response.status,
        entityId: existingId,
        record: { Id: existingId, created: false, ...payload },
      };
    }

    const response = await this.request(session, 'POST', '/sobjects/Contact', payload);
    const id = stringField(asRecord(response.body), 'id');
    return {
      statusCode: response.status,
      entityId: id,
      record: { Id: id, created: true, ...payload },
    };
  }

  async sendEvent(
    credentials: CrmCredentials,
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<RemoteResponse> {
    const session = await this.authenticate(credentials);
    const whoId = await this.resolveContactId(session, identifier);
    if (!whoId) {
      throw new CrmApiError('Contact not found', 404, '');
    }

    const task = {
      WhoId: whoId,
      Subject: event.name,
      Description: JSON.stringify({ ...event.properties, ...(event.value !== undefined ? { value: event.value } : {}) }),
      Status: 'Completed',
      Priority: 'Normal',
      ActivityDate: event.timestamp.slice(0, 10),
    };

    const response = await this.request(session, 'POST', '/sobjects/Task', task);
    const id = stringField(asRecord(response.body), 'id');
    return { statusCode: response.status, entityId: id, record: { Id: id, ...task } };
  }

  async getContact(credentials: CrmCredentials, identifier: ContactIdentifier): Promise<RemoteRecord | null> {
    const session = await this.authenticate(credentials);

    if (identifier.id) {
      const response = await this.request(
        session,
        'GET',
        `/sobjects/Contact/${encodeURIComponent(identifier.id)}`,
        undefined,
        true,
      );
      return response.status === 404 ? null : asRecord(response.body);
    }

    const [field, value] = identifier.email ? ['Email', identifier.email] : ['Phone', identifier.phone ?? ''];
    const records = await this.query(
      session,
      `SELECT Id, Email, FirstName, LastName, Phone, Title FROM Contact WHERE ${field} = ${quoteLiteral(value, 'soql')} LIMIT 1`,
    );
    return records[0] ?? null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async authenticate(credentials: CrmCredentials): Promise<SalesforceSession> {
    const parsed = parseCredentials(PROVIDER, SalesforceCredentialsSchema, credentials);
    if ('accessToken' in parsed) {
      return { accessToken: parsed.accessToken, instanceUrl: parsed.instanceUrl.replace(/\/$/, '') };
    }

    const form = new URLSearchParams({
      grant_type: 'password',
      client_id: parsed.clientId,
      client_secret: parsed.clientSecret,
      username: parsed.username,
      password: `${parsed.password}${parsed.securityToken}`,
    });

    let body: Record<string, unknown>;
    try {
      const response = await crmFetch({
        provider: PROVIDER,
        url: `https://${parsed.domain}.salesforce.com/services/oauth2/token`,
        method: 'POST',
        body: form,
        timeoutMs: this.timeoutMs,
      });
      body = asRecord(response.body);
    } catch (error) {
      // The token endpoint answers 400 invalid_grant for bad credentials
      if (error instanceof CrmApiError && error.statusCode === 400) {
        throw new CrmAuthError('Salesforce authentication failed', 400, error.responseBody);
      }
      throw error;
    }

    const accessToken = stringField(body, 'access_token');
    const instanceUrl = stringField(body, 'instance_url');
    if (!accessToken || !instanceUrl) {
      throw new CrmAuthError('Salesforce token response missing access_token or instance_url', 400);
    }
    return { accessToken, instanceUrl: instanceUrl.replace(/\/$/, '') };
  }

  private async resolveContactId(session: SalesforceSession, identifier: ContactIdentifier): Promise<string | null> {
    if (identifier.id) return identifier.id;
    if (identifier.email) return this.findContactId(session, 'Email', identifier.email);
    if (identifier.phone) return this.findContactId(session, 'Phone', identifier.phone);
    return null;
  }

  private async findContactId(session: SalesforceSession, field: 'Email' | 'Phone', value: string): Promise<string | null> {
    const records = await this.query(
      session,
      `SELECT Id FROM Contact WHERE ${field} = ${quoteLiteral(value, 'soql')} LIMIT 1`,
    );
    const first = records[0];
    return first ? stringField(first, 'Id') : null;
  }

  private async query(session: SalesforceSession, soql: string): Promise<RemoteRecord[]> {
    const response = await this.request(session, 'GET', `/query?q=${encodeURIComponent(soql)}`);
    const records = asRecord(response.body).records;
    return Array.isArray(records) ? records.filter(isRecord) : [];
  }

  private request(
    session: SalesforceSession,
    method: 'GET' | 'POST' | 'PATCH',
    path: string,
    body?: unknown,
    allowNotFound = false,
  ) {
    return crmFetch({
      provider: PROVIDER,
      url: `${session.instanceUrl}/services/data/${this.apiVersion}${path}`,
      method,
      headers: { Authorization: `Bearer ${session.accessToken}` },
      body,
      allowNotFound,
      timeoutMs: this.timeoutMs,
    });
  }
}
