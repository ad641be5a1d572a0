// ============================================================================
// Klaviyo Provider: API-key auth, JSON:API payloads
// ============================================================================
//
// Profiles are upserted through /profile-import, which creates or updates
// by email on Klaviyo's side. Events are posted as metric events; Klaviyo
// resolves (or creates) the profile from the identifier attributes.

import { z } from 'zod';
import { crmConfig } from '../config.js';
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

const PROVIDER = 'Klaviyo';

const KlaviyoCredentialsSchema = z.object({
  apiKey: z.string().trim().min(1),
});

export interface KlaviyoProviderOptions {
  baseUrl?: string;
  revision?: string;
  timeoutMs?: number;
}

export class KlaviyoProvider implements CrmProvider {
  readonly crmType = 'klaviyo' as const;
  readonly displayName = PROVIDER;

  private readonly baseUrl: string;
  private readonly revision: string;
  private readonly timeoutMs: number;

  constructor(options: KlaviyoProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? crmConfig.klaviyo.baseUrl;
    this.revision = options.revision ?? crmConfig.klaviyo.revision;
    this.timeoutMs = options.timeoutMs ?? crmConfig.requestTimeoutMs;
  }

  async validateCredentials(credentials: CrmCredentials): Promise<true> {
    await this.request(credentials, 'GET', '/profiles?page[size]=1');
    return true;
  }

  async upsertContact(credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse> {
    const attributes = asRecord(payload.attributes);
    const properties = asRecord(payload.properties);

    const response = await this.request(credentials, 'POST', '/profile-import', {
      data: {
        type: 'profile',
        attributes: Object.keys(properties).length > 0 ? { ...attributes, properties } : attributes,
      },
    });

    const data = asRecord(asRecord(response.body).data);
    return { statusCode: response.status, entityId: stringField(data, 'id'), record: data };
  }

  async sendEvent(
    credentials: CrmCredentials,
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<RemoteResponse> {
    const profileAttributes: Record<string, string> = {};
    if (identifier.email) profileAttributes.email = identifier.email;
    if (identifier.phone) profileAttributes.phone_number = identifier.phone;

    const response = await this.request(credentials, 'POST', '/events', {
      data: {
        type: 'event',
        attributes: {
          properties: event.properties,
          time: event.timestamp,
          ...(event.value !== undefined ? { value: event.value } : {}),
          metric: { data: { type: 'metric', attributes: { name: event.name } } },
          profile: {
            data: {
              type: 'profile',
              ...(identifier.id ? { id: identifier.id } : {}),
              attributes: profileAttributes,
            },
          },
        },
      },
    });

    // Klaviyo answers 202 with an empty body
    return { statusCode: response.status, entityId: null, record: asRecord(response.body) };
  }

  async getContact(credentials: CrmCredentials, identifier: ContactIdentifier): Promise<RemoteRecord | null> {
    if (identifier.id) {
      const response = await this.request(
        credentials,
        'GET',
        `/profiles/${encodeURIComponent(identifier.id)}`,
        undefined,
        true,
      );
      if (response.status === 404) return null;
      const data = asRecord(response.body).data;
      return isRecord(data) ? data : null;
    }

    const filter = identifier.email
      ? `equals(email,${quoteLiteral(identifier.email, 'klaviyo')})`
      : `equals(phone_number,${quoteLiteral(identifier.phone ?? '', 'klaviyo')})`;
    const response = await this.request(credentials, 'GET', `/profiles?filter=${encodeURIComponent(filter)}`);
    const data = asRecord(response.body).data;
    if (!Array.isArray(data)) return null;
    const first: unknown = data[0];
    return isRecord(first) ? first : null;
  }

  private request(
    credentials: CrmCredentials,
    method: 'GET' | 'POST',
    path: string,
    body?: unknown,
    allowNotFound = false,
  ) {
    const { apiKey } = parseCredentials(PROVIDER, KlaviyoCredentialsSchema, credentials);
    return crmFetch({
      provider: PROVIDER,
      url: `${this.baseUrl}${path}`,
      method,
      headers: {
        Authorization: `Klaviyo-API-Key ${apiKey}`,
        revision: this.revision,
        ...(body !== undefined ? { 'Content-Type': 'application/vnd.api+json' } : {}),
      },
      body,
      allowNotFound,
      timeoutMs: this.timeoutMs,
    });
  }
}
