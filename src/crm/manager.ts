// ============================================================================
// Provider Manager: Immutable registry of CRM adapters
// ============================================================================

import { FieldMappingError } from '../mapping/errors.js';
import { transformContact } from '../mapping/field-mapper.js';
import { CrmApiError, ProviderNotRegisteredError } from './errors.js';
import { fanOut } from './fan-out.js';
import { CreatioProvider } from './providers/creatio.js';
import { KlaviyoProvider } from './providers/klaviyo.js';
import { SalesforceProvider } from './providers/salesforce.js';
import { isCrmType } from './types.js';
import type {
  CanonicalContact,
  ContactIdentifier,
  CrmCredentials,
  CrmPayload,
  CrmProvider,
  CrmType,
  ProviderEvent,
  RemoteRecord,
  RemoteResponse,
} from './types.js';

export interface ProviderTarget {
  crmType: CrmType;
  credentials: CrmCredentials;
}

export type BatchResult =
  | { success: true; data: RemoteRecord }
  | { success: false; error: string };

export function describeError(error: unknown): string {
  if (error instanceof CrmApiError || error instanceof FieldMappingError || error instanceof ProviderNotRegisteredError) {
    return error.message;
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}

export class ProviderManager {
  private readonly providers: ReadonlyMap<CrmType, CrmProvider>;

  constructor(providers: readonly CrmProvider[]) {
    const registry = new Map<CrmType, CrmProvider>();
    for (const provider of providers) {
      if (registry.has(provider.crmType)) {
        throw new Error(`Duplicate provider registration for CRM type: ${provider.crmType}`);
      }
      registry.set(provider.crmType, provider);
    }
    this.providers = registry;
    Object.freeze(this);
  }

  get(crmType: string): CrmProvider {
    const provider = isCrmType(crmType) ? this.providers.get(crmType) : undefined;
    if (!provider) {
      throw new ProviderNotRegisteredError(crmType);
    }
    return provider;
  }

  has(crmType: string): boolean {
    return isCrmType(crmType) && this.providers.has(crmType);
  }

  registeredTypes(): CrmType[] {
    return [...this.providers.keys()];
  }

  validateCredentials(crmType: CrmType, credentials: CrmCredentials): Promise<true> {
    return this.get(crmType).validateCredentials(credentials);
  }

  upsertContact(crmType: CrmType, credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse> {
    return this.get(crmType).upsertContact(credentials, payload);
  }

  sendEvent(
    crmType: CrmType,
    credentials: CrmCredentials,
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<RemoteResponse> {
    return this.get(crmType).sendEvent(credentials, identifier, event);
  }

  getContact(crmType: CrmType, credentials: CrmCredentials, identifier: ContactIdentifier): Promise<RemoteRecord | null> {
    return this.get(crmType).getContact(credentials, identifier);
  }

  /** Map and upsert one canonical contact into every target. */
  syncContactToMany(targets: readonly ProviderTarget[], contact: CanonicalContact): Promise<Record<string, BatchResult>> {
    return fanOut(
      targets,
      (target) => target.crmType,
      async (target): Promise<BatchResult> => {
        const payload = transformContact(contact, target.crmType);
        const response = await this.upsertContact(target.crmType, target.credentials, payload);
        return { success: true, data: response.record };
      },
      (target, error): BatchResult => {
        console.error('[provider-manager] Contact sync failed', { crmType: target.crmType, error: describeError(error) });
        return { success: false, error: describeError(error) };
      },
    );
  }

  sendEventToMany(
    targets: readonly ProviderTarget[],
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<Record<string, BatchResult>> {
    return fanOut(
      targets,
      (target) => target.crmType,
      async (target): Promise<BatchResult> => {
        const response = await this.sendEvent(target.crmType, target.credentials, identifier, event);
        return { success: true, data: response.record };
      },
      (target, error): BatchResult => {
        console.error('[provider-manager] Event send failed', { crmType: target.crmType, error: describeError(error) });
        return { success: false, error: describeError(error) };
      },
    );
  }
}

/** Bind the built-in adapters. Called once at startup. */
export function createProviderManager(options: { timeoutMs?: number } = {}): ProviderManager {
  return new ProviderManager([
    new KlaviyoProvider({ timeoutMs: options.timeoutMs }),
    new SalesforceProvider({ timeoutMs: options.timeoutMs }),
    new CreatioProvider({ timeoutMs: options.timeoutMs }),
  ]);
}
