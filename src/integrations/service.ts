// ============================================================================
// Integration Service: connect / update / disconnect / status / list
// ============================================================================

import type { ProviderManager } from '../crm/manager.js';
import { isCrmType } from '../crm/types.js';
import type { CrmCredentials, CrmType } from '../crm/types.js';
import { FieldMappingError } from '../mapping/errors.js';
import { getFieldMappingRegistry } from '../mapping/registry.js';
import type { CredentialVault } from '../vault/credential-vault.js';
import { NotFoundError } from './errors.js';
import { stateOf, transition } from './lifecycle.js';
import type { IntegrationRepository, SyncLogRepository } from './repository.js';
import { resolveSettings } from './settings.js';
import type { Integration, IntegrationPatch, IntegrationView, SyncLogEntry } from './types.js';

export interface IntegrationServiceDeps {
  integrations: IntegrationRepository;
  syncLogs: SyncLogRepository;
  providers: ProviderManager;
  vault: CredentialVault;
}

export interface ConnectInput {
  crmType: string;
  credentials: CrmCredentials;
  settings?: unknown;
}

export interface UpdateInput {
  credentials?: CrmCredentials;
  settings?: unknown;
  /** Revive a disconnected integration */
  reconnect?: boolean;
}

export interface DisconnectResult {
  integrationId: string;
  crmType: CrmType;
  disconnectedAt: string;
}

/** Resolve a CRM type the mapping registry knows, or throw FieldMappingError. */
export function requireCrmType(crmType: string): CrmType {
  if (isCrmType(crmType) && getFieldMappingRegistry().has(crmType)) return crmType;
  throw new FieldMappingError(`CRM type '${crmType}' is not supported`, 'crmType', crmType);
}

export class IntegrationService {
  constructor(private readonly deps: IntegrationServiceDeps) {}

  /** Check credentials against the remote service without storing anything. */
  async validate(crmType: string, credentials: CrmCredentials): Promise<{ crmType: CrmType; valid: true }> {
    const type = requireCrmType(crmType);
    await this.deps.providers.validateCredentials(type, credentials);
    return { crmType: type, valid: true };
  }

  async connect(ownerId: string, input: ConnectInput): Promise<IntegrationView> {
    const crmType = requireCrmType(input.crmType);
    const provider = this.deps.providers.get(crmType);
    const settings = resolveSettings(input.settings);

    const existing = await this.deps.integrations.findByOwnerAndType(ownerId, crmType);
    transition(stateOf(existing), 'connect', crmType);

    await provider.validateCredentials(input.credentials);

    const integration = await this.deps.integrations.insert({
      ownerId,
      crmType,
      encryptedCredentials: this.deps.vault.encrypt(input.credentials),
      settings,
    });

    console.log('[integrations] Connected', { ownerId, crmType, integrationId: integration.id });
    return this.toView(integration);
  }

  async update(ownerId: string, crmType: string, input: UpdateInput): Promise<IntegrationView> {
    const type = requireCrmType(crmType);
    const existing = await this.deps.integrations.findByOwnerAndType(ownerId, type);
    transition(stateOf(existing), input.reconnect ? 'reconnect' : 'update', type);
    if (!existing) {
      throw new NotFoundError(`No ${type} integration found`);
    }

    const patch: IntegrationPatch = {};

    if (input.settings !== undefined) {
      patch.settings = resolveSettings(input.settings, existing.settings);
    }

    // Reconnect validates whichever credentials will be stored
    if (input.credentials || input.reconnect) {
      const credentials = input.credentials ?? this.deps.vault.decrypt(existing.encryptedCredentials);
      await this.deps.providers.validateCredentials(type, credentials);
      if (input.credentials) {
        patch.encryptedCredentials = this.deps.vault.encrypt(input.credentials);
      }
    }

    if (input.reconnect) {
      patch.isActive = true;
      patch.syncStatus = 'connected';
      patch.syncError = null;
    }

    const updated = await this.deps.integrations.update(existing.id, patch);
    console.log('[integrations] Updated', {
      ownerId,
      crmType: type,
      integrationId: updated.id,
      reconnected: Boolean(input.reconnect),
      credentialsChanged: Boolean(input.credentials),
    });
    return this.toView(updated);
  }

  async disconnect(ownerId: string, crmType: string): Promise<DisconnectResult> {
    const type = requireCrmType(crmType);
    const existing = await this.deps.integrations.findByOwnerAndType(ownerId, type);
    transition(stateOf(existing), 'disconnect', type);

    // Conditional on is_active: a concurrent disconnect leaves nothing to retire
    const retired = await this.deps.integrations.deactivate(ownerId, type);
    if (!retired) {
      throw new NotFoundError(`No active ${type} integration found`);
    }

    console.log('[integrations] Disconnected', { ownerId, crmType: type, integrationId: retired.id });
    return {
      integrationId: retired.id,
      crmType: type,
      disconnectedAt: retired.updatedAt.toISOString(),
    };
  }

  async status(ownerId: string, crmType: string): Promise<IntegrationView | null> {
    const integration = await this.deps.integrations.findByOwnerAndType(ownerId, requireCrmType(crmType));
    return integration ? this.toView(integration) : null;
  }

  async list(ownerId: string): Promise<IntegrationView[]> {
    const integrations = await this.deps.integrations.listByOwner(ownerId);
    return integrations.map((integration) => this.toView(integration));
  }

  async listSyncLogs(ownerId: string, crmType: string, limit = 50): Promise<SyncLogEntry[]> {
    const type = requireCrmType(crmType);
    const integration = await this.deps.integrations.findByOwnerAndType(ownerId, type);
    if (!integration) {
      throw new NotFoundError(`No ${type} integration found`);
    }
    return this.deps.syncLogs.listRecent(integration.id, Math.min(Math.max(limit, 1), 200));
  }

  private toView(integration: Integration): IntegrationView {
    let credentialHint: string | null = null;
    try {
      credentialHint = this.deps.vault.maskCredentials(
        integration.crmType,
        this.deps.vault.decrypt(integration.encryptedCredentials),
      );
    } catch (error) {
      console.error('[integrations] Stored credentials unreadable', {
        integrationId: integration.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const displayName = getFieldMappingRegistry().get(integration.crmType)?.displayName ?? integration.crmType;

    return {
      id: integration.id,
      crmType: integration.crmType,
      displayName,
      settings: integration.settings,
      isActive: integration.isActive,
      syncStatus: integration.syncStatus,
      syncError: integration.syncError,
      lastSyncAt: integration.lastSyncAt ? integration.lastSyncAt.toISOString() : null,
      createdAt: integration.createdAt.toISOString(),
      updatedAt: integration.updatedAt.toISOString(),
      credentialHint,
    };
  }
}
