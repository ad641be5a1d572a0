// ============================================================================
// Sync Orchestrator: Fan canonical records out to every active integration
// ============================================================================
//
// Per target, independently and concurrently:
// 1. Gate (events only: enabledEvents)
// 2. Write a pending audit row: no remote call without one
// 3. Map the record for the target CRM
// 4. Decrypt credentials and call the provider
// 5. Complete the audit row and record the outcome on the integration
//
// One target's failure never affects another's result or log row.
// Audit-write failures are reported on their own and never replace the
// remote outcome.

import { CrmApiError, CrmAuthError, ProviderNotRegisteredError } from '../crm/errors.js';
import { fanOut } from '../crm/fan-out.js';
import type { ProviderManager } from '../crm/manager.js';
import type {
  CanonicalContact,
  CanonicalEvent,
  ContactIdentifier,
  CrmCredentials,
  CrmPayload,
  CrmType,
  ProviderEvent,
  RemoteResponse,
} from '../crm/types.js';
import { FieldMappingError } from '../mapping/errors.js';
import { selectFields, transformContact, transformEvent } from '../mapping/field-mapper.js';
import { CredentialDecryptionError } from '../vault/credential-vault.js';
import type { CredentialVault } from '../vault/credential-vault.js';
import { NoActiveIntegrationsError } from './errors.js';
import type { IntegrationRepository, SyncLogRepository } from './repository.js';
import { requireCrmType } from './service.js';
import { isEventEnabled } from './settings.js';
import type {
  Integration,
  NewSyncLog,
  SyncErrorType,
  SyncLogCompletion,
  SyncResults,
  TargetResult,
} from './types.js';

export interface SyncOrchestratorDeps {
  integrations: IntegrationRepository;
  syncLogs: SyncLogRepository;
  providers: ProviderManager;
  vault: CredentialVault;
}

/** One target's work: build the wire payload, then send it. */
interface SyncUnit {
  log: Omit<NewSyncLog, 'integrationId' | 'ownerId' | 'crmType'>;
  prepare(integration: Integration): CrmPayload;
  send(integration: Integration, credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse>;
}

interface ClassifiedError {
  errorType: SyncErrorType;
  message: string;
  statusCode: number | null;
}

export function classifySyncError(error: unknown): ClassifiedError {
  if (error instanceof CrmAuthError) {
    return { errorType: 'auth', message: error.message, statusCode: error.statusCode };
  }
  if (error instanceof CrmApiError) {
    return { errorType: 'api', message: error.message, statusCode: error.statusCode || null };
  }
  if (error instanceof FieldMappingError) {
    return { errorType: 'mapping', message: error.message, statusCode: null };
  }
  if (error instanceof CredentialDecryptionError) {
    return { errorType: 'credentials', message: error.message, statusCode: null };
  }
  if (error instanceof ProviderNotRegisteredError) {
    return { errorType: 'unexpected', message: error.message, statusCode: null };
  }
  return {
    errorType: 'unexpected',
    message: `Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
    statusCode: null,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SyncOrchestrator {
  constructor(private readonly deps: SyncOrchestratorDeps) {}

  /** Upsert a canonical contact into every active integration (or the given subset). */
  async syncContact(ownerId: string, contact: CanonicalContact, crmTypes?: readonly string[]): Promise<SyncResults> {
    const integrations = await this.loadTargets(ownerId, crmTypes);

    const unit: SyncUnit = {
      log: {
        operationType: 'create_contact',
        entityType: 'contact',
        entityId: contact.email,
        requestPayload: { ...contact },
      },
      prepare: (integration) =>
        transformContact(
          selectFields(contact, integration.settings.selectedFields, integration.crmType),
          integration.crmType,
        ),
      send: (integration, credentials, payload) =>
        this.deps.providers.upsertContact(integration.crmType, credentials, payload),
    };

    const results = await this.runAll(ownerId, integrations, unit);
    console.log('[sync] Contact sync finished', { ownerId, ...summarize(results) });
    return results;
  }

  /** Send a canonical event to every active integration whose settings allow it. */
  async syncEvent(
    ownerId: string,
    event: CanonicalEvent,
    identifier: ContactIdentifier,
    crmTypes?: readonly string[],
  ): Promise<SyncResults> {
    const integrations = await this.loadTargets(ownerId, crmTypes);

    const resolved: ProviderEvent = {
      name: event.name,
      properties: event.properties,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(event.value !== undefined ? { value: event.value } : {}),
    };

    const unit: SyncUnit = {
      log: {
        operationType: 'send_event',
        entityType: 'event',
        entityId: resolved.name,
        requestPayload: { event: resolved, identifier },
      },
      prepare: (integration) => transformEvent(resolved, identifier, integration.crmType),
      send: (integration, credentials) =>
        this.deps.providers.sendEvent(integration.crmType, credentials, identifier, resolved),
    };

    const eligible = integrations.filter((integration) => isEventEnabled(integration.settings, resolved.name));
    const skipped: SyncResults = {};
    for (const integration of integrations) {
      if (!eligible.includes(integration)) {
        skipped[integration.crmType] = { success: true, skipped: true, reason: 'Event not enabled for this integration' };
      }
    }

    const results = { ...skipped, ...(await this.runAll(ownerId, eligible, unit)) };
    console.log('[sync] Event sync finished', { ownerId, eventName: resolved.name, ...summarize(results) });
    return results;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async loadTargets(ownerId: string, crmTypes?: readonly string[]): Promise<Integration[]> {
    const subset: CrmType[] | undefined = crmTypes?.map(requireCrmType);
    const integrations = await this.deps.integrations.listActiveByOwner(ownerId, subset);
    if (integrations.length === 0) {
      throw new NoActiveIntegrationsError();
    }
    return integrations;
  }

  private runAll(ownerId: string, integrations: readonly Integration[], unit: SyncUnit): Promise<SyncResults> {
    return fanOut(
      integrations,
      (integration) => integration.crmType,
      (integration) => this.runTarget(ownerId, integration, unit),
      (integration, error): TargetResult => {
        // runTarget handles its own failures; reaching here is a defect
        console.error('[sync] Target unit crashed', { crmType: integration.crmType, error: errorMessage(error) });
        return { success: false, ...pickError(classifySyncError(error)) };
      },
    );
  }

  private async runTarget(ownerId: string, integration: Integration, unit: SyncUnit): Promise<TargetResult> {
    const crmType = integration.crmType;

    let logId: string;
    try {
      logId = await this.deps.syncLogs.createPending({
        ...unit.log,
        integrationId: integration.id,
        ownerId,
        crmType,
      });
    } catch (error) {
      console.error('[sync-log] Failed to write pending entry; skipping remote call', {
        crmType,
        integrationId: integration.id,
        error: errorMessage(error),
      });
      return { success: false, error: 'Sync audit log unavailable; request not sent', errorType: 'audit_log' };
    }

    const startedAt = Date.now();
    let crmPayload: CrmPayload | null = null;
    let result: TargetResult;
    let completion: Omit<SyncLogCompletion, 'durationMs' | 'completedAt' | 'crmPayload'>;

    try {
      const payload = unit.prepare(integration);
      crmPayload = payload;
      const credentials = this.deps.vault.decrypt(integration.encryptedCredentials);
      const response = await unit.send(integration, credentials, payload);

      result = { success: true, data: response.record };
      completion = {
        status: 'success',
        statusCode: response.statusCode,
        responsePayload: response.record,
        crmEntityId: response.entityId,
        errorMessage: null,
        errorType: null,
      };
    } catch (error) {
      const classified = classifySyncError(error);
      console.warn('[sync] Target failed', { crmType, integrationId: integration.id, errorType: classified.errorType, error: classified.message });

      result = { success: false, ...pickError(classified) };
      completion = {
        status: 'failed',
        statusCode: classified.statusCode,
        responsePayload: null,
        crmEntityId: null,
        errorMessage: classified.message,
        errorType: classified.errorType,
      };
    }

    const completedAt = new Date();
    const auditError = await this.completeLog(logId, {
      ...completion,
      crmPayload,
      durationMs: completedAt.getTime() - startedAt,
      completedAt,
    });
    await this.recordOutcome(integration, result, completedAt);

    return auditError ? { ...result, auditError } : result;
  }

  /** Returns a description of the audit failure, or null when the row was completed. */
  private async completeLog(logId: string, completion: SyncLogCompletion): Promise<string | null> {
    try {
      const completed = await this.deps.syncLogs.complete(logId, completion);
      if (!completed) {
        console.error('[sync-log] Entry was no longer pending', { logId });
        return 'Sync log entry was already completed';
      }
      return null;
    } catch (error) {
      console.error('[sync-log] Failed to complete entry', { logId, error: errorMessage(error) });
      return 'Failed to record sync outcome in the audit log';
    }
  }

  private async recordOutcome(integration: Integration, result: TargetResult, at: Date): Promise<void> {
    try {
      await this.deps.integrations.recordSyncOutcome(
        integration.id,
        result.success ? { ok: true, at } : { ok: false, error: result.error },
      );
    } catch (error) {
      console.error('[sync] Failed to record sync status on integration', {
        integrationId: integration.id,
        error: errorMessage(error),
      });
    }
  }
}

function pickError(classified: ClassifiedError): { error: string; errorType: SyncErrorType } {
  return { error: classified.message, errorType: classified.errorType };
}

function summarize(results: SyncResults): { succeeded: number; failed: number; skipped: number } {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  for (const result of Object.values(results)) {
    if (!result.success) failed++;
    else if ('skipped' in result) skipped++;
    else succeeded++;
  }
  return { succeeded, failed, skipped };
}
