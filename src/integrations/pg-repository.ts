// ============================================================================
// PostgreSQL repositories (drizzle-orm over node-postgres)
// ============================================================================

import { and, desc, eq, inArray } from 'drizzle-orm';
import { CrmTypeSchema, isCrmType } from '../crm/types.js';
import type { CrmType, RemoteRecord } from '../crm/types.js';
import type { Database } from '../db/client.js';
import { crmIntegrations, crmSyncLogs } from '../db/schema.js';
import type { CrmIntegrationRow, CrmSyncLogRow } from '../db/schema.js';
import { ConflictError, NotFoundError } from './errors.js';
import type { IntegrationRepository, SyncLogRepository } from './repository.js';
import { parseStoredSettings } from './settings.js';
import { SyncStatusSchema } from './types.js';
import type {
  Integration,
  IntegrationPatch,
  NewIntegration,
  NewSyncLog,
  SyncErrorType,
  SyncLogCompletion,
  SyncLogEntry,
  SyncLogStatus,
  SyncOperationType,
  SyncOutcome,
} from './types.js';

const UNIQUE_VIOLATION = '23505';

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return pgErrorCode(error.cause);
  return undefined;
}

function toRecord(value: unknown): RemoteRecord | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : null;
}

function toIntegration(row: CrmIntegrationRow): Integration {
  return {
    id: row.id,
    ownerId: row.ownerId,
    crmType: CrmTypeSchema.parse(row.crmType),
    encryptedCredentials: row.encryptedCredentials,
    settings: parseStoredSettings(row.settings),
    isActive: row.isActive,
    syncStatus: SyncStatusSchema.parse(row.syncStatus),
    syncError: row.syncError,
    lastSyncAt: row.lastSyncAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

const OPERATION_TYPES: readonly SyncOperationType[] = ['create_contact', 'send_event'];
const LOG_STATUSES: readonly SyncLogStatus[] = ['pending', 'success', 'failed'];
const ERROR_TYPES: readonly SyncErrorType[] = ['auth', 'api', 'mapping', 'credentials', 'audit_log', 'unexpected'];

function oneOf<T extends string>(values: readonly T[], value: string | null, column: string): T {
  const match = values.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Unexpected ${column} value in crm_sync_logs: ${value ?? 'null'}`);
  }
  return match;
}

function toSyncLogEntry(row: CrmSyncLogRow): SyncLogEntry {
  return {
    id: row.id,
    integrationId: row.integrationId,
    ownerId: row.ownerId,
    crmType: CrmTypeSchema.parse(row.crmType),
    operationType: oneOf(OPERATION_TYPES, row.operationType, 'operation_type'),
    entityType: row.entityType === 'event' ? 'event' : 'contact',
    entityId: row.entityId,
    requestPayload: toRecord(row.requestPayload) ?? {},
    crmPayload: toRecord(row.crmPayload),
    status: oneOf(LOG_STATUSES, row.status, 'status'),
    statusCode: row.statusCode,
    responsePayload: toRecord(row.responsePayload),
    crmEntityId: row.crmEntityId,
    errorMessage: row.errorMessage,
    errorType: row.errorType === null ? null : oneOf(ERROR_TYPES, row.errorType, 'error_type'),
    retryCount: row.retryCount,
    durationMs: row.durationMs,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
  };
}

export class PgIntegrationRepository implements IntegrationRepository {
  constructor(private readonly db: Database) {}

  async findByOwnerAndType(ownerId: string, crmType: CrmType): Promise<Integration | null> {
    const [row] = await this.db
      .select()
      .from(crmIntegrations)
      .where(and(eq(crmIntegrations.ownerId, ownerId), eq(crmIntegrations.crmType, crmType)))
      .limit(1);
    return row ? toIntegration(row) : null;
  }

  async listByOwner(ownerId: string): Promise<Integration[]> {
    const rows = await this.db
      .select()
      .from(crmIntegrations)
      .where(eq(crmIntegrations.ownerId, ownerId))
      .orderBy(desc(crmIntegrations.createdAt));
    return rows.filter((row) => isCrmType(row.crmType)).map(toIntegration);
  }

  async listActiveByOwner(ownerId: string, crmTypes?: readonly CrmType[]): Promise<Integration[]> {
    if (crmTypes && crmTypes.length === 0) return [];

    const rows = await this.db
      .select()
      .from(crmIntegrations)
      .where(
        and(
          eq(crmIntegrations.ownerId, ownerId),
          eq(crmIntegrations.isActive, true),
          crmTypes ? inArray(crmIntegrations.crmType, [...crmTypes]) : undefined,
        ),
      )
      .orderBy(desc(crmIntegrations.createdAt));
    return rows.filter((row) => isCrmType(row.crmType)).map(toIntegration);
  }

  async insert(input: NewIntegration): Promise<Integration> {
    try {
      const [row] = await this.db
        .insert(crmIntegrations)
        .values({
          ownerId: input.ownerId,
          crmType: input.crmType,
          encryptedCredentials: input.encryptedCredentials,
          settings: input.settings,
          isActive: true,
          syncStatus: 'connected',
        })
        .returning();
      return toIntegration(row);
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new ConflictError(`An integration for ${input.crmType} already exists`);
      }
      throw error;
    }
  }

  async update(id: string, patch: IntegrationPatch): Promise<Integration> {
    const [row] = await this.db
      .update(crmIntegrations)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(crmIntegrations.id, id))
      .returning();
    if (!row) {
      throw new NotFoundError('Integration not found');
    }
    return toIntegration(row);
  }

  async deactivate(ownerId: string, crmType: CrmType): Promise<Integration | null> {
    const [row] = await this.db
      .update(crmIntegrations)
      .set({ isActive: false, syncStatus: 'disconnected', updatedAt: new Date() })
      .where(
        and(
          eq(crmIntegrations.ownerId, ownerId),
          eq(crmIntegrations.crmType, crmType),
          eq(crmIntegrations.isActive, true),
        ),
      )
      .returning();
    return row ? toIntegration(row) : null;
  }

  async recordSyncOutcome(id: string, outcome: SyncOutcome): Promise<void> {
    await this.db
      .update(crmIntegrations)
      .set(
        outcome.ok
          ? { lastSyncAt: outcome.at, syncStatus: 'connected', syncError: null, updatedAt: outcome.at }
          : { syncStatus: 'error', syncError: outcome.error, updatedAt: new Date() },
      )
      .where(eq(crmIntegrations.id, id));
  }
}

export class PgSyncLogRepository implements SyncLogRepository {
  constructor(private readonly db: Database) {}

  async createPending(entry: NewSyncLog): Promise<string> {
    const [row] = await this.db
      .insert(crmSyncLogs)
      .values({ ...entry, status: 'pending', retryCount: 0 })
      .returning({ id: crmSyncLogs.id });
    return row.id;
  }

  async complete(id: string, completion: SyncLogCompletion): Promise<boolean> {
    const rows = await this.db
      .update(crmSyncLogs)
      .set(completion)
      .where(and(eq(crmSyncLogs.id, id), eq(crmSyncLogs.status, 'pending')))
      .returning({ id: crmSyncLogs.id });
    return rows.length > 0;
  }

  async listRecent(integrationId: string, limit: number): Promise<SyncLogEntry[]> {
    const rows = await this.db
      .select()
      .from(crmSyncLogs)
      .where(eq(crmSyncLogs.integrationId, integrationId))
      .orderBy(desc(crmSyncLogs.createdAt))
      .limit(limit);
    return rows.map(toSyncLogEntry);
  }
}
