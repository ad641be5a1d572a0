// In-memory repositories implementing the same contracts as pg-repository.ts

import type { CrmType } from '../../../crm/types.js';
import { ConflictError, NotFoundError } from '../../errors.js';
import type { IntegrationRepository, SyncLogRepository } from '../../repository.js';
import type {
  Integration,
  IntegrationPatch,
  NewIntegration,
  NewSyncLog,
  SyncLogCompletion,
  SyncLogEntry,
  SyncOutcome,
} from '../../types.js';

const EPOCH = Date.UTC(2026, 0, 1);

function clone<T extends object>(value: T): T {
  return structuredClone(value);
}

export class InMemoryIntegrationRepository implements IntegrationRepository {
  readonly rows = new Map<string, Integration>();
  private sequence = 0;

  /** Monotonic clock so ordering by createdAt is deterministic */
  private tick(): Date {
    this.sequence++;
    return new Date(EPOCH + this.sequence * 1000);
  }

  async findByOwnerAndType(ownerId: string, crmType: CrmType): Promise<Integration | null> {
    for (const row of this.rows.values()) {
      if (row.ownerId === ownerId && row.crmType === crmType) return clone(row);
    }
    return null;
  }

  async listByOwner(ownerId: string): Promise<Integration[]> {
    return [...this.rows.values()]
      .filter((row) => row.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(clone);
  }

  async listActiveByOwner(ownerId: string, crmTypes?: readonly CrmType[]): Promise<Integration[]> {
    const all = await this.listByOwner(ownerId);
    return all.filter((row) => row.isActive && (!crmTypes || crmTypes.includes(row.crmType)));
  }

  async insert(input: NewIntegration): Promise<Integration> {
    if (await this.findByOwnerAndType(input.ownerId, input.crmType)) {
      throw new ConflictError(`An integration for ${input.crmType} already exists`);
    }
    const now = this.tick();
    const row: Integration = {
      id: `int-${this.sequence}`,
      ...clone(input),
      isActive: true,
      syncStatus: 'connected',
      syncError: null,
      lastSyncAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return clone(row);
  }

  async update(id: string, patch: IntegrationPatch): Promise<Integration> {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError('Integration not found');
    }
    const updated: Integration = { ...row, ...clone(patch), updatedAt: this.tick() };
    this.rows.set(id, updated);
    return clone(updated);
  }

  async deactivate(ownerId: string, crmType: CrmType): Promise<Integration | null> {
    for (const row of this.rows.values()) {
      if (row.ownerId === ownerId && row.crmType === crmType && row.isActive) {
        return this.update(row.id, { isActive: false, syncStatus: 'disconnected' });
      }
    }
    return null;
  }

  async recordSyncOutcome(id: string, outcome: SyncOutcome): Promise<void> {
    const row = this.rows.get(id);
    if (!row) return;
    this.rows.set(
      id,
      outcome.ok
        ? { ...row, lastSyncAt: outcome.at, syncStatus: 'connected', syncError: null, updatedAt: outcome.at }
        : { ...row, syncStatus: 'error', syncError: outcome.error, updatedAt: this.tick() },
    );
  }
}

export class InMemorySyncLogRepository implements SyncLogRepository {
  readonly entries = new Map<string, SyncLogEntry>();
  private sequence = 0;

  async createPending(entry: NewSyncLog): Promise<string> {
    this.sequence++;
    const id = `log-${this.sequence}`;
    this.entries.set(id, {
      ...clone(entry),
      id,
      status: 'pending',
      statusCode: null,
      crmPayload: null,
      responsePayload: null,
      crmEntityId: null,
      errorMessage: null,
      errorType: null,
      retryCount: 0,
      durationMs: null,
      createdAt: new Date(EPOCH + this.sequence * 1000),
      completedAt: null,
    });
    return id;
  }

  async complete(id: string, completion: SyncLogCompletion): Promise<boolean> {
    const entry = this.entries.get(id);
    if (!entry || entry.status !== 'pending') return false;
    this.entries.set(id, { ...entry, ...clone(completion) });
    return true;
  }

  async listRecent(integrationId: string, limit: number): Promise<SyncLogEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.integrationId === integrationId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(clone);
  }

  /** Entries for one CRM type, oldest first */
  forCrm(crmType: CrmType): SyncLogEntry[] {
    return [...this.entries.values()].filter((entry) => entry.crmType === crmType);
  }
}
