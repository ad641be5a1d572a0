// ============================================================================
// Repository contracts for integrations and the sync audit trail
// ============================================================================
//
// Implemented over PostgreSQL in pg-repository.ts. Tests use in-memory
// implementations of the same interfaces.

import type { CrmType } from '../crm/types.js';
import type {
  Integration,
  IntegrationPatch,
  NewIntegration,
  NewSyncLog,
  SyncLogCompletion,
  SyncLogEntry,
  SyncOutcome,
} from './types.js';

export interface IntegrationRepository {
  findByOwnerAndType(ownerId: string, crmType: CrmType): Promise<Integration | null>;
  /** Every integration for the owner, active or not, newest first */
  listByOwner(ownerId: string): Promise<Integration[]>;
  /** Active integrations, optionally restricted to the given CRM types */
  listActiveByOwner(ownerId: string, crmTypes?: readonly CrmType[]): Promise<Integration[]>;
  /** Throws ConflictError when (ownerId, crmType) already exists */
  insert(input: NewIntegration): Promise<Integration>;
  /** Throws NotFoundError when the row does not exist */
  update(id: string, patch: IntegrationPatch): Promise<Integration>;
  /** Retire the active row; null when there is none */
  deactivate(ownerId: string, crmType: CrmType): Promise<Integration | null>;
  recordSyncOutcome(id: string, outcome: SyncOutcome): Promise<void>;
}

export interface SyncLogRepository {
  /** Insert a pending entry and return its id */
  createPending(entry: NewSyncLog): Promise<string>;
  /** Move a pending entry to its terminal state. False when it was not pending. */
  complete(id: string, completion: SyncLogCompletion): Promise<boolean>;
  listRecent(integrationId: string, limit: number): Promise<SyncLogEntry[]>;
}
