// ============================================================================
// Integration Types: Stored integrations, settings, sync audit entries
// ============================================================================

import { z } from 'zod';
import type { CrmPayload, CrmType, RemoteRecord } from '../crm/types.js';

export const SYNC_STATUSES = ['connected', 'disconnected', 'error'] as const;
export const SyncStatusSchema = z.enum(SYNC_STATUSES);
export type SyncStatus = z.infer<typeof SyncStatusSchema>;

/** Only real-time sync is implemented; other frequencies are coerced. */
export const SYNC_FREQUENCY = 'real-time';

export interface IntegrationSettings {
  syncFrequency: typeof SYNC_FREQUENCY;
  /** Event names forwarded to this CRM. Empty forwards every event. */
  enabledEvents: string[];
  /** Canonical fields forwarded to this CRM. Empty forwards every field. */
  selectedFields: string[];
  leadQuality: string | null;
  /** Unknown keys, kept for forward compatibility */
  extra: Record<string, unknown>;
}

export interface Integration {
  id: string;
  ownerId: string;
  crmType: CrmType;
  encryptedCredentials: string;
  settings: IntegrationSettings;
  isActive: boolean;
  syncStatus: SyncStatus;
  syncError: string | null;
  lastSyncAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Read model returned to API callers. Never carries credentials. */
export interface IntegrationView {
  id: string;
  crmType: CrmType;
  displayName: string;
  settings: IntegrationSettings;
  isActive: boolean;
  syncStatus: SyncStatus;
  syncError: string | null;
  lastSyncAt: string | null;
  createdAt: string;
  updatedAt: string;
  /** Masked suffix of the primary secret, e.g. '••••ab12' */
  credentialHint: string | null;
}

export interface NewIntegration {
  ownerId: string;
  crmType: CrmType;
  encryptedCredentials: string;
  settings: IntegrationSettings;
}

export type IntegrationPatch = Partial<
  Pick<Integration, 'encryptedCredentials' | 'settings' | 'isActive' | 'syncStatus' | 'syncError'>
>;

export type SyncOutcome = { ok: true; at: Date } | { ok: false; error: string };

// ============================================================================
// Sync audit log
// ============================================================================

export type SyncOperationType = 'create_contact' | 'send_event';
export type SyncEntityType = 'contact' | 'event';
export type SyncLogStatus = 'pending' | 'success' | 'failed';
export type SyncErrorType = 'auth' | 'api' | 'mapping' | 'credentials' | 'audit_log' | 'unexpected';

export interface NewSyncLog {
  integrationId: string;
  ownerId: string;
  crmType: CrmType;
  operationType: SyncOperationType;
  entityType: SyncEntityType;
  entityId: string | null;
  requestPayload: Record<string, unknown>;
}

export interface SyncLogCompletion {
  status: 'success' | 'failed';
  statusCode: number | null;
  crmPayload: CrmPayload | null;
  responsePayload: RemoteRecord | null;
  crmEntityId: string | null;
  errorMessage: string | null;
  errorType: SyncErrorType | null;
  durationMs: number;
  completedAt: Date;
}

export interface SyncLogEntry extends NewSyncLog {
  id: string;
  status: SyncLogStatus;
  statusCode: number | null;
  crmPayload: CrmPayload | null;
  responsePayload: RemoteRecord | null;
  crmEntityId: string | null;
  errorMessage: string | null;
  errorType: SyncErrorType | null;
  retryCount: number;
  durationMs: number | null;
  createdAt: Date;
  completedAt: Date | null;
}

// ============================================================================
// Per-target sync results
// ============================================================================

export type TargetResult =
  | { success: true; data: RemoteRecord; auditError?: string }
  | { success: true; skipped: true; reason: string }
  | { success: false; error: string; errorType: SyncErrorType; auditError?: string };

/** Keyed by CRM type */
export type SyncResults = Record<string, TargetResult>;
