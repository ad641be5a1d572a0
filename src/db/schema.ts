import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

// One row per (owner, CRM type); soft-retired on disconnect, never deleted
export const crmIntegrations = pgTable(
  'crm_integrations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: varchar('owner_id', { length: 255 }).notNull(),
    crmType: varchar('crm_type', { length: 50 }).notNull(),
    encryptedCredentials: text('encrypted_credentials').notNull(),
    settings: jsonb('settings').notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    syncStatus: varchar('sync_status', { length: 20 }).default('connected').notNull(), // connected/disconnected/error
    syncError: text('sync_error'),
    lastSyncAt: timestamp('last_sync_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    ownerCrmUnique: uniqueIndex('crm_integrations_owner_crm_type_key').on(table.ownerId, table.crmType),
    ownerActiveIdx: index('crm_integrations_owner_active_idx').on(table.ownerId, table.isActive),
  }),
);

// Append-only audit trail: inserted pending, completed exactly once
export const crmSyncLogs = pgTable(
  'crm_sync_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => crmIntegrations.id),
    ownerId: varchar('owner_id', { length: 255 }).notNull(),
    crmType: varchar('crm_type', { length: 50 }).notNull(),
    operationType: varchar('operation_type', { length: 50 }).notNull(), // create_contact/send_event
    entityType: varchar('entity_type', { length: 50 }).notNull(), // contact/event
    entityId: varchar('entity_id', { length: 255 }),
    requestPayload: jsonb('request_payload').notNull(),
    crmPayload: jsonb('crm_payload'),
    status: varchar('status', { length: 20 }).default('pending').notNull(), // pending/success/failed
    statusCode: integer('status_code'),
    responsePayload: jsonb('response_payload'),
    crmEntityId: varchar('crm_entity_id', { length: 255 }),
    errorMessage: text('error_message'),
    errorType: varchar('error_type', { length: 50 }),
    retryCount: integer('retry_count').default(0).notNull(),
    durationMs: integer('duration_ms'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => ({
    integrationCreatedIdx: index('crm_sync_logs_integration_created_idx').on(table.integrationId, table.createdAt),
    statusIdx: index('crm_sync_logs_status_idx').on(table.status),
  }),
);

export type CrmIntegrationRow = typeof crmIntegrations.$inferSelect;
export type CrmSyncLogRow = typeof crmSyncLogs.$inferSelect;
