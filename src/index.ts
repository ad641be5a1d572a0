/**
 * Application Entry Point
 *
 * Startup:
 * 1. Load configuration (fails fast on a missing DATABASE_URL or a
 *    CRM_ENCRYPTION_KEY that is not 32 bytes)
 * 2. Load and freeze the field-mapping registry and provider manager
 * 3. Start the Express server
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the database pool
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { sql } from 'drizzle-orm';
import { createApp } from './api/server.js';
import { appConfig } from './config.js';
import { crmConfig } from './crm/config.js';
import { createProviderManager } from './crm/manager.js';
import { closeDb, getDb } from './db/client.js';
import { PgIntegrationRepository, PgSyncLogRepository } from './integrations/pg-repository.js';
import { IntegrationService } from './integrations/service.js';
import { SyncOrchestrator } from './integrations/sync.js';
import { getFieldMappingRegistry } from './mapping/registry.js';
import { CredentialVault } from './vault/credential-vault.js';

async function main() {
  console.log('[startup] CRM integration service starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');

  getFieldMappingRegistry();
  const providers = createProviderManager({ timeoutMs: crmConfig.requestTimeoutMs });
  console.log('[startup] Providers registered:', providers.registeredTypes().join(', '));

  const db = getDb();
  const integrations = new PgIntegrationRepository(db);
  const syncLogs = new PgSyncLogRepository(db);
  const vault = new CredentialVault(appConfig.vault.encryptionKey);

  const app = createApp({
    integrations: new IntegrationService({ integrations, syncLogs, providers, vault }),
    sync: new SyncOrchestrator({ integrations, syncLogs, providers, vault }),
    providers,
    checkDatabase: async () => {
      await db.execute(sql`select 1`);
    },
  });

  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}: shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeDb();
    console.log('[shutdown] Database pool closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err);
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err);
  process.exit(1);
});
