/**
 * Express API Server
 *
 * HTTP surface for CRM integrations. Every /crm route except the
 * field-mapping lookups requires the owner id set by the upstream gateway
 * (header name from OWNER_ID_HEADER).
 *
 * Routes:
 * - GET    /health
 * - GET    /crm/field-mappings            : supported CRM types
 * - GET    /crm/:crmType/field-mapping    : field map for one CRM
 * - POST   /crm/validate                  : check credentials, store nothing
 * - POST   /crm/connect
 * - PATCH  /crm/:crmType                  : update settings/credentials, reconnect
 * - DELETE /crm/:crmType/disconnect
 * - GET    /crm/:crmType/status
 * - GET    /crm/list
 * - GET    /crm/:crmType/logs
 * - POST   /crm/sync/contact
 * - POST   /crm/sync/event
 *
 * Request bodies are sanitized before any console output.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { appConfig } from '../config.js';
import type { ProviderManager } from '../crm/manager.js';
import type { IntegrationService } from '../integrations/service.js';
import type { SyncOrchestrator } from '../integrations/sync.js';
import type { SyncResults } from '../integrations/types.js';
import { getFieldMappingInfo, listSupportedCrms } from '../mapping/field-mapper.js';
import { createHealthHandler } from './health.js';
import { MissingIdentityError, mapError, ok } from './responses.js';
import { sanitizeForLog } from './sanitize.js';
import {
  ConnectBodySchema,
  LogsQuerySchema,
  SyncContactBodySchema,
  SyncEventBodySchema,
  UpdateBodySchema,
  ValidateBodySchema,
} from './schemas.js';

export interface AppDependencies {
  integrations: IntegrationService;
  sync: SyncOrchestrator;
  providers: ProviderManager;
  checkDatabase?: () => Promise<void>;
}

type Handler = (req: Request, res: Response) => Promise<void>;

/** Forward async handler rejections to the error middleware. */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function requireOwner(req: Request): string {
  const ownerId = req.get(appConfig.identity.ownerHeader)?.trim();
  if (!ownerId) {
    throw new MissingIdentityError();
  }
  return ownerId;
}

function summarize(results: SyncResults): string {
  const outcomes = Object.values(results);
  const failed = outcomes.filter((result) => !result.success).length;
  return failed === 0
    ? `Synced to ${outcomes.length} integration(s)`
    : `Synced with ${failed} of ${outcomes.length} integration(s) failing`;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory so tests can build fresh instances over in-memory
 * dependencies.
 */
export function createApp(deps: AppDependencies) {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  app.get(
    '/health',
    createHealthHandler({ providers: () => deps.providers.registeredTypes(), checkDatabase: deps.checkDatabase }),
  );

  // Field mapping lookups (no owner needed)
  app.get('/crm/field-mappings', (_req: Request, res: Response) => {
    res.json(ok('Supported CRM types', { crmTypes: listSupportedCrms(), connectable: deps.providers.registeredTypes() }));
  });

  app.get('/crm/:crmType/field-mapping', (req: Request, res: Response) => {
    res.json(ok('Field mapping', getFieldMappingInfo(req.params.crmType)));
  });

  // Lifecycle
  app.post('/crm/validate', route(async (req, res) => {
    requireOwner(req);
    const body = ValidateBodySchema.parse(req.body);
    const result = await deps.integrations.validate(body.crmType, body.credentials);
    res.json(ok('Credentials are valid', result));
  }));

  app.post('/crm/connect', route(async (req, res) => {
    const ownerId = requireOwner(req);
    const body = ConnectBodySchema.parse(req.body);
    const integration = await deps.integrations.connect(ownerId, body);
    res.status(201).json(ok(`${integration.displayName} connected`, integration));
  }));

  app.get('/crm/list', route(async (req, res) => {
    const integrations = await deps.integrations.list(requireOwner(req));
    res.json(ok(`Found ${integrations.length} integration(s)`, integrations));
  }));

  app.patch('/crm/:crmType', route(async (req, res) => {
    const ownerId = requireOwner(req);
    const body = UpdateBodySchema.parse(req.body);
    const integration = await deps.integrations.update(ownerId, req.params.crmType, body);
    res.json(ok(body.reconnect ? `${integration.displayName} reconnected` : `${integration.displayName} updated`, integration));
  }));

  app.delete('/crm/:crmType/disconnect', route(async (req, res) => {
    const result = await deps.integrations.disconnect(requireOwner(req), req.params.crmType);
    res.json(ok('Integration disconnected', result));
  }));

  app.get('/crm/:crmType/status', route(async (req, res) => {
    const integration = await deps.integrations.status(requireOwner(req), req.params.crmType);
    res.json(ok(integration ? 'Integration found' : 'No integration found', integration));
  }));

  app.get('/crm/:crmType/logs', route(async (req, res) => {
    const { limit } = LogsQuerySchema.parse(req.query);
    const logs = await deps.integrations.listSyncLogs(requireOwner(req), req.params.crmType, limit);
    res.json(ok(`Found ${logs.length} sync log entr${logs.length === 1 ? 'y' : 'ies'}`, logs));
  }));

  // Sync
  app.post('/crm/sync/contact', route(async (req, res) => {
    const ownerId = requireOwner(req);
    const body = SyncContactBodySchema.parse(req.body);
    const results = await deps.sync.syncContact(ownerId, body.contact, body.crmTypes);
    res.json(ok(summarize(results), results));
  }));

  app.post('/crm/sync/event', route(async (req, res) => {
    const ownerId = requireOwner(req);
    const body = SyncEventBodySchema.parse(req.body);
    const results = await deps.sync.syncEvent(ownerId, body.event, body.identifier, body.crmTypes);
    res.json(ok(summarize(results), results));
  }));

  // Global error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const mapped = mapError(err, appConfig.isDev);
    if (mapped.unexpected) {
      console.error('[server] Unhandled error:', err instanceof Error ? err.stack ?? err.message : String(err), {
        method: req.method,
        path: req.path,
        body: sanitizeForLog(req.body),
      });
    } else if (mapped.status >= 500) {
      console.warn('[server] Upstream failure', { path: req.path, message: mapped.body.message });
    }
    res.status(mapped.status).json(mapped.body);
  });

  return app;
}
