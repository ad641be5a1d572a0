// Integrations module barrel export
export { IntegrationService, requireCrmType } from './service.js';
export type { ConnectInput, UpdateInput, DisconnectResult, IntegrationServiceDeps } from './service.js';
export { SyncOrchestrator, classifySyncError } from './sync.js';
export type { SyncOrchestratorDeps } from './sync.js';
export { PgIntegrationRepository, PgSyncLogRepository } from './pg-repository.js';
export type { IntegrationRepository, SyncLogRepository } from './repository.js';
export { stateOf, transition } from './lifecycle.js';
export type { IntegrationState, LifecycleAction } from './lifecycle.js';
export { resolveSettings, parseStoredSettings, isEventEnabled, DEFAULT_SETTINGS } from './settings.js';
export { IntegrationError, ConflictError, NotFoundError, NoActiveIntegrationsError } from './errors.js';
export type * from './types.js';
export { SYNC_STATUSES, SYNC_FREQUENCY, SyncStatusSchema } from './types.js';
