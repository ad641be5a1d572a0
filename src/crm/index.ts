// CRM module barrel export
export { crmConfig } from './config.js';
export type { CrmConfig } from './config.js';
export { CrmApiError, CrmAuthError, CrmRateLimitError, ProviderNotRegisteredError } from './errors.js';
export { crmFetch } from './http.js';
export { fanOut } from './fan-out.js';
export { ProviderManager, createProviderManager, describeError } from './manager.js';
export type { BatchResult, ProviderTarget } from './manager.js';
export { KlaviyoProvider } from './providers/klaviyo.js';
export { SalesforceProvider } from './providers/salesforce.js';
export { CreatioProvider } from './providers/creatio.js';
export {
  CRM_TYPES,
  CANONICAL_FIELDS,
  CrmTypeSchema,
  CanonicalContactSchema,
  CanonicalEventSchema,
  ContactIdentifierSchema,
  isCrmType,
} from './types.js';
export type {
  CrmType,
  CanonicalContact,
  CanonicalEvent,
  CanonicalField,
  ContactIdentifier,
  CrmCredentials,
  CrmPayload,
  CrmProvider,
  ProviderEvent,
  RemoteRecord,
  RemoteResponse,
} from './types.js';
