// ============================================================================
// Field Mapping Engine: Canonical records -> CRM-native payloads
// ============================================================================
//
// transformContact is pure and deterministic: the same canonical contact
// and CRM type always produce the same payload. Steps:
// 1. Resolve the CRM's registry entry
// 2. Validate required fields and the email
// 3. Rename named fields (null/blank skipped, unmapped dropped)
// 4. Normalize values (email, phone, country)
// 5. Apply the CRM's structural transformer

import { CANONICAL_FIELDS, isCanonicalField } from '../crm/types.js';
import type {
  CanonicalContact,
  CanonicalField,
  ContactIdentifier,
  CrmPayload,
  CrmType,
  ProviderEvent,
} from '../crm/types.js';
import { FieldMappingError } from './errors.js';
import { getFieldMappingRegistry } from './registry.js';
import type { FieldMappingConfig, FieldMappingRegistry, StructuralTransformer } from './registry.js';
import { applyStructure } from './transformers.js';

/** CRMs whose phone fields reject formatting characters */
const PHONE_DIGITS_ONLY: ReadonlySet<string> = new Set(['salesforce', 'zoho']);

export interface FieldMappingInfo {
  crmType: CrmType;
  displayName: string;
  supportedFields: CanonicalField[];
  requiredFields: CanonicalField[];
  fieldMapping: Partial<Record<CanonicalField, string>>;
  structure: StructuralTransformer;
}

/** CRM-neutral event envelope, recorded in the sync log. */
export type TransformedEvent = {
  eventName: string;
  contact: ContactIdentifier;
  properties: Record<string, unknown>;
  timestamp: string;
  value?: number;
};

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function resolveMapping(
  crmType: string,
  registry: FieldMappingRegistry,
): { crmType: CrmType; config: FieldMappingConfig } {
  for (const [type, config] of registry) {
    if (type === crmType) return { crmType: type, config };
  }
  throw new FieldMappingError(`CRM type '${crmType}' is not supported`, 'crmType', crmType);
}

function normalizeValue(field: CanonicalField, value: unknown, crmType: CrmType): unknown {
  if (typeof value !== 'string') return value;

  switch (field) {
    case 'email':
      return value.trim().toLowerCase();
    case 'phone':
      return PHONE_DIGITS_ONLY.has(crmType) ? value.replace(/[\s\-()]/g, '') : value;
    case 'country':
      return value.trim().toUpperCase();
    default:
      return value;
  }
}

export function isCrmSupported(crmType: string, registry = getFieldMappingRegistry()): boolean {
  return [...registry.keys()].some((type) => type === crmType);
}

export function listSupportedCrms(registry = getFieldMappingRegistry()): CrmType[] {
  return [...registry.keys()];
}

/**
 * Check a contact against a CRM's required fields, then the universal email
 * rule. Throws FieldMappingError naming the first offending field.
 */
export function validateContactData(
  contact: CanonicalContact,
  crmType: string,
  registry = getFieldMappingRegistry(),
): void {
  const { config } = resolveMapping(crmType, registry);

  for (const field of config.requiredFields) {
    if (isBlank(contact[field])) {
      throw new FieldMappingError(`Missing required field: ${field}`, field, crmType);
    }
  }

  if (typeof contact.email !== 'string' || !contact.email.includes('@')) {
    throw new FieldMappingError('Invalid email format', 'email', crmType);
  }
}

export function transformContact(
  contact: CanonicalContact,
  crmType: string,
  registry = getFieldMappingRegistry(),
): CrmPayload {
  const resolved = resolveMapping(crmType, registry);
  validateContactData(contact, crmType, registry);

  const { customProperties, ...named } = contact;
  const mapped: Record<string, unknown> = {};

  for (const [field, value] of Object.entries(named)) {
    if (isBlank(value)) continue;

    const target = isCanonicalField(field) ? resolved.config.fields[field] : undefined;
    if (!isCanonicalField(field) || !target) {
      console.warn('[field-mapper] Dropping field with no mapping', { crmType, field });
      continue;
    }
    mapped[target] = normalizeValue(field, value, resolved.crmType);
  }

  return applyStructure(resolved.config.transformer, mapped, { ...(customProperties ?? {}) });
}

/**
 * Narrow a contact to an integration's selected fields. Email and the CRM's
 * required fields are always kept; customProperties only when selected.
 * An empty selection keeps everything.
 */
export function selectFields(
  contact: CanonicalContact,
  selectedFields: readonly string[],
  crmType: string,
  registry = getFieldMappingRegistry(),
): CanonicalContact {
  if (selectedFields.length === 0) return contact;

  const { config } = resolveMapping(crmType, registry);
  const keep = new Set<string>(['email', ...config.requiredFields, ...selectedFields]);

  const selected: CanonicalContact = { ...contact };
  for (const field of CANONICAL_FIELDS) {
    if (field !== 'email' && !keep.has(field)) {
      delete selected[field];
    }
  }
  if (!keep.has('customProperties')) {
    delete selected.customProperties;
  }
  return selected;
}

export function transformEvent(
  event: ProviderEvent,
  identifier: ContactIdentifier,
  crmType: string,
  registry = getFieldMappingRegistry(),
): TransformedEvent {
  resolveMapping(crmType, registry);

  return {
    eventName: event.name,
    contact: identifier,
    properties: event.properties,
    timestamp: event.timestamp,
    ...(event.value !== undefined ? { value: event.value } : {}),
  };
}

export function getFieldMappingInfo(crmType: string, registry = getFieldMappingRegistry()): FieldMappingInfo {
  const { crmType: type, config } = resolveMapping(crmType, registry);
  return {
    crmType: type,
    displayName: config.displayName,
    supportedFields: CANONICAL_FIELDS.filter((field) => config.fields[field] !== undefined),
    requiredFields: [...config.requiredFields],
    fieldMapping: { ...config.fields },
    structure: { ...config.transformer },
  };
}
