// ============================================================================
// CRM Types: Canonical records, provider contract, CRM type union
// ============================================================================

import { z } from 'zod';

/** Every CRM type the field-mapping registry knows about. */
export const CRM_TYPES = [
  'klaviyo',
  'salesforce',
  'creatio',
  'hubspot',
  'mailchimp',
  'activecampaign',
  'sendinblue',
  'zoho',
  'pipedrive',
  'intercom',
  'customerio',
] as const;

export const CrmTypeSchema = z.enum(CRM_TYPES);
export type CrmType = z.infer<typeof CrmTypeSchema>;

export function isCrmType(value: string): value is CrmType {
  return CrmTypeSchema.safeParse(value).success;
}

// ============================================================================
// Canonical records
// ============================================================================

/** Named (non-custom) canonical contact fields, in display order. */
export const CANONICAL_FIELDS = [
  'email',
  'firstName',
  'lastName',
  'phone',
  'company',
  'jobTitle',
  'department',
  'streetAddress',
  'streetAddress2',
  'city',
  'state',
  'postalCode',
  'country',
  'website',
  'timezone',
  'language',
] as const;

export const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);
export type CanonicalField = z.infer<typeof CanonicalFieldSchema>;

export function isCanonicalField(value: string): value is CanonicalField {
  return CanonicalFieldSchema.safeParse(value).success;
}

const optionalText = (max: number) => z.string().trim().max(max).nullish();

export const CanonicalContactSchema = z.object({
  email: z
    .string()
    .trim()
    .toLowerCase()
    .max(255)
    .refine((value) => value.includes('@'), { message: 'Invalid email format' }),
  firstName: optionalText(100),
  lastName: optionalText(100),
  phone: optionalText(20),
  company: optionalText(200),
  jobTitle: optionalText(100),
  department: optionalText(100),
  streetAddress: optionalText(255),
  streetAddress2: optionalText(255),
  city: optionalText(100),
  state: optionalText(100),
  postalCode: optionalText(20),
  country: optionalText(100),
  website: optionalText(255),
  timezone: optionalText(50),
  language: optionalText(10),
  customProperties: z.record(z.unknown()).optional(),
});

export type CanonicalContact = z.infer<typeof CanonicalContactSchema>;

export const CanonicalEventSchema = z.object({
  name: z.string().trim().min(1).max(100),
  properties: z.record(z.unknown()).default({}),
  timestamp: z.string().datetime({ offset: true }).optional(),
  value: z.number().finite().optional(),
});

export type CanonicalEvent = z.infer<typeof CanonicalEventSchema>;

/** A canonical event with its timestamp resolved. */
export interface ProviderEvent {
  name: string;
  properties: Record<string, unknown>;
  timestamp: string;
  value?: number;
}

export const ContactIdentifierSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    email: z.string().trim().toLowerCase().optional(),
    phone: z.string().trim().optional(),
  })
  .refine((value) => Boolean(value.id || value.email || value.phone), {
    message: 'Identifier requires at least one of id, email or phone',
  });

export type ContactIdentifier = z.infer<typeof ContactIdentifierSchema>;

// ============================================================================
// Provider contract
// ============================================================================

/** Decrypted credential blob. Each adapter narrows it with its own schema. */
export type CrmCredentials = Record<string, unknown>;

/** Remote record in the provider's native shape. */
export type RemoteRecord = Record<string, unknown>;

/** Provider-native payload produced by the field-mapping engine. */
export type CrmPayload = Record<string, unknown>;

export interface RemoteResponse {
  statusCode: number;
  /** Native id of the created/updated entity, when the provider returns one */
  entityId: string | null;
  record: RemoteRecord;
}

/**
 * Capability set every CRM adapter implements.
 *
 * - validateCredentials resolves to true or throws CrmAuthError / CrmApiError
 * - upsertContact is idempotent per email
 * - sendEvent resolves the remote contact from the identifier
 * - getContact resolves to null when nothing matches
 */
export interface CrmProvider {
  readonly crmType: CrmType;
  readonly displayName: string;
  validateCredentials(credentials: CrmCredentials): Promise<true>;
  upsertContact(credentials: CrmCredentials, payload: CrmPayload): Promise<RemoteResponse>;
  sendEvent(
    credentials: CrmCredentials,
    identifier: ContactIdentifier,
    event: ProviderEvent,
  ): Promise<RemoteResponse>;
  getContact(credentials: CrmCredentials, identifier: ContactIdentifier): Promise<RemoteRecord | null>;
}
