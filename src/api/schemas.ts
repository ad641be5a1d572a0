import { z } from 'zod';
import { CanonicalContactSchema, CanonicalEventSchema, ContactIdentifierSchema } from '../crm/types.js';

const credentials = z.record(z.unknown()).refine((value) => Object.keys(value).length > 0, {
  message: 'Credentials must not be empty',
});

const crmTypes = z.array(z.string().min(1)).min(1).optional();

export const ValidateBodySchema = z.object({
  crmType: z.string().min(1),
  credentials,
});

export const ConnectBodySchema = z.object({
  crmType: z.string().min(1),
  credentials,
  settings: z.record(z.unknown()).optional(),
});

export const UpdateBodySchema = z
  .object({
    credentials: credentials.optional(),
    settings: z.record(z.unknown()).optional(),
    reconnect: z.boolean().optional(),
  })
  .refine((value) => value.credentials !== undefined || value.settings !== undefined || value.reconnect === true, {
    message: 'Nothing to update',
  });

export const SyncContactBodySchema = z.object({
  contact: CanonicalContactSchema,
  crmTypes,
});

export const SyncEventBodySchema = z.object({
  event: CanonicalEventSchema,
  identifier: ContactIdentifierSchema,
  crmTypes,
});

export const LogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});
