/**
 * Integration settings parsing.
 *
 * Caller-supplied settings are merged over a base (defaults on connect, the
 * stored settings on update). Known keys are validated; unknown keys land in
 * `extra`. Deprecated keys are accepted and discarded with a warning.
 */

import { z } from 'zod';
import { SYNC_FREQUENCY } from './types.js';
import type { IntegrationSettings } from './types.js';

/** Field mapping is owned by the registry; per-integration overrides are ignored. */
const DEPRECATED_KEYS: ReadonlySet<string> = new Set(['fieldMapping', 'field_mapping']);

export const DEFAULT_SETTINGS: Readonly<IntegrationSettings> = {
  syncFrequency: SYNC_FREQUENCY,
  enabledEvents: [],
  selectedFields: [],
  leadQuality: null,
  extra: {},
};

const eventNames = z.array(z.string().trim().min(1).max(100));

const SettingsInputSchema = z
  .object({
    syncFrequency: z.string().optional(),
    enabledEvents: eventNames.optional(),
    selectedFields: z.array(z.string().trim().min(1)).optional(),
    leadQuality: z.string().trim().max(50).nullable().optional(),
    extra: z.record(z.unknown()).optional(),
  })
  .passthrough();

const StoredSettingsSchema = z.object({
  syncFrequency: z.literal(SYNC_FREQUENCY).catch(SYNC_FREQUENCY),
  enabledEvents: z.array(z.string()).catch([]),
  selectedFields: z.array(z.string()).catch([]),
  leadQuality: z.string().nullable().catch(null),
  extra: z.record(z.unknown()).catch({}),
});

/**
 * Merge caller-supplied settings over `base`. Throws ZodError when a known
 * key has the wrong shape.
 */
export function resolveSettings(input: unknown, base: Readonly<IntegrationSettings> = DEFAULT_SETTINGS): IntegrationSettings {
  const parsed = SettingsInputSchema.parse(input ?? {});
  const { syncFrequency, enabledEvents, selectedFields, leadQuality, extra, ...unknownKeys } = parsed;

  if (syncFrequency !== undefined && syncFrequency !== SYNC_FREQUENCY) {
    console.warn('[settings] Only real-time sync is supported; ignoring syncFrequency', { syncFrequency });
  }

  const mergedExtra: Record<string, unknown> = { ...base.extra, ...(extra ?? {}) };
  for (const [key, value] of Object.entries(unknownKeys)) {
    if (DEPRECATED_KEYS.has(key)) {
      console.warn('[settings] Ignoring deprecated settings key', { key });
      continue;
    }
    mergedExtra[key] = value;
  }

  return {
    syncFrequency: SYNC_FREQUENCY,
    enabledEvents: enabledEvents ?? [...base.enabledEvents],
    selectedFields: selectedFields ?? [...base.selectedFields],
    leadQuality: leadQuality === undefined ? base.leadQuality : leadQuality,
    extra: mergedExtra,
  };
}

/** Read settings back from storage. Malformed keys fall back to defaults. */
export function parseStoredSettings(value: unknown): IntegrationSettings {
  const parsed = StoredSettingsSchema.safeParse(value);
  return parsed.success
    ? parsed.data
    : { syncFrequency: SYNC_FREQUENCY, enabledEvents: [], selectedFields: [], leadQuality: null, extra: {} };
}

/** Whether an event should be forwarded under these settings. */
export function isEventEnabled(settings: IntegrationSettings, eventName: string): boolean {
  return settings.enabledEvents.length === 0 || settings.enabledEvents.includes(eventName);
}
