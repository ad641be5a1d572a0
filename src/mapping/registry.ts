// ============================================================================
// Field Mapping Registry: Per-CRM field maps, required fields, structure
// ============================================================================
//
// Loaded once from config/field-mappings.json and validated with zod. The
// map rejects writes once built and every entry is deep-frozen. Every CRM
// type in CRM_TYPES must have an entry.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CanonicalFieldSchema, CRM_TYPES, CrmTypeSchema } from '../crm/types.js';
import type { CanonicalField, CrmType } from '../crm/types.js';

export const TRANSFORMER_KINDS = [
  'attributes_properties',
  'value_wrapped_properties',
  'merge_fields',
  'flat_suffixed_custom_fields',
  'flat_array_custom_fields',
  'flat_nested_custom_attributes',
  'flat',
] as const;

const StructuralTransformerSchema = z.object({
  kind: z.enum(TRANSFORMER_KINDS),
  customFieldLocation: z.string().min(1),
  customFieldSuffix: z.string().min(1).optional(),
  nestDottedPaths: z.boolean().default(false),
  description: z.string(),
});

export type StructuralTransformer = z.infer<typeof StructuralTransformerSchema>;

const FieldMappingConfigSchema = z.object({
  displayName: z.string().min(1),
  requiredFields: z.array(CanonicalFieldSchema).min(1),
  fields: z.record(CanonicalFieldSchema, z.string().min(1)),
  transformer: StructuralTransformerSchema,
});

export interface FieldMappingConfig {
  readonly displayName: string;
  readonly requiredFields: readonly CanonicalField[];
  readonly fields: Readonly<Partial<Record<CanonicalField, string>>>;
  readonly transformer: Readonly<StructuralTransformer>;
}

export type FieldMappingRegistry = ReadonlyMap<CrmType, FieldMappingConfig>;

const RegistryFileSchema = z.record(CrmTypeSchema, FieldMappingConfigSchema);

export const DEFAULT_REGISTRY_PATH = new URL('../../config/field-mappings.json', import.meta.url);

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/** Map that accepts entries only while it is being constructed. */
export class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
    Object.freeze(this);
  }

  set(key: K, value: V): this {
    if (this.sealed) {
      throw new TypeError(`Cannot set ${String(key)}: map is frozen`);
    }
    return super.set(key, value);
  }

  delete(key: K): boolean {
    throw new TypeError(`Cannot delete ${String(key)}: map is frozen`);
  }

  clear(): void {
    throw new TypeError('Cannot clear: map is frozen');
  }
}

/** Parse and validate registry JSON. Throws on schema errors or missing CRM types. */
export function parseFieldMappingRegistry(json: unknown): FieldMappingRegistry {
  const parsed = RegistryFileSchema.parse(json);

  const entries: [CrmType, FieldMappingConfig][] = [];
  for (const crmType of CRM_TYPES) {
    const config = parsed[crmType];
    if (!config) {
      throw new Error(`Field mapping registry is missing CRM type: ${crmType}`);
    }
    for (const required of config.requiredFields) {
      if (!config.fields[required]) {
        throw new Error(`Field mapping registry: required field ${required} has no mapping for ${crmType}`);
      }
    }
    entries.push([crmType, deepFreeze(config)]);
  }

  return new FrozenMap(entries);
}

export function loadFieldMappingRegistry(path: URL | string = DEFAULT_REGISTRY_PATH): FieldMappingRegistry {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseFieldMappingRegistry(raw);
}

// Lazy singleton: read on first use, shared by reference afterwards
let _registry: FieldMappingRegistry | null = null;

export function getFieldMappingRegistry(): FieldMappingRegistry {
  if (!_registry) {
    _registry = loadFieldMappingRegistry();
    console.log('[field-mapping] Registry loaded', { crmTypes: _registry.size });
  }
  return _registry;
}
