// ============================================================================
// Structural Transformers: Shape a renamed field map into a CRM payload
// ============================================================================

import type { CrmPayload } from '../crm/types.js';
import type { StructuralTransformer } from './registry.js';

type Fields = Record<string, unknown>;

function isPlainObject(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand dotted native names into nested objects:
 * { 'ADDRESS.city': 'Austin' } -> { ADDRESS: { city: 'Austin' } }
 */
export function nestDottedPaths(fields: Fields): Fields {
  const result: Fields = {};
  for (const [key, value] of Object.entries(fields)) {
    const path = key.split('.');
    let cursor = result;
    for (const segment of path.slice(0, -1)) {
      const existing = cursor[segment];
      const next: Fields = isPlainObject(existing) ? existing : {};
      cursor[segment] = next;
      cursor = next;
    }
    cursor[path[path.length - 1]] = value;
  }
  return result;
}

function hasEntries(fields: Fields): boolean {
  return Object.keys(fields).length > 0;
}

/**
 * Apply a CRM's structural transformer.
 *
 * `mapped` holds native field names from the registry; `custom` holds the
 * caller's customProperties, attached where the transformer says.
 */
export function applyStructure(transformer: StructuralTransformer, mapped: Fields, custom: Fields): CrmPayload {
  const fields = transformer.nestDottedPaths ? nestDottedPaths(mapped) : { ...mapped };

  switch (transformer.kind) {
    case 'attributes_properties':
      return hasEntries(custom) ? { attributes: fields, properties: { ...custom } } : { attributes: fields };

    case 'value_wrapped_properties': {
      const properties: Fields = {};
      for (const [key, value] of Object.entries({ ...custom, ...fields })) {
        properties[key] = { value };
      }
      return { properties };
    }

    case 'merge_fields': {
      const { email_address: emailAddress = '', ...rest } = fields;
      return { email_address: emailAddress, merge_fields: { ...custom, ...rest } };
    }

    case 'flat_suffixed_custom_fields': {
      const suffix = transformer.customFieldSuffix ?? '__c';
      const result: Fields = {};
      for (const [key, value] of Object.entries(custom)) {
        result[key.endsWith(suffix) ? key : `${key}${suffix}`] = value;
      }
      return { ...result, ...fields };
    }

    case 'flat_array_custom_fields':
      return hasEntries(custom)
        ? {
            ...fields,
            [transformer.customFieldLocation]: Object.entries(custom).map(([field, value]) => ({ field, value })),
          }
        : fields;

    case 'flat_nested_custom_attributes': {
      const location = transformer.customFieldLocation;
      const existing = fields[location];
      const nested: Fields = { ...(isPlainObject(existing) ? existing : {}), ...custom };
      const { [location]: _omitted, ...rest } = fields;
      return hasEntries(nested) ? { ...rest, [location]: nested } : rest;
    }

    case 'flat':
      // Named fields win over custom keys of the same name
      return { ...custom, ...fields };
  }
}
