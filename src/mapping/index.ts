export {
  transformContact,
  transformEvent,
  validateContactData,
  selectFields,
  getFieldMappingInfo,
  listSupportedCrms,
  isCrmSupported,
} from './field-mapper.js';
export type { FieldMappingInfo, TransformedEvent } from './field-mapper.js';
export {
  getFieldMappingRegistry,
  loadFieldMappingRegistry,
  parseFieldMappingRegistry,
  TRANSFORMER_KINDS,
} from './registry.js';
export type { FieldMappingConfig, FieldMappingRegistry, StructuralTransformer } from './registry.js';
export { FieldMappingError } from './errors.js';
