/**
 * Raised when a canonical record cannot be mapped for a CRM type:
 * unsupported type, missing required field, malformed email.
 * `field` names the offending field; values are never included.
 */
export class FieldMappingError extends Error {
  readonly field: string;
  readonly crmType: string;

  constructor(message: string, field: string, crmType: string) {
    super(message);
    this.name = 'FieldMappingError';
    this.field = field;
    this.crmType = crmType;
  }
}
