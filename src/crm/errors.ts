// ============================================================================
// CRM Error Types: Typed errors for provider call failures
// ============================================================================

/**
 * Base error for all CRM API errors.
 * Includes the HTTP status code and response body for debugging.
 * Status code 0 means the request never produced a response (timeout,
 * DNS failure, connection reset).
 * NEVER includes PII (emails, phone numbers, names) in messages.
 */
export class CrmApiError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.name = 'CrmApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * Thrown on HTTP 429 (Too Many Requests).
 * The sync path does not retry; the failure is recorded for the target.
 */
export class CrmRateLimitError extends CrmApiError {
  constructor(provider: string, responseBody: string) {
    super(`${provider} API rate limit exceeded (429)`, 429, responseBody);
    this.name = 'CrmRateLimitError';
  }
}

/**
 * Thrown when the remote service rejects the supplied credentials
 * (401/403, a failed token grant) or required credential fields are missing.
 */
export class CrmAuthError extends CrmApiError {
  constructor(message: string, statusCode = 401, responseBody = '') {
    super(message, statusCode, responseBody);
    this.name = 'CrmAuthError';
  }
}

/** Thrown when no adapter is bound for a CRM type. */
export class ProviderNotRegisteredError extends Error {
  readonly crmType: string;

  constructor(crmType: string) {
    super(`No provider registered for CRM type: ${crmType}`);
    this.name = 'ProviderNotRegisteredError';
    this.crmType = crmType;
  }
}
