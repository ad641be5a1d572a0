// ============================================================================
// API Responses: Standard envelope and error-to-status mapping
// ============================================================================

import { ZodError } from 'zod';
import { CrmApiError, CrmAuthError, ProviderNotRegisteredError } from '../crm/errors.js';
import { ConflictError, NotFoundError } from '../integrations/errors.js';
import { FieldMappingError } from '../mapping/errors.js';

export const ErrorCodes = {
  AUTH_MISSING_IDENTITY: 'AUTH_MISSING_IDENTITY',
  VAL_INVALID_INPUT: 'VAL_INVALID_INPUT',
  RES_ALREADY_EXISTS: 'RES_ALREADY_EXISTS',
  SRV_INTERNAL_ERROR: 'SRV_INTERNAL_ERROR',
  CRM_INVALID_CREDENTIALS: 'CRM_INVALID_CREDENTIALS',
  CRM_CONNECTION_FAILED: 'CRM_CONNECTION_FAILED',
  CRM_INVALID_TYPE: 'CRM_INVALID_TYPE',
  CRM_INTEGRATION_NOT_FOUND: 'CRM_INTEGRATION_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface SuccessBody<T> {
  success: true;
  message: string;
  data: T;
}

export interface ErrorBody {
  success: false;
  message: string;
  errorCode: ErrorCode;
  details?: unknown;
}

export function ok<T>(message: string, data: T): SuccessBody<T> {
  return { success: true, message, data };
}

/** The gateway did not supply an owner id. */
export class MissingIdentityError extends Error {
  constructor() {
    super('Missing authenticated owner');
    this.name = 'MissingIdentityError';
  }
}

export interface MappedError {
  status: number;
  body: ErrorBody;
  /** Unexpected errors get logged in full */
  unexpected: boolean;
}

function fail(status: number, errorCode: ErrorCode, message: string, details?: unknown): MappedError {
  return {
    status,
    body: { success: false, message, errorCode, ...(details !== undefined ? { details } : {}) },
    unexpected: false,
  };
}

/**
 * Translate a thrown error into an HTTP status and envelope.
 * Only unexpected errors carry details, and only when `exposeDetails` is set.
 */
export function mapError(error: unknown, exposeDetails: boolean): MappedError {
  if (error instanceof MissingIdentityError) {
    return fail(401, ErrorCodes.AUTH_MISSING_IDENTITY, error.message);
  }
  if (error instanceof ZodError) {
    return fail(
      400,
      ErrorCodes.VAL_INVALID_INPUT,
      'Invalid request',
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  if (error instanceof SyntaxError) {
    return fail(400, ErrorCodes.VAL_INVALID_INPUT, 'Malformed JSON body');
  }
  if (error instanceof FieldMappingError) {
    return error.field === 'crmType'
      ? fail(400, ErrorCodes.CRM_INVALID_TYPE, error.message)
      : fail(400, ErrorCodes.VAL_INVALID_INPUT, error.message, { field: error.field });
  }
  if (error instanceof ProviderNotRegisteredError) {
    return fail(400, ErrorCodes.CRM_INVALID_TYPE, error.message);
  }
  if (error instanceof CrmAuthError) {
    return fail(401, ErrorCodes.CRM_INVALID_CREDENTIALS, error.message);
  }
  if (error instanceof CrmApiError) {
    return fail(503, ErrorCodes.CRM_CONNECTION_FAILED, error.message);
  }
  if (error instanceof ConflictError) {
    return fail(409, ErrorCodes.RES_ALREADY_EXISTS, error.message);
  }
  if (error instanceof NotFoundError) {
    return fail(404, ErrorCodes.CRM_INTEGRATION_NOT_FOUND, error.message);
  }

  return {
    status: 500,
    body: {
      success: false,
      message: 'Internal server error',
      errorCode: ErrorCodes.SRV_INTERNAL_ERROR,
      ...(exposeDetails && error instanceof Error ? { details: { error: error.message } } : {}),
    },
    unexpected: true,
  };
}
