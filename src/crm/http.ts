// ============================================================================
// CRM HTTP: Shared fetch wrapper for every provider adapter
// ============================================================================

import { crmConfig } from './config.js';
import { CrmApiError, CrmAuthError, CrmRateLimitError } from './errors.js';

export interface CrmRequest {
  /** Display name used in error messages, e.g. 'Klaviyo' */
  provider: string;
  url: string;
  method: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';
  headers?: Record<string, string>;
  /** JSON-serialized unless it is URLSearchParams (form-encoded) */
  body?: unknown;
  /** Resolve 404 as { status: 404, body: null } instead of throwing */
  allowNotFound?: boolean;
  timeoutMs?: number;
}

export interface CrmHttpResponse {
  status: number;
  body: unknown;
}

function encodeBody(body: unknown): { body?: string; contentType?: string } {
  if (body === undefined) return {};
  if (body instanceof URLSearchParams) {
    return { body: body.toString(), contentType: 'application/x-www-form-urlencoded' };
  }
  return { body: JSON.stringify(body), contentType: 'application/json' };
}

function transportError(request: CrmRequest, timeoutMs: number, error: unknown): CrmApiError {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new CrmApiError(`${request.provider} request timed out after ${timeoutMs}ms`, 0, '');
  }
  return new CrmApiError(
    `${request.provider} request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
    0,
    '',
  );
}

function parseBody(provider: string, status: number, text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new CrmApiError(`${provider} returned a non-JSON response`, status, text);
  }
}

/**
 * Perform one outbound provider call.
 *
 * - 429 -> CrmRateLimitError
 * - 401/403 -> CrmAuthError
 * - 404 with allowNotFound -> { status: 404, body: null }
 * - other non-2xx -> CrmApiError with the status code
 * - timeout or transport failure -> CrmApiError with status code 0
 */
export async function crmFetch(request: CrmRequest): Promise<CrmHttpResponse> {
  const timeoutMs = request.timeoutMs ?? crmConfig.requestTimeoutMs;
  const encoded = encodeBody(request.body);

  let response: Response;
  try {
    response = await fetch(request.url, {
      method: request.method,
      headers: {
        Accept: 'application/json',
        ...(encoded.contentType ? { 'Content-Type': encoded.contentType } : {}),
        ...(request.headers ?? {}),
      },
      body: encoded.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw transportError(request, timeoutMs, error);
  }

  // The timeout signal also covers the body stream
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw transportError(request, timeoutMs, error);
  }

  if (!response.ok) {
    if (response.status === 404 && request.allowNotFound) {
      return { status: 404, body: null };
    }
    if (response.status === 429) {
      throw new CrmRateLimitError(request.provider, text);
    }
    if (response.status === 401) {
      throw new CrmAuthError(`Invalid ${request.provider} credentials`, 401, text);
    }
    if (response.status === 403) {
      throw new CrmAuthError(`${request.provider} credentials lack the required permissions`, 403, text);
    }
    throw new CrmApiError(
      `${request.provider} API error: ${response.status} ${response.statusText}`,
      response.status,
      text,
    );
  }

  return { status: response.status, body: parseBody(request.provider, response.status, text) };
}

// ============================================================================
// Response narrowing helpers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/** Quote a value for a SOQL, OData or Klaviyo filter string literal. */
export function quoteLiteral(value: string, style: 'soql' | 'odata' | 'klaviyo'): string {
  switch (style) {
    case 'soql':
      return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    case 'odata':
      return `'${value.replace(/'/g, "''")}'`;
    case 'klaviyo':
      return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
  }
}
