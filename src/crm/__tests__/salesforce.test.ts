// ============================================================================
// Tests: Salesforce Provider
// ============================================================================

import { describe, test, expect, vi, beforeEach } from 'vitest';

vi.mock('../config.js', () => ({
  crmConfig: {
    requestTimeoutMs: 5000,
    klaviyo: { baseUrl: 'https://klaviyo.test/api', revision: '2025-10-15' },
    salesforce: { apiVersion: 'v60.0' },
    creatio: { odataPath: '/0/odata' },
  },
}));

import { SalesforceProvider } from '../providers/salesforce.js';
import { CrmApiError, CrmAuthError } from '../errors.js';
import { jsonResponse } from './fixtures/index.js';

const mockFetch = vi.fn();
const provider = new SalesforceProvider();

const tokenCredentials = { accessToken: 'test-token', instanceUrl: 'https://example.my.salesforce.com/' };
const API = 'https://example.my.salesforce.com/services/data/v60.0';

function queryUrl(soql: string): string {
  return `${API}/query?q=${encodeURIComponent(soql)}`;
}

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

describe('authentication', () => {
  test('uses a supplied access token as a bearer token', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, {}));

    await expect(provider.validateCredentials(tokenCredentials)).resolves.toBe(true);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(`${API}/limits`);
    expect(init.headers.Authorization).toBe('Bearer test-token');
  });

  test('exchanges username and password for a session', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse(200, { access_token: 'session-token', instance_url: 'https://other.my.salesforce.com' }),
      )
      .mockResolvedValueOnce(jsonResponse(200, {}));

    await provider.validateCredentials({
      username: 'user@example.com',
      password: 'test-password',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      securityToken: 'TOKEN',
    });

    const [tokenUrl, tokenInit] = mockFetch.mock.calls[0];
    expect(tokenUrl).toBe('https://login.salesforce.com/services/oauth2/token');
    const form = new URLSearchParams(tokenInit.body);
    expect(form.get('grant_type')).toBe('password');
    expect(form.get('client_id')).toBe('test-client');
    expect(form.get('password')).toBe('test-passwordTOKEN');

    const [limitsUrl, limitsInit] = mockFetch.mock.calls[1];
    expect(limitsUrl).toBe('https://other.my.salesforce.com/services/data/v60.0/limits');
    expect(limitsInit.headers.Authorization).toBe('Bearer session-token');
  });

  test('maps a rejected password grant to CrmAuthError', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(400, { error: 'invalid_grant' }, 'Bad Request'));

    const attempt = provider.validateCredentials({
      username: 'user@example.com',
      password: 'wrong',
      clientId: 'test-client',
      clientSecret: 'test-secret',
    });

    await expect(attempt).rejects.toThrow(new CrmAuthError('Salesforce authentication failed', 400));
  });

  test('rejects credentials matching neither shape', async () => {
    await expect(provider.validateCredentials({ username: 'only' })).rejects.toBeInstanceOf(CrmAuthError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('upsertContact', () => {
  const payload = { Email: 'a@b.com', LastName: 'Lee', lead_score__c: 85 };

  test('patches the contact matched by email', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { records: [{ Id: '003A' }] }))
      .mockResolvedValueOnce(jsonResponse(204));

    const result = await provider.upsertContact(tokenCredentials, payload);

    expect(result).toEqual({
      statusCode: 204,
      entityId: '003A',
      record: { Id: '003A', created: false, ...payload },
    });
    expect(mockFetch.mock.calls[0][0]).toBe(queryUrl("SELECT Id FROM Contact WHERE Email = 'a@b.com' LIMIT 1"));
    const [patchUrl, patchInit] = mockFetch.mock.calls[1];
    expect(patchUrl).toBe(`${API}/sobjects/Contact/003A`);
    expect(patchInit.method).toBe('PATCH');
    expect(JSON.parse(patchInit.body)).toEqual(payload);
  });

  test('creates the contact when none matches', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { records: [] }))
      .mockResolvedValueOnce(jsonResponse(201, { id: '003B', success: true }));

    const result = await provider.upsertContact(tokenCredentials, payload);

    expect(result).toEqual({
      statusCode: 201,
      entityId: '003B',
      record: { Id: '003B', created: true, ...payload },
    });
    const [postUrl, postInit] = mockFetch.mock.calls[1];
    expect(postUrl).toBe(`${API}/sobjects/Contact`);
    expect(postInit.method).toBe('POST');
  });

  test('escapes quotes in the email lookup', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { records: [] }))
      .mockResolvedValueOnce(jsonResponse(201, { id: '003C' }));

    await provider.upsertContact(tokenCredentials, { Email: "o'brien@b.com", LastName: 'OBrien' });

    expect(mockFetch.mock.calls[0][0]).toBe(
      queryUrl("SELECT Id FROM Contact WHERE Email = 'o\\'brien@b.com' LIMIT 1"),
    );
  });
});

describe('sendEvent', () => {
  const event = {
    name: 'Demo Booked',
    properties: { source: 'web' },
    timestamp: '2026-03-01T15:30:00.000Z',
    value: 5,
  };

  test('logs a completed task on the matched contact', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { records: [{ Id: '003A' }] }))
      .mockResolvedValueOnce(jsonResponse(201, { id: '00T1' }));

    const result = await provider.sendEvent(tokenCredentials, { email: 'a@b.com' }, event);

    const task = {
      WhoId: '003A',
      Subject: 'Demo Booked',
      Description: '{"source":"web","value":5}',
      Status: 'Completed',
      Priority: 'Normal',
      ActivityDate: '2026-03-01',
    };
    expect(result).toEqual({ statusCode: 201, entityId: '00T1', record: { Id: '00T1', ...task } });
    const [url, init] = mockFetch.mock.calls[1];
    expect(url).toBe(`${API}/sobjects/Task`);
    expect(JSON.parse(init.body)).toEqual(task);
  });

  test('uses a native id without a lookup', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(201, { id: '00T2' }));

    await provider.sendEvent(tokenCredentials, { id: '003Z' }, event);

    expect(mockFetch).toHaveBeenCalledOnce();
    expect(JSON.parse(mockFetch.mock.calls[0][1].body).WhoId).toBe('003Z');
  });

  test('fails when no contact matches', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { records: [] }));

    await expect(provider.sendEvent(tokenCredentials, { email: 'nobody@b.com' }, event)).rejects.toThrow(
      new CrmApiError('Contact not found', 404, ''),
    );
    expect(mockFetch).toHaveBeenCalledOnce();
  });
});

describe('getContact', () => {
  test('returns null for an unknown id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(404, [], 'Not Found'));
    await expect(provider.getContact(tokenCredentials, { id: '003X' })).resolves.toBeNull();
  });

  test('queries by phone when no email is given', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { records: [{ Id: '003A', Phone: '5551234567' }] }));

    const contact = await provider.getContact(tokenCredentials, { phone: '5551234567' });

    expect(contact).toEqual({ Id: '003A', Phone: '5551234567' });
    expect(mockFetch.mock.calls[0][0]).toBe(
      queryUrl("SELECT Id, Email, FirstName, LastName, Phone, Title FROM Contact WHERE Phone = '5551234567' LIMIT 1"),
    );
  });
});
