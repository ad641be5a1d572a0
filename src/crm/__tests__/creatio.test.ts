// ============================================================================
// Tests: Creatio Provider
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

import { CreatioProvider } from '../providers/creatio.js';
import { CrmApiError, CrmAuthError } from '../errors.js';
import { jsonResponse } from './fixtures/index.js';

const mockFetch = vi.fn();
const provider = new CreatioProvider();

const credentials = { instanceUrl: 'https://creatio.test/', username: 'user', password: 'test-password' };
const ODATA = 'https://creatio.test/0/odata';

function searchUrl(filter: string, select = '&$select=Id'): string {
  return `${ODATA}/Contact?$filter=${encodeURIComponent(filter)}&$top=1${select}`;
}

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
});

describe('validateCredentials', () => {
  test('reads one system setting with basic auth', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { value: [] }));

    await expect(provider.validateCredentials(credentials)).resolves.toBe(true);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(`${ODATA}/SysSettings?$top=1`);
    expect(init.headers.Authorization).toBe(`Basic ${Buffer.from('user:test-password').toString('base64')}`);
  });

  test('names the missing credential fields', async () => {
    await expect(provider.validateCredentials({ instanceUrl: 'https://creatio.test' })).rejects.toThrow(
      new CrmAuthError('Missing or invalid Creatio credentials: username, password', 400),
    );
  });
});

describe('upsertContact', () => {
  const payload = { Email: 'a@b.com', GivenName: 'Ann', Surname: 'Lee' };

  test('creates a contact with a composed Name', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { value: [] }))
      .mockResolvedValueOnce(jsonResponse(201, { Id: 'c-1', Email: 'a@b.com' }));

    const result = await provider.upsertContact(credentials, payload);

    expect(result).toEqual({ statusCode: 201, entityId: 'c-1', record: { created: true, Id: 'c-1', Email: 'a@b.com' } });
    expect(mockFetch.mock.calls[0][0]).toBe(searchUrl("Email eq 'a@b.com'"));
    const [postUrl, postInit] = mockFetch.mock.calls[1];
    expect(postUrl).toBe(`${ODATA}/Contact`);
    expect(JSON.parse(postInit.body)).toEqual({ ...payload, Name: 'Ann Lee' });
  });

  test('patches the contact matched by email', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { value: [{ Id: 'c-9' }] }))
      .mockResolvedValueOnce(jsonResponse(204));

    const result = await provider.upsertContact(credentials, { Email: 'a@b.com' });

    expect(result).toEqual({
      statusCode: 204,
      entityId: 'c-9',
      record: { Id: 'c-9', created: false, Email: 'a@b.com', Name: 'a@b.com' },
    });
    const [patchUrl, patchInit] = mockFetch.mock.calls[1];
    expect(patchUrl).toBe(`${ODATA}/Contact(c-9)`);
    expect(patchInit.method).toBe('PATCH');
  });
});

describe('sendEvent', () => {
  const event = { name: 'Webinar Attended', properties: {}, timestamp: '2026-03-01T15:30:00.000Z' };

  test('creates an activity linked to the contact', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, { value: [{ Id: 'c-9' }] }))
      .mockResolvedValueOnce(jsonResponse(201, { Id: 'act-1' }));

    const result = await provider.sendEvent(credentials, { email: 'a@b.com' }, event);

    expect(result).toEqual({ statusCode: 201, entityId: 'act-1', record: { Id: 'act-1' } });
    const [url, init] = mockFetch.mock.calls[1];
    expect(url).toBe(`${ODATA}/Activity`);
    expect(JSON.parse(init.body)).toEqual({
      ContactId: 'c-9',
      Title: 'Webinar Attended',
      Notes: '{}',
      StartDate: '2026-03-01T15:30:00.000Z',
      DueDate: '2026-03-01T15:30:00.000Z',
    });
  });

  test('searches by mobile phone when only a phone is given', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { value: [] }));

    await expect(provider.sendEvent(credentials, { phone: '5551234567' }, event)).rejects.toThrow(
      new CrmApiError('Contact not found', 404, ''),
    );
    expect(mockFetch.mock.calls[0][0]).toBe(searchUrl("MobilePhone eq '5551234567'"));
  });
});

describe('getContact', () => {
  test('returns the first match without a $select', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { value: [{ Id: 'c-9', Email: 'a@b.com' }] }));

    await expect(provider.getContact(credentials, { email: 'a@b.com' })).resolves.toEqual({
      Id: 'c-9',
      Email: 'a@b.com',
    });
    expect(mockFetch.mock.calls[0][0]).toBe(searchUrl("Email eq 'a@b.com'", ''));
  });

  test('encodes the id inside the key segment', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(404, { error: 'missing' }, 'Not Found'));

    await expect(provider.getContact(credentials, { id: "c-9)/Account('1" })).resolves.toBeNull();
    expect(mockFetch.mock.calls[0][0]).toBe(`${ODATA}/Contact(c-9%29%2FAccount%28%271)`);
  });
});
