import { describe, test, expect, vi, beforeEach } from 'vitest';
import { CrmAuthError, ProviderNotRegisteredError } from '../../crm/errors.js';
import { ProviderManager } from '../../crm/manager.js';
import { createFakeProvider } from '../../crm/__tests__/fixtures/index.js';
import type { FakeProvider } from '../../crm/__tests__/fixtures/index.js';
import { FieldMappingError } from '../../mapping/errors.js';
import { CredentialVault } from '../../vault/credential-vault.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { IntegrationService, requireCrmType } from '../service.js';
import { InMemoryIntegrationRepository, InMemorySyncLogRepository } from './fixtures/in-memory.js';

const OWNER = 'owner-1';
const klaviyoCredentials = { apiKey: 'pk_test-secret' };

let integrations: InMemoryIntegrationRepository;
let syncLogs: InMemorySyncLogRepository;
let klaviyo: FakeProvider;
let salesforce: FakeProvider;
let vault: CredentialVault;
let service: IntegrationService;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  integrations = new InMemoryIntegrationRepository();
  syncLogs = new InMemorySyncLogRepository();
  klaviyo = createFakeProvider('klaviyo');
  salesforce = createFakeProvider('salesforce');
  vault = new CredentialVault(Buffer.alloc(32, 7));
  service = new IntegrationService({
    integrations,
    syncLogs,
    providers: new ProviderManager([klaviyo, salesforce]),
    vault,
  });
});

describe('connect', () => {
  test('validates, encrypts and stores the integration', async () => {
    const view = await service.connect(OWNER, {
      crmType: 'klaviyo',
      credentials: klaviyoCredentials,
      settings: { enabledEvents: ['Signed Up'] },
    });

    expect(view).toEqual({
      id: 'int-1',
      crmType: 'klaviyo',
      displayName: 'Klaviyo',
      settings: {
        syncFrequency: 'real-time',
        enabledEvents: ['Signed Up'],
        selectedFields: [],
        leadQuality: null,
        extra: {},
      },
      isActive: true,
      syncStatus: 'connected',
      syncError: null,
      lastSyncAt: null,
      createdAt: '2026-01-01T00:00:01.000Z',
      updatedAt: '2026-01-01T00:00:01.000Z',
      credentialHint: '••••cret',
    });
    expect(klaviyo.validateCredentials).toHaveBeenCalledWith(klaviyoCredentials);

    const stored = integrations.rows.get('int-1');
    expect(stored?.encryptedCredentials.startsWith('v1.')).toBe(true);
    expect(stored?.encryptedCredentials).not.toContain('pk_test-secret');
    expect(vault.decrypt(stored?.encryptedCredentials ?? '')).toEqual(klaviyoCredentials);
  });

  test('stores nothing when validation fails', async () => {
    klaviyo.validateCredentials.mockRejectedValueOnce(new CrmAuthError('Invalid Klaviyo credentials'));

    await expect(
      service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials }),
    ).rejects.toBeInstanceOf(CrmAuthError);
    expect(integrations.rows.size).toBe(0);
  });

  test('rejects CRM types the registry does not know', async () => {
    await expect(service.connect(OWNER, { crmType: 'myspace', credentials: {} })).rejects.toThrow(
      new FieldMappingError("CRM type 'myspace' is not supported", 'crmType', 'myspace'),
    );
  });

  test('rejects mapped CRM types without an adapter', async () => {
    await expect(service.connect(OWNER, { crmType: 'hubspot', credentials: {} })).rejects.toBeInstanceOf(
      ProviderNotRegisteredError,
    );
  });

  test('rejects a second connect for the same CRM', async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });

    await expect(
      service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials }),
    ).rejects.toThrow(new ConflictError('klaviyo is already connected'));
    expect(klaviyo.validateCredentials).toHaveBeenCalledOnce();
  });

  test('allows the same CRM for different owners', async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });
    await service.connect('owner-2', { crmType: 'klaviyo', credentials: klaviyoCredentials });
    expect(integrations.rows.size).toBe(2);
  });
});

describe('update', () => {
  beforeEach(async () => {
    await service.connect(OWNER, {
      crmType: 'klaviyo',
      credentials: klaviyoCredentials,
      settings: { enabledEvents: ['Signed Up'] },
    });
    klaviyo.validateCredentials.mockClear();
  });

  test('merges settings without revalidating', async () => {
    const view = await service.update(OWNER, 'klaviyo', { settings: { leadQuality: 'hot' } });

    expect(view.settings.enabledEvents).toEqual(['Signed Up']);
    expect(view.settings.leadQuality).toBe('hot');
    expect(klaviyo.validateCredentials).not.toHaveBeenCalled();
  });

  test('validates and re-encrypts replacement credentials', async () => {
    const view = await service.update(OWNER, 'klaviyo', { credentials: { apiKey: 'pk_test-rotated' } });

    expect(klaviyo.validateCredentials).toHaveBeenCalledWith({ apiKey: 'pk_test-rotated' });
    expect(view.credentialHint).toBe('••••ated');
    expect(vault.decrypt(integrations.rows.get('int-1')?.encryptedCredentials ?? '')).toEqual({
      apiKey: 'pk_test-rotated',
    });
  });

  test('keeps the old credentials when the replacement is rejected', async () => {
    const before = integrations.rows.get('int-1')?.encryptedCredentials;
    klaviyo.validateCredentials.mockRejectedValueOnce(new CrmAuthError('Invalid Klaviyo credentials'));

    await expect(
      service.update(OWNER, 'klaviyo', { credentials: { apiKey: 'pk_test-wrong' } }),
    ).rejects.toBeInstanceOf(CrmAuthError);
    expect(integrations.rows.get('int-1')?.encryptedCredentials).toBe(before);
  });

  test('reports a missing integration', async () => {
    await expect(service.update(OWNER, 'salesforce', { settings: {} })).rejects.toThrow(
      new NotFoundError('No salesforce integration found'),
    );
  });
});

describe('disconnect and reconnect', () => {
  beforeEach(async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });
    klaviyo.validateCredentials.mockClear();
  });

  test('retires the integration without deleting it', async () => {
    const result = await service.disconnect(OWNER, 'klaviyo');

    expect(result).toEqual({
      integrationId: 'int-1',
      crmType: 'klaviyo',
      disconnectedAt: '2026-01-01T00:00:02.000Z',
    });
    expect(integrations.rows.get('int-1')).toMatchObject({ isActive: false, syncStatus: 'disconnected' });

    const listed = await service.list(OWNER);
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ id: 'int-1', isActive: false, syncStatus: 'disconnected' });
  });

  test('rejects a second disconnect', async () => {
    await service.disconnect(OWNER, 'klaviyo');
    await expect(service.disconnect(OWNER, 'klaviyo')).rejects.toThrow(
      new NotFoundError('No active klaviyo integration found'),
    );
  });

  test('leaves a retired row untouched on a second disconnect', async () => {
    await service.disconnect(OWNER, 'klaviyo');
    const deactivate = vi.spyOn(integrations, 'deactivate');

    await expect(service.disconnect(OWNER, 'klaviyo')).rejects.toBeInstanceOf(NotFoundError);
    expect(deactivate).not.toHaveBeenCalled();
  });

  test('rejects disconnecting a CRM that was never connected', async () => {
    await expect(service.disconnect(OWNER, 'salesforce')).rejects.toThrow(
      new NotFoundError('No salesforce integration found'),
    );
  });

  test('rejects plain updates and connects on a retired integration', async () => {
    await service.disconnect(OWNER, 'klaviyo');

    await expect(service.update(OWNER, 'klaviyo', { settings: {} })).rejects.toThrow(
      'klaviyo integration is disconnected; pass reconnect: true to restore it',
    );
    await expect(
      service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials }),
    ).rejects.toBeInstanceOf(ConflictError);
  });

  test('reconnects with the stored credentials after validating them', async () => {
    await service.disconnect(OWNER, 'klaviyo');

    const view = await service.update(OWNER, 'klaviyo', { reconnect: true });

    expect(klaviyo.validateCredentials).toHaveBeenCalledWith(klaviyoCredentials);
    expect(view).toMatchObject({ id: 'int-1', isActive: true, syncStatus: 'connected', syncError: null });
  });
});

describe('requireCrmType', () => {
  test('returns known CRM types', () => {
    expect(requireCrmType('hubspot')).toBe('hubspot');
  });

  test('rejects names outside the registry', () => {
    expect(() => requireCrmType('myspace')).toThrow("CRM type 'myspace' is not supported");
    expect(() => requireCrmType('constructor')).toThrow(FieldMappingError);
  });
});

describe('status and list', () => {
  test('returns null for an absent integration', async () => {
    await expect(service.status(OWNER, 'klaviyo')).resolves.toBeNull();
  });

  test('lists only the owner\'s integrations, newest first', async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });
    await service.connect('owner-2', { crmType: 'klaviyo', credentials: klaviyoCredentials });
    await service.connect(OWNER, {
      crmType: 'salesforce',
      credentials: { accessToken: 'test-access-token', instanceUrl: 'https://example.my.salesforce.com' },
    });

    const views = await service.list(OWNER);

    expect(views.map((view) => view.crmType)).toEqual(['salesforce', 'klaviyo']);
    expect(views[0].credentialHint).toBe('••••oken');
  });

  test('shows no hint when stored credentials cannot be decrypted', async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });
    const row = integrations.rows.get('int-1');
    if (!row) throw new Error('missing row');
    integrations.rows.set('int-1', { ...row, encryptedCredentials: 'garbage' });

    const view = await service.status(OWNER, 'klaviyo');

    expect(view?.credentialHint).toBeNull();
  });
});

describe('listSyncLogs', () => {
  test('requires an integration', async () => {
    await expect(service.listSyncLogs(OWNER, 'klaviyo')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('returns recent entries newest first within the clamped limit', async () => {
    await service.connect(OWNER, { crmType: 'klaviyo', credentials: klaviyoCredentials });
    for (const entityId of ['a@b.com', 'c@d.com']) {
      await syncLogs.createPending({
        integrationId: 'int-1',
        ownerId: OWNER,
        crmType: 'klaviyo',
        operationType: 'create_contact',
        entityType: 'contact',
        entityId,
        requestPayload: {},
      });
    }

    const latest = await service.listSyncLogs(OWNER, 'klaviyo', 0);

    expect(latest).toHaveLength(1);
    expect(latest[0].entityId).toBe('c@d.com');
  });
});
