import type { Mock } from 'vitest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createClientFromConfig } from './client.factory';

vi.mock('@services/logger', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
}));

const state = vi.hoisted(() => ({
  getBaseUrl: vi.fn(),
  getCredentials: vi.fn(),
}));

vi.mock('@services/configuration/configuration', () => ({
  getConfig: () => ({ getBaseUrl: state.getBaseUrl, getCredentials: state.getCredentials }),
}));

const getBaseUrlMock: Mock = state.getBaseUrl;
const getCredentialsMock: Mock = state.getCredentials;

const jsonResponse = (body: unknown) =>
  ({
    status: 200,
    headers: { get: () => 'application/json' },
    text: () => Promise.resolve(JSON.stringify(body)),
  }) as unknown as Response;

describe('createClientFromConfig', () => {
  beforeEach(() => {
    getBaseUrlMock.mockReturnValue('https://sandbox.example.test');
  });

  it('should target the configured host', async () => {
    getCredentialsMock.mockReturnValue(undefined);
    const fetchSpy = vi.spyOn(global, 'fetch').mockResolvedValue(jsonResponse([]));

    await createClientFromConfig().getActiveMarkets();

    expect(fetchSpy).toHaveBeenCalledWith('https://sandbox.example.test/v3/markets', expect.anything());
  });

  it('should authenticate with the configured credentials', async () => {
    getCredentialsMock.mockReturnValue({ key: 'test-key', secret: Buffer.from('test-secret') });
    const fetchSpy = vi.spyOn(global, 'fetch').mockResolvedValue(jsonResponse([]));

    await createClientFromConfig().getBalances();

    expect(fetchSpy.mock.calls[0]?.[1]?.headers).toMatchObject({ 'BM-AUTH-APIKEY': 'test-key' });
  });

  it('should build an unauthenticated client without credentials', async () => {
    getCredentialsMock.mockReturnValue(undefined);

    await expect(createClientFromConfig().getBalances()).rejects.toThrow('[SIGNER] api_key or api_secret not set.');
  });
});
