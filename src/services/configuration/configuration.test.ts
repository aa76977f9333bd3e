import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const state = vi.hoisted(() => ({ readFileSync: vi.fn() }));

vi.mock('node:fs', () => ({ readFileSync: state.readFileSync }));

vi.mock('@services/logger', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
}));

const loadConfiguration = async () => (await import('./configuration')).getConfig();

describe('Configuration service', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', '');
    vi.stubEnv('BTCM_BASE_URL', '');
    vi.stubEnv('BTCM_API_KEY', '');
    vi.stubEnv('BTCM_API_SECRET', '');
    vi.stubEnv('BTCM_API_SECRET_ENCODING', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the public host without credentials when nothing is configured', async () => {
    const config = await loadConfiguration();

    expect(config.getBaseUrl()).toBe('https://api.btcmarkets.net');
    expect(config.getCredentials()).toBeUndefined();
    expect(state.readFileSync).not.toHaveBeenCalled();
  });

  it('loads JSON5 configuration files', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.json5');
    state.readFileSync.mockReturnValue(`{
      // comments are allowed
      credentials: { key: 'test-key', secret: 'test-secret' },
    }`);

    const config = await loadConfiguration();

    expect(state.readFileSync).toHaveBeenCalledWith('./config/client.json5', 'utf8');
    expect(config.getCredentials()).toEqual({ key: 'test-key', secret: Buffer.from('test-secret') });
  });

  it('loads YAML configuration files and decodes base64 secrets', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.yml');
    state.readFileSync.mockReturnValue(
      [
        'baseUrl: https://sandbox.example.test',
        'credentials:',
        '  key: test-key',
        '  secret: dGVzdC1zZWNyZXQ=',
        '  secretEncoding: base64',
      ].join('\n'),
    );

    const config = await loadConfiguration();

    expect(config.getBaseUrl()).toBe('https://sandbox.example.test');
    expect(config.getCredentials()?.secret.toString('utf8')).toBe('test-secret');
  });

  it('lets environment variables override the configuration file', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.json');
    vi.stubEnv('BTCM_API_KEY', 'env-key');
    state.readFileSync.mockReturnValue('{ "credentials": { "key": "file-key", "secret": "file-secret" } }');

    const config = await loadConfiguration();

    expect(config.getCredentials()).toEqual({ key: 'env-key', secret: Buffer.from('file-secret') });
  });

  it('lets the secret encoding alone override the configuration file', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.json');
    vi.stubEnv('BTCM_API_SECRET_ENCODING', 'base64');
    state.readFileSync.mockReturnValue('{ "credentials": { "key": "file-key", "secret": "dGVzdC1zZWNyZXQ=" } }');

    const config = await loadConfiguration();

    expect(config.getCredentials()).toEqual({ key: 'file-key', secret: Buffer.from('test-secret') });
  });

  it('loads the configuration once and reuses it', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.json');
    state.readFileSync.mockReturnValue('{}');
    const { getConfig } = await import('./configuration');

    expect(getConfig()).toBe(getConfig());
    expect(state.readFileSync).toHaveBeenCalledTimes(1);
  });

  it('does not read anything until the configuration is requested', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.json');

    await import('./configuration');

    expect(state.readFileSync).not.toHaveBeenCalled();
  });

  it('reads credentials from the environment alone', async () => {
    vi.stubEnv('BTCM_API_KEY', 'env-key');
    vi.stubEnv('BTCM_API_SECRET', 'env-secret');

    const config = await loadConfiguration();

    expect(config.getCredentials()).toEqual({ key: 'env-key', secret: Buffer.from('env-secret') });
  });

  it.each`
    scenario                      | env                                          | message
    ${'an invalid base url'}      | ${{ BTCM_BASE_URL: 'not-a-url' }}            | ${'[CONFIGURATION] Malformed configuration: baseUrl: '}
    ${'a key without its secret'} | ${{ BTCM_API_KEY: 'env-key' }}               | ${'[CONFIGURATION] Malformed configuration: credentials.secret: '}
    ${'an unknown encoding'}      | ${{ BTCM_API_KEY: 'k', BTCM_API_SECRET: 's', BTCM_API_SECRET_ENCODING: 'hex' }} | ${'credentials.secretEncoding: '}
  `('rejects $scenario', async ({ env, message }) => {
    for (const [name, value] of Object.entries<string>(env)) vi.stubEnv(name, value);

    await expect(loadConfiguration()).rejects.toThrow(message);
  });

  it('rejects unsupported configuration file extensions', async () => {
    vi.stubEnv('BTCM_CONFIG_FILE_PATH', './config/client.txt');

    await expect(loadConfiguration()).rejects.toThrow(
      '[CONFIGURATION] Malformed configuration: unsupported file extension for ./config/client.txt',
    );
  });
});
