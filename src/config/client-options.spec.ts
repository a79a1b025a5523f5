import { ConfigError } from '../errors/client.errors';
import { authFromEnv, resolveClientOptions } from './client-options';
import { readEnvConfig } from './env.config';

describe('readEnvConfig', () => {
  it('falls back to defaults for everything unset', () => {
    expect(readEnvConfig({})).toEqual({
      SESSION_SERVER_URL: 'ws://127.0.0.1:4000',
      SESSION_AUTH_TOKEN: '',
      SESSION_AUTH_USERNAME: '',
      SESSION_AUTH_PASSWORD: '',
      SESSION_RECONNECT: true,
      SESSION_RECONNECT_MAX_RETRIES: Infinity,
      SESSION_RECONNECT_INITIAL_DELAY_MS: 1000,
      SESSION_RECONNECT_MAX_DELAY_MS: 30000,
      SESSION_RECONNECT_MULTIPLIER: 2,
      SESSION_RECONNECT_JITTER_MS: 500,
      SESSION_REQUEST_TIMEOUT_MS: 10000,
      SESSION_CONNECT_TIMEOUT_MS: 5000,
      SESSION_HEARTBEAT: true,
      SESSION_KEEPALIVE_INTERVAL_MS: 30000,
    });
  });

  it('parses numbers and switches', () => {
    const env = readEnvConfig({
      SESSION_RECONNECT: 'false',
      SESSION_RECONNECT_MAX_RETRIES: '3',
      SESSION_RECONNECT_MULTIPLIER: '1.5',
      SESSION_HEARTBEAT: 'false',
    });

    expect(env.SESSION_RECONNECT).toBe(false);
    expect(env.SESSION_RECONNECT_MAX_RETRIES).toBe(3);
    expect(env.SESSION_RECONNECT_MULTIPLIER).toBe(1.5);
    expect(env.SESSION_HEARTBEAT).toBe(false);
  });
});

describe('authFromEnv', () => {
  it('prefers the token over credentials', () => {
    const env = readEnvConfig({
      SESSION_AUTH_TOKEN: 'test-token',
      SESSION_AUTH_USERNAME: 'alice',
      SESSION_AUTH_PASSWORD: 'test-password',
    });
    expect(authFromEnv(env)).toEqual({ mode: 'token', token: 'test-token' });
  });

  it('uses credentials when only a username is set', () => {
    const env = readEnvConfig({ SESSION_AUTH_USERNAME: 'alice', SESSION_AUTH_PASSWORD: 'test-password' });
    expect(authFromEnv(env)).toEqual({ mode: 'credentials', username: 'alice', password: 'test-password' });
  });

  it('defaults to no auth', () => {
    expect(authFromEnv(readEnvConfig({}))).toEqual({ mode: 'none' });
  });
});

describe('resolveClientOptions', () => {
  const env = readEnvConfig({});

  it('lets overrides win over the environment', () => {
    const options = resolveClientOptions(env, { url: 'ws://example.test', requestTimeoutMs: 250 });

    expect(options.url).toBe('ws://example.test');
    expect(options.requestTimeoutMs).toBe(250);
    expect(options.connectTimeoutMs).toBe(5000);
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('switches reconnect with a boolean', () => {
    const options = resolveClientOptions(env, { reconnect: false });

    expect(options.reconnect).toEqual({
      enabled: false,
      maxRetries: Infinity,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      backoffMultiplier: 2,
      jitterMs: 500,
      retryAfterRevoke: false,
    });
  });

  it('enables reconnect when given reconnect settings', () => {
    const options = resolveClientOptions(readEnvConfig({ SESSION_RECONNECT: 'false' }), { reconnect: { maxRetries: 2 } });

    expect(options.reconnect.enabled).toBe(true);
    expect(options.reconnect.maxRetries).toBe(2);
    expect(options.reconnect.initialDelayMs).toBe(1000);
  });

  it.each([
    [{ url: '' }, 'Server URL must not be empty'],
    [{ requestTimeoutMs: 0 }, 'requestTimeoutMs must be a positive number, got 0'],
    [{ connectTimeoutMs: -1 }, 'connectTimeoutMs must be a positive number, got -1'],
    [{ requestTimeoutMs: 2_147_483_648 }, 'requestTimeoutMs must not exceed 2147483647ms, got 2147483648'],
    [{ reconnect: { maxDelayMs: 3_000_000_000 } }, 'reconnect.maxDelayMs must not exceed 2147483647ms, got 3000000000'],
    [{ reconnect: { jitterMs: -5 } }, 'reconnect.jitterMs must be a non-negative number, got -5'],
    [{ reconnect: { maxRetries: -1 } }, 'reconnect.maxRetries must be >= 0 or Infinity, got -1'],
    [{ reconnect: { backoffMultiplier: 0.5 } }, 'reconnect.backoffMultiplier must be >= 1, got 0.5'],
  ])('rejects %j', (overrides, message) => {
    expect(() => resolveClientOptions(env, overrides)).toThrow(new ConfigError(message));
  });
});
