import { ConfigError } from '../errors/client.errors';
import { EnvConfig } from './env.config';

/** Injection token for the resolved, immutable {@link ClientOptions}. */
export const CLIENT_OPTIONS = Symbol('CLIENT_OPTIONS');

/** Longest delay `setTimeout` honours; larger values fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

export type AuthOptions =
  | { mode: 'none' }
  | { mode: 'token'; token: string }
  | { mode: 'credentials'; username: string; password: string };

export interface ReconnectOptions {
  enabled: boolean;
  /** Attempts before giving up; `Infinity` retries until `disconnect()` */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Upper bound of the uniform random delay added to every backoff step */
  jitterMs: number;
  /** Keep reconnecting after the server revoked the session on that connection */
  retryAfterRevoke: boolean;
}

export interface ClientOptions {
  url: string;
  auth: AuthOptions;
  reconnect: ReconnectOptions;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  /** Answer server `ping` frames with `pong` */
  heartbeat: boolean;
  /** Transport-level ping interval, 0 disables */
  keepaliveIntervalMs: number;
}

/** Programmatic overrides accepted by `ClientModule.forRoot()`; anything left out comes from the environment. */
export interface ClientModuleOptions {
  url?: string;
  auth?: AuthOptions;
  reconnect?: boolean | Partial<ReconnectOptions>;
  requestTimeoutMs?: number;
  connectTimeoutMs?: number;
  heartbeat?: boolean;
  keepaliveIntervalMs?: number;
}

export function resolveClientOptions(env: EnvConfig, overrides: ClientModuleOptions = {}): ClientOptions {
  const fromEnv: ReconnectOptions = {
    enabled: env.SESSION_RECONNECT,
    maxRetries: env.SESSION_RECONNECT_MAX_RETRIES,
    initialDelayMs: env.SESSION_RECONNECT_INITIAL_DELAY_MS,
    maxDelayMs: env.SESSION_RECONNECT_MAX_DELAY_MS,
    backoffMultiplier: env.SESSION_RECONNECT_MULTIPLIER,
    jitterMs: env.SESSION_RECONNECT_JITTER_MS,
    retryAfterRevoke: false,
  };

  // An explicit reconnect object implies reconnect is wanted
  let reconnect = fromEnv;
  if (typeof overrides.reconnect === 'boolean') {
    reconnect = { ...fromEnv, enabled: overrides.reconnect };
  } else if (overrides.reconnect) {
    reconnect = { ...fromEnv, enabled: true, ...overrides.reconnect };
  }

  const options: ClientOptions = {
    url: overrides.url ?? env.SESSION_SERVER_URL,
    auth: overrides.auth ?? authFromEnv(env),
    reconnect,
    requestTimeoutMs: overrides.requestTimeoutMs ?? env.SESSION_REQUEST_TIMEOUT_MS,
    connectTimeoutMs: overrides.connectTimeoutMs ?? env.SESSION_CONNECT_TIMEOUT_MS,
    heartbeat: overrides.heartbeat ?? env.SESSION_HEARTBEAT,
    keepaliveIntervalMs: overrides.keepaliveIntervalMs ?? env.SESSION_KEEPALIVE_INTERVAL_MS,
  };

  validateClientOptions(options);
  return Object.freeze(options);
}

/** Token auth wins when both a token and credentials are configured. */
export function authFromEnv(env: EnvConfig): AuthOptions {
  if (env.SESSION_AUTH_TOKEN) return { mode: 'token', token: env.SESSION_AUTH_TOKEN };
  if (env.SESSION_AUTH_USERNAME) {
    return {
      mode: 'credentials',
      username: env.SESSION_AUTH_USERNAME,
      password: env.SESSION_AUTH_PASSWORD,
    };
  }
  return { mode: 'none' };
}

function validateClientOptions(options: ClientOptions) {
  if (!options.url) throw new ConfigError('Server URL must not be empty');

  const positive: Array<[string, number]> = [
    ['requestTimeoutMs', options.requestTimeoutMs],
    ['connectTimeoutMs', options.connectTimeoutMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${name} must be a positive number, got ${value}`);
    }
    if (value > MAX_TIMER_MS) {
      throw new ConfigError(`${name} must not exceed ${MAX_TIMER_MS}ms, got ${value}`);
    }
  }

  const { reconnect } = options;
  const nonNegative: Array<[string, number]> = [
    ['reconnect.initialDelayMs', reconnect.initialDelayMs],
    ['reconnect.maxDelayMs', reconnect.maxDelayMs],
    ['reconnect.jitterMs', reconnect.jitterMs],
    ['keepaliveIntervalMs', options.keepaliveIntervalMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${name} must be a non-negative number, got ${value}`);
    }
    if (value > MAX_TIMER_MS) {
      throw new ConfigError(`${name} must not exceed ${MAX_TIMER_MS}ms, got ${value}`);
    }
  }

  if (Number.isNaN(reconnect.maxRetries) || reconnect.maxRetries < 0) {
    throw new ConfigError(`reconnect.maxRetries must be >= 0 or Infinity, got ${reconnect.maxRetries}`);
  }
  if (!Number.isFinite(reconnect.backoffMultiplier) || reconnect.backoffMultiplier < 1) {
    throw new ConfigError(`reconnect.backoffMultiplier must be >= 1, got ${reconnect.backoffMultiplier}`);
  }
}
