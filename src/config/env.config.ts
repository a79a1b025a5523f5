import { registerAs } from '@nestjs/config';

export interface EnvConfig {
  SESSION_SERVER_URL: string;
  SESSION_AUTH_TOKEN: string;
  SESSION_AUTH_USERNAME: string;
  SESSION_AUTH_PASSWORD: string;
  SESSION_RECONNECT: boolean;
  SESSION_RECONNECT_MAX_RETRIES: number;
  SESSION_RECONNECT_INITIAL_DELAY_MS: number;
  SESSION_RECONNECT_MAX_DELAY_MS: number;
  SESSION_RECONNECT_MULTIPLIER: number;
  SESSION_RECONNECT_JITTER_MS: number;
  SESSION_REQUEST_TIMEOUT_MS: number;
  SESSION_CONNECT_TIMEOUT_MS: number;
  SESSION_HEARTBEAT: boolean;
  SESSION_KEEPALIVE_INTERVAL_MS: number;
}

export function readEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  return {
    SESSION_SERVER_URL: env.SESSION_SERVER_URL ?? 'ws://127.0.0.1:4000',
    SESSION_AUTH_TOKEN: env.SESSION_AUTH_TOKEN ?? '',
    SESSION_AUTH_USERNAME: env.SESSION_AUTH_USERNAME ?? '',
    SESSION_AUTH_PASSWORD: env.SESSION_AUTH_PASSWORD ?? '',
    SESSION_RECONNECT: env.SESSION_RECONNECT !== 'false',
    // "Infinity" keeps retrying until disconnect() is called
    SESSION_RECONNECT_MAX_RETRIES: Number(env.SESSION_RECONNECT_MAX_RETRIES ?? 'Infinity'),
    SESSION_RECONNECT_INITIAL_DELAY_MS: parseInt(env.SESSION_RECONNECT_INITIAL_DELAY_MS ?? '1000', 10),
    SESSION_RECONNECT_MAX_DELAY_MS: parseInt(env.SESSION_RECONNECT_MAX_DELAY_MS ?? '30000', 10),
    SESSION_RECONNECT_MULTIPLIER: parseFloat(env.SESSION_RECONNECT_MULTIPLIER ?? '2'),
    SESSION_RECONNECT_JITTER_MS: parseInt(env.SESSION_RECONNECT_JITTER_MS ?? '500', 10),
    SESSION_REQUEST_TIMEOUT_MS: parseInt(env.SESSION_REQUEST_TIMEOUT_MS ?? '10000', 10),
    SESSION_CONNECT_TIMEOUT_MS: parseInt(env.SESSION_CONNECT_TIMEOUT_MS ?? '5000', 10),
    SESSION_HEARTBEAT: env.SESSION_HEARTBEAT !== 'false',
    SESSION_KEEPALIVE_INTERVAL_MS: parseInt(env.SESSION_KEEPALIVE_INTERVAL_MS ?? '30000', 10),
  };
}

export default registerAs('session', (): EnvConfig => readEnvConfig(process.env));
