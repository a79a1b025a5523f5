import { Test, TestingModule } from '@nestjs/testing';
import { ClientModule } from '../../src/client.module';
import { SessionClient } from '../../src/client/session-client.service';
import { ClientModuleOptions, ReconnectOptions } from '../../src/config/client-options';
import { LifecycleEvent, LifecycleEvents } from '../../src/events/lifecycle.events';
import { TRANSPORT_FACTORY } from '../../src/transport/transport.types';
import { FakeServer } from './fake-server';

export interface TestClient {
  moduleRef: TestingModule;
  client: SessionClient;
  server: FakeServer;
}

const FAST_RECONNECT: Partial<ReconnectOptions> = {
  initialDelayMs: 10,
  maxDelayMs: 50,
  backoffMultiplier: 2,
  jitterMs: 0,
};

/**
 * Boot the whole client module against a {@link FakeServer}. Reconnect
 * delays are shortened to milliseconds; `options` override anything.
 */
export async function createTestClient(options: ClientModuleOptions = {}, server = new FakeServer()): Promise<TestClient> {
  const { reconnect = true, ...rest } = options;
  const moduleRef = await Test.createTestingModule({
    imports: [
      ClientModule.forRoot({
        url: 'ws://fake.test',
        auth: { mode: 'none' },
        requestTimeoutMs: 1000,
        connectTimeoutMs: 500,
        keepaliveIntervalMs: 0,
        ...rest,
        reconnect: typeof reconnect === 'boolean' ? { ...FAST_RECONNECT, enabled: reconnect } : { ...FAST_RECONNECT, ...reconnect },
      }),
    ],
  })
    .overrideProvider(TRANSPORT_FACTORY)
    .useValue(server)
    .compile();

  moduleRef.useLogger(false);
  await moduleRef.init();
  return { moduleRef, client: moduleRef.get(SessionClient), server };
}

/** Poll until `predicate` holds. */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Resolve with the arguments of the next `event`. */
export function nextEvent<E extends LifecycleEvent>(
  client: SessionClient,
  event: E,
  timeoutMs = 1000,
): Promise<LifecycleEvents[E]> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      off();
      reject(new Error(`No ${event} event within ${timeoutMs}ms`));
    }, timeoutMs);
    const off = client.on(event, (...args) => {
      clearTimeout(timer);
      off();
      resolve(args);
    });
  });
}

/** Let pending promise callbacks and immediates run (works under fake timers that leave `setImmediate` alone). */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
