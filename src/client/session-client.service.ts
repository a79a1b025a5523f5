import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { CLIENT_OPTIONS, ClientOptions, MAX_TIMER_MS } from '../config/client-options';
import { ConnectionService } from '../connection/connection.service';
import { ConnectionState, WelcomeInfo } from '../connection/connection.types';
import { ClientError, DisconnectedError, describeError, toError } from '../errors/client.errors';
import { LifecycleEvent, LifecycleEvents } from '../events/lifecycle.events';
import { LifecycleService } from '../events/lifecycle.service';
import { RequestPayload } from '../protocol/frame.types';
import { ReconnectService } from '../reconnect/reconnect.service';
import { RequestCorrelator } from '../requests/request-correlator.service';
import { SessionService } from '../session/session.service';
import { SessionInfo } from '../session/session.types';
import { SubscriptionsService } from '../subscriptions/subscriptions.service';
import { STORE_CHANNEL } from '../subscriptions/subscription-channels';
import {
  SubscriptionCallback,
  SubscriptionChannel,
  SubscriptionHandle,
  SubscriptionParams,
} from '../subscriptions/subscriptions.types';

/**
 * Entry point for applications: one logical session with the server that
 * survives any number of physical reconnects.
 *
 * Calls made while the client is connecting or reconnecting wait until the
 * session is ready (bounded by their own timeout); calls made while
 * disconnected fail at once with `DisconnectedError`.
 */
@Injectable()
export class SessionClient implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionClient.name);
  private connecting: Promise<WelcomeInfo> | null = null;

  constructor(
    @Inject(CLIENT_OPTIONS) private readonly options: ClientOptions,
    private readonly connection: ConnectionService,
    private readonly requests: RequestCorrelator,
    private readonly subscriptions: SubscriptionsService,
    private readonly session: SessionService,
    private readonly reconnect: ReconnectService,
    private readonly lifecycle: LifecycleService,
  ) {}

  onModuleInit() {
    this.connection.listen({
      onDrop: ({ code, reason, willReconnect }) => {
        if (willReconnect) return;
        this.lifecycle.emit('disconnected', reason || `Connection closed with code ${code}`);
      },
    });
  }

  onModuleDestroy() {
    this.disconnect('Client shutting down');
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  get isConnected(): boolean {
    return this.connection.state === 'connected';
  }

  get welcome(): WelcomeInfo | null {
    return this.connection.welcome;
  }

  get currentSession(): SessionInfo | null {
    return this.session.session;
  }

  /**
   * Connect, log in if configured, and resolve with the server's welcome.
   *
   * Concurrent calls share one attempt. If the first attempt fails and
   * reconnect is enabled, the client keeps retrying and this resolves once a
   * connection is established.
   *
   * @throws ConnectError if the attempt fails and reconnect is disabled.
   * @throws DisconnectedError if {@link disconnect} is called meanwhile or retries run out.
   */
  connect(): Promise<WelcomeInfo> {
    const welcome = this.connection.welcome;
    if (this.connection.state === 'connected' && welcome && this.session.readiness.isReady) {
      return Promise.resolve(welcome);
    }
    if (this.connecting) return this.connecting;
    if (this.reconnect.isRunning) return this.reconnect.recover('reconnect');

    const attempt = this.establish().finally(() => {
      if (this.connecting === attempt) this.connecting = null;
    });
    this.connecting = attempt;
    return attempt;
  }

  /**
   * Tear the session down. Synchronous: the reconnect loop is cancelled,
   * pending requests are rejected and subscriptions are forgotten before
   * this returns.
   */
  disconnect(reason = 'Client disconnect'): void {
    const wasActive = this.connection.state !== 'disconnected';

    this.reconnect.cancel();
    this.requests.rejectAll(new DisconnectedError('Client disconnecting'));
    this.subscriptions.clear();
    this.connection.close(reason);
    this.session.reset();
    this.connecting = null;

    if (wasActive) {
      this.logger.log(`Disconnected: ${reason}`);
      this.lifecycle.emit('disconnected', reason);
    }
  }

  /**
   * Send one request and resolve with the server's result data.
   *
   * Waits for the session to be ready first when the client is connecting
   * or reconnecting; the wait counts against `timeoutMs`.
   *
   * @throws ClientError `INVALID_TIMEOUT` unless `0 < timeoutMs <= MAX_TIMER_MS`.
   * @throws AuthorizationError if the session was revoked (logins excepted).
   * @throws DisconnectedError, RequestTimeoutError or ServerError from the exchange.
   */
  async invoke(operation: string, payload: RequestPayload = {}, timeoutMs = this.options.requestTimeoutMs): Promise<unknown> {
    if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMER_MS)) {
      throw new ClientError('INVALID_TIMEOUT', `Timeout for ${operation} must be within 1..${MAX_TIMER_MS}ms, got ${timeoutMs}`);
    }
    this.session.assertAuthorized(operation);
    const startedAt = Date.now();
    await this.session.readiness.wait(timeoutMs, operation);
    const remaining = Math.max(timeoutMs - (Date.now() - startedAt), 1);
    return this.requests.send(operation, payload, remaining);
  }

  /**
   * Subscribe to a server query. The callback gets the initial data (when the
   * server returns any) before this resolves, then every push-update, and
   * fresh data once after each reconnect.
   */
  async subscribe(
    query: string,
    params: SubscriptionParams | undefined,
    callback: SubscriptionCallback,
    channel: SubscriptionChannel = STORE_CHANNEL,
  ): Promise<SubscriptionHandle> {
    const operation = channel.subscribeOperation;
    this.session.assertAuthorized(operation);
    await this.session.readiness.wait(this.options.requestTimeoutMs, operation);
    return this.subscriptions.subscribe(query, params, callback, channel);
  }

  /** @returns `true` if the subscription existed. */
  unsubscribe(handle: string | SubscriptionHandle): boolean {
    return this.subscriptions.unsubscribe(typeof handle === 'string' ? handle : handle.id);
  }

  /** Log in with the configured auth (cached session token first). */
  login(): Promise<SessionInfo | null> {
    return this.session.login();
  }

  logout(): Promise<void> {
    return this.session.logout();
  }

  on<E extends LifecycleEvent>(event: E, handler: (...args: LifecycleEvents[E]) => void): () => void {
    return this.lifecycle.on(event, handler);
  }

  private async establish(): Promise<WelcomeInfo> {
    let welcome: WelcomeInfo;
    try {
      welcome = await this.connection.open();
    } catch (err) {
      if (err instanceof DisconnectedError || !this.options.reconnect.enabled) {
        if (this.connection.state === 'connecting') this.connection.markDisconnected();
        throw err;
      }
      this.logger.warn(`Initial connect failed, retrying: ${describeError(err)}`);
      this.lifecycle.emit('error', toError(err));
      this.connection.markReconnecting();
      return this.reconnect.recover('initial');
    }

    try {
      await this.session.restore(welcome);
      await this.subscriptions.resync();
    } catch (err) {
      if (this.connection.state !== 'reconnecting') throw err;
    }

    if (this.connection.state === 'reconnecting') {
      // Lost again while logging in; the reconnect loop already took over
      return this.reconnect.recover('reconnect');
    }
    if (this.connection.state !== 'connected') {
      throw new DisconnectedError('Connection closed while establishing the session');
    }

    this.session.readiness.open();
    this.lifecycle.emit('connected');
    this.lifecycle.emit('welcome', welcome);
    return welcome;
  }
}
