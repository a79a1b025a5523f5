import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { CLIENT_OPTIONS, ClientOptions } from '../config/client-options';
import { ConnectionService } from '../connection/connection.service';
import { WelcomeInfo } from '../connection/connection.types';
import {
  ConnectError,
  DisconnectedError,
  ReconnectAttemptError,
  describeError,
  toError,
} from '../errors/client.errors';
import { LifecycleService } from '../events/lifecycle.service';
import { SessionService } from '../session/session.service';
import { SubscriptionsService } from '../subscriptions/subscriptions.service';
import { abortableDelay, computeBackoffDelay } from './backoff.util';

/** `initial` when the very first connect failed, `reconnect` after losing an established connection. */
export type RecoveryMode = 'initial' | 'reconnect';

/**
 * Brings the connection back after an unexpected loss.
 *
 * Runs at most one retry loop at a time. Each attempt waits out its backoff
 * delay, opens a new connection, replays the login and every subscription,
 * and only then reopens the session for application calls. A connection lost
 * while replaying counts as a failed attempt.
 */
@Injectable()
export class ReconnectService implements OnModuleInit {
  private readonly logger = new Logger(ReconnectService.name);
  private running: Promise<WelcomeInfo> | null = null;
  private controller: AbortController | null = null;

  constructor(
    @Inject(CLIENT_OPTIONS) private readonly options: ClientOptions,
    private readonly connection: ConnectionService,
    private readonly session: SessionService,
    private readonly subscriptions: SubscriptionsService,
    private readonly lifecycle: LifecycleService,
  ) {}

  onModuleInit() {
    this.connection.listen({
      onDrop: ({ willReconnect }) => {
        if (!willReconnect) return;
        this.recover('reconnect').catch((err) => this.logger.warn(`Reconnect loop ended: ${describeError(err)}`));
      },
    });
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Start the retry loop, or join the one already running.
   *
   * @returns the welcome of the connection that was finally established.
   * @throws DisconnectedError if the loop is cancelled or runs out of attempts.
   */
  recover(mode: RecoveryMode): Promise<WelcomeInfo> {
    if (this.running) return this.running;

    const controller = new AbortController();
    const running = this.run(mode, controller.signal).finally(() => {
      if (this.controller === controller) {
        this.controller = null;
        this.running = null;
      }
    });
    this.controller = controller;
    this.running = running;
    return running;
  }

  /** Stop the loop at once, even in the middle of a delay. */
  cancel(): void {
    if (!this.controller) return;
    this.logger.log('Reconnect cancelled');
    this.controller.abort();
    this.controller = null;
    this.running = null;
  }

  private async run(mode: RecoveryMode, signal: AbortSignal): Promise<WelcomeInfo> {
    const { reconnect } = this.options;
    let attempt = 0;

    for (;;) {
      if (signal.aborted) throw new DisconnectedError('Reconnect cancelled');

      const delay = computeBackoffDelay(attempt, reconnect);
      if (delay === null) {
        this.logger.error(`Giving up after ${attempt} reconnect attempt(s)`);
        this.connection.markDisconnected();
        this.lifecycle.emit('disconnected', 'Max reconnect attempts reached');
        throw new DisconnectedError('Max reconnect attempts reached');
      }

      this.logger.log(`Reconnecting in ${Math.round(delay)}ms (attempt ${attempt + 1})`);
      this.lifecycle.emit('reconnecting', attempt + 1);
      await abortableDelay(delay, signal);
      if (signal.aborted) throw new DisconnectedError('Reconnect cancelled');

      try {
        const welcome = await this.connection.open();
        await this.session.restore(welcome);
        await this.subscriptions.resync();
        if (this.connection.state !== 'connected') {
          throw new ConnectError('Connection lost while restoring the session');
        }
        if (signal.aborted) throw new DisconnectedError('Reconnect cancelled');

        this.session.readiness.open();
        this.logger.log(`Reconnected after ${attempt + 1} attempt(s)`);
        this.lifecycle.emit('connected');
        if (mode === 'reconnect') this.lifecycle.emit('reconnected');
        this.lifecycle.emit('welcome', welcome);
        return welcome;
      } catch (err) {
        if (signal.aborted) throw new DisconnectedError('Reconnect cancelled');
        // Closed for good (e.g. a non-retryable close code) while replaying
        if (this.connection.state === 'disconnected') throw toError(err);

        attempt++;
        const failure = new ReconnectAttemptError(attempt, err);
        this.logger.warn(failure.message);
        this.lifecycle.emit('error', failure);
      }
    }
  }
}
