import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLIENT_OPTIONS, ClientOptions } from '../config/client-options';
import {
  ConnectError,
  DisconnectedError,
  ProtocolError,
  describeError,
} from '../errors/client.errors';
import { LifecycleService } from '../events/lifecycle.service';
import { decodeFrame, encodePong } from '../protocol/frame-codec.util';
import { TRANSPORT_FACTORY, Transport, TransportFactory, TransportHandlers } from '../transport/transport.types';
import { ConnectionHandle } from './connection-handle';
import {
  ConnectionListener,
  ConnectionState,
  NON_RETRYABLE_CLOSE_CODES,
  WelcomeInfo,
} from './connection.types';

/**
 * Handshake of the connection being opened. `ws` can deliver the welcome in
 * the same read as the upgrade response, before the transport's open settles,
 * so the outcome is recorded here and picked up by {@link ConnectionService.awaitWelcome}.
 */
interface Handshake {
  welcome: WelcomeInfo | null;
  failure: Error | null;
  notify: (() => void) | null;
}

/**
 * Owns the single physical connection to the server.
 *
 * Drives the welcome handshake, answers heartbeat pings, decodes every
 * inbound frame and routes it to the registered listeners (responses to the
 * request correlator, push-updates to the subscription registry). It is the
 * only component that mutates the connection state or the transport
 * reference; everyone else sees the read-only {@link ConnectionHandle}.
 *
 * Reconnect attempts are not started here: on unexpected loss the state moves
 * to `reconnecting` and the `onDrop` listeners decide what happens next.
 */
@Injectable()
export class ConnectionService {
  private readonly logger = new Logger(ConnectionService.name);
  private readonly listeners = new Set<ConnectionListener>();
  private currentState: ConnectionState = 'disconnected';
  private transport: Transport | null = null;
  private handle: ConnectionHandle | null = null;
  private handshake: Handshake | null = null;
  /** Bumped for every physical connection; events from older ones are ignored */
  private generation = 0;
  /** Server revoked the session on the current transport */
  private revoked = false;

  constructor(
    @Inject(CLIENT_OPTIONS) private readonly options: ClientOptions,
    @Inject(TRANSPORT_FACTORY) private readonly transports: TransportFactory,
    private readonly lifecycle: LifecycleService,
  ) {}

  get state(): ConnectionState {
    return this.currentState;
  }

  get welcome(): WelcomeInfo | null {
    return this.handle?.welcome ?? null;
  }

  /** Handle for the current connection, or `null` when none is usable. */
  current(): ConnectionHandle | null {
    return this.handle?.isValid ? this.handle : null;
  }

  listen(listener: ConnectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Open a new physical connection and wait for the server's welcome.
   *
   * Moves to `connecting` (or stays in `reconnecting` during a reconnect
   * attempt) and to `connected` once the welcome arrives. Both the transport
   * handshake and the wait for the welcome are bounded by `connectTimeoutMs`.
   *
   * @throws ConnectError if the transport fails, closes, or no welcome arrives in time.
   * @throws DisconnectedError if {@link close} is called while the attempt is in flight.
   */
  async open(): Promise<WelcomeInfo> {
    if (this.transport) {
      this.discardTransport(1000, 'Superseded by a new connection');
    }

    const generation = ++this.generation;
    this.revoked = false;
    if (this.currentState !== 'reconnecting') this.setState('connecting');

    const { url, connectTimeoutMs } = this.options;
    this.logger.log(`Connecting to ${url}…`);

    const handshake: Handshake = { welcome: null, failure: null, notify: null };
    this.handshake = handshake;
    try {
      let transport: Transport;
      try {
        transport = await this.transports.open(url, this.createHandlers(generation), connectTimeoutMs);
      } catch (err) {
        if (generation !== this.generation) throw new DisconnectedError('Connect aborted by disconnect');
        throw new ConnectError(`Failed to open ${url}: ${describeError(err)}`);
      }

      if (generation !== this.generation) {
        transport.close(1000, 'Connect aborted');
        throw new DisconnectedError('Connect aborted by disconnect');
      }
      this.transport = transport;

      let welcome: WelcomeInfo;
      try {
        welcome = await this.awaitWelcome(handshake, connectTimeoutMs);
      } catch (err) {
        if (generation === this.generation) this.discardTransport(1000, 'Handshake failed');
        throw err;
      }

      this.handle = new ConnectionHandle(generation, welcome, transport);
      this.setState('connected');
      this.logger.log(`Connected (server ${welcome.version || 'unknown version'}, auth ${welcome.requiresAuth ? 'required' : 'not required'})`);
      return welcome;
    } finally {
      if (this.handshake === handshake) this.handshake = null;
    }
  }

  /**
   * Explicitly close the connection and move to `disconnected`. Aborts an
   * in-flight {@link open}. No drop listeners run.
   */
  close(reason = 'Client disconnect'): void {
    this.generation++;
    if (this.handshake) this.failHandshake(this.handshake, new DisconnectedError('Connect aborted by disconnect'));
    this.discardTransport(1000, reason);
    this.setState('disconnected');
  }

  /** Used by the reconnect loop when the initial connect fails. */
  markReconnecting(): void {
    this.setState('reconnecting');
  }

  /** Used by the reconnect loop once it gives up. */
  markDisconnected(): void {
    this.discardTransport(1000, 'Giving up');
    this.setState('disconnected');
  }

  /** Resolves at once if the welcome (or a failure) was recorded before the transport opened. */
  private awaitWelcome(handshake: Handshake, timeoutMs: number): Promise<WelcomeInfo> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        handshake.notify = null;
        reject(new ConnectError(`Timeout waiting for welcome message after ${timeoutMs}ms`));
      }, timeoutMs);

      handshake.notify = () => {
        if (handshake.failure) reject(handshake.failure);
        else if (handshake.welcome) resolve(handshake.welcome);
        else return;
        clearTimeout(timer);
        handshake.notify = null;
      };
      handshake.notify();
    });
  }

  private failHandshake(handshake: Handshake, err: Error) {
    if (handshake.failure) return;
    handshake.failure = err;
    handshake.notify?.();
  }

  private createHandlers(generation: number): TransportHandlers {
    return {
      onMessage: (data) => {
        if (generation === this.generation) this.handleMessage(data);
      },
      onClose: (code, reason) => {
        if (generation === this.generation) this.handleClose(code, reason);
      },
      onError: (err) => {
        if (generation !== this.generation) return;
        this.logger.error(`Transport error: ${err.message}`);
        this.lifecycle.emit('error', err);
      },
    };
  }

  /**
   * Route one inbound frame.
   *
   * - `welcome` completes the handshake.
   * - `ping` is answered with a `pong` when heartbeat is enabled.
   * - Responses and push-updates go to the registered listeners.
   * - `session_revoked` is advisory: listeners are told, the connection stays up.
   * - Anything malformed is reported as a protocol error.
   */
  private handleMessage(data: string) {
    const frame = decodeFrame(data);

    switch (frame.kind) {
      case 'welcome': {
        const handshake = this.handshake;
        if (handshake && !handshake.welcome && !handshake.failure) {
          handshake.welcome = {
            version: frame.version,
            serverTime: frame.serverTime,
            requiresAuth: frame.requiresAuth,
          };
          handshake.notify?.();
        } else {
          this.logger.warn('Ignoring unexpected welcome on an established connection');
        }
        return;
      }

      case 'ping':
        if (this.options.heartbeat) this.sendRaw(encodePong(frame.timestamp));
        return;

      case 'result':
      case 'error':
        for (const listener of this.listeners) listener.onResponse?.(frame);
        return;

      case 'push':
        for (const listener of this.listeners) listener.onPush?.(frame);
        return;

      case 'session_revoked':
        this.revoked = true;
        this.logger.warn(`Session revoked by server: ${frame.reason}`);
        for (const listener of this.listeners) listener.onSessionRevoked?.(frame.reason);
        return;

      case 'malformed':
        this.logger.warn(`Malformed frame: ${frame.reason}`);
        this.lifecycle.emit('error', new ProtocolError(frame.reason, frame.raw));
        return;
    }
  }

  private handleClose(code: number, reason: string) {
    if (this.handshake) {
      this.transport = null;
      this.failHandshake(this.handshake, new ConnectError(`Connection closed before welcome: ${code} ${reason}`.trim()));
      return;
    }

    // Closed on purpose, already handled
    if (!this.transport) return;

    this.logger.warn(`Connection closed: ${code} ${reason}`);
    this.transport = null;
    this.handle?.invalidate();
    this.handle = null;

    const willReconnect = this.shouldReconnect(code);
    this.setState(willReconnect ? 'reconnecting' : 'disconnected');

    const info = { code, reason, willReconnect };
    for (const listener of this.listeners) listener.onDrop?.(info);
  }

  private shouldReconnect(code: number): boolean {
    const { reconnect } = this.options;
    if (!reconnect.enabled) return false;
    if (NON_RETRYABLE_CLOSE_CODES.has(code)) return false;
    if (this.revoked && !reconnect.retryAfterRevoke) return false;
    return true;
  }

  private sendRaw(frame: string) {
    if (!this.transport?.isOpen) return;
    try {
      this.transport.send(frame);
    } catch (err) {
      this.logger.warn(`Failed to send control frame: ${describeError(err)}`);
    }
  }

  private discardTransport(code: number, reason: string) {
    const transport = this.transport;
    this.transport = null;
    this.handle?.invalidate();
    this.handle = null;
    if (!transport) return;
    try {
      transport.close(code, reason);
    } catch (err) {
      this.logger.warn(`Failed to close transport: ${describeError(err)}`);
    }
  }

  private setState(next: ConnectionState) {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    for (const listener of this.listeners) listener.onStateChange?.(next, previous);
  }
}
