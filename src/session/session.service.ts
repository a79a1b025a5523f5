import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { CLIENT_OPTIONS, ClientOptions } from '../config/client-options';
import { ConnectionService } from '../connection/connection.service';
import { ConnectionState, WelcomeInfo } from '../connection/connection.types';
import {
  AuthError,
  AuthorizationError,
  DisconnectedError,
  ServerError,
  toError,
} from '../errors/client.errors';
import { LifecycleService } from '../events/lifecycle.service';
import { isRecord } from '../protocol/frame-codec.util';
import { RequestPayload } from '../protocol/frame.types';
import { RequestCorrelator } from '../requests/request-correlator.service';
import { ReadinessGate } from './readiness-gate';
import {
  AUTH_LOGIN,
  AUTH_LOGOUT,
  AuthState,
  IDENTITY_LOGIN,
  LOGIN_OPERATIONS,
  SessionInfo,
} from './session.types';

/**
 * Replays authentication after every welcome and decides when the session
 * is usable for application calls.
 *
 * A credential login's session token is cached and tried first on the next
 * connect, falling back to the configured credentials if the server no longer
 * accepts it. A server-issued revocation is advisory: the session is marked
 * invalid and calls other than logins are refused until a login succeeds, but
 * the connection is left alone.
 */
@Injectable()
export class SessionService implements OnModuleInit {
  private readonly logger = new Logger(SessionService.name);
  readonly readiness = new ReadinessGate();
  private authState: AuthState = 'anonymous';
  private snapshot: SessionInfo | null = null;
  private sessionToken: string | null = null;

  constructor(
    @Inject(CLIENT_OPTIONS) private readonly options: ClientOptions,
    private readonly requests: RequestCorrelator,
    private readonly connection: ConnectionService,
    private readonly lifecycle: LifecycleService,
  ) {}

  onModuleInit() {
    this.connection.listen({
      onSessionRevoked: (reason) => this.revoke(reason),
      onStateChange: (state) => this.followConnection(state),
    });
  }

  get state(): AuthState {
    return this.authState;
  }

  get session(): SessionInfo | null {
    return this.snapshot;
  }

  /**
   * Log in again after a welcome, if auth is configured and the server asks
   * for it. A failed login is reported on the `error` event and leaves the
   * connection up.
   *
   * @throws DisconnectedError if the connection is lost during the login.
   */
  async restore(welcome: WelcomeInfo): Promise<void> {
    if (this.options.auth.mode === 'none' || !welcome.requiresAuth) return;

    try {
      await this.login();
      this.logger.log('Automatic login succeeded');
    } catch (err) {
      if (err instanceof DisconnectedError) throw err;
      const failure = toError(err);
      this.logger.error(`Automatic login failed: ${failure.message}`);
      this.lifecycle.emit('error', failure);
    }
  }

  /**
   * Log in with the cached session token, else the configured token or
   * credentials.
   *
   * @throws AuthError if the server rejects the login or no auth is configured.
   */
  async login(): Promise<SessionInfo | null> {
    if (this.sessionToken !== null) {
      try {
        return this.accept(await this.send(AUTH_LOGIN, { token: this.sessionToken }));
      } catch (err) {
        if (!(err instanceof AuthError)) throw err;
        this.logger.warn(`Cached session token rejected, falling back to configured auth: ${err.message}`);
        this.sessionToken = null;
      }
    }

    const { auth } = this.options;
    switch (auth.mode) {
      case 'token':
        return this.accept(await this.send(AUTH_LOGIN, { token: auth.token }));

      case 'credentials': {
        const result = await this.send(IDENTITY_LOGIN, { username: auth.username, password: auth.password });
        if (isRecord(result) && typeof result.token === 'string') this.sessionToken = result.token;
        return this.accept(result);
      }

      case 'none':
        throw new AuthError('No authentication configured');
    }
  }

  async logout(): Promise<void> {
    await this.requests.send(AUTH_LOGOUT, {});
    this.reset();
  }

  /** Refuse everything but logins while the session stands revoked. */
  assertAuthorized(operation: string): void {
    if (this.authState === 'revoked' && !LOGIN_OPERATIONS.has(operation)) {
      throw new AuthorizationError(`Session was revoked; ${operation} requires a fresh login`);
    }
  }

  /** Forget everything about the session (explicit disconnect, logout). */
  reset(): void {
    this.authState = 'anonymous';
    this.snapshot = null;
    this.sessionToken = null;
  }

  private revoke(reason: string) {
    this.authState = 'revoked';
    this.snapshot = null;
    this.sessionToken = null;
    this.lifecycle.emit('session_revoked', reason);
  }

  private followConnection(state: ConnectionState) {
    if (state === 'disconnected') {
      this.readiness.close(new DisconnectedError('Client is disconnected'));
    } else if (state === 'connecting' || state === 'reconnecting') {
      this.readiness.hold();
    }
    // `connected` keeps holding until login and subscriptions are replayed
  }

  private async send(operation: string, payload: RequestPayload): Promise<unknown> {
    try {
      return await this.requests.send(operation, payload);
    } catch (err) {
      if (err instanceof ServerError) {
        throw new AuthError(`Login rejected: ${err.message}`, { code: err.code, details: err.details });
      }
      throw err;
    }
  }

  private accept(result: unknown): SessionInfo | null {
    this.authState = 'authenticated';
    this.snapshot = parseSession(result);
    return this.snapshot;
  }
}

/** Accepts `{ userId, roles, expiresAt? }`, optionally nested under `user`. */
function parseSession(result: unknown): SessionInfo | null {
  if (!isRecord(result)) return null;
  const source = isRecord(result.user) ? { ...result.user, ...result } : result;
  const userId = typeof source.userId === 'string' ? source.userId : typeof source.id === 'string' ? source.id : null;
  if (userId === null) return null;

  const roles = Array.isArray(source.roles)
    ? source.roles.filter((role): role is string => typeof role === 'string')
    : [];
  const session: SessionInfo = { userId, roles };
  if (typeof source.expiresAt === 'number') session.expiresAt = source.expiresAt;
  return session;
}
