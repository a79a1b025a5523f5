import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ConnectionService } from '../connection/connection.service';
import { ClientError, ProtocolError, ServerError, describeError } from '../errors/client.errors';
import { LifecycleService } from '../events/lifecycle.service';
import { isRecord } from '../protocol/frame-codec.util';
import { PushFrame } from '../protocol/frame.types';
import { RequestCorrelator } from '../requests/request-correlator.service';
import { STORE_CHANNEL } from './subscription-channels';
import {
  Subscription,
  SubscriptionCallback,
  SubscriptionChannel,
  SubscriptionHandle,
  SubscriptionParams,
} from './subscriptions.types';

interface SubscribeResult {
  subscriptionId: string;
  hasData: boolean;
  data: unknown;
}

/**
 * Registry of reactive subscriptions for the logical session.
 *
 * Responsibilities:
 * - Creating server subscriptions and tracking the mapping between the
 *   client-local handle (given to callers) and the server's id (valid for one
 *   physical connection only).
 * - Invoking the registered callback for every push-update, synchronously and
 *   in transport order.
 * - Re-subscribing every surviving subscription after a reconnect and
 *   delivering the fresh data to the existing callback once.
 */
@Injectable()
export class SubscriptionsService implements OnModuleInit {
  private readonly logger = new Logger(SubscriptionsService.name);

  /** client handle → subscription */
  private readonly subs = new Map<string, Subscription>();
  /** server sub ID → client handle (for push dispatch) */
  private readonly serverIdToHandle = new Map<string, string>();

  constructor(
    private readonly requests: RequestCorrelator,
    private readonly connection: ConnectionService,
    private readonly lifecycle: LifecycleService,
  ) {}

  onModuleInit() {
    this.connection.listen({
      onPush: (frame) => this.handlePush(frame),
      onDrop: () => this.detachAll(),
    });
  }

  get count(): number {
    return this.subs.size;
  }

  /**
   * Subscribe to a server query and register `callback` for its updates.
   *
   * The initial result set, when the server returns one, is delivered to the
   * callback before this resolves. If that first delivery throws, the
   * subscription is dropped again and the error is rethrown.
   */
  async subscribe(
    query: string,
    params: SubscriptionParams | undefined,
    callback: SubscriptionCallback,
    channel: SubscriptionChannel = STORE_CHANNEL,
  ): Promise<SubscriptionHandle> {
    const raw = await this.requests.send(channel.subscribeOperation, channel.buildPayload(query, params));
    const result = parseSubscribeResult(raw);

    const sub: Subscription = {
      handle: `sub_${randomUUID().replace(/-/g, '').slice(0, 12)}`,
      query,
      params,
      channel,
      callback,
      serverId: result.subscriptionId,
      pendingPromise: null,
      cancelled: false,
    };
    this.subs.set(sub.handle, sub);
    this.serverIdToHandle.set(result.subscriptionId, sub.handle);
    this.logger.log(`Subscribed: ${channel.name}/${query} → server id ${result.subscriptionId}`);

    if (result.hasData) {
      try {
        sub.callback(result.data);
      } catch (err) {
        this.unsubscribe(sub.handle);
        throw err;
      }
    }

    return { id: sub.handle, unsubscribe: () => this.unsubscribe(sub.handle) };
  }

  /**
   * Remove a subscription by its client handle.
   *
   * Removal is local and immediate; the server-side cancellation is sent in
   * the background and its failure is only logged. If a resubscribe is in
   * flight, it is marked `cancelled` and cleaned up when it answers.
   *
   * @returns `true` if the subscription existed.
   */
  unsubscribe(handle: string): boolean {
    const sub = this.subs.get(handle);
    if (!sub) return false;

    this.subs.delete(handle);
    sub.cancelled = true;

    // Resubscribe in flight; its .then() cancels on the server
    if (sub.pendingPromise) return true;

    if (sub.serverId != null) {
      this.serverIdToHandle.delete(sub.serverId);
      this.cancelRemote(sub.channel, sub.serverId);
    }
    return true;
  }

  /**
   * Dispatch a push-update to the owning subscription's callback.
   *
   * Pushes for unknown or stale server ids are dropped. A throwing callback is
   * logged and does not affect other subscriptions.
   */
  handlePush(frame: PushFrame) {
    const handle = this.serverIdToHandle.get(frame.subscriptionId);
    if (!handle) {
      this.logger.debug(`Dropping push for unknown subscription ${frame.subscriptionId}`);
      return;
    }

    const sub = this.subs.get(handle);
    if (!sub) return;

    this.deliver(sub, frame.data);
  }

  /**
   * Re-subscribe every surviving subscription after a reconnect.
   *
   * Old server ids are stale and discarded first. All subscriptions are
   * re-sent concurrently; one failing never holds up the others. A
   * subscription the server refuses is removed and reported on the `error`
   * event. One that fails because the connection went away is kept for the
   * next resync.
   */
  async resync(): Promise<void> {
    this.serverIdToHandle.clear();
    const entries = [...this.subs.values()];
    if (entries.length === 0) return;

    this.logger.log(`Re-subscribing ${entries.length} subscription(s)…`);
    await Promise.allSettled(entries.map((sub) => this.resubscribe(sub)));
  }

  /** Forget every subscription; nothing is kept for replay. */
  clear(): void {
    for (const sub of this.subs.values()) {
      sub.cancelled = true;
    }
    this.subs.clear();
    this.serverIdToHandle.clear();
  }

  private resubscribe(sub: Subscription): Promise<void> {
    sub.serverId = null;

    const promise = this.requests
      .send(sub.channel.subscribeOperation, sub.channel.buildPayload(sub.query, sub.params))
      .then((raw) => {
        const result = parseSubscribeResult(raw);
        sub.pendingPromise = null;
        if (sub.cancelled) {
          this.logger.log(
            `Re-subscribe resolved but was cancelled, sending immediate unsubscribe: ${sub.query} → ${result.subscriptionId}`,
          );
          this.cancelRemote(sub.channel, result.subscriptionId);
          return;
        }
        sub.serverId = result.subscriptionId;
        this.serverIdToHandle.set(result.subscriptionId, sub.handle);
        this.logger.log(`Re-subscribed: ${sub.channel.name}/${sub.query} → ${result.subscriptionId}`);
        if (result.hasData) this.deliver(sub, result.data);
      })
      .catch((err: unknown) => {
        sub.pendingPromise = null;
        if (sub.cancelled) return;
        if (!(err instanceof ServerError || err instanceof ProtocolError)) {
          this.logger.warn(`Re-subscribe of ${sub.channel.name}/${sub.query} interrupted, kept for replay: ${describeError(err)}`);
          return;
        }
        this.logger.error(`Re-subscribe failed for ${sub.channel.name}/${sub.query}: ${describeError(err)}`);
        this.subs.delete(sub.handle);
        this.lifecycle.emit(
          'error',
          new ClientError('RESUBSCRIBE_FAILED', `Subscription ${sub.handle} (${sub.query}) was dropped: ${describeError(err)}`, {
            handle: sub.handle,
            query: sub.query,
          }),
        );
      });

    sub.pendingPromise = promise;
    return promise;
  }

  private deliver(sub: Subscription, data: unknown) {
    try {
      sub.callback(data);
    } catch (err) {
      this.logger.error(`Subscription ${sub.handle} callback error: ${describeError(err)}`);
    }
  }

  /** Server ids die with the physical connection. */
  private detachAll() {
    this.serverIdToHandle.clear();
    for (const sub of this.subs.values()) {
      sub.serverId = null;
    }
  }

  private cancelRemote(channel: SubscriptionChannel, serverId: string) {
    if (!this.connection.current()) return;
    this.requests
      .send(channel.unsubscribeOperation, { subscriptionId: serverId })
      .then(() => this.logger.log(`Unsubscribed: ${channel.unsubscribeOperation}(${serverId})`))
      .catch((err) => this.logger.warn(`Server unsubscribe failed: ${describeError(err)}`));
  }
}

function parseSubscribeResult(value: unknown): SubscribeResult {
  if (!isRecord(value) || typeof value.subscriptionId !== 'string') {
    throw new ProtocolError('Subscribe response without a subscriptionId');
  }
  return {
    subscriptionId: value.subscriptionId,
    hasData: 'data' in value,
    data: value.data,
  };
}
