import { RequestPayload } from '../protocol/frame.types';

export type SubscriptionParams = Record<string, unknown>;
export type SubscriptionCallback = (data: unknown) => void;

/** Which pair of server operations a subscription goes through, and how its payload looks. */
export interface SubscriptionChannel {
  readonly name: string;
  readonly subscribeOperation: string;
  readonly unsubscribeOperation: string;
  buildPayload(query: string, params?: SubscriptionParams): RequestPayload;
}

/** A single reactive subscription, surviving reconnects */
export interface Subscription {
  /** Client-local handle returned to the caller */
  handle: string;
  /** Query name (or pattern / view name, depending on the channel) */
  query: string;
  /** Original params, re-sent on every resubscribe */
  params: SubscriptionParams | undefined;
  channel: SubscriptionChannel;
  callback: SubscriptionCallback;
  /** Server-assigned id; valid for one physical connection only */
  serverId: string | null;
  /** Promise for in-flight resubscribe */
  pendingPromise: Promise<void> | null;
  /** Flag for unsubscribe while a resubscribe is in flight */
  cancelled: boolean;
}

export interface SubscriptionHandle {
  readonly id: string;
  /** Remove locally at once; the server-side cancellation is best effort. */
  unsubscribe(): boolean;
}
