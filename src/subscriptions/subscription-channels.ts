import { SubscriptionChannel } from './subscriptions.types';

/** Reactive store queries: pushes carry the query's fresh result set. */
export const STORE_CHANNEL: SubscriptionChannel = {
  name: 'store',
  subscribeOperation: 'store.subscribe',
  unsubscribeOperation: 'store.unsubscribe',
  buildPayload: (query, params) => (params === undefined ? { query } : { query, params }),
};

/** Rules events matching a topic pattern; `query` is the pattern. */
export const RULES_CHANNEL: SubscriptionChannel = {
  name: 'rules',
  subscribeOperation: 'rules.subscribe',
  unsubscribeOperation: 'rules.unsubscribe',
  buildPayload: (pattern) => ({ pattern }),
};

/** Derived logic views; `query` is the view name. */
export const LOGIC_VIEW_CHANNEL: SubscriptionChannel = {
  name: 'logic',
  subscribeOperation: 'logic.subscribeView',
  unsubscribeOperation: 'logic.unsubscribeView',
  buildPayload: (name) => ({ name }),
};
