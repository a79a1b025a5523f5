import 'reflect-metadata';

export { ClientModule } from './client.module';
export { SessionClient } from './client/session-client.service';
export type {
  AuthOptions,
  ClientModuleOptions,
  ClientOptions,
  ReconnectOptions,
} from './config/client-options';
export type { ConnectionState, WelcomeInfo } from './connection/connection.types';
export * from './errors/client.errors';
export type { LifecycleEvent, LifecycleEvents } from './events/lifecycle.events';
export { lifecycleEventName } from './events/lifecycle.events';
export type { SessionInfo } from './session/session.types';
export { LOGIC_VIEW_CHANNEL, RULES_CHANNEL, STORE_CHANNEL } from './subscriptions/subscription-channels';
export type {
  SubscriptionCallback,
  SubscriptionChannel,
  SubscriptionHandle,
  SubscriptionParams,
} from './subscriptions/subscriptions.types';
export type { Transport, TransportFactory, TransportHandlers } from './transport/transport.types';
export { TRANSPORT_FACTORY } from './transport/transport.types';
