import { WelcomeInfo } from '../connection/connection.types';

/** Lifecycle notifications and the arguments their listeners receive. */
export interface LifecycleEvents {
  connected: [];
  disconnected: [reason: string];
  reconnecting: [attempt: number];
  reconnected: [];
  error: [error: Error];
  welcome: [info: WelcomeInfo];
  session_revoked: [reason: string];
}

export type LifecycleEvent = keyof LifecycleEvents;

/**
 * Name under which an event is published on the Nest `EventEmitter2`, so
 * applications can also listen with `@OnEvent('client.reconnected')`.
 */
export function lifecycleEventName(event: LifecycleEvent): string {
  return `client.${event}`;
}
