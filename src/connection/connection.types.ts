import { PushFrame, ResponseFrame } from '../protocol/frame.types';

export type ConnectionState = 'connecting' | 'connected' | 'reconnecting' | 'disconnected';

/** Negotiated on every physical connection by the server's welcome frame. */
export interface WelcomeInfo {
  version: string;
  serverTime: number;
  requiresAuth: boolean;
}

export interface DropInfo {
  code: number;
  reason: string;
  /** Whether the state machine moved to `reconnecting` rather than `disconnected` */
  willReconnect: boolean;
}

/**
 * Callbacks other components register with the connection. All of them run
 * synchronously inside the dispatch step of the frame or close that caused
 * them.
 */
export interface ConnectionListener {
  onResponse?(frame: ResponseFrame): void;
  onPush?(frame: PushFrame): void;
  onSessionRevoked?(reason: string): void;
  /** Unexpected loss of a connected transport; runs after the state transition */
  onDrop?(info: DropInfo): void;
  onStateChange?(state: ConnectionState, previous: ConnectionState): void;
}

/** Close codes after which reconnecting would only be refused again. */
export const NON_RETRYABLE_CLOSE_CODES: ReadonlySet<number> = new Set([
  1003, // binary frames not supported
  4002, // session revoked
  4003, // too many connections
]);
