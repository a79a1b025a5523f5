/** Operation-specific request fields, merged into the frame next to `id` and `type`. */
export type RequestPayload = Record<string, unknown>;

/** Outbound request: `{ ...payload, id, type }` */
export interface RequestFrame extends RequestPayload {
  id: number;
  type: string;
}

export interface PongFrame {
  type: 'pong';
  timestamp: number;
}

export interface ResultFrame {
  kind: 'result';
  id: number;
  data: unknown;
}

export interface ErrorFrame {
  kind: 'error';
  id: number;
  code: string;
  message: string;
  details?: unknown;
}

export type ResponseFrame = ResultFrame | ErrorFrame;

/** Server-originated fresh results for an active subscription */
export interface PushFrame {
  kind: 'push';
  subscriptionId: string;
  channel: string;
  data: unknown;
}

export interface WelcomeFrame {
  kind: 'welcome';
  version: string;
  serverTime: number;
  requiresAuth: boolean;
}

export interface PingFrame {
  kind: 'ping';
  timestamp: number;
}

export interface SessionRevokedFrame {
  kind: 'session_revoked';
  reason: string;
}

export interface MalformedFrame {
  kind: 'malformed';
  reason: string;
  raw: string;
}

export type InboundFrame =
  | ResultFrame
  | ErrorFrame
  | PushFrame
  | WelcomeFrame
  | PingFrame
  | SessionRevokedFrame
  | MalformedFrame;
