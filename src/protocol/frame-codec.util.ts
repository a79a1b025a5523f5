import { InboundFrame, PongFrame, RequestFrame, RequestPayload } from './frame.types';

const DEFAULT_REVOKE_REASON = 'Session revoked by administrator';

export function encodeRequest(id: number, operation: string, payload: RequestPayload = {}): string {
  const frame: RequestFrame = { ...payload, id, type: operation };
  return JSON.stringify(frame);
}

export function encodePong(timestamp: number): string {
  const frame: PongFrame = { type: 'pong', timestamp };
  return JSON.stringify(frame);
}

/**
 * Classify one inbound wire frame.
 *
 * Never throws: anything that is not valid JSON, not an object, or lacks
 * the fields its `type` requires comes back as a `malformed` frame.
 */
export function decodeFrame(raw: string): InboundFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return malformed('Invalid JSON', raw);
  }

  if (!isRecord(parsed)) return malformed('Frame is not an object', raw);
  const msg = parsed;

  switch (msg.type) {
    case 'welcome':
      return {
        kind: 'welcome',
        version: typeof msg.version === 'string' ? msg.version : '',
        serverTime: typeof msg.serverTime === 'number' ? msg.serverTime : 0,
        requiresAuth: msg.requiresAuth === true,
      };

    case 'ping':
      if (typeof msg.timestamp !== 'number') return malformed('Ping without numeric timestamp', raw);
      return { kind: 'ping', timestamp: msg.timestamp };

    case 'push':
      if (typeof msg.subscriptionId !== 'string' || typeof msg.channel !== 'string') {
        return malformed('Push without subscriptionId or channel', raw);
      }
      return {
        kind: 'push',
        subscriptionId: msg.subscriptionId,
        channel: msg.channel,
        data: msg.data,
      };

    case 'system':
      if (msg.event === 'session_revoked') {
        return {
          kind: 'session_revoked',
          reason: typeof msg.reason === 'string' ? msg.reason : DEFAULT_REVOKE_REASON,
        };
      }
      return malformed(`Unsupported system event: ${String(msg.event)}`, raw);
  }

  // Everything else must be a response to one of our requests
  if (typeof msg.id !== 'number' || !Number.isInteger(msg.id)) {
    return malformed(`Unexpected frame type: ${String(msg.type)}`, raw);
  }

  if (msg.type === 'result') {
    return { kind: 'result', id: msg.id, data: msg.data };
  }

  if (msg.type === 'error') {
    return {
      kind: 'error',
      id: msg.id,
      code: typeof msg.code === 'string' ? msg.code : 'UNKNOWN',
      message: typeof msg.message === 'string' ? msg.message : 'Unknown server error',
      details: msg.details,
    };
  }

  return {
    kind: 'error',
    id: msg.id,
    code: 'UNKNOWN',
    message: `Unexpected response type: ${String(msg.type)}`,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function malformed(reason: string, raw: string): InboundFrame {
  return { kind: 'malformed', reason, raw };
}
