import { decodeFrame, encodePong, encodeRequest } from './frame-codec.util';

describe('encodeRequest', () => {
  it('merges the payload with id and type', () => {
    expect(JSON.parse(encodeRequest(7, 'store.get', { key: 'a' }))).toEqual({ key: 'a', id: 7, type: 'store.get' });
  });

  it('lets id and type win over payload fields of the same name', () => {
    expect(JSON.parse(encodeRequest(3, 'store.get', { id: 'x', type: 'y' }))).toEqual({ id: 3, type: 'store.get' });
  });
});

describe('encodePong', () => {
  it('echoes the ping timestamp', () => {
    expect(encodePong(42)).toBe('{"type":"pong","timestamp":42}');
  });
});

describe('decodeFrame', () => {
  it('decodes a result', () => {
    expect(decodeFrame('{"id":1,"type":"result","data":{"n":1}}')).toEqual({ kind: 'result', id: 1, data: { n: 1 } });
  });

  it('decodes an error with its details', () => {
    expect(decodeFrame('{"id":2,"type":"error","code":"NOT_FOUND","message":"missing","details":[1]}')).toEqual({
      kind: 'error',
      id: 2,
      code: 'NOT_FOUND',
      message: 'missing',
      details: [1],
    });
  });

  it('fills in an error without code or message', () => {
    expect(decodeFrame('{"id":2,"type":"error"}')).toEqual({
      kind: 'error',
      id: 2,
      code: 'UNKNOWN',
      message: 'Unknown server error',
      details: undefined,
    });
  });

  it('turns an unknown response type into an error for that request', () => {
    expect(decodeFrame('{"id":5,"type":"weird"}')).toEqual({
      kind: 'error',
      id: 5,
      code: 'UNKNOWN',
      message: 'Unexpected response type: weird',
    });
  });

  it('decodes a push', () => {
    expect(decodeFrame('{"type":"push","subscriptionId":"s1","channel":"todos","data":[1]}')).toEqual({
      kind: 'push',
      subscriptionId: 's1',
      channel: 'todos',
      data: [1],
    });
  });

  it('decodes the welcome with defaults for missing fields', () => {
    expect(decodeFrame('{"type":"welcome","version":"2.1.0","serverTime":10,"requiresAuth":true}')).toEqual({
      kind: 'welcome',
      version: '2.1.0',
      serverTime: 10,
      requiresAuth: true,
    });
    expect(decodeFrame('{"type":"welcome"}')).toEqual({ kind: 'welcome', version: '', serverTime: 0, requiresAuth: false });
  });

  it('decodes heartbeat pings', () => {
    expect(decodeFrame('{"type":"ping","timestamp":99}')).toEqual({ kind: 'ping', timestamp: 99 });
  });

  it('decodes session revocation, with a default reason', () => {
    expect(decodeFrame('{"type":"system","event":"session_revoked","reason":"admin"}')).toEqual({
      kind: 'session_revoked',
      reason: 'admin',
    });
    expect(decodeFrame('{"type":"system","event":"session_revoked"}')).toEqual({
      kind: 'session_revoked',
      reason: 'Session revoked by administrator',
    });
  });

  it.each([
    ['not json', 'Invalid JSON'],
    ['[1,2]', 'Frame is not an object'],
    ['null', 'Frame is not an object'],
    ['{"type":"ping"}', 'Ping without numeric timestamp'],
    ['{"type":"push","subscriptionId":"s1"}', 'Push without subscriptionId or channel'],
    ['{"type":"system","event":"maintenance"}', 'Unsupported system event: maintenance'],
    ['{"type":"result","data":1}', 'Unexpected frame type: result'],
    ['{"id":1.5,"type":"result"}', 'Unexpected frame type: result'],
  ])('reports %s as malformed', (raw, reason) => {
    expect(decodeFrame(raw)).toEqual({ kind: 'malformed', reason, raw });
  });
});
