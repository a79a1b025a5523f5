import { DisconnectedError, RequestTimeoutError } from '../errors/client.errors';
import { ReadinessGate } from './readiness-gate';

describe('ReadinessGate', () => {
  let gate: ReadinessGate;

  beforeEach(() => {
    gate = new ReadinessGate();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('starts closed and refuses waiters', async () => {
    expect(gate.isClosed).toBe(true);
    await expect(gate.wait(100, 'store.get')).rejects.toThrow(
      new DisconnectedError('Cannot send store.get: client is disconnected'),
    );
  });

  it('lets waiters through immediately once ready', async () => {
    gate.open();
    await expect(gate.wait(100, 'store.get')).resolves.toBeUndefined();
  });

  it('releases held waiters when opened', async () => {
    gate.hold();
    const waiting = gate.wait(100, 'store.get');

    gate.open();

    await expect(waiting).resolves.toBeUndefined();
    expect(gate.isReady).toBe(true);
  });

  it('rejects held waiters when closed', async () => {
    gate.hold();
    const waiting = gate.wait(100, 'store.get');

    gate.close(new DisconnectedError('gone'));

    await expect(waiting).rejects.toThrow('gone');
  });

  it('times a waiter out with its own deadline', async () => {
    jest.useFakeTimers();
    gate.hold();
    const waiting = gate.wait(50, 'store.get');

    jest.advanceTimersByTime(50);

    await expect(waiting).rejects.toThrow(
      new RequestTimeoutError('store.get timed out after 50ms waiting for the session to become ready'),
    );
    // A timed-out waiter is not resolved again later
    gate.open();
    expect(jest.getTimerCount()).toBe(0);
  });
});
