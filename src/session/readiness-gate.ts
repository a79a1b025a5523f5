import { DisconnectedError, RequestTimeoutError } from '../errors/client.errors';

type GateState = 'closed' | 'pending' | 'ready';

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Holds application calls back until the session is usable.
 *
 * `pending` while connecting, reconnecting, or replaying login and
 * subscriptions; `ready` once that is done; `closed` when disconnected.
 */
export class ReadinessGate {
  private state: GateState = 'closed';
  private readonly waiters = new Set<Waiter>();

  get isReady(): boolean {
    return this.state === 'ready';
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  hold(): void {
    this.state = 'pending';
  }

  open(): void {
    this.state = 'ready';
    for (const waiter of this.drain()) waiter.resolve();
  }

  close(error: Error): void {
    this.state = 'closed';
    for (const waiter of this.drain()) waiter.reject(error);
  }

  /**
   * Resolve once the session is ready.
   *
   * @throws DisconnectedError right away when closed, or if it closes while waiting.
   * @throws RequestTimeoutError if `timeoutMs` elapses first.
   */
  wait(timeoutMs: number, operation: string): Promise<void> {
    if (this.state === 'ready') return Promise.resolve();
    if (this.state === 'closed') {
      return Promise.reject(new DisconnectedError(`Cannot send ${operation}: client is disconnected`));
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        reject: (err) => {
          clearTimeout(waiter.timer);
          reject(err);
        },
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          reject(new RequestTimeoutError(`${operation} timed out after ${timeoutMs}ms waiting for the session to become ready`));
        }, timeoutMs),
      };
      this.waiters.add(waiter);
    });
  }

  private drain(): Waiter[] {
    const waiters = [...this.waiters];
    this.waiters.clear();
    return waiters;
  }
}
