import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { CLIENT_OPTIONS, ClientOptions } from '../config/client-options';
import { ConnectionService } from '../connection/connection.service';
import {
  ClientError,
  DisconnectedError,
  RequestTimeoutError,
  ServerError,
  describeError,
} from '../errors/client.errors';
import { encodeRequest } from '../protocol/frame-codec.util';
import { RequestPayload, ResponseFrame } from '../protocol/frame.types';

type Outcome = { ok: true; value: unknown } | { ok: false; error: Error };

interface PendingRequest {
  operation: string;
  deadline: number;
  settle: (outcome: Outcome) => void;
}

/**
 * Multiplexes request/response exchanges over the current connection.
 *
 * Every request gets a fresh correlation id (a counter that never resets for
 * the lifetime of the client, so ids are never reused) and is settled exactly
 * once: by its response, by its deadline, or by the connection dropping.
 * Nothing is retried; after a drop the caller decides whether to send again.
 */
@Injectable()
export class RequestCorrelator implements OnModuleInit {
  private readonly logger = new Logger(RequestCorrelator.name);
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;

  constructor(
    @Inject(CLIENT_OPTIONS) private readonly options: ClientOptions,
    private readonly connection: ConnectionService,
  ) {}

  onModuleInit() {
    this.connection.listen({
      onResponse: (frame) => this.handleResponse(frame),
      onDrop: () => this.rejectAll(new DisconnectedError('Connection lost')),
    });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Send a request over the current connection and return the server's
   * `data` for it.
   *
   * @param timeoutMs - Deadline for the response; defaults to `requestTimeoutMs`.
   * @throws DisconnectedError if there is no usable connection or it drops before the response.
   * @throws RequestTimeoutError if the deadline elapses first.
   * @throws ServerError carrying the server's code, message and details verbatim.
   */
  send(operation: string, payload: RequestPayload = {}, timeoutMs = this.options.requestTimeoutMs): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const handle = this.connection.current();
      if (!handle) {
        reject(new DisconnectedError(`Cannot send ${operation}: client is ${this.connection.state}`));
        return;
      }

      const id = this.nextId++;
      let settled = false;
      const settle = (outcome: Outcome) => {
        if (settled) {
          this.logger.debug(`Ignoring second settlement of ${operation} (id=${id})`);
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.pending.delete(id);
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      };

      const timer = setTimeout(() => {
        settle({
          ok: false,
          error: new RequestTimeoutError(`Request ${operation} (id=${id}) timed out after ${timeoutMs}ms`),
        });
      }, timeoutMs);

      this.pending.set(id, { operation, deadline: Date.now() + timeoutMs, settle });

      try {
        handle.send(encodeRequest(id, operation, payload));
      } catch (err) {
        settle({
          ok: false,
          error: err instanceof ClientError ? err : new DisconnectedError(`Failed to send ${operation}: ${describeError(err)}`),
        });
      }
    });
  }

  /**
   * Settle the pending request a response frame belongs to.
   *
   * @returns `false` if no request with that id is pending (e.g. it already timed out).
   */
  handleResponse(frame: ResponseFrame): boolean {
    const pending = this.pending.get(frame.id);
    if (!pending) {
      this.logger.debug(`Dropping response for unknown request id ${frame.id}`);
      return false;
    }

    if (frame.kind === 'result') {
      pending.settle({ ok: true, value: frame.data });
    } else {
      pending.settle({ ok: false, error: new ServerError(frame.code, frame.message, frame.details) });
    }
    return true;
  }

  /** Reject every pending request with `error` and forget them all. */
  rejectAll(error: Error): void {
    if (this.pending.size === 0) return;
    this.logger.warn(`Rejecting ${this.pending.size} pending request(s): ${error.message}`);
    for (const pending of [...this.pending.values()]) {
      pending.settle({ ok: false, error });
    }
    this.pending.clear();
  }

  /** Snapshot of the requests awaiting a response, oldest first. */
  inFlight(): Array<{ id: number; operation: string; deadline: number }> {
    return [...this.pending].map(([id, { operation, deadline }]) => ({ id, operation, deadline }));
  }
}
