/** Injection token for the {@link TransportFactory} that opens physical connections. */
export const TRANSPORT_FACTORY = Symbol('TRANSPORT_FACTORY');

export interface TransportHandlers {
  onMessage(data: string): void;
  /** Fired once when an opened transport closes, whoever initiated it */
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
}

/** One physical, already-open connection. TLS is the transport's business. */
export interface Transport {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface TransportFactory {
  /**
   * Open a connection to `url`. Resolves once the socket is open; rejects if
   * it fails or `timeoutMs` elapses first. `handlers` only see events from
   * the returned transport.
   */
  open(url: string, handlers: TransportHandlers, timeoutMs: number): Promise<Transport>;
}
