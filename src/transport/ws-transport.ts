import { Inject, Injectable, Logger } from '@nestjs/common';
import WebSocket from 'ws';
import { CLIENT_OPTIONS, ClientOptions } from '../config/client-options';
import { Transport, TransportFactory, TransportHandlers } from './transport.types';

/** A `ws` socket in the OPEN state, kept alive with protocol-level pings. */
export class WsTransport implements Transport {
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly ws: WebSocket,
    keepaliveIntervalMs: number,
  ) {
    if (keepaliveIntervalMs > 0) this.startPing(keepaliveIntervalMs);
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    this.ws.send(data);
  }

  close(code = 1000, reason = ''): void {
    this.stopPing();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  stopPing() {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  private startPing(intervalMs: number) {
    this.pingInterval = setInterval(() => {
      if (this.ws.readyState === WebSocket.OPEN) {
        this.ws.ping();
      }
    }, intervalMs);
  }
}

/**
 * Opens physical connections with the `ws` package.
 *
 * The opening handshake is bounded by `timeoutMs` through `ws`'s own
 * `handshakeTimeout`. Errors and closes before the socket opens reject the
 * returned promise; after that they go to the supplied handlers.
 */
@Injectable()
export class WsTransportFactory implements TransportFactory {
  private readonly logger = new Logger(WsTransportFactory.name);

  constructor(@Inject(CLIENT_OPTIONS) private readonly options: ClientOptions) {}

  open(url: string, handlers: TransportHandlers, timeoutMs: number): Promise<Transport> {
    return new Promise((resolve, reject) => {
      this.logger.log(`Opening ${url}…`);
      const ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
      let transport: WsTransport | null = null;

      ws.on('open', () => {
        transport = new WsTransport(ws, this.options.keepaliveIntervalMs);
        resolve(transport);
      });

      ws.on('message', (data: WebSocket.RawData) => {
        handlers.onMessage(rawDataToString(data));
      });

      ws.on('close', (code: number, reason: Buffer) => {
        if (!transport) {
          reject(new Error(`Socket closed before opening: ${code} ${reason.toString()}`));
          return;
        }
        transport.stopPing();
        handlers.onClose(code, reason.toString());
      });

      ws.on('error', (err: Error) => {
        if (!transport) {
          reject(err);
          return;
        }
        handlers.onError(err);
      });
    });
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
  return data.toString();
}
