import { DisconnectedError } from '../errors/client.errors';
import { Transport } from '../transport/transport.types';
import { WelcomeInfo } from './connection.types';

/**
 * Read-only view of the current physical connection handed to other
 * components. The connection service invalidates it on every transition out
 * of `connected`; a stale handle refuses to send.
 */
export class ConnectionHandle {
  private valid = true;

  constructor(
    readonly id: number,
    readonly welcome: WelcomeInfo,
    private readonly transport: Transport,
  ) {}

  get isValid(): boolean {
    return this.valid && this.transport.isOpen;
  }

  send(frame: string): void {
    if (!this.isValid) {
      throw new DisconnectedError(`Connection #${this.id} is no longer usable`);
    }
    this.transport.send(frame);
  }

  invalidate(): void {
    this.valid = false;
  }
}
