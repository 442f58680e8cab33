import type { OutboundPdu, Pdu } from '../../src/protocol/pdu.js';
import type { ConnectionListener, Endpoint, PduConnection, PduTransport } from '../../src/transport/types.js';

export class FakeConnection implements PduConnection {
  readonly sent: OutboundPdu[] = [];
  closed = false;
  /** When set, every send throws it. */
  sendError: Error | null = null;

  send(pdu: OutboundPdu): void {
    if (this.closed) throw new Error('send on closed connection');
    if (this.sendError) throw this.sendError;
    this.sent.push(pdu);
  }

  close(): void {
    this.closed = true;
  }
}

/** In-process stand-in for the SMSC side of the socket. */
export class FakeTransport implements PduTransport {
  readonly connection = new FakeConnection();
  readonly endpoints: Endpoint[] = [];
  signal: AbortSignal | undefined;
  private listener: ConnectionListener | null = null;
  private outcome: 'connect' | 'hang' | Error = 'connect';

  get sent(): OutboundPdu[] {
    return this.connection.sent;
  }

  get lastSent(): OutboundPdu | undefined {
    return this.connection.sent[this.connection.sent.length - 1];
  }

  failWith(error: Error): this {
    this.outcome = error;
    return this;
  }

  hang(): this {
    this.outcome = 'hang';
    return this;
  }

  connect(endpoint: Endpoint, listener: ConnectionListener, signal?: AbortSignal): Promise<PduConnection> {
    this.endpoints.push(endpoint);
    this.listener = listener;
    this.signal = signal;
    if (this.outcome instanceof Error) return Promise.reject(this.outcome);
    if (this.outcome === 'hang') {
      // Settles only when the session aborts the attempt
      return new Promise<PduConnection>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    return Promise.resolve(this.connection);
  }

  /** Push an inbound PDU to the session. */
  deliver(pdu: Pdu): void {
    this.requireListener().onPdu(pdu);
  }

  /** Simulate the SMSC dropping the socket. */
  drop(error?: Error): void {
    this.requireListener().onClose(error);
  }

  private requireListener(): ConnectionListener {
    if (!this.listener) throw new Error('transport was never connected');
    return this.listener;
  }
}

/** Let pending promise callbacks (connect resolution, ack delivery) run. */
export async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}
