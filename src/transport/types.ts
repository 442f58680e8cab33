import type { OutboundPdu, Pdu } from '../protocol/pdu.js';

export interface Endpoint {
  host: string;
  port: number;
  tls?: boolean;
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.tls ? 'smpps' : 'smpp'}://${endpoint.host}:${endpoint.port}`;
}

/** Callbacks a transport uses to hand inbound traffic to the session. */
export interface ConnectionListener {
  onPdu(pdu: Pdu): void;
  /** Fired once when the connection goes away, whoever closed it. */
  onClose(error?: Error): void;
}

export interface PduConnection {
  send(pdu: OutboundPdu): void;
  close(): void;
}

/**
 * Codec plus socket. The session only ever sees decoded PDUs.
 * Aborting `signal` before the connection is up tears the socket down and
 * rejects the returned promise.
 */
export interface PduTransport {
  connect(endpoint: Endpoint, listener: ConnectionListener, signal?: AbortSignal): Promise<PduConnection>;
}
