import smpp from 'smpp';
import type { PDU, Session } from 'smpp';
import type { BindRespCommand, OutboundPdu, Pdu } from '../protocol/pdu.js';
import { logger } from '../monitoring/logger.js';
import {
  formatEndpoint,
  type ConnectionListener,
  type Endpoint,
  type PduConnection,
  type PduTransport,
} from './types.js';

const transportLog = logger.child({ component: 'smpp-transport' });

/** Encode a session PDU as a node-smpp PDU. */
export function toWirePdu(pdu: OutboundPdu): PDU {
  const { command, ...fields } = pdu;
  return new smpp.PDU(command, fields);
}

/**
 * Map a node-smpp PDU onto the session's PDU union. Commands an ESME is
 * never meant to receive come back as `unsupported`.
 */
export function fromWirePdu(pdu: PDU): Pdu {
  const header = {
    sequence_number: pdu.sequence_number,
    command_status: pdu.command_status,
  };
  const command = pdu.command;

  if (isBindRespCommand(command)) {
    return { command, ...header, system_id: pdu.system_id };
  }

  switch (command) {
    case 'submit_sm_resp':
      return { command: 'submit_sm_resp', ...header, message_id: pdu.message_id };
    case 'deliver_sm':
      return {
        command: 'deliver_sm',
        ...header,
        source_addr_ton: pdu.source_addr_ton ?? 0,
        source_addr_npi: pdu.source_addr_npi ?? 0,
        source_addr: pdu.source_addr ?? '',
        dest_addr_ton: pdu.dest_addr_ton ?? 0,
        dest_addr_npi: pdu.dest_addr_npi ?? 0,
        destination_addr: pdu.destination_addr ?? '',
        esm_class: pdu.esm_class ?? 0,
        data_coding: pdu.data_coding ?? 0,
        short_message: pdu.short_message ?? '',
      };
    case 'deliver_sm_resp':
      return { command: 'deliver_sm_resp', ...header, message_id: pdu.message_id ?? '' };
    case 'enquire_link':
    case 'enquire_link_resp':
    case 'unbind':
    case 'unbind_resp':
    case 'generic_nack':
      return { command, ...header };
    default:
      return { command: 'unsupported', name: command, ...header };
  }
}

function isBindRespCommand(command: string): command is BindRespCommand {
  return command === 'bind_transceiver_resp'
    || command === 'bind_transmitter_resp'
    || command === 'bind_receiver_resp';
}

class SmppConnection implements PduConnection {
  constructor(
    private readonly session: Session,
    private readonly endpoint: string,
  ) {}

  send(pdu: OutboundPdu): void {
    if (!this.session.send(toWirePdu(pdu))) {
      transportLog.warn(
        { endpoint: this.endpoint, command: pdu.command, seq: pdu.sequence_number },
        'PDU not written: socket closed',
      );
    }
  }

  close(): void {
    if (!this.session.closed) {
      this.session.close();
    }
  }
}

/** PduTransport backed by node-smpp's client session (framing, codec and socket). */
export class SmppTransport implements PduTransport {
  connect(endpoint: Endpoint, listener: ConnectionListener, signal?: AbortSignal): Promise<PduConnection> {
    const target = formatEndpoint(endpoint);

    return new Promise<PduConnection>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error(`Connect to ${target} aborted`));
        return;
      }

      let connected = false;
      let lastError: Error | undefined;

      const onAbort = () => {
        if (connected) return;
        transportLog.debug({ endpoint: target }, 'Connect aborted, destroying socket');
        reject(new Error(`Connect to ${target} aborted`));
        session.destroy();
      };

      const session = smpp.connect(
        { host: endpoint.host, port: endpoint.port, tls: endpoint.tls ?? false },
        () => {
          connected = true;
          signal?.removeEventListener('abort', onAbort);
          transportLog.debug({ endpoint: target }, 'Transport connected');
          resolve(new SmppConnection(session, target));
        },
      );

      signal?.addEventListener('abort', onAbort, { once: true });

      session.on('pdu', (pdu: PDU) => {
        if (connected) listener.onPdu(fromWirePdu(pdu));
      });

      session.on('error', (error: Error) => {
        if (!connected) {
          reject(error);
          session.destroy();
          return;
        }
        lastError = error;
        transportLog.error({ endpoint: target, error: error.message }, 'Transport error');
      });

      session.on('close', () => {
        if (connected) {
          listener.onClose(lastError);
        } else {
          reject(lastError ?? new Error(`Connection to ${target} closed before it was established`));
        }
      });
    });
  }
}
