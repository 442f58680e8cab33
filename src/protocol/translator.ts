import { did, NumberingPlan, TypeOfNumber } from './address.js';
import { CommandStatus } from './command-status.js';
import type {
  BindCommand,
  BindPdu,
  DeliverSmPdu,
  DeliverSmRespPdu,
  EnquireLinkPdu,
  EnquireLinkRespPdu,
  GenericNackPdu,
  ShortMessage,
  SubmitSmPdu,
  SubmitSmRespPdu,
  UnbindPdu,
  UnbindRespPdu,
} from './pdu.js';
import type { Bind, BindMode, ReceiveMessage, SendMessage, SubmitResult } from '../smpp/commands.js';

export const INTERFACE_VERSION = 0x34;
export const DEFAULT_DATA_CODING = 0x00; // SMSC default alphabet

const BIND_COMMANDS: Record<BindMode, BindCommand> = {
  transceiver: 'bind_transceiver',
  transmitter: 'bind_transmitter',
  receiver: 'bind_receiver',
};

export function buildBindPdu(bind: Bind, sequenceNumber: number): BindPdu {
  return {
    command: BIND_COMMANDS[bind.mode ?? 'transceiver'],
    sequence_number: sequenceNumber,
    command_status: CommandStatus.ESME_ROK,
    system_id: bind.systemId,
    password: bind.password,
    system_type: bind.systemType ?? '',
    interface_version: INTERFACE_VERSION,
    addr_ton: bind.addrTon ?? TypeOfNumber.INTERNATIONAL,
    addr_npi: bind.addrNpi ?? NumberingPlan.ISDN,
    address_range: '',
  };
}

/**
 * Build a single-segment submit_sm. Only ASCII bodies are supported:
 * anything outside 7-bit ASCII is sent as '?'.
 */
export function buildSubmitSm(message: SendMessage, sequenceNumber: number): SubmitSmPdu {
  return {
    command: 'submit_sm',
    sequence_number: sequenceNumber,
    command_status: CommandStatus.ESME_ROK,
    service_type: '',
    source_addr_ton: message.from.ton,
    source_addr_npi: message.from.npi,
    source_addr: message.from.number,
    dest_addr_ton: message.to.ton,
    dest_addr_npi: message.to.npi,
    destination_addr: message.to.number,
    esm_class: 0x00,
    protocol_id: 0x00,
    priority_flag: 0x00,
    registered_delivery: 0x00,
    data_coding: message.encoding ?? DEFAULT_DATA_CODING,
    short_message: toAsciiBytes(message.content),
  };
}

export function toAsciiBytes(content: string): Buffer {
  return Buffer.from(content.replace(/[^\x00-\x7F]/gu, '?'), 'ascii');
}

export function toReceiveMessage(pdu: DeliverSmPdu): ReceiveMessage {
  return {
    content: decodeShortMessage(pdu.short_message),
    to: did(pdu.destination_addr, pdu.dest_addr_ton, pdu.dest_addr_npi),
    from: did(pdu.source_addr, pdu.source_addr_ton, pdu.source_addr_npi),
  };
}

/** A generic_nack answering a submit_sm is a failed submission with no message id. */
export function toSubmitResult(pdu: SubmitSmRespPdu | GenericNackPdu): SubmitResult {
  const status = pdu.command_status;
  if (pdu.command === 'submit_sm_resp' && status === CommandStatus.ESME_ROK && pdu.message_id) {
    return { status, messageId: pdu.message_id };
  }
  return { status };
}

export function decodeShortMessage(msg: ShortMessage): string {
  if (typeof msg === 'string') return msg;
  if (Buffer.isBuffer(msg)) return msg.toString('utf-8');

  const inner = msg.message;
  return typeof inner === 'string' ? inner : inner.toString('utf-8');
}

// ── Replies and probes ──────────────────────────────────────────

export function buildEnquireLink(sequenceNumber: number): EnquireLinkPdu {
  return { command: 'enquire_link', sequence_number: sequenceNumber, command_status: CommandStatus.ESME_ROK };
}

export function buildEnquireLinkResp(sequenceNumber: number): EnquireLinkRespPdu {
  return { command: 'enquire_link_resp', sequence_number: sequenceNumber, command_status: CommandStatus.ESME_ROK };
}

export function buildDeliverSmResp(sequenceNumber: number): DeliverSmRespPdu {
  return {
    command: 'deliver_sm_resp',
    sequence_number: sequenceNumber,
    command_status: CommandStatus.ESME_ROK,
    message_id: '',
  };
}

export function buildUnbind(sequenceNumber: number): UnbindPdu {
  return { command: 'unbind', sequence_number: sequenceNumber, command_status: CommandStatus.ESME_ROK };
}

export function buildUnbindResp(sequenceNumber: number): UnbindRespPdu {
  return { command: 'unbind_resp', sequence_number: sequenceNumber, command_status: CommandStatus.ESME_ROK };
}

export function buildGenericNack(sequenceNumber: number, status: number): GenericNackPdu {
  return { command: 'generic_nack', sequence_number: sequenceNumber, command_status: status };
}
