/**
 * Decoded SMPP PDUs as seen by the client session.
 *
 * The session never touches bytes: the transport decodes inbound traffic
 * into these shapes and encodes outbound ones. Field names follow node-smpp
 * so the adapter in transport/smpp-transport.ts stays a thin mapping.
 */

export type ShortMessage = string | Buffer | { message: string | Buffer; udh?: Buffer };

interface PduHeader {
  sequence_number: number;
  command_status: number;
}

export type BindCommand = 'bind_transceiver' | 'bind_transmitter' | 'bind_receiver';
export type BindRespCommand = `${BindCommand}_resp`;

export interface BindPdu extends PduHeader {
  command: BindCommand;
  system_id: string;
  password: string;
  system_type: string;
  interface_version: number;
  addr_ton: number;
  addr_npi: number;
  address_range: string;
}

export interface BindRespPdu extends PduHeader {
  command: BindRespCommand;
  system_id?: string;
}

export interface SubmitSmPdu extends PduHeader {
  command: 'submit_sm';
  service_type: string;
  source_addr_ton: number;
  source_addr_npi: number;
  source_addr: string;
  dest_addr_ton: number;
  dest_addr_npi: number;
  destination_addr: string;
  esm_class: number;
  protocol_id: number;
  priority_flag: number;
  registered_delivery: number;
  data_coding: number;
  short_message: Buffer;
}

export interface SubmitSmRespPdu extends PduHeader {
  command: 'submit_sm_resp';
  message_id?: string;
}

export interface DeliverSmPdu extends PduHeader {
  command: 'deliver_sm';
  source_addr_ton: number;
  source_addr_npi: number;
  source_addr: string;
  dest_addr_ton: number;
  dest_addr_npi: number;
  destination_addr: string;
  esm_class: number;
  data_coding: number;
  short_message: ShortMessage;
}

export interface DeliverSmRespPdu extends PduHeader {
  command: 'deliver_sm_resp';
  message_id: string;
}

export interface EnquireLinkPdu extends PduHeader {
  command: 'enquire_link';
}

export interface EnquireLinkRespPdu extends PduHeader {
  command: 'enquire_link_resp';
}

export interface UnbindPdu extends PduHeader {
  command: 'unbind';
}

export interface UnbindRespPdu extends PduHeader {
  command: 'unbind_resp';
}

export interface GenericNackPdu extends PduHeader {
  command: 'generic_nack';
}

/** Any inbound PDU kind the session has no handler for. */
export interface UnsupportedPdu extends PduHeader {
  command: 'unsupported';
  name: string;
}

export type Pdu =
  | BindPdu
  | BindRespPdu
  | SubmitSmPdu
  | SubmitSmRespPdu
  | DeliverSmPdu
  | DeliverSmRespPdu
  | EnquireLinkPdu
  | EnquireLinkRespPdu
  | UnbindPdu
  | UnbindRespPdu
  | GenericNackPdu
  | UnsupportedPdu;

/** PDUs the session may hand to the transport. */
export type OutboundPdu = Exclude<Pdu, UnsupportedPdu>;

const BIND_RESP_COMMANDS: ReadonlySet<string> = new Set<BindRespCommand>([
  'bind_transceiver_resp',
  'bind_transmitter_resp',
  'bind_receiver_resp',
]);

export function isBindResp(pdu: Pdu): pdu is BindRespPdu {
  return BIND_RESP_COMMANDS.has(pdu.command);
}

/** Name used in logs and metric labels. */
export function commandName(pdu: Pdu): string {
  return pdu.command === 'unsupported' ? pdu.name : pdu.command;
}
