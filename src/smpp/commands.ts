import type { Did } from '../protocol/address.js';

export type BindMode = 'transceiver' | 'transmitter' | 'receiver';

export interface Bind {
  systemId: string;
  password: string;
  systemType?: string;
  /** Defaults to transceiver. */
  mode?: BindMode;
  /** Defaults to INTERNATIONAL. */
  addrTon?: number;
  /** Defaults to ISDN (E.164). */
  addrNpi?: number;
}

export interface SendMessage {
  content: string;
  to: Did;
  from: Did;
  /** data_coding to put on the submit_sm; SMSC default alphabet when omitted. */
  encoding?: number;
}

export interface SubmitResult {
  status: number;
  messageId?: string;
}

/** One result per submit_sm the message was sent as. Always a single entry for now. */
export interface SendMessageAck {
  results: SubmitResult[];
}

export interface ReceiveMessage {
  content: string;
  to: Did;
  from: Did;
}
