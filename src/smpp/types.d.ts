declare module 'smpp' {
  import { EventEmitter } from 'events';

  // ── PDU ──────────────────────────────────────────────────────────

  type ShortMessageField = string | Buffer | { message: string | Buffer; udh?: Buffer };

  interface PDUFields {
    command_length?: number;
    command_id?: number;
    command?: string;
    command_status?: number;
    sequence_number?: number;

    // Bind fields
    system_id?: string;
    password?: string;
    system_type?: string;
    interface_version?: number;
    addr_ton?: number;
    addr_npi?: number;
    address_range?: string;

    // Submit/Deliver fields
    service_type?: string;
    source_addr_ton?: number;
    source_addr_npi?: number;
    source_addr?: string;
    dest_addr_ton?: number;
    dest_addr_npi?: number;
    destination_addr?: string;
    esm_class?: number;
    protocol_id?: number;
    priority_flag?: number;
    registered_delivery?: number;
    data_coding?: number;
    short_message?: ShortMessageField;

    // Response fields
    message_id?: string;

    [key: string]: unknown;
  }

  class PDU implements PDUFields {
    command_length: number;
    command_id: number;
    command: string;
    command_status: number;
    sequence_number: number;

    system_id?: string;
    password?: string;
    system_type?: string;
    interface_version?: number;
    addr_ton?: number;
    addr_npi?: number;
    address_range?: string;

    service_type?: string;
    source_addr_ton?: number;
    source_addr_npi?: number;
    source_addr?: string;
    dest_addr_ton?: number;
    dest_addr_npi?: number;
    destination_addr?: string;
    esm_class?: number;
    protocol_id?: number;
    priority_flag?: number;
    registered_delivery?: number;
    data_coding?: number;
    short_message?: ShortMessageField;

    message_id?: string;

    [key: string]: unknown;

    constructor(command: string, options?: Partial<PDUFields>);

    isResponse(): boolean;
    response(options?: Partial<PDUFields>): PDU;
    toBuffer(): Buffer;
  }

  // ── Session ──────────────────────────────────────────────────────

  type PDUCallback = (pdu: PDU) => void;

  interface Session extends EventEmitter {
    readonly remoteAddress: string;
    readonly remotePort: number;
    readonly closed: boolean;

    send(pdu: PDU, responseCallback?: PDUCallback): boolean;
    close(callback?: () => void): void;
    destroy(callback?: () => void): void;

    on(event: 'connect', listener: () => void): this;
    on(event: 'secureConnect', listener: () => void): this;
    on(event: 'close', listener: () => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'pdu', listener: (pdu: PDU) => void): this;
    on(event: string, listener: (...args: unknown[]) => void): this;
  }

  interface ConnectOptions {
    host: string;
    port: number;
    tls?: boolean;
    connectTimeout?: number;
    [key: string]: unknown;
  }

  function connect(options: ConnectOptions, listener?: () => void): Session;
  function connect(url: string, listener?: () => void): Session;

  export { PDU, PDUFields, PDUCallback, Session, ConnectOptions, connect };
}
