import { describe, it, expect } from 'vitest';
import {
  buildBindPdu,
  buildGenericNack,
  buildSubmitSm,
  decodeShortMessage,
  toAsciiBytes,
  toReceiveMessage,
  toSubmitResult,
} from '../../src/protocol/translator.js';
import { did, NumberingPlan, TypeOfNumber } from '../../src/protocol/address.js';
import type { DeliverSmPdu } from '../../src/protocol/pdu.js';

function makeDeliverSm(overrides: Partial<DeliverSmPdu> = {}): DeliverSmPdu {
  return {
    command: 'deliver_sm',
    sequence_number: 12,
    command_status: 0,
    source_addr_ton: 0x01,
    source_addr_npi: 0x01,
    source_addr: '447700900123',
    dest_addr_ton: 0x03,
    dest_addr_npi: 0x00,
    destination_addr: '8888',
    esm_class: 0,
    data_coding: 0,
    short_message: 'hello there',
    ...overrides,
  };
}

describe('buildBindPdu', () => {
  it('builds a transceiver bind with international E.164 defaults', () => {
    expect(buildBindPdu({ systemId: 'A', password: 'B' }, 1)).toEqual({
      command: 'bind_transceiver',
      sequence_number: 1,
      command_status: 0,
      system_id: 'A',
      password: 'B',
      system_type: '',
      interface_version: 0x34,
      addr_ton: 0x01,
      addr_npi: 0x01,
      address_range: '',
    });
  });

  it('selects the PDU by bind mode', () => {
    expect(buildBindPdu({ systemId: 'A', password: 'B', mode: 'transmitter' }, 1).command).toBe('bind_transmitter');
    expect(buildBindPdu({ systemId: 'A', password: 'B', mode: 'receiver' }, 1).command).toBe('bind_receiver');
  });

  it('carries system type and address range settings', () => {
    const pdu = buildBindPdu({
      systemId: 'A',
      password: 'B',
      systemType: 'VMA',
      addrTon: TypeOfNumber.NATIONAL,
      addrNpi: NumberingPlan.UNKNOWN,
    }, 9);

    expect(pdu.system_type).toBe('VMA');
    expect(pdu.addr_ton).toBe(0x02);
    expect(pdu.addr_npi).toBe(0x00);
  });
});

describe('buildSubmitSm', () => {
  it('maps from/to onto source and destination fields', () => {
    const pdu = buildSubmitSm({ content: 'hi', to: did('123'), from: did('456', TypeOfNumber.ALPHANUMERIC, NumberingPlan.UNKNOWN) }, 2);

    expect(pdu.command).toBe('submit_sm');
    expect(pdu.sequence_number).toBe(2);
    expect(pdu.source_addr).toBe('456');
    expect(pdu.source_addr_ton).toBe(0x05);
    expect(pdu.source_addr_npi).toBe(0x00);
    expect(pdu.destination_addr).toBe('123');
    expect(pdu.dest_addr_ton).toBe(0x01);
    expect(pdu.dest_addr_npi).toBe(0x01);
    expect(pdu.short_message.equals(Buffer.from('hi'))).toBe(true);
    expect(pdu.data_coding).toBe(0x00);
  });

  it('uses the requested data coding', () => {
    const pdu = buildSubmitSm({ content: 'hi', to: did('123'), from: did('456'), encoding: 0x03 }, 2);
    expect(pdu.data_coding).toBe(0x03);
  });
});

describe('toAsciiBytes', () => {
  it('replaces each non-ASCII character with a question mark', () => {
    expect(toAsciiBytes('h\u00e9llo \u{1F600}').toString('ascii')).toBe('h?llo ?');
  });
});

describe('toReceiveMessage', () => {
  it('maps deliver_sm addresses and content', () => {
    expect(toReceiveMessage(makeDeliverSm())).toEqual({
      content: 'hello there',
      to: { number: '8888', ton: 0x03, npi: 0x00 },
      from: { number: '447700900123', ton: 0x01, npi: 0x01 },
    });
  });

  it('decodes a buffer body', () => {
    expect(toReceiveMessage(makeDeliverSm({ short_message: Buffer.from('from buffer') })).content).toBe('from buffer');
  });
});

describe('decodeShortMessage', () => {
  it('unwraps the { message } form', () => {
    expect(decodeShortMessage({ message: 'wrapped' })).toBe('wrapped');
    expect(decodeShortMessage({ message: Buffer.from('wrapped buffer') })).toBe('wrapped buffer');
  });
});

describe('toSubmitResult', () => {
  it('keeps the message id of a successful response', () => {
    expect(toSubmitResult({ command: 'submit_sm_resp', sequence_number: 2, command_status: 0, message_id: 'm1' }))
      .toEqual({ status: 0, messageId: 'm1' });
  });

  it('omits an empty message id', () => {
    expect(toSubmitResult({ command: 'submit_sm_resp', sequence_number: 2, command_status: 0, message_id: '' }))
      .toEqual({ status: 0 });
  });

  it('drops the message id of a failed response', () => {
    const result = toSubmitResult({ command: 'submit_sm_resp', sequence_number: 2, command_status: 0x45, message_id: 'x' });
    expect(result).toEqual({ status: 0x45 });
    expect(result.messageId).toBeUndefined();
  });

  it('treats a generic_nack as a failed submission', () => {
    expect(toSubmitResult(buildGenericNack(2, 0x03))).toEqual({ status: 0x03 });
  });
});
