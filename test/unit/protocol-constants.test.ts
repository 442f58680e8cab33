import { describe, it, expect } from 'vitest';
import { describeStatus } from '../../src/protocol/command-status.js';
import { did, didEquals, NumberingPlan, TypeOfNumber } from '../../src/protocol/address.js';

describe('describeStatus', () => {
  it('names known statuses', () => {
    expect(describeStatus(0x0000000E)).toBe('ESME_RINVPASWD (0x0000000E)');
    expect(describeStatus(0)).toBe('ESME_ROK (0x00000000)');
  });

  it('falls back to hex for unknown statuses', () => {
    expect(describeStatus(0x400)).toBe('0x00000400');
  });
});

describe('did', () => {
  it('defaults to an international E.164 number', () => {
    expect(did('123')).toEqual({ number: '123', ton: 0x01, npi: 0x01 });
  });

  it('is immutable', () => {
    expect(Object.isFrozen(did('123'))).toBe(true);
  });

  it('compares by all three fields', () => {
    expect(didEquals(did('123'), did('123'))).toBe(true);
    expect(didEquals(did('123'), did('123', TypeOfNumber.NATIONAL))).toBe(false);
    expect(didEquals(did('123'), did('123', TypeOfNumber.INTERNATIONAL, NumberingPlan.UNKNOWN))).toBe(false);
    expect(didEquals(did('123'), did('124'))).toBe(false);
  });
});
