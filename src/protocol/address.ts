/** Type of Number (TON) values. */
export const TypeOfNumber = {
  UNKNOWN: 0x00,
  INTERNATIONAL: 0x01,
  NATIONAL: 0x02,
  NETWORK_SPECIFIC: 0x03,
  SUBSCRIBER_NUMBER: 0x04,
  ALPHANUMERIC: 0x05,
  ABBREVIATED: 0x06,
} as const;

export type TypeOfNumber = typeof TypeOfNumber[keyof typeof TypeOfNumber];

/** Numbering Plan Indicator (NPI) values. ISDN is E.164. */
export const NumberingPlan = {
  UNKNOWN: 0x00,
  ISDN: 0x01,
  DATA: 0x03,
  TELEX: 0x04,
  LAND_MOBILE: 0x06,
  NATIONAL: 0x08,
  PRIVATE: 0x09,
  ERMES: 0x0A,
  INTERNET: 0x0E,
  WAP: 0x12,
} as const;

export type NumberingPlan = typeof NumberingPlan[keyof typeof NumberingPlan];

/**
 * A source or destination address as carried in submit_sm / deliver_sm.
 * The number is opaque: no normalization happens here.
 */
export interface Did {
  readonly number: string;
  readonly ton: number;
  readonly npi: number;
}

export function did(
  number: string,
  ton: number = TypeOfNumber.INTERNATIONAL,
  npi: number = NumberingPlan.ISDN,
): Did {
  return Object.freeze({ number, ton, npi });
}

export function didEquals(a: Did, b: Did): boolean {
  return a.number === b.number && a.ton === b.ton && a.npi === b.npi;
}
