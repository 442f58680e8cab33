/** SMPP 3.4 sequence numbers run from 0x00000001 to 0x7FFFFFFF. */
export const MIN_SEQUENCE_NUMBER = 0x00000001;
export const MAX_SEQUENCE_NUMBER = 0x7FFFFFFF;

/**
 * Issues sequence numbers for one session.
 * Wraps from MAX back to MIN and skips any value `isInUse` still reports
 * as outstanding, so a number is never reused while a response is pending.
 */
export class SequenceNumberGenerator {
  private last: number;

  constructor(
    private readonly isInUse: (seq: number) => boolean = () => false,
    start = 0,
  ) {
    this.last = start;
  }

  next(): number {
    let candidate = this.last;
    for (let attempts = 0; attempts < MAX_SEQUENCE_NUMBER; attempts++) {
      candidate = candidate >= MAX_SEQUENCE_NUMBER ? MIN_SEQUENCE_NUMBER : candidate + 1;
      if (!this.isInUse(candidate)) {
        this.last = candidate;
        return candidate;
      }
    }
    throw new Error('No free sequence number: every value is outstanding');
  }
}
