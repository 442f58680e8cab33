import type { SendMessageAck, SubmitResult } from './commands.js';
import { RequestTimeoutError } from './errors.js';

export interface Requester<T> {
  resolve(value: T): void;
  reject(error: Error): void;
}

export interface ResponseWatcherOptions {
  sequenceNumbers: readonly number[];
  requester: Requester<SendMessageAck>;
  /** No timeout when absent or 0. */
  timeoutMs?: number;
  /** Called with the still-unanswered numbers when the timeout fires. */
  onExpire?: (sequenceNumbers: number[]) => void;
}

/**
 * Waits for the responses to one SendMessage and settles its caller once:
 * with a SendMessageAck when every awaited sequence number has answered,
 * or with an error on timeout or session termination.
 */
export class ResponseWatcher {
  private readonly sequenceNumbers: readonly number[];
  private readonly requester: Requester<SendMessageAck>;
  private readonly results = new Map<number, SubmitResult>();
  private readonly onExpire?: (sequenceNumbers: number[]) => void;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private settled = false;

  constructor(options: ResponseWatcherOptions) {
    this.sequenceNumbers = options.sequenceNumbers;
    this.requester = options.requester;
    this.onExpire = options.onExpire;

    const timeoutMs = options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      this.timer = setTimeout(() => this.expire(timeoutMs), timeoutMs);
      this.timer.unref();
    }
  }

  get done(): boolean {
    return this.settled;
  }

  /** Record one response. Returns true when this completed the ack. */
  deliver(seq: number, result: SubmitResult): boolean {
    if (this.settled || !this.sequenceNumbers.includes(seq) || this.results.has(seq)) {
      return false;
    }
    this.results.set(seq, result);
    if (this.results.size < this.sequenceNumbers.length) {
      return false;
    }

    const ordered: SubmitResult[] = [];
    for (const n of this.sequenceNumbers) {
      const r = this.results.get(n);
      if (r) ordered.push(r);
    }
    this.settle();
    this.requester.resolve({ results: ordered });
    return true;
  }

  fail(error: Error): void {
    if (this.settled) return;
    this.settle();
    this.requester.reject(error);
  }

  private expire(timeoutMs: number): void {
    if (this.settled) return;
    const unanswered = this.sequenceNumbers.filter(n => !this.results.has(n));
    this.settle();
    this.requester.reject(new RequestTimeoutError(unanswered[0] ?? this.sequenceNumbers[0], timeoutMs));
    this.onExpire?.(unanswered);
  }

  private settle(): void {
    this.settled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
