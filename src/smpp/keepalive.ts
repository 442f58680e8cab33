/**
 * Periodic enquire_link trigger for a bound session.
 * First tick fires one interval after start(); nothing fires after cancel().
 */
export class KeepaliveScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private cancelled = false;

  get active(): boolean {
    return this.timer !== null;
  }

  /** Arms the scheduler. A non-positive or infinite interval means keepalive is disabled. */
  start(intervalMs: number, onTick: () => void): boolean {
    if (this.cancelled || this.timer || !Number.isFinite(intervalMs) || intervalMs <= 0) {
      return false;
    }
    this.timer = setInterval(() => {
      if (!this.cancelled) onTick();
    }, intervalMs);
    this.timer.unref();
    return true;
  }

  /** Returns false when already cancelled. */
  cancel(): boolean {
    if (this.cancelled) return false;
    this.cancelled = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    return true;
  }
}
