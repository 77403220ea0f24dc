/**
 * Single-shot timer modelled as a stored deadline. Nothing fires on its own: the
 * owner calls `poll(now)` from its tick and gets `true` exactly once after expiry.
 */
export interface DeadlineTimer {
  /** (Re)arms the timer; a running deadline is replaced. */
  start(now: number): void;
  stop(): void;
  isActive(): boolean;
  poll(now: number): boolean;
}

export function createDeadlineTimer(durationMs: number): DeadlineTimer {
  let deadline: number | null = null;

  return {
    start(now) {
      deadline = now + durationMs;
    },
    stop() {
      deadline = null;
    },
    isActive() {
      return deadline !== null;
    },
    poll(now) {
      if (deadline === null || now < deadline) return false;
      deadline = null;
      return true;
    },
  };
}
