/**
 * Timer abstraction for everything that waits: subscription renewal,
 * renewal backoff, the fallback poll and the remote debounce window.
 * Tests substitute a manual scheduler and advance time themselves.
 */

export type CancelTimer = () => void;

export interface Scheduler {
  /** Run `callback` once after `delayMs`; the returned function cancels it */
  setTimeout(callback: () => void, delayMs: number): CancelTimer;
  /** Current time in epoch milliseconds */
  now(): number;
}

export const timerScheduler: Scheduler = {
  setTimeout(callback: () => void, delayMs: number): CancelTimer {
    const timer = setTimeout(callback, Math.max(0, delayMs));
    // Pending renewals and polls must not keep the process alive on shutdown
    timer.unref();
    return () => clearTimeout(timer);
  },
  now(): number {
    return Date.now();
  }
};
