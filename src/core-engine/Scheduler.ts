/**
 * Timed-delay abstraction for the memory-match engine.
 *
 * Game flow waits a fixed time between steps (preview, reveal,
 * flip-back). Those waits go through a Scheduler so that the app
 * runs them on real timers while tests drive them with fake timers.
 */

export interface Scheduler {
  /** Resolve after `ms` milliseconds. */
  delay(ms: number): Promise<void>;
}

/**
 * Scheduler backed by `setTimeout`.
 */
export const timerScheduler: Scheduler = {
  delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    });
  },
};
