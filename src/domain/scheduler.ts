/**
 * Periodic timers and a clock, injected into the game engine so rounds
 * can run on real time in production and on a manual clock in tests.
 */
export interface TimerHandle {
  cancel(): void;
}

export interface Scheduler {
  /** Current time in milliseconds */
  now(): number;

  /** Call `callback` every `intervalMs` until the handle is cancelled */
  setInterval(callback: () => void, intervalMs: number): TimerHandle;
}

/**
 * Scheduler backed by Node's timers and wall clock.
 */
export class SystemScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  setInterval(callback: () => void, intervalMs: number): TimerHandle {
    const interval = setInterval(callback, intervalMs);
    return {
      cancel: () => clearInterval(interval),
    };
  }
}

export const systemScheduler = new SystemScheduler();
