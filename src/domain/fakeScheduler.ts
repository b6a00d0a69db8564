import { Scheduler, TimerHandle } from "./scheduler";

interface FakeTimer {
  callback: () => void;
  intervalMs: number;
  nextFireAt: number;
}

/**
 * FakeScheduler runs timers on a manual clock for tests and simulations.
 * Nothing fires until advance() or tick() is called.
 */
export class FakeScheduler implements Scheduler {
  private currentTime: number;
  private nextTimerId = 1;
  private timers = new Map<number, FakeTimer>();

  constructor(startTime = 0) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  setInterval(callback: () => void, intervalMs: number): TimerHandle {
    const id = this.nextTimerId++;
    this.timers.set(id, {
      callback,
      intervalMs,
      nextFireAt: this.currentTime + intervalMs,
    });

    return {
      cancel: () => {
        this.timers.delete(id);
      },
    };
  }

  /**
   * Move the clock forward, firing every timer that comes due on the way
   * in time order. Timers created by a callback can fire in the same call.
   */
  advance(ms: number): void {
    const target = this.currentTime + ms;

    for (;;) {
      const due = this.nextDueTimer(target);
      if (!due) break;

      this.currentTime = due.nextFireAt;
      due.nextFireAt += due.intervalMs;
      due.callback();
    }

    this.currentTime = target;
  }

  /**
   * Advance by whole ticks (one second each by default).
   */
  tick(count = 1, tickMs = 1000): void {
    for (let i = 0; i < count; i++) {
      this.advance(tickMs);
    }
  }

  get activeTimerCount(): number {
    return this.timers.size;
  }

  private nextDueTimer(target: number): FakeTimer | null {
    let due: FakeTimer | null = null;
    for (const timer of this.timers.values()) {
      if (timer.nextFireAt <= target && (due === null || timer.nextFireAt < due.nextFireAt)) {
        due = timer;
      }
    }
    return due;
  }
}
