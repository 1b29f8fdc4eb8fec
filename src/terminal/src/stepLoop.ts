/**
 * Step Loop
 *
 * Drives an emulator at a fixed instruction rate from a timer. Each tick
 * works out how many steps are due from the time elapsed since the last tick
 * and runs them, so the average rate holds even though Node timers are far
 * coarser than one step.
 */

import type { LogSink } from '../../chip8/src/cpu';
import type { Emulator } from '../../chip8/src/emulator';

export interface StepLoopOptions {
  stepsPerSecond: number;
  intervalMs: number;
  /** Clock in milliseconds, defaults to performance.now() */
  now?: () => number;
  /** Called after every tick with the number of steps executed */
  onTick?: (steps: number) => void;
  /** Called when a step throws; the loop has already stopped */
  onError?: (error: unknown) => void;
}

export interface StepLoop {
  /**
   * Start running steps on the timer
   */
  start(): void;

  /**
   * Stop the timer. Pending fractional steps are discarded.
   */
  stop(): void;

  /**
   * Check if the loop is running
   */
  isRunning(): boolean;

  /**
   * Execute a single step while stopped
   *
   * @returns false if the loop is running or the step threw
   */
  stepOnce(): boolean;
}

export function createStepLoop(emulator: Emulator, log: LogSink, options: StepLoopOptions): StepLoop {
  const now = options.now ?? (() => performance.now());

  let timer: NodeJS.Timeout | null = null;
  let lastTimestamp = 0;
  let accumulatedSteps = 0;

  function stop(): void {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
    accumulatedSteps = 0;
  }

  // Runs up to `count` steps, stopping early on error
  function runSteps(count: number): number {
    let executed = 0;
    while (executed < count) {
      try {
        emulator.step(log);
      } catch (error) {
        stop();
        options.onTick?.(executed);
        options.onError?.(error);
        return executed;
      }
      executed++;
    }
    options.onTick?.(executed);
    return executed;
  }

  function tick(): void {
    const timestamp = now();
    const elapsed = timestamp - lastTimestamp;
    lastTimestamp = timestamp;

    // Never try to catch up more than a second's worth of steps
    accumulatedSteps = Math.min(
      accumulatedSteps + (elapsed * options.stepsPerSecond) / 1000,
      options.stepsPerSecond
    );

    const due = Math.floor(accumulatedSteps);
    accumulatedSteps -= due;
    runSteps(due);
  }

  return {
    start(): void {
      if (timer !== null) {
        return;
      }
      lastTimestamp = now();
      accumulatedSteps = 0;
      timer = setInterval(tick, options.intervalMs);
    },

    stop,

    isRunning(): boolean {
      return timer !== null;
    },

    stepOnce(): boolean {
      if (timer !== null) {
        return false;
      }
      return runSteps(1) === 1;
    },
  };
}
