import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BoundsViolationError } from '../../chip8/src/errors';
import { loadRom, type Emulator } from '../../chip8/src/emulator';
import { createStepLoop } from './stepLoop';

function boot(bytes: number[]): Emulator {
  const result = loadRom(Uint8Array.from(bytes));
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.emulator;
}

describe('createStepLoop', () => {
  let log: string[];

  beforeEach(() => {
    vi.useFakeTimers();
    log = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs steps at the configured rate', () => {
    // ADD V0, 1 ; JP 0x200
    const emulator = boot([0x70, 0x01, 0x12, 0x00]);
    const ticks: number[] = [];
    const loop = createStepLoop(emulator, log, {
      stepsPerSecond: 700,
      intervalMs: 10,
      now: () => Date.now(),
      onTick: (steps) => ticks.push(steps),
    });

    loop.start();
    vi.advanceTimersByTime(100);
    loop.stop();

    expect(ticks).toEqual([7, 7, 7, 7, 7, 7, 7, 7, 7, 7]);
    expect(emulator.cpu.getRegister(0)).toBe(35);
    expect(log).toEqual([]);
  });

  it('carries fractional steps over to later ticks', () => {
    const emulator = boot([0x70, 0x01, 0x12, 0x00]);
    const ticks: number[] = [];
    const loop = createStepLoop(emulator, log, {
      stepsPerSecond: 50,
      intervalMs: 10,
      now: () => Date.now(),
      onTick: (steps) => ticks.push(steps),
    });

    loop.start();
    vi.advanceTimersByTime(40);
    loop.stop();

    // 0.5 steps due per tick
    expect(ticks).toEqual([0, 1, 0, 1]);
  });

  it('does nothing until started and stops when asked', () => {
    const emulator = boot([0x70, 0x01, 0x12, 0x00]);
    const loop = createStepLoop(emulator, log, {
      stepsPerSecond: 700,
      intervalMs: 10,
      now: () => Date.now(),
    });

    vi.advanceTimersByTime(100);
    expect(emulator.cpu.getProgramCounter()).toBe(0x200);
    expect(loop.isRunning()).toBe(false);

    loop.start();
    expect(loop.isRunning()).toBe(true);
    vi.advanceTimersByTime(10);
    loop.stop();
    vi.advanceTimersByTime(100);

    expect(loop.isRunning()).toBe(false);
    expect(emulator.cpu.getRegister(0)).toBe(4);
  });

  it('stops and reports the error when a step throws', () => {
    // JP 0xFFF: the next fetch straddles the end of memory
    const emulator = boot([0x1f, 0xff]);
    const ticks: number[] = [];
    const errors: unknown[] = [];
    const loop = createStepLoop(emulator, log, {
      stepsPerSecond: 700,
      intervalMs: 10,
      now: () => Date.now(),
      onTick: (steps) => ticks.push(steps),
      onError: (error) => errors.push(error),
    });

    loop.start();
    vi.advanceTimersByTime(100);

    expect(loop.isRunning()).toBe(false);
    expect(ticks).toEqual([1]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(BoundsViolationError);
    expect(emulator.cpu.getProgramCounter()).toBe(0xfff);
  });

  it('passes diagnostics to the log sink', () => {
    // RET with an empty stack, then loop on it
    const emulator = boot([0x00, 0xee, 0x12, 0x00]);
    const loop = createStepLoop(emulator, log, {
      stepsPerSecond: 200,
      intervalMs: 10,
      now: () => Date.now(),
    });

    loop.start();
    vi.advanceTimersByTime(10);
    loop.stop();

    expect(log).toEqual(['Warning: attempted to return while stack is empty.']);
  });

  describe('stepOnce', () => {
    it('executes exactly one step while stopped', () => {
      const emulator = boot([0x70, 0x01, 0x12, 0x00]);
      const loop = createStepLoop(emulator, log, { stepsPerSecond: 700, intervalMs: 10 });

      expect(loop.stepOnce()).toBe(true);
      expect(emulator.cpu.getRegister(0)).toBe(1);
      expect(emulator.cpu.getProgramCounter()).toBe(0x202);
    });

    it('refuses to step while running', () => {
      const emulator = boot([0x70, 0x01, 0x12, 0x00]);
      const loop = createStepLoop(emulator, log, { stepsPerSecond: 700, intervalMs: 10 });

      loop.start();
      expect(loop.stepOnce()).toBe(false);
      loop.stop();
      expect(emulator.cpu.getProgramCounter()).toBe(0x200);
    });

    it('reports errors from the single step', () => {
      const emulator = boot([0x1f, 0xff]);
      const errors: unknown[] = [];
      const loop = createStepLoop(emulator, log, {
        stepsPerSecond: 700,
        intervalMs: 10,
        onError: (error) => errors.push(error),
      });

      expect(loop.stepOnce()).toBe(true);
      expect(loop.stepOnce()).toBe(false);
      expect(errors[0]).toBeInstanceOf(BoundsViolationError);
    });
  });
});
