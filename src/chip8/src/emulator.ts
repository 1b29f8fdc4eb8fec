/**
 * CHIP-8 Emulator
 *
 * Brings together the CPU, memory, call stack and framebuffer. An emulator is
 * only ever created from a ROM image by `loadRom`; loading another program
 * means building a new emulator, never resetting this one in place.
 */

import { CallStack, type ReadonlyCallStack } from './callStack';
import { CPU, type CpuState, type LogSink, type ShiftQuirk } from './cpu';
import { FONT, FONT_START } from './font';
import { Framebuffer, type ReadonlyFramebuffer } from './framebuffer';
import { MAX_PROGRAM_SIZE, Memory, PROGRAM_START, type ReadonlyMemory } from './memory';

export const ROM_TOO_BIG = 'ROM size too big';

export interface EmulatorOptions {
  /** Cap on nested subroutine calls; unlimited when omitted */
  maxStackDepth?: number;
  shiftQuirk?: ShiftQuirk;
}

/**
 * A loaded machine. Hosts can inspect every part of it, but only `step`
 * changes anything.
 */
export interface Emulator {
  readonly cpu: CpuState;
  readonly memory: ReadonlyMemory;
  readonly framebuffer: ReadonlyFramebuffer;
  readonly stack: ReadonlyCallStack;

  /**
   * Execute exactly one instruction
   *
   * @throws BoundsViolationError when the instruction reaches outside memory
   */
  step(log: LogSink): void;
}

export type LoadResult =
  | { success: true; emulator: Emulator; warnings: string[] }
  | { success: false; error: typeof ROM_TOO_BIG };

class Chip8Emulator implements Emulator {
  public readonly cpu: CpuState;
  public readonly memory: ReadonlyMemory;
  public readonly framebuffer: ReadonlyFramebuffer;
  public readonly stack: ReadonlyCallStack;

  private readonly processor: CPU;

  constructor(rom: Uint8Array, options: EmulatorOptions) {
    const memory = new Memory();
    const framebuffer = new Framebuffer();
    const stack = new CallStack(options.maxStackDepth);
    const processor = new CPU(memory, framebuffer, stack, { shiftQuirk: options.shiftQuirk });

    memory.writeBlock(FONT_START, FONT);
    memory.writeBlock(PROGRAM_START, rom);

    this.processor = processor;

    // Inspection-only views over the live parts
    this.cpu = {
      getRegister: (index) => processor.getRegister(index),
      getRegisters: () => processor.getRegisters(),
      getIndexRegister: () => processor.getIndexRegister(),
      getProgramCounter: () => processor.getProgramCounter(),
      getShiftQuirk: () => processor.getShiftQuirk(),
    };
    this.memory = {
      read8: (address) => memory.read8(address),
      read16: (address) => memory.read16(address),
      readBlock: (address, length) => memory.readBlock(address, length),
      size: memory.size,
    };
    this.framebuffer = {
      getRow: (y) => framebuffer.getRow(y),
      getRows: () => framebuffer.getRows(),
      isPixelSet: (x, y) => framebuffer.isPixelSet(x, y),
      get revision() {
        return framebuffer.revision;
      },
    };
    this.stack = {
      get depth() {
        return stack.depth;
      },
      limit: stack.limit,
      isFull: () => stack.isFull(),
      toArray: () => stack.toArray(),
    };
  }

  step(log: LogSink): void {
    this.processor.step(log);
  }
}

/**
 * Create an emulator with `rom` loaded at 0x200
 *
 * Fails without side effects when the ROM does not fit. An odd-sized ROM
 * loads but produces a warning, since its last instruction is missing a byte.
 */
export function loadRom(rom: Uint8Array, options: EmulatorOptions = {}): LoadResult {
  if (rom.length > MAX_PROGRAM_SIZE) {
    return { success: false, error: ROM_TOO_BIG };
  }

  const warnings: string[] = [];
  if (rom.length % 2 === 1) {
    warnings.push(`Warning: ROM size ${rom.length} is odd. This may cause undefined behaviors.`);
  }

  return { success: true, emulator: new Chip8Emulator(rom, options), warnings };
}
