/**
 * CPU Implementation for the CHIP-8 machine
 *
 * - 16 general-purpose 8-bit registers (V0-VF), VF doubles as the flag register
 * - 16-bit index register (I) and program counter (PC)
 * - Two-byte big-endian instructions, one executed per step
 *
 * Each step is atomic: bounds are validated before anything is mutated, and
 * if an instruction still throws, the program counter is rolled back to the
 * value it had before the step.
 */

import { CallStack } from './callStack';
import { Framebuffer, SCREEN_HEIGHT, SCREEN_WIDTH } from './framebuffer';
import { Memory, PROGRAM_START } from './memory';

// Opcode categories (high nibble of the first byte)
export const OP_SYS = 0x0;
export const OP_JP = 0x1;
export const OP_CALL = 0x2;
export const OP_SE_IMM = 0x3;
export const OP_SNE_IMM = 0x4;
export const OP_SE_REG = 0x5;
export const OP_LD_IMM = 0x6;
export const OP_ADD_IMM = 0x7;
export const OP_ALU = 0x8;
export const OP_SNE_REG = 0x9;
export const OP_LD_I = 0xA;
export const OP_DRW = 0xD;
export const OP_MISC = 0xF;

// 0NNN forms
export const SYS_CLS = 0x0E0;
export const SYS_RET = 0x0EE;

// 8XYN sub-opcodes
export const ALU_LD = 0x0;
export const ALU_OR = 0x1;
export const ALU_AND = 0x2;
export const ALU_XOR = 0x3;
export const ALU_ADD = 0x4;
export const ALU_SUB = 0x5;
export const ALU_SHR = 0x6;
export const ALU_SUBN = 0x7;
export const ALU_SHL = 0xE;

// FXNN sub-opcodes
export const MISC_BCD = 0x33;
export const MISC_STORE = 0x55;
export const MISC_LOAD = 0x65;

export const FLAG_REGISTER = 0xF;
export const REGISTER_COUNT = 16;

/**
 * Destination for diagnostic messages. A plain string array satisfies it.
 */
export interface LogSink {
  push(message: string): void;
}

/**
 * How 8XYE decides the shifted-out bit.
 *
 * - `greater-than`: VF = 1 only when the value is > 0x80 (the default)
 * - `top-bit`: VF = 1 when the value is >= 0x80 (bit 7 set)
 */
export type ShiftQuirk = 'top-bit' | 'greater-than';

export interface CpuOptions {
  shiftQuirk?: ShiftQuirk;
}

/**
 * Fields of a two-byte instruction
 */
export interface DecodedInstruction {
  opcode: number;
  category: number;
  x: number;
  y: number;
  n: number;
  nn: number;
  nnn: number;
}

export function decode(opcode: number): DecodedInstruction {
  const high = (opcode >> 8) & 0xff;
  const low = opcode & 0xff;
  return {
    opcode: opcode & 0xffff,
    category: high >> 4,
    x: high & 0xf,
    y: low >> 4,
    n: low & 0xf,
    nn: low,
    nnn: ((high & 0xf) << 8) | low,
  };
}

/**
 * Both instruction bytes in lower-case hex, unpadded (0x0501 reads "51")
 */
export function formatOpcode(opcode: number): string {
  return `${((opcode >> 8) & 0xff).toString(16)}${(opcode & 0xff).toString(16)}`;
}

/**
 * Register inspection for hosts. Only the executor changes registers.
 */
export type CpuState = Pick<
  CPU,
  'getRegister' | 'getRegisters' | 'getIndexRegister' | 'getProgramCounter' | 'getShiftQuirk'
>;

/**
 * CPU class representing the CHIP-8 interpreter
 */
export class CPU {
  private readonly v: Uint8Array = new Uint8Array(REGISTER_COUNT);
  private i: number = 0;
  private pc: number = PROGRAM_START;

  private readonly memory: Memory;
  private readonly framebuffer: Framebuffer;
  private readonly stack: CallStack;
  private readonly shiftQuirk: ShiftQuirk;

  constructor(memory: Memory, framebuffer: Framebuffer, stack: CallStack, options: CpuOptions = {}) {
    this.memory = memory;
    this.framebuffer = framebuffer;
    this.stack = stack;
    this.shiftQuirk = options.shiftQuirk ?? 'greater-than';
  }

  getRegister(index: number): number {
    this.checkRegisterIndex(index);
    return this.v[index];
  }

  /**
   * Copy of V0-VF
   */
  getRegisters(): Uint8Array {
    return this.v.slice();
  }

  getIndexRegister(): number {
    return this.i;
  }

  getProgramCounter(): number {
    return this.pc;
  }

  getShiftQuirk(): ShiftQuirk {
    return this.shiftQuirk;
  }

  /**
   * Fetch, decode and execute one instruction
   *
   * @param log - Receives warnings for recoverable conditions
   * @throws BoundsViolationError when the instruction reaches outside memory
   */
  step(log: LogSink): void {
    const startPc = this.pc;

    // Fetch fails before anything changes
    const instruction = decode(this.memory.read16(this.pc));
    this.pc = (this.pc + 2) & 0xffff;

    try {
      this.executeInstruction(instruction, log);
    } catch (error) {
      this.pc = startPc;
      throw error;
    }
  }

  private executeInstruction(instruction: DecodedInstruction, log: LogSink): void {
    const { category, x, y, n, nn, nnn } = instruction;

    switch (category) {
      case OP_SYS:
        if (nnn === SYS_CLS) {
          this.framebuffer.clear();
        } else if (nnn === SYS_RET) {
          this.execRET(log);
        } else {
          this.unknown(instruction, log);
        }
        break;
      case OP_JP:
        this.pc = nnn;
        break;
      case OP_CALL:
        this.execCALL(nnn, log);
        break;
      case OP_SE_IMM:
        this.skipIf(this.v[x] === nn);
        break;
      case OP_SNE_IMM:
        this.skipIf(this.v[x] !== nn);
        break;
      case OP_SE_REG:
        if (n === 0) {
          this.skipIf(this.v[x] === this.v[y]);
        } else {
          this.unknown(instruction, log);
        }
        break;
      case OP_LD_IMM:
        this.v[x] = nn;
        break;
      case OP_ADD_IMM:
        // Wraps, no carry
        this.v[x] = (this.v[x] + nn) & 0xff;
        break;
      case OP_ALU:
        this.execALU(instruction, log);
        break;
      case OP_SNE_REG:
        if (n === 0) {
          this.skipIf(this.v[x] !== this.v[y]);
        } else {
          this.unknown(instruction, log);
        }
        break;
      case OP_LD_I:
        this.i = nnn;
        break;
      case OP_DRW:
        this.execDRW(x, y, n);
        break;
      case OP_MISC:
        this.execMISC(instruction, log);
        break;
      default:
        this.unknown(instruction, log);
    }
  }

  private execRET(log: LogSink): void {
    const address = this.stack.pop();
    if (address === undefined) {
      log.push('Warning: attempted to return while stack is empty.');
      return;
    }
    this.pc = address;
  }

  private execCALL(address: number, log: LogSink): void {
    if (!this.stack.push(this.pc)) {
      log.push(
        `Warning: call stack limit of ${this.stack.limit} reached; ignoring call to 0x${address.toString(16).toUpperCase().padStart(3, '0')}.`
      );
      return;
    }
    this.pc = address;
  }

  /**
   * 8XYN register-to-register operations. VF is always written last so that
   * X = F ends up holding the flag.
   */
  private execALU(instruction: DecodedInstruction, log: LogSink): void {
    const { x, y, n } = instruction;
    const vx = this.v[x];
    const vy = this.v[y];

    switch (n) {
      case ALU_LD:
        this.v[x] = vy;
        break;
      case ALU_OR:
        this.v[x] = vx | vy;
        break;
      case ALU_AND:
        this.v[x] = vx & vy;
        break;
      case ALU_XOR:
        this.v[x] = vx ^ vy;
        break;
      case ALU_ADD: {
        const sum = vx + vy;
        this.v[x] = sum & 0xff;
        this.v[FLAG_REGISTER] = sum > 0xff ? 1 : 0;
        break;
      }
      case ALU_SUB:
        this.v[x] = (vx - vy) & 0xff;
        this.v[FLAG_REGISTER] = vx >= vy ? 1 : 0;
        break;
      case ALU_SHR:
        // Vy is copied into Vx before shifting
        this.v[x] = vy >> 1;
        this.v[FLAG_REGISTER] = vy & 0x01;
        break;
      case ALU_SUBN:
        this.v[x] = (vy - vx) & 0xff;
        this.v[FLAG_REGISTER] = vy >= vx ? 1 : 0;
        break;
      case ALU_SHL: {
        const carry = this.shiftQuirk === 'greater-than' ? vy > 0x80 : (vy & 0x80) !== 0;
        this.v[x] = (vy << 1) & 0xff;
        this.v[FLAG_REGISTER] = carry ? 1 : 0;
        break;
      }
      default:
        this.unknown(instruction, log);
    }
  }

  private execDRW(x: number, y: number, rows: number): void {
    const sprite = this.memory.readBlock(this.i, rows);
    const collision = this.framebuffer.drawSprite(
      sprite,
      this.v[x] % SCREEN_WIDTH,
      this.v[y] % SCREEN_HEIGHT
    );
    this.v[FLAG_REGISTER] = collision ? 1 : 0;
  }

  private execMISC(instruction: DecodedInstruction, log: LogSink): void {
    const { x, nn } = instruction;

    switch (nn) {
      case MISC_BCD: {
        const value = this.v[x];
        this.memory.writeBlock(this.i, [Math.floor(value / 100), Math.floor(value / 10) % 10, value % 10]);
        break;
      }
      case MISC_STORE:
        this.memory.writeBlock(this.i, this.v.subarray(0, x + 1));
        break;
      case MISC_LOAD:
        this.v.set(this.memory.readBlock(this.i, x + 1), 0);
        break;
      default:
        this.unknown(instruction, log);
    }
  }

  private skipIf(condition: boolean): void {
    if (condition) {
      this.pc = (this.pc + 2) & 0xffff;
    }
  }

  private unknown(instruction: DecodedInstruction, log: LogSink): void {
    log.push(`Unknown instruction ${formatOpcode(instruction.opcode)}; skipping`);
  }

  private checkRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= REGISTER_COUNT) {
      throw new Error(`Invalid register index: ${index}`);
    }
  }
}
