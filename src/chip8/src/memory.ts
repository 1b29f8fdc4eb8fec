/**
 * Memory for the CHIP-8 machine
 *
 * A flat 4KB address space. The interpreter area (0x000-0x1FF) holds the
 * font, programs are loaded from 0x200 upwards.
 *
 * Every access is bounds checked. Reads and writes outside 0x000-0xFFF raise
 * a BoundsViolationError rather than wrapping.
 */

import { BoundsViolationError } from './errors';

export const MEMORY_SIZE = 4096;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;

export type ReadonlyMemory = Pick<Memory, 'read8' | 'read16' | 'readBlock' | 'size'>;

export class Memory {
  private readonly bytes: Uint8Array = new Uint8Array(MEMORY_SIZE);

  /**
   * Read an 8-bit value from memory
   *
   * @param address - 12-bit memory address (0x000 - 0xFFF)
   */
  read8(address: number): number {
    this.checkRange(address, 1, 'read');
    return this.bytes[address];
  }

  /**
   * Read a 16-bit value from memory (big-endian, as instructions are stored)
   */
  read16(address: number): number {
    this.checkRange(address, 2, 'read');
    return (this.bytes[address] << 8) | this.bytes[address + 1];
  }

  /**
   * Copy `length` bytes starting at `address`.
   *
   * The whole range is validated before anything is read.
   */
  readBlock(address: number, length: number): Uint8Array {
    this.checkRange(address, length, 'read');
    return this.bytes.slice(address, address + length);
  }

  /**
   * Copy `data` into memory starting at `address`.
   *
   * The whole range is validated before anything is written, so a failed
   * write leaves memory untouched.
   */
  writeBlock(address: number, data: ArrayLike<number>): void {
    this.checkRange(address, data.length, 'write');
    this.bytes.set(data, address);
  }

  get size(): number {
    return MEMORY_SIZE;
  }

  private checkRange(address: number, length: number, operation: 'read' | 'write'): void {
    if (!Number.isInteger(address) || address < 0) {
      throw new BoundsViolationError(address, operation);
    }
    if (length > 0 && address + length > MEMORY_SIZE) {
      throw new BoundsViolationError(Math.max(address, MEMORY_SIZE), operation);
    }
  }
}
