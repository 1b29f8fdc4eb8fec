/**
 * Memory and CallStack Test Suite
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CallStack } from './callStack';
import { BoundsViolationError } from './errors';
import { Memory, MEMORY_SIZE } from './memory';

describe('Memory', () => {
  let memory: Memory;

  beforeEach(() => {
    memory = new Memory();
  });

  it('should cover 4KB', () => {
    expect(memory.size).toBe(MEMORY_SIZE);
    expect(memory.readBlock(0, MEMORY_SIZE).every((value) => value === 0)).toBe(true);
  });

  it('should read back written bytes', () => {
    memory.writeBlock(0x000, [0x12]);
    memory.writeBlock(0xfff, [0x34]);

    expect(memory.read8(0x000)).toBe(0x12);
    expect(memory.read8(0xfff)).toBe(0x34);
  });

  it('should read 16-bit values big-endian', () => {
    memory.writeBlock(0x200, [0xa2, 0x2a]);
    expect(memory.read16(0x200)).toBe(0xa22a);
  });

  it('should reject addresses past the end of memory', () => {
    expect(() => memory.read8(0x1000)).toThrow(BoundsViolationError);
    expect(() => memory.writeBlock(0x1000, [1])).toThrow('Memory write out of bounds: 0x1000');
    expect(() => memory.read16(0xfff)).toThrow('Memory read out of bounds: 0x1000');
  });

  it('should reject negative addresses', () => {
    expect(() => memory.read8(-1)).toThrow(BoundsViolationError);
  });

  it('should carry the offending address on the error', () => {
    try {
      memory.read8(0x1234);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BoundsViolationError);
      if (error instanceof BoundsViolationError) {
        expect(error.address).toBe(0x1234);
        expect(error.message).toBe('Memory read out of bounds: 0x1234');
      }
    }
  });

  it('should leave memory untouched when a block write overruns', () => {
    expect(() => memory.writeBlock(0xffe, [1, 2, 3])).toThrow(BoundsViolationError);
    expect(memory.read8(0xffe)).toBe(0);
    expect(memory.read8(0xfff)).toBe(0);
  });

  it('should allow a block that ends exactly at the top of memory', () => {
    memory.writeBlock(0xffe, [1, 2]);
    expect(Array.from(memory.readBlock(0xffe, 2))).toEqual([1, 2]);
  });

  it('should return a copy from readBlock', () => {
    memory.writeBlock(0x300, [7]);
    const block = memory.readBlock(0x300, 1);
    block[0] = 9;
    expect(memory.read8(0x300)).toBe(7);
  });

  it('should treat an empty block at the end of memory as valid', () => {
    expect(memory.readBlock(MEMORY_SIZE, 0).length).toBe(0);
  });
});

describe('CallStack', () => {
  it('should pop in reverse push order', () => {
    const stack = new CallStack();
    stack.push(0x202);
    stack.push(0x30a);

    expect(stack.toArray()).toEqual([0x202, 0x30a]);
    expect(stack.pop()).toBe(0x30a);
    expect(stack.pop()).toBe(0x202);
    expect(stack.depth).toBe(0);
  });

  it('should return undefined when popping an empty stack', () => {
    expect(new CallStack().pop()).toBeUndefined();
  });

  it('should refuse pushes once the limit is reached', () => {
    const stack = new CallStack(1);

    expect(stack.push(0x202)).toBe(true);
    expect(stack.isFull()).toBe(true);
    expect(stack.push(0x204)).toBe(false);
    expect(stack.toArray()).toEqual([0x202]);
  });

  it('should never fill up without a limit', () => {
    const stack = new CallStack();
    for (let i = 0; i < 100; i++) {
      stack.push(i);
    }
    expect(stack.isFull()).toBe(false);
    expect(stack.limit).toBeUndefined();
  });

  it('should reject a nonsensical limit', () => {
    expect(() => new CallStack(0)).toThrow('Invalid stack depth limit: 0');
  });
});
