/**
 * Subroutine return-address stack
 *
 * Push and pop both work on the tail. Classic hardware stops at 16 entries;
 * here the depth is unlimited unless a cap is given.
 */

export type ReadonlyCallStack = Pick<CallStack, 'depth' | 'limit' | 'isFull' | 'toArray'>;

export class CallStack {
  private readonly entries: number[] = [];
  private readonly maxDepth: number | undefined;

  constructor(maxDepth?: number) {
    if (maxDepth !== undefined && (!Number.isInteger(maxDepth) || maxDepth < 1)) {
      throw new Error(`Invalid stack depth limit: ${maxDepth}`);
    }
    this.maxDepth = maxDepth;
  }

  /**
   * Push a return address
   *
   * @returns false when the configured depth limit is already reached
   */
  push(address: number): boolean {
    if (this.isFull()) {
      return false;
    }
    this.entries.push(address & 0xffff);
    return true;
  }

  /**
   * Pop the most recent return address, or undefined when empty
   */
  pop(): number | undefined {
    return this.entries.pop();
  }

  isFull(): boolean {
    return this.maxDepth !== undefined && this.entries.length >= this.maxDepth;
  }

  get depth(): number {
    return this.entries.length;
  }

  get limit(): number | undefined {
    return this.maxDepth;
  }

  /**
   * Return addresses from the bottom of the stack to the top
   */
  toArray(): number[] {
    return [...this.entries];
  }
}
