/**
 * Error types raised by the CHIP-8 core
 */

/**
 * Raised when an instruction touches memory outside the 4KB address space.
 *
 * Unlike warnings, which go to the log sink, this is a structural failure:
 * the host is expected to stop stepping when it sees one.
 */
export class BoundsViolationError extends Error {
  readonly address: number;

  constructor(address: number, operation: string) {
    super(`Memory ${operation} out of bounds: 0x${address.toString(16).toUpperCase()}`);
    this.name = 'BoundsViolationError';
    this.address = address;
  }
}
