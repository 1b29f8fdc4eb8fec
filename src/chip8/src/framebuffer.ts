/**
 * Framebuffer for the CHIP-8 display
 *
 * 64x32 monochrome pixels. Each row is a 64-bit mask with column 0 in the
 * most significant bit, so a sprite byte drawn at x = 0 occupies the top
 * eight bits of the row.
 *
 * Sprites are XOR-blitted: drawing the same sprite twice restores the
 * previous pixels. Sprites are clipped at the right and bottom edges
 * rather than wrapped.
 */

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// Bit offset that places a sprite byte at column 0
const BYTE_SHIFT_AT_ORIGIN = SCREEN_WIDTH - 8;

export type ReadonlyFramebuffer = Pick<Framebuffer, 'getRow' | 'getRows' | 'isPixelSet' | 'revision'>;

export class Framebuffer {
  private readonly rows: BigUint64Array = new BigUint64Array(SCREEN_HEIGHT);
  private contentRevision: number = 0;

  /**
   * Turn every pixel off
   */
  clear(): void {
    this.rows.fill(0n);
    this.contentRevision++;
  }

  /**
   * XOR a sprite onto the display
   *
   * @param sprite - One byte per row, most significant bit leftmost
   * @param x - Column of the sprite's left edge (0-63)
   * @param y - Row of the sprite's top edge (0-31)
   * @returns true if any lit pixel was touched by a lit sprite pixel
   */
  drawSprite(sprite: Uint8Array, x: number, y: number): boolean {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) {
      throw new Error(`Sprite origin off screen: (${x}, ${y})`);
    }

    let collision = false;
    const visibleRows = Math.min(sprite.length, SCREEN_HEIGHT - y);

    for (let row = 0; row < visibleRows; row++) {
      const shifted = shiftIntoRow(sprite[row], x);
      const target = this.rows[y + row];
      if ((target & shifted) !== 0n) {
        collision = true;
      }
      this.rows[y + row] = target ^ shifted;
    }

    this.contentRevision++;
    return collision;
  }

  /**
   * Get the 64-bit mask for one row
   */
  getRow(y: number): bigint {
    if (y < 0 || y >= SCREEN_HEIGHT) {
      throw new Error(`Invalid framebuffer row: ${y}`);
    }
    return this.rows[y];
  }

  /**
   * Snapshot of every row. The returned array is a copy.
   */
  getRows(): readonly bigint[] {
    return Array.from(this.rows);
  }

  isPixelSet(x: number, y: number): boolean {
    if (x < 0 || x >= SCREEN_WIDTH) {
      return false;
    }
    if (y < 0 || y >= SCREEN_HEIGHT) {
      return false;
    }
    return ((this.rows[y] >> BigInt(SCREEN_WIDTH - 1 - x)) & 1n) === 1n;
  }

  /**
   * Incremented on every clear or draw. Renderers compare it with the
   * revision they last drew to decide whether their cached output is stale.
   */
  get revision(): number {
    return this.contentRevision;
  }
}

function shiftIntoRow(spriteByte: number, x: number): bigint {
  const shift = BYTE_SHIFT_AT_ORIGIN - x;
  const value = BigInt(spriteByte & 0xff);
  // Columns past 63 fall off the right-hand side
  return shift >= 0 ? value << BigInt(shift) : value >> BigInt(-shift);
}
