/**
 * Terminal rendering of the framebuffer
 *
 * Two pixel rows share one line of text using half-block characters, so the
 * 64x32 display fits in 64 columns by 16 lines.
 */

import { SCREEN_WIDTH } from '../../chip8/src/framebuffer';

const BOTH = '█';
const TOP = '▀';
const BOTTOM = '▄';
const NONE = ' ';

function bitAt(row: bigint, column: number): boolean {
  return ((row >> BigInt(SCREEN_WIDTH - 1 - column)) & 1n) === 1n;
}

export function renderFramebuffer(rows: readonly bigint[]): string[] {
  const lines: string[] = [];

  for (let y = 0; y < rows.length; y += 2) {
    const upper = rows[y];
    const lower = y + 1 < rows.length ? rows[y + 1] : 0n;
    let line = '';
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const top = bitAt(upper, x);
      const bottom = bitAt(lower, x);
      line += top ? (bottom ? BOTH : TOP) : bottom ? BOTTOM : NONE;
    }
    lines.push(line);
  }

  return lines;
}
