/**
 * Built-in hexadecimal font
 *
 * Sixteen glyphs (0-F), each five bytes tall and four pixels wide,
 * stored in the high nibble of every byte.
 */

import glyphs from './font.json';

export const FONT_START = 0x050;
export const GLYPH_HEIGHT = 5;
export const GLYPH_COUNT = 16;

export const FONT: Uint8Array = Uint8Array.from(glyphs);

