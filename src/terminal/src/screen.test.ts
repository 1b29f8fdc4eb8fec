import { describe, it, expect } from 'vitest';
import { Framebuffer } from '../../chip8/src/framebuffer';
import { renderFramebuffer } from './screen';

describe('renderFramebuffer', () => {
  it('renders a blank screen as 16 lines of 64 spaces', () => {
    const lines = renderFramebuffer(new Framebuffer().getRows());

    expect(lines).toHaveLength(16);
    expect(lines.every((line) => line === ' '.repeat(64))).toBe(true);
  });

  it('combines two pixel rows into each line', () => {
    const framebuffer = new Framebuffer();
    framebuffer.drawSprite(Uint8Array.of(0xff, 0xf0), 0, 0);

    const lines = renderFramebuffer(framebuffer.getRows());
    expect(lines[0]).toBe('████▀▀▀▀' + ' '.repeat(56));
    expect(lines[1]).toBe(' '.repeat(64));
  });

  it('uses the lower half block for odd rows on their own', () => {
    const framebuffer = new Framebuffer();
    framebuffer.drawSprite(Uint8Array.of(0x01), 56, 31);

    const lines = renderFramebuffer(framebuffer.getRows());
    expect(lines[15]).toBe(' '.repeat(63) + '▄');
  });

  it('handles an odd number of rows', () => {
    expect(renderFramebuffer([0x8000000000000000n])).toEqual(['▀' + ' '.repeat(63)]);
  });
});
