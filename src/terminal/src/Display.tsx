/**
 * Display Component
 * Draws the 64x32 framebuffer with half-block characters
 */

import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import type { ReadonlyFramebuffer } from '../../chip8/src/framebuffer';
import { renderFramebuffer } from './screen';

interface DisplayProps {
  framebuffer: ReadonlyFramebuffer;
}

export const Display: React.FC<DisplayProps> = ({ framebuffer }) => {
  const revision = framebuffer.revision;

  // Only re-render the text when the framebuffer content changed
  const lines = useMemo(() => renderFramebuffer(framebuffer.getRows()), [framebuffer, revision]);

  return (
    <Box flexDirection="column" borderStyle="single" width={66}>
      {lines.map((line, index) => (
        <Text key={index}>{line}</Text>
      ))}
    </Box>
  );
};
