/**
 * Register Display Component
 * Shows V0-VF, the index register, PC and stack depth
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { CpuState } from '../../chip8/src/cpu';

interface RegisterDisplayProps {
  cpu: CpuState;
  stackDepth: number;
}

const hex = (value: number, digits: number): string => value.toString(16).padStart(digits, '0').toUpperCase();

export const RegisterDisplay: React.FC<RegisterDisplayProps> = ({ cpu, stackDepth }) => {
  const values = cpu.getRegisters();
  const rows = [0, 8].map((start) => (
    <Box key={start}>
      {Array.from(values.subarray(start, start + 8)).map((value, offset) => (
        <Text key={offset}>
          V{hex(start + offset, 1)}: {hex(value, 2)}{'  '}
        </Text>
      ))}
    </Box>
  ));

  const pc = cpu.getProgramCounter();
  const i = cpu.getIndexRegister();

  return (
    <Box flexDirection="column">
      {rows}
      <Text>
        PC: 0x{hex(pc, 4)}  I: 0x{hex(i, 4)}  Stack: {stackDepth}
      </Text>
    </Box>
  );
};
