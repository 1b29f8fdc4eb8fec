/**
 * Log View Component
 * Shows the newest diagnostic lines, oldest first
 */

import React from 'react';
import { Box, Text } from 'ink';

interface LogViewProps {
  logs: string[];
  maxVisible: number;
}

export const LogView: React.FC<LogViewProps> = ({ logs, maxVisible }) => {
  if (logs.length === 0) {
    return (
      <Box borderStyle="single" height={maxVisible + 2} justifyContent="center" alignItems="center">
        <Text color="gray">Logs will appear here!</Text>
      </Box>
    );
  }

  const hidden = Math.max(logs.length - maxVisible, 0);

  return (
    <Box borderStyle="single" flexDirection="column" height={maxVisible + 2}>
      {logs.slice(hidden).map((line, index) => (
        <Text key={hidden + index} color={line.startsWith('Error') ? 'red' : line.startsWith('Warning') ? 'yellow' : undefined}>
          {line}
        </Text>
      ))}
    </Box>
  );
};
