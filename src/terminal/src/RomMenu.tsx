/**
 * ROM Menu Component
 * Lists the ROM files in a directory for selection
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { basename } from 'path';
import { listRoms } from './romFiles';

interface RomMenuProps {
  directory: string;
  onSelect: (path: string) => void;
  onExit: () => void;
}

export const RomMenu: React.FC<RomMenuProps> = ({ directory, onSelect, onExit }) => {
  const [roms, setRoms] = useState<string[] | null>(null);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);
  const [selected, setSelected] = useState(0);

  useEffect(() => {
    let cancelled = false;
    listRoms(directory)
      .then((found) => {
        if (!cancelled) {
          setRoms(found);
          setSelected(0);
        }
      })
      .catch((error: unknown) => {
        if (!cancelled) {
          setErrorMessage(error instanceof Error ? error.message : String(error));
        }
      });
    return () => {
      cancelled = true;
    };
  }, [directory]);

  useInput((_input, key) => {
    if (key.escape) {
      onExit();
      return;
    }
    if (!roms || roms.length === 0) {
      return;
    }

    if (key.upArrow) {
      setSelected((prev) => (prev > 0 ? prev - 1 : roms.length - 1));
    } else if (key.downArrow) {
      setSelected((prev) => (prev < roms.length - 1 ? prev + 1 : 0));
    } else if (key.return) {
      onSelect(roms[selected]);
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>CHIP-8 ROMs in {directory}</Text>
      <Text dimColor>Use the arrow keys to choose a ROM, Enter to load it, Esc to exit</Text>
      <Text> </Text>
      {errorMessage ? (
        <Text color="red">Error: {errorMessage}</Text>
      ) : roms === null ? (
        <Text dimColor>Scanning...</Text>
      ) : roms.length === 0 ? (
        <Text color="yellow">No .ch8 files found</Text>
      ) : (
        roms.map((path, index) => (
          <Text key={path} color={selected === index ? 'green' : undefined}>
            {selected === index ? '> ' : '  '}
            {basename(path)}
          </Text>
        ))
      )}
    </Box>
  );
};
