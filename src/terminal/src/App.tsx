/**
 * Main App Component
 * Manages navigation between the ROM menu and run mode
 */

import React, { useState } from 'react';
import { useApp } from 'ink';
import { RomMenu } from './RomMenu';
import { RunMode } from './RunMode';

interface AppProps {
  romDirectory: string;
  /** When given, the app opens straight into this ROM and exits with it */
  initialRom?: string;
}

export const App: React.FC<AppProps> = ({ romDirectory, initialRom }) => {
  const { exit } = useApp();
  const [romPath, setRomPath] = useState<string | null>(initialRom ?? null);

  const handleExit = (): void => {
    if (initialRom) {
      exit();
    } else {
      setRomPath(null);
    }
  };

  if (romPath === null) {
    return <RomMenu directory={romDirectory} onSelect={setRomPath} onExit={exit} />;
  }
  return <RunMode key={romPath} romPath={romPath} onExit={handleExit} />;
};
