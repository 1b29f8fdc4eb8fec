/**
 * Run Mode Component
 * Loads a ROM, drives it with the step loop and shows the machine state
 */

import React, { useCallback, useEffect, useRef, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { basename } from 'path';
import { disassemble } from '../../chip8/src/disassembler';
import { loadRom, type Emulator } from '../../chip8/src/emulator';
import { config } from './config';
import { Display } from './Display';
import { LogView } from './LogView';
import { RegisterDisplay } from './RegisterDisplay';
import { readRom } from './romFiles';
import { createStepLoop, type StepLoop } from './stepLoop';

interface RunModeProps {
  romPath: string;
  onExit: () => void;
}

const VISIBLE_LOG_LINES = 5;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const RunMode: React.FC<RunModeProps> = ({ romPath, onExit }) => {
  const [emulator, setEmulator] = useState<Emulator | null>(null);
  const [logs, setLogs] = useState<string[]>([]);
  const [running, setRunning] = useState(true);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);
  const [, setUpdateCounter] = useState(0);

  // Diagnostics from steps collect here between renders
  const pendingLogs = useRef<string[]>([]);
  const loopRef = useRef<StepLoop | null>(null);

  const romName = basename(romPath);

  const appendLogs = useCallback((lines: string[]) => {
    if (lines.length === 0) {
      return;
    }
    setLogs((prev) => [...prev, ...lines].slice(-config.maxLogLines));
  }, []);

  const flushLogs = useCallback(() => {
    appendLogs(pendingLogs.current.splice(0));
  }, [appendLogs]);

  const loadFromDisk = useCallback(async () => {
    try {
      const rom = await readRom(romPath);
      const result = loadRom(rom, { maxStackDepth: config.maxStackDepth, shiftQuirk: config.shiftQuirk });
      if (!result.success) {
        // Whatever was running before keeps running
        appendLogs([`Error when loading ${romName}: ${result.error}`]);
        return;
      }
      pendingLogs.current.splice(0);
      setEmulator(result.emulator);
      setErrorMessage(null);
      setRunning(true);
      setLogs([`ROM loaded: ${romName}`, ...result.warnings]);
    } catch (error) {
      appendLogs([`Error when loading ${romName}: ${describeError(error)}`]);
    }
  }, [romPath, romName, appendLogs]);

  useEffect(() => {
    void loadFromDisk();
  }, [loadFromDisk]);

  // One loop per emulator instance
  useEffect(() => {
    if (!emulator) {
      return;
    }
    const loop = createStepLoop(emulator, pendingLogs.current, {
      stepsPerSecond: config.stepsPerSecond,
      intervalMs: config.tickIntervalMs,
      onTick: (steps) => {
        flushLogs();
        if (steps > 0) {
          setUpdateCounter((c) => c + 1);
        }
      },
      onError: (error) => {
        setRunning(false);
        setErrorMessage(describeError(error));
      },
    });
    loopRef.current = loop;

    return () => {
      loop.stop();
      loopRef.current = null;
    };
  }, [emulator, flushLogs]);

  useEffect(() => {
    const loop = loopRef.current;
    if (!loop) {
      return;
    }
    if (running && !errorMessage) {
      loop.start();
    } else {
      loop.stop();
    }
  }, [emulator, running, errorMessage]);

  useInput((input, key) => {
    if (key.escape) {
      loopRef.current?.stop();
      onExit();
      return;
    }

    if (input === 'c') {
      setLogs([]);
    } else if (input === 'r') {
      void loadFromDisk();
    } else if (errorMessage) {
      // Halted on a bounds violation; only clear, reload and exit apply
      return;
    } else if (input === ' ') {
      setRunning((prev) => !prev);
    } else if (input === 'n' && !running) {
      loopRef.current?.stepOnce();
    }
  });

  const current = emulator ? disassemble(emulator.memory, emulator.cpu.getProgramCounter()) : null;

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>Running: {romName}</Text>
      <Text dimColor>
        {errorMessage
          ? 'Halted - r to reload, c to clear logs, Esc to leave'
          : running
          ? 'Space to pause, c to clear logs, r to reload, Esc to leave'
          : 'Paused - Space to resume, n to step, c to clear logs, Esc to leave'}
      </Text>

      {emulator ? (
        <>
          <Display framebuffer={emulator.framebuffer} />
          <RegisterDisplay cpu={emulator.cpu} stackDepth={emulator.stack.depth} />
          <Text>
            Current instruction:{' '}
            <Text bold color="cyan">
              {current ? `${current.mnemonic} (${current.opcode.toString(16).toUpperCase().padStart(4, '0')})` : '-'}
            </Text>
          </Text>
        </>
      ) : (
        <Text dimColor>Load ROM to see the effects!</Text>
      )}

      {errorMessage && (
        <Text color="red" bold>
          Error: {errorMessage}
        </Text>
      )}

      <LogView logs={logs} maxVisible={VISIBLE_LOG_LINES} />
    </Box>
  );
};
