import React from 'react';
import { render } from 'ink';
import { dirname } from 'path';
import { App } from './App';
import { config } from './config';
import { resolveRomTarget } from './romFiles';

async function main(): Promise<void> {
  try {
    // Validate configuration
    config.validate();

    const target = await resolveRomTarget(process.argv[2] ?? config.romDirectory);

    const { waitUntilExit } = render(
      target.kind === 'file' ? (
        <App romDirectory={dirname(target.path)} initialRom={target.path} />
      ) : (
        <App romDirectory={target.path} />
      )
    );

    await waitUntilExit();
  } catch (error) {
    console.error('❌ Failed to start emulator:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
