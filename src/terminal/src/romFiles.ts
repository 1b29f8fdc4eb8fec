/**
 * ROM file access for the terminal host
 */

import { readFile, readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';

export const ROM_EXTENSION = '.ch8';

export type RomTarget =
  | { kind: 'file'; path: string }
  | { kind: 'directory'; path: string };

/**
 * Read a ROM image from disk
 */
export async function readRom(path: string): Promise<Uint8Array> {
  const data = await readFile(path);
  return new Uint8Array(data);
}

/**
 * List the ROM files in a directory, sorted by path
 */
export async function listRoms(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === ROM_EXTENSION)
    .map((entry) => join(directory, entry.name))
    .sort();
}

/**
 * Decide whether a command-line path names a ROM or a directory of ROMs
 */
export async function resolveRomTarget(path: string): Promise<RomTarget> {
  const absolute = resolve(path);
  const info = await stat(absolute);
  return info.isDirectory() ? { kind: 'directory', path: absolute } : { kind: 'file', path: absolute };
}
