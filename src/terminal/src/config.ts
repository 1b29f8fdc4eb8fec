import dotenv from 'dotenv';
import type { ShiftQuirk } from '../../chip8/src/cpu';

// Load environment variables
dotenv.config();

const SHIFT_QUIRKS: readonly string[] = ['greater-than', 'top-bit'] satisfies ShiftQuirk[];

function isShiftQuirk(value: string): value is ShiftQuirk {
  return SHIFT_QUIRKS.includes(value);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function createConfig(env: NodeJS.ProcessEnv) {
  const shiftQuirkSetting = env.CHIP8_SHIFT_QUIRK || 'greater-than';

  return {
    // Execution pacing
    stepsPerSecond: parseInt(env.CHIP8_STEPS_PER_SECOND || '700', 10),
    tickIntervalMs: parseInt(env.CHIP8_TICK_INTERVAL_MS || '16', 10),

    // Machine behaviour
    maxStackDepth: env.CHIP8_MAX_STACK_DEPTH ? parseInt(env.CHIP8_MAX_STACK_DEPTH, 10) : undefined,
    shiftQuirkSetting,
    shiftQuirk: isShiftQuirk(shiftQuirkSetting) ? shiftQuirkSetting : 'greater-than',

    // Host
    romDirectory: env.CHIP8_ROM_DIR || '.',
    maxLogLines: parseInt(env.CHIP8_MAX_LOG_LINES || '200', 10),

    // Validate config
    validate(): void {
      if (!isPositiveInteger(this.stepsPerSecond)) {
        throw new Error(`CHIP8_STEPS_PER_SECOND must be a positive integer (got ${env.CHIP8_STEPS_PER_SECOND}).`);
      }
      if (!isPositiveInteger(this.tickIntervalMs)) {
        throw new Error(`CHIP8_TICK_INTERVAL_MS must be a positive integer (got ${env.CHIP8_TICK_INTERVAL_MS}).`);
      }
      if (this.maxStackDepth !== undefined && !isPositiveInteger(this.maxStackDepth)) {
        throw new Error(`CHIP8_MAX_STACK_DEPTH must be a positive integer (got ${env.CHIP8_MAX_STACK_DEPTH}).`);
      }
      if (!isShiftQuirk(this.shiftQuirkSetting)) {
        throw new Error(
          `Unsupported CHIP8_SHIFT_QUIRK: ${this.shiftQuirkSetting}\n` +
          `Supported values: ${SHIFT_QUIRKS.join(', ')}`
        );
      }
      if (!isPositiveInteger(this.maxLogLines)) {
        throw new Error(`CHIP8_MAX_LOG_LINES must be a positive integer (got ${env.CHIP8_MAX_LOG_LINES}).`);
      }
    },
  };
}

export type TerminalConfig = ReturnType<typeof createConfig>;

export const config: TerminalConfig = createConfig(process.env);
