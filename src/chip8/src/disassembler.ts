/**
 * Disassembler for the CHIP-8 CPU
 * Converts instruction words to assembly mnemonics
 */

import {
  ALU_ADD,
  ALU_AND,
  ALU_LD,
  ALU_OR,
  ALU_SHL,
  ALU_SHR,
  ALU_SUB,
  ALU_SUBN,
  ALU_XOR,
  MISC_BCD,
  MISC_LOAD,
  MISC_STORE,
  OP_ADD_IMM,
  OP_ALU,
  OP_CALL,
  OP_DRW,
  OP_JP,
  OP_LD_I,
  OP_LD_IMM,
  OP_MISC,
  OP_SE_IMM,
  OP_SE_REG,
  OP_SNE_IMM,
  OP_SNE_REG,
  OP_SYS,
  SYS_CLS,
  SYS_RET,
  decode,
} from './cpu';
import type { ReadonlyMemory } from './memory';

export const UNKNOWN_MNEMONIC = '???';

const ALU_NAMES: Record<number, string> = {
  [ALU_LD]: 'LD',
  [ALU_OR]: 'OR',
  [ALU_AND]: 'AND',
  [ALU_XOR]: 'XOR',
  [ALU_ADD]: 'ADD',
  [ALU_SUB]: 'SUB',
  [ALU_SHR]: 'SHR',
  [ALU_SUBN]: 'SUBN',
  [ALU_SHL]: 'SHL',
};

const reg = (index: number): string => `V${index.toString(16).toUpperCase()}`;
const byte = (value: number): string => `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
const addr = (value: number): string => `0x${value.toString(16).toUpperCase().padStart(3, '0')}`;

/**
 * Mnemonic for a single 16-bit instruction word
 */
export function disassembleOpcode(opcode: number): string {
  const { category, x, y, n, nn, nnn } = decode(opcode);

  switch (category) {
    case OP_SYS:
      if (nnn === SYS_CLS) return 'CLS';
      if (nnn === SYS_RET) return 'RET';
      return UNKNOWN_MNEMONIC;
    case OP_JP:
      return `JP ${addr(nnn)}`;
    case OP_CALL:
      return `CALL ${addr(nnn)}`;
    case OP_SE_IMM:
      return `SE ${reg(x)}, ${byte(nn)}`;
    case OP_SNE_IMM:
      return `SNE ${reg(x)}, ${byte(nn)}`;
    case OP_SE_REG:
      return n === 0 ? `SE ${reg(x)}, ${reg(y)}` : UNKNOWN_MNEMONIC;
    case OP_LD_IMM:
      return `LD ${reg(x)}, ${byte(nn)}`;
    case OP_ADD_IMM:
      return `ADD ${reg(x)}, ${byte(nn)}`;
    case OP_ALU: {
      const name = ALU_NAMES[n];
      return name === undefined ? UNKNOWN_MNEMONIC : `${name} ${reg(x)}, ${reg(y)}`;
    }
    case OP_SNE_REG:
      return n === 0 ? `SNE ${reg(x)}, ${reg(y)}` : UNKNOWN_MNEMONIC;
    case OP_LD_I:
      return `LD I, ${addr(nnn)}`;
    case OP_DRW:
      return `DRW ${reg(x)}, ${reg(y)}, ${n}`;
    case OP_MISC:
      switch (nn) {
        case MISC_BCD:
          return `LD B, ${reg(x)}`;
        case MISC_STORE:
          return `LD [I], ${reg(x)}`;
        case MISC_LOAD:
          return `LD ${reg(x)}, [I]`;
        default:
          return UNKNOWN_MNEMONIC;
      }
    default:
      return UNKNOWN_MNEMONIC;
  }
}

/**
 * Disassemble the instruction at the given address
 * Returns the mnemonic and the raw instruction word, or null when the address
 * has no complete instruction
 */
export function disassemble(memory: ReadonlyMemory, address: number): { mnemonic: string; opcode: number } | null {
  if (address < 0 || address + 1 >= memory.size) {
    return null;
  }
  const opcode = memory.read16(address);
  return { mnemonic: disassembleOpcode(opcode), opcode };
}
