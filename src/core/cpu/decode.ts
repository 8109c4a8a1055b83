import type { Byte, Word } from './types';

// Closed set of instruction shapes. Field names follow the usual operand
// notation: x/y register nibbles, n low nibble, kk low byte, nnn low 12 bits.
export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'JP'; nnn: Word }
  | { op: 'CALL'; nnn: Word }
  | { op: 'SE_IMM'; x: number; kk: Byte }
  | { op: 'SNE_IMM'; x: number; kk: Byte }
  | { op: 'SE_REG'; x: number; y: number }
  | { op: 'SNE_REG'; x: number; y: number }
  | { op: 'LD_IMM'; x: number; kk: Byte }
  | { op: 'ADD_IMM'; x: number; kk: Byte }
  | { op: 'LD_REG'; x: number; y: number }
  | { op: 'OR'; x: number; y: number }
  | { op: 'AND'; x: number; y: number }
  | { op: 'XOR'; x: number; y: number }
  | { op: 'ADD_REG'; x: number; y: number }
  | { op: 'SUB'; x: number; y: number }
  | { op: 'SHR'; x: number; y: number }
  | { op: 'SUBN'; x: number; y: number }
  | { op: 'SHL'; x: number; y: number }
  | { op: 'LD_I'; nnn: Word }
  | { op: 'JP_OFFSET'; nnn: Word; x: number }
  | { op: 'RND'; x: number; kk: Byte }
  | { op: 'DRW'; x: number; y: number; n: number }
  | { op: 'SKP'; x: number }
  | { op: 'SKNP'; x: number }
  | { op: 'LD_X_DT'; x: number }
  | { op: 'LD_X_K'; x: number }
  | { op: 'LD_DT_X'; x: number }
  | { op: 'LD_ST_X'; x: number }
  | { op: 'ADD_I_X'; x: number }
  | { op: 'LD_F_X'; x: number }
  | { op: 'LD_B_X'; x: number }
  | { op: 'LD_MEM_X'; x: number }
  | { op: 'LD_X_MEM'; x: number };

export type Opcode = Instruction['op'];

// Returns null for any bit pattern outside the instruction table
export function decode(word: Word): Instruction | null {
  const w = word & 0xFFFF;
  const x = (w >> 8) & 0x0F;
  const y = (w >> 4) & 0x0F;
  const n = w & 0x0F;
  const kk = w & 0xFF;
  const nnn = w & 0x0FFF;

  switch (w >> 12) {
    case 0x0:
      if (w === 0x00E0) return { op: 'CLS' };
      if (w === 0x00EE) return { op: 'RET' };
      return null; // 0nnn machine-code calls are not supported
    case 0x1: return { op: 'JP', nnn };
    case 0x2: return { op: 'CALL', nnn };
    case 0x3: return { op: 'SE_IMM', x, kk };
    case 0x4: return { op: 'SNE_IMM', x, kk };
    case 0x5: return n === 0 ? { op: 'SE_REG', x, y } : null;
    case 0x6: return { op: 'LD_IMM', x, kk };
    case 0x7: return { op: 'ADD_IMM', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_REG', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_REG', x, y };
        case 0x5: return { op: 'SUB', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xE: return { op: 'SHL', x, y };
        default: return null;
      }
    case 0x9: return n === 0 ? { op: 'SNE_REG', x, y } : null;
    case 0xA: return { op: 'LD_I', nnn };
    case 0xB: return { op: 'JP_OFFSET', nnn, x };
    case 0xC: return { op: 'RND', x, kk };
    case 0xD: return { op: 'DRW', x, y, n };
    case 0xE:
      if (kk === 0x9E) return { op: 'SKP', x };
      if (kk === 0xA1) return { op: 'SKNP', x };
      return null;
    case 0xF:
      switch (kk) {
        case 0x07: return { op: 'LD_X_DT', x };
        case 0x0A: return { op: 'LD_X_K', x };
        case 0x15: return { op: 'LD_DT_X', x };
        case 0x18: return { op: 'LD_ST_X', x };
        case 0x1E: return { op: 'ADD_I_X', x };
        case 0x29: return { op: 'LD_F_X', x };
        case 0x33: return { op: 'LD_B_X', x };
        case 0x55: return { op: 'LD_MEM_X', x };
        case 0x65: return { op: 'LD_X_MEM', x };
        default: return null;
      }
    default:
      return null;
  }
}
