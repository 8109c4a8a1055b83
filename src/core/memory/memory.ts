import type { Byte, Word } from '@core/cpu/types';
import { RomTooLarge } from '@core/errors';
import glyphs from './font.json';

export const MEMORY_SIZE = 0x1000;
export const ADDR_MASK = 0x0FFF;
export const PROGRAM_START = 0x200;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START;
export const FONT_BASE = 0x050;
export const GLYPH_HEIGHT = 5;

// Built-in hex digit glyphs 0..F, 5 rows each, high nibble only
export const FONT: Uint8Array = Uint8Array.from(glyphs.flat());

export function glyphAddress(digit: number): Word {
  return FONT_BASE + (digit & 0x0F) * GLYPH_HEIGHT;
}

// Flat 4KB store. Every address is masked to 12 bits, so instruction-computed
// addresses wrap instead of running off the end.
export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.ram.fill(0);
    this.ram.set(FONT, FONT_BASE);
  }

  read(addr: Word): Byte {
    return this.ram[addr & ADDR_MASK];
  }

  write(addr: Word, value: Byte): void {
    this.ram[addr & ADDR_MASK] = value & 0xFF;
  }

  // Big-endian instruction word; the low byte wraps to $000 when addr is $FFF
  readWord(addr: Word): Word {
    return (this.read(addr) << 8) | this.read(addr + 1);
  }

  readBlock(addr: Word, length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let k = 0; k < length; k++) out[k] = this.read(addr + k);
    return out;
  }

  loadProgram(data: Uint8Array): void {
    if (data.length > PROGRAM_CAPACITY) throw new RomTooLarge(data.length, PROGRAM_CAPACITY);
    this.ram.set(data, PROGRAM_START);
  }
}
