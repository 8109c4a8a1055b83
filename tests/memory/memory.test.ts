import { describe, it, expect } from 'vitest';
import { Memory, FONT, FONT_BASE, PROGRAM_START, glyphAddress } from '@core/memory/memory';
import { RomTooLarge } from '@core/errors';

describe('memory', () => {
  it('holds sixteen 5-row glyphs at the font base', () => {
    const m = new Memory();
    expect(FONT.length).toBe(80);
    expect(glyphAddress(0xF)).toBe(0x09B);
    expect(Array.from(m.readBlock(glyphAddress(0xF), 5))).toEqual([0xF0, 0x80, 0xF0, 0x80, 0x80]);
    expect(m.read(FONT_BASE - 1)).toBe(0);
    expect(m.read(FONT_BASE + 80)).toBe(0);
  });

  it('masks addresses to 12 bits', () => {
    const m = new Memory();
    m.write(0x1234, 0x1AB);
    expect(m.read(0x234)).toBe(0xAB);
    expect(m.read(0x1000)).toBe(m.read(0x000));
  });

  it('reads big-endian words and wraps past the last byte', () => {
    const m = new Memory();
    m.write(0x300, 0x12); m.write(0x301, 0x34);
    expect(m.readWord(0x300)).toBe(0x1234);
    m.write(0xFFF, 0xAB); m.write(0x000, 0xCD);
    expect(m.readWord(0xFFF)).toBe(0xABCD);
  });

  it('loads programs at the program origin and reset clears them', () => {
    const m = new Memory();
    m.loadProgram(Uint8Array.of(7, 8));
    expect(m.read(PROGRAM_START)).toBe(7);
    expect(m.read(PROGRAM_START + 1)).toBe(8);
    m.reset();
    expect(m.read(PROGRAM_START)).toBe(0);
    expect(m.read(FONT_BASE)).toBe(0xF0);
  });

  it('rejects oversized images', () => {
    expect(() => new Memory().loadProgram(new Uint8Array(0x1000))).toThrow(RomTooLarge);
  });
});
