import { describe, it, expect } from 'vitest';
import { execOne } from '../helpers/vmh';

const SAMPLES = [0, 1, 2, 15, 127, 128, 200, 254, 255];

describe('register arithmetic and flags', () => {
  it('ADD Vx,Vy keeps the low byte and sets VF iff the sum exceeds 255', () => {
    for (const a of SAMPLES) for (const b of SAMPLES) {
      const { cpu } = execOne(0x8124, { 1: a, 2: b });
      expect(cpu.state.v[1]).toBe((a + b) % 256);
      expect(cpu.state.v[0xF]).toBe(a + b > 255 ? 1 : 0);
    }
  });

  it('SUB sets VF iff no borrow, SUBN mirrors it', () => {
    for (const a of SAMPLES) for (const b of SAMPLES) {
      const sub = execOne(0x8125, { 1: a, 2: b }).cpu.state.v;
      expect(sub[1]).toBe((a - b + 256) % 256);
      expect(sub[0xF]).toBe(a >= b ? 1 : 0);
      const subn = execOne(0x8127, { 1: a, 2: b }).cpu.state.v;
      expect(subn[1]).toBe((b - a + 256) % 256);
      expect(subn[0xF]).toBe(b >= a ? 1 : 0);
    }
  });

  it('A-B then B-A gives complementary borrow flags for distinct operands', () => {
    const ab = execOne(0x8125, { 1: 10, 2: 3 }).cpu.state.v[0xF];
    const ba = execOne(0x8125, { 1: 3, 2: 10 }).cpu.state.v[0xF];
    expect([ab, ba]).toEqual([1, 0]);
  });

  it('equal operands subtract to zero without borrow', () => {
    const v = execOne(0x8125, { 1: 77, 2: 77 }).cpu.state.v;
    expect(v[1]).toBe(0);
    expect(v[0xF]).toBe(1);
  });

  it('shifts Vx in place and reports the bit shifted out', () => {
    let v = execOne(0x8126, { 1: 0b1000_0101, 2: 0xFF }).cpu.state.v;
    expect(v[1]).toBe(0b0100_0010);
    expect(v[0xF]).toBe(1);
    v = execOne(0x812E, { 1: 0b1000_0101, 2: 0 }).cpu.state.v;
    expect(v[1]).toBe(0b0000_1010);
    expect(v[0xF]).toBe(1);
    v = execOne(0x812E, { 1: 0b0100_0000 }).cpu.state.v;
    expect(v[1]).toBe(0x80);
    expect(v[0xF]).toBe(0);
  });

  it('shiftUsesVy shifts Vy into Vx', () => {
    const opts = { quirks: { shiftUsesVy: true } };
    let v = execOne(0x8126, { 1: 0xFF, 2: 0b0000_0110 }, opts).cpu.state.v;
    expect(v[1]).toBe(0b0000_0011);
    expect(v[0xF]).toBe(0);
    v = execOne(0x812E, { 1: 0, 2: 0x81 }, opts).cpu.state.v;
    expect(v[1]).toBe(0x02);
    expect(v[0xF]).toBe(1);
  });

  it('leaves the flag in VF when VF is the destination', () => {
    const v = execOne(0x8F14, { 0xF: 200, 1: 100 }).cpu.state.v;
    expect(v[0xF]).toBe(1);
  });

  it('ADD Vx,kk wraps without touching VF', () => {
    const v = execOne(0x7102, { 1: 0xFF, 0xF: 0x55 }).cpu.state.v;
    expect(v[1]).toBe(1);
    expect(v[0xF]).toBe(0x55);
  });

  it('loads and bitwise ops', () => {
    expect(execOne(0x6A42).cpu.state.v[0xA]).toBe(0x42);
    expect(execOne(0x8120, { 1: 1, 2: 9 }).cpu.state.v[1]).toBe(9);
    expect(execOne(0x8121, { 1: 12, 2: 10 }).cpu.state.v[1]).toBe(14);
    expect(execOne(0x8122, { 1: 12, 2: 10 }).cpu.state.v[1]).toBe(8);
    expect(execOne(0x8123, { 1: 12, 2: 10 }).cpu.state.v[1]).toBe(6);
  });

  it('advances PC by 2 after a non-jumping instruction', () => {
    expect(execOne(0x6000).cpu.state.pc).toBe(0x202);
  });
});
