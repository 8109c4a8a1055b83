export type Byte = number; // 0..255
export type Word = number; // 0..65535

export const STACK_DEPTH = 16;

export interface CPUState {
  v: Uint8Array; // V0..VF
  i: Word; // index register
  pc: Word; // program counter (12-bit addressable)
  sp: Byte; // number of return addresses on the stack
  stack: Uint16Array;
}

// Historically divergent behaviours; all false selects the defaults documented in DESIGN.md
export interface Quirks {
  shiftUsesVy: boolean; // 8xy6/8xyE: Vx = Vy shifted instead of Vx shifted in place
  jumpWithVx: boolean; // Bnnn: jump to nnn + Vx (x = high nibble of nnn) instead of nnn + V0
  indexIncrement: boolean; // Fx55/Fx65: I += x + 1 afterwards
}

export const DEFAULT_QUIRKS: Readonly<Quirks> = {
  shiftUsesVy: false,
  jumpWithVx: false,
  indexIncrement: false,
};

// Any generator producing a uniform byte
export type RandomSource = () => Byte;
