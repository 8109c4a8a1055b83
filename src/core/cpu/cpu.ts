import type { Byte, Word, CPUState, Quirks, RandomSource } from './types';
import { DEFAULT_QUIRKS, STACK_DEPTH } from './types';
import { decode, type Instruction } from './decode';
import { Memory, PROGRAM_START, ADDR_MASK, glyphAddress } from '@core/memory/memory';
import { Display } from '@core/display/display';
import { Timers } from '@core/timers/timers';
import { Keypad } from '@core/input/keypad';
import { UnknownInstruction, StackOverflow, StackUnderflow } from '@core/errors';

const VF = 0xF;

export const mathRandom: RandomSource = () => Math.floor(Math.random() * 256) & 0xFF;

export interface CPUOptions {
  quirks?: Partial<Quirks>;
  random?: RandomSource;
}

// Pending Fx0A: which register receives the key, and the key state seen at the last poll
interface KeyWait {
  register: number;
  previous: Uint8Array;
}

export class CPU {
  state: CPUState;
  readonly quirks: Quirks;
  private random: RandomSource;
  private keyWait: KeyWait | null = null;
  private traceHook: ((pc: Word, word: Word) => void) | null = null;

  constructor(
    private memory: Memory,
    private display: Display,
    private timers: Timers,
    private keypad: Keypad,
    opts: CPUOptions = {},
  ) {
    this.quirks = { ...DEFAULT_QUIRKS, ...opts.quirks };
    this.random = opts.random ?? mathRandom;
    this.state = CPU.initialState();
  }

  private static initialState(): CPUState {
    return { v: new Uint8Array(16), i: 0, pc: PROGRAM_START, sp: 0, stack: new Uint16Array(STACK_DEPTH) };
  }

  reset(): void {
    this.state = CPU.initialState();
    this.keyWait = null;
  }

  // Per-instruction callback, invoked with the fetch address and word before execution
  setTraceHook(fn: ((pc: Word, word: Word) => void) | null) { this.traceHook = fn; }

  setRandomSource(fn: RandomSource): void { this.random = fn; }

  isWaitingForKey(): boolean { return this.keyWait !== null; }

  // One dispatch: either poll a pending key wait or fetch/decode/execute one instruction
  step(): void {
    if (this.keyWait) {
      this.pollKeyWait(this.keyWait);
      return;
    }
    const s = this.state;
    const pc = s.pc;
    const word = this.memory.readWord(pc);
    const ins = decode(word);
    if (!ins) throw new UnknownInstruction(word, pc);
    if (this.traceHook) this.traceHook(pc, word);
    s.pc = (pc + 2) & ADDR_MASK;
    this.execute(ins, pc);
  }

  private pollKeyWait(wait: KeyWait): void {
    const key = this.keypad.firstNewlyPressed(wait.previous);
    if (key < 0) {
      wait.previous = this.keypad.snapshot();
      return;
    }
    this.state.v[wait.register] = key;
    this.state.pc = (this.state.pc + 2) & ADDR_MASK;
    this.keyWait = null;
  }

  private skipIf(cond: boolean): void {
    if (cond) this.state.pc = (this.state.pc + 2) & ADDR_MASK;
  }

  // Result first, then VF, so a VF destination ends up holding the flag
  private setWithFlag(x: number, value: Byte, flag: 0 | 1): void {
    this.state.v[x] = value & 0xFF;
    this.state.v[VF] = flag;
  }

  private execute(ins: Instruction, addr: Word): void {
    const s = this.state;
    const v = s.v;
    switch (ins.op) {
      case 'CLS':
        this.display.clear();
        return;
      case 'RET':
        if (s.sp === 0) throw new StackUnderflow(addr);
        s.sp--;
        s.pc = s.stack[s.sp] & ADDR_MASK;
        return;
      case 'JP':
        s.pc = ins.nnn;
        return;
      case 'CALL':
        if (s.sp >= STACK_DEPTH) throw new StackOverflow(addr);
        s.stack[s.sp] = s.pc;
        s.sp++;
        s.pc = ins.nnn;
        return;
      case 'SE_IMM': this.skipIf(v[ins.x] === ins.kk); return;
      case 'SNE_IMM': this.skipIf(v[ins.x] !== ins.kk); return;
      case 'SE_REG': this.skipIf(v[ins.x] === v[ins.y]); return;
      case 'SNE_REG': this.skipIf(v[ins.x] !== v[ins.y]); return;
      case 'LD_IMM': v[ins.x] = ins.kk; return;
      case 'ADD_IMM': v[ins.x] = (v[ins.x] + ins.kk) & 0xFF; return;
      case 'LD_REG': v[ins.x] = v[ins.y]; return;
      case 'OR': v[ins.x] |= v[ins.y]; return;
      case 'AND': v[ins.x] &= v[ins.y]; return;
      case 'XOR': v[ins.x] ^= v[ins.y]; return;
      case 'ADD_REG': {
        const sum = v[ins.x] + v[ins.y];
        this.setWithFlag(ins.x, sum, sum > 0xFF ? 1 : 0);
        return;
      }
      case 'SUB': {
        const a = v[ins.x], b = v[ins.y];
        this.setWithFlag(ins.x, a - b, a >= b ? 1 : 0);
        return;
      }
      case 'SUBN': {
        const a = v[ins.x], b = v[ins.y];
        this.setWithFlag(ins.x, b - a, b >= a ? 1 : 0);
        return;
      }
      case 'SHR': {
        const src = this.quirks.shiftUsesVy ? v[ins.y] : v[ins.x];
        this.setWithFlag(ins.x, src >> 1, (src & 0x01) === 0 ? 0 : 1);
        return;
      }
      case 'SHL': {
        const src = this.quirks.shiftUsesVy ? v[ins.y] : v[ins.x];
        this.setWithFlag(ins.x, src << 1, (src & 0x80) === 0 ? 0 : 1);
        return;
      }
      case 'LD_I': s.i = ins.nnn; return;
      case 'JP_OFFSET': {
        const offset = this.quirks.jumpWithVx ? v[ins.x] : v[0];
        s.pc = (ins.nnn + offset) & ADDR_MASK;
        return;
      }
      case 'RND': v[ins.x] = this.random() & 0xFF & ins.kk; return;
      case 'DRW': {
        const rows = this.memory.readBlock(s.i, ins.n);
        const hit = this.display.drawSprite(v[ins.x], v[ins.y], rows);
        v[VF] = hit ? 1 : 0;
        return;
      }
      case 'SKP': this.skipIf(this.keypad.isPressed(v[ins.x])); return;
      case 'SKNP': this.skipIf(!this.keypad.isPressed(v[ins.x])); return;
      case 'LD_X_DT': v[ins.x] = this.timers.delay; return;
      case 'LD_X_K':
        // Hold PC on this instruction until the poll sees a fresh key press
        s.pc = addr;
        this.keyWait = { register: ins.x, previous: this.keypad.snapshot() };
        return;
      case 'LD_DT_X': this.timers.setDelay(v[ins.x]); return;
      case 'LD_ST_X': this.timers.setSound(v[ins.x]); return;
      case 'ADD_I_X': s.i = (s.i + v[ins.x]) & 0xFFFF; return;
      case 'LD_F_X': s.i = glyphAddress(v[ins.x]); return;
      case 'LD_B_X': {
        const val = v[ins.x];
        this.memory.write(s.i, Math.floor(val / 100));
        this.memory.write(s.i + 1, Math.floor(val / 10) % 10);
        this.memory.write(s.i + 2, val % 10);
        return;
      }
      case 'LD_MEM_X':
        for (let r = 0; r <= ins.x; r++) this.memory.write(s.i + r, v[r]);
        if (this.quirks.indexIncrement) s.i = (s.i + ins.x + 1) & 0xFFFF;
        return;
      case 'LD_X_MEM':
        for (let r = 0; r <= ins.x; r++) v[r] = this.memory.read(s.i + r);
        if (this.quirks.indexIncrement) s.i = (s.i + ins.x + 1) & 0xFFFF;
        return;
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
