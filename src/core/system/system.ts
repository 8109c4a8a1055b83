import { Memory, PROGRAM_CAPACITY } from '@core/memory/memory';
import { Display } from '@core/display/display';
import { Timers } from '@core/timers/timers';
import { Keypad } from '@core/input/keypad';
import { CPU, mathRandom } from '@core/cpu/cpu';
import type { Byte, Quirks, RandomSource } from '@core/cpu/types';
import { EngineFault, RomTooLarge } from '@core/errors';
import { defaultConfig, type MachineConfig } from '@core/system/config';
import { seededRandom } from '@utils/random';
import { disasmWord, formatTraceLine } from '@utils/disasm';

export interface SystemOptions {
  instructionsPerFrame?: number;
  quirks?: Partial<Quirks>;
  seed?: number;
  trace?: boolean;
  random?: RandomSource; // overrides `seed`
}

// One complete machine. Every piece of state hangs off this instance, so
// several systems can run side by side.
export class Chip8System {
  public memory: Memory;
  public display: Display;
  public timers: Timers;
  public keypad: Keypad;
  public cpu: CPU;
  public readonly config: MachineConfig;
  public frame = 0;
  private fault: EngineFault | null = null;
  private readonly makeRandom: () => RandomSource;

  constructor(opts: SystemOptions = {}) {
    const base = defaultConfig();
    this.config = {
      instructionsPerFrame: opts.instructionsPerFrame ?? base.instructionsPerFrame,
      quirks: { ...base.quirks, ...opts.quirks },
      seed: opts.seed,
      trace: opts.trace ?? base.trace,
    };
    this.memory = new Memory();
    this.display = new Display();
    this.timers = new Timers();
    this.keypad = new Keypad();
    const { random } = opts;
    const { seed } = this.config;
    // A seeded source restarts from its seed on every reset
    this.makeRandom = () => random ?? (seed !== undefined ? seededRandom(seed) : mathRandom);
    this.cpu = new CPU(this.memory, this.display, this.timers, this.keypad, { quirks: this.config.quirks, random: this.makeRandom() });
    if (this.config.trace) this.installTrace();
  }

  private installTrace(): void {
    this.cpu.setTraceHook((pc, word) => {
      const line = formatTraceLine(pc, disasmWord(word, this.cpu.quirks), this.cpu.state);
      // eslint-disable-next-line no-console
      console.log(`[cpu] f=${this.frame} ${line}`);
    });
  }

  // Back to post-construction state; the loaded program is discarded
  reset(): void {
    this.memory.reset();
    this.display.clear();
    this.timers.reset();
    this.keypad.releaseAll();
    this.cpu.reset();
    this.cpu.setRandomSource(this.makeRandom());
    this.frame = 0;
    this.fault = null;
  }

  // Rejected images leave the machine untouched; accepted ones start from a clean reset
  loadProgram(bytes: Uint8Array): void {
    if (bytes.length > PROGRAM_CAPACITY) throw new RomTooLarge(bytes.length, PROGRAM_CAPACITY);
    this.reset();
    this.memory.loadProgram(bytes);
  }

  // One 60 Hz frame: N dispatches, then exactly one timer decrement
  tick(instructionsPerFrame: number = this.config.instructionsPerFrame): void {
    if (this.fault) throw this.fault;
    if (!Number.isInteger(instructionsPerFrame) || instructionsPerFrame < 0) {
      throw new RangeError(`instructionsPerFrame must be a non-negative integer, got ${instructionsPerFrame}`);
    }
    try {
      for (let k = 0; k < instructionsPerFrame; k++) this.cpu.step();
    } catch (e) {
      if (e instanceof EngineFault) {
        this.fault = e;
        if (this.config.trace) {
          // eslint-disable-next-line no-console
          console.error(`[cpu] f=${this.frame} halted: ${e.message}`);
        }
      }
      throw e;
    }
    this.timers.tick();
    this.frame++;
  }

  setKeyState(index: number, pressed: boolean): void {
    this.keypad.setKey(index, pressed);
  }

  getFrameBuffer(): Uint8Array { return this.display.getFrameBuffer(); }
  getPixel(x: number, y: number): boolean { return this.display.getPixel(x, y); }
  snapshot(): boolean[][] { return this.display.snapshot(); }

  getSoundTimer(): Byte { return this.timers.sound; }
  getDelayTimer(): Byte { return this.timers.delay; }
  isSoundActive(): boolean { return this.timers.isSoundActive(); }

  isHalted(): boolean { return this.fault !== null; }
  getFault(): EngineFault | null { return this.fault; }
}
