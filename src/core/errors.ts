import type { Word } from '@core/cpu/types';

const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');

// Load-time failure: the caller may pick another image
export class RomTooLarge extends Error {
  constructor(readonly size: number, readonly capacity: number) {
    super(`ROM is ${size} bytes, program region holds ${capacity}`);
    this.name = 'RomTooLarge';
  }
}

// Fatal to the current run; the system halts and rethrows it from every later tick
export abstract class EngineFault extends Error {
  protected constructor(message: string, readonly address: Word) {
    super(message);
  }
}

export class UnknownInstruction extends EngineFault {
  constructor(readonly word: Word, address: Word) {
    super(`Unknown instruction $${hex(word, 4)} at $${hex(address, 3)}`, address);
    this.name = 'UnknownInstruction';
  }
}

export class StackOverflow extends EngineFault {
  constructor(address: Word) {
    super(`Stack overflow on call at $${hex(address, 3)}`, address);
    this.name = 'StackOverflow';
  }
}

export class StackUnderflow extends EngineFault {
  constructor(address: Word) {
    super(`Stack underflow on return at $${hex(address, 3)}`, address);
    this.name = 'StackUnderflow';
  }
}
