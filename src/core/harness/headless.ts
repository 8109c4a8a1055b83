import { Chip8System, type SystemOptions } from '@core/system/system';
import { EngineFault } from '@core/errors';

// Key change applied before the given frame's instructions run
export interface KeyEvent {
  frame: number;
  key: number;
  pressed: boolean;
}

export interface RunOptions extends SystemOptions {
  frames: number;
  inputs?: KeyEvent[];
  // Called after every completed frame; return true to stop early
  onFrame?: (sys: Chip8System) => boolean | void;
}

export interface RunResult {
  frames: number;
  reason: 'done' | 'stopped' | 'fault';
  message?: string;
  system: Chip8System;
}

export function runProgram(program: Uint8Array, opts: RunOptions): RunResult {
  const { frames, inputs = [], onFrame, ...sysOpts } = opts;
  const sys = new Chip8System(sysOpts);
  sys.loadProgram(program);
  const schedule = [...inputs].sort((a, b) => a.frame - b.frame);
  let next = 0;

  for (let f = 0; f < frames; f++) {
    while (next < schedule.length && schedule[next].frame <= f) {
      const ev = schedule[next++];
      sys.setKeyState(ev.key, ev.pressed);
    }
    try {
      sys.tick();
    } catch (e) {
      if (e instanceof EngineFault) return { frames: f, reason: 'fault', message: e.message, system: sys };
      throw e;
    }
    if (onFrame && onFrame(sys) === true) return { frames: f + 1, reason: 'stopped', system: sys };
  }
  return { frames, reason: 'done', system: sys };
}
