import { Chip8System, type SystemOptions } from '@core/system/system';

// 16-bit instruction words -> big-endian program bytes
export function assemble(words: number[]): Uint8Array {
  const out = new Uint8Array(words.length * 2);
  words.forEach((w, k) => {
    out[k * 2] = (w >> 8) & 0xFF;
    out[k * 2 + 1] = w & 0xFF;
  });
  return out;
}

export function systemWithProgram(words: number[], opts: SystemOptions = {}) {
  const sys = new Chip8System(opts);
  sys.loadProgram(assemble(words));
  return { sys, cpu: sys.cpu, memory: sys.memory };
}

// Run a single instruction with the given registers preloaded
export function execOne(word: number, regs: Record<number, number> = {}, opts: SystemOptions = {}) {
  const ctx = systemWithProgram([word], opts);
  for (const [r, val] of Object.entries(regs)) ctx.cpu.state.v[Number(r)] = val;
  ctx.cpu.step();
  return ctx;
}

export function steps(sys: Chip8System, n: number): void {
  for (let k = 0; k < n; k++) sys.cpu.step();
}
