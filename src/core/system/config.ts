import type { Quirks } from '@core/cpu/types';
import { DEFAULT_QUIRKS } from '@core/cpu/types';

export const DEFAULT_INSTRUCTIONS_PER_FRAME = 10;

export interface MachineConfig {
  instructionsPerFrame: number;
  quirks: Quirks;
  seed?: number; // deterministic random source when set
  trace: boolean; // per-instruction console trace
}

const QUIRK_NAMES: Record<string, keyof Quirks> = {
  'shift-vy': 'shiftUsesVy',
  'jump-vx': 'jumpWithVx',
  'index-increment': 'indexIncrement',
};

export function defaultConfig(): MachineConfig {
  return { instructionsPerFrame: DEFAULT_INSTRUCTIONS_PER_FRAME, quirks: { ...DEFAULT_QUIRKS }, trace: false };
}

// Accepts decimal or 0x-prefixed hex; null when absent or malformed
export function parseNumber(text: string | undefined): number | null {
  if (text === undefined) return null;
  const t = text.trim();
  if (t.length === 0) return null;
  const v = /^0x[0-9a-f]+$/i.test(t) ? parseInt(t.slice(2), 16) : /^\d+$/.test(t) ? parseInt(t, 10) : NaN;
  return Number.isFinite(v) ? v : null;
}

export function parseQuirks(list: string): Quirks {
  const quirks: Quirks = { ...DEFAULT_QUIRKS };
  for (const raw of list.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const key = QUIRK_NAMES[name];
    if (!key) throw new Error(`Unknown quirk "${raw.trim()}" (expected one of ${Object.keys(QUIRK_NAMES).join(', ')})`);
    quirks[key] = true;
  }
  return quirks;
}

// CHIP8_IPF, CHIP8_QUIRKS, CHIP8_SEED, TRACE_CPU
export function loadConfig(env: Record<string, string | undefined> = process.env): MachineConfig {
  const cfg = defaultConfig();
  const ipf = parseNumber(env.CHIP8_IPF);
  if (ipf !== null) cfg.instructionsPerFrame = ipf;
  if (env.CHIP8_QUIRKS) cfg.quirks = parseQuirks(env.CHIP8_QUIRKS);
  const seed = parseNumber(env.CHIP8_SEED);
  if (seed !== null) cfg.seed = seed >>> 0;
  cfg.trace = env.TRACE_CPU === '1';
  return cfg;
}
