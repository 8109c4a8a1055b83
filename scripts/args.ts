import { loadConfig, parseNumber, parseQuirks, type MachineConfig } from '@core/system/config'

export function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

export interface ScriptArgs {
  rom: string | null
  frames: number
  out: string | null
  scale: number
  config: MachineConfig
}

// Environment first (CHIP8_*, TRACE_CPU, ROM, FRAMES, OUT), then --flags on top
export function parseArgs(argv: string[] = process.argv.slice(2)): ScriptArgs {
  const config = loadConfig()
  let rom = getEnv('ROM')
  let frames = parseNumber(getEnv('FRAMES') ?? undefined) ?? 60
  let out = getEnv('OUT')
  let scale = 8
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--frames=')) frames = parseNumber(a.slice(9)) ?? frames
    else if (a.startsWith('--out=')) out = a.slice(6)
    else if (a.startsWith('--scale=')) scale = parseNumber(a.slice(8)) ?? scale
    else if (a.startsWith('--ipf=')) config.instructionsPerFrame = parseNumber(a.slice(6)) ?? config.instructionsPerFrame
    else if (a.startsWith('--quirks=')) config.quirks = parseQuirks(a.slice(9))
    else if (a.startsWith('--seed=')) { const s = parseNumber(a.slice(7)); if (s !== null) config.seed = s >>> 0 }
    else if (a === '--trace') config.trace = true
    else if (!a.startsWith('--') && rom === null) rom = a
  }
  return { rom, frames, out, scale, config }
}
