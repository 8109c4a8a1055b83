#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { runProgram } from '@core/harness/headless'
import { renderAscii, framebufferCrc } from '@utils/render'
import { parseArgs } from './args'

// Usage: tsx scripts/trace-rom.ts --rom=game.ch8 [--frames=N] [--ipf=N] [--quirks=a,b] [--seed=N]
// Prints one trace line per instruction, then the final screen and its CRC.
async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom ?? '(none)'}`); process.exit(2) }
  const program = new Uint8Array(fs.readFileSync(args.rom))
  const res = runProgram(program, { ...args.config, trace: true, frames: args.frames })
  const fb = res.system.getFrameBuffer()
  console.log(renderAscii(fb))
  console.log(JSON.stringify({ rom: args.rom, frames: res.frames, reason: res.reason, message: res.message ?? null, crc: framebufferCrc(fb) }))
  process.exit(res.reason === 'fault' ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
