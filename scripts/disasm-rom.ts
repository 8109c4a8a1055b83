#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { disassemble, dumpMemory } from '@utils/disasm'
import { Chip8System } from '@core/system/system'
import { parseArgs } from './args'

// Usage: tsx scripts/disasm-rom.ts <rom.ch8> [--quirks=jump-vx] [--dump]
// --dump prints the whole 4KB memory image (font + program) instead of a listing.
const args = parseArgs()
if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom ?? '(none)'}`); process.exit(2) }
const program = new Uint8Array(fs.readFileSync(args.rom))
if (process.argv.includes('--dump')) {
  const sys = new Chip8System({ quirks: args.config.quirks })
  sys.loadProgram(program)
  for (const line of dumpMemory((a) => sys.memory.read(a))) console.log(line)
} else {
  for (const line of disassemble(program, 0x200, args.config.quirks)) console.log(line)
}
