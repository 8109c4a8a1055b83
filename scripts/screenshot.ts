#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { runProgram } from '@core/harness/headless'
import { writeFramebufferPng } from '@utils/render'
import { parseArgs } from './args'

// Usage: tsx scripts/screenshot.ts --rom=game.ch8 [--frames=N] [--out=screens/game.png] [--scale=8]
async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom ?? '(none)'}`); process.exit(2) }
  const program = new Uint8Array(fs.readFileSync(args.rom))
  const res = runProgram(program, { ...args.config, frames: args.frames })
  if (res.reason === 'fault') console.error(`halted after ${res.frames} frames: ${res.message}`)
  const outPath = args.out ?? path.join('screenshots', path.basename(args.rom).replace(/\.[^.]+$/, '') + '.png')
  await writeFramebufferPng(outPath, res.system.getFrameBuffer(), { scale: args.scale })
  console.log(`Wrote ${outPath}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
