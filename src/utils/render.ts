import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { SCREEN_WIDTH, SCREEN_HEIGHT } from '@core/display/display'

export type RGB = [number, number, number]

export interface PngStyle {
  scale?: number
  on?: RGB
  off?: RGB
}

// Framebuffer (0/1 per pixel, row major) as text, one line per row
export function renderAscii(fb: Uint8Array, on = '#', off = '.'): string {
  const lines: string[] = []
  for (let y = 0; y < SCREEN_HEIGHT; y++) {
    let line = ''
    for (let x = 0; x < SCREEN_WIDTH; x++) line += fb[y * SCREEN_WIDTH + x] ? on : off
    lines.push(line)
  }
  return lines.join('\n')
}

const CRC_TABLE = (() => {
  const t = new Uint32Array(256)
  for (let n = 0; n < 256; n++) {
    let c = n
    for (let k = 0; k < 8; k++) c = c & 1 ? 0xEDB88320 ^ (c >>> 1) : c >>> 1
    t[n] = c >>> 0
  }
  return t
})()

// CRC32 (IEEE) of a framebuffer as 8 lowercase hex digits, for comparing screens across runs
export function framebufferCrc(fb: Uint8Array): string {
  let crc = 0xFFFFFFFF
  for (const b of fb) crc = CRC_TABLE[(crc ^ b) & 0xFF] ^ (crc >>> 8)
  return ((crc ^ 0xFFFFFFFF) >>> 0).toString(16).padStart(8, '0')
}

export function framebufferToPng(fb: Uint8Array, style: PngStyle = {}): PNG {
  const scale = Math.max(1, Math.floor(style.scale ?? 8))
  const on = style.on ?? [255, 255, 255]
  const off = style.off ?? [0, 0, 0]
  const W = SCREEN_WIDTH * scale, H = SCREEN_HEIGHT * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < SCREEN_HEIGHT; y++) {
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const [r, g, b] = fb[y * SCREEN_WIDTH + x] ? on : off
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2
          png.data[o + 0] = r
          png.data[o + 1] = g
          png.data[o + 2] = b
          png.data[o + 3] = 255
        }
      }
    }
  }
  return png
}

export const writeFramebufferPng = async (outPath: string, fb: Uint8Array, style: PngStyle = {}): Promise<void> => {
  const png = framebufferToPng(fb, style)
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}
