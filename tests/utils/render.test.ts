import { describe, it, expect } from 'vitest';
import { renderAscii, framebufferToPng, framebufferCrc } from '@utils/render';
import { SCREEN_WIDTH, SCREEN_HEIGHT } from '@core/display/display';

function fbWithOrigin(): Uint8Array {
  const fb = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  fb[0] = 1;
  return fb;
}

describe('framebuffer rendering', () => {
  it('renders ASCII rows', () => {
    const lines = renderAscii(fbWithOrigin()).split('\n');
    expect(lines.length).toBe(32);
    expect(lines[0]).toBe('#' + '.'.repeat(63));
    expect(lines[1]).toBe('.'.repeat(64));
  });

  it('scales pixels into an RGBA PNG', () => {
    const png = framebufferToPng(fbWithOrigin(), { scale: 2, on: [0, 255, 0] });
    expect(png.width).toBe(128);
    expect(png.height).toBe(64);
    expect(Array.from(png.data.subarray(0, 4))).toEqual([0, 255, 0, 255]);
    expect(Array.from(png.data.subarray(4, 8))).toEqual([0, 255, 0, 255]);
    expect(Array.from(png.data.subarray(8, 12))).toEqual([0, 0, 0, 255]);
  });
});

describe('framebufferCrc', () => {
  it('matches the standard CRC32 check value', () => {
    expect(framebufferCrc(new TextEncoder().encode('123456789'))).toBe('cbf43926');
    expect(framebufferCrc(new Uint8Array(0))).toBe('00000000');
  });

  it('tells a lit pixel apart from a blank screen', () => {
    const blank = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
    expect(framebufferCrc(fbWithOrigin())).not.toBe(framebufferCrc(blank));
    expect(framebufferCrc(blank)).toBe(framebufferCrc(new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT)));
  });
});
