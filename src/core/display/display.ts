export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// Monochrome 64x32 framebuffer, one byte (0/1) per pixel, row major.
// Mutated only by CLS/DRW; renderers read it between frames.
export class Display {
  private framebuffer = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void {
    this.framebuffer.fill(0);
  }

  // XOR-blit 8-pixel rows at (x, y); every coordinate wraps, nothing is clipped.
  // Returns true when a lit pixel was turned off.
  drawSprite(x: number, y: number, rows: Uint8Array): boolean {
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row];
      if (bits === 0) continue;
      const py = (y + row) % SCREEN_HEIGHT;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (x + col) % SCREEN_WIDTH;
        const idx = py * SCREEN_WIDTH + px;
        if (this.framebuffer[idx] === 1) collision = true;
        this.framebuffer[idx] ^= 1;
      }
    }
    return collision;
  }

  getPixel(x: number, y: number): boolean {
    const px = ((x % SCREEN_WIDTH) + SCREEN_WIDTH) % SCREEN_WIDTH;
    const py = ((y % SCREEN_HEIGHT) + SCREEN_HEIGHT) % SCREEN_HEIGHT;
    return this.framebuffer[py * SCREEN_WIDTH + px] === 1;
  }

  // Copy so callers cannot mutate machine state
  getFrameBuffer(): Uint8Array {
    return this.framebuffer.slice();
  }

  snapshot(): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      const line: boolean[] = [];
      for (let x = 0; x < SCREEN_WIDTH; x++) line.push(this.framebuffer[y * SCREEN_WIDTH + x] === 1);
      rows.push(line);
    }
    return rows;
  }
}
