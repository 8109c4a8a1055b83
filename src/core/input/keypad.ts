export const KEY_COUNT = 16;

// 16 pressed/released flags. Written by the input host between frames,
// read by SKP/SKNP and the key-wait poll.
export class Keypad {
  private pressed = new Uint8Array(KEY_COUNT);

  setKey(index: number, down: boolean): void {
    if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
      throw new RangeError(`Key index out of range: ${index}`);
    }
    this.pressed[index] = down ? 1 : 0;
  }

  isPressed(index: number): boolean {
    return this.pressed[index & 0x0F] === 1;
  }

  // Copy of the current state, used as the previous-poll snapshot for Fx0A
  snapshot(): Uint8Array {
    return this.pressed.slice();
  }

  // Lowest key that is down now but was up in `previous`, or -1
  firstNewlyPressed(previous: Uint8Array): number {
    for (let k = 0; k < KEY_COUNT; k++) {
      if (this.pressed[k] === 1 && previous[k] === 0) return k;
    }
    return -1;
  }

  releaseAll(): void {
    this.pressed.fill(0);
  }
}
